import { buildDefaultCoordinator, unattendedHumanInput, type BuildCoordinatorOptions } from './app/bootstrap';
import { AppError } from './shared/errors/app-error';

export * from './core/orchestrator';
export * from './core/agents';
export { buildDefaultCoordinator, unattendedHumanInput, type BuildCoordinatorOptions } from './app/bootstrap';
export { AppError, toErrorWithCode, type ErrorCode } from './shared/errors/app-error';

/**
 * Run one query with the default wiring and return the final answer.
 *
 * @throws AppError RUN_FAILED when the session ends FAILED.
 */
export async function run(
  query: string,
  profile?: string,
  options: Partial<Omit<BuildCoordinatorOptions, 'profile'>> = {},
): Promise<string> {
  const coordinator = buildDefaultCoordinator({
    ...options,
    profile,
    humanInput: options.humanInput ?? unattendedHumanInput,
  });
  const outcome = await coordinator.run(query);
  if (outcome.status === 'FAILED') {
    throw new AppError('RUN_FAILED', outcome.finalAnswer || 'Session failed', undefined, {
      sessionId: outcome.session.sessionId,
      hilEvents: outcome.session.hilEvents.length,
    });
  }
  return outcome.finalAnswer;
}
