import { backoffDelayMs, runWithDeadline, sleep as defaultSleep, type Sleep } from '../../shared/async/resilience';
import { logger } from '../../shared/logging/logger';
import type { DeepReadonly, PlanStep, SessionView, StrategyProfile, ToolPerformanceRecord } from './agent-types';
import { isToolBanned } from './memoryLedger';
import {
  ExecutionTimeoutError,
  RetryExhaustedError,
  ToolBannedError,
  ToolExecutionError,
  type ToolCallError,
} from './toolErrors';
import type { ToolRegistry } from './toolRegistry';

export interface SafeExecutorOptions {
  registry: ToolRegistry;
  /** Deadline for tools whose schema declares none. */
  defaultTimeoutMs: number;
  /** First retry waits this long; each further retry doubles it. */
  retryBaseDelayMs: number;
  sleep?: Sleep;
}

export type ToolCallOutcome =
  | {
      ok: true;
      toolName: string;
      text: string;
      payload: unknown;
      attempts: number;
      record: ToolPerformanceRecord;
    }
  | {
      ok: false;
      toolName: string;
      error: ToolCallError;
      attempts: number;
      record: ToolPerformanceRecord;
    };

/** Render a tool payload as the step's result text. */
export function renderToolOutput(payload: unknown): string {
  if (typeof payload === 'string') return payload;
  if (typeof payload === 'number' || typeof payload === 'boolean') return String(payload);
  if (payload !== null && typeof payload === 'object' && !Array.isArray(payload)) {
    if ('text' in payload && typeof payload.text === 'string') return payload.text;
    if (
      'result' in payload &&
      (typeof payload.result === 'string' || typeof payload.result === 'number' || typeof payload.result === 'boolean')
    ) {
      return String(payload.result);
    }
  }
  return JSON.stringify(payload) ?? '';
}

/**
 * Run one step's tool call behind the registry: ban check, lookup, input validation,
 * deadline-bounded invocation with retry, then output validation.
 *
 * Never throws for tool failures. Every attempt gets its own copy of the validated
 * arguments. Each call yields exactly one performance record, which the caller appends
 * to the session. Timeouts are cooperative: the tool receives an AbortSignal, and a tool
 * that ignores it keeps running after its deadline with its late result discarded.
 */
export class SafeExecutor {
  private readonly sleep: Sleep;

  constructor(private readonly options: SafeExecutorOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async execute(
    step: DeepReadonly<PlanStep>,
    session: SessionView,
    params: { profile: StrategyProfile; deadlineAt?: number },
  ): Promise<ToolCallOutcome> {
    const startedAt = Date.now();
    const toolName = step.toolName ?? '';
    const log = logger.child({ sessionId: session.sessionId, stepId: step.id, toolName });

    const fail = (error: ToolCallError, attempts: number): ToolCallOutcome => ({
      ok: false,
      toolName,
      error,
      attempts,
      record: {
        toolName,
        stepId: step.id,
        timestamp: new Date().toISOString(),
        latencyMs: Date.now() - startedAt,
        success: false,
        attempts,
        errorKind: error.kind,
      },
    });

    if (toolName && isToolBanned(session.memory, toolName)) {
      log.warn({ event: 'tool_banned' }, 'Refusing banned tool');
      return fail(new ToolBannedError(toolName), 0);
    }

    const lookup = this.options.registry.lookup(toolName);
    if (!lookup.ok) {
      log.warn({ event: 'tool_unknown' }, 'Step named an unregistered tool');
      return fail(lookup.error, 0);
    }
    const tool = lookup.value;

    const validation = this.options.registry.validateInput(toolName, step.toolArgs);
    if (!validation.ok) {
      log.warn({ event: 'tool_input_rejected', errorKind: validation.error.kind, err: validation.error }, 'Tool input rejected');
      return fail(validation.error, 0);
    }

    const timeoutMs = tool.schema.timeoutMs ?? this.options.defaultTimeoutMs;
    const maxRetries = Math.min(tool.schema.maxRetries ?? params.profile.maxRetriesPerStep, params.profile.maxRetriesPerStep);
    const attemptErrors: Array<ExecutionTimeoutError | ToolExecutionError> = [];
    let attempts = 0;

    for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
      const remainingMs = params.deadlineAt === undefined ? Infinity : params.deadlineAt - Date.now();
      if (remainingMs < 1) break;

      const attemptTimeoutMs = Math.floor(Math.min(timeoutMs, remainingMs));
      const attemptDeadline = Date.now() + attemptTimeoutMs;
      attempts = attempt;

      log.info({ event: 'tool_invocation_start', attempt, timeoutMs: attemptTimeoutMs }, 'Tool invocation started');
      const outcome = await runWithDeadline(
        (signal) =>
          tool.executor(structuredClone(validation.value), {
            sessionId: session.sessionId,
            stepId: step.id,
            attempt,
            signal,
            deadlineAt: attemptDeadline,
            session,
          }),
        attemptTimeoutMs,
      );

      if (outcome.status === 'fulfilled') {
        const output = this.options.registry.validateOutput(toolName, outcome.value);
        const record: ToolPerformanceRecord = {
          toolName,
          stepId: step.id,
          timestamp: new Date().toISOString(),
          latencyMs: Date.now() - startedAt,
          success: true,
          attempts,
        };
        if (!output.ok) {
          log.warn({ event: 'tool_output_rejected', err: output.error }, 'Tool output rejected');
          return { ok: false, toolName, error: output.error, attempts, record: { ...record, errorKind: output.error.kind } };
        }
        log.info({ event: 'tool_invocation_success', attempt, latencyMs: outcome.elapsedMs }, 'Tool invocation succeeded');
        return { ok: true, toolName, text: renderToolOutput(output.value), payload: output.value, attempts, record };
      }

      let error: ExecutionTimeoutError | ToolExecutionError;
      if (outcome.status === 'timed_out') {
        error = new ExecutionTimeoutError(toolName, attemptTimeoutMs);
        log.warn({ event: 'tool_invocation_timeout', attempt, timeoutMs: attemptTimeoutMs }, 'Tool invocation timed out');
      } else if (outcome.error instanceof ToolExecutionError) {
        error = outcome.error;
        log.warn({ event: 'tool_invocation_failed', attempt, err: error }, 'Tool invocation failed');
      } else {
        const message = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
        error = new ToolExecutionError(toolName, message, { cause: outcome.error });
        log.warn({ event: 'tool_invocation_failed', attempt, err: outcome.error }, 'Tool invocation failed');
      }
      attemptErrors.push(error);

      if (error.kind === 'tool_execution' && !error.retryable) {
        return fail(error, attempts);
      }

      if (attempt <= maxRetries) {
        const delayMs = backoffDelayMs(attempt, this.options.retryBaseDelayMs);
        if (params.deadlineAt !== undefined && Date.now() + delayMs >= params.deadlineAt) break;
        log.info({ event: 'tool_invocation_retry', attempt, delayMs }, 'Retrying tool invocation');
        await this.sleep(delayMs);
      }
    }

    const lastError = attemptErrors[attemptErrors.length - 1];
    if (!lastError) {
      // Overall deadline had already passed before the first attempt.
      const expired = new ExecutionTimeoutError(toolName, 0);
      return fail(new RetryExhaustedError(toolName, 0, expired, [expired]), 0);
    }
    log.warn({ event: 'tool_retry_exhausted', attempts, err: lastError }, 'Tool retries exhausted');
    return fail(new RetryExhaustedError(toolName, attempts, lastError, attemptErrors), attempts);
  }
}
