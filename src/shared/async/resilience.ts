import { AppError } from '../errors/app-error';

function assertPositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${field} must be a positive integer`);
  }
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  assertPositiveInteger(timeoutMs, 'timeoutMs');

  let timeoutId: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new AppError('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`));
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}

/**
 * Delay before retry number `retry` (1-based): `baseDelayMs * 2^(retry - 1)`.
 */
export function backoffDelayMs(retry: number, baseDelayMs: number): number {
  assertPositiveInteger(retry, 'retry');
  assertPositiveInteger(baseDelayMs, 'baseDelayMs');
  return baseDelayMs * 2 ** (retry - 1);
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export type DeadlineOutcome<T> =
  | { status: 'fulfilled'; value: T; elapsedMs: number }
  | { status: 'rejected'; error: unknown; elapsedMs: number }
  | { status: 'timed_out'; elapsedMs: number };

/**
 * Run `task` under a hard deadline. The task receives an AbortSignal that fires when the
 * deadline passes; cancellation is cooperative, so a task that ignores the signal keeps
 * running and its late settlement is dropped.
 */
export async function runWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<DeadlineOutcome<T>> {
  assertPositiveInteger(timeoutMs, 'timeoutMs');

  const controller = new AbortController();
  const startedAt = Date.now();
  let timeoutId: NodeJS.Timeout | undefined;

  const settled = Promise.resolve()
    .then(() => task(controller.signal))
    .then(
      (value): DeadlineOutcome<T> => ({ status: 'fulfilled', value, elapsedMs: Date.now() - startedAt }),
      (error: unknown): DeadlineOutcome<T> => ({ status: 'rejected', error, elapsedMs: Date.now() - startedAt }),
    );

  const deadline = new Promise<DeadlineOutcome<T>>((resolve) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      resolve({ status: 'timed_out', elapsedMs: Date.now() - startedAt });
    }, timeoutMs);
  });

  try {
    return await Promise.race([settled, deadline]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}
