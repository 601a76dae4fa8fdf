import { describe, expect, it } from 'vitest';
import { backoffDelayMs, runWithDeadline, withTimeout } from '../../../src/shared/async/resilience';

describe('resilience utilities', () => {
  it('withTimeout resolves when operation completes in time', async () => {
    const result = await withTimeout(Promise.resolve('ok'), 50, 'test op');
    expect(result).toBe('ok');
  });

  it('withTimeout rejects with TIMEOUT when operation exceeds deadline', async () => {
    await expect(withTimeout(new Promise(() => {}), 5, 'slow op')).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'slow op timed out after 5ms',
    });
  });

  it('withTimeout validates timeoutMs', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 0, 'invalid')).rejects.toThrow(
      'timeoutMs must be a positive integer',
    );
    await expect(withTimeout(Promise.resolve('ok'), Number.NaN, 'invalid')).rejects.toThrow(RangeError);
  });

  it('backoffDelayMs doubles the base delay for each retry', () => {
    expect([1, 2, 3, 4].map((retry) => backoffDelayMs(retry, 50))).toEqual([50, 100, 200, 400]);
  });

  it('backoffDelayMs rejects a zero retry index', () => {
    expect(() => backoffDelayMs(0, 50)).toThrow('retry must be a positive integer');
  });

  it('runWithDeadline reports fulfilled tasks', async () => {
    const outcome = await runWithDeadline(async () => 42, 50);
    expect(outcome).toMatchObject({ status: 'fulfilled', value: 42 });
  });

  it('runWithDeadline reports rejections, including synchronous throws', async () => {
    const failure = new Error('boom');
    const outcome = await runWithDeadline(() => {
      throw failure;
    }, 50);
    expect(outcome).toMatchObject({ status: 'rejected', error: failure });
  });

  it('runWithDeadline times out and aborts the signal', async () => {
    let captured: AbortSignal | undefined;
    const outcome = await runWithDeadline((signal) => {
      captured = signal;
      return new Promise<never>(() => {});
    }, 5);

    expect(outcome.status).toBe('timed_out');
    expect(captured?.aborted).toBe(true);
  });
});
