import { beforeEach, describe, expect, it, vi } from 'vitest';
import { registerDefaultTools } from '../../../src/core/orchestrator/defaultTools';
import { SafeExecutor, renderToolOutput } from '../../../src/core/orchestrator/safeExecutor';
import { CONSERVATIVE_PROFILE } from '../../../src/core/orchestrator/strategyProfile';
import { ToolExecutionError } from '../../../src/core/orchestrator/toolErrors';
import { ToolRegistry } from '../../../src/core/orchestrator/toolRegistry';
import { buildSession, executeStep } from '../../helpers/fakes';

vi.mock('../../../src/shared/logging/logger', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() };
  log.child.mockReturnValue(log);
  return { logger: log, childLogger: () => log };
});

const profile = CONSERVATIVE_PROFILE;

function setup(
  executor: (args: Record<string, unknown>, ctx: { signal: AbortSignal }) => Promise<unknown>,
  options: { defaultTimeoutMs?: number } = {},
) {
  const registry = new ToolRegistry();
  registerDefaultTools(registry);
  const echo = vi.fn(executor);
  registry.register(
    {
      name: 'echo',
      description: 'Return the text it was given.',
      input: { text: { type: 'string', minLength: 1 } },
      output: { text: { type: 'string' } },
    },
    echo,
  );
  const sleep = vi.fn(async (_ms: number) => undefined);
  const safe = new SafeExecutor({ registry, defaultTimeoutMs: options.defaultTimeoutMs ?? 4_000, retryBaseDelayMs: 100, sleep });
  return { safe, echo, sleep };
}

describe('SafeExecutor', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('runs a valid call and records one successful attempt', async () => {
    const { safe } = setup(async (args) => ({ text: String(args.text) }));
    const step = executeStep('calculator', { expression: '2*(3+4)' });

    const outcome = await safe.execute(step, buildSession(), { profile });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.text).toBe('14');
    expect(outcome.payload).toEqual({ result: 14, expression: '2*(3+4)' });
    expect(outcome.record).toMatchObject({ toolName: 'calculator', stepId: step.id, success: true, attempts: 1 });
    expect(outcome.record.errorKind).toBeUndefined();
  });

  it('blocks dangerous arguments without invoking or retrying the tool', async () => {
    const { safe, echo, sleep } = setup(async () => ({ text: 'unreachable' }));

    const outcome = await safe.execute(executeStep('echo', { text: 'import os' }), buildSession(), { profile });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('dangerous_pattern');
    expect(outcome.attempts).toBe(0);
    expect(outcome.record).toMatchObject({ success: false, attempts: 0, errorKind: 'dangerous_pattern' });
    expect(echo).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
  });

  it('reports dangerous input before checking the tool schema', async () => {
    const { safe } = setup(async () => ({ text: 'unreachable' }));

    const outcome = await safe.execute(executeStep('calculator', { expression: 'import os' }), buildSession(), { profile });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('dangerous_pattern');
    expect(outcome.error.message).toBe(
      'Argument "expression" for tool "calculator" matches blocked pattern "import statement"',
    );
    expect(outcome.record).toMatchObject({ toolName: 'calculator', attempts: 0, errorKind: 'dangerous_pattern' });
  });

  it('returns UnknownToolError for unregistered tools', async () => {
    const { safe } = setup(async () => ({ text: 'x' }));

    const outcome = await safe.execute(executeStep('shell_exec', { command: 'ls' }), buildSession(), { profile });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('unknown_tool');
    expect(outcome.record).toMatchObject({ toolName: 'shell_exec', success: false, attempts: 0, errorKind: 'unknown_tool' });
  });

  it('refuses tools banned in session memory', async () => {
    const { safe, echo } = setup(async () => ({ text: 'x' }));
    const session = buildSession();
    session.memory.bannedTools.push('echo');

    const outcome = await safe.execute(executeStep('echo', { text: 'hello' }), session, { profile });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('tool_banned');
    expect(outcome.attempts).toBe(0);
    expect(echo).not.toHaveBeenCalled();
  });

  it('retries transient failures with strictly increasing backoff', async () => {
    const { safe, echo, sleep } = setup(async () => {
      throw new Error('temporarily unavailable');
    });

    const outcome = await safe.execute(executeStep('echo', { text: 'hello' }), buildSession(), { profile });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('retry_exhausted');
    if (outcome.error.kind !== 'retry_exhausted') return;
    expect(outcome.error.attempts).toBe(profile.maxRetriesPerStep + 1);
    expect(outcome.error.attemptErrors.map((error) => error.kind)).toEqual([
      'tool_execution',
      'tool_execution',
      'tool_execution',
    ]);
    expect(outcome.error.message).toBe('Tool "echo" failed after 3 attempts: temporarily unavailable');
    expect(echo).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    expect(outcome.record).toMatchObject({ success: false, attempts: 3, errorKind: 'retry_exhausted' });
  });

  it('hands every attempt a fresh copy of the step arguments', async () => {
    const seen: unknown[] = [];
    const { safe, echo } = setup(async (args) => {
      seen.push(args.text);
      args.text = 'rm -rf / ; import os';
      throw new Error('temporarily unavailable');
    });
    const step = executeStep('echo', { text: 'hello' });

    const outcome = await safe.execute(step, buildSession(), { profile });

    expect(outcome.ok).toBe(false);
    expect(echo).toHaveBeenCalledTimes(3);
    expect(seen).toEqual(['hello', 'hello', 'hello']);
    expect(step.toolArgs).toEqual({ text: 'hello' });
  });

  it('retries per-attempt timeouts with strictly increasing backoff', async () => {
    const { safe, echo, sleep } = setup(
      (_args, ctx) =>
        new Promise((_resolve, reject) => {
          ctx.signal.addEventListener('abort', () => reject(new Error('aborted')));
        }),
      { defaultTimeoutMs: 20 },
    );

    const outcome = await safe.execute(executeStep('echo', { text: 'hello' }), buildSession(), { profile });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('retry_exhausted');
    if (outcome.error.kind !== 'retry_exhausted') return;
    expect(outcome.error.attemptErrors.map((error) => error.kind)).toEqual([
      'execution_timeout',
      'execution_timeout',
      'execution_timeout',
    ]);
    expect(outcome.error.message).toBe('Tool "echo" failed after 3 attempts: Tool "echo" timed out after 20ms');
    expect(echo).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    expect(outcome.record).toMatchObject({ success: false, attempts: 3, errorKind: 'retry_exhausted' });
  });

  it('does not retry a tool error marked non-retryable', async () => {
    const { safe, sleep } = setup(async () => ({ text: 'x' }));

    const outcome = await safe.execute(executeStep('calculator', { expression: '1/0' }), buildSession(), { profile });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('tool_execution');
    expect(outcome.attempts).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('times out attempts at the overall deadline and aborts the tool signal', async () => {
    const signals: AbortSignal[] = [];
    const { safe } = setup(
      (_args, ctx) =>
        new Promise((_resolve, reject) => {
          signals.push(ctx.signal);
          ctx.signal.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );

    const outcome = await safe.execute(executeStep('echo', { text: 'hello' }), buildSession(), {
      profile,
      deadlineAt: Date.now() + 30,
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('retry_exhausted');
    if (outcome.error.kind !== 'retry_exhausted') return;
    expect(outcome.error.lastError.kind).toBe('execution_timeout');
    expect(signals.length).toBeGreaterThanOrEqual(1);
    expect(signals.every((signal) => signal.aborted)).toBe(true);
  });

  it('flags output that violates the declared constraints', async () => {
    const { safe } = setup(async () => ({ value: 1 }));

    const outcome = await safe.execute(executeStep('echo', { text: 'hello' }), buildSession(), { profile });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('output_validation');
    expect(outcome.record).toMatchObject({ success: true, attempts: 1, errorKind: 'output_validation' });
  });

  it('keeps ToolExecutionError instances thrown by tools', async () => {
    const { safe } = setup(async () => {
      throw new ToolExecutionError('echo', 'quota exceeded', { retryable: false });
    });

    const outcome = await safe.execute(executeStep('echo', { text: 'hello' }), buildSession(), { profile });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.message).toBe('quota exceeded');
  });
});

describe('renderToolOutput', () => {
  it.each([
    ['plain', 'plain'],
    [42, '42'],
    [{ text: 'from text' }, 'from text'],
    [{ result: 84, expression: '12*7' }, '84'],
    [{ rows: [1, 2] }, '{"rows":[1,2]}'],
  ])('renders %j as %s', (payload, expected) => {
    expect(renderToolOutput(payload)).toBe(expected);
  });
});
