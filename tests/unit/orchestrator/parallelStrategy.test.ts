import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { RetrievalCapability, SearchCapability } from '../../../src/core/orchestrator/capabilities';
import { registerDefaultTools } from '../../../src/core/orchestrator/defaultTools';
import {
  ParallelStrategyExecutor,
  createRetrievalStrategy,
  createSearchStrategy,
  createToolStrategy,
  strategyQuery,
} from '../../../src/core/orchestrator/parallelStrategy';
import { SafeExecutor } from '../../../src/core/orchestrator/safeExecutor';
import {
  CONSERVATIVE_PROFILE,
  EXPLORATORY_PROFILE,
  FALLBACK_PROFILE,
  defineStrategyProfile,
} from '../../../src/core/orchestrator/strategyProfile';
import { ToolRegistry } from '../../../src/core/orchestrator/toolRegistry';
import { buildSession, executeStep, fakeRetrieval } from '../../helpers/fakes';

vi.mock('../../../src/shared/logging/logger', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() };
  log.child.mockReturnValue(log);
  return { logger: log, childLogger: () => log };
});

const answerBundle = {
  items: [{ id: 'doc-1', source: 'notes', content: 'The answer is 42', relevance: 0.9 }],
};

function buildExecutor(retrieval: RetrievalCapability, search?: SearchCapability) {
  const registry = new ToolRegistry();
  registerDefaultTools(registry);
  registry.register(
    {
      name: 'slow_lookup',
      description: 'Never answers before its deadline.',
      input: { query: { type: 'string' } },
      output: {},
    },
    (_args, ctx) =>
      new Promise((_resolve, reject) => {
        ctx.signal.addEventListener('abort', () => reject(new Error('aborted')));
      }),
  );
  const safe = new SafeExecutor({ registry, defaultTimeoutMs: 4_000, retryBaseDelayMs: 1, sleep: async () => undefined });
  const strategies = [createToolStrategy(safe), createRetrievalStrategy(retrieval)];
  if (search) strategies.push(createSearchStrategy(search));
  return new ParallelStrategyExecutor(strategies);
}

describe('ParallelStrategyExecutor', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('orders strategies by priority and rejects duplicates', () => {
    const retrieval = fakeRetrieval();
    const executor = new ParallelStrategyExecutor([
      createRetrievalStrategy(retrieval),
      createToolStrategy(new SafeExecutor({ registry: new ToolRegistry(), defaultTimeoutMs: 1_000, retryBaseDelayMs: 1 })),
    ]);
    expect(executor.listStrategies()).toEqual(['tool', 'retrieval']);
    expect(() => new ParallelStrategyExecutor([createRetrievalStrategy(retrieval), createRetrievalStrategy(retrieval)])).toThrow(
      'Strategy names must be unique',
    );
  });

  it('prefers the tool result when several strategies succeed', async () => {
    const retrieval = fakeRetrieval(answerBundle);
    const executor = buildExecutor(retrieval);

    const result = await executor.run(executeStep('calculator', { expression: '12*7' }), buildSession(), EXPLORATORY_PROFILE);

    expect(retrieval.retrieve).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.selected.strategy).toBe('tool');
    expect(result.selected.text).toBe('84');
    expect(result.metrics.map((metric) => [metric.strategy, metric.success])).toEqual([
      ['tool', true],
      ['retrieval', true],
    ]);
  });

  it('falls back to retrieval when the tool times out', async () => {
    const retrieval = fakeRetrieval(answerBundle);
    const executor = buildExecutor(retrieval);
    const profile = defineStrategyProfile({ ...EXPLORATORY_PROFILE, name: 'fast', strategyTimeoutMs: 40 });

    const result = await executor.run(executeStep('slow_lookup', { query: 'what is the answer' }), buildSession(), profile);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.selected.strategy).toBe('retrieval');
    expect(result.selected.text).toBe('The answer is 42');
    expect(result.selected.bundle?.items).toHaveLength(1);
    expect(result.metrics[0]).toMatchObject({ strategy: 'tool', success: false, errorKind: 'retry_exhausted' });
    expect(result.records).toHaveLength(1);
    expect(result.records[0]).toMatchObject({ toolName: 'slow_lookup', success: false, errorKind: 'retry_exhausted' });
  });

  it('stops at the first success in fallback mode', async () => {
    const retrieval = fakeRetrieval(answerBundle);
    const executor = buildExecutor(retrieval);

    const result = await executor.run(executeStep('calculator', { expression: '1+1' }), buildSession(), FALLBACK_PROFILE);

    expect(result.ok).toBe(true);
    expect(retrieval.retrieve).not.toHaveBeenCalled();
  });

  it('runs only the tool in conservative mode and surfaces its error', async () => {
    const retrieval = fakeRetrieval(answerBundle);
    const executor = buildExecutor(retrieval);

    const result = await executor.run(executeStep('shell_exec', { command: 'ls' }), buildSession(), CONSERVATIVE_PROFILE);

    expect(retrieval.retrieve).not.toHaveBeenCalled();
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('unknown_tool');
    expect(result.metrics).toHaveLength(1);
  });

  it('aggregates failures when every strategy fails', async () => {
    const search: SearchCapability = { search: vi.fn(async (query: string) => ({ query, hits: [] })) };
    const executor = buildExecutor(fakeRetrieval(), search);

    const step = executeStep('shell_exec', { command: 'ls' }, 'List the files here');
    const result = await executor.run(step, buildSession(), FALLBACK_PROFILE);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('all_strategies_failed');
    if (result.error.kind !== 'all_strategies_failed') return;
    expect(result.error.failures.map((failure) => failure.strategy)).toEqual(['tool', 'retrieval', 'search']);
    expect(result.error.failures[1]?.error.message).toBe('No retrieved items for "List the files here"');
    expect(result.error.failures[2]?.error.message).toBe('No search hits for "List the files here"');
  });

  it('uses the first search hit as the result text', async () => {
    const search: SearchCapability = {
      search: vi.fn(async (query: string) => ({
        query,
        hits: [{ title: 'Leap years', snippet: 'Divisible by 4', source: 'kb' }],
      })),
    };
    const executor = buildExecutor(fakeRetrieval(), search);

    const result = await executor.run(executeStep('shell_exec', { query: 'leap year rule' }), buildSession(), FALLBACK_PROFILE);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.selected).toMatchObject({ strategy: 'search', text: 'Leap years: Divisible by 4' });
    expect(search.search).toHaveBeenCalledWith('leap year rule', expect.anything());
  });
});

describe('strategyQuery', () => {
  it('prefers an explicit query argument over the description', () => {
    expect(strategyQuery(executeStep('knowledge_lookup', { query: ' moon distance ' }, 'Look up: the moon'))).toBe('moon distance');
    expect(strategyQuery(executeStep('calculator', { expression: '1+1' }, 'Evaluate 1+1'))).toBe('Evaluate 1+1');
  });
});
