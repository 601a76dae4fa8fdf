import { runWithDeadline } from '../../shared/async/resilience';
import { logger } from '../../shared/logging/logger';
import type {
  DeepReadonly,
  PlanStep,
  RetrievalBundle,
  SessionView,
  StrategyMode,
  StrategyName,
  StrategyProfile,
  ToolPerformanceRecord,
} from './agent-types';
import { createSessionView } from './blackboard';
import type { RetrievalCapability, SearchCapability } from './capabilities';
import { checkContract, checkQueryLength, RETRIEVAL_QUERY_LIMITS, retrievalBundleSchema, searchResultSchema } from './contracts';
import type { SafeExecutor } from './safeExecutor';
import {
  AllStrategiesFailedError,
  OrchestratorError,
  toError,
  type StrategyRunError,
  type ToolCallError,
} from './toolErrors';

/** Lower runs first and wins ties. */
export const STRATEGY_PRIORITY: Record<StrategyName, number> = {
  tool: 0,
  retrieval: 1,
  search: 2,
};

export const MAX_STRATEGIES = 3;

export interface StrategyContext {
  step: DeepReadonly<PlanStep>;
  session: SessionView;
  profile: StrategyProfile;
  deadlineAt: number;
  signal: AbortSignal;
}

export type StrategyAttempt =
  | { ok: true; text: string; payload?: unknown; bundle?: RetrievalBundle; records: ToolPerformanceRecord[] }
  | { ok: false; error: Error; records: ToolPerformanceRecord[] };

export interface ExecutionStrategy {
  name: StrategyName;
  /** When set, the strategy honours `deadlineAt` itself and is not wrapped in another deadline. */
  enforcesOwnDeadline?: boolean;
  run(ctx: StrategyContext): Promise<StrategyAttempt>;
}

export interface StrategyMetric {
  strategy: StrategyName;
  latencyMs: number;
  success: boolean;
  errorKind?: string;
  errorMessage?: string;
}

export interface SelectedResult {
  strategy: StrategyName;
  text: string;
  payload?: unknown;
  bundle?: RetrievalBundle;
  latencyMs: number;
}

export type StrategyRunResult =
  | { ok: true; selected: SelectedResult; metrics: StrategyMetric[]; records: ToolPerformanceRecord[] }
  | { ok: false; error: StrategyRunError; metrics: StrategyMetric[]; records: ToolPerformanceRecord[] };

interface CompletedAttempt {
  strategy: StrategyName;
  latencyMs: number;
  attempt: StrategyAttempt;
}

const TOOL_CALL_ERROR_KINDS = new Set<string>([
  'unknown_tool',
  'schema_validation',
  'dangerous_pattern',
  'tool_banned',
  'execution_timeout',
  'tool_execution',
  'retry_exhausted',
  'output_validation',
]);

function isToolCallError(error: Error): error is ToolCallError {
  return error instanceof OrchestratorError && TOOL_CALL_ERROR_KINDS.has(error.kind);
}

/** Query a non-tool strategy uses: an explicit `query` argument, else the step description. */
export function strategyQuery(step: DeepReadonly<PlanStep>): string {
  const query = step.toolArgs.query;
  return typeof query === 'string' && query.trim().length > 0 ? query.trim() : step.description;
}

export function createToolStrategy(executor: SafeExecutor): ExecutionStrategy {
  return {
    name: 'tool',
    enforcesOwnDeadline: true,
    async run(ctx) {
      const outcome = await executor.execute(ctx.step, ctx.session, { profile: ctx.profile, deadlineAt: ctx.deadlineAt });
      if (!outcome.ok) return { ok: false, error: outcome.error, records: [outcome.record] };
      return { ok: true, text: outcome.text, payload: outcome.payload, records: [outcome.record] };
    },
  };
}

export function createRetrievalStrategy(retrieval: RetrievalCapability): ExecutionStrategy {
  return {
    name: 'retrieval',
    async run(ctx) {
      const query = strategyQuery(ctx.step);
      const lengthIssue = checkQueryLength(query, RETRIEVAL_QUERY_LIMITS);
      if (lengthIssue) return { ok: false, error: new Error(`Retrieval skipped: ${lengthIssue}`), records: [] };

      const checked = checkContract(retrievalBundleSchema, await retrieval.retrieve(query, ctx.session), 'retrieval.retrieve');
      if (!checked.ok) return { ok: false, error: checked.error, records: [] };

      const bundle = checked.value;
      if (bundle.items.length === 0) {
        return { ok: false, error: new Error(`No retrieved items for "${query}"`), records: [] };
      }
      const best = [...bundle.items].sort((a, b) => b.relevance - a.relevance)[0];
      const text = bundle.summary ?? best?.content ?? '';
      return { ok: true, text, payload: bundle, bundle, records: [] };
    },
  };
}

export function createSearchStrategy(search: SearchCapability): ExecutionStrategy {
  return {
    name: 'search',
    async run(ctx) {
      const query = strategyQuery(ctx.step);
      const checked = checkContract(searchResultSchema, await search.search(query, ctx.session), 'search.search');
      if (!checked.ok) return { ok: false, error: checked.error, records: [] };

      const [first] = checked.value.hits;
      if (!first) return { ok: false, error: new Error(`No search hits for "${query}"`), records: [] };
      return { ok: true, text: `${first.title}: ${first.snippet}`, payload: checked.value, records: [] };
    },
  };
}

/**
 * Produce a step result from one or more strategies according to the profile's mode.
 *
 * CONSERVATIVE runs the tool strategy alone. FALLBACK runs strategies one at a time in
 * priority order and stops at the first success. EXPLORATORY starts every strategy at
 * once, each under its own deadline, waits for all of them, then picks the successful
 * result with the best priority (lower latency breaks ties).
 */
export class ParallelStrategyExecutor {
  private readonly strategies: ExecutionStrategy[];

  constructor(strategies: ExecutionStrategy[]) {
    const names = new Set(strategies.map((strategy) => strategy.name));
    if (names.size !== strategies.length) {
      throw new RangeError('Strategy names must be unique');
    }
    if (strategies.length === 0 || strategies.length > MAX_STRATEGIES) {
      throw new RangeError(`Between 1 and ${MAX_STRATEGIES} strategies are required`);
    }
    this.strategies = [...strategies].sort((a, b) => STRATEGY_PRIORITY[a.name] - STRATEGY_PRIORITY[b.name]);
  }

  listStrategies(): StrategyName[] {
    return this.strategies.map((strategy) => strategy.name);
  }

  async run(
    step: DeepReadonly<PlanStep>,
    session: SessionView,
    profile: StrategyProfile,
    mode: StrategyMode = profile.mode,
  ): Promise<StrategyRunResult> {
    const completed: CompletedAttempt[] = [];

    if (mode === 'EXPLORATORY') {
      completed.push(...(await Promise.all(this.strategies.map((strategy) => this.runOne(strategy, step, session, profile)))));
    } else {
      const candidates =
        mode === 'CONSERVATIVE' ? this.strategies.filter((strategy) => strategy.name === 'tool') : this.strategies;
      for (const strategy of candidates) {
        const result = await this.runOne(strategy, step, session, profile);
        completed.push(result);
        if (result.attempt.ok) break;
      }
    }

    const metrics = completed.map(toMetric);
    const records = completed.flatMap((entry) => entry.attempt.records);

    const winner = completed
      .filter((entry) => entry.attempt.ok)
      .sort((a, b) => STRATEGY_PRIORITY[a.strategy] - STRATEGY_PRIORITY[b.strategy] || a.latencyMs - b.latencyMs)[0];

    if (winner && winner.attempt.ok) {
      logger.info(
        { sessionId: session.sessionId, stepId: step.id, event: 'strategy_selected', strategy: winner.strategy, mode },
        'Strategy result selected',
      );
      return {
        ok: true,
        selected: {
          strategy: winner.strategy,
          text: winner.attempt.text,
          payload: winner.attempt.payload,
          bundle: winner.attempt.bundle,
          latencyMs: winner.latencyMs,
        },
        metrics,
        records,
      };
    }

    const failures = completed.flatMap((entry) =>
      entry.attempt.ok ? [] : [{ strategy: entry.strategy, error: entry.attempt.error }],
    );
    const only = failures.length === 1 ? failures[0] : undefined;
    const error: StrategyRunError =
      only && only.strategy === 'tool' && isToolCallError(only.error) && mode === 'CONSERVATIVE'
        ? only.error
        : new AllStrategiesFailedError(step.id, failures);

    logger.warn(
      { sessionId: session.sessionId, stepId: step.id, event: 'strategies_failed', mode, errorKind: error.kind },
      'No strategy produced a result',
    );
    return { ok: false, error, metrics, records };
  }

  private async runOne(
    strategy: ExecutionStrategy,
    step: DeepReadonly<PlanStep>,
    session: SessionView,
    profile: StrategyProfile,
  ): Promise<CompletedAttempt> {
    const startedAt = Date.now();
    const timeoutMs = profile.strategyTimeoutMs;
    const deadlineAt = startedAt + timeoutMs;
    const view = createSessionView(session);

    if (strategy.enforcesOwnDeadline) {
      let attempt: StrategyAttempt;
      try {
        attempt = await strategy.run({ step, session: view, profile, deadlineAt, signal: new AbortController().signal });
      } catch (error) {
        attempt = { ok: false, error: toError(error), records: [] };
      }
      return { strategy: strategy.name, latencyMs: Date.now() - startedAt, attempt };
    }

    const outcome = await runWithDeadline(
      (signal) => strategy.run({ step, session: view, profile, deadlineAt, signal }),
      timeoutMs,
    );
    const latencyMs = Date.now() - startedAt;

    switch (outcome.status) {
      case 'fulfilled':
        return { strategy: strategy.name, latencyMs, attempt: outcome.value };
      case 'rejected':
        return { strategy: strategy.name, latencyMs, attempt: { ok: false, error: toError(outcome.error), records: [] } };
      case 'timed_out':
        return {
          strategy: strategy.name,
          latencyMs,
          attempt: { ok: false, error: new Error(`Strategy "${strategy.name}" timed out after ${timeoutMs}ms`), records: [] },
        };
    }
  }
}

function toMetric(entry: CompletedAttempt): StrategyMetric {
  if (entry.attempt.ok) {
    return { strategy: entry.strategy, latencyMs: entry.latencyMs, success: true };
  }
  const { error } = entry.attempt;
  return {
    strategy: entry.strategy,
    latencyMs: entry.latencyMs,
    success: false,
    errorKind: error instanceof OrchestratorError ? error.kind : error.name,
    errorMessage: error.message,
  };
}
