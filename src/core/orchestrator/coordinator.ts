import type { ZodType } from 'zod';
import { withTimeout } from '../../shared/async/resilience';
import { AppError } from '../../shared/errors/app-error';
import { childLogger } from '../../shared/logging/logger';
import {
  createAgentEventFactory,
  type AgentEvent,
  type AgentEventFactory,
  type AgentEventType,
  type CoordinatorPhase,
} from './agent-events';
import type {
  CriticReport,
  DeepReadonly,
  PlanStep,
  PlanVersion,
  SessionState,
  StepResult,
  StrategyProfile,
  ToolPerformanceRecord,
} from './agent-types';
import {
  activePlan,
  appendPerceptionSnapshot,
  appendPlanVersion,
  appendRetrievalBundle,
  appendToolPerformance,
  createFrozenCopy,
  createSessionState,
  createSessionView,
  latestBundle,
  latestSnapshot,
  markDone,
  nextTurn,
  replaceMemoryState,
} from './blackboard';
import type { Collaborators, HumanInputCallback } from './capabilities';
import {
  checkContract,
  checkQueryLength,
  criticReportSchema,
  memoryStateSchema,
  perceptionSnapshotSchema,
  planStepSchema,
  planVersionSchema,
  QUERY_LIMITS,
  RETRIEVAL_QUERY_LIMITS,
  retrievalBundleSchema,
} from './contracts';
import { HumanInLoop } from './humanInLoop';
import { mergeMemoryUpdate, recordToolOutcome } from './memoryLedger';
import type { ParallelStrategyExecutor, StrategyRunResult } from './parallelStrategy';
import {
  advancePlan,
  completePlan,
  failPlan,
  setStepResult,
  transitionStep,
  validatePlanShape,
} from './planModel';
import { persistToolPerformanceLog } from './toolPerformanceLog';
import {
  CollaboratorContractError,
  PlanFailureError,
  StepFailureError,
  toError,
} from './toolErrors';
import type { ToolRegistry } from './toolRegistry';

const DEFAULT_COLLABORATOR_TIMEOUT_MS = 30_000;

export interface CoordinatorOptions {
  registry: ToolRegistry;
  strategies: ParallelStrategyExecutor;
  collaborators: Collaborators;
  humanInput: HumanInputCallback;
  profile: StrategyProfile;
  /** Directory for the per-session tool performance log; unset disables persistence. */
  toolLogDir?: string;
  collaboratorTimeoutMs?: number;
  onEvent?: (event: AgentEvent) => void;
}

export interface CoordinatorOutcome {
  status: 'DONE' | 'FAILED';
  finalAnswer: string;
  session: SessionState;
  phases: CoordinatorPhase[];
  events: AgentEvent[];
  toolLogPath?: string;
  persistenceError?: AppError;
}

interface RunContext {
  session: SessionState;
  phases: CoordinatorPhase[];
  events: AgentEvent[];
  nextEvent: AgentEventFactory['nextEvent'];
  log: ReturnType<typeof childLogger>;
  stepsExecuted: number;
  failed: boolean;
  runningStep?: PlanStep;
}

interface Evaluation {
  accepted: boolean;
  issues: string[];
  critic?: CriticReport;
}

/** Final answer from the successful step results of a plan. */
export function composeFinalAnswer(plan: DeepReadonly<PlanVersion>): string {
  const results = plan.steps
    .filter((step) => step.kind === 'EXECUTE' && step.status === 'SUCCEEDED' && step.result)
    .map((step) => step.result?.text ?? '')
    .filter((text) => text.length > 0);

  if (results.length === 0) return 'Task completed but no results to summarize.';
  return results.join('\n');
}

/**
 * Drive one session through INIT, PLANNING and the SELECT_STEP / EXECUTE / EVALUATE loop
 * until the plan completes, a budget runs out or a human escalation ends it.
 *
 * The Coordinator is the only writer of session state. Collaborators and strategies get
 * frozen copies.
 */
export class Coordinator {
  private readonly hil: HumanInLoop;
  private readonly collaboratorTimeoutMs: number;

  constructor(private readonly options: CoordinatorOptions) {
    this.hil = new HumanInLoop(options.humanInput);
    this.collaboratorTimeoutMs = options.collaboratorTimeoutMs ?? DEFAULT_COLLABORATOR_TIMEOUT_MS;
  }

  get profile(): StrategyProfile {
    return this.options.profile;
  }

  /**
   * Run a session for `query`.
   *
   * @throws AppError INVALID_QUERY when the query length is out of bounds.
   */
  async run(query: string, params: { sessionId?: string } = {}): Promise<CoordinatorOutcome> {
    const queryIssue = checkQueryLength(query, QUERY_LIMITS);
    if (queryIssue) {
      throw new AppError('INVALID_QUERY', `Invalid query: ${queryIssue}`);
    }

    this.options.registry.freeze();
    const session = createSessionState({ userQuery: query.trim(), profile: this.profile, sessionId: params.sessionId });
    const factory = createAgentEventFactory(session.sessionId);
    const ctx: RunContext = {
      session,
      phases: [],
      events: [],
      nextEvent: factory.nextEvent,
      log: childLogger({ sessionId: session.sessionId, profile: this.profile.name }),
      stepsExecuted: 0,
      failed: false,
    };

    this.emit(ctx, 'session_started', { details: { profile: this.profile.name, mode: this.profile.mode } });

    try {
      this.enter(ctx, 'INIT');
      await this.initialize(ctx);

      this.enter(ctx, 'PLANNING');
      await this.planInitial(ctx);

      await this.loop(ctx);
    } catch (error) {
      await this.handleHardFailure(ctx, toError(error));
    }

    return this.finalize(ctx);
  }

  private async initialize(ctx: RunContext): Promise<void> {
    const { session } = ctx;
    const { perception, memory, retrieval } = this.options.collaborators;

    const snapshot = await this.invoke('perception.analyzeQuery', perceptionSnapshotSchema, () =>
      perception.analyzeQuery(session.userQuery, createSessionView(session)),
    );
    appendPerceptionSnapshot(session, snapshot);

    const attached = await this.invoke('memory.attachRelevantMemory', memoryStateSchema, () =>
      memory.attachRelevantMemory(createSessionView(session)),
    );
    replaceMemoryState(session, mergeMemoryUpdate(session.memory, attached));

    if (!snapshot.isGoalSatisfied && !checkQueryLength(session.userQuery, RETRIEVAL_QUERY_LIMITS)) {
      const bundle = await this.invoke('retrieval.retrieve', retrievalBundleSchema, () =>
        retrieval.retrieve(session.userQuery, createSessionView(session)),
      );
      appendRetrievalBundle(session, bundle);
    }
  }

  private async planInitial(ctx: RunContext): Promise<void> {
    const { session } = ctx;
    const snapshot = latestSnapshot(session);
    if (!snapshot) throw new PlanFailureError('No perception snapshot to plan from');

    const plan = await this.invoke('planner.planInitial', planVersionSchema, () =>
      this.options.collaborators.planner.planInitial(snapshot, createSessionView(session)),
    );
    this.checkPlan(plan, { version: 1, rewriteCount: 0 });
    appendPlanVersion(session, plan);
    this.emit(ctx, 'plan_created', { planVersion: plan.version, details: { steps: plan.steps.length } });
  }

  private async loop(ctx: RunContext): Promise<void> {
    const { session } = ctx;

    while (!session.done) {
      this.enter(ctx, 'SELECT_STEP');
      const plan = activePlan(session);
      if (!plan) throw new PlanFailureError('No active plan');

      const step = await this.selectStep(ctx, plan);
      if (!step) {
        completePlan(plan);
        markDone(session, composeFinalAnswer(plan));
        break;
      }

      ctx.stepsExecuted += 1;
      nextTurn(session);

      if (step.kind === 'ASK_USER') {
        await this.askUser(ctx, plan, step);
      } else if (step.kind === 'SUMMARIZE') {
        this.summarize(ctx, plan, step);
      } else {
        await this.executeStep(ctx, plan, step);
      }

      if (session.done) break;

      const current = activePlan(session);
      if (current?.status === 'COMPLETED') {
        markDone(session, composeFinalAnswer(current));
        break;
      }

      if (ctx.stepsExecuted >= this.profile.maxSteps) {
        await this.escalatePlanFailure(
          ctx,
          new PlanFailureError(`Reached maximum steps (${this.profile.maxSteps}) without completion`),
        );
        break;
      }
    }
  }

  private async selectStep(ctx: RunContext, plan: PlanVersion): Promise<PlanStep | undefined> {
    const chosen = await this.invoke('planner.decideNextStep', planStepSchema.nullable(), () =>
      this.options.collaborators.planner.decideNextStep(createFrozenCopy(plan), createSessionView(ctx.session)),
    );
    if (!chosen) return undefined;

    const step = plan.steps.find((candidate) => candidate.id === chosen.id);
    if (!step) {
      throw new CollaboratorContractError('planner.decideNextStep', [`step ${chosen.id} is not in plan v${plan.version}`]);
    }
    if (step.status !== 'PENDING' && step.status !== 'FAILED') {
      throw new CollaboratorContractError('planner.decideNextStep', [`step ${step.id} is ${step.status}`]);
    }
    return step;
  }

  private async askUser(ctx: RunContext, plan: PlanVersion, step: PlanStep): Promise<void> {
    const { session } = ctx;
    transitionStep(step, 'RUNNING', this.profile);
    ctx.runningStep = step;
    this.emit(ctx, 'step_started', { stepId: step.id, planVersion: plan.version, details: { kind: step.kind } });

    const exchange = await this.hil.ask(session, { kind: 'clarification', prompt: step.description, stepId: step.id });

    if (!checkQueryLength(exchange.response, QUERY_LIMITS)) {
      const snapshot = await this.invoke('perception.analyzeQuery', perceptionSnapshotSchema, () =>
        this.options.collaborators.perception.analyzeQuery(exchange.response, createSessionView(session)),
      );
      appendPerceptionSnapshot(session, snapshot);
    }

    setStepResult(step, { text: exchange.response, source: 'human', success: true });
    transitionStep(step, 'SUCCEEDED', this.profile);
    ctx.runningStep = undefined;
    advancePlan(plan);
    this.emit(ctx, 'step_completed', { stepId: step.id, planVersion: plan.version });
  }

  private summarize(ctx: RunContext, plan: PlanVersion, step: PlanStep): void {
    transitionStep(step, 'RUNNING', this.profile);
    const answer = composeFinalAnswer(plan);
    setStepResult(step, { text: answer, source: 'summary', success: true });
    transitionStep(step, 'SUCCEEDED', this.profile);
    completePlan(plan);
    markDone(ctx.session, answer);
    this.emit(ctx, 'step_completed', { stepId: step.id, planVersion: plan.version, details: { kind: step.kind } });
  }

  private async executeStep(ctx: RunContext, plan: PlanVersion, step: PlanStep): Promise<void> {
    const { session } = ctx;
    transitionStep(step, 'RUNNING', this.profile);
    ctx.runningStep = step;
    this.emit(ctx, 'step_started', {
      stepId: step.id,
      planVersion: plan.version,
      details: { kind: step.kind, toolName: step.toolName, attempt: step.retries + 1 },
    });

    this.enter(ctx, 'EXECUTE');
    const run = await this.options.strategies.run(createFrozenCopy(step), createSessionView(session), this.profile);
    appendToolPerformance(session, run.records);
    this.emit(ctx, 'strategy_completed', { stepId: step.id, details: { ok: run.ok, metrics: run.metrics } });

    this.enter(ctx, 'EVALUATE');
    const result: StepResult = run.ok
      ? { text: run.selected.text, payload: run.selected.payload, source: run.selected.strategy, success: true }
      : { text: run.error.message, source: 'tool', success: false };

    if (run.ok && run.selected.bundle) {
      appendRetrievalBundle(session, run.selected.bundle);
    }

    const evaluation = run.ok ? await this.evaluate(ctx, step, result) : await this.onExecutionFailure(ctx, step, run);

    await this.updateMemory(ctx, step, result, run.records, evaluation.accepted);

    if (evaluation.accepted) {
      this.enter(ctx, 'ADVANCE');
      setStepResult(step, result);
      transitionStep(step, 'SUCCEEDED', this.profile);
      ctx.runningStep = undefined;
      advancePlan(plan);
      this.emit(ctx, 'step_completed', { stepId: step.id, planVersion: plan.version, details: { source: result.source } });
      return;
    }

    const stepFailure = new StepFailureError(step.id, evaluation.issues);
    ctx.log.warn({ stepId: step.id, event: 'step_failed', err: stepFailure }, 'Step failed');

    if (plan.rewriteCount < this.profile.maxPlanRewrites) {
      this.enter(ctx, 'REWRITE');
      setStepResult(step, result);
      transitionStep(step, 'FAILED', this.profile);
      ctx.runningStep = undefined;
      this.emit(ctx, 'step_failed', { stepId: step.id, planVersion: plan.version, details: { issues: evaluation.issues } });
      await this.hil.escalate(session, {
        category: 'step_failure',
        reason: stepFailure.message,
        step,
        critic: evaluation.critic,
        error: stepFailure,
      });
      this.emit(ctx, 'hil_escalated', { stepId: step.id, details: { category: 'step_failure' } });
      await this.rewrite(ctx, plan, stepFailure.message);
      return;
    }

    setStepResult(step, result);
    await this.escalatePlanFailure(
      ctx,
      new PlanFailureError(
        `Plan failed after ${plan.rewriteCount} rewrites. Last error: ${stepFailure.message}`,
        stepFailure,
      ),
      evaluation.critic,
    );
  }

  private async evaluate(ctx: RunContext, step: PlanStep, result: StepResult): Promise<Evaluation> {
    const { session } = ctx;
    const { perception, critic } = this.options.collaborators;

    const snapshot = await this.invoke('perception.analyzeStepResult', perceptionSnapshotSchema, () =>
      perception.analyzeStepResult(createFrozenCopy(step), result.text, createSessionView(session)),
    );
    appendPerceptionSnapshot(session, snapshot);

    const report = await this.invoke('critic.reviewResult', criticReportSchema, () =>
      critic.reviewResult(
        createFrozenCopy({ ...step, result }),
        snapshot,
        latestBundle(session),
        createSessionView(session),
      ),
    );

    if (!report.requiresHumanInput) {
      return { accepted: report.isAcceptable, issues: report.issues, critic: report };
    }

    const exchange = await this.hil.ask(session, {
      kind: 'review',
      prompt: report.humanQuestion ?? `Accept this result for "${step.description}"?\n${result.text}`,
      stepId: step.id,
    });
    const approved = exchange.approved === true;
    return {
      accepted: approved,
      issues: approved ? report.issues : [...report.issues, `Reviewer declined: ${exchange.response}`],
      critic: report,
    };
  }

  private async onExecutionFailure(
    ctx: RunContext,
    step: PlanStep,
    run: Extract<StrategyRunResult, { ok: false }>,
  ): Promise<Evaluation> {
    const { error } = run;
    if (error.kind === 'retry_exhausted' || error.kind === 'all_strategies_failed') {
      const event = await this.hil.escalate(ctx.session, {
        category: 'tool_failure',
        reason: error.message,
        step,
        error,
      });
      if (event.response) step.notes.push(`Human guidance: ${event.response}`);
      this.emit(ctx, 'hil_escalated', { stepId: step.id, details: { category: 'tool_failure' } });
    }
    return { accepted: false, issues: [error.message] };
  }

  private async updateMemory(
    ctx: RunContext,
    step: PlanStep,
    result: StepResult,
    records: ReadonlyArray<ToolPerformanceRecord>,
    accepted: boolean,
  ): Promise<void> {
    const { session } = ctx;
    const updated = await this.invoke('memory.updateFromStep', memoryStateSchema, () =>
      this.options.collaborators.memory.updateFromStep(
        createFrozenCopy(step),
        createFrozenCopy(result),
        createSessionView(session),
      ),
    );
    const memory = mergeMemoryUpdate(session.memory, updated);

    const toolRecord = records.find((record) => record.toolName === step.toolName);
    if (toolRecord && toolRecord.errorKind !== 'tool_banned') {
      const success = toolRecord.success && toolRecord.errorKind === undefined && accepted;
      const { newlyBanned } = recordToolOutcome(memory, toolRecord.toolName, success);
      if (newlyBanned) {
        ctx.log.warn({ stepId: step.id, toolName: toolRecord.toolName, event: 'tool_banned' }, 'Tool banned after consecutive failures');
        this.emit(ctx, 'tool_banned', { stepId: step.id, details: { toolName: toolRecord.toolName } });
      }
    }

    replaceMemoryState(session, memory);
  }

  private async rewrite(ctx: RunContext, plan: PlanVersion, reason: string): Promise<void> {
    const next = await this.invoke('planner.rewritePlan', planVersionSchema, () =>
      this.options.collaborators.planner.rewritePlan(createFrozenCopy(plan), reason, createSessionView(ctx.session)),
    );
    this.checkPlan(next, { version: plan.version + 1, rewriteCount: plan.rewriteCount + 1 });
    appendPlanVersion(ctx.session, next);
    this.emit(ctx, 'plan_rewritten', {
      planVersion: next.version,
      details: { parentVersion: plan.version, rewriteCount: next.rewriteCount, reason },
    });
  }

  private async escalatePlanFailure(ctx: RunContext, failure: PlanFailureError, critic?: CriticReport): Promise<void> {
    const { session } = ctx;
    this.enter(ctx, 'ESCALATE');

    const step = ctx.runningStep;
    if (step && step.status === 'RUNNING') {
      transitionStep(step, 'ESCALATED', this.profile);
    }
    ctx.runningStep = undefined;

    const plan = activePlan(session);
    if (plan && plan.status === 'ACTIVE') failPlan(plan);

    ctx.failed = true;
    ctx.log.error({ event: 'plan_failure', err: failure }, 'Plan failed; escalating');
    await this.hil.escalate(session, { category: 'plan_failure', reason: failure.message, step, critic, error: failure });
    this.emit(ctx, 'hil_escalated', { stepId: step?.id, details: { category: 'plan_failure' } });
  }

  private async handleHardFailure(ctx: RunContext, error: Error): Promise<void> {
    const failure = error instanceof PlanFailureError ? error : new PlanFailureError(`Hard failure: ${error.message}`, error);
    ctx.log.error({ event: 'hard_failure', err: error }, 'Coordinator hit a hard failure');
    if (ctx.session.done) return;
    await this.escalatePlanFailure(ctx, failure);
  }

  private async finalize(ctx: RunContext): Promise<CoordinatorOutcome> {
    const { session } = ctx;
    const status = ctx.failed ? 'FAILED' : 'DONE';
    if (!session.done) markDone(session);
    this.enter(ctx, status);

    let toolLogPath: string | undefined;
    let persistenceError: AppError | undefined;
    if (this.options.toolLogDir) {
      try {
        toolLogPath = await persistToolPerformanceLog(this.options.toolLogDir, session.sessionId, session.toolPerformance);
      } catch (error) {
        persistenceError = new AppError('PERSISTENCE_FAILED', 'Could not write tool performance log', error);
        ctx.log.error({ event: 'tool_log_persist_failed', err: error }, 'Could not write tool performance log');
      }
    }

    this.emit(ctx, status === 'DONE' ? 'session_completed' : 'session_failed', {
      details: { steps: ctx.stepsExecuted, hilEvents: session.hilEvents.length },
    });
    ctx.log.info({ event: 'session_finished', status, steps: ctx.stepsExecuted }, 'Session finished');

    return {
      status,
      finalAnswer: session.finalAnswer ?? '',
      session,
      phases: ctx.phases,
      events: ctx.events,
      toolLogPath,
      persistenceError,
    };
  }

  private checkPlan(plan: PlanVersion, expected: { version: number; rewriteCount: number }): void {
    const issues = validatePlanShape(plan, this.profile, expected);
    if (issues.length > 0) throw new CollaboratorContractError('planner', issues);
  }

  private async invoke<T>(name: string, schema: ZodType<T>, call: () => Promise<unknown>): Promise<T> {
    const value = await withTimeout(call(), this.collaboratorTimeoutMs, name);
    const checked = checkContract(schema, value, name);
    if (!checked.ok) throw checked.error;
    return checked.value;
  }

  private enter(ctx: RunContext, phase: CoordinatorPhase): void {
    ctx.phases.push(phase);
    this.emit(ctx, 'phase_entered', { phase });
  }

  private emit(
    ctx: RunContext,
    type: AgentEventType,
    params: Omit<AgentEvent, 'id' | 'sessionId' | 'timestamp' | 'type'> = {},
  ): void {
    const event = ctx.nextEvent({ type, ...params });
    ctx.events.push(event);
    ctx.log.debug({ event: type, phase: event.phase, stepId: event.stepId }, 'Coordinator event');
    this.options.onEvent?.(event);
  }
}
