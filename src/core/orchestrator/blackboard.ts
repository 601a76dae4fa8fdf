import { randomUUID } from 'node:crypto';
import { AppError } from '../../shared/errors/app-error';
import type {
  HilEvent,
  HumanExchange,
  MemoryState,
  PerceptionSnapshot,
  PlanVersion,
  RetrievalBundle,
  SessionState,
  SessionView,
  StrategyProfile,
  ToolPerformanceRecord,
} from './agent-types';
import { createMemoryState } from './memoryLedger';
import { deepFreeze, failPlan } from './planModel';

function touch(state: SessionState): void {
  state.updatedAt = new Date().toISOString();
}

export function createSessionState(params: {
  userQuery: string;
  profile: StrategyProfile;
  sessionId?: string;
}): SessionState {
  const now = new Date().toISOString();
  return {
    sessionId: params.sessionId ?? randomUUID(),
    userQuery: params.userQuery,
    profile: params.profile,
    turn: 0,
    perceptionSnapshots: [],
    retrievalBundles: [],
    plans: [],
    memory: createMemoryState(),
    toolPerformance: [],
    hilEvents: [],
    humanExchanges: [],
    done: false,
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Copy the session into an independent, frozen view. Payloads stored on the session must
 * be structured-cloneable.
 */
export function createSessionView(state: SessionView): SessionView {
  const view = structuredClone(state);
  deepFreeze(view);
  return view;
}

/** Independent frozen copy of a plan, step or result handed to a collaborator. */
export function createFrozenCopy<T>(value: T): T {
  const copy = structuredClone(value);
  deepFreeze(copy);
  return copy;
}

export function activePlan(state: SessionState): PlanVersion | undefined {
  return state.plans[state.plans.length - 1];
}

export function latestSnapshot(state: SessionState): PerceptionSnapshot | undefined {
  return state.perceptionSnapshots[state.perceptionSnapshots.length - 1];
}

export function latestBundle(state: SessionState): RetrievalBundle | undefined {
  return state.retrievalBundles[state.retrievalBundles.length - 1];
}

export function appendPerceptionSnapshot(state: SessionState, snapshot: PerceptionSnapshot): void {
  deepFreeze(snapshot);
  state.perceptionSnapshots.push(snapshot);
  touch(state);
}

export function appendRetrievalBundle(state: SessionState, bundle: RetrievalBundle): void {
  deepFreeze(bundle);
  state.retrievalBundles.push(bundle);
  touch(state);
}

/**
 * Make `plan` the active version. A previous version still ACTIVE is retired as FAILED,
 * then frozen.
 *
 * @throws AppError INVALID_STATE_TRANSITION when the version does not increase.
 */
export function appendPlanVersion(state: SessionState, plan: PlanVersion): void {
  const previous = activePlan(state);
  if (previous && plan.version <= previous.version) {
    throw new AppError(
      'INVALID_STATE_TRANSITION',
      `Plan version ${plan.version} does not follow active version ${previous.version}`,
    );
  }
  if (previous) {
    if (previous.status === 'ACTIVE') failPlan(previous);
    deepFreeze(previous);
  }
  state.plans.push(plan);
  touch(state);
}

export function appendToolPerformance(state: SessionState, records: ReadonlyArray<ToolPerformanceRecord>): void {
  if (records.length === 0) return;
  for (const record of records) {
    state.toolPerformance.push(Object.freeze({ ...record }));
  }
  touch(state);
}

export function appendHilEvent(state: SessionState, event: HilEvent): void {
  state.hilEvents.push(Object.freeze({ ...event }));
  touch(state);
}

export function appendHumanExchange(state: SessionState, exchange: HumanExchange): void {
  state.humanExchanges.push(Object.freeze({ ...exchange }));
  touch(state);
}

export function replaceMemoryState(state: SessionState, memory: MemoryState): void {
  state.memory = memory;
  touch(state);
}

export function nextTurn(state: SessionState): number {
  state.turn += 1;
  touch(state);
  return state.turn;
}

export function markDone(state: SessionState, finalAnswer?: string): void {
  state.done = true;
  if (finalAnswer !== undefined) state.finalAnswer = finalAnswer;
  touch(state);
}
