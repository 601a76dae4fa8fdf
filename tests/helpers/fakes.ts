import { vi } from 'vitest';
import type {
  CriticReport,
  DeepReadonly,
  MemoryState,
  PerceptionSnapshot,
  PlanStep,
  PlanVersion,
  RetrievalBundle,
  SessionView,
  StrategyProfile,
} from '../../src/core/orchestrator/agent-types';
import { createSessionState } from '../../src/core/orchestrator/blackboard';
import type {
  Collaborators,
  CriticCapability,
  MemoryCapability,
  PerceptionCapability,
  PlanningCapability,
  RetrievalCapability,
} from '../../src/core/orchestrator/capabilities';
import {
  createPlanStep,
  createPlanVersion,
  deriveRewrittenPlan,
  type PlanStepInput,
} from '../../src/core/orchestrator/planModel';
import { CONSERVATIVE_PROFILE } from '../../src/core/orchestrator/strategyProfile';

export const SUMMARIZE: PlanStepInput = { kind: 'SUMMARIZE', description: 'Summarize the results' };

export function buildSession(params: { userQuery?: string; profile?: StrategyProfile } = {}) {
  return createSessionState({
    userQuery: params.userQuery ?? 'Calculate 12*7',
    profile: params.profile ?? CONSERVATIVE_PROFILE,
    sessionId: 'session-test',
  });
}

export function executeStep(toolName: string, toolArgs: Record<string, unknown>, description = `Run ${toolName}`): PlanStep {
  return createPlanStep({ kind: 'EXECUTE', description, toolName, toolArgs }, 0);
}

export function copyMemory(memory: DeepReadonly<MemoryState>): MemoryState {
  return {
    shortTerm: memory.shortTerm.map((item) => ({ ...item })),
    bannedTools: [...memory.bannedTools],
    successfulTools: { ...memory.successfulTools },
    failureStreaks: { ...memory.failureStreaks },
    notes: memory.notes,
  };
}

function snapshot(text: string, session: SessionView, source: PerceptionSnapshot['source']): PerceptionSnapshot {
  return {
    id: `snapshot-${session.perceptionSnapshots.length + 1}`,
    turn: session.turn,
    source,
    inputText: text,
    entities: [],
    subGoals: [text],
    constraints: [],
    uncertainties: [],
    isGoalSatisfied: false,
    confidence: 0.5,
  };
}

export function fakePerception(): PerceptionCapability {
  return {
    analyzeQuery: vi.fn(async (text: string, session: SessionView) => snapshot(text, session, 'user_query')),
    analyzeStepResult: vi.fn(async (_step: DeepReadonly<PlanStep>, raw: string, session: SessionView) =>
      snapshot(raw, session, 'step_result'),
    ),
  };
}

export function fakeRetrieval(bundle?: Partial<RetrievalBundle>): RetrievalCapability {
  return {
    retrieve: vi.fn(async (query: string) => ({ query, items: [], openQuestions: [], ...bundle })),
  };
}

export function fakeMemory(): MemoryCapability {
  return {
    attachRelevantMemory: vi.fn(async (session: SessionView) => copyMemory(session.memory)),
    updateFromStep: vi.fn(async (_step: DeepReadonly<PlanStep>, _result: unknown, session: SessionView) =>
      copyMemory(session.memory),
    ),
  };
}

/** Accepts every successful, non-empty result. */
export function fakeCritic(overrides: Partial<CriticReport> = {}): CriticCapability {
  return {
    reviewResult: vi.fn(async (step: DeepReadonly<PlanStep>) => {
      const acceptable = step.result?.success === true && step.result.text.length > 0;
      return {
        qualityScore: acceptable ? 0.9 : 0.1,
        isAcceptable: acceptable,
        issues: acceptable ? [] : ['empty result'],
        hallucinationRisk: 0,
        safetyFlags: [],
        requiresHumanInput: false,
        ...overrides,
      };
    }),
  };
}

/**
 * Planner that returns fixed steps: `initial` for the first plan and `rewrite` (default:
 * a lone SUMMARIZE) for every rewrite.
 */
export function scriptedPlanner(initial: PlanStepInput[], rewrite: PlanStepInput[] = [SUMMARIZE]): PlanningCapability {
  return {
    planInitial: vi.fn(async () => createPlanVersion({ steps: initial, reason: 'scripted plan' })),
    decideNextStep: vi.fn(async (plan: DeepReadonly<PlanVersion>) => {
      const step = plan.steps[plan.currentIndex];
      if (!step || (step.status !== 'PENDING' && step.status !== 'FAILED')) return null;
      return step;
    }),
    rewritePlan: vi.fn(async (plan: DeepReadonly<PlanVersion>, reason: string) =>
      deriveRewrittenPlan(plan, { reason, remaining: rewrite }),
    ),
  };
}

export function fakeCollaborators(overrides: Partial<Collaborators> & Pick<Collaborators, 'planner'>): Collaborators {
  return {
    perception: fakePerception(),
    retrieval: fakeRetrieval(),
    memory: fakeMemory(),
    critic: fakeCritic(),
    ...overrides,
  };
}

/** Return whatever `fn` throws; fail when it returns normally. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}
