/**
 * Capability sets the Coordinator depends on. Concrete collaborators are interchangeable
 * variants; the core never references their types.
 */
import type {
  CriticReport,
  DeepReadonly,
  HilCategory,
  MemoryState,
  PerceptionSnapshot,
  PlanStep,
  PlanVersion,
  RetrievalBundle,
  SearchResult,
  SessionView,
  StepResult,
} from './agent-types';

export interface PerceptionCapability {
  analyzeQuery(text: string, session: SessionView): Promise<PerceptionSnapshot>;
  analyzeStepResult(step: DeepReadonly<PlanStep>, rawOutput: string, session: SessionView): Promise<PerceptionSnapshot>;
}

export interface RetrievalCapability {
  retrieve(query: string, session: SessionView): Promise<RetrievalBundle>;
}

export interface MemoryCapability {
  attachRelevantMemory(session: SessionView): Promise<MemoryState>;
  updateFromStep(
    step: DeepReadonly<PlanStep>,
    result: DeepReadonly<StepResult> | undefined,
    session: SessionView,
  ): Promise<MemoryState>;
}

export interface PlanningCapability {
  planInitial(snapshot: DeepReadonly<PerceptionSnapshot>, session: SessionView): Promise<PlanVersion>;
  /** Return the next step of `plan` to run, or null when nothing is left. */
  decideNextStep(plan: DeepReadonly<PlanVersion>, session: SessionView): Promise<DeepReadonly<PlanStep> | null>;
  rewritePlan(plan: DeepReadonly<PlanVersion>, reason: string, session: SessionView): Promise<PlanVersion>;
}

export interface CriticCapability {
  reviewResult(
    step: DeepReadonly<PlanStep>,
    snapshot: DeepReadonly<PerceptionSnapshot>,
    bundle: DeepReadonly<RetrievalBundle> | undefined,
    session: SessionView,
  ): Promise<CriticReport>;
}

export interface SearchCapability {
  search(query: string, session: SessionView): Promise<SearchResult>;
}

export interface HumanInputRequest {
  category: HilCategory | 'clarification' | 'review';
  message: string;
  sessionId: string;
  stepId?: string;
  suggestedPlan?: string;
}

/** Blocking call to a human; the Coordinator waits for the answer. */
export type HumanInputCallback = (request: HumanInputRequest) => string | Promise<string>;

export interface Collaborators {
  perception: PerceptionCapability;
  retrieval: RetrievalCapability;
  memory: MemoryCapability;
  planner: PlanningCapability;
  critic: CriticCapability;
  search?: SearchCapability;
}
