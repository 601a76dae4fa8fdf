import type { OrchestratorErrorKind } from './toolErrors';

export type StrategyMode = 'CONSERVATIVE' | 'EXPLORATORY' | 'FALLBACK';

/** Named bundle of execution limits, selected once per session. */
export interface StrategyProfile {
  readonly name: string;
  readonly mode: StrategyMode;
  readonly maxSteps: number;
  readonly maxRetriesPerStep: number;
  readonly maxPlanRewrites: number;
  /** Deadline for each non-tool strategy run, and upper bound for a tool's own deadline. */
  readonly strategyTimeoutMs: number;
}

export type StrategyName = 'tool' | 'retrieval' | 'search';

export type PlanStepKind = 'EXECUTE' | 'ASK_USER' | 'SUMMARIZE';

export type PlanStepStatus = 'PENDING' | 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'ESCALATED';

export type PlanStatus = 'ACTIVE' | 'COMPLETED' | 'FAILED';

export interface StepResult {
  text: string;
  payload?: unknown;
  source: StrategyName | 'human' | 'summary';
  success: boolean;
}

export interface PlanStep {
  id: string;
  index: number;
  kind: PlanStepKind;
  description: string;
  toolName?: string;
  toolArgs: Record<string, unknown>;
  expectedOutcome?: string;
  status: PlanStepStatus;
  result?: StepResult;
  /** Number of times the step re-entered RUNNING after a failure. */
  retries: number;
  notes: string[];
}

export interface PlanVersion {
  id: string;
  version: number;
  parentId?: string;
  reason: string;
  steps: PlanStep[];
  currentIndex: number;
  status: PlanStatus;
  rewriteCount: number;
  createdAt: string;
}

export interface PerceptionSnapshot {
  id: string;
  turn: number;
  source: 'user_query' | 'step_result' | 'human';
  inputText: string;
  entities: string[];
  intent?: string;
  subGoals: string[];
  constraints: string[];
  uncertainties: string[];
  isGoalSatisfied: boolean;
  confidence: number;
  notes?: string;
}

export interface RetrievedItem {
  id: string;
  source: string;
  content: string;
  relevance: number;
}

export interface RetrievalBundle {
  query: string;
  items: RetrievedItem[];
  summary?: string;
  openQuestions: string[];
}

export interface SearchHit {
  title: string;
  snippet: string;
  source: string;
}

export interface SearchResult {
  query: string;
  hits: SearchHit[];
}

export interface CriticReport {
  qualityScore: number;
  isAcceptable: boolean;
  issues: string[];
  hallucinationRisk: number;
  safetyFlags: string[];
  rewriteSuggestion?: string;
  requiresHumanInput: boolean;
  humanQuestion?: string;
}

export interface MemoryItem {
  key: string;
  value: string;
  createdAt: string;
}

export interface MemoryState {
  shortTerm: MemoryItem[];
  bannedTools: string[];
  /** Success count per tool name. */
  successfulTools: Record<string, number>;
  /** Consecutive failure count per tool name; reset on success. */
  failureStreaks: Record<string, number>;
  notes?: string;
}

export interface ToolPerformanceRecord {
  toolName: string;
  stepId: string;
  timestamp: string;
  latencyMs: number;
  success: boolean;
  attempts: number;
  errorKind?: OrchestratorErrorKind;
}

export type HilCategory = 'tool_failure' | 'step_failure' | 'plan_failure';

export interface HilEvent {
  id: string;
  category: HilCategory;
  prompt: string;
  response: string;
  stepId?: string;
  planVersion?: number;
  turn: number;
  timestamp: string;
  suggestedPlan?: string;
}

/** Non-escalation exchange with the human: ASK_USER clarifications and critic-requested reviews. */
export interface HumanExchange {
  id: string;
  kind: 'clarification' | 'review';
  prompt: string;
  response: string;
  stepId: string;
  turn: number;
  timestamp: string;
  approved?: boolean;
}

export interface SessionState {
  sessionId: string;
  userQuery: string;
  profile: StrategyProfile;
  turn: number;
  perceptionSnapshots: PerceptionSnapshot[];
  retrievalBundles: RetrievalBundle[];
  /** All plan versions in creation order; the last one is active. */
  plans: PlanVersion[];
  memory: MemoryState;
  toolPerformance: ToolPerformanceRecord[];
  hilEvents: HilEvent[];
  humanExchanges: HumanExchange[];
  finalAnswer?: string;
  done: boolean;
  createdAt: string;
  updatedAt: string;
}

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/** Read-only view of the session handed to collaborators and strategies. */
export type SessionView = DeepReadonly<SessionState>;
