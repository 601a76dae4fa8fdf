/**
 * Bounds on collaborator payloads. The core checks every value it receives before
 * storing it; a violation is a hard failure.
 */
import { z } from 'zod';
import type {
  CriticReport,
  MemoryState,
  PerceptionSnapshot,
  PlanStep,
  PlanVersion,
  RetrievalBundle,
  SearchResult,
} from './agent-types';
import { MEMORY_LIMITS } from './memoryLedger';
import { MIN_STEP_DESCRIPTION_LENGTH } from './planModel';
import { MAX_PLAN_STEPS } from './strategyProfile';
import { CollaboratorContractError } from './toolErrors';
import type { Result } from './toolRegistry';

export const QUERY_LIMITS = { min: 3, max: 5_000 } as const;
export const RETRIEVAL_QUERY_LIMITS = { min: 3, max: 500 } as const;
export const MAX_ENTITIES = 50;
export const MAX_SUB_GOALS = 10;
export const MAX_RETRIEVED_ITEMS = 20;
export const MAX_SEARCH_HITS = 20;
export const MAX_CRITIC_ISSUES = 20;

const unitInterval = z.number().min(0).max(1);

export const perceptionSnapshotSchema: z.ZodType<PerceptionSnapshot> = z.object({
  id: z.string().min(1),
  turn: z.number().int().min(0),
  source: z.enum(['user_query', 'step_result', 'human']),
  inputText: z.string(),
  entities: z.array(z.string()).max(MAX_ENTITIES),
  intent: z.string().optional(),
  subGoals: z.array(z.string()).max(MAX_SUB_GOALS),
  constraints: z.array(z.string()),
  uncertainties: z.array(z.string()),
  isGoalSatisfied: z.boolean(),
  confidence: unitInterval,
  notes: z.string().optional(),
});

export const retrievalBundleSchema: z.ZodType<RetrievalBundle> = z.object({
  query: z.string(),
  items: z
    .array(
      z.object({
        id: z.string().min(1),
        source: z.string(),
        content: z.string(),
        relevance: unitInterval,
      }),
    )
    .max(MAX_RETRIEVED_ITEMS),
  summary: z.string().optional(),
  openQuestions: z.array(z.string()),
});

export const memoryStateSchema: z.ZodType<MemoryState> = z.object({
  shortTerm: z
    .array(z.object({ key: z.string(), value: z.string(), createdAt: z.string() }))
    .max(MEMORY_LIMITS.shortTerm),
  bannedTools: z.array(z.string()).max(MEMORY_LIMITS.bannedTools),
  successfulTools: z
    .record(z.number().int().min(0))
    .refine((tools) => Object.keys(tools).length <= MEMORY_LIMITS.successfulTools, {
      message: `at most ${MEMORY_LIMITS.successfulTools} successful tools`,
    }),
  failureStreaks: z.record(z.number().int().min(0)),
  notes: z.string().optional(),
});

export const criticReportSchema: z.ZodType<CriticReport> = z.object({
  qualityScore: unitInterval,
  isAcceptable: z.boolean(),
  issues: z.array(z.string()).max(MAX_CRITIC_ISSUES),
  hallucinationRisk: unitInterval,
  safetyFlags: z.array(z.string()),
  rewriteSuggestion: z.string().optional(),
  requiresHumanInput: z.boolean(),
  humanQuestion: z.string().optional(),
});

export const searchResultSchema: z.ZodType<SearchResult> = z.object({
  query: z.string(),
  hits: z
    .array(z.object({ title: z.string(), snippet: z.string(), source: z.string() }))
    .max(MAX_SEARCH_HITS),
});

export const planStepSchema: z.ZodType<PlanStep> = z.object({
  id: z.string().min(1),
  index: z.number().int().min(0),
  kind: z.enum(['EXECUTE', 'ASK_USER', 'SUMMARIZE']),
  description: z.string().trim().min(MIN_STEP_DESCRIPTION_LENGTH),
  toolName: z.string().optional(),
  toolArgs: z.record(z.unknown()),
  expectedOutcome: z.string().optional(),
  status: z.enum(['PENDING', 'RUNNING', 'SUCCEEDED', 'FAILED', 'ESCALATED']),
  result: z
    .object({
      text: z.string(),
      payload: z.unknown(),
      source: z.enum(['tool', 'retrieval', 'search', 'human', 'summary']),
      success: z.boolean(),
    })
    .optional(),
  retries: z.number().int().min(0),
  notes: z.array(z.string()),
});

export const planVersionSchema: z.ZodType<PlanVersion> = z.object({
  id: z.string().min(1),
  version: z.number().int().min(1),
  parentId: z.string().optional(),
  reason: z.string(),
  steps: z.array(planStepSchema).min(1).max(MAX_PLAN_STEPS),
  currentIndex: z.number().int().min(0),
  status: z.enum(['ACTIVE', 'COMPLETED', 'FAILED']),
  rewriteCount: z.number().int().min(0),
  createdAt: z.string(),
});

/**
 * Check a collaborator's return value against its schema.
 *
 * @param collaborator - Name used in the error, e.g. `perception.analyzeQuery`.
 */
export function checkContract<T>(
  schema: z.ZodType<T>,
  value: unknown,
  collaborator: string,
): Result<T, CollaboratorContractError> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return { ok: false, error: new CollaboratorContractError(collaborator, issues) };
  }
  return { ok: true, value: parsed.data };
}

/** Return an issue message when `text` falls outside the length bounds. */
export function checkQueryLength(text: string, limits: { min: number; max: number }): string | undefined {
  const length = text.trim().length;
  if (length < limits.min || length > limits.max) {
    return `query length ${length} is outside [${limits.min}, ${limits.max}]`;
  }
  return undefined;
}
