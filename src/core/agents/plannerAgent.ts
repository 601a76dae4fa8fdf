import type { PlanningCapability } from '../orchestrator/capabilities';
import type { DeepReadonly, PerceptionSnapshot, PlanStep, PlanVersion, SessionView } from '../orchestrator/agent-types';
import { isToolBanned } from '../orchestrator/memoryLedger';
import { createPlanVersion, deriveRewrittenPlan, type PlanStepInput } from '../orchestrator/planModel';
import { MAX_PLAN_STEPS } from '../orchestrator/strategyProfile';
import { KNOWLEDGE_LOOKUP_TOOL } from './knowledgeBase';

const SUMMARIZE_STEP: PlanStepInput = {
  kind: 'SUMMARIZE',
  description: 'Summarize the results into a final answer',
};

const TOOL_RULES: Array<{ tool: string; pattern: RegExp }> = [
  { tool: 'word_count', pattern: /\b(word count|count (?:the )?words|how many words)\b/i },
  { tool: 'get_current_datetime', pattern: /\b(time|date|today|now)\b/i },
  { tool: 'calculator', pattern: /\b(calculate|compute|evaluate|sum|add|multiply|divide|math)\b/i },
];

const EXPRESSION_CANDIDATE = /[\d.(][\d\s+\-*/%^().]*/g;
const BINARY_OPERATION = /\d\s*[+\-*/%^]\s*[\d(.]/;

/** Longest arithmetic expression embedded in `text`, if there is one. */
export function extractArithmeticExpression(text: string): string | undefined {
  const candidates = (text.match(EXPRESSION_CANDIDATE) ?? [])
    .map((candidate) => candidate.trim().replace(/[\s.+\-*/%^]+$/, ''))
    .filter((candidate) => BINARY_OPERATION.test(candidate));

  let longest: string | undefined;
  for (const candidate of candidates) {
    if (!longest || candidate.length > longest.length) longest = candidate;
  }
  return longest;
}

function quotedOrTail(text: string): string {
  const quoted = /"([^"]+)"/.exec(text);
  if (quoted?.[1]) return quoted[1];
  const colon = text.indexOf(':');
  if (colon >= 0 && colon < text.length - 1) return text.slice(colon + 1).trim();
  return text;
}

export interface HeuristicPlannerOptions {
  /** Tools the registry offers; steps are only planned against these. */
  availableTools: readonly string[];
}

/**
 * Keyword planner: one EXECUTE step per sub-goal with a tool picked by rule, then a
 * closing SUMMARIZE step. Rewrites retry the failed goal with a different tool.
 */
export class HeuristicPlanner implements PlanningCapability {
  constructor(private readonly options: HeuristicPlannerOptions) {}

  async planInitial(snapshot: DeepReadonly<PerceptionSnapshot>, session: SessionView): Promise<PlanVersion> {
    const goals = snapshot.subGoals.length > 0 ? [...snapshot.subGoals] : [session.userQuery];
    const steps: PlanStepInput[] = [];

    if (snapshot.uncertainties.includes('clarity_uncertainty')) {
      steps.push({ kind: 'ASK_USER', description: `Clarify what is needed for: ${session.userQuery}` });
    }

    for (const goal of goals) {
      const step = this.stepForGoal(goal, session, []);
      if (step) steps.push(step);
    }

    return createPlanVersion({
      steps: this.fitToBudget(steps, session, 0),
      reason: `Initial plan for ${goals.length} goal(s)`,
    });
  }

  async decideNextStep(plan: DeepReadonly<PlanVersion>, _session: SessionView): Promise<DeepReadonly<PlanStep> | null> {
    if (plan.status !== 'ACTIVE') return null;
    const step = plan.steps[plan.currentIndex];
    if (!step || (step.status !== 'PENDING' && step.status !== 'FAILED')) return null;
    return step;
  }

  async rewritePlan(plan: DeepReadonly<PlanVersion>, reason: string, session: SessionView): Promise<PlanVersion> {
    const failed = plan.steps[plan.currentIndex];
    const remaining: PlanStepInput[] = [];

    if (failed?.kind === 'EXECUTE') {
      const retry = this.stepForGoal(failed.description, session, failed.toolName ? [failed.toolName] : []);
      if (retry) remaining.push(retry);
    }

    for (const step of plan.steps.slice(plan.currentIndex + 1)) {
      if (step.kind === 'SUMMARIZE') continue;
      if (step.kind === 'EXECUTE' && step.toolName && isToolBanned(session.memory, step.toolName)) continue;
      remaining.push({
        kind: step.kind,
        description: step.description,
        toolName: step.toolName,
        toolArgs: { ...step.toolArgs },
        expectedOutcome: step.expectedOutcome,
      });
    }

    return deriveRewrittenPlan(plan, {
      reason,
      remaining: this.fitToBudget(remaining, session, plan.currentIndex),
    });
  }

  /** Keep the plan within the step budget and always close it with SUMMARIZE. */
  private fitToBudget(steps: PlanStepInput[], session: SessionView, keptSteps: number): PlanStepInput[] {
    const limit = Math.min(MAX_PLAN_STEPS, session.profile.maxSteps) - keptSteps;
    return [...steps.slice(0, Math.max(0, limit - 1)), SUMMARIZE_STEP];
  }

  private stepForGoal(goal: string, session: SessionView, exclude: readonly string[]): PlanStepInput | undefined {
    const usable = (tool: string): boolean =>
      this.options.availableTools.includes(tool) && !exclude.includes(tool) && !isToolBanned(session.memory, tool);

    const expression = extractArithmeticExpression(goal);
    const ruled = TOOL_RULES.find((rule) => rule.pattern.test(goal))?.tool;
    const preferred = ruled ?? (expression ? 'calculator' : KNOWLEDGE_LOOKUP_TOOL);

    const candidates = [preferred, KNOWLEDGE_LOOKUP_TOOL];
    const tool = candidates.find(usable);
    if (!tool) return undefined;

    if (tool === 'calculator') {
      if (!expression) return this.stepForGoal(goal, session, [...exclude, 'calculator']);
      return {
        kind: 'EXECUTE',
        description: `Evaluate ${expression}`,
        toolName: tool,
        toolArgs: { expression },
      };
    }
    if (tool === 'word_count') {
      return {
        kind: 'EXECUTE',
        description: `Count words in: ${goal}`,
        toolName: tool,
        toolArgs: { text: quotedOrTail(goal) },
      };
    }
    if (tool === 'get_current_datetime') {
      return {
        kind: 'EXECUTE',
        description: 'Look up the current date and time',
        toolName: tool,
        toolArgs: {},
      };
    }
    return {
      kind: 'EXECUTE',
      description: `Look up: ${goal}`,
      toolName: tool,
      toolArgs: { query: goal.slice(0, 500) },
      expectedOutcome: goal,
    };
  }
}
