import { randomUUID } from 'node:crypto';
import type { PerceptionCapability } from '../orchestrator/capabilities';
import type { DeepReadonly, PerceptionSnapshot, PlanStep, SessionView } from '../orchestrator/agent-types';
import { MAX_ENTITIES, MAX_SUB_GOALS } from '../orchestrator/contracts';
import { clampUnit, extractEntities, keywordOverlap } from './text';

const INTENT_RULES: Array<{ intent: string; pattern: RegExp }> = [
  { intent: 'command', pattern: /\b(calculate|compute|solve|evaluate|count|run)\b/i },
  { intent: 'question', pattern: /\b(what|how|why|when|where|who)\b|\?/i },
  { intent: 'analysis', pattern: /\b(analy[sz]e|compare|review)\b/i },
  { intent: 'creation', pattern: /\b(create|make|generate|build|write)\b/i },
];

const CONSTRAINT_RULES: Array<{ name: string; pattern: RegExp }> = [
  { name: 'time_constraint', pattern: /\b(before|deadline|asap|today|by tomorrow)\b/i },
  { name: 'safety_constraint', pattern: /\b(safe|secure|careful)\b/i },
  { name: 'tool_constraint', pattern: /\b(without|avoid|don't use)\b/i },
];

const UNCERTAINTY_RULES: Array<{ name: string; pattern: RegExp }> = [
  { name: 'modal_uncertainty', pattern: /\b(maybe|perhaps|might|could|uncertain)\b/i },
  { name: 'question_uncertainty', pattern: /\?/ },
  { name: 'clarity_uncertainty', pattern: /\b(not sure|unclear|ambiguous)\b/i },
];

const GOAL_SATISFIED_PATTERN = /\b(done|complete|completed|finished|solved)\b/i;

function classifyIntent(text: string): string {
  return INTENT_RULES.find((rule) => rule.pattern.test(text))?.intent ?? 'general';
}

function matchRules(text: string, rules: Array<{ name: string; pattern: RegExp }>): string[] {
  return rules.filter((rule) => rule.pattern.test(text)).map((rule) => rule.name);
}

/** Split on "and", "then", "also" and commas; fragments of three characters or fewer are dropped. */
export function splitSubGoals(text: string): string[] {
  return text
    .split(/\s*,\s*|\s+(?:and then|and|then|also)\s+/i)
    .map((part) => part.trim())
    .filter((part) => part.length > 3)
    .slice(0, MAX_SUB_GOALS);
}

/**
 * Rule-based perception: regex entity extraction, keyword intent classes and
 * sub-goal splitting on conjunctions.
 */
export class RuleBasedPerceptionAgent implements PerceptionCapability {
  async analyzeQuery(text: string, session: SessionView): Promise<PerceptionSnapshot> {
    const entities = extractEntities(text).slice(0, MAX_ENTITIES);
    const intent = classifyIntent(text);

    let confidence = 0.5;
    if (entities.length > 0) confidence += Math.min(0.2, entities.length * 0.05);
    if (intent !== 'general') confidence += 0.1;
    if (text.length > 50) confidence += 0.1;

    return {
      id: randomUUID(),
      turn: session.turn,
      source: session.plans.length === 0 ? 'user_query' : 'human',
      inputText: text,
      entities,
      intent,
      subGoals: splitSubGoals(text),
      constraints: matchRules(text, CONSTRAINT_RULES),
      uncertainties: matchRules(text, UNCERTAINTY_RULES),
      isGoalSatisfied: GOAL_SATISFIED_PATTERN.test(text),
      confidence: clampUnit(confidence),
      notes: `Analyzed query with ${entities.length} entities`,
    };
  }

  async analyzeStepResult(step: DeepReadonly<PlanStep>, rawOutput: string, session: SessionView): Promise<PerceptionSnapshot> {
    const overlap = step.expectedOutcome ? keywordOverlap(step.expectedOutcome, rawOutput) : 0.5;

    return {
      id: randomUUID(),
      turn: session.turn,
      source: 'step_result',
      inputText: rawOutput,
      entities: extractEntities(rawOutput).slice(0, MAX_ENTITIES),
      intent: step.kind === 'EXECUTE' ? 'result' : 'information',
      subGoals: [],
      constraints: matchRules(rawOutput, CONSTRAINT_RULES),
      uncertainties: matchRules(rawOutput, UNCERTAINTY_RULES),
      isGoalSatisfied: rawOutput.trim().length > 0 && overlap > 0,
      confidence: clampUnit(overlap),
      notes: `Analyzed result of step ${step.index}`,
    };
  }
}
