import type { CriticCapability } from '../orchestrator/capabilities';
import type {
  CriticReport,
  DeepReadonly,
  PerceptionSnapshot,
  PlanStep,
  RetrievalBundle,
  SessionView,
} from '../orchestrator/agent-types';
import { MAX_CRITIC_ISSUES } from '../orchestrator/contracts';
import { clampUnit, keywordOverlap } from './text';

const SAFETY_WORDS = ['delete', 'remove', 'destroy', 'kill', 'harm', 'dangerous', 'illegal', 'unauthorized', 'hack', 'exploit'];

const MIN_ACCEPTABLE_QUALITY = 0.5;
const MAX_ACCEPTABLE_RISK = 0.7;
const HUMAN_REVIEW_RISK = 0.8;
const LONG_UNSUPPORTED_TEXT = 200;

export function findSafetyFlags(text: string): string[] {
  const lowered = text.toLowerCase();
  return SAFETY_WORDS.filter((word) => new RegExp(`\\b${word}\\b`).test(lowered)).map((word) => `unsafe_term:${word}`);
}

/**
 * Estimate how likely the text invents facts: capitalized entities absent from both the
 * query and the retrieved context raise the score, as does long output with no context.
 */
export function estimateHallucinationRisk(
  text: string,
  snapshot: DeepReadonly<PerceptionSnapshot>,
  bundle: DeepReadonly<RetrievalBundle> | undefined,
  userQuery: string,
): number {
  const known = `${userQuery} ${bundle?.items.map((item) => item.content).join(' ') ?? ''}`.toLowerCase();
  const unsupported = snapshot.entities.filter((entity) => /^[A-Z]/.test(entity) && !known.includes(entity.toLowerCase()));

  let risk = Math.min(0.5, unsupported.length * 0.1);
  if ((!bundle || bundle.items.length === 0) && text.length > LONG_UNSUPPORTED_TEXT) risk += 0.2;
  return clampUnit(risk);
}

/** Rule-based critic scoring results on expected-outcome overlap, grounding and unsafe terms. */
export class HeuristicCritic implements CriticCapability {
  async reviewResult(
    step: DeepReadonly<PlanStep>,
    snapshot: DeepReadonly<PerceptionSnapshot>,
    bundle: DeepReadonly<RetrievalBundle> | undefined,
    session: SessionView,
  ): Promise<CriticReport> {
    const text = step.result?.text.trim() ?? '';
    const issues: string[] = [];

    if (text.length === 0) issues.push('Result is empty');
    if (step.result && !step.result.success) issues.push('Step result is marked as failed');

    const matchRatio = step.expectedOutcome ? keywordOverlap(step.expectedOutcome, text) : 1;
    if (text.length > 0 && matchRatio < 0.5) issues.push('Result does not mention the expected outcome');

    const qualityScore = text.length === 0 ? 0 : clampUnit(0.6 + 0.4 * matchRatio);
    const hallucinationRisk = estimateHallucinationRisk(text, snapshot, bundle, session.userQuery);
    if (hallucinationRisk >= MAX_ACCEPTABLE_RISK) issues.push('Result mentions entities with no supporting context');

    const safetyFlags = findSafetyFlags(text);
    const isAcceptable =
      text.length > 0 &&
      step.result?.success !== false &&
      qualityScore >= MIN_ACCEPTABLE_QUALITY &&
      hallucinationRisk < MAX_ACCEPTABLE_RISK &&
      safetyFlags.length === 0;
    const requiresHumanInput = safetyFlags.length > 0 || hallucinationRisk > HUMAN_REVIEW_RISK;

    return {
      qualityScore,
      isAcceptable,
      issues: issues.slice(0, MAX_CRITIC_ISSUES),
      hallucinationRisk,
      safetyFlags,
      rewriteSuggestion: isAcceptable ? undefined : `Retry "${step.description}" with a different tool`,
      requiresHumanInput,
      humanQuestion: requiresHumanInput
        ? `The result for "${step.description}" was flagged (${safetyFlags.join(', ') || 'unsupported claims'}). Accept it?`
        : undefined,
    };
  }
}
