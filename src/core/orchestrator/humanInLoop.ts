import { randomUUID } from 'node:crypto';
import { logger } from '../../shared/logging/logger';
import type {
  CriticReport,
  DeepReadonly,
  HilCategory,
  HilEvent,
  HumanExchange,
  PlanStep,
  SessionState,
} from './agent-types';
import { activePlan, appendHilEvent, appendHumanExchange, markDone } from './blackboard';
import type { HumanInputCallback, HumanInputRequest } from './capabilities';

const REFUSAL_PATTERN = /\b(no|stop|reject|abort)\b/i;

export interface EscalationRequest {
  category: HilCategory;
  reason: string;
  step?: DeepReadonly<PlanStep>;
  critic?: CriticReport;
  error?: Error;
}

/** Treat any answer that does not refuse as approval; an empty answer approves. */
export function isApproval(response: string): boolean {
  return !REFUSAL_PATTERN.test(response);
}

/**
 * Propose what to do next, for the human to accept or amend: the critic's rewrite
 * suggestion when there is one, else a retry or replacement of the failed step, else the
 * remaining steps of the active plan.
 */
export function suggestFollowUpPlan(session: SessionState, request: EscalationRequest): string {
  if (request.critic?.rewriteSuggestion) {
    return `Apply critic suggestion: ${request.critic.rewriteSuggestion}`;
  }

  if (request.step) {
    const target = request.step.toolName ? `tool "${request.step.toolName}"` : 'the step';
    if (request.category === 'tool_failure') {
      return `Retry "${request.step.description}" with a different tool or corrected arguments for ${target}`;
    }
    return `Replace "${request.step.description}" with a smaller step that does not depend on ${target}`;
  }

  const plan = activePlan(session);
  const remaining = plan ? plan.steps.slice(plan.currentIndex).map((step) => step.description) : [];
  return remaining.length > 0 ? `Continue with: ${remaining.join(' -> ')}` : 'Summarize what is known so far';
}

function buildPrompt(session: SessionState, request: EscalationRequest, suggestion: string): string {
  const lines = [`[${request.category}] ${request.reason}`, `Query: ${session.userQuery}`];
  if (request.step) lines.push(`Step: ${request.step.description}`);
  if (request.error) lines.push(`Error: ${request.error.message}`);
  if (request.critic && request.critic.issues.length > 0) lines.push(`Issues: ${request.critic.issues.join('; ')}`);
  lines.push(`Suggested next step: ${suggestion}`);
  return lines.join('\n');
}

/**
 * Route escalations and questions to the human callback and record each exchange on the
 * session. Plan failures always end the session.
 */
export class HumanInLoop {
  constructor(private readonly humanInput: HumanInputCallback) {}

  async escalate(session: SessionState, request: EscalationRequest): Promise<HilEvent> {
    const suggestion = suggestFollowUpPlan(session, request);
    const prompt = buildPrompt(session, request, suggestion);
    const response = await this.callHuman(
      {
        category: request.category,
        message: prompt,
        sessionId: session.sessionId,
        stepId: request.step?.id,
        suggestedPlan: suggestion,
      },
      session.sessionId,
    );

    const event: HilEvent = {
      id: randomUUID(),
      category: request.category,
      prompt,
      response,
      stepId: request.step?.id,
      planVersion: activePlan(session)?.version,
      turn: session.turn,
      timestamp: new Date().toISOString(),
      suggestedPlan: suggestion,
    };
    appendHilEvent(session, event);

    logger.warn(
      { sessionId: session.sessionId, stepId: event.stepId, event: 'hil_escalated', category: request.category },
      'Escalated to human',
    );

    if (request.category === 'plan_failure') {
      markDone(session, `Stopped: ${request.reason}`);
    }
    return event;
  }

  async ask(
    session: SessionState,
    params: { kind: HumanExchange['kind']; prompt: string; stepId: string },
  ): Promise<HumanExchange> {
    const response = await this.callHuman(
      { category: params.kind, message: params.prompt, sessionId: session.sessionId, stepId: params.stepId },
      session.sessionId,
    );
    const exchange: HumanExchange = {
      id: randomUUID(),
      kind: params.kind,
      prompt: params.prompt,
      response,
      stepId: params.stepId,
      turn: session.turn,
      timestamp: new Date().toISOString(),
      approved: params.kind === 'review' ? isApproval(response) : undefined,
    };
    appendHumanExchange(session, exchange);
    return exchange;
  }

  private async callHuman(request: HumanInputRequest, sessionId: string): Promise<string> {
    try {
      return (await this.humanInput(request)).trim();
    } catch (error) {
      logger.error(
        { sessionId, stepId: request.stepId, event: 'hil_callback_failed', category: request.category, err: error },
        'Human input callback failed; recording an empty response',
      );
      return '';
    }
  }
}
