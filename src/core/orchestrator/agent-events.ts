export type CoordinatorPhase =
  | 'INIT'
  | 'PLANNING'
  | 'SELECT_STEP'
  | 'EXECUTE'
  | 'EVALUATE'
  | 'ADVANCE'
  | 'REWRITE'
  | 'ESCALATE'
  | 'DONE'
  | 'FAILED';

export type AgentEventType =
  | 'session_started'
  | 'phase_entered'
  | 'plan_created'
  | 'plan_rewritten'
  | 'step_started'
  | 'step_completed'
  | 'step_failed'
  | 'strategy_completed'
  | 'tool_banned'
  | 'hil_escalated'
  | 'session_completed'
  | 'session_failed';

export interface AgentEvent {
  id: string;
  sessionId: string;
  type: AgentEventType;
  timestamp: string;
  phase?: CoordinatorPhase;
  stepId?: string;
  planVersion?: number;
  details?: Record<string, unknown>;
}

export interface AgentEventFactory {
  nextEvent(params: Omit<AgentEvent, 'id' | 'sessionId' | 'timestamp'>): AgentEvent;
}

export function createAgentEventFactory(sessionId: string): AgentEventFactory {
  let counter = 0;
  return {
    nextEvent(params: Omit<AgentEvent, 'id' | 'sessionId' | 'timestamp'>): AgentEvent {
      counter += 1;
      return {
        ...params,
        id: `${sessionId}:${counter}`,
        sessionId,
        timestamp: new Date().toISOString(),
      };
    },
  };
}
