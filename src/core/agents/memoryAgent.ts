import type { MemoryCapability } from '../orchestrator/capabilities';
import type { DeepReadonly, MemoryItem, MemoryState, PlanStep, SessionView, StepResult } from '../orchestrator/agent-types';
import { MEMORY_LIMITS } from '../orchestrator/memoryLedger';
import { extractKeywords } from './text';

const MAX_VALUE_LENGTH = 200;
const MAX_RELEVANT_KEYS = 5;

function copyMemory(memory: DeepReadonly<MemoryState>): MemoryState {
  return {
    shortTerm: memory.shortTerm.map((item) => ({ ...item })),
    bannedTools: [...memory.bannedTools],
    successfulTools: { ...memory.successfulTools },
    failureStreaks: { ...memory.failureStreaks },
    notes: memory.notes,
  };
}

function truncate(text: string): string {
  return text.length > MAX_VALUE_LENGTH ? `${text.slice(0, MAX_VALUE_LENGTH - 3)}...` : text;
}

/**
 * Keep a rolling log of step outcomes and point the planner at entries related to the
 * current query.
 */
export class ShortTermMemoryAgent implements MemoryCapability {
  async attachRelevantMemory(session: SessionView): Promise<MemoryState> {
    const memory = copyMemory(session.memory);
    const keywords = new Set(extractKeywords(session.userQuery));

    const relevant = memory.shortTerm
      .filter((item) => extractKeywords(item.value).some((word) => keywords.has(word)))
      .slice(-MAX_RELEVANT_KEYS)
      .map((item) => item.key);

    memory.notes = relevant.length > 0 ? `Relevant memory: ${relevant.join(', ')}` : undefined;
    return memory;
  }

  async updateFromStep(
    step: DeepReadonly<PlanStep>,
    result: DeepReadonly<StepResult> | undefined,
    session: SessionView,
  ): Promise<MemoryState> {
    const memory = copyMemory(session.memory);
    const outcome = result?.success ? 'succeeded' : 'failed';
    const via = step.toolName ? ` via ${step.toolName}` : '';

    const item: MemoryItem = {
      key: `turn-${session.turn}:step-${step.index}`,
      value: truncate(`${outcome}${via}: ${step.description} -> ${result?.text ?? 'no result'}`),
      createdAt: new Date().toISOString(),
    };
    memory.shortTerm = [...memory.shortTerm, item].slice(-MEMORY_LIMITS.shortTerm);
    return memory;
  }
}
