import { logger } from '../../shared/logging/logger';
import type { DeepReadonly, MemoryState } from './agent-types';

/** Consecutive failures after which a tool is banned for the session. */
export const FAILURE_BAN_THRESHOLD = 3;

export const MEMORY_LIMITS = {
  shortTerm: 100,
  bannedTools: 50,
  successfulTools: 100,
} as const;

export function createMemoryState(): MemoryState {
  return {
    shortTerm: [],
    bannedTools: [],
    successfulTools: {},
    failureStreaks: {},
  };
}

export function isToolBanned(memory: DeepReadonly<MemoryState>, toolName: string): boolean {
  return memory.bannedTools.includes(toolName);
}

function evictLeastSuccessful(successfulTools: Record<string, number>): void {
  let weakest: string | undefined;
  for (const [tool, count] of Object.entries(successfulTools)) {
    if (weakest === undefined || count < (successfulTools[weakest] ?? 0)) weakest = tool;
  }
  if (weakest !== undefined) delete successfulTools[weakest];
}

/**
 * Apply one tool outcome to the ledger. A success clears the failure streak; the
 * third consecutive failure bans the tool unless the ban list is full.
 *
 * @returns Whether this outcome newly banned the tool.
 */
export function recordToolOutcome(memory: MemoryState, toolName: string, success: boolean): { newlyBanned: boolean } {
  if (success) {
    if (!(toolName in memory.successfulTools) && Object.keys(memory.successfulTools).length >= MEMORY_LIMITS.successfulTools) {
      evictLeastSuccessful(memory.successfulTools);
    }
    memory.successfulTools[toolName] = (memory.successfulTools[toolName] ?? 0) + 1;
    delete memory.failureStreaks[toolName];
    return { newlyBanned: false };
  }

  const streak = (memory.failureStreaks[toolName] ?? 0) + 1;
  memory.failureStreaks[toolName] = streak;

  if (streak < FAILURE_BAN_THRESHOLD || memory.bannedTools.includes(toolName)) {
    return { newlyBanned: false };
  }
  if (memory.bannedTools.length >= MEMORY_LIMITS.bannedTools) {
    logger.warn(
      { event: 'tool_ban_skipped', toolName, streak, limit: MEMORY_LIMITS.bannedTools },
      'Ban list is full; tool stays callable',
    );
    return { newlyBanned: false };
  }
  memory.bannedTools.push(toolName);
  return { newlyBanned: true };
}

/**
 * Merge a memory collaborator's state into the ledger. The collaborator owns short-term
 * items and notes; counters stay with the ledger and bans are never lifted.
 */
export function mergeMemoryUpdate(current: DeepReadonly<MemoryState>, update: DeepReadonly<MemoryState>): MemoryState {
  const banned = [...current.bannedTools];
  for (const tool of update.bannedTools) {
    if (!banned.includes(tool) && banned.length < MEMORY_LIMITS.bannedTools) banned.push(tool);
  }

  return {
    shortTerm: update.shortTerm.slice(-MEMORY_LIMITS.shortTerm).map((item) => ({ ...item })),
    bannedTools: banned,
    successfulTools: { ...current.successfulTools },
    failureStreaks: { ...current.failureStreaks },
    notes: update.notes ?? current.notes,
  };
}
