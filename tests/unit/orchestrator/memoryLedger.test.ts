import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  FAILURE_BAN_THRESHOLD,
  MEMORY_LIMITS,
  createMemoryState,
  isToolBanned,
  mergeMemoryUpdate,
  recordToolOutcome,
} from '../../../src/core/orchestrator/memoryLedger';
import { logger } from '../../../src/shared/logging/logger';

vi.mock('../../../src/shared/logging/logger', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() };
  log.child.mockReturnValue(log);
  return { logger: log, childLogger: () => log };
});

describe('memory ledger', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('bans a tool on the third consecutive failure', () => {
    const memory = createMemoryState();

    const outcomes = Array.from({ length: FAILURE_BAN_THRESHOLD }, () => recordToolOutcome(memory, 'flaky', false));

    expect(outcomes.map((outcome) => outcome.newlyBanned)).toEqual([false, false, true]);
    expect(isToolBanned(memory, 'flaky')).toBe(true);
    expect(recordToolOutcome(memory, 'flaky', false).newlyBanned).toBe(false);
    expect(memory.bannedTools).toEqual(['flaky']);
  });

  it('warns instead of banning once the ban list is full', () => {
    const memory = createMemoryState();
    memory.bannedTools.push(...Array.from({ length: MEMORY_LIMITS.bannedTools }, (_, index) => `tool_${index}`));

    const outcomes = Array.from({ length: FAILURE_BAN_THRESHOLD }, () => recordToolOutcome(memory, 'flaky', false));

    expect(outcomes.map((outcome) => outcome.newlyBanned)).toEqual([false, false, false]);
    expect(isToolBanned(memory, 'flaky')).toBe(false);
    expect(memory.bannedTools).toHaveLength(MEMORY_LIMITS.bannedTools);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      { event: 'tool_ban_skipped', toolName: 'flaky', streak: 3, limit: 50 },
      'Ban list is full; tool stays callable',
    );
  });

  it('resets the streak on success', () => {
    const memory = createMemoryState();
    recordToolOutcome(memory, 'calculator', false);
    recordToolOutcome(memory, 'calculator', false);
    recordToolOutcome(memory, 'calculator', true);
    recordToolOutcome(memory, 'calculator', false);

    expect(isToolBanned(memory, 'calculator')).toBe(false);
    expect(memory.successfulTools).toEqual({ calculator: 1 });
    expect(memory.failureStreaks).toEqual({ calculator: 1 });
  });

  it('merges collaborator updates without lifting bans or touching counters', () => {
    const current = createMemoryState();
    current.bannedTools.push('flaky');
    current.successfulTools.calculator = 2;

    const merged = mergeMemoryUpdate(current, {
      shortTerm: [{ key: 'turn-1', value: 'noted', createdAt: '2026-01-01T00:00:00.000Z' }],
      bannedTools: ['slow'],
      successfulTools: { calculator: 99 },
      failureStreaks: {},
      notes: 'Relevant memory: turn-1',
    });

    expect(merged).toEqual({
      shortTerm: [{ key: 'turn-1', value: 'noted', createdAt: '2026-01-01T00:00:00.000Z' }],
      bannedTools: ['flaky', 'slow'],
      successfulTools: { calculator: 2 },
      failureStreaks: {},
      notes: 'Relevant memory: turn-1',
    });
  });
});
