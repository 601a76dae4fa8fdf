import { beforeEach, describe, expect, it, vi } from 'vitest';
import { KnowledgeBase } from '../../../src/core/agents/knowledgeBase';
import { defineStrategyProfile } from '../../../src/core/orchestrator/strategyProfile';
import type { ToolRegistry } from '../../../src/core/orchestrator/toolRegistry';
import { buildDefaultCoordinator, unattendedHumanInput } from '../../../src/app/bootstrap';
import { run } from '../../../src/index';

vi.mock('../../../src/shared/logging/logger', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() };
  log.child.mockReturnValue(log);
  return { logger: log, childLogger: () => log };
});

describe('unattendedHumanInput', () => {
  it('declines reviews and continues clarifications', () => {
    expect(unattendedHumanInput({ category: 'review', message: 'Accept?', sessionId: 's' })).toBe('reject');
    expect(unattendedHumanInput({ category: 'clarification', message: 'Which?', sessionId: 's' })).toBe('continue');
    expect(unattendedHumanInput({ category: 'step_failure', message: 'Failed', sessionId: 's' })).toBe('');
  });
});

describe('default wiring', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('answers an arithmetic query end to end', async () => {
    await expect(run('Calculate 12*7')).resolves.toBe('84');
  });

  it('counts words in a quoted phrase', async () => {
    await expect(run('How many words are in "alpha beta gamma"', 'exploratory')).resolves.toBe('3 words, 16 characters');
  });

  it('rejects unknown profile names', async () => {
    await expect(run('Calculate 12*7', 'reckless')).rejects.toMatchObject({ code: 'CONFIG_INVALID' });
  });

  it('registers extra tools next to the defaults', () => {
    const registerTools = vi.fn((_registry: ToolRegistry) => undefined);

    buildDefaultCoordinator({ humanInput: unattendedHumanInput, knowledgeBase: new KnowledgeBase([]), registerTools });

    expect(registerTools).toHaveBeenCalledTimes(1);
    expect(registerTools.mock.calls[0]?.[0].listNames()).toEqual([
      'calculator',
      'get_current_datetime',
      'word_count',
      'knowledge_lookup',
    ]);
  });

  it('fails the session when the only lookup finds nothing and no rewrite is allowed', async () => {
    const profile = defineStrategyProfile({
      name: 'strict',
      mode: 'CONSERVATIVE',
      maxSteps: 5,
      maxRetriesPerStep: 0,
      maxPlanRewrites: 0,
      strategyTimeoutMs: 5_000,
    });
    const coordinator = buildDefaultCoordinator({
      profile,
      humanInput: unattendedHumanInput,
      knowledgeBase: new KnowledgeBase([]),
    });

    const outcome = await coordinator.run('Tell me about volcanoes');

    expect(outcome.status).toBe('FAILED');
    expect(outcome.finalAnswer).toMatch(
      /^Stopped: Plan failed after 0 rewrites\. Last error: Step \S+ was rejected: No reference entry matches "Tell me about volcanoes"$/,
    );
    expect(outcome.session.hilEvents.map((event) => event.category)).toEqual(['plan_failure']);
  });
});
