import { describe, expect, it } from 'vitest';
import { ShortTermMemoryAgent } from '../../../src/core/agents/memoryAgent';
import { createPlanStep } from '../../../src/core/orchestrator/planModel';
import { buildSession } from '../../helpers/fakes';

const CREATED_AT = '2026-01-01T00:00:00.000Z';

describe('ShortTermMemoryAgent', () => {
  const agent = new ShortTermMemoryAgent();
  const step = createPlanStep(
    { kind: 'EXECUTE', description: 'Evaluate 12*7', toolName: 'calculator', toolArgs: { expression: '12*7' } },
    1,
  );

  it('notes memory items related to the query', async () => {
    const session = buildSession({ userQuery: 'Calculate 12*7 again' });
    session.memory.shortTerm.push(
      { key: 'a', value: 'succeeded via calculator: Calculate 3*3 -> 9', createdAt: CREATED_AT },
      { key: 'b', value: 'failed via knowledge_lookup: Look up: moon -> none', createdAt: CREATED_AT },
    );

    const memory = await agent.attachRelevantMemory(session);

    expect(memory.notes).toBe('Relevant memory: a');
    expect(memory.shortTerm).toHaveLength(2);
    expect(session.memory.notes).toBeUndefined();
  });

  it('clears notes when nothing is related', async () => {
    const session = buildSession({ userQuery: 'Tell me about owls' });
    session.memory.notes = 'Relevant memory: old';

    expect((await agent.attachRelevantMemory(session)).notes).toBeUndefined();
  });

  it('appends one entry per step outcome', async () => {
    const session = buildSession();
    session.turn = 2;

    const succeeded = await agent.updateFromStep(step, { text: '84', source: 'tool', success: true }, session);
    const failed = await agent.updateFromStep(step, undefined, session);

    expect(succeeded.shortTerm).toEqual([
      { key: 'turn-2:step-1', value: 'succeeded via calculator: Evaluate 12*7 -> 84', createdAt: expect.any(String) },
    ]);
    expect(failed.shortTerm[0]?.value).toBe('failed via calculator: Evaluate 12*7 -> no result');
  });

  it('truncates long values and keeps the newest hundred items', async () => {
    const session = buildSession();
    for (let index = 0; index < 100; index++) {
      session.memory.shortTerm.push({ key: `old-${index}`, value: 'older outcome', createdAt: CREATED_AT });
    }

    const memory = await agent.updateFromStep(step, { text: 'x'.repeat(300), source: 'tool', success: true }, session);

    expect(memory.shortTerm).toHaveLength(100);
    expect(memory.shortTerm[0]?.key).toBe('old-1');
    const latest = memory.shortTerm[99];
    expect(latest?.value).toHaveLength(200);
    expect(latest?.value.endsWith('...')).toBe(true);
  });
});
