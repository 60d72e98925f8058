import { describe, it, expect } from 'vitest';
import { AgentPool } from '../../../src/extraction/AgentPool.js';
import { ScalingPlanner } from '../../../src/scaling/ScalingPlanner.js';
import type { AgentOutcome } from '../../../src/models/extraction.js';
import { ScriptedExtractor, makeExtraction, makeField, untilAborted } from '../helpers.js';

const planner = new ScalingPlanner();
const fields = [makeField('total_value')];

describe('AgentPool', () => {
  it('should return one outcome per assignment in assignment order', async () => {
    const extractor = new ScriptedExtractor(async (assignment) => {
      const delay = assignment.agentId === 'agent-01' ? 15 : 1;
      await new Promise((resolve) => setTimeout(resolve, delay));
      return [makeExtraction('total_value', assignment.agentId, 0.9, assignment.agentId, assignment.pageRange.startPage)];
    });
    const pool = new AgentPool(extractor, { agentTimeoutMs: 1000, poolSize: 1 });

    const result = await pool.run(planner.plan('doc', 10, fields).assignments);

    expect(result.cancelled).toBe(false);
    expect(result.outcomes.map((outcome) => outcome.agentId)).toEqual(['agent-01', 'agent-02']);
    expect(result.outcomes.map((outcome) => outcome.status)).toEqual(['succeeded', 'succeeded']);
  });

  it('should run at least K tasks at once even with a smaller pool size', async () => {
    let running = 0;
    let peak = 0;
    const extractor = new ScriptedExtractor(async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 10));
      running--;
      return [];
    });
    const pool = new AgentPool(extractor, { agentTimeoutMs: 1000, poolSize: 2 });

    await pool.run(planner.plan('doc', 30, fields).assignments);

    expect(peak).toBe(5);
  });

  it('should isolate a failing agent from its siblings', async () => {
    const extractor = new ScriptedExtractor(async (assignment) => {
      if (assignment.agentId === 'agent-02') throw new Error('model unavailable');
      return [];
    });
    const pool = new AgentPool(extractor, { agentTimeoutMs: 1000, poolSize: 1 });

    const { outcomes } = await pool.run(planner.plan('doc', 30, fields).assignments);

    expect(outcomes.map((outcome) => outcome.status)).toEqual([
      'succeeded',
      'failed',
      'succeeded',
      'succeeded',
      'succeeded',
    ]);
    expect(outcomes[1]).toMatchObject({
      agentId: 'agent-02',
      pageRange: { startPage: 7, endPage: 12 },
      error: 'Agent agent-02 failed: model unavailable',
    });
  });

  it('should record a timed-out agent and keep the others', async () => {
    const extractor = new ScriptedExtractor((assignment, signal) => {
      if (assignment.agentId === 'agent-01') return untilAborted(signal);
      return Promise.resolve([]);
    });
    const pool = new AgentPool(extractor, { agentTimeoutMs: 20, poolSize: 1 });

    const { outcomes, cancelled } = await pool.run(planner.plan('doc', 4, fields).assignments);

    expect(cancelled).toBe(false);
    expect(outcomes[0]).toMatchObject({ status: 'timed_out', error: 'Agent agent-01 timed out after 20ms' });
    expect(outcomes[1].status).toBe('succeeded');
  });

  it('should abort the task signal on timeout', async () => {
    let aborted = false;
    const extractor = new ScriptedExtractor((_assignment, signal) => {
      signal?.addEventListener('abort', () => {
        aborted = true;
      });
      return untilAborted(signal);
    });
    const pool = new AgentPool(extractor, { agentTimeoutMs: 10, poolSize: 1 });

    await pool.run(planner.plan('doc', 1, fields).assignments);

    expect(aborted).toBe(true);
  });

  it('should cancel every unfinished agent when the run signal aborts', async () => {
    const extractor = new ScriptedExtractor((assignment, signal) => {
      if (assignment.agentId === 'agent-01') return Promise.resolve([]);
      return untilAborted(signal);
    });
    const pool = new AgentPool(extractor, { agentTimeoutMs: 5000, poolSize: 1 });
    const controller = new AbortController();
    setTimeout(() => controller.abort(new Error('Document deadline of 30ms exceeded')), 30);

    const result = await pool.run(planner.plan('doc', 3, fields).assignments, { signal: controller.signal });

    expect(result.cancelled).toBe(true);
    expect(result.outcomes[0].status).toBe('succeeded');
    expect(result.outcomes[1]).toMatchObject({
      status: 'cancelled',
      error: 'Cancelled: Document deadline of 30ms exceeded',
    });
  });

  it('should cancel without starting any agent when the signal already aborted', async () => {
    const extractor = new ScriptedExtractor(async () => []);
    const pool = new AgentPool(extractor, { agentTimeoutMs: 1000, poolSize: 1 });
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    const result = await pool.run(planner.plan('doc', 2, fields).assignments, { signal: controller.signal });

    expect(extractor.calls).toHaveLength(0);
    expect(result.outcomes.map((outcome) => outcome.status)).toEqual(['cancelled', 'cancelled']);
  });

  it('should report every outcome and survive a throwing listener', async () => {
    const seen: AgentOutcome[] = [];
    const extractor = new ScriptedExtractor(async () => []);
    const pool = new AgentPool(extractor, { agentTimeoutMs: 1000, poolSize: 1 });

    const result = await pool.run(planner.plan('doc', 2, fields).assignments, {
      onOutcome: (outcome) => {
        seen.push(outcome);
        throw new Error('listener broke');
      },
    });

    expect(seen).toHaveLength(2);
    expect(result.outcomes).toHaveLength(2);
  });

  it('should resolve with no outcomes for no assignments', async () => {
    const pool = new AgentPool(new ScriptedExtractor(async () => []), { agentTimeoutMs: 1000, poolSize: 4 });

    expect(await pool.run([])).toEqual({ outcomes: [], cancelled: false });
  });
});
