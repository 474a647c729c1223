import { describe, it, expect } from 'vitest';
import {
  HEALTH_ISSUE_CATALOG,
  checkHealthIssues,
  currentFactors,
  healthIssuesProcess,
  onsetProbability,
} from '../../../src/processes/health-issues.js';
import { SeededRandom } from '../../../src/core/random.js';
import { createProcessContext, createTestState } from '../../helpers/factories.js';
import { ScriptedRandom } from '../../helpers/scripted-random.js';

function kind(name: string) {
  const found = HEALTH_ISSUE_CATALOG.find((entry) => entry.name === name);
  if (!found) throw new Error(`No catalog entry ${name}`);
  return found;
}

describe('onsetProbability', () => {
  it('is the base probability with no risk factors', () => {
    const factors = { isTraveling: false, recoveryScore: 80, adherence: 'ON_TRACK' as const };
    expect(onsetProbability(kind('Minor Illness (Cold/Flu)'), factors)).toBe(0.005);
  });

  it('adds every applicable modifier', () => {
    const factors = { isTraveling: true, recoveryScore: 30, adherence: 'DEVIATED' as const };
    expect(onsetProbability(kind('Blood Pressure Spike'), factors)).toBeCloseTo(0.033, 10);
    expect(onsetProbability(kind('Bout of Indigestion'), factors)).toBeCloseTo(0.047, 10);
  });

  it('treats recovery of exactly 40 as not low', () => {
    const factors = { isTraveling: false, recoveryScore: 40, adherence: 'ON_TRACK' as const };
    expect(onsetProbability(kind('Muscle Strain/Joint Pain'), factors)).toBe(0.004);
  });
});

describe('currentFactors', () => {
  it('assumes full recovery before the first reading', () => {
    expect(currentFactors(createTestState())).toEqual({
      isTraveling: false,
      recoveryScore: 100,
      adherence: 'ON_TRACK',
    });
  });
});

describe('checkHealthIssues', () => {
  it('starts an issue with the shortest window on minimal draws', () => {
    const state = createTestState();
    state.advanceTo(10);
    state.recordWearable('recovery_score', 25);

    const result = checkHealthIssues(state, new ScriptedRandom([0, 0, 0]));

    expect(result.onset?.issue).toBe('Minor Illness (Cold/Flu)');
    expect(state.activeIssue).toBe('Minor Illness (Cold/Flu)');
    expect(state.lastEvent()?.type).toBe('HEALTH_ISSUE');
    expect(state.lastEvent()?.payload).toEqual({
      issue: 'Minor Illness (Cold/Flu)',
      triggeringFactors: { isTraveling: false, recoveryScore: 25, adherence: 'ON_TRACK' },
      durationDays: 2,
      resolvesOn: 12,
      cooldownUntil: 19,
    });
  });

  it('uses the longest window on maximal draws', () => {
    const state = createTestState();
    state.advanceTo(10);

    const result = checkHealthIssues(state, new ScriptedRandom([0, 0.999, 0.999]));

    expect(result.onset).toMatchObject({ durationDays: 5, resolvesOn: 15, cooldownUntil: 29 });
  });

  it('rolls catalog entries in order and stops at the first hit', () => {
    const state = createTestState();
    const rng = new ScriptedRandom([0.99, 0, 0, 0]);

    const result = checkHealthIssues(state, rng);

    expect(result.onset?.issue).toBe('Muscle Strain/Joint Pain');
    expect(rng.consumed).toBe(4);
  });

  it('rolls every entry once when nothing hits', () => {
    const rng = new ScriptedRandom([0.99, 0.99, 0.99, 0.99, 0.99]);
    const result = checkHealthIssues(createTestState(), rng);

    expect(result).toEqual({ resolved: null, gated: false, onset: null });
    expect(rng.consumed).toBe(HEALTH_ISSUE_CATALOG.length);
  });

  it('draws nothing while an issue is active', () => {
    const state = createTestState();
    state.startIssue('Stress Headache', 3, 10);
    const rng = new ScriptedRandom([]);

    expect(checkHealthIssues(state, rng)).toEqual({ resolved: null, gated: true, onset: null });
    expect(rng.consumed).toBe(0);
  });

  it('resolves a due issue and stays gated through the cooldown', () => {
    const state = createTestState();
    state.startIssue('Stress Headache', 3, 10);
    state.advanceTo(3);

    const result = checkHealthIssues(state, new ScriptedRandom([]));

    expect(result).toEqual({ resolved: 'Stress Headache', gated: true, onset: null });
    expect(state.lastEvent()?.type).toBe('HEALTH_ISSUE_RESOLVED');
    expect(state.lastEvent()?.payload).toEqual({ issue: 'Stress Headache' });
  });

  it('rolls again once the cooldown has passed', () => {
    const state = createTestState();
    state.startIssue('Stress Headache', 3, 10);
    state.advanceTo(3);
    checkHealthIssues(state, new ScriptedRandom([]));

    state.advanceTo(10);
    const rng = new ScriptedRandom([], 0.99);
    expect(checkHealthIssues(state, rng).gated).toBe(false);
  });
});

describe('healthIssuesProcess', () => {
  it('keeps at most one issue and respects cooldowns over a long run', async () => {
    const ctx = createProcessContext(new SeededRandom(7));
    // Raise every probability by keeping recovery low and the member away
    ctx.state.recordWearable('recovery_score', 10);
    ctx.state.startTravel('UK');
    ctx.scheduler.spawn('health-issues', healthIssuesProcess(ctx));

    await ctx.scheduler.run(400);

    const events = ctx.state.eventLog.all().filter(
      (e) => e.type === 'HEALTH_ISSUE' || e.type === 'HEALTH_ISSUE_RESOLVED'
    );
    expect(events.length).toBeGreaterThan(0);

    let active: string | null = null;
    let cooldownUntil = -Infinity;
    for (const event of events) {
      if (event.type === 'HEALTH_ISSUE') {
        expect(active).toBeNull();
        expect(event.day).toBeGreaterThanOrEqual(cooldownUntil);
        active = String(event.payload['issue']);
        cooldownUntil = Number(event.payload['cooldownUntil']);
      } else {
        expect(event.payload['issue']).toBe(active);
        active = null;
      }
    }
  });

  it('waits for the start delay before the first check', async () => {
    const ctx = createProcessContext(new ScriptedRandom([0, 0, 0]));
    ctx.scheduler.spawn('health-issues', healthIssuesProcess(ctx));

    await ctx.scheduler.run(2);
    expect(ctx.state.eventLog.ofType('HEALTH_ISSUE')).toHaveLength(0);

    await ctx.scheduler.run(2.5);
    expect(ctx.state.eventLog.ofType('HEALTH_ISSUE').map((e) => e.day)).toEqual([2]);
  });
});
