import { describe, it, expect, beforeEach } from 'vitest';
import { MilestoneDetector, milestoneProcess } from '../../../src/processes/milestones.js';
import type { SimulationState } from '../../../src/core/simulation-state.js';
import { createProcessContext, createTestState } from '../../helpers/factories.js';
import { ScriptedRandom } from '../../helpers/scripted-random.js';

function checkDays(detector: MilestoneDetector, state: SimulationState, days: number) {
  return Array.from({ length: days }, () => detector.check(state)).flat();
}

describe('MilestoneDetector', () => {
  let state: SimulationState;
  let detector: MilestoneDetector;

  beforeEach(() => {
    state = createTestState();
    detector = new MilestoneDetector();
  });

  describe('adherence streak', () => {
    it('fires after 30 consecutive on-track days', () => {
      expect(checkDays(detector, state, 29)).toEqual([]);
      expect(detector.streak).toBe(29);

      expect(detector.check(state)).toEqual([
        {
          kind: 'adherence_streak',
          threshold: 30,
          description: '30 consecutive days of adherence!',
        },
      ]);
      expect(state.lastEvent()?.payload).toEqual({
        milestone: '30 consecutive days of adherence!',
        kind: 'adherence_streak',
        threshold: 30,
      });
    });

    it('restarts the streak and raises the threshold after firing', () => {
      checkDays(detector, state, 30);
      expect(detector.streak).toBe(0);
      expect(detector.nextAdherenceThreshold).toBe(60);

      expect(checkDays(detector, state, 59)).toEqual([]);
      expect(detector.check(state).map((m) => m.threshold)).toEqual([60]);
    });

    it('resets the streak on a deviated day', () => {
      checkDays(detector, state, 20);
      state.setAdherence('DEVIATED');
      detector.check(state);
      expect(detector.streak).toBe(0);

      state.setAdherence('ON_TRACK');
      expect(checkDays(detector, state, 29)).toEqual([]);
      expect(detector.check(state)).toHaveLength(1);
    });
  });

  describe('HRV', () => {
    beforeEach(() => {
      state.setAdherence('DEVIATED');
    });

    it('requires the reading to strictly exceed the threshold', () => {
      state.recordWearable('hrv', 50);
      expect(detector.check(state)).toEqual([]);

      state.recordWearable('hrv', 50.1);
      expect(detector.check(state)).toEqual([
        { kind: 'hrv', threshold: 50, description: 'Daily HRV surpassed 50!' },
      ]);
      expect(detector.nextHrvThreshold).toBe(55);
    });

    it('fires each threshold at most once', () => {
      state.recordWearable('hrv', 53);
      expect(detector.check(state)).toHaveLength(1);
      expect(detector.check(state)).toEqual([]);

      state.recordWearable('hrv', 40);
      detector.check(state);
      state.recordWearable('hrv', 53);
      expect(detector.check(state)).toEqual([]);
    });

    it('advances one threshold per check', () => {
      state.recordWearable('hrv', 70);
      expect(detector.check(state).map((m) => m.threshold)).toEqual([50]);
      expect(detector.check(state).map((m) => m.threshold)).toEqual([55]);
    });
  });
});

describe('milestoneProcess', () => {
  it('logs the first adherence milestone on day 30', async () => {
    const ctx = createProcessContext(new ScriptedRandom([]));
    ctx.scheduler.spawn('milestones', milestoneProcess(ctx));

    await ctx.scheduler.run(31);

    const milestones = ctx.state.eventLog.ofType('POSITIVE_MILESTONE');
    expect(milestones.map((e) => e.day)).toEqual([30]);
  });
});
