import { describe, it, expect } from 'vitest';
import {
  ILLNESS_VITAL_MODIFIER,
  refreshWearables,
  wearableStreamProcess,
} from '../../../src/processes/wearable-stream.js';
import { createProcessContext, createTestState } from '../../helpers/factories.js';
import { ScriptedRandom } from '../../helpers/scripted-random.js';

describe('refreshWearables', () => {
  it('centres readings on the baseline at day 0', () => {
    const state = createTestState();
    const reading = refreshWearables(state, new ScriptedRandom([0.5, 0.5]));

    expect(reading).toEqual({ hrv: 45, recoveryScore: 70 });
    expect(state.healthData.wearableStream).toEqual({ hrv: 45, recovery_score: 70 });
  });

  it('lowers recovery while traveling and damps both vitals during illness', () => {
    const state = createTestState();
    state.advanceTo(30);
    state.startTravel('UK');
    state.startIssue('Stress Headache', 32, 40);

    // HRV: (45 + 1) * 0.6 - 5 = 22.6; recovery: (70 - 20 - 15) * 0.6 = 21
    expect(ILLNESS_VITAL_MODIFIER).toBe(0.6);
    expect(refreshWearables(state, new ScriptedRandom([0, 0]))).toEqual({
      hrv: 22.6,
      recoveryScore: 21,
    });
  });

  it('draws recovery up to baseline plus 15', () => {
    const state = createTestState();
    const reading = refreshWearables(state, new ScriptedRandom([0.5, 0.999999]));
    expect(reading.recoveryScore).toBe(85);
  });
});

describe('wearableStreamProcess', () => {
  it('refreshes every quarter day', async () => {
    const ctx = createProcessContext(new ScriptedRandom([], 0.5));
    ctx.scheduler.spawn('wearable-stream', wearableStreamProcess(ctx));

    await ctx.scheduler.run(0.2);
    expect(ctx.state.healthData.wearableStream).toEqual({});

    await ctx.scheduler.run(1.1);
    expect(ctx.state.wearable('hrv', 0)).toBe(45);
    expect(ctx.state.wearable('recovery_score', 0)).toBe(70);
  });
});
