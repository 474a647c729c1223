import { WEARABLE_METRICS } from '../types/index.js';
import type { SimulationState } from '../core/simulation-state.js';
import type { SimProcess } from '../core/scheduler.js';
import type { RandomSource } from '../core/random.js';
import { round1, uniform } from '../core/random.js';
import type { ProcessContext } from './types.js';

/** Vitals are damped to this fraction while a health issue is active. */
export const ILLNESS_VITAL_MODIFIER = 0.6;

export interface WearableReading {
  hrv: number;
  recoveryScore: number;
}

/**
 * Draw new HRV and recovery readings and store them on the state.
 *
 * HRV trends upward slowly over the engagement; recovery drops while traveling.
 */
export function refreshWearables(state: SimulationState, rng: RandomSource): WearableReading {
  const modifier = state.activeIssue !== undefined ? ILLNESS_VITAL_MODIFIER : 1.0;

  const baseHrv = (45 + state.currentDay / 30) * modifier;
  const hrv = round1(baseHrv + uniform(rng, -5, 5));

  const baseRecovery = 70 - (state.logistics.isTraveling ? 20 : 0);
  const recovery = Math.round((baseRecovery + uniform(rng, -15, 15)) * modifier);
  const recoveryScore = Math.max(0, Math.min(100, recovery));

  state.recordWearable(WEARABLE_METRICS.hrv, hrv);
  state.recordWearable(WEARABLE_METRICS.recoveryScore, recoveryScore);
  return { hrv, recoveryScore };
}

export async function* wearableStreamProcess(ctx: ProcessContext): SimProcess {
  for (;;) {
    yield ctx.settings.schedule.wearableRefreshDays;
    refreshWearables(ctx.state, ctx.rng);
  }
}
