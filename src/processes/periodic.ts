/**
 * Periodic processes started by the timeline when Intervention begins.
 */

import { SIM_CORE_SOURCE } from '../types/index.js';
import type { LabResults } from '../types/index.js';
import type { SimProcess } from '../core/scheduler.js';
import type { RandomSource } from '../core/random.js';
import { choice, randomInt, round1, uniform } from '../core/random.js';
import type { ProcessContext } from './types.js';

/**
 * Draw a fresh diagnostic panel for `day`.
 */
export function drawLabResults(rng: RandomSource, day: number): LabResults {
  const cholesterol = round1(uniform(rng, 150, 220));
  const systolic = randomInt(rng, 110, 130);
  const diastolic = randomInt(rng, 70, 85);
  return {
    cholesterol,
    bloodPressure: `${String(systolic)}/${String(diastolic)}`,
    lastTestDay: day,
  };
}

export async function* diagnosticProcess(ctx: ProcessContext): SimProcess {
  const { state, rng, settings } = ctx;
  for (;;) {
    yield settings.schedule.diagnosticIntervalDays;

    const results = drawLabResults(rng, state.currentDay);
    state.recordLabResults(results);
    state.log('DIAGNOSTIC_TEST', SIM_CORE_SOURCE, {
      description: 'Quarterly diagnostic test panel completed',
      labResults: { ...results },
    });
  }
}

export async function* exerciseRefreshProcess(ctx: ProcessContext): SimProcess {
  const { state, settings } = ctx;
  for (;;) {
    yield settings.schedule.exerciseRefreshDays;

    state.recordExerciseUpdate();
    state.log('PLAN_UPDATE', SIM_CORE_SOURCE, {
      plan: 'exercise',
      description: 'Exercise plan updated',
    });
  }
}

/**
 * Travel cycle: home for `travelHomeDays`, then away for `travelAwayDays`.
 */
export async function* travelProcess(ctx: ProcessContext): SimProcess {
  const { state, rng, settings } = ctx;
  for (;;) {
    yield settings.schedule.travelHomeDays;

    const destination = choice(rng, settings.travel.locations);
    state.startTravel(destination);
    state.log('TRAVEL_START', SIM_CORE_SOURCE, { location: destination });

    yield settings.schedule.travelAwayDays;

    const home = state.endTravel();
    state.log('TRAVEL_END', SIM_CORE_SOURCE, { location: home });
  }
}
