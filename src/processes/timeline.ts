import { SIM_CORE_SOURCE } from '../types/index.js';
import type { SimProcess } from '../core/scheduler.js';
import { diagnosticProcess, exerciseRefreshProcess, travelProcess } from './periodic.js';
import type { ProcessContext } from './types.js';

/**
 * Timeline phase controller: Onboarding, then Intervention.
 *
 * Entering Intervention starts the periodic processes, in the order
 * diagnostic, exercise refresh, travel.
 */
export async function* timelineProcess(ctx: ProcessContext): SimProcess {
  const { state, scheduler, settings } = ctx;
  const log = ctx.logger.child({ component: 'timeline' });

  state.setStatus('Onboarding');
  state.log('STATE_CHANGE', SIM_CORE_SOURCE, {
    status: 'Onboarding',
    description: 'Onboarding started',
  });

  yield settings.simulation.onboardingDays;

  state.setStatus('Intervention');
  state.log('STATE_CHANGE', SIM_CORE_SOURCE, {
    status: 'Intervention',
    description: 'Main intervention phase started',
  });
  log.info({ day: state.currentDay }, 'Intervention phase started');

  scheduler.spawn('diagnostic', diagnosticProcess(ctx));
  scheduler.spawn('exercise-refresh', exerciseRefreshProcess(ctx));
  scheduler.spawn('travel', travelProcess(ctx));
}
