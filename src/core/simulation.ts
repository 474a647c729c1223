/**
 * Simulation run orchestration.
 *
 * Builds the world state, registers processes in a fixed order, runs the
 * scheduler to the horizon and brackets the log with SIM_START / SIM_END.
 *
 * Registration order (ties at equal times run in this order):
 *   timeline, wearable-stream, health-issues, milestones,
 *   member, proactive-triggers (the last two only with collaborators)
 */

import type { SimulationSettings } from '../config/index.js';
import { createActionExecutor, type ActionExecutor } from '../dialogue/index.js';
import type { Collaborators } from '../ports/index.js';
import {
  healthIssuesProcess,
  memberProcess,
  milestoneProcess,
  proactiveTriggerProcess,
  timelineProcess,
  wearableStreamProcess,
  type DialogueContext,
  type ProcessContext,
} from '../processes/index.js';
import { SIM_CORE_SOURCE } from '../types/index.js';
import type { Logger } from '../types/index.js';
import { errorMessage } from './errors.js';
import { parseStartDate } from './event-log.js';
import type { RandomSource } from './random.js';
import { Scheduler } from './scheduler.js';
import { SimulationState } from './simulation-state.js';

export type SimulationMode = 'dialogue' | 'des-only';

export interface RunSimulationOptions {
  settings: SimulationSettings;
  rng: RandomSource;
  logger: Logger;
  /** Omit (or pass null) for a collaborator-free run */
  collaborators?: Collaborators | null | undefined;
  actionExecutor?: ActionExecutor | undefined;
  /** Recorded in SIM_START */
  seed?: number | undefined;
}

export interface SimulationResult {
  state: SimulationState;
  mode: SimulationMode;
  horizonDays: number;
  /** Process failures reported by the scheduler */
  processErrors: number;
}

/**
 * Fresh world state for a run.
 */
export function createSimulationState(settings: SimulationSettings): SimulationState {
  return new SimulationState({
    memberProfile: settings.member.profile,
    homeLocation: settings.travel.homeLocation,
    startDate: parseStartDate(settings.simulation.startDate),
  });
}

/**
 * Run one simulation to the configured horizon.
 */
export async function runSimulation(options: RunSimulationOptions): Promise<SimulationResult> {
  const { settings, rng } = options;
  const logger = options.logger.child({ component: 'simulation' });
  const horizonDays = settings.simulation.horizonDays;
  const collaborators = options.collaborators ?? null;
  const mode: SimulationMode = collaborators ? 'dialogue' : 'des-only';

  const state = createSimulationState(settings);
  let processErrors = 0;

  const scheduler = new Scheduler({
    logger,
    onAdvance: (now) => {
      state.advanceTo(now);
    },
    onError: (taskName, error) => {
      processErrors++;
      state.log('ERROR', SIM_CORE_SOURCE, {
        process: taskName,
        stage: 'process',
        error: errorMessage(error),
      });
    },
  });

  const ctx: ProcessContext = { state, scheduler, rng, settings, logger };

  state.log('SIM_START', SIM_CORE_SOURCE, {
    mode,
    horizonDays,
    member: settings.member.profile.name,
    ...(options.seed !== undefined && { seed: options.seed }),
  });

  scheduler.spawn('timeline', timelineProcess(ctx));
  scheduler.spawn('wearable-stream', wearableStreamProcess(ctx));
  scheduler.spawn('health-issues', healthIssuesProcess(ctx));
  scheduler.spawn('milestones', milestoneProcess(ctx));

  if (collaborators) {
    const dialogue: DialogueContext = {
      ...ctx,
      generator: collaborators.generator,
      router: collaborators.router,
      actionExecutor: options.actionExecutor ?? createActionExecutor({ logger }),
    };
    scheduler.spawn('member', memberProcess(dialogue));
    scheduler.spawn('proactive-triggers', proactiveTriggerProcess(dialogue));
  }

  logger.info({ mode, horizonDays, seed: options.seed }, 'Simulation started');

  await scheduler.run(horizonDays);

  state.log('SIM_END', SIM_CORE_SOURCE, {
    day: horizonDays,
    events: state.eventLog.length,
  });

  logger.info(
    { events: state.eventLog.length, processErrors, day: state.currentDay },
    'Simulation finished'
  );

  return { state, mode, horizonDays, processErrors };
}
