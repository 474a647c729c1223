import { SIM_CORE_SOURCE, WEARABLE_METRICS } from '../types/index.js';
import type { SimulationState } from '../core/simulation-state.js';
import type { SimProcess } from '../core/scheduler.js';
import type { ProcessContext } from './types.js';

export const ADHERENCE_MILESTONE_STEP_DAYS = 30;
export const HRV_MILESTONE_START = 50;
export const HRV_MILESTONE_STEP = 5;

export type MilestoneKind = 'adherence_streak' | 'hrv';

export interface Milestone {
  kind: MilestoneKind;
  threshold: number;
  description: string;
}

/**
 * Tracks the two milestone ratchets.
 *
 * Adherence: consecutive ON_TRACK days; fires at 30, then 60, 90, ...
 * with the streak restarting after every firing.
 * HRV: fires when the latest reading strictly exceeds the threshold, which
 * then rises by 5 and never comes back down.
 */
export class MilestoneDetector {
  private adherenceThreshold = ADHERENCE_MILESTONE_STEP_DAYS;
  private daysOnTrack = 0;
  private hrvThreshold = HRV_MILESTONE_START;

  get streak(): number {
    return this.daysOnTrack;
  }

  get nextAdherenceThreshold(): number {
    return this.adherenceThreshold;
  }

  get nextHrvThreshold(): number {
    return this.hrvThreshold;
  }

  /**
   * Daily check. Logs and returns the milestones reached.
   */
  check(state: SimulationState): Milestone[] {
    const reached: Milestone[] = [];

    if (state.interventionPlan.adherenceStatus === 'ON_TRACK') {
      this.daysOnTrack++;
    } else {
      this.daysOnTrack = 0;
    }

    if (this.daysOnTrack >= this.adherenceThreshold) {
      reached.push({
        kind: 'adherence_streak',
        threshold: this.adherenceThreshold,
        description: `${String(this.adherenceThreshold)} consecutive days of adherence!`,
      });
      this.daysOnTrack = 0;
      this.adherenceThreshold += ADHERENCE_MILESTONE_STEP_DAYS;
    }

    const hrv = state.wearable(WEARABLE_METRICS.hrv, 0);
    if (hrv > this.hrvThreshold) {
      reached.push({
        kind: 'hrv',
        threshold: this.hrvThreshold,
        description: `Daily HRV surpassed ${String(this.hrvThreshold)}!`,
      });
      this.hrvThreshold += HRV_MILESTONE_STEP;
    }

    for (const milestone of reached) {
      state.log('POSITIVE_MILESTONE', SIM_CORE_SOURCE, {
        milestone: milestone.description,
        kind: milestone.kind,
        threshold: milestone.threshold,
      });
    }
    return reached;
  }
}

export async function* milestoneProcess(ctx: ProcessContext): SimProcess {
  const detector = new MilestoneDetector();
  for (;;) {
    yield 1;
    detector.check(ctx.state);
  }
}
