/**
 * Proactive trigger resolver.
 *
 * Once a day, decides whether a care-team member reaches out unprompted, who,
 * and why. Branches are checked in strict priority order and at most one fires.
 */

import type { SimulationSettings } from '../config/index.js';
import type { SimulationState } from '../core/simulation-state.js';
import type { SimProcess } from '../core/scheduler.js';
import type { RandomSource } from '../core/random.js';
import { chance } from '../core/random.js';
import { askResponder } from '../dialogue/index.js';
import { SIM_CORE_SOURCE, WEARABLE_METRICS } from '../types/index.js';
import type { CareRole } from '../types/index.js';
import type { DialogueContext } from './types.js';
import { responderFor } from './types.js';

/** Consecutive deviated days before the adherence check-in. */
export const ADHERENCE_CHECK_AFTER_DAYS = 3;

/** Recovery below this triggers the data responder. */
export const CRITICAL_RECOVERY_THRESHOLD = 30;

export type TriggerBranch =
  | 'travel_check_in'
  | 'onboarding_docs'
  | 'health_issue'
  | 'milestone'
  | 'adherence_check'
  | 'wellness_check'
  | 'low_recovery'
  | 'exercise_check_in'
  | 'nutrition_review'
  | 'quarterly_review';

export interface TriggerDecision {
  branch: TriggerBranch;
  role: CareRole;
  responder: string;
  trigger: string;
}

/**
 * Care role that handles an issue, by keyword in the issue name.
 */
export function responderRoleForIssue(issue: string): CareRole {
  if (issue.includes('Strain')) return 'movement';
  if (issue.includes('Illness') || issue.includes('Pressure')) return 'physician';
  if (issue.includes('Indigestion')) return 'nutrition';
  return 'physician';
}

function issueTrigger(member: string, issue: string, role: CareRole): string {
  switch (role) {
    case 'movement':
      return `Health alert: ${member} has '${issue}'. Provide guidance.`;
    case 'nutrition':
      return `Health alert: ${member} reports '${issue}'. Advise on diet.`;
    default:
      return `Health alert: ${member} has '${issue}'. Check symptoms.`;
  }
}

function isDue(day: number, interval: number): boolean {
  return day > 0 && day % interval < 1;
}

export class ProactiveTriggerResolver {
  private daysDeviated = 0;

  constructor(
    private readonly settings: SimulationSettings,
    private readonly rng: RandomSource
  ) {}

  /** Consecutive days the adherence roll came up deviated. */
  get deviationStreak(): number {
    return this.daysDeviated;
  }

  /**
   * Daily adherence roll. Runs every day whichever branch fires.
   */
  rollAdherence(state: SimulationState): void {
    const deviated = chance(this.rng, 1 - this.settings.member.adherenceProbability);
    if (deviated) {
      this.daysDeviated++;
      state.setAdherence('DEVIATED');
    } else {
      this.daysDeviated = 0;
      state.setAdherence('ON_TRACK');
    }
  }

  /**
   * Clear one-shot flags whose condition has lapsed.
   */
  clearExpiredFlags(state: SimulationState): void {
    const flags = state.narrativeFlags.lifecycle;
    if (flags.travelCheckInSent && !state.logistics.isTraveling) {
      state.setTravelCheckInSent(false);
    }
    if (flags.adherenceCheckSent && this.daysDeviated === 0) {
      state.setAdherenceCheckSent(false);
    }
    if (flags.wellnessCheckSentDay !== undefined && state.currentDay > flags.wellnessCheckSentDay) {
      state.setWellnessCheckSentDay(undefined);
    }
  }

  /**
   * First matching branch, or null. Marks one-shot flags for the branch that fires.
   */
  resolve(state: SimulationState): TriggerDecision | null {
    const { settings } = this;
    const { schedule } = settings;
    const member = state.memberProfile.name;
    const day = state.currentDay;
    const flags = state.narrativeFlags.lifecycle;
    const decide = (branch: TriggerBranch, role: CareRole, trigger: string): TriggerDecision => ({
      branch,
      role,
      responder: responderFor(settings, role),
      trigger,
    });

    if (state.logistics.isTraveling && !flags.travelCheckInSent) {
      state.setTravelCheckInSent(true);
      return decide(
        'travel_check_in',
        'logistics',
        `Travel check-in: ${member} is traveling to ${state.logistics.location}. Confirm logistics and adjust the plan for the trip.`
      );
    }

    if (state.status === 'Onboarding' && !flags.onboardingDocsSent) {
      state.markOnboardingDocsSent();
      return decide(
        'onboarding_docs',
        'logistics',
        `Action: Send the onboarding documents and data request to ${member}.`
      );
    }

    const issue = state.activeIssue;
    if (issue !== undefined) {
      const role = responderRoleForIssue(issue);
      return decide('health_issue', role, issueTrigger(member, issue, role));
    }

    const last = state.lastEvent();
    if (last?.type === 'POSITIVE_MILESTONE') {
      const milestone = last.payload['milestone'];
      return decide(
        'milestone',
        'leadership',
        `Team alert: ${member} achieved milestone: "${typeof milestone === 'string' ? milestone : 'milestone reached'}". Send congratulations.`
      );
    }

    if (this.daysDeviated >= ADHERENCE_CHECK_AFTER_DAYS && !flags.adherenceCheckSent) {
      state.setAdherenceCheckSent(true);
      return decide(
        'adherence_check',
        'logistics',
        `Proactive check-in: ${member} has been off plan for ${String(this.daysDeviated)} days. Check in on plan adherence.`
      );
    }

    if (isDue(day, schedule.wellnessCheckDays) && flags.wellnessCheckSentDay === undefined) {
      state.setWellnessCheckSentDay(day);
      return decide('wellness_check', 'logistics', 'Proactive check-in: general wellness check.');
    }

    const recovery = state.wearable(WEARABLE_METRICS.recoveryScore, 100);
    if (recovery < CRITICAL_RECOVERY_THRESHOLD) {
      return decide(
        'low_recovery',
        'data',
        `Critical alert: recovery score is very low (${String(recovery)}).`
      );
    }

    if (Math.abs(day - state.interventionPlan.lastExerciseUpdateDay) < 1) {
      return decide(
        'exercise_check_in',
        'movement',
        'Proactive check-in: exercise plan updated. How are the new workouts going?'
      );
    }

    if (isDue(day, schedule.nutritionReviewDays)) {
      return decide('nutrition_review', 'nutrition', 'Proactive check-in: bi-weekly nutrition review.');
    }

    if (isDue(day, schedule.strategicReviewDays)) {
      const goals = state.memberProfile.goals
        .map((goal, i) => `${String(i + 1)}) ${goal}`)
        .join('; ');
      return decide(
        'quarterly_review',
        'leadership',
        `Proactive review: quarterly strategic review. Review progress against ${member}'s goals: ${goals}`
      );
    }

    return null;
  }

  /**
   * One daily tick: bookkeeping, then branch resolution.
   */
  tick(state: SimulationState): TriggerDecision | null {
    this.rollAdherence(state);
    this.clearExpiredFlags(state);
    return this.resolve(state);
  }
}

export async function* proactiveTriggerProcess(ctx: DialogueContext): SimProcess {
  const { state, rng, settings } = ctx;
  const logger = ctx.logger.child({ component: 'proactive-triggers' });
  const resolver = new ProactiveTriggerResolver(settings, rng);
  const deps = {
    state,
    generator: ctx.generator,
    actionExecutor: ctx.actionExecutor,
    logger,
  };

  for (;;) {
    yield 1;

    const decision = resolver.tick(state);
    if (!decision) continue;

    state.log('DIALOG_INTERVENTION', SIM_CORE_SOURCE, {
      branch: decision.branch,
      responder: decision.responder,
      trigger: decision.trigger,
    });
    logger.debug({ day: state.currentDay, ...decision }, 'Proactive trigger fired');

    await askResponder(deps, decision.responder, decision.trigger);
  }
}
