/**
 * Health-issue engine.
 *
 * One global issue slot. Each daily check resolves a due issue, respects the
 * post-issue cooldown, then rolls onset for each catalog entry in order; the
 * first hit becomes the active issue.
 */

import { SIM_CORE_SOURCE, WEARABLE_METRICS } from '../types/index.js';
import type { AdherenceStatus } from '../types/index.js';
import type { SimulationState } from '../core/simulation-state.js';
import type { SimProcess } from '../core/scheduler.js';
import type { RandomSource } from '../core/random.js';
import { chance, randomInt } from '../core/random.js';
import type { ProcessContext } from './types.js';

/**
 * Additive risk modifiers for one issue kind.
 */
export interface RiskModifiers {
  traveling: number;
  lowRecovery: number;
  deviated: number;
}

export interface HealthIssueKind {
  name: string;
  baseProbability: number;
  modifiers: RiskModifiers;
}

/**
 * Issue catalog. Order matters: onset rolls run top to bottom.
 */
export const HEALTH_ISSUE_CATALOG: readonly HealthIssueKind[] = [
  {
    name: 'Minor Illness (Cold/Flu)',
    baseProbability: 0.005,
    modifiers: { traveling: 0.025, lowRecovery: 0.015, deviated: 0 },
  },
  {
    name: 'Muscle Strain/Joint Pain',
    baseProbability: 0.004,
    modifiers: { traveling: 0, lowRecovery: 0.02, deviated: 0 },
  },
  {
    name: 'Bout of Indigestion',
    baseProbability: 0.007,
    modifiers: { traveling: 0.03, lowRecovery: 0, deviated: 0.01 },
  },
  {
    name: 'Stress Headache',
    baseProbability: 0.006,
    modifiers: { traveling: 0.01, lowRecovery: 0.015, deviated: 0 },
  },
  {
    name: 'Blood Pressure Spike',
    baseProbability: 0.003,
    modifiers: { traveling: 0, lowRecovery: 0.01, deviated: 0.02 },
  },
];

/** Recovery below this counts as low. */
export const LOW_RECOVERY_THRESHOLD = 40;

/** Recovery assumed before the first wearable reading. */
const DEFAULT_RECOVERY_SCORE = 100;

export const ISSUE_DURATION_DAYS = { min: 2, max: 5 } as const;
export const ISSUE_COOLDOWN_DAYS = { min: 7, max: 14 } as const;

/**
 * Conditions that feed the risk modifiers.
 */
export interface TriggeringFactors {
  isTraveling: boolean;
  recoveryScore: number;
  adherence: AdherenceStatus;
}

export interface HealthIssueOnset {
  issue: string;
  durationDays: number;
  resolvesOn: number;
  cooldownUntil: number;
  factors: TriggeringFactors;
}

export interface HealthCheckResult {
  /** Issue resolved on this check, if any */
  resolved: string | null;
  /** True when onset was skipped because of an active issue or cooldown */
  gated: boolean;
  onset: HealthIssueOnset | null;
}

/**
 * Daily onset probability of `kind` under `factors`.
 */
export function onsetProbability(kind: HealthIssueKind, factors: TriggeringFactors): number {
  let probability = kind.baseProbability;
  if (factors.isTraveling) probability += kind.modifiers.traveling;
  if (factors.recoveryScore < LOW_RECOVERY_THRESHOLD) probability += kind.modifiers.lowRecovery;
  if (factors.adherence === 'DEVIATED') probability += kind.modifiers.deviated;
  return probability;
}

export function currentFactors(state: SimulationState): TriggeringFactors {
  return {
    isTraveling: state.logistics.isTraveling,
    recoveryScore: state.wearable(WEARABLE_METRICS.recoveryScore, DEFAULT_RECOVERY_SCORE),
    adherence: state.interventionPlan.adherenceStatus,
  };
}

/**
 * Run one daily health check against the state.
 */
export function checkHealthIssues(state: SimulationState, rng: RandomSource): HealthCheckResult {
  const resolved = state.resolveIssueIfDue() ?? null;
  if (resolved !== null) {
    state.log('HEALTH_ISSUE_RESOLVED', SIM_CORE_SOURCE, { issue: resolved });
  }

  if (state.activeIssue !== undefined || state.isInCooldown()) {
    return { resolved, gated: true, onset: null };
  }

  const factors = currentFactors(state);
  for (const kind of HEALTH_ISSUE_CATALOG) {
    if (!chance(rng, onsetProbability(kind, factors))) continue;

    const durationDays = randomInt(rng, ISSUE_DURATION_DAYS.min, ISSUE_DURATION_DAYS.max);
    const resolvesOn = state.currentDay + durationDays;
    const cooldownUntil =
      resolvesOn + randomInt(rng, ISSUE_COOLDOWN_DAYS.min, ISSUE_COOLDOWN_DAYS.max);

    state.startIssue(kind.name, resolvesOn, cooldownUntil);
    state.log('HEALTH_ISSUE', SIM_CORE_SOURCE, {
      issue: kind.name,
      triggeringFactors: { ...factors },
      durationDays,
      resolvesOn,
      cooldownUntil,
    });

    return {
      resolved,
      gated: false,
      onset: { issue: kind.name, durationDays, resolvesOn, cooldownUntil, factors },
    };
  }

  return { resolved, gated: false, onset: null };
}

export async function* healthIssuesProcess(ctx: ProcessContext): SimProcess {
  const { state, rng, settings } = ctx;
  const log = ctx.logger.child({ component: 'health-issues' });

  yield settings.schedule.healthCheckStartDelayDays;
  for (;;) {
    yield 1;
    const result = checkHealthIssues(state, rng);
    if (result.onset) {
      log.debug({ day: state.currentDay, ...result.onset }, 'Health issue started');
    }
  }
}
