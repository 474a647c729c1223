/**
 * World-state types shared by every simulation process.
 */

/**
 * Whether the member currently follows the prescribed plan.
 */
export type AdherenceStatus = 'ON_TRACK' | 'DEVIATED';

/**
 * Engagement phase driven by the timeline controller.
 */
export type TimelinePhase = 'Onboarding' | 'Intervention';

/**
 * Care-team roles. Each role maps to one responder identity in config.
 */
export type CareRole = 'logistics' | 'physician' | 'data' | 'nutrition' | 'movement' | 'leadership';

export const CARE_ROLES: readonly CareRole[] = [
  'logistics',
  'physician',
  'data',
  'nutrition',
  'movement',
  'leadership',
];

/**
 * Immutable description of the simulated member.
 */
export interface MemberProfile {
  readonly name: string;
  readonly age: number;
  /** Ordered list of goals */
  readonly goals: readonly string[];
  readonly personality: string;
  readonly healthConditions: readonly string[];
}

/**
 * Wearable metric keys the engine reads and writes.
 */
export const WEARABLE_METRICS = {
  hrv: 'hrv',
  recoveryScore: 'recovery_score',
} as const;

/**
 * Results of the latest diagnostic panel.
 */
export interface LabResults {
  cholesterol: number;
  /** "systolic/diastolic" */
  bloodPressure: string;
  lastTestDay: number;
}

export interface HealthData {
  /** Latest reading per metric name */
  wearableStream: Record<string, number>;
  /** Null until the first diagnostic panel */
  labResults: LabResults | null;
  subjectiveReports: string[];
}

export interface InterventionPlan {
  adherenceStatus: AdherenceStatus;
  lastExerciseUpdateDay: number;
}

export interface Logistics {
  location: string;
  isTraveling: boolean;
}

/**
 * Lifecycle flags owned by the engine.
 * Every field here has a fixed meaning and a named transition on the state.
 */
export interface LifecycleFlags {
  status?: TimelinePhase | undefined;
  activeIssue?: string | undefined;
  issueResolvesOn?: number | undefined;
  issueCooldownUntil?: number | undefined;
  onboardingDocsSent: boolean;
  consultationScheduled: boolean;
  travelCheckInSent: boolean;
  adherenceCheckSent: boolean;
  wellnessCheckSentDay?: number | undefined;
}

/**
 * Narrative flags: typed lifecycle record plus a residual map
 * for keys created by collaborator actions.
 */
export interface NarrativeFlags {
  lifecycle: LifecycleFlags;
  dynamic: Record<string, unknown>;
}
