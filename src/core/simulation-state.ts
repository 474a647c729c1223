import type { DateTime } from 'luxon';
import type {
  AdherenceStatus,
  EventPayload,
  EventType,
  HealthData,
  InterventionPlan,
  LabResults,
  Logistics,
  MemberProfile,
  NarrativeFlags,
  SimEvent,
  TimelinePhase,
  ActionOutcome,
} from '../types/index.js';
import { EventLog } from './event-log.js';
import { StateTransitionError } from './errors.js';

/**
 * Number of authored messages kept per responder.
 */
export const AGENT_MEMORY_DEPTH = 5;

/**
 * Flag names (as collaborators spell them) owned by the engine.
 * Actions may not overwrite these.
 */
export const ENGINE_OWNED_FLAGS: ReadonlySet<string> = new Set([
  'status',
  'active_issue',
  'issue_resolves_on',
  'issue_cooldown_until',
  'onboarding_docs_sent',
  'travel_check_in_sent',
  'adherence_check_sent',
  'wellness_check_sent_day',
]);

/**
 * Options for creating the world state.
 */
export interface SimulationStateOptions {
  memberProfile: MemberProfile;
  homeLocation: string;
  startDate: DateTime;
}

/**
 * Shared mutable world state.
 *
 * One instance per run, passed to every process. All mutations go through
 * the named transition methods below so invariants stay checkable in one place.
 */
export class SimulationState {
  private day = 0;

  readonly memberProfile: MemberProfile;
  readonly healthData: HealthData = {
    wearableStream: {},
    labResults: null,
    subjectiveReports: [],
  };
  readonly interventionPlan: InterventionPlan = {
    adherenceStatus: 'ON_TRACK',
    lastExerciseUpdateDay: 0,
  };
  readonly logistics: Logistics;
  readonly narrativeFlags: NarrativeFlags = {
    lifecycle: {
      onboardingDocsSent: false,
      consultationScheduled: false,
      travelCheckInSent: false,
      adherenceCheckSent: false,
    },
    dynamic: {},
  };
  readonly eventLog: EventLog;

  private readonly homeLocation: string;
  private readonly agentMemory = new Map<string, string[]>();

  constructor(options: SimulationStateOptions) {
    this.memberProfile = options.memberProfile;
    this.homeLocation = options.homeLocation;
    this.logistics = { location: options.homeLocation, isTraveling: false };
    this.eventLog = new EventLog(options.startDate);
  }

  get currentDay(): number {
    return this.day;
  }

  /**
   * Move the mirrored clock forward. Only the scheduler calls this.
   */
  advanceTo(day: number): void {
    if (day < this.day) {
      throw new StateTransitionError(
        `Clock cannot move backwards (${String(this.day)} -> ${String(day)})`
      );
    }
    this.day = day;
  }

  /**
   * Append an event stamped with the current day.
   */
  log(type: EventType, source: string, payload: EventPayload = {}): SimEvent {
    return this.eventLog.append(this.day, type, source, payload);
  }

  /**
   * Display timestamp of the current simulated instant.
   */
  currentTimestamp(): string {
    return this.eventLog.timestampFor(this.day);
  }

  lastEvent(): SimEvent | undefined {
    return this.eventLog.last();
  }

  // Timeline

  get status(): TimelinePhase | undefined {
    return this.narrativeFlags.lifecycle.status;
  }

  setStatus(phase: TimelinePhase): void {
    this.narrativeFlags.lifecycle.status = phase;
  }

  // Health issues

  get activeIssue(): string | undefined {
    return this.narrativeFlags.lifecycle.activeIssue;
  }

  isInCooldown(): boolean {
    const until = this.narrativeFlags.lifecycle.issueCooldownUntil;
    return until !== undefined && this.day < until;
  }

  /**
   * Start a health issue. Throws if one is active or a cooldown is running.
   */
  startIssue(issue: string, resolvesOn: number, cooldownUntil: number): void {
    const flags = this.narrativeFlags.lifecycle;
    if (flags.activeIssue !== undefined) {
      throw new StateTransitionError(
        `Cannot start "${issue}" while "${flags.activeIssue}" is active`
      );
    }
    if (this.isInCooldown()) {
      throw new StateTransitionError(`Cannot start "${issue}" during issue cooldown`);
    }
    if (resolvesOn <= this.day || cooldownUntil < resolvesOn) {
      throw new StateTransitionError(
        `Invalid issue window: resolves ${String(resolvesOn)}, cooldown ${String(cooldownUntil)}`
      );
    }
    flags.activeIssue = issue;
    flags.issueResolvesOn = resolvesOn;
    flags.issueCooldownUntil = cooldownUntil;
  }

  /**
   * Resolve the active issue if its window has elapsed.
   * Returns the resolved issue name, if any.
   */
  resolveIssueIfDue(): string | undefined {
    const flags = this.narrativeFlags.lifecycle;
    const issue = flags.activeIssue;
    if (issue === undefined) return undefined;
    if (flags.issueResolvesOn !== undefined && this.day < flags.issueResolvesOn) {
      return undefined;
    }
    delete flags.activeIssue;
    delete flags.issueResolvesOn;
    return issue;
  }

  // Adherence

  setAdherence(status: AdherenceStatus): void {
    this.interventionPlan.adherenceStatus = status;
  }

  // Periodic processes

  recordLabResults(results: LabResults): void {
    this.healthData.labResults = { ...results };
  }

  recordExerciseUpdate(): void {
    this.interventionPlan.lastExerciseUpdateDay = this.day;
  }

  startTravel(location: string): void {
    this.logistics.isTraveling = true;
    this.logistics.location = location;
  }

  endTravel(): string {
    this.logistics.isTraveling = false;
    this.logistics.location = this.homeLocation;
    return this.homeLocation;
  }

  recordWearable(metric: string, value: number): void {
    this.healthData.wearableStream[metric] = value;
  }

  /**
   * Latest reading for a metric, or `fallback` when none exists yet.
   */
  wearable(metric: string, fallback: number): number {
    return this.healthData.wearableStream[metric] ?? fallback;
  }

  // One-shot dialogue flags

  markOnboardingDocsSent(): void {
    this.narrativeFlags.lifecycle.onboardingDocsSent = true;
  }

  setTravelCheckInSent(sent: boolean): void {
    this.narrativeFlags.lifecycle.travelCheckInSent = sent;
  }

  setAdherenceCheckSent(sent: boolean): void {
    this.narrativeFlags.lifecycle.adherenceCheckSent = sent;
  }

  setWellnessCheckSentDay(day: number | undefined): void {
    if (day === undefined) {
      delete this.narrativeFlags.lifecycle.wellnessCheckSentDay;
    } else {
      this.narrativeFlags.lifecycle.wellnessCheckSentDay = day;
    }
  }

  /**
   * Write a flag on behalf of a collaborator action.
   *
   * Engine-owned lifecycle flags are refused; `consultation_scheduled` maps to
   * its typed field; anything else lands in the dynamic map.
   */
  setNarrativeFlag(flag: string, value: unknown): ActionOutcome {
    if (ENGINE_OWNED_FLAGS.has(flag)) {
      return { applied: false, reason: `"${flag}" is managed by the engine` };
    }
    if (flag === '__proto__') {
      return { applied: false, reason: '"__proto__" is not a valid flag name' };
    }
    if (flag === 'consultation_scheduled') {
      if (typeof value !== 'boolean') {
        return { applied: false, reason: '"consultation_scheduled" expects a boolean' };
      }
      this.narrativeFlags.lifecycle.consultationScheduled = value;
      return { applied: true };
    }
    this.narrativeFlags.dynamic[flag] = value;
    return { applied: true };
  }

  /**
   * Flags keyed the way collaborators see them.
   */
  narrativeFlagsSnapshot(): Record<string, unknown> {
    const flags = this.narrativeFlags.lifecycle;
    const snapshot: Record<string, unknown> = {
      onboarding_docs_sent: flags.onboardingDocsSent,
      consultation_scheduled: flags.consultationScheduled,
      travel_check_in_sent: flags.travelCheckInSent,
      adherence_check_sent: flags.adherenceCheckSent,
    };
    if (flags.status !== undefined) snapshot['status'] = flags.status;
    if (flags.activeIssue !== undefined) snapshot['active_issue'] = flags.activeIssue;
    if (flags.issueResolvesOn !== undefined) snapshot['issue_resolves_on'] = flags.issueResolvesOn;
    if (flags.issueCooldownUntil !== undefined) {
      snapshot['issue_cooldown_until'] = flags.issueCooldownUntil;
    }
    if (flags.wellnessCheckSentDay !== undefined) {
      snapshot['wellness_check_sent_day'] = flags.wellnessCheckSentDay;
    }
    return { ...structuredClone(this.narrativeFlags.dynamic), ...snapshot };
  }

  // Agent memory

  /**
   * Record a message authored by `responder`, keeping the last few.
   */
  remember(responder: string, message: string): void {
    const memory = this.agentMemory.get(responder) ?? [];
    memory.push(message);
    if (memory.length > AGENT_MEMORY_DEPTH) {
      memory.splice(0, memory.length - AGENT_MEMORY_DEPTH);
    }
    this.agentMemory.set(responder, memory);
  }

  recentMessagesBy(responder: string): readonly string[] {
    return this.agentMemory.get(responder) ?? [];
  }
}
