export type { EventType, EventPayload, SimEvent, SerializedEvent } from './event.js';
export { EVENT_TYPES, SIM_CORE_SOURCE, getMessageContent, isMessageEvent } from './event.js';

export type {
  AdherenceStatus,
  TimelinePhase,
  CareRole,
  MemberProfile,
  LabResults,
  HealthData,
  InterventionPlan,
  Logistics,
  LifecycleFlags,
  NarrativeFlags,
} from './state.js';
export { CARE_ROLES, WEARABLE_METRICS } from './state.js';

export type { RawAction, EngineAction, ActionOutcome } from './action.js';
export { NO_ACTION, ACTION_TYPES } from './action.js';

export type { Logger, LogFn } from './logger.js';

export type { ConversationTurn, DistilledContext } from './context.js';
