/**
 * Event log types.
 *
 * The event log is the primary output of a run: every state transition,
 * message and collaborator fault lands here in simulated-time order.
 */

/**
 * All event kinds the engine emits.
 */
export const EVENT_TYPES = [
  'SIM_START',
  'SIM_END',
  'STATE_CHANGE',
  'DIAGNOSTIC_TEST',
  'PLAN_UPDATE',
  'TRAVEL_START',
  'TRAVEL_END',
  'HEALTH_ISSUE',
  'HEALTH_ISSUE_RESOLVED',
  'POSITIVE_MILESTONE',
  'MESSAGE',
  'ROUTING',
  'ACTION_EXECUTED',
  'ERROR',
  'DIALOG_INTERVENTION',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

/**
 * Free-form event payload.
 */
export type EventPayload = Record<string, unknown>;

/**
 * Source used for events the engine itself produces.
 */
export const SIM_CORE_SOURCE = 'SIM_CORE';

/**
 * A single logged event.
 */
export interface SimEvent {
  /** Simulated day (unrounded; rounded to 2 decimals on serialization) */
  day: number;
  /** Display timestamp derived from the run's start date */
  timestamp: string;
  type: EventType;
  /** Responder, member or SIM_CORE */
  source: string;
  payload: EventPayload;
}

/**
 * Event as written to the persisted JSON log.
 */
export interface SerializedEvent extends SimEvent {
  /** Day rounded to 2 decimals */
  day: number;
}

/**
 * Read the text content of a MESSAGE event.
 * Returns an empty string for events without string content.
 */
export function getMessageContent(event: SimEvent): string {
  const content = event.payload['content'];
  return typeof content === 'string' ? content : '';
}

/**
 * Check whether an event is a MESSAGE.
 */
export function isMessageEvent(event: SimEvent | undefined): event is SimEvent {
  return event?.type === 'MESSAGE';
}
