/**
 * Actions returned by the response-generation collaborator.
 */

/**
 * Action exactly as parsed from a collaborator response.
 * `payload` is absent when the response was plain text.
 */
export interface RawAction {
  type: string;
  payload?: Record<string, unknown>;
}

/**
 * Action type meaning "no action".
 */
export const NO_ACTION = 'NONE';

/**
 * Action types the engine knows about.
 */
export const ACTION_TYPES = {
  none: NO_ACTION,
  updateNarrativeFlag: 'UPDATE_NARRATIVE_FLAG',
  initiateSickDayProtocol: 'INITIATE_SICK_DAY_PROTOCOL',
  flagForExpert: 'FLAG_FOR_EXPERT',
} as const;

/**
 * Engine-side view of an action.
 * Types without a built-in effect arrive as `unrecognized` with their raw payload.
 */
export type EngineAction =
  | { kind: 'none' }
  | { kind: 'update_narrative_flag'; flag: string; value: unknown }
  | { kind: 'invalid'; type: string; reason: string; payload: Record<string, unknown> }
  | { kind: 'unrecognized'; type: string; payload: Record<string, unknown> };

/**
 * Result of applying an action.
 */
export interface ActionOutcome {
  applied: boolean;
  reason?: string | undefined;
}
