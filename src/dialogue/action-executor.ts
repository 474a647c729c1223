/**
 * Action executor.
 *
 * Maps parsed actions onto engine effects and records every non-NONE action
 * as an ACTION_EXECUTED event.
 */

import type { SimulationState } from '../core/simulation-state.js';
import type { ActionOutcome, EngineAction, Logger, RawAction } from '../types/index.js';
import { ACTION_TYPES } from '../types/index.js';

/**
 * Effect for an action type without a built-in handler.
 */
export type ActionHandler = (
  payload: Record<string, unknown>,
  state: SimulationState,
  source: string
) => ActionOutcome;

export interface ActionExecutorOptions {
  logger?: Logger | undefined;
  /** Extra handlers keyed by upper-case action type */
  handlers?: Readonly<Record<string, ActionHandler>> | undefined;
}

/**
 * Classify a raw action.
 */
export function toEngineAction(raw: RawAction): EngineAction {
  const type = raw.type.toUpperCase();
  const payload = raw.payload ?? {};

  if (type === ACTION_TYPES.none) {
    return { kind: 'none' };
  }

  if (type === ACTION_TYPES.updateNarrativeFlag) {
    const flag = payload['flag'];
    if (typeof flag !== 'string' || flag.trim() === '') {
      return { kind: 'invalid', type, reason: 'payload.flag must be a non-empty string', payload };
    }
    if (!('value' in payload)) {
      return { kind: 'invalid', type, reason: 'payload.value is missing', payload };
    }
    return { kind: 'update_narrative_flag', flag: flag.trim(), value: payload['value'] };
  }

  return { kind: 'unrecognized', type, payload };
}

export class ActionExecutor {
  private readonly logger?: Logger | undefined;
  private readonly handlers: Readonly<Record<string, ActionHandler>>;

  constructor(options: ActionExecutorOptions = {}) {
    this.logger = options.logger?.child({ component: 'action-executor' });
    this.handlers = options.handlers ?? {};
  }

  /**
   * Apply an action on behalf of `source`.
   * Returns null for NONE, which is neither applied nor logged.
   */
  execute(state: SimulationState, source: string, raw: RawAction): ActionOutcome | null {
    const action = toEngineAction(raw);
    if (action.kind === 'none') {
      return null;
    }

    const type = raw.type.toUpperCase();
    const payload = raw.payload ?? {};
    const outcome = this.apply(state, source, action);

    const eventPayload: Record<string, unknown> = {
      action: type,
      payload,
      applied: outcome.applied,
    };
    if (outcome.reason !== undefined) {
      eventPayload['reason'] = outcome.reason;
    }
    state.log('ACTION_EXECUTED', source, eventPayload);

    this.logger?.debug({ source, action: type, ...outcome }, 'Action executed');
    return outcome;
  }

  private apply(
    state: SimulationState,
    source: string,
    action: Exclude<EngineAction, { kind: 'none' }>
  ): ActionOutcome {
    switch (action.kind) {
      case 'update_narrative_flag':
        return state.setNarrativeFlag(action.flag, action.value);
      case 'invalid':
        return { applied: false, reason: action.reason };
      case 'unrecognized': {
        const handler = this.handlers[action.type];
        if (!handler) {
          return { applied: false, reason: 'no engine effect for this action type' };
        }
        return handler(action.payload, state, source);
      }
    }
  }
}

/**
 * Factory function for creating an action executor.
 */
export function createActionExecutor(options?: ActionExecutorOptions): ActionExecutor {
  return new ActionExecutor(options);
}
