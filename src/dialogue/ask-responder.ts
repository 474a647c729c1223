import type { SimulationState } from '../core/simulation-state.js';
import { CollaboratorError, errorMessage } from '../core/errors.js';
import type { ResponseGenerator } from '../ports/index.js';
import type { Logger } from '../types/index.js';
import type { ActionExecutor } from './action-executor.js';
import { distillContext } from './context-distiller.js';
import { parseResponse, type ParsedResponse } from './response-parser.js';

export interface AskResponderDeps {
  state: SimulationState;
  generator: ResponseGenerator;
  actionExecutor: ActionExecutor;
  logger: Logger;
}

/**
 * Ask a care-team responder to speak about `trigger`.
 *
 * Distills context, generates, parses, logs the MESSAGE, remembers it and
 * applies the action. A failing collaborator is logged as an ERROR event and
 * yields null; nothing is thrown.
 */
export async function askResponder(
  deps: AskResponderDeps,
  responder: string,
  trigger: string
): Promise<ParsedResponse | null> {
  const { state, generator, actionExecutor, logger } = deps;

  let raw: string;
  try {
    raw = await generator.generate(responder, distillContext(state, responder), trigger);
  } catch (error) {
    const failure = new CollaboratorError('generate', responder, errorMessage(error), {
      cause: error,
    });
    logger.warn({ responder, trigger, error: failure.message }, 'Response generation failed');
    state.log('ERROR', responder, { responder, stage: 'generate', error: failure.message });
    return null;
  }

  const parsed = parseResponse(raw);
  if (parsed.message) {
    state.log('MESSAGE', responder, { content: parsed.message, trigger });
    state.remember(responder, parsed.message);
  }

  try {
    actionExecutor.execute(state, responder, parsed.action);
  } catch (error) {
    logger.warn({ responder, action: parsed.action.type, error: errorMessage(error) }, 'Action failed');
    state.log('ERROR', responder, { responder, stage: 'action', error: errorMessage(error) });
  }

  return parsed;
}
