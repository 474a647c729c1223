export { parseResponse } from './response-parser.js';
export type { ParsedResponse } from './response-parser.js';
export { ActionExecutor, createActionExecutor, toEngineAction } from './action-executor.js';
export type { ActionHandler, ActionExecutorOptions } from './action-executor.js';
export {
  distillContext,
  renderContext,
  recentConversation,
  CRITICAL_WINDOW_DAYS,
  RECENT_MESSAGE_LIMIT,
} from './context-distiller.js';
export { resolveResponder } from './responder-routing.js';
export type { RoutingDecision, RoutingMethod } from './responder-routing.js';
export { askResponder } from './ask-responder.js';
export type { AskResponderDeps } from './ask-responder.js';
