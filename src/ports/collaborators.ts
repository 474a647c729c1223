/**
 * Collaborator ports.
 *
 * The engine talks to natural-language generation and question routing only
 * through these two interfaces. Implementations may be network-bound and
 * non-deterministic; tests substitute scripted stubs.
 */

import type { ConversationTurn, DistilledContext } from '../types/index.js';

/**
 * Produces the raw text a persona says in response to a trigger.
 * The text is parsed by the response parser, so JSON and plain text are both fine.
 */
export interface ResponseGenerator {
  generate(personaId: string, context: DistilledContext, trigger: string): Promise<string>;
}

/**
 * Picks the responder identity best suited to answer a member question.
 * The returned identity is untrusted and validated against the roster by the caller.
 */
export interface ResponseRouter {
  route(question: string, history: readonly ConversationTurn[]): Promise<string>;
}

/**
 * Both collaborators, as wired into a dialogue-enabled run.
 */
export interface Collaborators {
  generator: ResponseGenerator;
  router: ResponseRouter;
}
