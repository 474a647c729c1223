/**
 * Scripted collaborators for testing.
 *
 * Replay predetermined outputs (or errors) for the response generator and
 * router, and record every call for assertions.
 */

import type { ResponseGenerator, ResponseRouter } from '../../src/ports/index.js';
import type { ConversationTurn, DistilledContext } from '../../src/types/index.js';

/** A scripted output, or an error to throw. */
export type ScriptedOutput = string | Error;

export interface GenerateCall {
  personaId: string;
  context: DistilledContext;
  trigger: string;
}

function nextOutput(script: ScriptedOutput[], index: number, fallback: string | undefined, who: string): ScriptedOutput {
  const scripted = script[index];
  if (scripted !== undefined) return scripted;
  if (fallback !== undefined) return fallback;
  throw new Error(`${who}: script exhausted after ${String(script.length)} calls`);
}

export class ScriptedGenerator implements ResponseGenerator {
  readonly calls: GenerateCall[] = [];
  private index = 0;

  constructor(
    private readonly script: ScriptedOutput[],
    private readonly fallback?: string
  ) {}

  async generate(personaId: string, context: DistilledContext, trigger: string): Promise<string> {
    this.calls.push({ personaId, context, trigger });
    const output = nextOutput(this.script, this.index++, this.fallback, 'ScriptedGenerator');
    if (output instanceof Error) throw output;
    return output;
  }
}

export interface RouteCall {
  question: string;
  history: readonly ConversationTurn[];
}

export class ScriptedRouter implements ResponseRouter {
  readonly calls: RouteCall[] = [];
  private index = 0;

  constructor(
    private readonly script: ScriptedOutput[],
    private readonly fallback?: string
  ) {}

  async route(question: string, history: readonly ConversationTurn[]): Promise<string> {
    this.calls.push({ question, history });
    const output = nextOutput(this.script, this.index++, this.fallback, 'ScriptedRouter');
    if (output instanceof Error) throw output;
    return output;
  }
}
