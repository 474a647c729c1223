import type { ResponseRouter } from '../ports/index.js';
import type { ConversationTurn, Logger } from '../types/index.js';
import type { LLMProvider } from './provider.js';
import type { RosterEntry } from './prompts.js';
import { buildRoutingMessages } from './prompts.js';

export interface LLMResponseRouterOptions {
  provider: LLMProvider;
  roster: readonly RosterEntry[];
  logger?: Logger | undefined;
}

/**
 * Strip quotes and trailing punctuation models like to add around a name.
 */
export function cleanRoutedName(text: string): string {
  const firstLine = text.trim().split('\n')[0] ?? '';
  return firstLine.replace(/^["'`*\s]+|["'`*.!\s]+$/g, '');
}

/**
 * ResponseRouter backed by an LLM provider.
 * The returned name is not validated here; the member process checks it.
 */
export class LLMResponseRouter implements ResponseRouter {
  private readonly provider: LLMProvider;
  private readonly roster: readonly RosterEntry[];
  private readonly logger?: Logger | undefined;

  constructor(options: LLMResponseRouterOptions) {
    this.provider = options.provider;
    this.roster = options.roster;
    this.logger = options.logger?.child({ component: 'response-router' });
  }

  async route(question: string, history: readonly ConversationTurn[]): Promise<string> {
    const response = await this.provider.complete({
      messages: buildRoutingMessages(question, history, this.roster),
      temperature: 0,
      maxTokens: 20,
    });

    const name = cleanRoutedName(response.content ?? '');
    this.logger?.debug({ question, routedTo: name }, 'Question routed');
    return name;
  }
}
