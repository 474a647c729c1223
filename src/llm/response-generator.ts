import type { ResponseGenerator } from '../ports/index.js';
import type { DistilledContext, Logger } from '../types/index.js';
import type { LLMProvider, Message } from './provider.js';
import { LLMError } from './provider.js';
import type { PersonaPrompt } from './prompts.js';
import { buildMemberMessages, buildResponderMessages } from './prompts.js';

export interface LLMResponseGeneratorOptions {
  provider: LLMProvider;
  /** Care-team personas keyed by identity */
  careTeam: readonly PersonaPrompt[];
  member: PersonaPrompt;
  logger?: Logger | undefined;
  temperature?: number | undefined;
  maxTokens?: number | undefined;
}

/**
 * ResponseGenerator backed by an LLM provider.
 */
export class LLMResponseGenerator implements ResponseGenerator {
  private readonly provider: LLMProvider;
  private readonly personas = new Map<string, PersonaPrompt>();
  private readonly member: PersonaPrompt;
  private readonly logger?: Logger | undefined;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: LLMResponseGeneratorOptions) {
    this.provider = options.provider;
    this.member = options.member;
    for (const persona of options.careTeam) {
      this.personas.set(persona.name, persona);
    }
    this.logger = options.logger?.child({ component: 'response-generator' });
    this.temperature = options.temperature ?? 0.7;
    this.maxTokens = options.maxTokens ?? 600;
  }

  async generate(personaId: string, context: DistilledContext, trigger: string): Promise<string> {
    let messages: Message[];
    if (personaId === this.member.name) {
      messages = buildMemberMessages(this.member, context, trigger);
    } else {
      const persona = this.personas.get(personaId);
      if (!persona) {
        throw new Error(`Unknown persona "${personaId}"`);
      }
      messages = buildResponderMessages(persona, context, trigger);
    }

    const response = await this.provider.complete({
      messages,
      temperature: this.temperature,
      maxTokens: this.maxTokens,
    });

    if (!response.content) {
      throw new LLMError('Empty completion', this.provider.name);
    }

    this.logger?.debug(
      { personaId, day: context.day, length: response.content.length },
      'Response generated'
    );
    return response.content;
  }
}
