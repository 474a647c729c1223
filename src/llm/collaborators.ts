import type { MergedConfig } from '../config/index.js';
import { ConfigurationError } from '../core/errors.js';
import type { Collaborators } from '../ports/index.js';
import { CARE_ROLES } from '../types/index.js';
import type { Logger } from '../types/index.js';
import type { LLMProvider } from './provider.js';
import { LLMResponseGenerator } from './response-generator.js';
import { LLMResponseRouter } from './router.js';
import { createVercelAIProvider } from './vercel-ai-provider.js';

/**
 * Build the configured LLM provider.
 * Throws ConfigurationError when the selected backend is incomplete.
 */
export function createProvider(config: MergedConfig, logger: Logger): LLMProvider {
  const { llm } = config;
  const options = { timeoutMs: llm.timeoutMs, maxRetries: llm.maxRetries };

  if (llm.provider === 'openrouter') {
    if (!llm.openRouterApiKey) {
      throw new ConfigurationError('OpenRouter selected but OPENROUTER_API_KEY is not set');
    }
    if (!llm.model) {
      throw new ConfigurationError('OpenRouter selected but no model is configured');
    }
    return createVercelAIProvider(
      { apiKey: llm.openRouterApiKey, model: llm.model, appName: llm.appName },
      logger,
      options
    );
  }

  const { baseUrl, model } = llm.local;
  if (!baseUrl || !model) {
    throw new ConfigurationError(
      'Local provider selected but LOCAL_LLM_BASE_URL and LOCAL_LLM_MODEL are not both set'
    );
  }
  return createVercelAIProvider({ baseUrl, model }, logger, options);
}

/**
 * Wire the generator and router over one provider.
 * Returns null when LLM collaborators are disabled (collaborator-free run).
 */
export function createCollaborators(
  config: MergedConfig,
  logger: Logger,
  provider?: LLMProvider
): Collaborators | null {
  if (!config.llm.enabled) {
    return null;
  }

  const llm = provider ?? createProvider(config, logger);
  const careTeam = CARE_ROLES.map((role) => config.careTeam[role]);

  return {
    generator: new LLMResponseGenerator({
      provider: llm,
      careTeam,
      member: { name: config.member.profile.name, persona: config.member.persona },
      logger,
    }),
    router: new LLMResponseRouter({
      provider: llm,
      // The logistics lead is the fallback, not a routing candidate
      roster: CARE_ROLES.filter((role) => role !== 'logistics').map((role) => ({
        name: config.careTeam[role].name,
        description: config.careTeam[role].persona,
      })),
      logger,
    }),
  };
}
