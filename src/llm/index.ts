/**
 * LLM module exports.
 */

export type { LLMProvider, CompletionRequest, CompletionResponse, Message } from './provider.js';
export { BaseLLMProvider, LLMError } from './provider.js';
export { VercelAIProvider, createVercelAIProvider } from './vercel-ai-provider.js';
export type {
  VercelAIProviderConfig,
  VercelAIOpenRouterConfig,
  VercelAILocalConfig,
  VercelAIRequestOptions,
} from './vercel-ai-provider.js';
export { LLMResponseGenerator } from './response-generator.js';
export { LLMResponseRouter, cleanRoutedName } from './router.js';
export { createCollaborators, createProvider } from './collaborators.js';
export type { PersonaPrompt, RosterEntry } from './prompts.js';
