/**
 * Multi-Provider Module
 */

export { ProviderFactory } from './ProviderFactory.js';
export { ClaudeClient } from './ClaudeClient.js';
export { OpenAIClient } from './OpenAIClient.js';
export { OllamaClient, DEFAULT_OLLAMA_ENDPOINT } from './OllamaClient.js';
export { PROVIDERS } from './types.js';
export type {
  Provider,
  ProviderConfig,
  Message,
  GenerateOptions,
  LLMResponse,
  LLMClient,
  ProviderAvailability
} from './types.js';
