/**
 * ProviderFactory - builds and caches LLM clients
 *
 * Clients are cached per provider, model and endpoint, so every role in a
 * run shares one SDK instance.
 */

import { ClaudeClient } from './ClaudeClient.js';
import { OllamaClient } from './OllamaClient.js';
import { OpenAIClient } from './OpenAIClient.js';
import { CREDENTIAL_ENV } from './types.js';
import type { HostedProvider, LLMClient, ProviderAvailability, ProviderConfig } from './types.js';
import { ConfigurationError } from '../core/errors.js';

function cacheKey(config: ProviderConfig): string {
  return [config.provider, config.model, config.apiEndpoint ?? 'default'].join(':');
}

function missingKey(provider: HostedProvider): string {
  return `${CREDENTIAL_ENV[provider]} not set`;
}

export class ProviderFactory {
  private static clients: Map<string, LLMClient> = new Map();

  /**
   * Cached client for a provider config. Throws ConfigurationError when a
   * hosted provider has no key.
   */
  static createClient(config: ProviderConfig): LLMClient {
    const key = cacheKey(config);
    let client = this.clients.get(key);
    if (!client) {
      client = this.build(config);
      this.clients.set(key, client);
    }
    return client;
  }

  /**
   * Whether a provider can serve requests. Hosted providers only need a key
   * (no request is spent on a probe); Ollama must answer and have the model.
   */
  static async checkAvailability(config: ProviderConfig): Promise<ProviderAvailability> {
    if (config.provider === 'ollama') {
      const health = await new OllamaClient(config).healthCheck();
      return { available: health.available && health.modelLoaded, error: health.error };
    }

    return config.apiKey
      ? { available: true, error: undefined }
      : { available: false, error: missingKey(config.provider) };
  }

  static clearCache(): void {
    this.clients.clear();
  }

  private static build(config: ProviderConfig): LLMClient {
    switch (config.provider) {
      case 'ollama':
        return new OllamaClient(config);
      case 'claude':
      case 'openai': {
        if (!config.apiKey) {
          throw new ConfigurationError([missingKey(config.provider)]);
        }
        return config.provider === 'claude' ? new ClaudeClient(config) : new OpenAIClient(config);
      }
    }
  }
}
