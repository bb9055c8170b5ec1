/**
 * OllamaClient - Local LLM provider via Ollama
 *
 * Talks to the Ollama REST API (default http://localhost:11434).
 * Models that handle code repair well on a single consumer GPU:
 * - qwen2.5-coder:7b
 * - deepseek-coder:6.7b
 */

import { z } from 'zod';
import type { GenerateOptions, LLMClient, LLMResponse, Message, ProviderConfig } from './types.js';
import { DEFAULT_LLM_TIMEOUT_MS } from './types.js';

export const DEFAULT_OLLAMA_ENDPOINT = 'http://localhost:11434';

const HEALTH_TIMEOUT_MS = 5000;

const ChatReplySchema = z.object({
  message: z.object({ role: z.string(), content: z.string() }),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional()
});

const TagListSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([])
});

export interface OllamaHealth {
  available: boolean;
  modelLoaded: boolean;
  error?: string;
}

/**
 * Non-2xx answer from the Ollama server
 */
export class OllamaHttpError extends Error {
  public readonly status: number;

  constructor(status: number, body: string) {
    super(`Ollama API error ${status}: ${body}`);
    this.name = 'OllamaHttpError';
    this.status = status;
  }
}

export class OllamaClient implements LLMClient {
  readonly model: string;
  private endpoint: string;
  private timeoutMs: number;
  private maxTokens?: number;

  constructor(config: ProviderConfig) {
    this.endpoint = (config.apiEndpoint || DEFAULT_OLLAMA_ENDPOINT).replace(/\/+$/, '');
    this.model = config.model;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_LLM_TIMEOUT_MS;
    this.maxTokens = config.maxTokens;
  }

  async generate(messages: Message[], options?: GenerateOptions): Promise<LLMResponse> {
    const reply = await this.call('/api/chat', ChatReplySchema, this.timeoutMs, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        messages,
        stream: false,
        options: {
          num_predict: options?.maxTokens ?? this.maxTokens,
          temperature: options?.temperature,
          stop: options?.stopSequences
        }
      })
    });

    return {
      content: reply.message.content,
      stopReason: reply.done_reason === 'length' ? 'max_tokens' : 'end_turn',
      usage: {
        inputTokens: reply.prompt_eval_count ?? 0,
        outputTokens: reply.eval_count ?? 0
      }
    };
  }

  /**
   * Whether the server answers and the configured model has been pulled.
   * A bare model name matches any of its tags.
   */
  async healthCheck(): Promise<OllamaHealth> {
    let tags: z.infer<typeof TagListSchema>;
    try {
      tags = await this.call('/api/tags', TagListSchema, Math.min(this.timeoutMs, HEALTH_TIMEOUT_MS));
    } catch (error) {
      const reason = error instanceof OllamaHttpError ? 'Ollama not responding' : `Cannot connect to Ollama at ${this.endpoint}`;
      return { available: false, modelLoaded: false, error: reason };
    }

    const modelLoaded = tags.models.some(m => m.name === this.model || m.name.startsWith(`${this.model}:`));
    return {
      available: true,
      modelLoaded,
      error: modelLoaded ? undefined : `Model ${this.model} not found. Run: ollama pull ${this.model}`
    };
  }

  private async call<T extends z.ZodTypeAny>(
    route: string,
    schema: T,
    timeoutMs: number,
    init: RequestInit = {}
  ): Promise<z.infer<T>> {
    let response: Response;
    try {
      response = await fetch(`${this.endpoint}${route}`, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new Error(`Ollama request timed out after ${timeoutMs}ms`);
      }
      // Connection refused surfaces as a generic "fetch failed"
      throw new Error(`Ollama not running at ${this.endpoint}. Start with: ollama serve`);
    }

    if (!response.ok) {
      throw new OllamaHttpError(response.status, await response.text());
    }
    return schema.parse(await response.json());
  }
}
