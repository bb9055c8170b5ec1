/**
 * OpenAIClient - OpenAI Chat Completions provider
 *
 * Works against any OpenAI-compatible endpoint (Groq, vLLM, LM Studio, ...)
 * through `apiEndpoint`.
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { GenerateOptions, LLMClient, LLMResponse, Message, ProviderConfig } from './types.js';
import { DEFAULT_LLM_TIMEOUT_MS } from './types.js';

const DEFAULT_MAX_TOKENS = 8192;

function toChatMessage(message: Message): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export class OpenAIClient implements LLMClient {
  readonly model: string;
  private client: OpenAI;
  private maxTokens: number;

  constructor(config: ProviderConfig) {
    this.model = config.model;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.apiEndpoint,
      timeout: config.timeoutMs ?? DEFAULT_LLM_TIMEOUT_MS
    });
  }

  async generate(messages: Message[], options?: GenerateOptions): Promise<LLMResponse> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: messages.map(toChatMessage),
      max_tokens: options?.maxTokens ?? this.maxTokens,
      temperature: options?.temperature,
      stop: options?.stopSequences
    });

    const choice = completion.choices[0];
    const content = choice?.message.content ?? '';
    if (!content) {
      throw new Error('No text response from OpenAI API');
    }

    return {
      content,
      stopReason: choice.finish_reason === 'length' ? 'max_tokens'
        : choice.finish_reason === 'tool_calls' ? 'tool_use'
        : 'end_turn',
      usage: {
        inputTokens: completion.usage?.prompt_tokens || 0,
        outputTokens: completion.usage?.completion_tokens || 0
      }
    };
  }
}
