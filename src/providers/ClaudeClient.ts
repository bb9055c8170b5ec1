/**
 * ClaudeClient - Anthropic Messages API provider
 *
 * System messages are folded into the request's `system` parameter; the
 * remaining turns are sent as-is.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { GenerateOptions, LLMClient, LLMResponse, Message, ProviderConfig } from './types.js';
import { DEFAULT_LLM_TIMEOUT_MS } from './types.js';

const DEFAULT_MAX_TOKENS = 8192;

type TurnRole = 'user' | 'assistant';

function isTurn(message: Message): message is Message & { role: TurnRole } {
  return message.role !== 'system';
}

function mapStopReason(reason: string | null): LLMResponse['stopReason'] {
  switch (reason) {
    case 'max_tokens':
      return 'max_tokens';
    case 'tool_use':
      return 'tool_use';
    default:
      return 'end_turn';
  }
}

export class ClaudeClient implements LLMClient {
  readonly model: string;
  private client: Anthropic;
  private maxTokens: number;

  constructor(config: ProviderConfig) {
    this.model = config.model;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.apiEndpoint,
      timeout: config.timeoutMs ?? DEFAULT_LLM_TIMEOUT_MS
    });
  }

  async generate(messages: Message[], options?: GenerateOptions): Promise<LLMResponse> {
    const system = messages
      .filter(m => m.role === 'system')
      .map(m => m.content)
      .join('\n\n');

    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: options?.maxTokens ?? this.maxTokens,
      ...(system ? { system } : {}),
      ...(options?.temperature !== undefined ? { temperature: options.temperature } : {}),
      ...(options?.stopSequences ? { stop_sequences: options.stopSequences } : {}),
      messages: messages.filter(isTurn).map(m => ({ role: m.role, content: m.content }))
    });

    const text = response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');

    if (!text) {
      throw new Error('No text response from Claude API');
    }

    return {
      content: text,
      stopReason: mapStopReason(response.stop_reason),
      usage: {
        inputTokens: response.usage?.input_tokens || 0,
        outputTokens: response.usage?.output_tokens || 0
      }
    };
  }
}
