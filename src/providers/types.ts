/**
 * Multi-Provider Types
 *
 * One generate() contract over the text-generation backends:
 * - Claude (Anthropic Messages API)
 * - OpenAI and OpenAI-compatible endpoints (Groq, vLLM, ...)
 * - Ollama (local models)
 */

export type Provider = 'claude' | 'openai' | 'ollama';

export const PROVIDERS: readonly Provider[] = ['claude', 'openai', 'ollama'];

/** Environment variable holding each hosted provider's key */
export const CREDENTIAL_ENV = {
  claude: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY'
} as const;

export type HostedProvider = keyof typeof CREDENTIAL_ENV;

export const DEFAULT_LLM_TIMEOUT_MS = 120000;

export interface ProviderConfig {
  provider: Provider;
  model: string;
  /** Required by the hosted providers, ignored by Ollama */
  apiKey?: string;
  /** Base URL override; Ollama defaults to http://localhost:11434 */
  apiEndpoint?: string;
  maxTokens?: number;
  timeoutMs?: number;
}

export type Role = 'system' | 'user' | 'assistant';

export interface Message {
  role: Role;
  content: string;
}

export interface GenerateOptions {
  maxTokens?: number;
  temperature?: number;
  stopSequences?: string[];
}

export type StopReason = 'end_turn' | 'max_tokens' | 'tool_use';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LLMResponse {
  content: string;
  stopReason: StopReason;
  usage?: TokenUsage;
}

export interface LLMClient {
  generate(messages: Message[], options?: GenerateOptions): Promise<LLMResponse>;
  /** Model identifier recorded in the audit log */
  readonly model: string;
}

export interface ProviderAvailability {
  available: boolean;
  error?: string;
}
