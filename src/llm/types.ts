/**
 * LLM provider types and interfaces for rewording and QA-pair extraction.
 * Designed to be provider-agnostic (OpenAI-compatible APIs or Anthropic).
 */

/**
 * Supported LLM providers.
 * - openai: OpenAI chat completions API (or any compatible endpoint)
 * - anthropic: Anthropic messages API
 */
export type LLMProvider = 'openai' | 'anthropic';

/**
 * Configuration for LLM providers.
 */
export interface LLMConfig {
  provider: LLMProvider;
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  maxTokens?: number;
  temperature?: number;
  /** Abort a request after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Default configurations per provider.
 */
export const DEFAULT_CONFIGS: Record<LLMProvider, Required<Omit<LLMConfig, 'apiKey'>>> = {
  openai: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    baseUrl: 'https://api.openai.com/v1',
    maxTokens: 1000,
    temperature: 0,
    timeoutMs: 60000,
  },
  anthropic: {
    provider: 'anthropic',
    model: 'claude-3-haiku-20240307',
    baseUrl: 'https://api.anthropic.com',
    maxTokens: 1000,
    temperature: 0,
    timeoutMs: 60000,
  },
};

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Per-call overrides.
 */
export interface CompletionOptions {
  /** Model name; the provider's configured model when omitted */
  model?: string;
  maxTokens?: number;
  /** Ask for a JSON object response where the API supports it */
  json?: boolean;
}

export interface TokenUsage {
  input: number;
  output: number;
  total: number;
}

export interface CompletionResponse {
  content: string;
  usage?: TokenUsage;
}

/**
 * A hosted text-completion service.
 */
export interface CompletionProvider {
  readonly name: LLMProvider;
  isAvailable(): boolean;
  /**
   * @throws ExternalServiceError when the provider is unavailable, the call
   * fails or times out, or the response has an unexpected shape
   */
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResponse>;
}

/**
 * A question/answer pair extracted from prose.
 */
export interface QaPair {
  q: string;
  a: string;
}
