/**
 * Base class for LLM providers with shared implementation.
 * Providers only need to implement callAPI() and provider-specific config.
 */
import type {
  ChatMessage,
  CompletionOptions,
  CompletionProvider,
  CompletionResponse,
  LLMConfig,
  LLMProvider,
} from '../types.js';
import { DEFAULT_CONFIGS } from '../types.js';
import {
  ExternalServiceError,
  ValidationError,
  ErrorCodes,
} from '../../utils/errors.js';

/**
 * Fully resolved options for a single API call.
 */
export interface ResolvedCallOptions {
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  json: boolean;
}

/**
 * Base class for LLM providers.
 * Subclasses must implement callAPI() for provider-specific API calls.
 */
export abstract class BaseLLMProvider implements CompletionProvider {
  abstract readonly name: LLMProvider;

  protected readonly config: Required<Omit<LLMConfig, 'apiKey'>> & { apiKey?: string };

  constructor(provider: LLMProvider, config: Partial<LLMConfig>) {
    const defaults = DEFAULT_CONFIGS[provider];
    this.config = {
      provider,
      model: config.model || defaults.model,
      apiKey: config.apiKey,
      baseUrl: config.baseUrl || defaults.baseUrl,
      maxTokens: config.maxTokens || defaults.maxTokens,
      temperature: config.temperature ?? defaults.temperature,
      timeoutMs: config.timeoutMs || defaults.timeoutMs,
    };
  }

  isAvailable(): boolean {
    return !!this.config.apiKey;
  }

  get model(): string {
    return this.config.model;
  }

  /**
   * Make the API call. Implementations throw ExternalServiceError.
   */
  protected abstract callAPI(
    messages: ChatMessage[],
    options: ResolvedCallOptions
  ): Promise<CompletionResponse>;

  /**
   * Get the error message when provider is not available.
   */
  protected abstract getUnavailableError(): string;

  async complete(
    messages: ChatMessage[],
    options: CompletionOptions = {}
  ): Promise<CompletionResponse> {
    if (!this.isAvailable()) {
      throw new ExternalServiceError(
        ErrorCodes.EXTERNAL_UNAVAILABLE,
        this.getUnavailableError(),
        { provider: this.name }
      );
    }
    if (messages.length === 0) {
      throw new ValidationError(
        ErrorCodes.INVALID_ARGUMENT,
        'At least one message is required'
      );
    }

    return this.callAPI(messages, {
      model: options.model || this.config.model,
      maxTokens: options.maxTokens ?? this.config.maxTokens,
      temperature: this.config.temperature,
      timeoutMs: this.config.timeoutMs,
      json: options.json ?? false,
    });
  }

  /**
   * Raise a typed error for a response body without the expected fields.
   */
  protected malformed(service: string): ExternalServiceError {
    return new ExternalServiceError(
      ErrorCodes.EXTERNAL_MALFORMED,
      `Invalid response structure from ${service} API`,
      { provider: this.name }
    );
  }
}
