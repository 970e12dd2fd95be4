/**
 * OpenAI provider for rewording and QA-pair extraction.
 * Extends BaseLLMProvider with OpenAI-specific API handling.
 */
import { z } from 'zod';
import type { ChatMessage, CompletionResponse, LLMConfig } from '../types.js';
import { BaseLLMProvider, type ResolvedCallOptions } from './base.js';
import { postJson } from './http.js';

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }).optional(),
  })).optional(),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
    total_tokens: z.number().optional(),
  }).optional(),
});

/**
 * OpenAI chat completions provider.
 * Works against any OpenAI-compatible endpoint through base_url.
 */
export class OpenAIProvider extends BaseLLMProvider {
  readonly name = 'openai' as const;

  constructor(config: Partial<LLMConfig> = {}) {
    super('openai', {
      ...config,
      apiKey: config.apiKey || process.env.OPENAI_API_KEY,
    });
  }

  protected getUnavailableError(): string {
    return 'OpenAI API key not configured. Set OPENAI_API_KEY environment variable.';
  }

  protected async callAPI(
    messages: ChatMessage[],
    options: ResolvedCallOptions
  ): Promise<CompletionResponse> {
    const raw = await postJson({
      service: 'OpenAI',
      url: `${this.config.baseUrl}/chat/completions`,
      headers: { 'Authorization': `Bearer ${this.config.apiKey}` },
      body: {
        model: options.model,
        messages,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        ...(options.json ? { response_format: { type: 'json_object' } } : {}),
      },
      timeoutMs: options.timeoutMs,
    });

    const parsed = ChatCompletionSchema.safeParse(raw);
    const content = parsed.success ? parsed.data.choices?.[0]?.message?.content : undefined;
    if (!parsed.success || typeof content !== 'string') {
      throw this.malformed('OpenAI');
    }

    const usage = parsed.data.usage;
    return {
      content,
      usage: usage ? {
        input: usage.prompt_tokens ?? 0,
        output: usage.completion_tokens ?? 0,
        total: usage.total_tokens ?? 0,
      } : undefined,
    };
  }
}
