/**
 * Anthropic provider for rewording and QA-pair extraction.
 * Extends BaseLLMProvider with Anthropic-specific API handling.
 */
import { z } from 'zod';
import type { ChatMessage, CompletionResponse, LLMConfig } from '../types.js';
import { BaseLLMProvider, type ResolvedCallOptions } from './base.js';
import { postJson } from './http.js';

const MessagesResponseSchema = z.object({
  content: z.array(z.object({
    type: z.string().optional(),
    text: z.string().optional(),
  })),
  usage: z.object({
    input_tokens: z.number().optional(),
    output_tokens: z.number().optional(),
  }).optional(),
});

/**
 * Anthropic messages API provider.
 * System messages are folded into the top-level system field.
 */
export class AnthropicProvider extends BaseLLMProvider {
  readonly name = 'anthropic' as const;

  constructor(config: Partial<LLMConfig> = {}) {
    super('anthropic', {
      ...config,
      apiKey: config.apiKey || process.env.ANTHROPIC_API_KEY,
    });
  }

  protected getUnavailableError(): string {
    return 'Anthropic API key not configured. Set ANTHROPIC_API_KEY environment variable.';
  }

  protected async callAPI(
    messages: ChatMessage[],
    options: ResolvedCallOptions
  ): Promise<CompletionResponse> {
    const system = messages
      .filter(m => m.role === 'system')
      .map(m => m.content)
      .join('\n\n');
    const conversation = messages
      .filter(m => m.role !== 'system')
      .map(m => ({ role: m.role, content: m.content }));

    const raw = await postJson({
      service: 'Anthropic',
      url: `${this.config.baseUrl}/v1/messages`,
      headers: {
        'x-api-key': this.config.apiKey ?? '',
        'anthropic-version': '2023-06-01',
      },
      body: {
        model: options.model,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        messages: conversation,
        ...(system ? { system } : {}),
      },
      timeoutMs: options.timeoutMs,
    });

    const parsed = MessagesResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.malformed('Anthropic');
    }

    const textContent = parsed.data.content.find(c => c.type === 'text');
    const usage = parsed.data.usage;
    return {
      content: textContent?.text ?? '',
      usage: usage ? {
        input: usage.input_tokens ?? 0,
        output: usage.output_tokens ?? 0,
        total: (usage.input_tokens ?? 0) + (usage.output_tokens ?? 0),
      } : undefined,
    };
  }
}
