/**
 * In-process stand-ins for the embedding and completion services.
 */
import type { Embedder } from '../../src/core/kb/types.js';
import { tokenize } from '../../src/core/kb/embedder.js';
import type {
  ChatMessage,
  CompletionOptions,
  CompletionProvider,
  CompletionResponse,
  LLMProvider,
} from '../../src/llm/types.js';

/**
 * Embeds text as keyword counts over a fixed vocabulary, so distances in
 * tests can be worked out by hand.
 */
export class KeywordEmbedder implements Embedder {
  readonly name = 'keyword';
  readonly calls: string[][] = [];

  constructor(private readonly vocabulary: string[]) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    return texts.map(text => {
      const tokens = tokenize(text);
      return this.vocabulary.map(word => tokens.filter(t => t === word).length);
    });
  }
}

export interface RecordedCall {
  messages: ChatMessage[];
  options?: CompletionOptions;
}

/**
 * Replies with scripted contents in order. An Error entry is thrown instead.
 */
export class ScriptedProvider implements CompletionProvider {
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly replies: Array<string | Error>,
    readonly name: LLMProvider = 'openai'
  ) {}

  isAvailable(): boolean {
    return true;
  }

  async complete(messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResponse> {
    this.calls.push({ messages, options });
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('No scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return { content: reply };
  }
}

/**
 * Build a fetch Response carrying a JSON body.
 */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
