/**
 * Embedders for the similarity store.
 *
 * HashingEmbedder runs in-process (feature hashing of word tokens) and needs
 * no service. OpenAIEmbedder calls an OpenAI-compatible /embeddings endpoint.
 */
import { z } from 'zod';
import type { Embedder } from './types.js';
import type { EmbeddingSettings } from '../config/schema.js';
import { postJson } from '../../llm/providers/http.js';
import { resolveApiKey, type Credentials } from '../../utils/credentials.js';
import { ExternalServiceError, ErrorCodes } from '../../utils/errors.js';

/**
 * Cosine similarity of two equal-length vectors; 0 when either is all zeros.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0, na = 0, nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

/**
 * Lowercased word tokens (letters and digits).
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/** 32-bit FNV-1a */
function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export class HashingEmbedder implements Embedder {
  readonly name = 'hashing';

  constructor(private readonly dimensions: number = 512) {}

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      vector[fnv1a(token) % this.dimensions] += 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map(v => v / norm);
  }
}

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({
    embedding: z.array(z.number()),
    index: z.number(),
  })),
});

export interface OpenAIEmbedderConfig {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export class OpenAIEmbedder implements Embedder {
  readonly name = 'openai';
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly config: OpenAIEmbedderConfig) {
    this.baseUrl = config.baseUrl || 'https://api.openai.com/v1';
    this.timeoutMs = config.timeoutMs ?? 30000;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    if (!this.config.apiKey) {
      throw new ExternalServiceError(
        ErrorCodes.EXTERNAL_UNAVAILABLE,
        'OpenAI API key not configured for embeddings. Set OPENAI_API_KEY environment variable.'
      );
    }

    const raw = await postJson({
      service: 'OpenAI embeddings',
      url: `${this.baseUrl}/embeddings`,
      headers: { 'Authorization': `Bearer ${this.config.apiKey}` },
      body: { model: this.config.model, input: texts },
      timeoutMs: this.timeoutMs,
    });

    const parsed = EmbeddingResponseSchema.safeParse(raw);
    if (!parsed.success || parsed.data.data.length !== texts.length) {
      throw new ExternalServiceError(
        ErrorCodes.EXTERNAL_MALFORMED,
        'Invalid response structure from OpenAI embeddings API',
        { expected: texts.length }
      );
    }

    return [...parsed.data.data]
      .sort((a, b) => a.index - b.index)
      .map(item => item.embedding);
  }
}

/**
 * Create the embedder named in configuration.
 */
export function createEmbedder(settings: EmbeddingSettings, credentials: Credentials = {}): Embedder {
  switch (settings.provider) {
    case 'hashing':
      return new HashingEmbedder(settings.dimensions);
    case 'openai':
      return new OpenAIEmbedder({
        model: settings.model,
        apiKey: settings.api_key || resolveApiKey(credentials, 'openai'),
        baseUrl: settings.base_url,
        timeoutMs: settings.timeout_ms,
      });
  }
}
