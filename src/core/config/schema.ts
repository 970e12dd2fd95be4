import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Where the question tree and the similarity store live on disk. */
export const StorageSettingsSchema = z.object({
  /** Directory holding both SQLite databases */
  db_dir: z.string().min(1).default('db'),
  /** Knowledge base collection name; also names the tree database file */
  collection: z.string().min(1).default('qa_kb'),
});

/** Embedding backend for the similarity store. */
export const EmbeddingProviderTypeSchema = z.enum(['hashing', 'openai']);

export const EmbeddingSettingsSchema = z.object({
  provider: EmbeddingProviderTypeSchema.default('hashing'),
  model: z.string().default('text-embedding-3-small'),
  /** Vector width for the hashing embedder */
  dimensions: z.number().int().min(8).default(512),
  base_url: z.string().optional(),
  api_key: z.string().optional(),
  timeout_ms: z.number().int().min(1).default(30000),
});

/** LLM provider type. */
export const LLMProviderTypeSchema = z.enum(['openai', 'anthropic']);

/** Individual LLM provider configuration (supports OpenAI-compatible APIs). */
export const LLMProviderConfigSchema = z.object({
  base_url: z.string().optional(),
  model: z.string().optional(),
  api_key: z.string().optional(),
  max_tokens: z.number().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
});

/** LLM settings for rewording and QA-pair extraction. */
export const LLMSettingsSchema = z.object({
  default_provider: LLMProviderTypeSchema.default('openai'),
  /** Model for rewordings; the provider's model when unset */
  rewording_model: z.string().optional(),
  /** Model for QA-pair extraction; the provider's model when unset */
  qa_pairs_model: z.string().optional(),
  timeout_ms: z.number().int().min(1).default(60000),
  providers: z.object({
    openai: LLMProviderConfigSchema.optional(),
    anthropic: LLMProviderConfigSchema.optional(),
  }).default({}),
});

/** Defaults for knowledge base queries. */
export const RetrievalSettingsSchema = z.object({
  n_results: z.number().int().min(1).default(5),
  /** Rewordings generated for each question added or queried */
  num_rewordings: z.number().int().min(0).default(0),
});

export const ExtractionSettingsSchema = z.object({
  /** Retries after a malformed QA-pair response */
  max_retries: z.number().int().min(0).default(3),
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const LoggingSettingsSchema = z.object({
  level: LogLevelSchema.default('info'),
});

/** Complete config.yaml schema. */
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  storage: withDefaults(StorageSettingsSchema),
  embedding: withDefaults(EmbeddingSettingsSchema),
  llm: withDefaults(LLMSettingsSchema),
  retrieval: withDefaults(RetrievalSettingsSchema),
  extraction: withDefaults(ExtractionSettingsSchema),
  logging: withDefaults(LoggingSettingsSchema),
});

// Type exports (inferred from schemas)
export type StorageSettings = z.infer<typeof StorageSettingsSchema>;
export type EmbeddingProviderType = z.infer<typeof EmbeddingProviderTypeSchema>;
export type EmbeddingSettings = z.infer<typeof EmbeddingSettingsSchema>;
export type LLMProviderType = z.infer<typeof LLMProviderTypeSchema>;
export type LLMProviderConfig = z.infer<typeof LLMProviderConfigSchema>;
export type LLMSettings = z.infer<typeof LLMSettingsSchema>;
export type RetrievalSettings = z.infer<typeof RetrievalSettingsSchema>;
export type ExtractionSettings = z.infer<typeof ExtractionSettingsSchema>;
export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
