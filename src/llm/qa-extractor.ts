/**
 * QA-pair extraction from prose.
 *
 * Best-effort enrichment: malformed responses are retried with the error fed
 * back to the model, and after the last retry the result is an empty list
 * with the cause logged.
 */
import { z } from 'zod';
import type { ChatMessage, CompletionProvider, QaPair } from './types.js';
import {
  QA_PAIRS_SYSTEM_PROMPT,
  buildQaPairsRetryPrompt,
  buildQaPairsUserPrompt,
} from './prompts.js';
import { getJsonList } from '../utils/json.js';
import { formatZodError } from '../utils/yaml.js';
import { ValidationError, ErrorCodes, errorMessage } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const log = rootLogger.child('llm');

export const DEFAULT_MAX_RETRIES = 3;

const QaPairSchema = z.object({
  q: z.string().min(1),
  a: z.union([z.string(), z.number(), z.boolean()]).transform(String),
});

const QaPairListSchema = z.array(QaPairSchema);

/**
 * Parse and validate a QA-pair response.
 *
 * @throws ValidationError when the content is not JSON or a pair lacks q/a
 */
export function parseQaPairs(content: string): QaPair[] {
  let items: unknown[];
  try {
    items = getJsonList(content);
  } catch (error) {
    if (error instanceof ValidationError) throw error;
    throw new ValidationError(
      ErrorCodes.INVALID_QA_PAIRS,
      `Response is not valid JSON: ${errorMessage(error)}`
    );
  }

  const result = QaPairListSchema.safeParse(items);
  if (!result.success) {
    throw new ValidationError(
      ErrorCodes.INVALID_QA_PAIRS,
      `Invalid QA pair format: ${formatZodError(result.error)}`,
      { issues: result.error.issues }
    );
  }
  return result.data;
}

export interface QaExtractionOptions {
  model?: string;
  /** Retries after the first attempt */
  maxRetries?: number;
}

/**
 * Extract question/answer pairs from text. Never throws for completion or
 * format failures; returns [] once retries are exhausted.
 */
export async function generateQaPairs(
  provider: CompletionProvider,
  text: string,
  options: QaExtractionOptions = {}
): Promise<QaPair[]> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  let messages: ChatMessage[] = [
    { role: 'system', content: QA_PAIRS_SYSTEM_PROMPT },
    { role: 'user', content: buildQaPairsUserPrompt(text) },
  ];
  let lastError = '';

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    let content: string | null = null;
    try {
      const response = await provider.complete(messages, { model: options.model, json: true });
      content = response.content;
      const pairs = parseQaPairs(content);
      log.debug(`Extracted ${pairs.length} QA pairs on attempt ${attempt + 1}`);
      return pairs;
    } catch (error) {
      lastError = errorMessage(error);
      log.warn(`QA-pair extraction attempt ${attempt + 1} failed: ${lastError}`);
    }

    messages = [
      ...messages,
      ...(content !== null ? [{ role: 'assistant' as const, content }] : []),
      { role: 'user', content: buildQaPairsRetryPrompt(lastError) },
    ];
  }

  log.warn(`Giving up on QA-pair extraction after ${maxRetries + 1} attempts: ${lastError}`);
  return [];
}
