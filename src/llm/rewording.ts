/**
 * Question rewording for retrieval fan-out.
 *
 * Failures propagate: a caller that asked for k variants must never get
 * silently degraded recall.
 */
import type { CompletionProvider } from './types.js';
import { buildRewordingPrompt } from './prompts.js';
import { ExternalServiceError, ValidationError, ErrorCodes } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const log = rootLogger.child('llm');

const LIST_MARKER = /^(?:[-*•]|\d+[.)])\s+/;

/**
 * Split a rewording response into clean lines.
 */
export function parseRewordings(content: string): string[] {
  return content
    .split('\n')
    .map(line => line.trim().replace(LIST_MARKER, '').trim())
    .filter(line => line.length > 0);
}

export interface RewordingOptions {
  /** Model override for the completion call */
  model?: string;
}

/**
 * Return the question followed by up to `count` rewordings.
 * With count 0 no completion call is made.
 *
 * @throws ExternalServiceError when the completion fails or yields no lines
 */
export async function generateRewordings(
  provider: CompletionProvider,
  question: string,
  count: number,
  options: RewordingOptions = {}
): Promise<string[]> {
  if (!Number.isInteger(count) || count < 0) {
    throw new ValidationError(
      ErrorCodes.INVALID_ARGUMENT,
      `Rewording count must be a non-negative integer, got ${count}`
    );
  }
  if (count === 0) {
    return [question];
  }

  const response = await provider.complete(
    [{ role: 'user', content: buildRewordingPrompt(question, count) }],
    { model: options.model }
  );

  const rewordings = parseRewordings(response.content).slice(0, count);
  if (rewordings.length === 0) {
    throw new ExternalServiceError(
      ErrorCodes.EXTERNAL_MALFORMED,
      `Rewording response for "${question}" contained no usable lines`,
      { provider: provider.name, count }
    );
  }
  if (rewordings.length < count) {
    log.warn(`Asked for ${count} rewordings, received ${rewordings.length}`);
  }

  const questions = [question, ...rewordings];
  questions.forEach((q, i) => log.debug(`Reworded question ${i + 1}: ${q}`));
  return questions;
}
