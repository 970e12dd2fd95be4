/**
 * Helpers for pulling JSON out of model responses.
 */
import { ValidationError, ErrorCodes } from './errors.js';

/**
 * Strip markdown code blocks from an LLM response.
 */
export function stripMarkdownCodeBlocks(content: string): string {
  const codeBlockMatch = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  return codeBlockMatch ? codeBlockMatch[1] : content;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Get a list out of a JSON document.
 *
 * Accepts a bare array, an object whose first key holds an array
 * (`{"pairs": [...]}`, the shape JSON-mode completions tend to produce),
 * or a single object, which is wrapped in a one-element list.
 *
 * @throws SyntaxError when the content is not JSON
 * @throws ValidationError when the document is neither an array nor an object
 */
export function getJsonList(content: string): unknown[] {
  const parsed: unknown = JSON.parse(stripMarkdownCodeBlocks(content).trim());

  if (Array.isArray(parsed)) {
    return parsed;
  }
  if (!isRecord(parsed)) {
    throw new ValidationError(
      ErrorCodes.INVALID_QA_PAIRS,
      'The JSON data is not a list or an object.'
    );
  }

  const keys = Object.keys(parsed);
  if (keys.length === 0) {
    return [];
  }
  const first = parsed[keys[0]];
  return Array.isArray(first) ? first : [parsed];
}
