/**
 * JSON-over-HTTP helper shared by the completion and embedding clients.
 */
import { ExternalServiceError, ErrorCodes, errorMessage } from '../../utils/errors.js';

export interface PostJsonRequest {
  /** Service name used in error messages, e.g. "OpenAI" */
  service: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  timeoutMs: number;
}

const MAX_ERROR_TEXT = 200;

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * POST a JSON body and return the parsed JSON response.
 *
 * @throws ExternalServiceError EXTERNAL_TIMEOUT when the timeout elapses,
 * EXTERNAL_FAILED on transport errors or non-2xx statuses,
 * EXTERNAL_MALFORMED when the body is not JSON
 */
export async function postJson(request: PostJsonRequest): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs);

  try {
    let response: Response;
    try {
      response = await fetch(request.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...request.headers },
        body: JSON.stringify(request.body),
        signal: controller.signal,
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw new ExternalServiceError(
          ErrorCodes.EXTERNAL_TIMEOUT,
          `${request.service} API request timed out after ${request.timeoutMs}ms`,
          { url: request.url, timeoutMs: request.timeoutMs }
        );
      }
      throw new ExternalServiceError(
        ErrorCodes.EXTERNAL_FAILED,
        `${request.service} API request failed: ${errorMessage(error)}`,
        { url: request.url }
      );
    }

    if (!response.ok) {
      const errorText = await response.text();
      const sanitizedError = errorText.length > MAX_ERROR_TEXT
        ? errorText.substring(0, MAX_ERROR_TEXT) + '...'
        : errorText;
      throw new ExternalServiceError(
        ErrorCodes.EXTERNAL_FAILED,
        `${request.service} API error: ${response.status} - ${sanitizedError}`,
        { url: request.url, status: response.status }
      );
    }

    try {
      return await response.json();
    } catch (error) {
      throw new ExternalServiceError(
        ErrorCodes.EXTERNAL_MALFORMED,
        `${request.service} API returned invalid JSON: ${errorMessage(error)}`,
        { url: request.url }
      );
    }
  } finally {
    clearTimeout(timeoutId);
  }
}
