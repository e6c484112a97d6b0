import type { TransportError } from './transport';
import type { HttpResponse } from './types';
import { ApiError, AuthenticationError, ConnectionError, RateLimitError, TimeoutError } from './types';
import { parseRetryAfter } from './retry-after';

export type ParseResult = { ok: true; value: unknown } | { ok: false; error: unknown };

export function tryParseJson(text: string): ParseResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error };
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

interface ErrorDetails {
  message: string;
  code: string;
}

/**
 * Pulls `error.message` and `error.status` out of a failing response body,
 * falling back to the raw text and then the reason phrase.
 */
export function extractErrorDetails(response: HttpResponse): ErrorDetails {
  const fallbackMessage = response.body || response.statusText || `HTTP ${response.status}`;
  const parsed = tryParseJson(response.body);

  if (!parsed.ok || !isRecord(parsed.value) || !isRecord(parsed.value.error)) {
    return { message: fallbackMessage, code: '' };
  }

  const { message, status } = parsed.value.error;
  return {
    message: typeof message === 'string' ? message : fallbackMessage,
    code: typeof status === 'string' ? status : '',
  };
}

export function classifyResponse(response: HttpResponse): ApiError {
  const { message, code } = extractErrorDetails(response);

  if (response.status === 401) {
    return new AuthenticationError(message);
  }

  if (response.status === 429) {
    return new RateLimitError(message, parseRetryAfter(response.headers.get('retry-after')));
  }

  return new ApiError(message, response.status, code);
}

export function classifyFault(fault: TransportError, attempts: number): ApiError {
  const suffix = attempts === 1 ? '1 attempt' : `${attempts} attempts`;

  if (fault.fault === 'timeout') {
    return new TimeoutError(`Request timed out after ${suffix}`, { cause: fault });
  }

  return new ConnectionError(`Connection failed after ${suffix}: ${fault.message}`, { cause: fault });
}
