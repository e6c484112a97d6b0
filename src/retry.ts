import type { TransportError } from './transport';
import type { ApiError, HttpResponse } from './types';
import { classifyFault, classifyResponse } from './errors';
import { parseRetryAfter } from './retry-after';

export const RETRIABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export const BASE_BACKOFF_SECONDS = 0.5;
export const MAX_BACKOFF_SECONDS = 10;
export const MAX_RETRY_AFTER_SECONDS = 30;

export interface RetryPolicy {
  readonly maxRetries: number;
}

export type AttemptOutcome =
  | { readonly type: 'response'; readonly response: HttpResponse }
  | { readonly type: 'fault'; readonly fault: TransportError };

export type ExecutionState =
  | { readonly kind: 'attempting'; readonly attempt: number }
  | { readonly kind: 'success'; readonly response: HttpResponse }
  | { readonly kind: 'failed'; readonly error: ApiError };

export interface Transition {
  readonly state: ExecutionState;
  /** Seconds to wait before the next attempt; 0 for terminal states. */
  readonly delay: number;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

export function isRetriableStatus(status: number): boolean {
  return RETRIABLE_STATUSES.has(status);
}

/**
 * Seconds to wait before retrying after attempt `attempt` (0-based).
 * Server-directed waits are capped at 30s, computed ones at 10s.
 */
export function computeBackoffDelay(attempt: number, retryAfter?: number): number {
  if (retryAfter !== undefined) {
    return Math.min(retryAfter, MAX_RETRY_AFTER_SECONDS);
  }
  return Math.min(BASE_BACKOFF_SECONDS * 2 ** attempt, MAX_BACKOFF_SECONDS);
}

function terminal(error: ApiError, attempt: number): Transition {
  error.attempts = attempt + 1;
  return { state: { kind: 'failed', error }, delay: 0 };
}

/**
 * Decides what follows attempt `attempt` given its outcome. The attempt
 * budget is shared between transport faults and retriable statuses.
 */
export function advance(attempt: number, outcome: AttemptOutcome, policy: RetryPolicy): Transition {
  const hasBudget = attempt < policy.maxRetries;

  if (outcome.type === 'fault') {
    if (!hasBudget) {
      return terminal(classifyFault(outcome.fault, attempt + 1), attempt);
    }
    return {
      state: { kind: 'attempting', attempt: attempt + 1 },
      delay: computeBackoffDelay(attempt),
    };
  }

  const { response } = outcome;

  if (isSuccessStatus(response.status)) {
    return { state: { kind: 'success', response }, delay: 0 };
  }

  if (!isRetriableStatus(response.status) || !hasBudget) {
    return terminal(classifyResponse(response), attempt);
  }

  const retryAfter = parseRetryAfter(response.headers.get('retry-after'));
  return {
    state: { kind: 'attempting', attempt: attempt + 1 },
    delay: computeBackoffDelay(attempt, retryAfter),
  };
}
