import { describe, it, expect } from 'vitest';
import {
  advance,
  computeBackoffDelay,
  isRetriableStatus,
  MAX_BACKOFF_SECONDS,
  MAX_RETRY_AFTER_SECONDS,
} from '../src/retry';
import { parseRetryAfter } from '../src/retry-after';
import { TransportError } from '../src/transport';
import { ApiError, RateLimitError, TimeoutError } from '../src/types';
import { httpResponse } from './helpers';

const policy = { maxRetries: 2 };

describe('computeBackoffDelay', () => {
  it('doubles from 0.5s per attempt', () => {
    expect(computeBackoffDelay(0)).toBe(0.5);
    expect(computeBackoffDelay(1)).toBe(1);
    expect(computeBackoffDelay(2)).toBe(2);
    expect(computeBackoffDelay(3)).toBe(4);
  });

  it('caps computed backoff at 10s', () => {
    expect(computeBackoffDelay(5)).toBe(MAX_BACKOFF_SECONDS);
    expect(computeBackoffDelay(20)).toBe(10);
  });

  it('uses the server-directed delay when one is given', () => {
    expect(computeBackoffDelay(0, 5)).toBe(5);
    expect(computeBackoffDelay(3, 0)).toBe(0);
  });

  it('caps server-directed delay at 30s rather than 10s', () => {
    expect(computeBackoffDelay(0, 100)).toBe(MAX_RETRY_AFTER_SECONDS);
    expect(computeBackoffDelay(0, 25)).toBe(25);
  });
});

describe('parseRetryAfter', () => {
  it('parses decimal seconds', () => {
    expect(parseRetryAfter('5')).toBe(5);
    expect(parseRetryAfter(' 2.5 ')).toBe(2.5);
    expect(parseRetryAfter('.5')).toBe(0.5);
    expect(parseRetryAfter('1e1')).toBe(10);
  });

  it('returns undefined for missing or unparseable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('abc')).toBeUndefined();
    expect(parseRetryAfter('Infinity')).toBeUndefined();
    expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:00 GMT')).toBeUndefined();
  });

  it('clamps negative values to zero', () => {
    expect(parseRetryAfter('-3')).toBe(0);
  });
});

describe('isRetriableStatus', () => {
  it.each([429, 500, 502, 503, 504])('treats %i as retriable', (status) => {
    expect(isRetriableStatus(status)).toBe(true);
  });

  it.each([400, 401, 403, 404, 409, 501])('treats %i as terminal', (status) => {
    expect(isRetriableStatus(status)).toBe(false);
  });
});

describe('advance', () => {
  it('moves to success on a 2xx response', () => {
    const response = httpResponse(200, { data: {} });
    const transition = advance(1, { type: 'response', response }, policy);

    expect(transition).toEqual({ state: { kind: 'success', response }, delay: 0 });
  });

  it('fails immediately on a non-retriable status with budget left', () => {
    const transition = advance(
      0,
      { type: 'response', response: httpResponse(404, { error: { message: 'No such path', status: 'NOT_FOUND' } }) },
      policy
    );

    expect(transition.state.kind).toBe('failed');
    if (transition.state.kind !== 'failed') return;
    expect(transition.state.error).toBeInstanceOf(ApiError);
    expect(transition.state.error.status).toBe(404);
    expect(transition.state.error.code).toBe('NOT_FOUND');
    expect(transition.state.error.attempts).toBe(1);
  });

  it('schedules the next attempt with computed backoff for a retriable status', () => {
    const transition = advance(1, { type: 'response', response: httpResponse(503) }, policy);

    expect(transition).toEqual({ state: { kind: 'attempting', attempt: 2 }, delay: 1 });
  });

  it('honours Retry-After on a retriable status', () => {
    const response = httpResponse(429, {}, { 'Retry-After': '5' });

    expect(advance(0, { type: 'response', response }, policy).delay).toBe(5);
  });

  it('caps Retry-After at 30 seconds', () => {
    const response = httpResponse(503, {}, { 'Retry-After': '100' });

    expect(advance(0, { type: 'response', response }, policy).delay).toBe(30);
  });

  it('falls back to computed backoff when Retry-After does not parse', () => {
    const response = httpResponse(503, {}, { 'Retry-After': 'abc' });

    expect(advance(1, { type: 'response', response }, policy).delay).toBe(1);
  });

  it('classifies a retriable status once the budget is spent', () => {
    const response = httpResponse(429, { error: { message: 'Slow down' } }, { 'Retry-After': '3' });
    const transition = advance(2, { type: 'response', response }, policy);

    expect(transition.delay).toBe(0);
    if (transition.state.kind !== 'failed') {
      throw new Error(`expected failed state, got ${transition.state.kind}`);
    }
    expect(transition.state.error).toBeInstanceOf(RateLimitError);
    expect(transition.state.error).toMatchObject({ message: 'Slow down', retryAfter: 3, attempts: 3 });
  });

  it('retries a transport fault with computed backoff', () => {
    const fault = new TransportError('connection', 'ECONNRESET');

    expect(advance(0, { type: 'fault', fault }, policy)).toEqual({
      state: { kind: 'attempting', attempt: 1 },
      delay: 0.5,
    });
  });

  it('fails with the total attempt count after the last transport fault', () => {
    const fault = new TransportError('timeout', 'Request timed out after 30000ms');
    const transition = advance(2, { type: 'fault', fault }, policy);

    if (transition.state.kind !== 'failed') {
      throw new Error(`expected failed state, got ${transition.state.kind}`);
    }
    expect(transition.state.error).toBeInstanceOf(TimeoutError);
    expect(transition.state.error.message).toBe('Request timed out after 3 attempts');
    expect(transition.state.error.cause).toBe(fault);
  });

  it('never retries when maxRetries is 0', () => {
    const transition = advance(0, { type: 'response', response: httpResponse(500) }, { maxRetries: 0 });

    expect(transition.state.kind).toBe('failed');
  });
});
