export type HttpMethod = 'GET' | 'POST';

export type QueryParams = Record<string, string | number | boolean>;

export interface RequestDescriptor {
  readonly method: HttpMethod;
  readonly path: string;
  readonly params?: QueryParams;
  readonly body?: unknown;
}

/**
 * A single HTTP exchange as seen by the executor. The body is kept as text and
 * only parsed when someone asks for it.
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Headers;
  body: string;
}

export interface ApiResponse<T> {
  data: T;
  status: number;
  statusText: string;
  headers: Headers;
}

export type Logger = Pick<Console, 'debug' | 'warn'>;

export type Sleep = (ms: number) => Promise<void>;

export type ApiErrorKind = 'timeout' | 'connection' | 'authentication' | 'rate_limit' | 'api';

/**
 * Terminal failure of a call. Every error the client raises for a request is
 * an `ApiError`; the subclasses narrow `kind` and carry their own fields.
 */
export class ApiError extends Error {
  readonly kind: ApiErrorKind = 'api';
  attempts = 1;

  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string = '',
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ApiError';
  }
}

export class TimeoutError extends ApiError {
  override readonly kind = 'timeout';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 0, 'TIMEOUT', options);
    this.name = 'TimeoutError';
  }
}

export class ConnectionError extends ApiError {
  override readonly kind = 'connection';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 0, 'CONNECTION_FAILED', options);
    this.name = 'ConnectionError';
  }
}

export class AuthenticationError extends ApiError {
  override readonly kind = 'authentication';

  constructor(message: string) {
    super(message, 401, 'UNAUTHENTICATED');
    this.name = 'AuthenticationError';
  }
}

export class RateLimitError extends ApiError {
  override readonly kind = 'rate_limit';

  /** Seconds the service asked us to wait, when it said. */
  readonly retryAfter?: number;

  constructor(message: string, retryAfter?: number) {
    super(message, 429, 'RATE_LIMITED');
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
