import type { HttpMethod, HttpResponse } from './types';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  /** Milliseconds before the request is abandoned. */
  timeout: number;
}

/**
 * Performs exactly one HTTP exchange. Implementations reject with a
 * `TransportError` when no response could be obtained.
 */
export interface Transport {
  send(request: TransportRequest): Promise<HttpResponse>;
  close(): void;
}

export type TransportFault = 'timeout' | 'connection';

export class TransportError extends Error {
  constructor(
    public readonly fault: TransportFault,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class FetchTransport implements Transport {
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(private readonly fetchImpl: typeof fetch = globalThis.fetch) {}

  async send(request: TransportRequest): Promise<HttpResponse> {
    if (this.closed) {
      throw new TransportError('connection', 'Transport is closed');
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, request.timeout);
    this.inFlight.add(controller);

    const fetchImpl = this.fetchImpl;

    try {
      const response = await fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });
      const body = await response.text();

      return {
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
        body,
      };
    } catch (error) {
      if (timedOut) {
        throw new TransportError('timeout', `Request timed out after ${request.timeout}ms`, { cause: error });
      }
      if (this.closed) {
        throw new TransportError('connection', 'Transport closed while the request was in flight', { cause: error });
      }
      throw new TransportError(
        'connection',
        error instanceof Error ? error.message : 'Unknown network error',
        { cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
      this.inFlight.delete(controller);
    }
  }

  close(): void {
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }
}
