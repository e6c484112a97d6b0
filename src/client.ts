import type {
  ApiResponse,
  HttpResponse,
  Logger,
  QueryParams,
  RequestDescriptor,
  Sleep,
} from './types';
import { ApiError, ConnectionError } from './types';
import { FetchTransport, TransportError, type Transport } from './transport';
import { advance, type AttemptOutcome, type ExecutionState, type RetryPolicy } from './retry';
import { tryParseJson } from './errors';

export interface ApiClientConfig {
  baseURL: string;
  defaultHeaders?: Record<string, string>;
  timeout?: number;
  maxRetries?: number;
  transport?: Transport;
  logger?: Logger;
  sleep?: Sleep;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

// Retry notices are dropped; warnings go to stderr.
const defaultLogger: Logger = {
  debug: () => {},
  warn: (...args: unknown[]) => console.warn(...args),
};

export class ApiClient {
  private readonly baseURL: string;
  private readonly defaultHeaders: Record<string, string>;
  private readonly defaultTimeout: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private closed = false;

  constructor(config: ApiClientConfig) {
    this.baseURL = config.baseURL;
    this.defaultHeaders = config.defaultHeaders || {};
    this.defaultTimeout = config.timeout ?? 30000;
    this.retryPolicy = { maxRetries: config.maxRetries ?? 2 };
    this.transport = config.transport ?? new FetchTransport();
    this.logger = config.logger ?? defaultLogger;
    this.sleep = config.sleep ?? defaultSleep;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Runs one request to a terminal outcome: the first 2xx response, or a
   * classified `ApiError` once the status is not retriable or the attempt
   * budget (`maxRetries + 1` attempts) is spent.
   */
  async execute(request: RequestDescriptor): Promise<HttpResponse> {
    if (this.closed) {
      throw closedError(0);
    }

    let state: ExecutionState = { kind: 'attempting', attempt: 0 };

    for (;;) {
      switch (state.kind) {
        case 'success':
          return state.response;
        case 'failed':
          throw state.error;
        case 'attempting': {
          const attempt: number = state.attempt;
          if (this.closed) {
            state = { kind: 'failed', error: closedError(attempt) };
            break;
          }
          const outcome = await this.attempt(request);
          const transition = advance(attempt, outcome, this.retryPolicy);

          if (transition.state.kind === 'attempting' && this.closed) {
            state = { kind: 'failed', error: closedError(attempt + 1) };
            break;
          }

          if (transition.state.kind === 'attempting') {
            this.logger.debug(
              `${request.method} ${request.path} attempt ${attempt + 1} failed (${describeOutcome(outcome)}), ` +
                `retrying in ${transition.delay}s`
            );
            await this.sleep(transition.delay * 1000);
          }

          state = transition.state;
          break;
        }
      }
    }
  }

  /**
   * Executes the request and parses the JSON body of the successful response.
   */
  async request(request: RequestDescriptor): Promise<ApiResponse<unknown>> {
    const response = await this.execute(request);
    const parsed = tryParseJson(response.body);

    if (!parsed.ok) {
      throw new ApiError('Response body is not valid JSON', response.status, 'INVALID_RESPONSE', {
        cause: parsed.error,
      });
    }

    return {
      data: parsed.value,
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
    };
  }

  async get(endpoint: string, params?: QueryParams): Promise<ApiResponse<unknown>> {
    return this.request({ method: 'GET', path: endpoint, params });
  }

  async post(endpoint: string, body: unknown): Promise<ApiResponse<unknown>> {
    return this.request({ method: 'POST', path: endpoint, body });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.transport.close();
  }

  private async attempt(request: RequestDescriptor): Promise<AttemptOutcome> {
    const headers: Record<string, string> = { ...this.defaultHeaders };
    let body: string | undefined;
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.body);
    }

    const url = this.buildURL(request.path, request.params);

    try {
      const response = await this.transport.send({
        method: request.method,
        url,
        headers,
        body,
        timeout: this.defaultTimeout,
      });
      return { type: 'response', response };
    } catch (error) {
      if (error instanceof TransportError) {
        return { type: 'fault', fault: error };
      }

      this.logger.warn(`Transport threw a non-transport error for ${request.method} ${request.path}:`, error);
      return {
        type: 'fault',
        fault: new TransportError(
          'connection',
          error instanceof Error ? error.message : 'Unknown error occurred',
          { cause: error }
        ),
      };
    }
  }

  private buildURL(endpoint: string, params?: QueryParams): string {
    const baseUrl = new URL(this.baseURL);
    const endpointPath = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
    const basePath = baseUrl.pathname.endsWith('/')
      ? baseUrl.pathname.slice(0, -1)
      : baseUrl.pathname;
    const url = new URL(basePath + endpointPath, baseUrl.origin);

    if (params) {
      Object.entries(params).forEach(([key, value]) => {
        url.searchParams.append(key, String(value));
      });
    }

    return url.toString();
  }
}

function closedError(attempts: number): ConnectionError {
  const error = new ConnectionError('Client is closed');
  error.attempts = attempts;
  return error;
}

function describeOutcome(outcome: AttemptOutcome): string {
  return outcome.type === 'fault' ? outcome.fault.fault : `HTTP ${outcome.response.status}`;
}

export function createApiClient(config: ApiClientConfig): ApiClient {
  return new ApiClient(config);
}
