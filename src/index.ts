export { ApiClient, createApiClient, type ApiClientConfig } from './client';
export { FetchTransport, TransportError, type Transport, type TransportFault, type TransportRequest } from './transport';
export {
  RETRIABLE_STATUSES,
  advance,
  computeBackoffDelay,
  isRetriableStatus,
  isSuccessStatus,
  type AttemptOutcome,
  type ExecutionState,
  type RetryPolicy,
  type Transition,
} from './retry';
export { parseRetryAfter } from './retry-after';
export { classifyFault, classifyResponse, extractErrorDetails, tryParseJson } from './errors';
export {
  ApiError,
  AuthenticationError,
  ConfigurationError,
  ConnectionError,
  RateLimitError,
  TimeoutError,
} from './types';
export type {
  ApiErrorKind,
  ApiResponse,
  HttpMethod,
  HttpResponse,
  Logger,
  QueryParams,
  RequestDescriptor,
  Sleep,
} from './types';
export { TranslationClient, createTranslationClient, withTranslationClient } from './translation/client';
export type {
  Detection,
  Language,
  TextFormat,
  TranslateOptions,
  Translation,
  TranslationClientConfig,
} from './translation/types';
