import { ApiClient, createApiClient } from '../client';
import { isRecord } from '../errors';
import type { ApiResponse } from '../types';
import { ApiError, ConfigurationError } from '../types';
import type {
  Detection,
  DetectionPayload,
  Language,
  LanguagePayload,
  TranslateOptions,
  TranslateRequestBody,
  Translation,
  TranslationClientConfig,
  TranslationPayload,
} from './types';

// Largest delay setTimeout honours; anything above fires immediately.
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

const TRANSLATE_PATH = '/language/translate/v2';
const DETECT_PATH = '/language/translate/v2/detect';
const LANGUAGES_PATH = '/language/translate/v2/languages';

export class TranslationClient {
  private readonly client: ApiClient;
  protected readonly defaultBaseURL = 'https://api.langbly.com';
  private readonly defaultTimeout = 30000;
  private readonly defaultMaxRetries = 2;
  readonly baseURL: string;

  constructor(config: TranslationClientConfig) {
    if (typeof config.apiKey !== 'string' || config.apiKey.trim() === '') {
      throw new ConfigurationError('An API key is required');
    }

    this.baseURL = resolveBaseURL(config.baseURL ?? this.defaultBaseURL);

    const timeout = config.timeout ?? this.defaultTimeout;
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new ConfigurationError(`timeout must be a positive number of milliseconds, got ${timeout}`);
    }
    if (timeout > MAX_TIMEOUT_MS) {
      throw new ConfigurationError(`timeout must not exceed ${MAX_TIMEOUT_MS}ms, got ${timeout}`);
    }

    const maxRetries = config.maxRetries ?? this.defaultMaxRetries;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new ConfigurationError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
    }

    this.client = createApiClient({
      baseURL: this.baseURL,
      defaultHeaders: {
        Accept: 'application/json',
        Authorization: `Bearer ${config.apiKey}`,
      },
      timeout,
      maxRetries,
      transport: config.transport,
      logger: config.logger,
      sleep: config.sleep,
    });
  }

  /**
   * Translates one string or a list of strings into `options.target`.
   * A single string yields a single `Translation`; a list yields one per
   * input, in order.
   */
  translate(text: string, options: TranslateOptions): Promise<Translation>;
  translate(text: string[], options: TranslateOptions): Promise<Translation[]>;
  async translate(text: string | string[], options: TranslateOptions): Promise<Translation | Translation[]> {
    const q = typeof text === 'string' ? [text] : text;

    if (q.length === 0) {
      return [];
    }

    const body: TranslateRequestBody = { q, target: options.target };
    if (options.source) {
      body.source = options.source;
    }
    if (options.format) {
      body.format = options.format;
    }

    const response = await this.client.post(TRANSLATE_PATH, body);
    const items = readList(response, 'translations');

    const translations = items.map((item): Translation => {
      if (!isTranslationPayload(item)) {
        throw invalidResponse(response, 'Translation entry is malformed');
      }
      return {
        text: item.translatedText,
        source: item.detectedSourceLanguage ?? (options.source || ''),
        model: item.model,
      };
    });

    if (typeof text === 'string') {
      const [first] = translations;
      if (!first) {
        throw invalidResponse(response, 'Response contained no translations');
      }
      return first;
    }

    return translations;
  }

  async detect(text: string): Promise<Detection> {
    const response = await this.client.post(DETECT_PATH, { q: text });
    const [group] = readList(response, 'detections');
    const detection = Array.isArray(group) ? group[0] : undefined;

    if (!isDetectionPayload(detection)) {
      throw invalidResponse(response, 'Response contained no detections');
    }

    return {
      language: detection.language,
      confidence: detection.confidence ?? 0,
    };
  }

  /**
   * Lists supported languages. With `target`, names are given in that language.
   */
  async languages(target?: string): Promise<Language[]> {
    const params: Record<string, string> = {};
    if (target) {
      params.target = target;
    }

    const response = await this.client.get(LANGUAGES_PATH, params);

    return readList(response, 'languages').map((entry): Language => {
      if (!isLanguagePayload(entry)) {
        throw invalidResponse(response, 'Language entry is missing its code');
      }
      return { code: entry.language, name: entry.name };
    });
  }

  close(): void {
    this.client.close();
  }
}

function resolveBaseURL(value: string): string {
  const trimmed = value.replace(/\/+$/, '');
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new ConfigurationError(`baseURL is not a valid URL: ${value}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`baseURL must use http or https: ${value}`);
  }
  return trimmed;
}

function isOptional(value: unknown, type: 'string' | 'number'): boolean {
  return value === undefined || typeof value === type;
}

function isTranslationPayload(value: unknown): value is TranslationPayload {
  return (
    isRecord(value) &&
    typeof value.translatedText === 'string' &&
    isOptional(value.detectedSourceLanguage, 'string') &&
    isOptional(value.model, 'string')
  );
}

function isDetectionPayload(value: unknown): value is DetectionPayload {
  return isRecord(value) && typeof value.language === 'string' && isOptional(value.confidence, 'number');
}

function isLanguagePayload(value: unknown): value is LanguagePayload {
  return isRecord(value) && typeof value.language === 'string' && isOptional(value.name, 'string');
}

function readList(response: ApiResponse<unknown>, field: string): unknown[] {
  const envelope = response.data;
  if (isRecord(envelope) && isRecord(envelope.data)) {
    const list = envelope.data[field];
    if (Array.isArray(list)) {
      return list;
    }
  }
  throw invalidResponse(response, `Response is missing data.${field}`);
}

function invalidResponse(response: ApiResponse<unknown>, message: string): ApiError {
  return new ApiError(message, response.status, 'INVALID_RESPONSE');
}

export function createTranslationClient(config: TranslationClientConfig): TranslationClient {
  return new TranslationClient(config);
}

/**
 * Creates a client for the duration of `fn` and closes it afterwards,
 * whether `fn` resolves or rejects.
 */
export async function withTranslationClient<T>(
  config: TranslationClientConfig,
  fn: (client: TranslationClient) => Promise<T>
): Promise<T> {
  const client = createTranslationClient(config);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}
