import type { Logger, Sleep } from '../types';
import type { Transport } from '../transport';

export type TextFormat = 'text' | 'html';

export interface Translation {
  text: string;
  /** Detected source language, or the one that was requested. Empty when neither is known. */
  source: string;
  model?: string;
}

export interface Detection {
  language: string;
  confidence: number;
}

export interface Language {
  code: string;
  name?: string;
}

export interface TranslateOptions {
  target: string;
  source?: string;
  format?: TextFormat;
}

export interface TranslationClientConfig {
  apiKey: string;
  baseURL?: string;
  timeout?: number; // milliseconds
  maxRetries?: number;
  transport?: Transport;
  logger?: Logger;
  sleep?: Sleep;
}

// Wire shapes, as returned inside the `data` envelope.

export interface TranslateRequestBody {
  q: string[];
  target: string;
  source?: string;
  format?: TextFormat;
}

export interface TranslationPayload {
  translatedText: string;
  detectedSourceLanguage?: string;
  model?: string;
}

export interface DetectionPayload {
  language: string;
  confidence?: number;
}

export interface LanguagePayload {
  language: string;
  name?: string;
}
