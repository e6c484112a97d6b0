import { vi } from 'vitest';
import type { Transport, TransportRequest } from '../src/transport';
import type { HttpResponse, Logger } from '../src/types';

export function httpResponse(
  status: number,
  body: unknown = {},
  headers: Record<string, string> = {},
  statusText = ''
): HttpResponse {
  return {
    status,
    statusText,
    headers: new Headers(headers),
    body: typeof body === 'string' ? body : JSON.stringify(body),
  };
}

export type ScriptStep = HttpResponse | Error;

/**
 * Transport that replays `steps` in order; the last step repeats forever.
 */
export function scriptedTransport(steps: ScriptStep[]) {
  const queue = [...steps];
  const requests: TransportRequest[] = [];

  const send = vi.fn(async (request: TransportRequest): Promise<HttpResponse> => {
    requests.push(request);
    const step = queue.length > 1 ? queue.shift() : queue[0];
    if (step === undefined) {
      throw new Error('transport script is empty');
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  });
  const close = vi.fn();
  const transport: Transport = { send, close };

  return { transport, send, close, requests };
}

export function recordingSleep() {
  return vi.fn(async (_ms: number): Promise<void> => {});
}

export function silentLogger() {
  return { debug: vi.fn(), warn: vi.fn() } satisfies Logger;
}
