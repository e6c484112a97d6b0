const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses a `Retry-After` value given in seconds. HTTP-date values and
 * anything else that is not a finite decimal yield `undefined`.
 */
export function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return undefined;
  }

  const seconds = Number(trimmed);
  if (!Number.isFinite(seconds)) {
    return undefined;
  }

  return Math.max(seconds, 0);
}
