const NON_RETRYABLE_STATUSES = new Set([400, 401, 403, 404, 422]);
const RATE_LIMIT_PATTERNS = [
  'rate limit',
  'rate_limit',
  'ratelimit',
  'too many requests',
  'quota exceeded',
];

type HeaderBag = Headers | Record<string, string | undefined>;

function readHeader(headers: HeaderBag | undefined, name: string): string | null {
  if (!headers) return null;
  if (headers instanceof Headers) {
    return headers.get(name);
  }
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  const value = key ? headers[key] : undefined;
  return typeof value === 'string' ? value : null;
}

export function getStatusCode(error: unknown): number | null {
  const fromTopLevel = (error as { status?: unknown; statusCode?: unknown }) ?? {};
  const topStatus = typeof fromTopLevel.status === 'number'
    ? fromTopLevel.status
    : (typeof fromTopLevel.statusCode === 'number' ? fromTopLevel.statusCode : null);
  if (topStatus != null) return topStatus;

  const responseStatus = (error as { response?: { status?: unknown } })?.response?.status;
  if (typeof responseStatus === 'number') return responseStatus;

  // Status embedded in message ("OpenAI API error 429: ...")
  const msg = error instanceof Error ? error.message : '';
  const match = msg.match(/\berror (\d{3})\b/i);
  return match ? parseInt(match[1], 10) : null;
}

export function isRateLimitError(error: unknown): boolean {
  if (getStatusCode(error) === 429) return true;
  const msg = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return RATE_LIMIT_PATTERNS.some((p) => msg.includes(p));
}

function isRetryable(error: unknown): boolean {
  if (error instanceof Error && error.name === 'ConfigurationError') return false;
  const status = getStatusCode(error);
  return status == null || !NON_RETRYABLE_STATUSES.has(status);
}

/**
 * Extract Retry-After delay from provider error headers.
 * Returns delay in milliseconds, or 0 if not present.
 */
function getRetryAfterMs(error: unknown): number {
  const topHeaders = (error as { headers?: HeaderBag })?.headers;
  const responseHeaders = (error as { response?: { headers?: HeaderBag } })?.response?.headers;
  const retryAfter = readHeader(topHeaders, 'retry-after') ?? readHeader(responseHeaders, 'retry-after');
  if (!retryAfter) return 0;

  const seconds = parseFloat(retryAfter);
  if (!isNaN(seconds) && seconds > 0) {
    // Cap at 10 minutes
    return Math.min(seconds, 600) * 1000;
  }
  return 0;
}

export interface RetryOptions {
  maxAttempts?: number;
  /** Base delay for generic failures; doubles per attempt. */
  baseDelay?: number;
  /** Base delay for rate-limit failures; doubles per attempt. */
  rateLimitBaseDelay?: number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before the next attempt. Rate limits back off in minutes, everything
 * else in seconds; a larger Retry-After from the provider wins.
 */
export function computeBackoff(
  error: unknown,
  attempt: number,
  baseDelay: number,
  rateLimitBaseDelay: number,
): number {
  if (isRateLimitError(error)) {
    const backoff = rateLimitBaseDelay * Math.pow(2, attempt - 1);
    return Math.max(backoff, getRetryAfterMs(error));
  }
  return baseDelay * Math.pow(2, attempt - 1);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const maxAttempts = Math.max(1, options?.maxAttempts ?? 3);
  const baseDelay = options?.baseDelay ?? 1000;
  const rateLimitBaseDelay = options?.rateLimitBaseDelay ?? 60_000;
  const sleep = options?.sleep ?? defaultSleep;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || !isRetryable(err)) {
        throw lastError;
      }

      const delay = computeBackoff(err, attempt, baseDelay, rateLimitBaseDelay);
      options?.onRetry?.(attempt, lastError, delay);
      await sleep(delay);
    }
  }

  throw lastError ?? new Error('withRetry exhausted without an error');
}
