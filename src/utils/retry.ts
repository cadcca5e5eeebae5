/**
 * Retry logic with exponential backoff for dataset downloads.
 *
 * Features:
 * - Exponential backoff with jitter
 * - Respects Retry-After headers
 * - Only retries on retryable errors (429, 5xx, network)
 * - Callback hook for logging
 */

export interface RetryOptions {
  maxRetries?: number;         // default: 3
  initialDelayMs?: number;     // default: 1000
  maxDelayMs?: number;         // default: 30000
  backoffMultiplier?: number;  // default: 2
  retryableStatuses?: number[]; // default: [429, 500, 502, 503, 504]
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

export class RetryableError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'RetryableError';
  }
}

/** Non-2xx HTTP response. Retryable only for the configured statuses. */
export class HttpError extends RetryableError {
  constructor(
    public readonly url: string,
    statusCode: number,
    statusText: string,
    retryAfterMs?: number,
  ) {
    super(`HTTP ${statusCode} ${statusText} for ${url}`, statusCode, retryAfterMs);
    this.name = 'HttpError';
  }
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry'>> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatuses: [429, 500, 502, 503, 504],
};

const NETWORK_ERROR_MARKERS = ['fetch failed', 'ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND'];

/**
 * Execute a function with retry logic.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof Error) || !isRetryableError(error, opts.retryableStatuses)) {
        throw error;
      }
      if (attempt >= opts.maxRetries) {
        throw error;
      }

      const retryAfterMs = error instanceof RetryableError ? error.retryAfterMs : undefined;
      const baseDelay = retryAfterMs ?? calculateBackoff(attempt, opts.initialDelayMs, opts.backoffMultiplier);
      const delayMs = Math.min(addJitter(baseDelay), opts.maxDelayMs);

      options.onRetry?.(error, attempt + 1, delayMs);

      await sleep(delayMs);
    }
  }
}

export function isRetryableError(error: Error, retryableStatuses: number[]): boolean {
  if (error instanceof RetryableError) {
    return error.statusCode === undefined || retryableStatuses.includes(error.statusCode);
  }

  // Network errors (fetch failures) and timeouts
  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return true;
  }
  const causeMessage = error.cause instanceof Error ? error.cause.message : '';
  return NETWORK_ERROR_MARKERS.some(
    (marker) => error.message.includes(marker) || causeMessage.includes(marker),
  );
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;

  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

function calculateBackoff(attempt: number, initialDelayMs: number, multiplier: number): number {
  return initialDelayMs * Math.pow(multiplier, attempt);
}

/**
 * Returns a value between 0.5x and 1.5x the input.
 */
function addJitter(delayMs: number): number {
  const jitterFactor = 0.5 + Math.random();
  return Math.floor(delayMs * jitterFactor);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
