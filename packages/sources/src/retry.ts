/**
 * Retry with exponential backoff for calls leaving the process (uploads).
 */

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Network error codes worth another attempt. */
  retryableCodes?: string[];
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry'>> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableCodes: ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'UND_ERR_SOCKET'],
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function readProperty(value: object, key: string): unknown {
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

/**
 * Retryable: HTTP 429 and 5xx (a `status` property), or a network failure whose
 * `code`, or whose `cause`'s code, is listed.
 */
export function isRetryableError(error: unknown, retryableCodes: string[]): boolean {
  if (error === null || typeof error !== 'object') {
    return false;
  }

  const status = readProperty(error, 'status');
  if (typeof status === 'number') {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = readProperty(error, 'code');
  if (typeof code === 'string') {
    return retryableCodes.includes(code);
  }

  const cause = error instanceof Error ? error.cause : undefined;
  if (cause !== undefined && cause !== error) {
    return isRetryableError(cause, retryableCodes);
  }

  return false;
}

/**
 * Calculate delay with exponential backoff and jitter.
 */
export function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number
): number {
  const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);
  const jitter = Math.random() * 0.3 * exponentialDelay; // 0-30% jitter
  return Math.min(exponentialDelay + jitter, maxDelayMs);
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= opts.maxRetries + 1; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt > opts.maxRetries || !isRetryableError(error, opts.retryableCodes)) {
        throw lastError;
      }

      const delayMs = calculateDelay(attempt, opts.initialDelayMs, opts.maxDelayMs, opts.backoffMultiplier);

      if (options.onRetry !== undefined) {
        options.onRetry(attempt, lastError, delayMs);
      }

      await sleep(delayMs);
    }
  }

  throw lastError ?? new Error('Retry failed');
}
