import { NetworkError, RateLimitError, ServerError, TimeoutError } from '../errors';

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown) => void;
}

export class RetryError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(message);
    this.name = 'RetryError';
  }
}

/**
 * Errors worth another attempt: the relay was unreachable, overloaded or timed out.
 */
export function isTransientError(error: unknown): boolean {
  return (
    error instanceof NetworkError ||
    error instanceof TimeoutError ||
    error instanceof RateLimitError ||
    error instanceof ServerError
  );
}

/**
 * Exponential backoff with ±25% jitter.
 */
export function backoffDelay(
  attempt: number,
  baseDelay: number,
  maxDelay: number,
  backoffMultiplier: number = 2
): number {
  const delay = Math.min(baseDelay * Math.pow(backoffMultiplier, attempt), maxDelay);
  const jitter = delay * 0.25 * (Math.random() * 2 - 1);
  return Math.max(0, delay + jitter);
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 1000,
    maxDelay = 30000,
    backoffMultiplier = 2,
    isRetryable = isTransientError,
    onRetry,
  } = options;

  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      if (attempt >= maxRetries) {
        throw new RetryError(`Failed after ${attempt + 1} attempts`, attempt + 1, error);
      }

      if (onRetry) {
        onRetry(attempt + 1, error);
      }

      await sleep(backoffDelay(attempt, baseDelay, maxDelay, backoffMultiplier));
      attempt += 1;
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
