/**
 * Retry Strategy with Exponential Backoff
 *
 * Handles transient failures (rate limits, timeouts) from the inference
 * provider. Non-retryable errors (bad credentials, unreadable responses)
 * are thrown immediately.
 */

import { AppError, ErrorCode, toAppError } from './error-handling';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  jitter?: boolean; // Add randomness to prevent thundering herd
  defaultErrorCode?: ErrorCode;
  onRetry?: (attempt: number, delay: number, error: Error) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
  defaultErrorCode: ErrorCode.INTERNAL_ERROR,
  onRetry: () => {},
};

/**
 * Retry a function with exponential backoff
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error = new Error('Unknown error');

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const appError = toAppError(error, opts.defaultErrorCode);

      if (!appError.isRetryable() || attempt === opts.maxRetries) {
        throw appError;
      }

      let delay = opts.initialDelayMs * Math.pow(opts.backoffMultiplier, attempt);
      delay = Math.min(delay, opts.maxDelayMs);

      // ±10%
      if (opts.jitter) {
        const jitterAmount = delay * 0.1;
        delay += (Math.random() - 0.5) * 2 * jitterAmount;
      }

      opts.onRetry(attempt + 1, delay, lastError);

      await new Promise(resolve => setTimeout(resolve, Math.round(delay)));
    }
  }

  throw lastError;
}

/**
 * Retry wrapper for API calls with logging
 */
export async function callWithRetry<T>(
  name: string, // For logging: "Roboflow", ...
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  return retryWithBackoff(fn, {
    ...options,
    onRetry: (attempt, delay, error) => {
      console.warn(
        `[${name}] Retry ${attempt} after ${Math.round(delay)}ms. Error: ${error.message}`
      );
      options.onRetry?.(attempt, delay, error);
    },
  });
}

/**
 * Timeout wrapper - rejects with `errorCode` after X milliseconds
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorCode: ErrorCode = ErrorCode.INFERENCE_TIMEOUT
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new AppError(errorCode, new Error(`Operation timed out after ${timeoutMs}ms`))),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
