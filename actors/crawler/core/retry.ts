import { waitFor } from '../crawlerUtils';

export interface RetryOptions {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Delay before the second attempt */
  delayMs: number;
  /** 'exponential' doubles the delay after each failed retry */
  backoff?: 'fixed' | 'exponential';
  /** Return false to give up immediately */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function retryDelay(
  options: Pick<RetryOptions, 'delayMs' | 'backoff'>,
  attempt: number
): number {
  if (options.backoff === 'exponential') {
    return options.delayMs * 2 ** (attempt - 1);
  }
  return options.delayMs;
}

/**
 * Run `fn` until it resolves or the attempts are used up. The last error
 * is rethrown as is.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? waitFor;
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const canRetry =
        attempt < maxAttempts && (options.shouldRetry?.(error, attempt) ?? true);
      if (!canRetry) {
        throw error;
      }

      const delay = retryDelay(options, attempt);
      options.onRetry?.(error, attempt, delay);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }
}
