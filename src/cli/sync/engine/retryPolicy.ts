import { sleep } from '../../../utils';
import { isTransientErrorKind, toErrorKind } from './errors';
import { ErrorKind } from './types';

export interface RetryOptions {
  maxRetryAttempts: number;
  retryBackoffBaseMs: number;
}

export interface RetryRunOptions {
  signal?: AbortSignal;
  onRetry?: (attempt: number, kind: ErrorKind, delayMs: number) => void;
}

/**
 * Retries transient failures (`TransientIO`, `Locked`) with exponential backoff.
 * `attempt` is 1-based: a task may make `maxRetryAttempts + 1` attempts in total.
 */
export class RetryPolicy {
  constructor(readonly options: RetryOptions) {}

  shouldRetry(kind: ErrorKind, attempt: number): boolean {
    return isTransientErrorKind(kind) && attempt <= this.options.maxRetryAttempts;
  }

  /** Delay before the attempt following `attempt`. */
  backoffMs(attempt: number): number {
    return this.options.retryBackoffBaseMs * 2 ** (Math.max(attempt, 1) - 1);
  }

  async run<T>(operation: (attempt: number) => Promise<T>, options: RetryRunOptions = {}): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await operation(attempt);
      } catch (err) {
        const kind = toErrorKind(err);
        if (!this.shouldRetry(kind, attempt) || options.signal?.aborted) {
          throw err;
        }
        const delayMs = this.backoffMs(attempt);
        options.onRetry?.(attempt, kind, delayMs);
        await sleep(delayMs, options.signal);
        if (options.signal?.aborted) {
          throw err;
        }
      }
    }
  }
}
