/**
 * Retry utilities.
 * Retries an operation on thrown errors (with backoff) and, optionally, on
 * results the caller considers unsuccessful. The last attempt's outcome is
 * returned or thrown; earlier attempts are discarded.
 */

import { setTimeout as sleep } from 'timers/promises';
import { ILogger } from './logger.js';
import type { BackoffType } from './config.js';

export type ErrorConstructor = new (...args: never[]) => Error;

export interface RetryOptions<T> {
  maxRetries: number;
  backoff: BackoffType;
  initialDelay?: number; // milliseconds
  maxDelay?: number; // milliseconds
  retryableErrors?: ErrorConstructor[];
  /** When false, thrown errors are rethrown at once and only results are retried. */
  retryOnError?: boolean;
  /** Return true to spend another attempt on this result. */
  shouldRetryResult?: (result: T) => boolean;
  onRetry?: (reason: Error | T, attempt: number) => void;
  signal?: AbortSignal;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

export class RetryableError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'RetryableError';
  }
}

export class FatalError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'FatalError';
  }
}

const RETRYABLE_PATTERNS = [
  /timeout/i,
  /network/i,
  /connection/i,
  /ECONNREFUSED/i,
  /ECONNRESET/i,
  /ETIMEDOUT/i,
  /rate.?limit/i,
  /too many requests/i,
  /\b50[234]\b/,
];

export class RetryStrategy {
  constructor(private logger?: ILogger) {}

  async execute<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions<T>): Promise<T> {
    const outcome = await this.executeWithAttempts(operation, options);
    return outcome.value;
  }

  /**
   * Same as execute, also reporting how many attempts were made.
   */
  async executeWithAttempts<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions<T>
  ): Promise<RetryOutcome<T>> {
    const {
      maxRetries,
      backoff,
      initialDelay = 1000,
      maxDelay = 30000,
      retryableErrors = [],
      retryOnError = true,
      shouldRetryResult,
      onRetry,
      signal,
    } = options;

    const lastAttempt = Math.max(0, maxRetries);

    for (let attempt = 0; ; attempt++) {
      signal?.throwIfAborted();

      let result: T;
      try {
        result = await operation(attempt + 1);
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));
        const isRetryable = retryOnError && this.isRetryableError(lastError, retryableErrors);

        if (!isRetryable || attempt >= lastAttempt || signal?.aborted) {
          this.logger?.warn('Operation failed without further retries', {
            attempt: attempt + 1,
            maxRetries,
            error: lastError.message,
            isRetryable,
          });
          throw lastError;
        }

        const delay = this.calculateDelay(attempt, backoff, initialDelay, maxDelay);
        this.logger?.warn(`Retry attempt ${attempt + 1}/${maxRetries}`, {
          error: lastError.message,
          nextRetryIn: delay,
        });
        onRetry?.(lastError, attempt + 1);
        await this.pause(delay, signal);
        continue;
      }

      if (!shouldRetryResult || attempt >= lastAttempt || !shouldRetryResult(result)) {
        return { value: result, attempts: attempt + 1 };
      }

      const delay = this.calculateDelay(attempt, backoff, initialDelay, maxDelay);
      this.logger?.info(`Result not accepted, retrying (${attempt + 1}/${maxRetries})`, { nextRetryIn: delay });
      onRetry?.(result, attempt + 1);
      await this.pause(delay, signal);
    }
  }

  private isRetryableError(error: Error, retryableErrors: ErrorConstructor[]): boolean {
    if (error instanceof RetryableError) {
      return true;
    }

    if (error instanceof FatalError || error.name === 'AbortError') {
      return false;
    }

    if (retryableErrors.length > 0) {
      return retryableErrors.some(ErrorType => error instanceof ErrorType);
    }

    return RETRYABLE_PATTERNS.some(pattern => pattern.test(error.message));
  }

  private calculateDelay(attempt: number, backoff: BackoffType, initialDelay: number, maxDelay: number): number {
    let delay: number;

    switch (backoff) {
      case 'none':
        return 0;
      case 'exponential':
        delay = initialDelay * Math.pow(2, attempt);
        break;
      case 'linear':
        delay = initialDelay * (attempt + 1);
        break;
      case 'constant':
      default:
        delay = initialDelay;
    }

    // Add jitter (0-20% random variation)
    const jitter = delay * 0.2 * Math.random();
    return Math.min(delay + jitter, maxDelay);
  }

  private async pause(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms > 0) {
      await sleep(ms, undefined, { signal });
    }
  }
}
