import { FatalError, RetryableError } from '../infra/retry-utils.js';

const TRANSIENT_STATUSES = new Set([408, 409, 429]);

/**
 * Maps an SDK API failure onto the retry taxonomy. A missing status means the
 * request never got an answer (connection loss or client timeout).
 */
export function classifyApiFailure(provider: string, status: number | undefined, error: Error): Error {
  const message = `${provider} request failed${status !== undefined ? ` with status ${status}` : ''}: ${error.message}`;
  if (status === undefined || status >= 500 || TRANSIENT_STATUSES.has(status)) {
    return new RetryableError(message, error);
  }
  return new FatalError(message, error);
}
