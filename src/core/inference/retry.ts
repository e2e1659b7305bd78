import { setTimeout as delay } from 'timers/promises';
import { isTransientError } from '../errors';
import { errorMessage, type Logger } from '../log';

export interface RetryOptions {
  label: string;
  attempts: number;
  /** Wait before attempt n+1 is n * backoffMs. */
  backoffMs: number;
  log?: Logger;
  sleep?: (ms: number) => Promise<void>;
  isRetryable?: (e: unknown) => boolean;
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const retryable = options.isRetryable ?? isTransientError;
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (e) {
      lastError = e;
      if (!retryable(e) || attempt === attempts) break;
      const waitMs = attempt * options.backoffMs;
      options.log?.warn('retry', { op: options.label, attempt, of: attempts, wait_ms: waitMs, err: errorMessage(e) });
      await sleep(waitMs);
    }
  }
  throw lastError;
}
