import { AppError } from '../errors.js';
import { errorMessage, sleep } from './helpers.js';
import { logger } from './logger.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
  /** Returning false stops at the current attempt */
  shouldRetry: (err: unknown, attempt: number) => boolean;
}

/** Client errors (4xx AppErrors) fail the same way on every attempt */
export function isTransientError(err: unknown): boolean {
  return !(err instanceof AppError && err.statusCode >= 400 && err.statusCode < 500);
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  jitter: true,
  shouldRetry: () => true,
};

export function backoffDelay(attempt: number, options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'jitter'>): number {
  const delay = Math.min(options.baseDelayMs * 2 ** attempt, options.maxDelayMs);
  return options.jitter ? delay * (0.5 + Math.random() * 0.5) : delay;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  label: string,
  opts: Partial<RetryOptions> = {},
): Promise<T> {
  const options = { ...DEFAULT_OPTIONS, ...opts };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= options.maxRetries || !options.shouldRetry(err, attempt)) throw err;

      const delay = backoffDelay(attempt, options);
      logger.warn(`[retry] ${label} attempt ${attempt + 1} failed, retrying in ${Math.round(delay)}ms`, {
        error: errorMessage(err),
      });
      await sleep(delay);
    }
  }
}
