import { logger } from '../utils/logger.js';
import { errorMessage, shortenAddress, sleep } from '../utils/helpers.js';
import type { RateLimiter } from '../utils/rate-limiter.js';
import type { DataSource, ServiceResult, SourceName } from '../types.js';

export interface HttpSourceOptions {
  timeoutMs: number;
  rateLimiter?: RateLimiter;
  /** Wait before the single retry on HTTP 429 */
  retryDelayMs?: number;
}

export class SourceHttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'SourceHttpError';
  }
}

interface JsonRequest {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

/**
 * Base for provider clients. `fetch` never throws: HTTP failures, timeouts
 * and aborts come back as a ServiceResult with the matching status.
 */
export abstract class HttpSource implements DataSource {
  abstract readonly name: SourceName;

  constructor(protected readonly options: HttpSourceOptions) {}

  protected abstract request(tokenAddress: string, signal: AbortSignal): Promise<unknown>;

  async fetch(tokenAddress: string, signal?: AbortSignal): Promise<ServiceResult> {
    const started = Date.now();
    try {
      const payload = await this.request(tokenAddress, signal ?? AbortSignal.timeout(this.options.timeoutMs));
      logger.debug(`[${this.name}] ${shortenAddress(tokenAddress)} ok in ${Date.now() - started}ms`);
      return { source: this.name, tokenAddress, fetchedAt: Date.now(), status: 'ok', payload };
    } catch (err) {
      const status = isTimeout(err) ? 'timeout' : 'error';
      const detail = status === 'timeout' ? `No response after ${Date.now() - started}ms` : errorMessage(err);
      logger.warn(`[${this.name}] ${shortenAddress(tokenAddress)} ${status}: ${detail}`);
      return { source: this.name, tokenAddress, fetchedAt: Date.now(), status, payload: null, errorDetail: detail };
    }
  }

  /** JSON request with one retry on 429. 404 and other non-2xx statuses throw SourceHttpError. */
  protected async requestJson(url: string, signal: AbortSignal, init: JsonRequest = {}): Promise<unknown> {
    await this.options.rateLimiter?.acquire();

    const send = () =>
      fetch(url, {
        method: init.method ?? 'GET',
        headers: {
          Accept: 'application/json',
          ...(init.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
          ...init.headers,
        },
        body: init.body !== undefined ? JSON.stringify(init.body) : undefined,
        signal,
      });

    let response = await send();

    if (response.status === 429) {
      const delay = this.options.retryDelayMs ?? 1_000;
      logger.debug(`[${this.name}] Rate limited, retrying in ${delay}ms...`);
      await sleep(delay);
      signal.throwIfAborted();
      response = await send();
    }

    if (response.status === 404) {
      throw new SourceHttpError(404, 'Token not found');
    }
    if (!response.ok) {
      throw new SourceHttpError(response.status, `HTTP ${response.status} ${response.statusText}`.trim());
    }

    return response.json();
  }
}
