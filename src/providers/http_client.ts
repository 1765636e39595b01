/**
 * JSON-over-HTTP base for provider clients: rate limited, exponential backoff
 * on 429/5xx and network errors, ProviderError on final failure.
 */

import type { Logger } from '@/utils/logger';
import { sleep } from '@/utils/throttler';
import { RateLimiter, type RateLimiterConfig } from './rate_limiter';
import { ProviderError } from './types';

export type FetchFn = typeof fetch;

export interface HttpClientOptions {
  fetchImpl?: FetchFn;
  rateLimit?: Partial<RateLimiterConfig>;
  maxRetries?: number;
  initialBackoffMs?: number;
}

export interface RequestContext {
  symbol: string;
  method: string;
}

/** Non-retryable HTTP status. */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    statusText: string
  ) {
    super(`HTTP ${status} ${statusText}`);
    this.name = 'HttpStatusError';
  }
}

export abstract class JsonHttpClient {
  protected readonly fetchImpl: FetchFn;
  protected readonly rateLimiter: RateLimiter;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private requestCount = 0;

  protected constructor(
    protected readonly providerName: string,
    protected readonly logger: Logger,
    options: HttpClientOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.rateLimiter = new RateLimiter(options.rateLimit);
    this.maxRetries = options.maxRetries ?? 2;
    this.initialBackoffMs = options.initialBackoffMs ?? 500;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  protected headers(): Record<string, string> {
    return { Accept: 'application/json' };
  }

  /**
   * GET `url` and parse the body as JSON. The parsed body is typed by the
   * caller; every field read from it is still checked at use.
   */
  protected async fetchWithRetry<T>(url: URL, context: RequestContext): Promise<T> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      await this.rateLimiter.acquire();
      try {
        const response = await this.fetchImpl(url.toString(), { headers: this.headers() });
        this.requestCount++;

        if (response.status === 429 || response.status >= 500) {
          lastError = new HttpStatusError(response.status, response.statusText);
        } else if (!response.ok) {
          throw new HttpStatusError(response.status, response.statusText);
        } else {
          const data: T = await response.json();
          return data;
        }
      } catch (error) {
        if (error instanceof HttpStatusError) {
          throw new ProviderError(
            `${this.providerName} ${context.method} failed: ${error.message}`,
            this.providerName,
            context.symbol,
            context.method,
            error
          );
        }
        lastError = error instanceof Error ? error : new Error(String(error));
      } finally {
        this.rateLimiter.release();
      }

      if (attempt < this.maxRetries) {
        const backoffMs = this.initialBackoffMs * Math.pow(2, attempt);
        this.logger.warn(
          { attempt, backoffMs, method: context.method, symbol: context.symbol, error: lastError?.message },
          `${this.providerName} request failed, retrying`
        );
        await sleep(backoffMs);
      }
    }

    throw new ProviderError(
      `${this.providerName} ${context.method} failed after retries`,
      this.providerName,
      context.symbol,
      context.method,
      lastError ?? undefined
    );
  }
}
