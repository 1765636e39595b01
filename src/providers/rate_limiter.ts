/**
 * Sliding one-minute request window plus a concurrency cap.
 */

import { createChildLogger } from '@/utils/logger';
import { sleep } from '@/utils/throttler';

const logger = createChildLogger('rate_limiter');

export interface RateLimiterConfig {
  maxRequestsPerMinute: number;
  maxConcurrent: number;
}

export class RateLimiter {
  private requestTimes: number[] = [];
  private activeRequests = 0;
  private waitQueue: Array<() => void> = [];
  private readonly config: RateLimiterConfig;

  constructor(config: Partial<RateLimiterConfig> = {}) {
    this.config = {
      maxRequestsPerMinute: config.maxRequestsPerMinute ?? 60,
      maxConcurrent: config.maxConcurrent ?? 2,
    };
  }

  private cleanOldRequests(): void {
    const oneMinuteAgo = Date.now() - 60_000;
    this.requestTimes = this.requestTimes.filter((t) => t > oneMinuteAgo);
  }

  private async waitForSlot(): Promise<void> {
    this.cleanOldRequests();

    if (this.requestTimes.length >= this.config.maxRequestsPerMinute) {
      const waitTime = this.requestTimes[0] + 60_000 - Date.now();
      if (waitTime > 0) {
        logger.debug({ waitTime }, 'Rate limit reached, waiting');
        await sleep(waitTime);
        this.cleanOldRequests();
      }
    }

    while (this.activeRequests >= this.config.maxConcurrent) {
      await new Promise<void>((resolve) => {
        this.waitQueue.push(resolve);
      });
    }
  }

  async acquire(): Promise<void> {
    await this.waitForSlot();
    this.activeRequests++;
    this.requestTimes.push(Date.now());
  }

  release(): void {
    this.activeRequests = Math.max(0, this.activeRequests - 1);
    const next = this.waitQueue.shift();
    if (next) {
      next();
    }
  }
}
