// src/core/http/RetryHandler.ts

import axios from 'axios';
import type { FailureKind, RetryConfig } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { TimeSource } from '../../utils/time';

export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger,
    private time: TimeSource,
    private metrics?: MetricsCollector
  ) {}

  /**
   * 429 is rate-limited, configured 5xx and response-less failures are transient,
   * anything else (other 4xx, non-HTTP errors) is fatal
   */
  classify(error: unknown): FailureKind {
    if (!axios.isAxiosError(error)) return 'fatal';

    const status = error.response?.status;
    if (status === undefined) return 'transient';
    if (status === 429) return 'rate-limited';
    if (this.config.transientStatusCodes.includes(status)) return 'transient';
    return 'fatal';
  }

  /**
   * baseRetryDelay * multiplier^attempt, attempt counted from 0 (5, 20, 80 for
   * base 5 and multiplier 4).
   *
   * This is the floor. When a 429 carries a longer `Retry-After`, {@link execute}
   * waits that long instead, so the sequence only holds for responses without one.
   */
  backoffDelay(attempt: number): number {
    return this.config.baseRetryDelayMs * Math.pow(this.config.backoffMultiplier, attempt);
  }

  async execute<T>(task: () => Promise<T>, target: string): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        return await task();
      } catch (error: unknown) {
        lastError = error;

        const kind = this.classify(error);
        if (kind === 'fatal' || attempt === this.config.maxRetries) {
          throw error;
        }

        let delay: number;
        if (kind === 'rate-limited') {
          delay = this.backoffDelay(attempt);

          // Never come back earlier than the server asked us to
          const retryAfterMs = this.parseRetryAfter(error);
          if (retryAfterMs !== undefined && retryAfterMs > delay) {
            delay = retryAfterMs;
          }

          this.logger.warn('Rate limited, backing off', {
            target,
            attempt: attempt + 1,
            delay,
            retryAfterMs,
          });
        } else {
          delay = this.config.transientRetryDelayMs;

          this.logger.warn('Transient failure, retrying', {
            target,
            attempt: attempt + 1,
            delay,
            status: axios.isAxiosError(error) ? error.response?.status ?? error.code : undefined,
          });
        }

        this.metrics?.incrementCounter('http_retries', { reason: kind });
        await this.time.sleepMs(delay);
      }
    }

    throw lastError;
  }

  private parseRetryAfter(error: unknown): number | undefined {
    if (!axios.isAxiosError(error)) return undefined;

    const retryAfter: unknown = error.response?.headers?.['retry-after'];
    if (typeof retryAfter !== 'string' || retryAfter.length === 0) return undefined;

    // Retry-After is either seconds or an HTTP date
    const seconds = Number(retryAfter);
    if (!isNaN(seconds)) {
      return seconds * 1000;
    }

    const retryDate = new Date(retryAfter).getTime();
    if (isNaN(retryDate)) return undefined;
    return Math.max(0, retryDate - this.time.nowMs());
  }
}
