// src/core/http/RateLimitedClient.ts

import axios, { AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import type { ClientConfig, HttpRequestConfig, HttpResponse } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import type { TimeSource } from '../../utils/time';
import { RetryHandler } from './RetryHandler';
import {
  ApiError,
  ApiClientError,
  ApiServerError,
  NetworkTimeoutError,
  NetworkError,
  RateLimitError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

/**
 * Keep-alive agents shared by every client a harvester creates
 */
export class ConnectionAgents {
  readonly httpAgent = new http.Agent({ keepAlive: true });
  readonly httpsAgent = new https.Agent({ keepAlive: true });

  destroy(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}

/**
 * Serialises every call to the remote API through a single-slot queue, waits the
 * configured delay before each attempt and retries according to {@link RetryHandler}.
 */
export class RateLimitedClient {
  private axiosInstance: AxiosInstance;
  private queue: PQueue;
  private retryHandler: RetryHandler;
  private requestCounter = 0;

  constructor(
    private config: ClientConfig,
    private time: TimeSource,
    private metrics: MetricsCollector,
    private logger: Logger,
    agents: ConnectionAgents = new ConnectionAgents()
  ) {
    this.retryHandler = new RetryHandler(config.retry, logger, time, metrics);
    this.queue = new PQueue({ concurrency: 1 });

    this.axiosInstance = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout,
      httpAgent: agents.httpAgent,
      httpsAgent: agents.httpsAgent,
    });
  }

  async get<T = unknown>(
    url: string,
    config: Omit<HttpRequestConfig, 'url'> = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url });
  }

  /**
   * Issue one logical request. Resolves with the parsed body or rejects with an
   * {@link ApiError} / {@link NetworkError} once the retry budget is spent.
   */
  async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const method = 'GET';
    const requestId = this.generateRequestId();

    this.logger.debug('HTTP request queued', {
      requestId,
      url: config.url,
      method,
      query: config.query,
      pending: this.queue.size,
    });

    const execute = async (): Promise<HttpResponse<T>> =>
      withHttpSpan(method, config.url, async () => {
        const startTime = this.time.nowMs();

        try {
          const axiosResponse = await this.retryHandler.execute(async () => {
            if (this.config.requestDelayMs > 0) {
              await this.time.sleepMs(this.config.requestDelayMs);
            }
            return this.axiosInstance.request<T>({
              url: config.url,
              method,
              headers: {
                Authorization: `Bearer ${this.config.token}`,
                Accept: 'application/json',
                'X-Request-ID': requestId,
                'User-Agent': 'frameio-feedback-harvester/1.0',
                ...config.headers,
              },
              params: config.query,
              timeout: config.timeout,
            });
          }, config.url);

          this.metrics.incrementCounter('http_requests_total', {
            method,
            status: axiosResponse.status,
          });
          this.metrics.recordLatency('http_request_duration', this.time.nowMs() - startTime, {
            method,
            status: axiosResponse.status,
          });

          return {
            data: axiosResponse.data,
            status: axiosResponse.status,
            headers: this.toHeaderRecord(axiosResponse.headers),
          };
        } catch (error: unknown) {
          const transformed = this.transformError(error, config.url);
          const status = transformed instanceof ApiError ? transformed.status : 'error';

          this.metrics.incrementCounter('http_requests_total', { method, status });
          this.metrics.recordLatency('http_request_duration', this.time.nowMs() - startTime, {
            method,
            status,
          });
          throw transformed;
        }
      });

    return this.queue.add(execute);
  }

  private generateRequestId(): string {
    this.requestCounter += 1;
    return `req_${this.time.nowMs()}_${this.requestCounter}`;
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, url: string): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new NetworkError(String(error), { url });
    }

    if (error.response) {
      const status = error.response.status;

      this.logger.debug('HTTP error response', {
        url,
        status,
        statusText: error.response.statusText,
        data: error.response.data,
      });

      if (status === 429) {
        const retryAfter = Number(error.response.headers['retry-after']);
        return new RateLimitError(
          `Rate limit retries exhausted for ${url}`,
          isNaN(retryAfter) ? undefined : retryAfter,
          { url }
        );
      }
      if (status >= 400 && status < 500) {
        return new ApiClientError(`Client error: ${status}`, status, {
          url,
          response: error.response.data,
        });
      }
      if (status >= 500) {
        return new ApiServerError(`Server error: ${status}`, status, { url });
      }
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { url });
    }
    return new NetworkError(`Network error: ${error.message}`, { url, code: error.code });
  }
}
