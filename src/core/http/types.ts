// src/core/http/types.ts

// The review API is read-only from here: every request is a GET
export interface HttpRequestConfig {
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  timeout?: number;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface RetryConfig {
  maxRetries: number; // Retries after the first attempt
  baseRetryDelayMs: number; // Rate-limit backoff base
  backoffMultiplier: number;
  transientRetryDelayMs: number; // Fixed delay for 5xx / network failures
  transientStatusCodes: number[];
}

export interface ClientConfig {
  baseUrl: string;
  token: string;
  timeout: number;
  requestDelayMs: number;
  retry: RetryConfig;
}

export type FailureKind = 'rate-limited' | 'transient' | 'fatal';
