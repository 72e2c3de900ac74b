// src/utils/errors.ts

export class HarvesterError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// API errors
export class ApiError extends HarvesterError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number = 500, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

// Network errors
export class NetworkError extends HarvesterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

export class UnexpectedResponseError extends ApiError {
  constructor(message: string, status: number, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'UNEXPECTED_RESPONSE';
  }
}

// Endpoint probing
export interface ProbeAttempt {
  endpoint: string;
  error: Error;
}

export class EndpointProbeError extends HarvesterError {
  constructor(
    public operation: string,
    public targetId: string,
    public attempts: ProbeAttempt[]
  ) {
    super(
      `All ${attempts.length} candidate endpoint(s) failed for ${operation} (${targetId})`,
      'ENDPOINT_PROBE_FAILED',
      {
        operation,
        targetId,
        attempts: attempts.map((a) => ({ endpoint: a.endpoint, error: a.error.message })),
      }
    );
  }

  /**
   * True when every candidate answered 404, i.e. the resource is absent rather than unreachable
   */
  isNotFound(): boolean {
    return (
      this.attempts.length > 0 &&
      this.attempts.every((a) => a.error instanceof ApiClientError && a.error.status === 404)
    );
  }
}

// Harvest run errors
export class CheckpointError extends HarvesterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CHECKPOINT_ERROR', details);
  }
}

export class HarvestAbortedError extends HarvesterError {
  constructor(message: string = 'Harvest aborted', details?: Record<string, unknown>) {
    super(message, 'HARVEST_ABORTED', details);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
