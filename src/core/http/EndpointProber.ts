// src/core/http/EndpointProber.ts

import type { RateLimitedClient } from './RateLimitedClient';
import type { Logger } from '../../observability/Logger';
import type { ProbeAttempt } from '../../utils/errors';
import { EndpointProbeError, UnexpectedResponseError } from '../../utils/errors';

export interface EndpointCandidate<T> {
  /** Path template relative to the API root; `{id}` is replaced with the target ID */
  path: string;
  query?: Record<string, string | number | boolean>;
  /** Returns undefined when the payload does not have the expected shape */
  extract: (data: unknown) => T | undefined;
}

export class EndpointProber {
  constructor(
    private client: RateLimitedClient,
    private logger: Logger
  ) {}

  /**
   * Try each candidate in order and return the first usable result.
   * Each candidate runs once with the client's normal retry budget.
   *
   * @throws {EndpointProbeError} naming the operation and target when every candidate failed
   */
  async probe<T>(
    operation: string,
    targetId: string,
    candidates: EndpointCandidate<T>[]
  ): Promise<T> {
    const attempts: ProbeAttempt[] = [];

    for (const candidate of candidates) {
      const endpoint = expandTemplate(candidate.path, targetId);

      try {
        const response = await this.client.get(endpoint, { query: candidate.query });
        const result = candidate.extract(response.data);

        if (result === undefined) {
          throw new UnexpectedResponseError(
            `Unexpected response shape from ${endpoint}`,
            response.status,
            { endpoint }
          );
        }

        if (attempts.length > 0) {
          this.logger.debug('Fallback endpoint succeeded', {
            operation,
            targetId,
            endpoint,
            failedCandidates: attempts.length,
          });
        }
        return result;
      } catch (error: unknown) {
        const err = error instanceof Error ? error : new Error(String(error));
        attempts.push({ endpoint, error: err });

        this.logger.debug('Endpoint candidate failed', {
          operation,
          targetId,
          endpoint,
          error: err.message,
        });
      }
    }

    throw new EndpointProbeError(operation, targetId, attempts);
  }
}

export function expandTemplate(template: string, id: string): string {
  return template.split('{id}').join(encodeURIComponent(id));
}
