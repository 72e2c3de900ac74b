// tests/unit/RetryHandler.test.ts

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import { RetryHandler } from '../../src/core/http/RetryHandler';
import type { RetryConfig } from '../../src/core/http/types';
import { FakeTimeSource, silentLogger, testMetrics } from '../helpers/fakes';

const retryConfig: RetryConfig = {
  maxRetries: 3,
  baseRetryDelayMs: 5,
  backoffMultiplier: 4,
  transientRetryDelayMs: 2,
  transientStatusCodes: [500, 502, 503, 504],
};

function httpError(status: number, headers: Record<string, string> = {}): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, {
    data: {},
    status,
    statusText: '',
    headers,
    config,
  });
}

describe('RetryHandler', () => {
  let time: FakeTimeSource;
  let handler: RetryHandler;

  beforeEach(() => {
    time = new FakeTimeSource();
    handler = new RetryHandler(retryConfig, silentLogger(), time, testMetrics());
  });

  describe('classify', () => {
    it('should treat 429 as rate-limited', () => {
      expect(handler.classify(httpError(429))).toBe('rate-limited');
    });

    it('should treat configured 5xx as transient', () => {
      expect(handler.classify(httpError(503))).toBe('transient');
    });

    it('should treat 5xx outside the configured list as fatal', () => {
      expect(handler.classify(httpError(501))).toBe('fatal');
    });

    it('should treat failures without a response as transient', () => {
      expect(handler.classify(new AxiosError('socket hang up', 'ECONNRESET'))).toBe('transient');
    });

    it('should treat other 4xx and non-HTTP errors as fatal', () => {
      expect(handler.classify(httpError(404))).toBe('fatal');
      expect(handler.classify(httpError(401))).toBe('fatal');
      expect(handler.classify(new Error('boom'))).toBe('fatal');
    });
  });

  it('should compute exponential backoff from attempt 0', () => {
    expect([0, 1, 2].map((attempt) => handler.backoffDelay(attempt))).toEqual([5, 20, 80]);
  });

  it('should back off 5, 20, 80 then give up after the last retry', async () => {
    const error = httpError(429);
    const task = vi.fn().mockRejectedValue(error);

    await expect(handler.execute(task, '/assets/a1')).rejects.toBe(error);

    expect(task).toHaveBeenCalledTimes(4);
    expect(time.sleeps).toEqual([5, 20, 80]);
  });

  it('should honour a longer Retry-After header', async () => {
    const task = vi
      .fn()
      .mockRejectedValueOnce(httpError(429, { 'retry-after': '1' }))
      .mockResolvedValueOnce('ok');

    await expect(handler.execute(task, '/assets/a1')).resolves.toBe('ok');
    expect(time.sleeps).toEqual([1000]);
  });

  it('should ignore a Retry-After shorter than the backoff', async () => {
    const task = vi
      .fn()
      .mockRejectedValueOnce(httpError(429))
      .mockRejectedValueOnce(httpError(429, { 'retry-after': '0' }))
      .mockResolvedValueOnce('ok');

    await expect(handler.execute(task, '/assets/a1')).resolves.toBe('ok');
    expect(time.sleeps).toEqual([5, 20]);
  });

  it('should retry transient failures with the fixed delay', async () => {
    const task = vi
      .fn()
      .mockRejectedValueOnce(httpError(503))
      .mockRejectedValueOnce(new AxiosError('socket hang up', 'ECONNRESET'))
      .mockResolvedValueOnce('ok');

    await expect(handler.execute(task, '/assets/a1')).resolves.toBe('ok');
    expect(time.sleeps).toEqual([2, 2]);
  });

  it('should not retry fatal failures', async () => {
    const error = httpError(404);
    const task = vi.fn().mockRejectedValue(error);

    await expect(handler.execute(task, '/assets/a1')).rejects.toBe(error);
    expect(task).toHaveBeenCalledTimes(1);
    expect(time.sleeps).toEqual([]);
  });

  it('should make a single attempt when maxRetries is 0', async () => {
    const single = new RetryHandler({ ...retryConfig, maxRetries: 0 }, silentLogger(), time);
    const task = vi.fn().mockRejectedValue(httpError(429));

    await expect(single.execute(task, '/assets/a1')).rejects.toBeInstanceOf(AxiosError);
    expect(task).toHaveBeenCalledTimes(1);
    expect(time.sleeps).toEqual([]);
  });
});
