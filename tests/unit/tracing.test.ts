// tests/unit/tracing.test.ts

import { describe, it, expect, afterEach } from 'vitest';
import {
  generateCorrelationId,
  getTracer,
  isOTelEnabled,
  withHarvestSpan,
  withSpan,
} from '../../src/observability/tracing';

describe('tracing', () => {
  const original = process.env.OTEL_ENABLED;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.OTEL_ENABLED;
    } else {
      process.env.OTEL_ENABLED = original;
    }
  });

  it('should be disabled unless OTEL_ENABLED is set', () => {
    delete process.env.OTEL_ENABLED;
    expect(isOTelEnabled()).toBe(false);
    expect(getTracer()).toBeNull();

    process.env.OTEL_ENABLED = 'true';
    expect(isOTelEnabled()).toBe(true);
  });

  it('should run the function without a span when disabled', async () => {
    delete process.env.OTEL_ENABLED;

    await expect(withSpan('op', async (span) => (span === null ? 'no-span' : 'span'))).resolves.toBe(
      'no-span'
    );
  });

  it('should propagate results and errors through harvest spans when enabled', async () => {
    process.env.OTEL_ENABLED = '1';

    await expect(withHarvestSpan('run-1', 'p1', async () => 42)).resolves.toBe(42);
    await expect(
      withHarvestSpan('run-1', 'p1', async () => {
        throw new Error('walk failed');
      })
    ).rejects.toThrow('walk failed');
  });

  it('should generate unique correlation IDs', () => {
    const first = generateCorrelationId();
    expect(first).toMatch(/^[0-9a-f-]{36}$/);
    expect(generateCorrelationId()).not.toBe(first);
  });
});
