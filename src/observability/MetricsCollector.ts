// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
}

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor(config: MetricsConfig = {}) {
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP requests',
        labelNames: ['method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request duration, including throttling and retries',
        labelNames: ['method', 'status'],
        buckets: [0.25, 0.5, 1, 2, 5, 15, 60],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_retries',
      new Counter({
        name: 'http_retries_total',
        help: 'HTTP retries by cause',
        labelNames: ['reason'],
        registers: [this.registry],
      })
    );

    // Traversal metrics
    this.counters.set(
      'containers_walked',
      new Counter({
        name: 'containers_walked_total',
        help: 'Containers whose contents were fetched',
        registers: [this.registry],
      })
    );

    this.counters.set(
      'containers_skipped',
      new Counter({
        name: 'containers_skipped_total',
        help: 'Containers skipped during traversal',
        labelNames: ['reason'],
        registers: [this.registry],
      })
    );

    // Feedback metrics
    this.counters.set(
      'assets_processed',
      new Counter({
        name: 'assets_processed_total',
        help: 'Assets run through the feedback normalizer',
        labelNames: ['outcome'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'comments_skipped',
      new Counter({
        name: 'comments_skipped_total',
        help: 'Comments dropped because they could not be normalized',
        registers: [this.registry],
      })
    );

    this.counters.set(
      'checkpoint_saves',
      new Counter({
        name: 'checkpoint_saves_total',
        help: 'Checkpoint writes',
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'harvest_duration',
      new Histogram({
        name: 'harvest_duration_seconds',
        help: 'Full harvest run duration',
        labelNames: ['outcome'],
        buckets: [1, 10, 60, 300, 900, 3600],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number> = {}): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number> = {}): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
