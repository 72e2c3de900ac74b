// src/core/checkpoint/CheckpointStore.ts

import { createHash } from 'crypto';
import type { CheckpointBackend } from './backends';
import { CHECKPOINT_VERSION, CheckpointSchema } from './types';
import type { Checkpoint, CheckpointState, RunIdentity } from './types';
import type { NormalizedAsset } from '../normalizer/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { TimeSource } from '../../utils/time';
import { normalizeTerms } from '../walker/filters';
import { CheckpointError, errorMessage } from '../../utils/errors';

function emptyState(): CheckpointState {
  return { partialReport: [], processedIds: new Set() };
}

/**
 * Durable resume state for harvest runs, keyed by run identity
 */
export class CheckpointStore {
  constructor(
    private backend: CheckpointBackend,
    private time: TimeSource,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  /**
   * Stable key for a run. Filter terms are compared as a sorted, normalized set
   * so "B, a" and "a,b" resume each other.
   */
  static runKeyFor(identity: RunIdentity): string {
    const terms = Array.from(new Set(normalizeTerms(identity.nameFilterTerms))).sort();

    return createHash('sha256')
      .update(
        JSON.stringify({
          projectId: identity.projectId,
          terms,
          includeHistoricalContainers: identity.includeHistoricalContainers,
        })
      )
      .digest('hex');
  }

  /**
   * Load saved progress. Missing, unreadable or corrupt checkpoints yield an
   * empty state; the run then starts from scratch.
   */
  async load(runKey: string): Promise<CheckpointState> {
    let contents: string | undefined;
    try {
      contents = await this.backend.read(runKey);
    } catch (error: unknown) {
      this.logger.warn('Checkpoint unreadable, starting fresh', {
        runKey,
        error: errorMessage(error),
      });
      return emptyState();
    }

    if (contents === undefined) {
      return emptyState();
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(contents);
    } catch (error: unknown) {
      this.logger.warn('Checkpoint is not valid JSON, discarding', {
        runKey,
        error: errorMessage(error),
      });
      return emptyState();
    }

    const parsed = CheckpointSchema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.warn('Checkpoint failed validation, discarding', {
        runKey,
        issues: parsed.error.issues.length,
      });
      return emptyState();
    }

    if (parsed.data.runKey !== runKey) {
      this.logger.warn('Checkpoint belongs to a different run, discarding', { runKey });
      return emptyState();
    }

    this.logger.info('Resuming from checkpoint', {
      runKey,
      processed: parsed.data.processedIds.length,
      savedAt: parsed.data.savedAt,
    });

    return {
      partialReport: parsed.data.partialReport,
      processedIds: new Set(parsed.data.processedIds),
    };
  }

  /**
   * Persist progress so far
   *
   * @throws {CheckpointError} when the backend cannot write
   */
  async save(
    runKey: string,
    identity: RunIdentity,
    partialReport: NormalizedAsset[],
    processedIds: Iterable<string>
  ): Promise<void> {
    const checkpoint: Checkpoint = {
      version: CHECKPOINT_VERSION,
      runKey,
      identity,
      partialReport,
      processedIds: Array.from(processedIds),
      savedAt: new Date(this.time.nowMs()).toISOString(),
    };

    try {
      await this.backend.write(runKey, JSON.stringify(checkpoint));
    } catch (error: unknown) {
      throw new CheckpointError(`Failed to save checkpoint: ${errorMessage(error)}`, { runKey });
    }

    this.metrics.incrementCounter('checkpoint_saves');
    this.logger.debug('Checkpoint saved', {
      runKey,
      processed: checkpoint.processedIds.length,
    });
  }

  async clear(runKey: string): Promise<void> {
    try {
      await this.backend.remove(runKey);
      this.logger.debug('Checkpoint cleared', { runKey });
    } catch (error: unknown) {
      throw new CheckpointError(`Failed to clear checkpoint: ${errorMessage(error)}`, { runKey });
    }
  }
}
