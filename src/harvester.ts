// src/harvester.ts

import type { Item, Project, Team } from './core/api/types';
import type { Asset, WalkPolicy } from './core/walker/types';
import type { CheckpointBackend } from './core/checkpoint/backends';
import type { RunIdentity } from './core/checkpoint/types';
import type { NormalizedAsset } from './core/normalizer/types';
import type { HarvestReport, ReportView } from './report/types';
import type { TimeSource } from './utils/time';
import type {
  HarvesterConfig,
  HarvestInput,
  ResolvedHarvesterConfig,
} from './config/ConfigValidator';
import { validateConfig, validateHarvestInput } from './config/ConfigValidator';
import { ConnectionAgents, RateLimitedClient } from './core/http/RateLimitedClient';
import { EndpointProber } from './core/http/EndpointProber';
import { FrameioApi } from './core/api/FrameioApi';
import { TreeWalker } from './core/walker/TreeWalker';
import { WalkContext } from './core/walker/WalkContext';
import { normalizeTerms, parseTerms } from './core/walker/filters';
import { createCheckpointBackend } from './core/checkpoint/backends';
import { CheckpointStore } from './core/checkpoint/CheckpointStore';
import { FeedbackNormalizer } from './core/normalizer/FeedbackNormalizer';
import { ColorPalette } from './report/ColorPalette';
import { FolderPathResolver } from './report/FolderPathResolver';
import { ReportAggregator } from './report/ReportAggregator';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { generateCorrelationId, withHarvestSpan } from './observability/tracing';
import { RealTimeSource } from './utils/time';
import { HarvestAbortedError, errorMessage } from './utils/errors';

export interface HarvesterOverrides {
  time?: TimeSource;
  checkpointBackend?: CheckpointBackend;
}

export interface HarvestProgress {
  processed: number;
  total: number;
  assetId: string;
}

export interface HarvestOptions {
  view?: ReportView;
  signal?: AbortSignal;
  onProgress?: (progress: HarvestProgress) => void;
}

export interface HarvestStats {
  assetsDiscovered: number;
  assetsResumed: number;
  assetsProcessed: number;
  assetsFailed: number;
  assetsWithFeedback: number;
  commentCount: number;
  containersFailed: number;
}

export interface HarvestResult {
  runId: string;
  runKey: string;
  report: HarvestReport;
  stats: HarvestStats;
}

export class FeedbackHarvester {
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly time: TimeSource;
  private readonly checkpoints: CheckpointStore;
  private readonly checkpointBackend: CheckpointBackend;
  private readonly aggregator = new ReportAggregator();
  private readonly palette: ColorPalette;
  private readonly agents = new ConnectionAgents();

  private constructor(
    private readonly config: ResolvedHarvesterConfig,
    overrides: HarvesterOverrides
  ) {
    this.logger = new Logger(config.logging);
    this.metrics = new MetricsCollector(config.metrics);
    this.time = overrides.time ?? new RealTimeSource();
    this.checkpointBackend =
      overrides.checkpointBackend ?? createCheckpointBackend(config.checkpoint);
    this.checkpoints = new CheckpointStore(
      this.checkpointBackend,
      this.time,
      this.logger,
      this.metrics
    );
    this.palette = new ColorPalette(config.annotations.palette);
  }

  /**
   * Create a harvester. Configuration is validated up front and defaults filled in.
   *
   * @throws {z.ZodError} If configuration is invalid
   *
   * @example
   * ```typescript
   * const harvester = FeedbackHarvester.init({
   *   http: { requestDelayMs: 500 },
   *   checkpoint: { backend: 'file', directory: '.harvest-checkpoints' },
   * });
   *
   * const { report } = await harvester.harvest({
   *   token: process.env.FRAMEIO_TOKEN ?? '',
   *   projectId: 'project-id',
   *   nameFilter: 'final, mix',
   * });
   * ```
   */
  static init(config: HarvesterConfig = {}, overrides: HarvesterOverrides = {}): FeedbackHarvester {
    const harvester = new FeedbackHarvester(validateConfig(config), overrides);

    harvester.logger.info('Harvester initialized', {
      baseUrl: harvester.config.api.baseUrl,
      checkpointBackend: overrides.checkpointBackend ? 'custom' : harvester.config.checkpoint.backend,
    });

    return harvester;
  }

  async listTeams(token: string): Promise<Team[]> {
    return this.createApi(token).listTeams();
  }

  async listProjects(token: string, teamId: string): Promise<Project[]> {
    return this.createApi(token).listProjects(teamId);
  }

  /**
   * Harvest every eligible asset of a project and aggregate its feedback.
   *
   * Progress is checkpointed after each asset. Calling again with the same
   * project, filter and historical flag resumes where an interrupted run stopped.
   *
   * @throws {EndpointProbeError} If the project root cannot be resolved
   * @throws {HarvestAbortedError} If `options.signal` fires; progress so far is kept
   * @throws {CheckpointError} If progress cannot be persisted
   */
  async harvest(input: HarvestInput, options: HarvestOptions = {}): Promise<HarvestResult> {
    const validated = validateHarvestInput(input);
    const identity: RunIdentity = {
      projectId: validated.projectId,
      nameFilterTerms: parseTerms(validated.nameFilter),
      includeHistoricalContainers: validated.includeHistoricalContainers,
    };
    const runKey = CheckpointStore.runKeyFor(identity);
    const runId = generateCorrelationId();
    const startTime = this.time.nowMs();

    return withHarvestSpan(runId, identity.projectId, async () => {
      try {
        const result = await this.run(runId, runKey, identity, validated.token, options);
        this.recordDuration(startTime, 'completed');
        return result;
      } catch (error: unknown) {
        const outcome = error instanceof HarvestAbortedError ? 'aborted' : 'failed';
        this.recordDuration(startTime, outcome);
        this.logger.error('Harvest did not complete', {
          runId,
          projectId: identity.projectId,
          outcome,
          error: errorMessage(error),
        });
        throw error;
      }
    });
  }

  async close(): Promise<void> {
    this.agents.destroy();
    await this.checkpointBackend.close?.();
  }

  getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }

  private async run(
    runId: string,
    runKey: string,
    identity: RunIdentity,
    token: string,
    options: HarvestOptions
  ): Promise<HarvestResult> {
    this.logger.info('Harvest started', {
      runId,
      runKey,
      projectId: identity.projectId,
      nameFilterTerms: identity.nameFilterTerms,
      includeHistoricalContainers: identity.includeHistoricalContainers,
    });

    const api = this.createApi(token);
    const state = await this.checkpoints.load(runKey);

    const root = await api.getProjectRoot(identity.projectId);
    const context = new WalkContext();
    const assets = await this.discover(api, root.rootId, identity, context);

    const pending = assets.filter((asset) => !state.processedIds.has(asset.id));
    const resumed = assets.length - pending.length;
    const partialReport: NormalizedAsset[] = [...state.partialReport];
    const processedIds = state.processedIds;

    this.logger.info('Assets discovered', {
      runId,
      discovered: assets.length,
      resumed,
      pending: pending.length,
      containersFailed: context.failedContainers.length,
    });

    const resolver = new FolderPathResolver(context, api, this.logger);
    resolver.markRoot(root.rootId);

    const normalizer = new FeedbackNormalizer(
      api,
      {
        projectId: identity.projectId,
        viewUrlTemplate: this.config.api.viewUrlTemplate,
        defaultFrame: this.config.annotations.frame,
        palette: this.palette,
      },
      this.time,
      this.logger,
      this.metrics
    );

    const chunkSize = this.config.processing.chunkSize;
    const chunkCount = Math.ceil(pending.length / chunkSize);
    let processedThisRun = 0;
    let failed = 0;

    for (let start = 0; start < pending.length; start += chunkSize) {
      const chunk = pending.slice(start, start + chunkSize);
      this.logger.info('Processing chunk', {
        runId,
        chunk: start / chunkSize + 1,
        of: chunkCount,
        size: chunk.length,
      });

      for (const asset of chunk) {
        if (options.signal?.aborted) {
          throw new HarvestAbortedError('Harvest aborted', {
            runId,
            runKey,
            processed: processedIds.size,
          });
        }

        let normalized: NormalizedAsset | null;
        try {
          const folderPath = await resolver.resolveForAsset(asset);
          normalized = await normalizer.normalize(asset, folderPath);
        } catch (error: unknown) {
          // Left out of the processed set so a later run retries it
          this.logger.warn('Failed to process asset', {
            runId,
            assetId: asset.id,
            assetName: asset.name,
            error: errorMessage(error),
          });
          this.metrics.incrementCounter('assets_processed', { outcome: 'failed' });
          failed += 1;
          continue;
        }

        if (normalized) partialReport.push(normalized);
        processedIds.add(asset.id);
        processedThisRun += 1;
        this.metrics.incrementCounter('assets_processed', {
          outcome: normalized ? 'feedback' : 'empty',
        });

        await this.checkpoints.save(runKey, identity, partialReport, processedIds);

        options.onProgress?.({
          processed: resumed + processedThisRun,
          total: assets.length,
          assetId: asset.id,
        });
      }
    }

    // Assets under a container that could not be listed were never discovered
    const containersFailed = context.failedContainers.length;
    if (failed === 0 && containersFailed === 0) {
      await this.checkpoints.clear(runKey);
    } else {
      this.logger.warn('Keeping checkpoint, harvest incomplete', {
        runId,
        runKey,
        failed,
        containersFailed,
      });
    }

    const report = this.aggregator.aggregate(partialReport, options.view);
    const stats: HarvestStats = {
      assetsDiscovered: assets.length,
      assetsResumed: resumed,
      assetsProcessed: processedThisRun,
      assetsFailed: failed,
      assetsWithFeedback: report.totals.assets,
      commentCount: report.totals.comments,
      containersFailed,
    };

    this.logger.info('Harvest completed', { runId, ...stats });

    return { runId, runKey, report, stats };
  }

  /**
   * Walk the folder tree from the project root, then each review link, sharing
   * one context so an asset reachable both ways is emitted once.
   */
  private async discover(
    api: FrameioApi,
    rootId: string,
    identity: RunIdentity,
    context: WalkContext
  ): Promise<Asset[]> {
    const walker = new TreeWalker(api, this.walkPolicy(identity), this.logger, this.metrics);

    // The root is named by the project, which must not trip container exclusion
    const assets = await walker.walk({ id: rootId, name: 'root', kind: 'folder' }, context);

    if (!this.config.walker.includeReviewLinks) {
      return assets;
    }

    let reviewLinks: Item[];
    try {
      reviewLinks = await api.listReviewLinks(identity.projectId);
    } catch (error: unknown) {
      this.logger.warn('Could not list review links, continuing with folder assets', {
        projectId: identity.projectId,
        error: errorMessage(error),
      });
      return assets;
    }

    for (const link of reviewLinks) {
      const linked = await walker.walk({ id: link.id, name: link.name, kind: 'review_link' }, context);
      assets.push(...linked);
    }

    return assets;
  }

  private walkPolicy(identity: RunIdentity): WalkPolicy {
    return {
      assetKinds: this.config.walker.assetKinds,
      excludedContainerTerms: identity.includeHistoricalContainers
        ? []
        : normalizeTerms(this.config.walker.historicalContainerTerms),
      nameFilterTerms: identity.nameFilterTerms,
    };
  }

  private createApi(token: string): FrameioApi {
    const client = new RateLimitedClient(
      {
        baseUrl: this.config.api.baseUrl,
        token,
        timeout: this.config.api.timeout,
        requestDelayMs: this.config.http.requestDelayMs,
        retry: this.config.http.retry,
      },
      this.time,
      this.metrics,
      this.logger,
      this.agents
    );

    return new FrameioApi(new EndpointProber(client, this.logger));
  }

  private recordDuration(startTime: number, outcome: string): void {
    this.metrics.recordLatency('harvest_duration', this.time.nowMs() - startTime, { outcome });
  }
}
