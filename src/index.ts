// src/index.ts

export { FeedbackHarvester } from './harvester';
export type {
  HarvesterOverrides,
  HarvestOptions,
  HarvestProgress,
  HarvestResult,
  HarvestStats,
} from './harvester';
export type { HarvesterConfig, HarvestInput } from './config/ConfigValidator';
export { validateConfig, validateConfigSafe } from './config/ConfigValidator';
export type { Team, Project } from './core/api/types';
export type { NormalizedAnnotation, Point } from './core/normalizer/types';
export type {
  AssetReport,
  CommentReport,
  FolderGroup,
  GroupedReport,
  HarvestReport,
  RecentReport,
  ReportTotals,
  ReportView,
} from './report/types';
export type { CheckpointBackend } from './core/checkpoint/backends';
export { FileCheckpointBackend, KeyvCheckpointBackend } from './core/checkpoint/backends';
export type { TimeSource } from './utils/time';

// Export error classes for error handling
export {
  HarvesterError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  UnexpectedResponseError,
  NetworkError,
  NetworkTimeoutError,
  EndpointProbeError,
  CheckpointError,
  HarvestAbortedError,
} from './utils/errors';
