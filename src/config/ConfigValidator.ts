// src/config/ConfigValidator.ts

import { z } from 'zod';

export const DEFAULT_ASSET_KINDS = [
  'file',
  'version_stack',
  'video',
  'image',
  'pdf',
  'audio',
  'review',
];

export const DEFAULT_PALETTE = [
  '#e6194b',
  '#3cb44b',
  '#4363d8',
  '#f58231',
  '#911eb4',
  '#42d4f4',
  '#f032e6',
  '#bfef45',
];

const ApiConfigSchema = z
  .object({
    baseUrl: z.string().url().default('https://api.frame.io/v2'),
    timeout: z.number().positive().default(30000),
    viewUrlTemplate: z
      .string()
      .includes('{assetId}', { message: 'viewUrlTemplate must contain {assetId}' })
      .default('https://app.frame.io/presentation/{projectId}?item={assetId}'),
  })
  .default({});

// Retry Configuration Schema
const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10).default(3),
    baseRetryDelayMs: z.number().nonnegative().default(5000),
    backoffMultiplier: z.number().min(1).default(4),
    transientRetryDelayMs: z.number().nonnegative().default(2000),
    transientStatusCodes: z
      .array(z.number().int().min(500).max(599))
      .default([500, 502, 503, 504]),
  })
  .default({});

const HttpConfigSchema = z
  .object({
    requestDelayMs: z.number().nonnegative().max(60000).default(500),
    retry: RetryConfigSchema,
  })
  .default({});

const WalkerConfigSchema = z
  .object({
    assetKinds: z.array(z.string().min(1)).min(1).default(DEFAULT_ASSET_KINDS),
    historicalContainerTerms: z.array(z.string().min(1)).default(['old', 'archive']),
    includeReviewLinks: z.boolean().default(true),
  })
  .default({});

// Checkpoint Store Configuration Schema
const CheckpointConfigSchema = z
  .object({
    backend: z
      .enum(['file', 'memory', 'redis', 'postgres'], {
        errorMap: () => ({
          message: "Checkpoint backend must be 'file', 'memory', 'redis', or 'postgres'",
        }),
      })
      .default('file'),
    directory: z.string().min(1).default('.harvest-checkpoints'),
    url: z.string().url().optional(),
  })
  .default({})
  .refine((data) => data.backend === 'file' || data.backend === 'memory' || !!data.url, {
    message: "Redis and Postgres backends require 'url' configuration",
  });

const ProcessingConfigSchema = z
  .object({
    chunkSize: z.number().int().positive().default(25),
  })
  .default({});

const AnnotationConfigSchema = z
  .object({
    frame: z
      .object({
        width: z.number().positive(),
        height: z.number().positive(),
      })
      .default({ width: 200, height: 112 }),
    palette: z
      .array(z.string().regex(/^#[0-9a-f]{6}$/i, 'Palette entries must be #rrggbb colours'))
      .min(1)
      .default(DEFAULT_PALETTE),
  })
  .default({});

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
    silent: z.boolean().optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

// Complete Harvester Configuration Schema
export const HarvesterConfigSchema = z.object({
  api: ApiConfigSchema,
  http: HttpConfigSchema,
  walker: WalkerConfigSchema,
  checkpoint: CheckpointConfigSchema,
  processing: ProcessingConfigSchema,
  annotations: AnnotationConfigSchema,
  metrics: MetricsConfigSchema,
  logging: LoggerConfigSchema,
});

export const HarvestInputSchema = z.object({
  token: z.string().min(1, 'token is required'),
  projectId: z.string().min(1, 'projectId is required'),
  nameFilter: z.string().optional(),
  includeHistoricalContainers: z.boolean().default(false),
});

export type HarvesterConfig = z.input<typeof HarvesterConfigSchema>;
export type ResolvedHarvesterConfig = z.output<typeof HarvesterConfigSchema>;
export type HarvestInput = z.input<typeof HarvestInputSchema>;
export type ResolvedHarvestInput = z.output<typeof HarvestInputSchema>;

/**
 * Validate harvester configuration and fill in defaults
 *
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): ResolvedHarvesterConfig {
  return HarvesterConfigSchema.parse(config);
}

/**
 * Validate configuration and return user-friendly errors
 *
 * @returns Object with { success: boolean, data?: Config, errors?: string[] }
 */
export function validateConfigSafe(config: unknown): {
  success: boolean;
  data?: ResolvedHarvesterConfig;
  errors?: string[];
} {
  const result = HarvesterConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}

export function validateHarvestInput(input: unknown): ResolvedHarvestInput {
  return HarvestInputSchema.parse(input);
}
