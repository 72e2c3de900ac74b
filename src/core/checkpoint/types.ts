// src/core/checkpoint/types.ts

import { z } from 'zod';
import { NormalizedAssetSchema } from '../normalizer/schema';
import type { NormalizedAsset } from '../normalizer/types';

export const CHECKPOINT_VERSION = 1;

/**
 * The inputs that make two harvest runs "the same run" for resume purposes
 */
export interface RunIdentity {
  projectId: string;
  nameFilterTerms: string[];
  includeHistoricalContainers: boolean;
}

export const RunIdentitySchema = z.object({
  projectId: z.string(),
  nameFilterTerms: z.array(z.string()),
  includeHistoricalContainers: z.boolean(),
});

export const CheckpointSchema = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  runKey: z.string().min(1),
  identity: RunIdentitySchema,
  partialReport: z.array(NormalizedAssetSchema),
  processedIds: z.array(z.string()),
  savedAt: z.string().datetime(),
});

export type Checkpoint = z.infer<typeof CheckpointSchema>;

export interface CheckpointState {
  partialReport: NormalizedAsset[];
  processedIds: Set<string>;
}
