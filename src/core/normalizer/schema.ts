// src/core/normalizer/schema.ts

import { z } from 'zod';

export const PointSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

const ColorSchema = z.string().regex(/^#[0-9a-f]{6}$/i);

export const NormalizedAnnotationSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('rectangle'),
    x: z.number().finite(),
    y: z.number().finite(),
    width: z.number().finite(),
    height: z.number().finite(),
    color: ColorSchema,
  }),
  z.object({
    type: z.literal('circle'),
    x: z.number().finite(),
    y: z.number().finite(),
    width: z.number().finite(),
    height: z.number().finite(),
    color: ColorSchema,
  }),
  z.object({
    type: z.literal('arrow'),
    start: PointSchema,
    end: PointSchema,
    color: ColorSchema,
  }),
  z.object({
    type: z.literal('line'),
    start: PointSchema,
    end: PointSchema,
    color: ColorSchema,
  }),
  z.object({
    type: z.literal('freehand'),
    points: z.array(PointSchema).min(1),
    color: ColorSchema,
  }),
]);

// Validation schemas (also used to re-validate checkpointed report data)
export const NormalizedCommentSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  author: z.string().min(1),
  displayTimestamp: z.string().regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}$/),
  rawTimestamp: z.string().datetime(),
  colorTag: ColorSchema,
  annotations: z.array(NormalizedAnnotationSchema).optional(),
});

export const NormalizedAssetSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  kind: z.string(),
  folderPath: z.string().startsWith('/'),
  thumbnailUrl: z.string().optional(),
  viewUrl: z.string(),
  comments: z.array(NormalizedCommentSchema),
});
