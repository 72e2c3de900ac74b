// src/core/normalizer/types.ts

import type { z } from 'zod';
import type {
  NormalizedAnnotationSchema,
  NormalizedAssetSchema,
  NormalizedCommentSchema,
  PointSchema,
} from './schema';

export type AnnotationType = 'rectangle' | 'circle' | 'arrow' | 'line' | 'freehand';

export type Point = z.infer<typeof PointSchema>;
export type NormalizedAnnotation = z.infer<typeof NormalizedAnnotationSchema>;
export type NormalizedComment = z.infer<typeof NormalizedCommentSchema>;
export type NormalizedAsset = z.infer<typeof NormalizedAssetSchema>;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** Geometry before the parent comment's colour is attached */
export type AnnotationGeometry = DistributiveOmit<NormalizedAnnotation, 'color'>;

export interface FrameSize {
  width: number;
  height: number;
}
