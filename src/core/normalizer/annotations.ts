// src/core/normalizer/annotations.ts

import { z } from 'zod';
import type { AnnotationGeometry, AnnotationType, FrameSize, Point } from './types';
import { isRecord, positiveNumber } from './extractors';

const SHAPE_ALIASES = new Map<string, AnnotationType>([
  ['rectangle', 'rectangle'],
  ['rect', 'rectangle'],
  ['square', 'rectangle'],
  ['circle', 'circle'],
  ['ellipse', 'circle'],
  ['oval', 'circle'],
  ['arrow', 'arrow'],
  ['line', 'line'],
  ['freehand', 'freehand'],
  ['pen', 'freehand'],
  ['draw', 'freehand'],
  ['path', 'freehand'],
]);

const RawPointSchema = z.union([
  z.object({ x: z.number().finite(), y: z.number().finite() }),
  z
    .tuple([z.number().finite(), z.number().finite()])
    .transform(([x, y]) => ({ x, y })),
]);

const BoxSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  width: z.number().finite(),
  height: z.number().finite(),
});

const PointListSchema = z.object({
  points: z.array(RawPointSchema).min(1),
});

export interface AnnotationPayload {
  shapes: unknown[];
  frame?: FrameSize;
}

export class MalformedAnnotationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedAnnotationError';
  }
}

/**
 * Percentage of the frame dimension along the same axis
 *
 * @throws {MalformedAnnotationError} when the scaled value overflows
 */
export function scaleCoordinate(raw: number, dimension: number): number {
  const scaled = (raw * 100.0) / dimension;
  if (!Number.isFinite(scaled)) {
    throw new MalformedAnnotationError(`Coordinate ${raw} cannot be scaled to the frame`);
  }
  return scaled;
}

function scalePoint(point: Point, frame: FrameSize): Point {
  return {
    x: scaleCoordinate(point.x, frame.width),
    y: scaleCoordinate(point.y, frame.height),
  };
}

/**
 * Accepts a JSON string or parsed value: a list of shapes, a single shape, or an
 * envelope `{ shapes | drawings, width?, height? }` carrying its reference frame.
 *
 * @throws {MalformedAnnotationError} when a string payload is not JSON
 */
export function parseAnnotationPayload(raw: unknown): AnnotationPayload | undefined {
  if (raw === undefined || raw === null || raw === '') return undefined;

  let value: unknown = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch {
      throw new MalformedAnnotationError('Annotation payload is not valid JSON');
    }
  }

  if (Array.isArray(value)) {
    return { shapes: value };
  }
  if (!isRecord(value)) {
    throw new MalformedAnnotationError('Annotation payload is neither a list nor an object');
  }

  const shapes = Array.isArray(value.shapes)
    ? value.shapes
    : Array.isArray(value.drawings)
      ? value.drawings
      : undefined;

  if (!shapes) {
    // A lone shape
    return { shapes: [value] };
  }

  const width = positiveNumber(value.width);
  const height = positiveNumber(value.height);
  return { shapes, frame: width && height ? { width, height } : undefined };
}

export function resolveShapeType(shape: unknown): AnnotationType | undefined {
  if (!isRecord(shape)) return undefined;
  const declared = typeof shape.type === 'string' ? shape.type : shape.tool;
  if (typeof declared !== 'string') return undefined;
  return SHAPE_ALIASES.get(declared.toLowerCase());
}

/**
 * Convert one raw shape to frame-relative percentages.
 *
 * @returns undefined for shape types we do not render
 * @throws {MalformedAnnotationError} when a recognised shape lacks usable geometry
 */
export function normalizeShape(shape: unknown, frame: FrameSize): AnnotationGeometry | undefined {
  const type = resolveShapeType(shape);
  if (!type || !isRecord(shape)) return undefined;

  switch (type) {
    case 'rectangle':
    case 'circle': {
      const box = BoxSchema.safeParse({
        ...shape,
        width: shape.width ?? shape.w,
        height: shape.height ?? shape.h,
      });
      if (!box.success) {
        throw new MalformedAnnotationError(`Malformed ${type} annotation`);
      }
      return {
        type,
        x: scaleCoordinate(box.data.x, frame.width),
        y: scaleCoordinate(box.data.y, frame.height),
        width: scaleCoordinate(box.data.width, frame.width),
        height: scaleCoordinate(box.data.height, frame.height),
      };
    }
    case 'arrow':
    case 'line': {
      const parsed = PointListSchema.safeParse(shape);
      if (!parsed.success || parsed.data.points.length < 2) {
        throw new MalformedAnnotationError(`Malformed ${type} annotation`);
      }
      const points = parsed.data.points;
      return {
        type,
        start: scalePoint(points[0], frame),
        end: scalePoint(points[points.length - 1], frame),
      };
    }
    case 'freehand': {
      const parsed = PointListSchema.safeParse(shape);
      if (!parsed.success) {
        throw new MalformedAnnotationError('Malformed freehand annotation');
      }
      return {
        type,
        points: parsed.data.points.map((point) => scalePoint(point, frame)),
      };
    }
  }
}
