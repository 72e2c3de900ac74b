// src/core/normalizer/extractors.ts

/**
 * Field extraction for metadata whose shape drifts between API responses.
 * Each concern is an ordered list of strategies; the first one that yields a
 * value wins.
 */

export type Extractor<T> = (source: Record<string, unknown>) => T | undefined;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function nonEmptyString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function firstMatch<T>(source: Record<string, unknown>, strategies: Extractor<T>[]): T | undefined {
  for (const strategy of strategies) {
    const value = strategy(source);
    if (value !== undefined) return value;
  }
  return undefined;
}

// Author resolution

export const UNKNOWN_AUTHOR = 'Unknown User';

// display name -> alternate display name -> full name -> email
const AUTHOR_NAME_FIELDS = ['name', 'display_name', 'full_name', 'email'];

function nameFrom(person: unknown): string | undefined {
  if (!isRecord(person)) return undefined;
  for (const field of AUTHOR_NAME_FIELDS) {
    const value = nonEmptyString(person[field]);
    if (value) return value;
  }
  return undefined;
}

const authorStrategies: Extractor<string>[] = [
  // Anonymous reviewers (review links) first
  (comment) => (isRecord(comment.author) ? nameFrom(comment.author.anonymous_user) : undefined),
  (comment) => nameFrom(comment.anonymous_user),
  (comment) => nameFrom(comment.author),
  (comment) => nameFrom(comment.owner),
  (comment) => nonEmptyString(comment.author),
];

export function resolveAuthor(comment: Record<string, unknown>): string {
  return firstMatch(comment, authorStrategies) ?? UNKNOWN_AUTHOR;
}

// Timestamps

const TIMESTAMP_FIELDS = ['created_at', 'inserted_at', 'createdAt'];

export interface ResolvedTimestamp {
  rawTimestamp: string; // ISO 8601, used for sorting
  displayTimestamp: string; // 'YYYY-MM-DD HH:mm' UTC
  substituted: boolean;
}

/**
 * A missing, unparseable or out-of-range (outside years 0000-9999) creation time
 * falls back to `nowMs`
 */
export function resolveTimestamp(comment: Record<string, unknown>, nowMs: number): ResolvedTimestamp {
  for (const field of TIMESTAMP_FIELDS) {
    const value = comment[field];
    if (typeof value !== 'string' && typeof value !== 'number') continue;

    const parsed = new Date(value);
    if (isReportableDate(parsed)) {
      return toResolved(parsed, false);
    }
  }
  return toResolved(new Date(nowMs), true);
}

// Six-digit ISO years cannot be shown as 'YYYY-MM-DD HH:mm'
function isReportableDate(date: Date): boolean {
  const year = date.getUTCFullYear();
  return !isNaN(date.getTime()) && year >= 0 && year <= 9999;
}

function toResolved(date: Date, substituted: boolean): ResolvedTimestamp {
  const iso = date.toISOString();
  return {
    rawTimestamp: iso,
    displayTimestamp: formatDisplayTimestamp(iso),
    substituted,
  };
}

export function formatDisplayTimestamp(iso: string): string {
  return iso.slice(0, 16).replace('T', ' ');
}

// Thumbnails

const THUMBNAIL_SIZE_KEYS = ['medium', 'large', 'small'];
const THUMBNAIL_STRING_FIELDS = ['thumbnail_url', 'thumbnail', 'thumb', 'thumb_540'];

function fromThumbnailMap(asset: Record<string, unknown>): string | undefined {
  for (const field of ['thumbnails', 'thumbnail']) {
    const map = asset[field];
    if (!isRecord(map)) continue;
    for (const key of THUMBNAIL_SIZE_KEYS) {
      const value = nonEmptyString(map[key]);
      if (value) return value;
    }
  }
  return undefined;
}

function fromThumbnailList(asset: Record<string, unknown>): string | undefined {
  const list = asset.thumbnails;
  if (!Array.isArray(list)) return undefined;
  for (const entry of list) {
    const value = nonEmptyString(entry) ?? (isRecord(entry) ? nonEmptyString(entry.url) : undefined);
    if (value) return value;
  }
  return undefined;
}

function fromThumbnailString(asset: Record<string, unknown>): string | undefined {
  for (const field of THUMBNAIL_STRING_FIELDS) {
    const value = nonEmptyString(asset[field]);
    if (value) return value;
  }
  return undefined;
}

const thumbnailStrategies: Extractor<string>[] = [
  fromThumbnailMap,
  fromThumbnailList,
  fromThumbnailString,
];

/**
 * Thumbnail carried on the asset payload itself, if any
 */
export function extractThumbnail(asset: Record<string, unknown>): string | undefined {
  return firstMatch(asset, thumbnailStrategies);
}

// Frame size of the source media

export function positiveNumber(value: unknown): number | undefined {
  return typeof value === 'number' && isFinite(value) && value > 0 ? value : undefined;
}

export function extractMediaFrame(asset: Record<string, unknown>): { width: number; height: number } | undefined {
  const strategies: Extractor<{ width: number; height: number }>[] = [
    (a) => {
      const width = positiveNumber(a.original_width);
      const height = positiveNumber(a.original_height);
      return width && height ? { width, height } : undefined;
    },
    (a) => {
      if (!isRecord(a.resolution)) return undefined;
      const width = positiveNumber(a.resolution.width);
      const height = positiveNumber(a.resolution.height);
      return width && height ? { width, height } : undefined;
    },
  ];
  return firstMatch(asset, strategies);
}
