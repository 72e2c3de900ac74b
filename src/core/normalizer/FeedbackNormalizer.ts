// src/core/normalizer/FeedbackNormalizer.ts

import type { RawComment } from '../api/types';
import type { Asset } from '../walker/types';
import type {
  AnnotationGeometry,
  FrameSize,
  NormalizedAnnotation,
  NormalizedAsset,
  NormalizedComment,
} from './types';
import type { ColorPalette } from '../../report/ColorPalette';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { TimeSource } from '../../utils/time';
import { NormalizedAssetSchema, NormalizedCommentSchema } from './schema';
import { extractMediaFrame, extractThumbnail, resolveAuthor, resolveTimestamp } from './extractors';
import { normalizeShape, parseAnnotationPayload } from './annotations';
import type { AnnotationPayload } from './annotations';
import { errorMessage } from '../../utils/errors';

/**
 * Remote calls the normalizer needs per asset
 */
export interface FeedbackSource {
  listComments(assetId: string): Promise<RawComment[]>;
  getThumbnail(assetId: string): Promise<string | undefined>;
}

export interface NormalizerOptions {
  projectId: string;
  viewUrlTemplate: string;
  defaultFrame: FrameSize;
  palette: ColorPalette;
}

type UncoloredComment = Omit<NormalizedComment, 'colorTag' | 'annotations'> & {
  annotations: AnnotationGeometry[];
};

const ANNOTATION_FIELDS = ['annotation', 'annotations', 'drawing'];

// Colour is positional, so it is checked once the comments are ordered
const UncoloredCommentSchema = NormalizedCommentSchema.omit({ colorTag: true, annotations: true });

export class FeedbackNormalizer {
  constructor(
    private source: FeedbackSource,
    private options: NormalizerOptions,
    private time: TimeSource,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  /**
   * Fetch and normalize an asset's feedback.
   *
   * @returns null when the asset has no usable comments (it still counts as processed)
   * @throws when the comment listing itself cannot be fetched
   */
  async normalize(asset: Asset, folderPath: string): Promise<NormalizedAsset | null> {
    const rawComments = await this.source.listComments(asset.id);

    const comments: UncoloredComment[] = [];
    for (const raw of rawComments) {
      try {
        comments.push(this.normalizeComment(raw, asset));
      } catch (error: unknown) {
        this.logger.warn('Skipping comment that could not be normalized', {
          assetId: asset.id,
          commentId: raw.id,
          error: errorMessage(error),
        });
        this.metrics.incrementCounter('comments_skipped');
      }
    }

    if (comments.length === 0) {
      this.logger.debug('Asset has no feedback', { assetId: asset.id });
      return null;
    }

    // Oldest first; the position decides the colour
    const ordered = comments
      .map((comment, index) => ({ comment, index }))
      .sort((a, b) => {
        if (a.comment.rawTimestamp !== b.comment.rawTimestamp) {
          return a.comment.rawTimestamp < b.comment.rawTimestamp ? -1 : 1;
        }
        return a.index - b.index;
      })
      .map(({ comment }, position) => this.applyColor(comment, position));

    const normalized: NormalizedAsset = {
      id: asset.id,
      name: asset.name,
      kind: asset.kind,
      folderPath,
      thumbnailUrl: await this.resolveThumbnail(asset),
      viewUrl: this.buildViewUrl(asset.id),
      comments: ordered,
    };

    return NormalizedAssetSchema.parse(normalized);
  }

  private normalizeComment(raw: RawComment, asset: Asset): UncoloredComment {
    if (raw.text !== undefined && raw.text !== null && typeof raw.text !== 'string') {
      throw new Error('Comment text is not a string');
    }

    const timestamp = resolveTimestamp(raw, this.time.nowMs());
    if (timestamp.substituted) {
      this.logger.debug('Comment has no creation time, using current time', {
        assetId: asset.id,
        commentId: raw.id,
      });
    }

    const fields = UncoloredCommentSchema.parse({
      id: raw.id,
      text: typeof raw.text === 'string' ? raw.text : '',
      author: resolveAuthor(raw),
      displayTimestamp: timestamp.displayTimestamp,
      rawTimestamp: timestamp.rawTimestamp,
    });

    return { ...fields, annotations: this.normalizeAnnotations(raw, asset) };
  }

  private normalizeAnnotations(raw: RawComment, asset: Asset): AnnotationGeometry[] {
    const field = ANNOTATION_FIELDS.find((name) => raw[name] !== undefined && raw[name] !== null);
    if (!field) return [];

    let payload: AnnotationPayload | undefined;
    try {
      payload = parseAnnotationPayload(raw[field]);
    } catch (error: unknown) {
      this.logger.warn('Dropping malformed annotation payload', {
        assetId: asset.id,
        commentId: raw.id,
        error: errorMessage(error),
      });
      return [];
    }
    if (!payload) return [];

    const frame = payload.frame ?? extractMediaFrame(asset.metadata) ?? this.options.defaultFrame;
    const annotations: AnnotationGeometry[] = [];

    for (const shape of payload.shapes) {
      try {
        const geometry = normalizeShape(shape, frame);
        if (geometry) annotations.push(geometry);
      } catch (error: unknown) {
        this.logger.warn('Dropping malformed annotation', {
          assetId: asset.id,
          commentId: raw.id,
          error: errorMessage(error),
        });
      }
    }

    return annotations;
  }

  private applyColor(comment: UncoloredComment, position: number): NormalizedComment {
    const colorTag = this.options.palette.colorFor(position);
    const { annotations, ...rest } = comment;

    const normalized: NormalizedComment = { ...rest, colorTag };
    if (annotations.length > 0) {
      normalized.annotations = annotations.map(
        (geometry): NormalizedAnnotation => ({ ...geometry, color: colorTag })
      );
    }
    return normalized;
  }

  /**
   * Asset payload fields first, then the dedicated preview lookup. Absence is
   * never an error.
   */
  private async resolveThumbnail(asset: Asset): Promise<string | undefined> {
    const embedded = extractThumbnail(asset.metadata);
    if (embedded) return embedded;

    try {
      return await this.source.getThumbnail(asset.id);
    } catch (error: unknown) {
      this.logger.warn('Thumbnail lookup failed', {
        assetId: asset.id,
        error: errorMessage(error),
      });
      return undefined;
    }
  }

  private buildViewUrl(assetId: string): string {
    return this.options.viewUrlTemplate
      .split('{projectId}')
      .join(encodeURIComponent(this.options.projectId))
      .split('{assetId}')
      .join(encodeURIComponent(assetId));
  }
}
