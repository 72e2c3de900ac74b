// src/core/api/FrameioApi.ts

import type { EndpointCandidate, EndpointProber } from '../http/EndpointProber';
import type { ContainerRef, ContainerSource } from '../walker/types';
import type { Item, Project, ProjectRoot, RawComment, RawItem, Team } from './types';
import {
  RawCommentSchema,
  RawItemSchema,
  RawProjectSchema,
  RawReviewLinkEntrySchema,
  RawTeamSchema,
} from './types';
import { EndpointProbeError } from '../../utils/errors';

/**
 * Logical operations against the review service. Each operation lists the endpoint
 * shapes it has been seen under, newest first.
 */
export class FrameioApi implements ContainerSource {
  constructor(private prober: EndpointProber) {}

  async listTeams(): Promise<Team[]> {
    return this.prober.probe('listTeams', 'me', [
      { path: '/teams', extract: (data) => parseList(data, toTeam) },
      { path: '/me/teams', extract: (data) => parseList(data, toTeam) },
    ]);
  }

  async listProjects(teamId: string): Promise<Project[]> {
    return this.prober.probe('listProjects', teamId, [
      { path: '/teams/{id}/projects', extract: (data) => parseList(data, toProject) },
    ]);
  }

  async getProjectRoot(projectId: string): Promise<ProjectRoot> {
    return this.prober.probe('getProjectRoot', projectId, [
      {
        path: '/projects/{id}',
        extract: (data) => {
          const project = toProject(data);
          if (!project?.rootId) return undefined;
          return { projectId: project.id, name: project.name, rootId: project.rootId };
        },
      },
    ]);
  }

  async listReviewLinks(projectId: string): Promise<Item[]> {
    return this.prober.probe('listReviewLinks', projectId, [
      {
        path: '/projects/{id}/review_links',
        extract: (data) =>
          parseList(data, (raw) => {
            const item = toItem(raw);
            return item ? { ...item, kind: 'review_link' } : undefined;
          }),
      },
    ]);
  }

  async getContainerContents(container: ContainerRef): Promise<Item[]> {
    const candidates: EndpointCandidate<Item[]>[] =
      container.kind === 'review_link'
        ? [
            { path: '/review_links/{id}/items', extract: (data) => parseList(data, toReviewLinkItem) },
            { path: '/review_links/{id}/assets', extract: (data) => parseList(data, toReviewLinkItem) },
          ]
        : [
            { path: '/assets/{id}/children', extract: (data) => parseList(data, toItem) },
            { path: '/items/{id}/children', extract: (data) => parseList(data, toItem) },
          ];

    return this.prober.probe('getContainerContents', container.id, candidates);
  }

  async getItem(itemId: string): Promise<Item> {
    return this.prober.probe('getItem', itemId, [
      { path: '/assets/{id}', extract: toItem },
      { path: '/items/{id}', extract: toItem },
    ]);
  }

  async listComments(assetId: string): Promise<RawComment[]> {
    return this.prober.probe('listComments', assetId, [
      { path: '/assets/{id}/comments', extract: (data) => parseList(data, toComment) },
      { path: '/items/{id}/comments', extract: (data) => parseList(data, toComment) },
    ]);
  }

  /**
   * Dedicated preview lookup. A 404 from every candidate means the asset has no
   * preview and resolves to undefined; other failures reject.
   */
  async getThumbnail(assetId: string): Promise<string | undefined> {
    try {
      return await this.prober.probe('getThumbnail', assetId, [
        { path: '/assets/{id}/thumbnail', extract: toThumbnailUrl },
      ]);
    } catch (error: unknown) {
      if (error instanceof EndpointProbeError && error.isNotFound()) {
        return undefined;
      }
      throw error;
    }
  }
}

/**
 * Accept a bare array or a `{ data: [...] }` envelope; entries that do not map are dropped
 */
export function parseList<T>(data: unknown, map: (raw: unknown) => T | undefined): T[] | undefined {
  const list = Array.isArray(data) ? data : unwrapEnvelope(data);
  if (!list) return undefined;

  const result: T[] = [];
  for (const raw of list) {
    const mapped = map(raw);
    if (mapped !== undefined) result.push(mapped);
  }
  return result;
}

function unwrapEnvelope(data: unknown): unknown[] | undefined {
  if (data && typeof data === 'object' && 'data' in data && Array.isArray(data.data)) {
    return data.data;
  }
  return undefined;
}

export function toItem(raw: unknown): Item | undefined {
  const parsed = RawItemSchema.safeParse(raw);
  if (!parsed.success) return undefined;
  return fromRawItem(parsed.data);
}

function fromRawItem(raw: RawItem): Item {
  return {
    id: raw.id,
    name: raw.name ?? 'Unnamed',
    kind: raw.type ?? 'unknown',
    parentId: raw.parent_id ?? undefined,
    metadata: raw,
  };
}

function toReviewLinkItem(raw: unknown): Item | undefined {
  // Review link entries wrap the underlying asset
  const entry = RawReviewLinkEntrySchema.safeParse(raw);
  if (entry.success) return fromRawItem(entry.data.asset);
  return toItem(raw);
}

function toTeam(raw: unknown): Team | undefined {
  const parsed = RawTeamSchema.safeParse(raw);
  if (!parsed.success) return undefined;
  return { id: parsed.data.id, name: parsed.data.name ?? parsed.data.id };
}

function toProject(raw: unknown): Project | undefined {
  const parsed = RawProjectSchema.safeParse(raw);
  if (!parsed.success) return undefined;
  return {
    id: parsed.data.id,
    name: parsed.data.name ?? parsed.data.id,
    rootId: parsed.data.root_asset_id ?? parsed.data.root_folder_id ?? undefined,
  };
}

function toComment(raw: unknown): RawComment | undefined {
  const parsed = RawCommentSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

function toThumbnailUrl(data: unknown): string | undefined {
  if (typeof data === 'string' && data.length > 0) return data;
  if (!data || typeof data !== 'object') return undefined;

  for (const key of ['url', 'thumb', 'thumbnail_url', 'image']) {
    const value: unknown = Reflect.get(data, key);
    if (typeof value === 'string' && value.length > 0) return value;
  }
  return undefined;
}
