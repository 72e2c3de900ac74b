// src/report/FolderPathResolver.ts

import type { Item } from '../core/api/types';
import type { Asset } from '../core/walker/types';
import type { IndexedItem } from '../core/walker/WalkContext';
import type { Logger } from '../observability/Logger';
import { errorMessage } from '../utils/errors';

export const ROOT_FOLDER_PATH = '/';

export interface ItemIndex {
  lookup(itemId: string): IndexedItem | undefined;
  remember(item: Pick<Item, 'id' | 'name' | 'parentId'>): void;
}

export interface ItemFetcher {
  getItem(itemId: string): Promise<Item>;
}

export function joinFolderPath(parent: string, name: string): string {
  return parent === ROOT_FOLDER_PATH ? `/${name}` : `${parent}/${name}`;
}

/**
 * Resolves `/A/B`-style paths by following parent links. Results are memoised
 * per container for the lifetime of the resolver (one harvest run); ancestors the
 * walk never listed are fetched once and added to the index.
 */
export class FolderPathResolver {
  private cache = new Map<string, string>();

  constructor(
    private index: ItemIndex,
    private fetcher: ItemFetcher,
    private logger: Logger
  ) {}

  /**
   * Pin a container to `/` (the project root is not listed by any walk)
   */
  markRoot(containerId: string): void {
    this.cache.set(containerId, ROOT_FOLDER_PATH);
  }

  async resolveForAsset(asset: Pick<Asset, 'id' | 'parentId'>): Promise<string> {
    return asset.parentId ? this.resolve(asset.parentId) : ROOT_FOLDER_PATH;
  }

  async resolve(containerId: string): Promise<string> {
    const chain: { id: string; name: string }[] = [];
    const seen = new Set<string>();
    let base = ROOT_FOLDER_PATH;
    let current: string | undefined = containerId;

    while (current !== undefined) {
      const cached = this.cache.get(current);
      if (cached !== undefined) {
        base = cached;
        break;
      }

      if (seen.has(current)) {
        this.logger.warn('Cycle in parent links, treating as root', { containerId: current });
        break;
      }
      seen.add(current);

      const node = await this.describe(current);
      if (!node) break;

      // A container without a parent is the project root
      if (!node.parentId) {
        this.cache.set(current, ROOT_FOLDER_PATH);
        break;
      }

      chain.push({ id: current, name: node.name });
      current = node.parentId;
    }

    let path = base;
    for (let i = chain.length - 1; i >= 0; i--) {
      path = joinFolderPath(path, chain[i].name);
      this.cache.set(chain[i].id, path);
    }
    return path;
  }

  private async describe(itemId: string): Promise<IndexedItem | undefined> {
    const known = this.index.lookup(itemId);
    if (known) return known;

    try {
      const item = await this.fetcher.getItem(itemId);
      this.index.remember(item);
      return { name: item.name, parentId: item.parentId };
    } catch (error: unknown) {
      this.logger.warn('Could not resolve ancestor, treating as root', {
        itemId,
        error: errorMessage(error),
      });
      return undefined;
    }
  }
}
