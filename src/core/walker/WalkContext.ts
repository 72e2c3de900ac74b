// src/core/walker/WalkContext.ts

import type { Item } from '../api/types';

export interface IndexedItem {
  name: string;
  parentId?: string;
}

/**
 * Run-scoped traversal state. One instance per harvest run, passed explicitly,
 * so repeated or concurrent runs in one process never share visitation state.
 */
export class WalkContext {
  private visitedContainers = new Set<string>();
  private emittedAssets = new Set<string>();
  private itemIndex = new Map<string, IndexedItem>();

  readonly failedContainers: string[] = [];
  containersFetched = 0;

  hasVisited(containerId: string): boolean {
    return this.visitedContainers.has(containerId);
  }

  markVisited(containerId: string): void {
    this.visitedContainers.add(containerId);
  }

  /**
   * Record an asset as emitted; false if it was already emitted this run
   */
  claimAsset(assetId: string): boolean {
    if (this.emittedAssets.has(assetId)) return false;
    this.emittedAssets.add(assetId);
    return true;
  }

  remember(item: Pick<Item, 'id' | 'name' | 'parentId'>): void {
    // Keep the first sighting; a folder parent wins over a review-link listing
    if (!this.itemIndex.has(item.id)) {
      this.itemIndex.set(item.id, { name: item.name, parentId: item.parentId });
    }
  }

  lookup(itemId: string): IndexedItem | undefined {
    return this.itemIndex.get(itemId);
  }

  get visitedCount(): number {
    return this.visitedContainers.size;
  }
}
