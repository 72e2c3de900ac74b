// src/core/walker/types.ts

import type { Item } from '../api/types';

export type ContainerKind = 'folder' | 'review_link';

export interface ContainerRef {
  id: string;
  name: string;
  kind: ContainerKind;
}

/**
 * Where the walker gets container contents from (the remote API in production)
 */
export interface ContainerSource {
  getContainerContents(container: ContainerRef): Promise<Item[]>;
}

export interface WalkPolicy {
  assetKinds: string[];
  /** Containers whose name contains any of these (case-insensitive) are not descended */
  excludedContainerTerms: string[];
  /** Every term must appear in an asset's name (case-insensitive) */
  nameFilterTerms: string[];
}

export type Asset = Item;
