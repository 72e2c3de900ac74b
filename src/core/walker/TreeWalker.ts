// src/core/walker/TreeWalker.ts

import type { Item } from '../api/types';
import type { Asset, ContainerRef, ContainerSource, WalkPolicy } from './types';
import type { WalkContext } from './WalkContext';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { matchesAllTerms, matchesAnyTerm } from './filters';
import { errorMessage } from '../../utils/errors';

type Frame = { type: 'container'; ref: ContainerRef } | { type: 'asset'; item: Item };

/**
 * Depth-first enumeration of leaf assets below a container.
 *
 * Iterative with an explicit stack, so arbitrarily deep trees do not grow the call
 * stack; the output order is the same as a recursive pre-order walk (children in
 * the order the API returned them).
 */
export class TreeWalker {
  constructor(
    private source: ContainerSource,
    private policy: WalkPolicy,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  async walk(root: ContainerRef, context: WalkContext): Promise<Asset[]> {
    const assets: Asset[] = [];
    const stack: Frame[] = [{ type: 'container', ref: root }];

    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) break;

      if (frame.type === 'asset') {
        if (this.acceptAsset(frame.item, context)) {
          assets.push(frame.item);
        }
        continue;
      }

      const children = await this.expand(frame.ref, context);

      // Reverse push keeps API order when popping
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];

        if (child.kind === 'folder') {
          stack.push({
            type: 'container',
            ref: { id: child.id, name: child.name, kind: 'folder' },
          });
        } else if (this.policy.assetKinds.includes(child.kind)) {
          stack.push({ type: 'asset', item: child });
        } else {
          this.logger.debug('Ignoring item of unrecognised kind', {
            itemId: child.id,
            kind: child.kind,
          });
        }
      }
    }

    return assets;
  }

  isExcluded(containerName: string): boolean {
    return (
      this.policy.excludedContainerTerms.length > 0 &&
      matchesAnyTerm(containerName, this.policy.excludedContainerTerms)
    );
  }

  /**
   * Visit one container: short-circuit if seen or excluded, otherwise fetch its
   * contents. A failed fetch contributes nothing and does not stop siblings.
   */
  private async expand(ref: ContainerRef, context: WalkContext): Promise<Item[]> {
    if (context.hasVisited(ref.id)) {
      this.logger.debug('Container already visited', { containerId: ref.id });
      this.metrics.incrementCounter('containers_skipped', { reason: 'visited' });
      return [];
    }
    context.markVisited(ref.id);

    // Checked before fetching so excluded subtrees cost no requests
    if (this.isExcluded(ref.name)) {
      this.logger.info('Skipping excluded container', {
        containerId: ref.id,
        containerName: ref.name,
      });
      this.metrics.incrementCounter('containers_skipped', { reason: 'excluded' });
      return [];
    }

    let items: Item[];
    try {
      items = await this.source.getContainerContents(ref);
    } catch (error: unknown) {
      this.logger.warn('Failed to fetch container contents, skipping subtree', {
        containerId: ref.id,
        containerName: ref.name,
        error: errorMessage(error),
      });
      context.failedContainers.push(ref.id);
      this.metrics.incrementCounter('containers_skipped', { reason: 'failed' });
      return [];
    }

    context.containersFetched += 1;
    this.metrics.incrementCounter('containers_walked');
    this.logger.debug('Fetched container contents', {
      containerId: ref.id,
      containerName: ref.name,
      count: items.length,
    });

    // Folder listings imply the parent; review-link listings only carry what the API sends
    const children =
      ref.kind === 'folder'
        ? items.map((item) => ({ ...item, parentId: item.parentId ?? ref.id }))
        : items;

    children.forEach((item) => context.remember(item));
    return children;
  }

  private acceptAsset(asset: Item, context: WalkContext): boolean {
    if (!matchesAllTerms(asset.name, this.policy.nameFilterTerms)) {
      return false;
    }
    if (!context.claimAsset(asset.id)) {
      this.logger.debug('Asset already collected this run', { assetId: asset.id });
      return false;
    }
    return true;
  }
}
