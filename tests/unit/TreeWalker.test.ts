// tests/unit/TreeWalker.test.ts

import { describe, it, expect } from 'vitest';
import { TreeWalker } from '../../src/core/walker/TreeWalker';
import { WalkContext } from '../../src/core/walker/WalkContext';
import type { Item } from '../../src/core/api/types';
import type { ContainerRef, ContainerSource, WalkPolicy } from '../../src/core/walker/types';
import { silentLogger, testMetrics } from '../helpers/fakes';

function item(id: string, name: string, kind: string, parentId?: string): Item {
  return { id, name, kind, parentId, metadata: { id, name, type: kind } };
}

/**
 * In-memory tree; records every container fetch
 */
class FakeSource implements ContainerSource {
  readonly calls: string[] = [];

  constructor(
    private tree: Record<string, Item[]>,
    private failing: Set<string> = new Set()
  ) {}

  async getContainerContents(container: ContainerRef): Promise<Item[]> {
    this.calls.push(container.id);
    if (this.failing.has(container.id)) {
      throw new Error(`listing ${container.id} failed`);
    }
    return this.tree[container.id] ?? [];
  }
}

const ROOT: ContainerRef = { id: 'root', name: 'root', kind: 'folder' };

const tree: Record<string, Item[]> = {
  root: [
    item('A', 'Alpha', 'folder'),
    item('B', 'Old cuts', 'folder'),
    item('x', 'final mix.mov', 'file'),
  ],
  A: [
    item('a1', 'Final Mix v2', 'file'),
    item('a2', 'rough', 'video'),
    item('z', 'notes', 'comment_thread'),
  ],
  B: [item('b1', 'final mix old', 'file')],
};

function policy(overrides: Partial<WalkPolicy> = {}): WalkPolicy {
  return {
    assetKinds: ['file', 'video'],
    excludedContainerTerms: ['old', 'archive'],
    nameFilterTerms: [],
    ...overrides,
  };
}

async function walk(source: ContainerSource, walkPolicy: WalkPolicy, context = new WalkContext()) {
  const walker = new TreeWalker(source, walkPolicy, silentLogger(), testMetrics());
  return walker.walk(ROOT, context);
}

describe('TreeWalker', () => {
  it('should emit assets in pre-order and skip excluded containers without fetching them', async () => {
    const source = new FakeSource(tree);

    const assets = await walk(source, policy());

    expect(assets.map((a) => a.id)).toEqual(['a1', 'a2', 'x']);
    expect(source.calls).toEqual(['root', 'A']);
  });

  it('should descend historical containers when exclusion is off', async () => {
    const source = new FakeSource(tree);

    const assets = await walk(source, policy({ excludedContainerTerms: [] }));

    expect(assets.map((a) => a.id)).toEqual(['a1', 'a2', 'b1', 'x']);
    expect(source.calls).toEqual(['root', 'A', 'B']);
  });

  it('should require every filter term in the asset name', async () => {
    const assets = await walk(new FakeSource(tree), policy({ nameFilterTerms: ['final', 'mix'] }));

    expect(assets.map((a) => a.id)).toEqual(['a1', 'x']);
  });

  it('should ignore items of unrecognised kinds', async () => {
    const assets = await walk(new FakeSource(tree), policy());

    expect(assets.find((a) => a.id === 'z')).toBeUndefined();
  });

  it('should fetch each container at most once even with cycles', async () => {
    const cyclic: Record<string, Item[]> = {
      root: [item('A', 'A', 'folder'), item('C', 'C', 'folder')],
      A: [item('C', 'C', 'folder'), item('a1', 'one', 'file')],
      C: [item('root', 'root', 'folder'), item('A', 'A', 'folder'), item('c1', 'two', 'file')],
    };
    const source = new FakeSource(cyclic);
    const context = new WalkContext();

    const assets = await walk(source, policy(), context);

    expect(source.calls).toEqual(['root', 'A', 'C']);
    expect(new Set(source.calls).size).toBe(source.calls.length);
    expect(assets.map((a) => a.id)).toEqual(['c1', 'a1']);
    expect(context.visitedCount).toBe(3);
  });

  it('should emit an asset listed in two containers once', async () => {
    const shared: Record<string, Item[]> = {
      root: [item('A', 'A', 'folder'), item('B', 'B', 'folder')],
      A: [item('s1', 'shared', 'file')],
      B: [item('s1', 'shared', 'file')],
    };

    const assets = await walk(new FakeSource(shared), policy({ excludedContainerTerms: [] }));

    expect(assets.map((a) => a.id)).toEqual(['s1']);
  });

  it('should keep walking siblings when a container fails', async () => {
    const source = new FakeSource(tree, new Set(['A']));
    const context = new WalkContext();

    const assets = await walk(source, policy(), context);

    expect(assets.map((a) => a.id)).toEqual(['x']);
    expect(context.failedContainers).toEqual(['A']);
    expect(context.containersFetched).toBe(1);
  });

  it('should remember folder children with the folder as parent', async () => {
    const context = new WalkContext();

    await walk(new FakeSource(tree), policy(), context);

    expect(context.lookup('a1')).toEqual({ name: 'Final Mix v2', parentId: 'A' });
    expect(context.lookup('A')).toEqual({ name: 'Alpha', parentId: 'root' });
  });

  it('should not match exclusion terms against the root name', () => {
    const walker = new TreeWalker(new FakeSource(tree), policy(), silentLogger(), testMetrics());

    expect(walker.isExcluded('root')).toBe(false);
    expect(walker.isExcluded('ARCHIVE 2022')).toBe(true);
  });
});
