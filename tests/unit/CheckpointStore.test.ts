// tests/unit/CheckpointStore.test.ts

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CheckpointStore } from '../../src/core/checkpoint/CheckpointStore';
import {
  FileCheckpointBackend,
  createCheckpointBackend,
} from '../../src/core/checkpoint/backends';
import type { CheckpointBackend } from '../../src/core/checkpoint/backends';
import type { RunIdentity } from '../../src/core/checkpoint/types';
import type { NormalizedAsset } from '../../src/core/normalizer/types';
import { CheckpointError } from '../../src/utils/errors';
import { FakeTimeSource, silentLogger, testMetrics } from '../helpers/fakes';

const identity: RunIdentity = {
  projectId: 'p1',
  nameFilterTerms: ['final'],
  includeHistoricalContainers: false,
};

const reportEntry: NormalizedAsset = {
  id: 'a1',
  name: 'Cut 1',
  kind: 'file',
  folderPath: '/Edits',
  viewUrl: 'https://app.review.test/p1?item=a1',
  comments: [
    {
      id: 'c1',
      text: 'Tighten the intro',
      author: 'Reviewer',
      displayTimestamp: '2024-03-05 10:00',
      rawTimestamp: '2024-03-05T10:00:00.000Z',
      colorTag: '#e6194b',
      annotations: [{ type: 'arrow', start: { x: 0, y: 0 }, end: { x: 50, y: 50 }, color: '#e6194b' }],
    },
  ],
};

class BrokenBackend implements CheckpointBackend {
  async read(): Promise<string | undefined> {
    throw new Error('disk unreadable');
  }

  async write(): Promise<void> {
    throw new Error('disk full');
  }

  async remove(): Promise<void> {
    throw new Error('read-only filesystem');
  }
}

function createStore(backend: CheckpointBackend): CheckpointStore {
  return new CheckpointStore(backend, new FakeTimeSource(), silentLogger(), testMetrics());
}

describe('CheckpointStore', () => {
  describe('runKeyFor', () => {
    it('should be a sha256 hex digest', () => {
      expect(CheckpointStore.runKeyFor(identity)).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should ignore term order, case and duplicates', () => {
      const a = CheckpointStore.runKeyFor({ ...identity, nameFilterTerms: ['mix', 'final'] });
      const b = CheckpointStore.runKeyFor({ ...identity, nameFilterTerms: ['Final ', 'MIX', 'mix'] });

      expect(a).toBe(b);
    });

    it('should change with the filter, the historical flag or the project', () => {
      const base = CheckpointStore.runKeyFor(identity);

      expect(CheckpointStore.runKeyFor({ ...identity, nameFilterTerms: [] })).not.toBe(base);
      expect(CheckpointStore.runKeyFor({ ...identity, includeHistoricalContainers: true })).not.toBe(base);
      expect(CheckpointStore.runKeyFor({ ...identity, projectId: 'p2' })).not.toBe(base);
    });
  });

  describe('with the file backend', () => {
    let directory: string;
    let backend: FileCheckpointBackend;
    let store: CheckpointStore;
    const runKey = CheckpointStore.runKeyFor(identity);

    beforeEach(async () => {
      directory = await fs.mkdtemp(path.join(os.tmpdir(), 'harvest-checkpoint-'));
      backend = new FileCheckpointBackend(directory);
      store = createStore(backend);
    });

    afterEach(async () => {
      await fs.rm(directory, { recursive: true, force: true });
    });

    it('should start empty when no checkpoint exists', async () => {
      const state = await store.load(runKey);

      expect(state.partialReport).toEqual([]);
      expect(state.processedIds.size).toBe(0);
    });

    it('should restore what was saved', async () => {
      await store.save(runKey, identity, [reportEntry], new Set(['a1', 'a2']));

      const state = await store.load(runKey);

      expect(state.partialReport).toEqual([reportEntry]);
      expect(Array.from(state.processedIds)).toEqual(['a1', 'a2']);
    });

    it('should write the file atomically and leave no temporary files', async () => {
      await store.save(runKey, identity, [], ['a1']);
      await store.save(runKey, identity, [], ['a1', 'a2']);

      expect(await fs.readdir(directory)).toEqual([`${runKey}.json`]);

      const saved: unknown = JSON.parse(await fs.readFile(backend.pathFor(runKey), 'utf8'));
      expect(saved).toMatchObject({
        version: 1,
        runKey,
        processedIds: ['a1', 'a2'],
        savedAt: '2024-05-01T12:00:00.000Z',
      });
    });

    it('should discard a corrupt checkpoint', async () => {
      await fs.writeFile(backend.pathFor(runKey), '{"processedIds": ["a1"', 'utf8');

      const state = await store.load(runKey);

      expect(state.processedIds.size).toBe(0);
    });

    it('should discard a checkpoint with an unexpected shape', async () => {
      await fs.writeFile(backend.pathFor(runKey), JSON.stringify({ version: 2, processedIds: ['a1'] }));

      const state = await store.load(runKey);

      expect(state.processedIds.size).toBe(0);
    });

    it('should discard a checkpoint saved under another run key', async () => {
      const otherKey = CheckpointStore.runKeyFor({ ...identity, projectId: 'p2' });
      await store.save(otherKey, identity, [], ['a1']);
      await fs.copyFile(backend.pathFor(otherKey), backend.pathFor(runKey));

      const state = await store.load(runKey);

      expect(state.processedIds.size).toBe(0);
    });

    it('should clear the checkpoint, and tolerate clearing twice', async () => {
      await store.save(runKey, identity, [], ['a1']);

      await store.clear(runKey);
      await store.clear(runKey);

      expect(await fs.readdir(directory)).toEqual([]);
      expect((await store.load(runKey)).processedIds.size).toBe(0);
    });
  });

  describe('with the memory backend', () => {
    it('should round-trip through Keyv', async () => {
      const store = createStore(createCheckpointBackend({ backend: 'memory', directory: 'unused' }));
      const runKey = CheckpointStore.runKeyFor(identity);

      await store.save(runKey, identity, [reportEntry], ['a1']);
      const state = await store.load(runKey);

      expect(state.partialReport).toEqual([reportEntry]);
      expect(state.processedIds.has('a1')).toBe(true);

      await store.clear(runKey);
      expect((await store.load(runKey)).partialReport).toEqual([]);
    });
  });

  describe('when the backend fails', () => {
    it('should start empty when the checkpoint cannot be read', async () => {
      const state = await createStore(new BrokenBackend()).load('run');

      expect(state.processedIds.size).toBe(0);
    });

    it('should raise CheckpointError when saving fails', async () => {
      const error = await createStore(new BrokenBackend())
        .save('run', identity, [], [])
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CheckpointError);
      expect(error).toMatchObject({
        code: 'CHECKPOINT_ERROR',
        message: 'Failed to save checkpoint: disk full',
      });
    });

    it('should raise CheckpointError when clearing fails', async () => {
      await expect(createStore(new BrokenBackend()).clear('run')).rejects.toBeInstanceOf(CheckpointError);
    });
  });
});
