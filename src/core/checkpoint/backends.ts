// src/core/checkpoint/backends.ts

import { promises as fs } from 'fs';
import * as path from 'path';
import Keyv from 'keyv';
import KeyvRedis from '@keyv/redis';
import KeyvPostgres from '@keyv/postgres';
import { v4 as uuidv4 } from 'uuid';

export interface CheckpointBackend {
  read(runKey: string): Promise<string | undefined>;
  write(runKey: string, contents: string): Promise<void>;
  remove(runKey: string): Promise<void>;
  close?(): Promise<void>;
}

export interface CheckpointBackendConfig {
  backend: 'file' | 'memory' | 'redis' | 'postgres';
  directory: string;
  url?: string;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One JSON file per run key. Writes go to a temporary sibling and are renamed
 * into place, so a crash mid-write leaves the previous checkpoint intact.
 */
export class FileCheckpointBackend implements CheckpointBackend {
  constructor(private directory: string) {}

  pathFor(runKey: string): string {
    return path.join(this.directory, `${runKey}.json`);
  }

  async read(runKey: string): Promise<string | undefined> {
    try {
      return await fs.readFile(this.pathFor(runKey), 'utf8');
    } catch (error: unknown) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
  }

  async write(runKey: string, contents: string): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });

    const target = this.pathFor(runKey);
    const temp = path.join(this.directory, `.${runKey}.${uuidv4()}.tmp`);

    try {
      await fs.writeFile(temp, contents, 'utf8');
      await fs.rename(temp, target);
    } catch (error: unknown) {
      await fs.rm(temp, { force: true });
      throw error;
    }
  }

  async remove(runKey: string): Promise<void> {
    await fs.rm(this.pathFor(runKey), { force: true });
  }
}

/**
 * Checkpoints kept in any Keyv store (in-process memory, Redis, Postgres)
 */
export class KeyvCheckpointBackend implements CheckpointBackend {
  constructor(private store: Keyv<string>) {}

  private key(runKey: string): string {
    return `checkpoint:${runKey}`;
  }

  async read(runKey: string): Promise<string | undefined> {
    return this.store.get(this.key(runKey));
  }

  async write(runKey: string, contents: string): Promise<void> {
    await this.store.set(this.key(runKey), contents);
  }

  async remove(runKey: string): Promise<void> {
    await this.store.delete(this.key(runKey));
  }

  async close(): Promise<void> {
    await this.store.disconnect();
  }
}

export function createCheckpointBackend(config: CheckpointBackendConfig): CheckpointBackend {
  switch (config.backend) {
    case 'file':
      return new FileCheckpointBackend(config.directory);
    case 'memory':
      return new KeyvCheckpointBackend(new Keyv<string>());
    case 'redis':
      return new KeyvCheckpointBackend(
        new Keyv<string>({ store: new KeyvRedis(requireUrl(config)) })
      );
    case 'postgres':
      return new KeyvCheckpointBackend(
        new Keyv<string>({ store: new KeyvPostgres({ uri: requireUrl(config) }) })
      );
  }
}

function requireUrl(config: CheckpointBackendConfig): string {
  if (!config.url) {
    throw new Error(`Checkpoint backend '${config.backend}' requires a url`);
  }
  return config.url;
}
