import { mkdirSync } from 'fs';
import { join } from 'path';
import { randomUUID } from 'crypto';
import type { ContentFetcher } from '../src/content-fetcher.js';
import { Logger } from '../src/logger.js';
import type { SnapshotBackend } from '../src/snapshot-manager.js';
import type { DeleteEvent, ModifyEvent, SymlinkEvent } from '../src/types.js';
import { promises as fsp } from 'fs';

export function makeTempDir(name: string): string {
  const dir = join(process.cwd(), '.test-tmp', `${name}-${randomUUID()}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function quietLogger(): Logger {
  return new Logger({ minLevel: 'debug', silent: true });
}

export class MemorySnapshotBackend implements SnapshotBackend {
  created: string[] = [];
  listCalls = 0;
  failCreate = false;

  constructor(public existing: string[] = []) {}

  async list(): Promise<string[]> {
    this.listCalls++;
    return [...this.existing];
  }

  async create(name: string): Promise<void> {
    if (this.failCreate) {
      throw new Error(`cannot create snapshot '${name}'`);
    }
    if (this.existing.includes(name) || this.created.includes(name)) {
      throw new Error(`snapshot '${name}' already exists`);
    }
    this.created.push(name);
  }
}

export class FakeFetcher implements ContentFetcher {
  calls: Array<{ revision: string; destination: string }> = [];
  /** Errors thrown, in order, before downloads start succeeding */
  failures: unknown[] = [];

  constructor(private contents: Record<string, string | Buffer> = {}) {}

  async download(revision: string, destination: string): Promise<void> {
    this.calls.push({ revision, destination });
    if (this.failures.length > 0) {
      throw this.failures.shift();
    }
    const content = this.contents[revision] ?? `content of ${revision}`;
    await fsp.writeFile(destination, content);
  }
}

export function modify(
  path: string,
  timestamp: string,
  revision: string,
  extra: Partial<Pick<ModifyEvent, 'isDownloadable' | 'contentHash' | 'size'>> = {}
): ModifyEvent {
  return {
    type: 'modify',
    path,
    revision,
    timestamp: new Date(timestamp),
    isDownloadable: extra.isDownloadable ?? true,
    size: extra.size ?? null,
    contentHash: extra.contentHash ?? null,
  };
}

export function remove(path: string, timestamp: string): DeleteEvent {
  return { type: 'delete', path, revision: null, timestamp: new Date(timestamp), isDownloadable: false };
}

export function symlink(path: string, target: string, timestamp: string, revision: string): SymlinkEvent {
  return { type: 'symlink', path, target, revision, timestamp: new Date(timestamp), isDownloadable: false };
}

export function networkError(code: string): Error {
  return Object.assign(new Error(`socket hang up (${code})`), { code });
}
