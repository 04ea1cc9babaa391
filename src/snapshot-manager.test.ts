import { describe, it, expect, vi } from 'vitest';
import { SnapshotManager, ZfsSnapshotBackend } from './snapshot-manager.js';
import type { CommandRunner } from './snapshot-manager.js';
import { MemorySnapshotBackend, quietLogger } from '../tests/helpers.js';

describe('ZfsSnapshotBackend', () => {
  it('lists snapshot names of the data set', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(
      'tank/dropbox@dropbox_20210101_000000_000\ntank/dropbox@dropbox_20210102_120000_500\n'
    );
    const backend = new ZfsSnapshotBackend('tank/dropbox', run);

    await expect(backend.list()).resolves.toEqual(['dropbox_20210101_000000_000', 'dropbox_20210102_120000_500']);
    expect(run).toHaveBeenCalledWith('zfs', ['list', '-H', '-o', 'name', '-t', 'snapshot', 'tank/dropbox']);
  });

  it('returns no names for empty output', async () => {
    const backend = new ZfsSnapshotBackend('tank/dropbox', vi.fn<CommandRunner>().mockResolvedValue(''));
    await expect(backend.list()).resolves.toEqual([]);
  });

  it('creates snapshots as data-set@name', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue('');
    await new ZfsSnapshotBackend('tank/dropbox', run).create('dropbox_20210101_000000_000');

    expect(run).toHaveBeenCalledWith('zfs', ['snapshot', 'tank/dropbox@dropbox_20210101_000000_000']);
  });
});

describe('SnapshotManager', () => {
  it('knows only the snapshots that existed at load time', async () => {
    const backend = new MemorySnapshotBackend(['dropbox_20210101_000000_000']);
    const manager = new SnapshotManager(backend, 'dropbox', quietLogger());

    expect(manager.has('dropbox_20210101_000000_000')).toBe(false);
    await expect(manager.load()).resolves.toBe(1);
    expect(manager.has('dropbox_20210101_000000_000')).toBe(true);

    await manager.take(new Date('2021-01-02T00:00:00.000Z'));
    expect(manager.has('dropbox_20210102_000000_000')).toBe(false);
  });

  it('names snapshots from the timestamp with its prefix', async () => {
    const backend = new MemorySnapshotBackend();
    const manager = new SnapshotManager(backend, 'box', quietLogger());

    await expect(manager.take(new Date('2021-07-08T09:10:11.012Z'))).resolves.toBe('box_20210708_091011_012');
    expect(backend.created).toEqual(['box_20210708_091011_012']);
  });

  it('logs and swallows a failing snapshot command', async () => {
    const backend = new MemorySnapshotBackend();
    backend.failCreate = true;
    const logger = quietLogger();
    const manager = new SnapshotManager(backend, 'dropbox', logger);

    await expect(manager.take(new Date('2021-01-01T00:00:00.000Z'))).resolves.toBeNull();
    expect(logger.getCounts().error).toBe(1);
  });

  it('logs a snapshot name that is already taken', async () => {
    const backend = new MemorySnapshotBackend();
    const logger = quietLogger();
    const manager = new SnapshotManager(backend, 'dropbox', logger);
    const date = new Date('2021-01-01T00:00:00.000Z');

    await expect(manager.take(date)).resolves.toBe('dropbox_20210101_000000_000');
    await expect(manager.take(date)).resolves.toBeNull();
    expect(backend.created).toEqual(['dropbox_20210101_000000_000']);
    expect(logger.getCounts().error).toBe(1);
  });
});
