/**
 * Named copy-on-write snapshots of the target tree
 */

import { execFile } from 'child_process';
import type { Logger } from './logger.js';
import { snapshotName } from './timestamps.js';

export interface SnapshotBackend {
  list(): Promise<string[]>;
  create(name: string): Promise<void>;
}

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export const execFileRunner: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { encoding: 'utf-8', maxBuffer: 64 * 1024 * 1024 }, (error, stdout) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(stdout);
    });
  });

export class ZfsSnapshotBackend implements SnapshotBackend {
  constructor(
    private dataSet: string,
    private run: CommandRunner = execFileRunner
  ) {}

  async list(): Promise<string[]> {
    const output = await this.run('zfs', ['list', '-H', '-o', 'name', '-t', 'snapshot', this.dataSet]);
    return output
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0)
      .map(line => line.slice(line.lastIndexOf('@') + 1));
  }

  async create(name: string): Promise<void> {
    await this.run('zfs', ['snapshot', `${this.dataSet}@${name}`]);
  }
}

export class SnapshotManager {
  private known = new Set<string>();

  constructor(
    private backend: SnapshotBackend,
    private prefix: string,
    private logger: Logger
  ) {}

  /**
   * Fetch the names that already exist; called once before replay.
   * Snapshots taken afterwards are not added: only pre-existing ones mark a batch as done.
   */
  async load(): Promise<number> {
    this.known = new Set(await this.backend.list());
    this.logger.info(`Found ${this.known.size} existing snapshots`, undefined, 'SnapshotManager');
    return this.known.size;
  }

  nameFor(date: Date): string {
    return snapshotName(this.prefix, date);
  }

  has(name: string): boolean {
    return this.known.has(name);
  }

  /**
   * Best effort: a failing snapshot command is logged, not thrown
   */
  async take(date: Date): Promise<string | null> {
    const name = this.nameFor(date);
    this.logger.debug(`Create snapshot "${name}"`, undefined, 'SnapshotManager');

    try {
      await this.backend.create(name);
    } catch (error) {
      this.logger.error(
        `Snapshot "${name}" failed`,
        error instanceof Error ? error : new Error(String(error)),
        'SnapshotManager'
      );
      return null;
    }
    return name;
  }
}
