/**
 * Replays the event log onto the target tree, one snapshot per batch
 */

import pLimit from 'p-limit';
import { groupByDay } from './event-grouping.js';
import type { EventStore } from './event-store.js';
import { isEmptyDirectory, resolveTargetPath, setMtime, truncate } from './fs-ops.js';
import { AppError, Logger } from './logger.js';
import { BatchProgress } from './progress.js';
import type { SnapshotManager } from './snapshot-manager.js';
import type { ApplyOptions, FileEvent, ReplaySummary } from './types.js';

export const DEFAULT_CONCURRENCY = 4;

export type EventSource = Pick<EventStore, 'iterateEvents' | 'minTimestamp' | 'tombstonePaths'>;

export interface EventSink {
  apply(event: FileEvent, options: ApplyOptions): Promise<void>;
  /** Called once after every event of a batch applied cleanly */
  finishBatch(events: FileEvent[]): Promise<void>;
}

export interface ReplayEngineOptions {
  root: string;
  source: EventSource;
  applier: EventSink;
  snapshots: SnapshotManager;
  logger: Logger;
  concurrency?: number;
  showProgress?: boolean;
}

export class ReplayEngine {
  private root: string;
  private source: EventSource;
  private applier: EventSink;
  private snapshots: SnapshotManager;
  private logger: Logger;
  private concurrency: number;
  private showProgress: boolean;

  /** Cleared once the first batch after start-up has been snapshotted */
  private isFirstSnapshot = true;

  private summary: ReplaySummary = {
    bootstrapped: false,
    placeholders: 0,
    batchesApplied: 0,
    batchesSkipped: 0,
    eventsApplied: 0,
    snapshotsTaken: 0,
  };

  constructor(options: ReplayEngineOptions) {
    this.root = options.root;
    this.source = options.source;
    this.applier = options.applier;
    this.snapshots = options.snapshots;
    this.logger = options.logger;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.showProgress = options.showProgress ?? false;

    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new AppError(`Concurrency must be a positive integer, got ${this.concurrency}`, 'INVALID_CONFIG');
    }
  }

  get firstSnapshotPending(): boolean {
    return this.isFirstSnapshot;
  }

  getSummary(): ReplaySummary {
    return { ...this.summary };
  }

  /**
   * Full replay: existing snapshots are loaded, an empty tree is bootstrapped,
   * then every day of history is replayed in order. The first failure stops the run.
   */
  async run(): Promise<ReplaySummary> {
    await this.snapshots.load();

    if (await isEmptyDirectory(this.root)) {
      await this.bootstrap();
    } else {
      this.logger.info(`Target tree ${this.root} is not empty, skipping initial state`, undefined, 'ReplayEngine');
    }

    for (const batch of groupByDay(this.source.iterateEvents())) {
      this.logger.debug(`Replaying ${batch.day}`, { events: batch.events.length }, 'ReplayEngine');
      await this.replayBatch(batch.events);
    }

    this.logger.info('Replay complete', { ...this.summary }, 'ReplayEngine');
    return this.getSummary();
  }

  /**
   * Recreate paths whose history starts with a delete as empty placeholders,
   * dated to the earliest event, and snapshot that state.
   */
  async bootstrap(): Promise<number> {
    if (!(await isEmptyDirectory(this.root))) {
      throw new AppError(`Target tree ${this.root} must be empty before bootstrap`, 'TREE_NOT_EMPTY', {
        root: this.root,
      });
    }

    const minTimestamp = this.source.minTimestamp();
    if (minTimestamp === null) {
      this.logger.info('Event log is empty, nothing to bootstrap', undefined, 'ReplayEngine');
      return 0;
    }

    let placeholders = 0;
    for (const remotePath of this.source.tombstonePaths()) {
      const path = resolveTargetPath(this.root, remotePath);
      await truncate(path);
      await setMtime(path, minTimestamp, { updateParents: true, root: this.root });
      placeholders++;
    }

    this.logger.info(`Created ${placeholders} placeholders for the initial state`, undefined, 'ReplayEngine');

    if ((await this.snapshots.take(minTimestamp)) !== null) {
      this.summary.snapshotsTaken++;
    }
    this.summary.bootstrapped = true;
    this.summary.placeholders += placeholders;
    return placeholders;
  }

  /**
   * Apply time-ordered events as one snapshot unit. A path seen twice splits the
   * list at its second occurrence and both halves are replayed separately.
   */
  async replayBatch(events: FileEvent[]): Promise<void> {
    if (events.length === 0) return;

    const seen = new Set<string>();
    for (let i = 0; i < events.length; i++) {
      if (seen.has(events[i].path)) {
        await this.replayBatch(events.slice(0, i));
        await this.replayBatch(events.slice(i));
        return;
      }
      seen.add(events[i].path);
    }

    const first = events[0];
    const last = events[events.length - 1];
    const name = this.snapshots.nameFor(last.timestamp);

    if (this.snapshots.has(name)) {
      this.logger.info(`Skip existing snapshot "${name}"`, undefined, 'ReplayEngine');
      this.summary.batchesSkipped++;
      return;
    }

    this.logger.info(
      `Applying ${events.length} revisions from ${first.timestamp.toISOString()} to ${last.timestamp.toISOString()}`,
      undefined,
      'ReplayEngine'
    );

    await this.dispatch(events);

    if ((await this.snapshots.take(last.timestamp)) !== null) {
      this.summary.snapshotsTaken++;
    }
    this.isFirstSnapshot = false;
    this.summary.batchesApplied++;
    this.summary.eventsApplied += events.length;
  }

  /**
   * Every task runs to completion before the first failure is rethrown.
   * Directory pruning runs only once the whole pool has drained.
   */
  private async dispatch(events: FileEvent[]): Promise<void> {
    const limit = pLimit(this.concurrency);
    const options: ApplyOptions = { firstBatch: this.isFirstSnapshot };
    const progress = new BatchProgress({
      total: events.length,
      label: 'Applying',
      enabled: this.showProgress,
    });
    const failures: unknown[] = [];

    await Promise.all(
      events.map(event =>
        limit(async () => {
          try {
            await this.applier.apply(event, options);
            progress.increment();
          } catch (error) {
            failures.push(error);
          }
        })
      )
    );
    progress.complete();

    if (failures.length > 0) {
      if (failures.length > 1) {
        this.logger.error(`${failures.length} revisions failed in this batch`, undefined, 'ReplayEngine');
      }
      throw failures[0];
    }

    await this.applier.finishBatch(events);
  }
}
