/**
 * Applies a single file event to the target tree
 */

import type { ContentFetcher } from './content-fetcher.js';
import { contentHash, HASH_BLOCK_SIZE } from './content-hash.js';
import {
  ancestorsWithin,
  createSymlink,
  isDirectory,
  isEmptyDirectory,
  isFile,
  removeEmptyDirectory,
  removeEntry,
  resolveTargetPath,
  setMtime,
  truncate,
} from './fs-ops.js';
import { AppError, Logger } from './logger.js';
import { withRetry, type RetryPolicy } from './retry.js';
import type { ApplyOptions, DeleteEvent, FileEvent, ModifyEvent, SymlinkEvent } from './types.js';

export interface EventApplierOptions {
  root: string;
  fetcher: ContentFetcher;
  retryPolicy: RetryPolicy;
  logger: Logger;
  hashBlockSize?: number;
}

export class EventApplier {
  private root: string;
  private fetcher: ContentFetcher;
  private retryPolicy: RetryPolicy;
  private logger: Logger;
  private hashBlockSize: number;

  constructor(options: EventApplierOptions) {
    this.root = options.root;
    this.fetcher = options.fetcher;
    this.retryPolicy = options.retryPolicy;
    this.logger = options.logger;
    this.hashBlockSize = options.hashBlockSize ?? HASH_BLOCK_SIZE;
  }

  async apply(event: FileEvent, options: ApplyOptions): Promise<void> {
    switch (event.type) {
      case 'modify':
        return this.applyModify(event);
      case 'symlink':
        return this.applySymlink(event);
      case 'delete':
        return this.applyDelete(event, options);
      default: {
        const unknownEvent: never = event;
        throw new AppError(
          `Unsupported file event ${JSON.stringify(unknownEvent)}`,
          'UNSUPPORTED_EVENT'
        );
      }
    }
  }

  private async applyModify(event: ModifyEvent): Promise<void> {
    const path = resolveTargetPath(this.root, event.path);
    const isNewFile = !(await isFile(path));

    await truncate(path);

    if (event.isDownloadable) {
      this.logger.debug(`Download "${path}" at "${event.revision}"`, undefined, 'EventApplier');
      await withRetry(
        () => this.fetcher.download(event.revision, path),
        this.retryPolicy,
        this.logger,
        `download of ${event.path}`
      );

      if (event.contentHash !== null) {
        const actual = await contentHash(path, this.hashBlockSize);
        if (actual !== event.contentHash) {
          throw new AppError(`"${path}" hash mismatch`, 'HASH_MISMATCH', {
            path: event.path,
            revision: event.revision,
            expected: event.contentHash,
            actual,
          });
        }
      }
    }

    await setMtime(path, event.timestamp, { updateParents: isNewFile, root: this.root });
  }

  private async applySymlink(event: SymlinkEvent): Promise<void> {
    const path = resolveTargetPath(this.root, event.path);
    const target = resolveTargetPath(this.root, event.target);

    await truncate(path);
    await removeEntry(path);

    this.logger.debug(`Link "${path}" -> "${target}"`, undefined, 'EventApplier');
    await createSymlink(path, target);
  }

  private async applyDelete(event: DeleteEvent, options: ApplyOptions): Promise<void> {
    const path = resolveTargetPath(this.root, event.path);

    if (await removeEntry(path)) {
      this.logger.debug(`Delete "${path}"`, undefined, 'EventApplier');
    } else if (options.firstBatch) {
      this.logger.debug(`Already deleted "${path}"`, undefined, 'EventApplier');
    } else {
      this.logger.warn(`Cannot delete non-existent "${path}"`, undefined, 'EventApplier');
    }
  }

  /**
   * Prune directories emptied by the batch's deletes and date the ones left standing.
   * Runs once every event of the batch has been applied, so no other write shares a parent.
   */
  async finishBatch(events: FileEvent[]): Promise<void> {
    for (const event of events) {
      if (event.type !== 'delete') continue;

      const path = resolveTargetPath(this.root, event.path);
      for (const parent of ancestorsWithin(path, this.root)) {
        if (!(await isDirectory(parent))) continue;

        if ((await isEmptyDirectory(parent)) && (await removeEmptyDirectory(parent))) {
          this.logger.debug(`Delete empty directory "${parent}"`, undefined, 'EventApplier');
        } else {
          await setMtime(parent, latestChangeWithin(parent, event.timestamp, events, this.root));
        }
      }
    }
  }
}

/**
 * The delete's own time, or a later batch event beneath `dir` if there is one
 */
function latestChangeWithin(dir: string, since: Date, events: FileEvent[], root: string): Date {
  let latest = since;
  for (const other of events) {
    if (other.type === 'delete' || other.timestamp <= latest) continue;
    if (ancestorsWithin(resolveTargetPath(root, other.path), root).includes(dir)) {
      latest = other.timestamp;
    }
  }
  return latest;
}
