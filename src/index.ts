export { ConfigManager, DEFAULT_CONFIG } from './config.js';
export type { AppConfig } from './config.js';
export { DropboxContentFetcher } from './content-fetcher.js';
export type { ContentFetcher, DownloadClient } from './content-fetcher.js';
export { contentHash, contentHashOfBuffer, HASH_BLOCK_SIZE } from './content-hash.js';
export { EventApplier } from './event-applier.js';
export type { EventApplierOptions } from './event-applier.js';
export { groupByDay } from './event-grouping.js';
export { EventStore } from './event-store.js';
export type { FileErrorRecord } from './event-store.js';
export { AppError, Logger } from './logger.js';
export type { ErrorCode, LogLevel } from './logger.js';
export { DEFAULT_CONCURRENCY, ReplayEngine } from './replay-engine.js';
export type { EventSink, EventSource, ReplayEngineOptions } from './replay-engine.js';
export { defaultRetryPolicy, isTransientNetworkError, withRetry } from './retry.js';
export type { RetryPolicy } from './retry.js';
export { SnapshotManager, ZfsSnapshotBackend } from './snapshot-manager.js';
export type { CommandRunner, SnapshotBackend } from './snapshot-manager.js';
export { dayKey, parseTimestamp, snapshotName } from './timestamps.js';
export type * from './types.js';
