/**
 * Core types for the revision replay
 */

export type FileEventType = 'modify' | 'delete' | 'symlink';

interface FileEventBase {
  /** Remote-rooted path, e.g. "/Photos/2019/img.jpg" */
  path: string;
  timestamp: Date;
  isDownloadable: boolean;
}

export interface ModifyEvent extends FileEventBase {
  type: 'modify';
  revision: string;
  size: number | null;
  /** Block-chained SHA-256 of the revision's bytes */
  contentHash: string | null;
}

export interface DeleteEvent extends FileEventBase {
  type: 'delete';
  revision: null;
}

export interface SymlinkEvent extends FileEventBase {
  type: 'symlink';
  revision: string;
  /** Remote-rooted path the link points at */
  target: string;
}

export type FileEvent = ModifyEvent | DeleteEvent | SymlinkEvent;

/**
 * Contiguous run of events sharing one calendar day
 */
export interface DayBatch {
  day: string;
  events: FileEvent[];
}

export interface ApplyOptions {
  /** True while replaying the first batch after start-up */
  firstBatch: boolean;
}

export interface ReplaySummary {
  bootstrapped: boolean;
  placeholders: number;
  batchesApplied: number;
  batchesSkipped: number;
  eventsApplied: number;
  snapshotsTaken: number;
}
