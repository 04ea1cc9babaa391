/**
 * SQLite event log of remote file revisions
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { AppError } from './logger.js';
import { formatTimestamp, parseTimestamp } from './timestamps.js';
import type { FileEvent } from './types.js';

export interface FileEventRow {
  path: string | null;
  revision: string | null;
  type: string | null;
  timestamp: string | null;
  is_downloadable: number | null;
  is_deleted: number | null;
  size: number | null;
  content_hash: string | null;
  target: string | null;
}

export interface FileErrorRecord {
  path: string;
  message: string | null;
}

export class EventStore {
  private db: Database.Database;

  constructor(dbPath: string = './packrat.sqlite') {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initSchema();
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS file_events (
        path TEXT NOT NULL,
        revision TEXT,
        type TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        is_downloadable INTEGER NOT NULL,
        is_deleted INTEGER NOT NULL,
        size INTEGER,
        content_hash VARCHAR(64),
        target TEXT,
        PRIMARY KEY (path, revision)
      );

      CREATE INDEX IF NOT EXISTS ix_file_events_timestamp ON file_events(timestamp);

      -- deletes carry no revision, so they are keyed by their timestamp instead
      DELETE FROM file_events
      WHERE revision IS NULL
        AND rowid NOT IN (SELECT MIN(rowid) FROM file_events WHERE revision IS NULL GROUP BY path, timestamp);

      CREATE UNIQUE INDEX IF NOT EXISTS ux_file_events_key ON file_events(path, IFNULL(revision, timestamp));

      CREATE TABLE IF NOT EXISTS file_errors (
        path TEXT PRIMARY KEY,
        message TEXT
      );
    `);
  }

  /**
   * Append events; a (path, revision) pair already present is left untouched,
   * as is a delete of a path already recorded at the same timestamp
   */
  insertEvents(events: Iterable<FileEvent>): number {
    const stmt = this.db.prepare(`
      INSERT OR IGNORE INTO file_events
        (path, revision, type, timestamp, is_downloadable, is_deleted, size, content_hash, target)
      VALUES
        (@path, @revision, @type, @timestamp, @isDownloadable, @isDeleted, @size, @contentHash, @target)
    `);

    const insertAll = this.db.transaction((items: Iterable<FileEvent>) => {
      let inserted = 0;
      for (const event of items) {
        const result = stmt.run({
          path: event.path,
          revision: event.revision,
          type: event.type,
          timestamp: formatTimestamp(event.timestamp),
          isDownloadable: event.isDownloadable ? 1 : 0,
          isDeleted: event.type === 'delete' ? 1 : 0,
          size: event.type === 'modify' ? event.size : null,
          contentHash: event.type === 'modify' ? event.contentHash : null,
          target: event.type === 'symlink' ? event.target : null,
        });
        inserted += result.changes;
      }
      return inserted;
    });

    return insertAll(events);
  }

  recordError(path: string, message: string | null): void {
    this.db.prepare(`
      INSERT INTO file_errors (path, message) VALUES (?, ?)
      ON CONFLICT(path) DO UPDATE SET message = excluded.message
    `).run(path, message);
  }

  listErrors(): FileErrorRecord[] {
    return this.db.prepare<[], FileErrorRecord>('SELECT path, message FROM file_errors ORDER BY path').all();
  }

  countEvents(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM file_events').get();
    return row?.count ?? 0;
  }

  /**
   * All events, ascending by timestamp. Rows are decoded one at a time.
   */
  *iterateEvents(): Generator<FileEvent> {
    const stmt = this.db.prepare<[], FileEventRow>(`
      SELECT * FROM file_events
      ORDER BY timestamp ASC, path ASC, revision ASC
    `);

    for (const row of stmt.iterate()) {
      yield decodeRow(row);
    }
  }

  minTimestamp(): Date | null {
    const row = this.db
      .prepare<[], { minTimestamp: string | null }>('SELECT MIN(timestamp) as minTimestamp FROM file_events')
      .get();
    return row?.minTimestamp ? parseTimestamp(row.minTimestamp) : null;
  }

  /**
   * Paths whose earliest recorded event is a delete
   */
  *tombstonePaths(): Generator<string> {
    const stmt = this.db.prepare<[], { path: string }>(`
      SELECT path FROM (
        SELECT
          path,
          type,
          ROW_NUMBER() OVER (PARTITION BY path ORDER BY timestamp ASC, revision ASC) AS row_number
        FROM file_events
      )
      WHERE row_number = 1 AND type = 'delete'
      ORDER BY path
    `);

    for (const row of stmt.iterate()) {
      yield row.path;
    }
  }

  close(): void {
    this.db.close();
  }
}

export function decodeRow(row: FileEventRow): FileEvent {
  if (typeof row.path !== 'string' || row.path.length === 0) {
    throw new AppError('File event is missing "path"', 'MISSING_FIELD', { revision: row.revision });
  }
  if (row.timestamp === null) {
    throw new AppError(`File event "${row.path}" is missing "timestamp"`, 'MISSING_FIELD', { path: row.path });
  }

  const path = row.path;
  const timestamp = parseTimestamp(row.timestamp);
  const isDownloadable = row.is_downloadable === 1;

  switch (row.type) {
    case 'modify':
      if (row.revision === null) {
        throw new AppError(`Modify event "${path}" is missing "revision"`, 'MISSING_FIELD', { path });
      }
      return {
        type: 'modify',
        path,
        revision: row.revision,
        timestamp,
        isDownloadable,
        size: row.size,
        contentHash: row.content_hash,
      };
    case 'delete':
      return { type: 'delete', path, revision: null, timestamp, isDownloadable: false };
    case 'symlink':
      if (row.revision === null) {
        throw new AppError(`Symlink event "${path}" is missing "revision"`, 'MISSING_FIELD', { path });
      }
      if (row.target === null) {
        throw new AppError(`Symlink event "${path}" is missing "target"`, 'MISSING_FIELD', { path });
      }
      return { type: 'symlink', path, revision: row.revision, timestamp, isDownloadable, target: row.target };
    default:
      throw new AppError(`Unsupported file event type "${row.type}"`, 'UNSUPPORTED_EVENT', { path });
  }
}
