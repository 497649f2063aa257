import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { Database as SqliteDatabase } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { and, asc, eq, gte, inArray, lte } from 'drizzle-orm';
import type { Logger } from 'pino';
import type { ChronicleRecord } from '../../domain/index.js';
import * as schema from './schema.js';
import { chronicle, SCHEMA_SQL } from './schema.js';
import type { ChronicleRow, NewChronicleRow } from './schema.js';

export type PartitionDb = BetterSQLite3Database<typeof schema>;

export interface PartitionHandle {
  readonly path: string;
  readonly sqlite: SqliteDatabase;
  readonly db: PartitionDb;
}

/**
 * Opens the writer handle for a partition, creating the file and schema
 * on first use. WAL with synchronous=NORMAL: one writer, many readers.
 */
export function openWriterPartition(path: string): PartitionHandle {
  mkdirSync(dirname(path), { recursive: true });
  const sqlite = new Database(path);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('synchronous = NORMAL');
  sqlite.exec(SCHEMA_SQL);
  return { path, sqlite, db: drizzle(sqlite, { schema }) };
}

/**
 * Opens a short-lived reader handle. The file must already exist; readers
 * never create partitions.
 */
export function openReaderPartition(path: string): PartitionHandle {
  const sqlite = new Database(path, { fileMustExist: true });
  return { path, sqlite, db: drizzle(sqlite, { schema }) };
}

/** Runs `fn` against a reader handle and always closes it. */
export function withReader<T>(path: string, fn: (handle: PartitionHandle) => T): T {
  const handle = openReaderPartition(path);
  try {
    return fn(handle);
  } finally {
    handle.sqlite.close();
  }
}

/**
 * Inserts a group of rows in one transaction, one statement per record.
 * Duplicate ids are skipped. Returns the number of rows actually written.
 */
export function insertRecords(handle: PartitionHandle, rows: readonly NewChronicleRow[]): number {
  return handle.db.transaction((tx) => {
    let written = 0;
    for (const row of rows) {
      const result = tx
        .insert(chronicle)
        .values(row)
        .onConflictDoNothing({ target: chronicle.id })
        .run();
      written += result.changes;
    }
    return written;
  });
}

// Stays under SQLite's bound-parameter limit.
const ID_LOOKUP_CHUNK = 500;

/** The subset of `ids` already stored in this partition. */
export function findExistingIds(handle: PartitionHandle, ids: readonly string[]): Set<string> {
  const found = new Set<string>();
  for (let offset = 0; offset < ids.length; offset += ID_LOOKUP_CHUNK) {
    const chunk = ids.slice(offset, offset + ID_LOOKUP_CHUNK);
    const rows = handle.db.select({ id: chronicle.id }).from(chronicle).where(inArray(chronicle.id, chunk)).all();
    for (const row of rows) found.add(row.id);
  }
  return found;
}

export function toRecord(row: ChronicleRow): ChronicleRecord {
  return {
    id: row.id,
    timestamp: row.timestamp,
    source: row.source,
    content: row.content ?? '',
    blob_path: row.blob_path,
  };
}

export function findRecordById(handle: PartitionHandle, id: string): ChronicleRecord | null {
  const row = handle.db.select().from(chronicle).where(eq(chronicle.id, id)).get();
  return row ? toRecord(row) : null;
}

/** Records with start <= timestamp <= end, ascending. */
export function findRecordsInRange(
  handle: PartitionHandle,
  startSeconds: number,
  endSeconds: number,
): ChronicleRecord[] {
  return handle.db
    .select()
    .from(chronicle)
    .where(and(gte(chronicle.timestamp, startSeconds), lte(chronicle.timestamp, endSeconds)))
    .orderBy(asc(chronicle.timestamp), asc(chronicle.id))
    .all()
    .map(toRecord);
}

export function findRecordsBySource(handle: PartitionHandle, source: string): ChronicleRecord[] {
  return handle.db
    .select()
    .from(chronicle)
    .where(eq(chronicle.source, source))
    .orderBy(asc(chronicle.timestamp), asc(chronicle.id))
    .all()
    .map(toRecord);
}

/**
 * Writer handles, opened lazily and cached by path for the owner's lifetime.
 * Only the gate's writer loop touches these.
 */
export class PartitionCache {
  private readonly handles = new Map<string, PartitionHandle>();

  constructor(private readonly log: Logger) {}

  /** The open handle for `path`, without opening one. */
  peek(path: string): PartitionHandle | undefined {
    return this.handles.get(path);
  }

  get(path: string): PartitionHandle {
    const cached = this.handles.get(path);
    if (cached) return cached;

    const handle = openWriterPartition(path);
    this.handles.set(path, handle);
    this.log.debug({ partition: path }, 'Partition opened');
    return handle;
  }

  /** Drops a handle that failed, so the next attempt reopens the file. */
  evict(path: string): void {
    const handle = this.handles.get(path);
    if (!handle) return;
    this.handles.delete(path);
    try {
      handle.sqlite.close();
    } catch (err: unknown) {
      this.log.warn({ err, partition: path }, 'Failed to close evicted partition');
    }
  }

  get size(): number {
    return this.handles.size;
  }

  closeAll(): void {
    for (const path of [...this.handles.keys()]) {
      this.evict(path);
    }
  }
}
