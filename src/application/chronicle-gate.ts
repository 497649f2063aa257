import { EventEmitter } from 'node:events';
import { readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from 'pino';
import { partitionPathsInRange, resolvePartitionPath } from '../domain/index.js';
import type { ChronicleRecord } from '../domain/index.js';
import {
  BlobStore,
  PartitionCache,
  findExistingIds,
  findRecordById,
  findRecordsBySource,
  findRecordsInRange,
  insertRecords,
  withReader,
  writeDeadLetters,
} from '../infrastructure/storage/index.js';
import type { DeadLetterEntry, NewChronicleRow } from '../infrastructure/storage/index.js';
import { prepareEnvelope } from './envelope-schema.js';
import type { EnvelopeInput, PreparedEnvelope } from './envelope-schema.js';
import { GateClosedError, PartitionCommitError, errorMessage } from './errors.js';
import { WorkQueue } from './work-queue.js';

export type GateState = 'idle' | 'running' | 'stopped';

export interface AppendReceipt {
  readonly id: string;
  readonly timestamp: number;
}

export interface BatchSummary {
  readonly size: number;
  readonly written: number;
  readonly abandoned: number;
  /** Records skipped because their id is already stored or repeats earlier in the batch. */
  readonly duplicates: number;
  readonly partitions: readonly string[];
}

export interface PartitionFailure {
  readonly partition: string;
  readonly attempt: number;
  readonly count: number;
  readonly error: string;
}

export interface DeadLetterNotice {
  readonly partition: string;
  readonly count: number;
  readonly file: string;
}

export interface GateStats {
  readonly state: GateState;
  readonly pending: number;
  readonly batches: number;
  readonly written: number;
  readonly abandoned: number;
  readonly duplicates: number;
  readonly commitFailures: number;
  readonly openPartitions: number;
}

export type ChronicleGateEvents = {
  'batch:committed': [summary: BatchSummary];
  'partition:failed': [failure: PartitionFailure];
  'records:dead-lettered': [notice: DeadLetterNotice];
};

export interface ChronicleGateOptions {
  readonly root: string;
  readonly log: Logger;
  /** Most records committed in one writer cycle. */
  readonly maxBatchSize?: number;
  /** Accumulation window, measured from the first record of a batch. */
  readonly flushIntervalMs?: number;
  /** Bound on buffered records; `append` waits when full. */
  readonly maxQueueSize?: number;
  /** Commit attempts per partition group before dead-lettering. */
  readonly commitAttempts?: number;
  readonly retryDelayMs?: number;
  readonly now?: () => number;
}

export const GATE_DEFAULTS = {
  maxBatchSize: 200,
  flushIntervalMs: 2000,
  maxQueueSize: 10_000,
  commitAttempts: 3,
  retryDelayMs: 50,
} as const;

const YEAR_DIR_RE = /^\d{4}$/;
const PARTITION_FILE_RE = /^\d{6}\.db$/;

/**
 * The single write path into the chronicle.
 *
 * Producers call `append`/`appendMany`, which normalize the envelope and
 * enqueue it. One writer loop drains the queue in batches, groups each
 * batch by month partition and commits every group in one transaction.
 * A record is only marked done once its group committed or was
 * dead-lettered, so `flush()` means "durable or accounted for".
 *
 * Lifecycle: idle → running (first append) → stopped (shutdown). Appends
 * after shutdown throw `GateClosedError`.
 */
export class ChronicleGate extends EventEmitter<ChronicleGateEvents> {
  readonly root: string;
  private readonly log: Logger;
  private readonly blobs: BlobStore;
  private readonly partitions: PartitionCache;
  private readonly queue: WorkQueue<PreparedEnvelope>;
  private readonly abort = new AbortController();
  private readonly maxBatchSize: number;
  private readonly flushIntervalMs: number;
  private readonly commitAttempts: number;
  private readonly retryDelayMs: number;
  private readonly now: () => number;

  private gateState: GateState = 'idle';
  private writer: Promise<void> | null = null;
  private readonly appending = new Set<Promise<AppendReceipt[]>>();
  private readonly counters = { batches: 0, written: 0, abandoned: 0, duplicates: 0, commitFailures: 0 };

  constructor(options: ChronicleGateOptions) {
    super();
    this.root = resolve(options.root);
    this.log = options.log.child({ component: 'chronicle-gate' });
    this.blobs = new BlobStore(this.root);
    this.partitions = new PartitionCache(this.log);
    this.queue = new WorkQueue(options.maxQueueSize ?? GATE_DEFAULTS.maxQueueSize);
    this.maxBatchSize = Math.max(1, options.maxBatchSize ?? GATE_DEFAULTS.maxBatchSize);
    this.flushIntervalMs = Math.max(0, options.flushIntervalMs ?? GATE_DEFAULTS.flushIntervalMs);
    this.commitAttempts = Math.max(1, options.commitAttempts ?? GATE_DEFAULTS.commitAttempts);
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? GATE_DEFAULTS.retryDelayMs);
    this.now = options.now ?? Date.now;
  }

  get state(): GateState {
    return this.gateState;
  }

  /** Records waiting to be committed. */
  get pending(): number {
    return this.queue.pending;
  }

  /** Counters since construction. */
  stats(): GateStats {
    return {
      state: this.gateState,
      pending: this.queue.pending,
      ...this.counters,
      openPartitions: this.partitions.size,
    };
  }

  get blobStore(): BlobStore {
    return this.blobs;
  }

  async append(envelope: EnvelopeInput): Promise<AppendReceipt> {
    const [receipt] = await this.appendMany([envelope]);
    if (!receipt) throw new Error('append produced no receipt');
    return receipt;
  }

  /**
   * Normalizes every envelope before enqueueing any of them, so one bad
   * envelope rejects the whole call.
   */
  async appendMany(envelopes: readonly EnvelopeInput[]): Promise<AppendReceipt[]> {
    this.ensureWriter();
    const nowMs = this.now();
    const prepared = envelopes.map((envelope) => prepareEnvelope(envelope, nowMs));

    const enqueue = this.enqueue(prepared);
    this.appending.add(enqueue);
    try {
      return await enqueue;
    } finally {
      this.appending.delete(enqueue);
    }
  }

  private async enqueue(prepared: readonly PreparedEnvelope[]): Promise<AppendReceipt[]> {
    const receipts: AppendReceipt[] = [];
    for (const item of prepared) {
      await this.queue.put(item);
      receipts.push({ id: item.id, timestamp: item.timestamp });
    }
    return receipts;
  }

  /** Resolves once everything appended so far is committed or dead-lettered. */
  async flush(): Promise<void> {
    await this.queue.join();
  }

  /** Scans partitions oldest first; the first hit wins. */
  async readById(id: string): Promise<ChronicleRecord | null> {
    for (const path of await this.listPartitions()) {
      const record = withReader(path, (handle) => findRecordById(handle, id));
      if (record) return record;
    }
    return null;
  }

  /** Inclusive range in epoch seconds, ordered by timestamp. */
  async readByTimeRange(startSeconds: number, endSeconds: number): Promise<ChronicleRecord[]> {
    const existing = new Set(await this.listPartitions());
    const records: ChronicleRecord[] = [];
    for (const path of partitionPathsInRange(this.root, startSeconds, endSeconds)) {
      if (!existing.has(path)) continue;
      records.push(...withReader(path, (handle) => findRecordsInRange(handle, startSeconds, endSeconds)));
    }
    return records;
  }

  async readBySource(source: string): Promise<ChronicleRecord[]> {
    const records: ChronicleRecord[] = [];
    for (const path of await this.listPartitions()) {
      records.push(...withReader(path, (handle) => findRecordsBySource(handle, source)));
    }
    return records;
  }

  /** Absolute paths of every partition database, oldest month first. */
  async listPartitions(): Promise<string[]> {
    const years = (await readDirSafe(this.root)).filter((name) => YEAR_DIR_RE.test(name)).sort();
    const paths: string[] = [];
    for (const year of years) {
      const files = (await readDirSafe(join(this.root, year))).filter((name) => PARTITION_FILE_RE.test(name)).sort();
      for (const file of files) paths.push(join(this.root, year, file));
    }
    return paths;
  }

  /**
   * Waits for appends already admitted (including ones blocked on a full
   * queue), drains the queue, stops the writer and closes every partition
   * handle. Safe to call more than once.
   */
  async shutdown(): Promise<void> {
    if (this.gateState === 'stopped') {
      await this.writer;
      return;
    }
    const wasRunning = this.gateState === 'running';
    this.gateState = 'stopped';

    if (wasRunning) {
      await Promise.allSettled([...this.appending]);
      await this.queue.join();
      this.abort.abort();
      await this.writer;
    }
    this.partitions.closeAll();
    this.log.info('Chronicle gate stopped');
  }

  private ensureWriter(): void {
    if (this.gateState === 'running') return;
    if (this.gateState === 'stopped') throw new GateClosedError();

    this.gateState = 'running';
    this.writer = this.runWriter().catch((err: unknown) => {
      this.log.fatal({ err }, 'Chronicle writer loop crashed');
    });
    this.log.info({ root: this.root }, 'Chronicle writer started');
  }

  private async runWriter(): Promise<void> {
    const signal = this.abort.signal;

    for (;;) {
      const first = await this.queue.take(undefined, signal);
      if (first === null) return;

      const batch = [first];
      const startedAt = this.now();
      while (batch.length < this.maxBatchSize) {
        const remaining = this.flushIntervalMs - (this.now() - startedAt);
        const next = await this.queue.take(remaining, signal);
        if (next === null) break;
        batch.push(next);
      }

      try {
        await this.commitBatch(batch);
      } finally {
        this.queue.taskDone(batch.length);
      }
    }
  }

  private async commitBatch(batch: readonly PreparedEnvelope[]): Promise<void> {
    const seen = new Set<string>();
    const groups = new Map<string, PreparedEnvelope[]>();
    let duplicates = 0;
    for (const item of batch) {
      if (seen.has(item.id)) {
        duplicates += 1;
        continue;
      }
      seen.add(item.id);
      const path = resolvePartitionPath(this.root, item.timestamp);
      const group = groups.get(path);
      if (group) group.push(item);
      else groups.set(path, [item]);
    }

    let written = 0;
    let abandoned = 0;
    for (const [partition, items] of groups) {
      const outcome = await this.commitGroup(partition, items);
      written += outcome.written;
      abandoned += outcome.abandoned;
      duplicates += outcome.duplicates;
    }

    this.counters.batches += 1;
    this.counters.written += written;
    this.counters.abandoned += abandoned;
    this.counters.duplicates += duplicates;

    const summary: BatchSummary = {
      size: batch.length,
      written,
      abandoned,
      duplicates,
      partitions: [...groups.keys()],
    };
    this.log.debug(summary, 'Batch committed');
    this.emit('batch:committed', summary);
  }

  private async commitGroup(
    partition: string,
    items: readonly PreparedEnvelope[],
  ): Promise<{ written: number; abandoned: number; duplicates: number }> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.commitAttempts; attempt++) {
      try {
        // First write wins store-wide; a repeated id never touches the stored blob.
        const stored = await this.storedIds(items.map((item) => item.id));
        const fresh = items.filter((item) => !stored.has(item.id));
        const duplicates = items.length - fresh.length;
        if (fresh.length === 0) return { written: 0, abandoned: 0, duplicates };

        const rows = await this.toRows(fresh);
        const written = insertRecords(this.partitions.get(partition), rows);
        return { written, abandoned: 0, duplicates };
      } catch (err: unknown) {
        lastError = err;
        this.counters.commitFailures += 1;
        this.partitions.evict(partition);
        this.log.error({ err, partition, attempt, count: items.length }, 'Partition commit failed');
        this.emit('partition:failed', { partition, attempt, count: items.length, error: errorMessage(err) });
        if (attempt < this.commitAttempts) {
          await sleep(this.retryDelayMs * attempt);
        }
      }
    }

    await this.abandon(partition, items, new PartitionCommitError(partition, lastError));
    return { written: 0, abandoned: items.length, duplicates: 0 };
  }

  /** Ids from `ids` already committed to any partition. */
  private async storedIds(ids: readonly string[]): Promise<Set<string>> {
    const stored = new Set<string>();
    for (const path of await this.listPartitions()) {
      const open = this.partitions.peek(path);
      const found = open ? findExistingIds(open, ids) : withReader(path, (handle) => findExistingIds(handle, ids));
      for (const id of found) stored.add(id);
    }
    return stored;
  }

  /** Blob bytes reach disk before the owning row is built. */
  private async toRows(items: readonly PreparedEnvelope[]): Promise<NewChronicleRow[]> {
    const rows: NewChronicleRow[] = [];
    for (const item of items) {
      const blobPath = item.blobBytes
        ? await this.blobs.write(item.timestamp, item.id, item.blobBytes, item.blobExtension)
        : null;
      rows.push({
        id: item.id,
        timestamp: item.timestamp,
        source: item.source,
        content: item.content,
        blob_path: blobPath,
      });
    }
    return rows;
  }

  private async abandon(partition: string, items: readonly PreparedEnvelope[], error: PartitionCommitError): Promise<void> {
    const abandonedAt = new Date(this.now());
    const entries: DeadLetterEntry[] = items.map((item) => ({
      id: item.id,
      timestamp: item.timestamp,
      source: item.source,
      content: item.content,
      blob_path: null,
      ...(item.blobBytes ? { blob_base64: Buffer.from(item.blobBytes).toString('base64') } : {}),
      ...(item.blobExtension !== undefined ? { blob_extension: item.blobExtension } : {}),
      partition,
      error: error.message,
      abandoned_at: abandonedAt.toISOString(),
    }));

    try {
      const file = await writeDeadLetters(this.root, entries, abandonedAt);
      this.log.warn({ partition, count: items.length, file }, 'Records abandoned to dead-letter file');
      this.emit('records:dead-lettered', { partition, count: items.length, file });
    } catch (err: unknown) {
      this.log.fatal(
        { err, partition, ids: items.map((item) => item.id) },
        'Dead-letter write failed; records lost',
      );
    }
  }
}

async function readDirSafe(dir: string): Promise<string[]> {
  try {
    return await readdir(dir);
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) return [];
    throw err;
  }
}
