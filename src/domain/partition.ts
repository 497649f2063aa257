import { join, posix } from 'node:path';

/**
 * Partition and blob path resolution.
 *
 * Pure functions of (root, capture timestamp). One SQLite database per
 * UTC calendar month: `<root>/<YYYY>/<YYYY><MM>.db`. Blob sidecars live
 * under `<root>/<YYYY>/blobs/<MM-DD>/<object_id>.<ext>`, the id escaped
 * by `blobFileStem`.
 */

export const BLOB_DIR_NAME = 'blobs';
export const DEFAULT_BLOB_EXTENSION = 'bin';

export interface MonthKey {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
}

const pad2 = (n: number): string => String(n).padStart(2, '0');

/** First second of year 1000, the earliest four-digit partition year. */
export const EARLIEST_PARTITION_SECONDS = Date.UTC(1000, 0, 1) / 1000;
/** Last whole second of year 9999. */
export const LATEST_PARTITION_SECONDS = Date.UTC(10000, 0, 1) / 1000 - 1;

/** True when the timestamp falls in a month with a `<YYYY><MM>.db` partition. */
export function isPartitionable(timestampSeconds: number): boolean {
  return (
    Number.isFinite(timestampSeconds) &&
    timestampSeconds >= EARLIEST_PARTITION_SECONDS &&
    timestampSeconds < LATEST_PARTITION_SECONDS + 1
  );
}

export function monthKeyOf(timestampSeconds: number): MonthKey {
  const date = new Date(timestampSeconds * 1000);
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1 };
}

export function partitionFileName(key: MonthKey): string {
  return `${key.year}${pad2(key.month)}.db`;
}

export function partitionPathFor(root: string, key: MonthKey): string {
  return join(root, String(key.year), partitionFileName(key));
}

/** Resolves the partition database for a capture timestamp (seconds). */
export function resolvePartitionPath(root: string, timestampSeconds: number): string {
  return partitionPathFor(root, monthKeyOf(timestampSeconds));
}

/**
 * Every month whose range intersects [start, end], in calendar order.
 * Empty when start > end. The range is clipped to years 1000-9999.
 */
export function monthsInRange(startSeconds: number, endSeconds: number): MonthKey[] {
  if (Number.isNaN(startSeconds) || Number.isNaN(endSeconds) || startSeconds > endSeconds) return [];

  const from = Math.max(startSeconds, EARLIEST_PARTITION_SECONDS);
  const to = Math.min(endSeconds, LATEST_PARTITION_SECONDS);
  if (from > to) return [];

  const first = monthKeyOf(from);
  const last = monthKeyOf(to);
  const months: MonthKey[] = [];

  let { year, month } = first;
  while (year < last.year || (year === last.year && month <= last.month)) {
    months.push({ year, month });
    month += 1;
    if (month > 12) {
      month = 1;
      year += 1;
    }
  }
  return months;
}

export function partitionPathsInRange(root: string, startSeconds: number, endSeconds: number): string[] {
  return monthsInRange(startSeconds, endSeconds).map((key) => partitionPathFor(root, key));
}

/** Strips a leading dot and anything outside [A-Za-z0-9]; empty → `bin`. */
export function sanitizeExtension(extension: string | undefined): string {
  const cleaned = (extension ?? '').replace(/^\.+/, '').replace(/[^A-Za-z0-9]/g, '');
  return cleaned.length > 0 ? cleaned : DEFAULT_BLOB_EXTENSION;
}

const STEM_SAFE_RE = /^[A-Za-z0-9-]$/;

/**
 * File name stem for an object id. `[A-Za-z0-9-]` pass through; every
 * other UTF-8 byte becomes `_XX` (upper-case hex), so distinct ids never
 * share a stem and none can leave the day bucket.
 */
export function blobFileStem(objectId: string): string {
  let stem = '';
  for (const char of objectId) {
    if (STEM_SAFE_RE.test(char)) {
      stem += char;
      continue;
    }
    const code = char.codePointAt(0) ?? 0;
    if (code >= 0xd800 && code <= 0xdfff) {
      // lone surrogate, not encodable as UTF-8
      stem += `_u${code.toString(16).toUpperCase()}`;
      continue;
    }
    for (const byte of Buffer.from(char, 'utf-8')) {
      stem += `_${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }
  return stem;
}

export interface BlobLocation {
  /** Path relative to the store root, always `/`-separated. */
  readonly relativePath: string;
  readonly absolutePath: string;
}

export function resolveBlobPath(
  root: string,
  timestampSeconds: number,
  objectId: string,
  extension: string | undefined,
): BlobLocation {
  const date = new Date(timestampSeconds * 1000);
  const year = String(date.getUTCFullYear());
  const dayBucket = `${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
  const relativePath = posix.join(year, BLOB_DIR_NAME, dayBucket, `${blobFileStem(objectId)}.${sanitizeExtension(extension)}`);
  return { relativePath, absolutePath: join(root, ...relativePath.split('/')) };
}
