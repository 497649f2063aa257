import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

export const DEAD_LETTER_DIR = 'dead-letter';

export interface DeadLetterEntry {
  readonly id: string;
  readonly timestamp: number;
  readonly source: string | null;
  readonly content: string;
  readonly blob_path: string | null;
  /** Base64 of blob bytes that never reached the blob store. */
  readonly blob_base64?: string;
  readonly blob_extension?: string;
  readonly partition: string;
  readonly error: string;
  readonly abandoned_at: string;
}

function dayStamp(date: Date): string {
  const y = date.getUTCFullYear();
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  return `${y}${m}${d}`;
}

/**
 * Appends abandoned records to `<root>/dead-letter/<YYYYMMDD>.jsonl`.
 * Returns the file written.
 */
export async function writeDeadLetters(
  root: string,
  entries: readonly DeadLetterEntry[],
  now: Date = new Date(),
): Promise<string> {
  const dir = join(root, DEAD_LETTER_DIR);
  await mkdir(dir, { recursive: true });
  const file = join(dir, `${dayStamp(now)}.jsonl`);
  const lines = entries.map((entry) => JSON.stringify(entry)).join('\n');
  await appendFile(file, `${lines}\n`, 'utf-8');
  return file;
}
