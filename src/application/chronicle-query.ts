import type { ChronicleRecord } from '../domain/index.js';
import type { ChronicleGate } from './chronicle-gate.js';

const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 1000;

export interface ListRecordsParams {
  /** Epoch seconds, inclusive. */
  from?: number;
  to?: number;
  source?: string;
  limit?: number;
  offset?: number;
}

export interface RecordPage {
  data: ChronicleRecord[];
  pagination: { limit: number; offset: number; count: number; total: number };
}

/**
 * Use case: list records by time range or by source.
 * A source filter combined with a range keeps only records matching both.
 * Without `from`, the range opens at the epoch; without `to`, at now.
 * Clamps limit to [1, 1000], defaults to 100.
 */
export async function listRecords(
  gate: ChronicleGate,
  params: ListRecordsParams,
  nowSeconds: number = Date.now() / 1000,
): Promise<RecordPage> {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);

  let records: ChronicleRecord[];
  if (params.from === undefined && params.to === undefined && params.source !== undefined) {
    records = await gate.readBySource(params.source);
  } else {
    const inRange = await gate.readByTimeRange(params.from ?? 0, params.to ?? nowSeconds);
    records = params.source === undefined ? inRange : inRange.filter((record) => record.source === params.source);
  }

  const data = records.slice(offset, offset + limit);
  return {
    data,
    pagination: { limit, offset, count: data.length, total: records.length },
  };
}

/**
 * Use case: fetch a single record by id.
 * Returns null if not found.
 */
export async function getRecord(gate: ChronicleGate, id: string): Promise<ChronicleRecord | null> {
  return gate.readById(id);
}
