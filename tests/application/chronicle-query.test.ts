import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ChronicleGate } from '../../src/application/chronicle-gate.js';
import { getRecord, listRecords } from '../../src/application/chronicle-query.js';
import { silentLog } from './helpers.js';

const base = Date.parse('2024-06-10T00:00:00Z') / 1000;

let root: string;
let gate: ChronicleGate;

beforeAll(async () => {
  root = mkdtempSync(join(tmpdir(), 'chronicle-query-'));
  gate = new ChronicleGate({ root, log: silentLog, flushIntervalMs: 20 });
  // ten records one second apart, sources alternating a/b
  await gate.appendMany(
    Array.from({ length: 10 }, (_, i) => ({
      object_id: `r${i}`,
      timestamp: base + i,
      source: i % 2 === 0 ? 'a' : 'b',
      content: `item ${i}`,
    })),
  );
  await gate.flush();
});

afterAll(async () => {
  await gate.shutdown();
  rmSync(root, { recursive: true, force: true });
});

// ─── listRecords ────────────────────────────────────────────

describe('listRecords', () => {
  it('reads by source alone with default paging', async () => {
    const page = await listRecords(gate, { source: 'a' });

    expect(page.data.map((r) => r.id)).toEqual(['r0', 'r2', 'r4', 'r6', 'r8']);
    expect(page.pagination).toEqual({ limit: 100, offset: 0, count: 5, total: 5 });
  });

  it('combines a range with a source filter and pages the result', async () => {
    const page = await listRecords(gate, { from: base, to: base + 9, source: 'b', limit: 2, offset: 1 });

    expect(page.data.map((r) => r.id)).toEqual(['r3', 'r5']);
    expect(page.pagination).toEqual({ limit: 2, offset: 1, count: 2, total: 5 });
  });

  it('closes an open-ended range at now', async () => {
    const page = await listRecords(gate, { from: base }, base + 4);
    expect(page.data.map((r) => r.id)).toEqual(['r0', 'r1', 'r2', 'r3', 'r4']);
  });

  it('clamps limit into [1, 1000] and offset at 0', async () => {
    const low = await listRecords(gate, { source: 'a', limit: 0, offset: -3 });
    expect(low.pagination).toEqual({ limit: 1, offset: 0, count: 1, total: 5 });

    const high = await listRecords(gate, { source: 'a', limit: 5000 });
    expect(high.pagination.limit).toBe(1000);
  });

  it('returns an empty page past the end', async () => {
    const page = await listRecords(gate, { source: 'a', offset: 10 });
    expect(page.data).toEqual([]);
    expect(page.pagination).toEqual({ limit: 100, offset: 10, count: 0, total: 5 });
  });
});

// ─── getRecord ──────────────────────────────────────────────

describe('getRecord', () => {
  it('returns the stored record', async () => {
    expect(await getRecord(gate, 'r7')).toEqual({
      id: 'r7',
      timestamp: base + 7,
      source: 'b',
      content: 'item 7',
      blob_path: null,
    });
  });

  it('returns null when not found', async () => {
    expect(await getRecord(gate, 'nope')).toBeNull();
  });
});
