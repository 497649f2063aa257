import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { ChronicleGate } from '../../src/application/chronicle-gate.js';
import { SensorEventHub } from '../../src/application/sensor-event-hub.js';
import { runtimePlugin } from '../../src/infrastructure/runtime/index.js';
import { chronicleRoutes, healthRoutes, sensorRoutes } from '../../src/interfaces/http/index.js';
import { makeManager, sensorOf, silentLog } from '../application/helpers.js';
import type { ManagerFixture } from '../application/helpers.js';

const T = Date.parse('2024-06-10T12:00:00Z') / 1000;

let root: string;
let gate: ChronicleGate;
let fx: ManagerFixture;
let app: FastifyInstance;

beforeEach(async () => {
  root = mkdtempSync(join(tmpdir(), 'chronicle-routes-'));
  gate = new ChronicleGate({ root, log: silentLog, flushIntervalMs: 20 });
  fx = makeManager();
  fx.manager.registerSensor('fake', { sensorId: 'a' });

  app = Fastify();
  await app.register(runtimePlugin, { gate, manager: fx.manager, hub: new SensorEventHub() });
  await app.register(healthRoutes);
  await app.register(sensorRoutes);
  await app.register(chronicleRoutes);
  await app.ready();
});

afterEach(async () => {
  await app.close();
  rmSync(root, { recursive: true, force: true });
});

// ─── health ─────────────────────────────────────────────────

describe('GET /api/v1/health', () => {
  it('reports the gate and sensor counts', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: 'ok',
      gate: 'idle',
      pending: 0,
      sensors: { registered: 1, running: 0 },
    });
  });

  it('answers 503 degraded once the gate is stopped', async () => {
    await gate.shutdown();
    const res = await app.inject({ method: 'GET', url: '/api/v1/health' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual(expect.objectContaining({ status: 'degraded', gate: 'stopped' }));
  });
});

// ─── sensors ────────────────────────────────────────────────

describe('sensor routes', () => {
  it('lists sensor nodes', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/sensors' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual([
      {
        id: 'a',
        name: 'FakeSensor',
        description: 'Test double',
        status: 'stopped',
        running: false,
        last_error: null,
        error_count: 0,
      },
    ]);
  });

  it('registers a sensor', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/sensors',
      payload: { sensor_type: 'fake', sensor_id: 'b', config: { capture_interval: 2 } },
    });

    expect(res.statusCode).toBe(201);
    expect(res.json().sensors[0].id).toBe('b');
    expect(sensorOf(fx, 'b').initConfigs).toEqual([{ capture_interval: 2 }]);
  });

  it('answers 400 for an unknown type and for a malformed body', async () => {
    const unknown = await app.inject({ method: 'POST', url: '/api/v1/sensors', payload: { sensor_type: 'nope' } });
    expect(unknown.statusCode).toBe(400);
    expect(unknown.json().error_stack).toEqual(["Unknown sensor type 'nope'"]);

    const malformed = await app.inject({ method: 'POST', url: '/api/v1/sensors', payload: { sensor_type: '' } });
    expect(malformed.statusCode).toBe(400);
    expect(malformed.json().error).toBe('Validation failed');
  });

  it('toggles without a body and forces with enable', async () => {
    const flipped = await app.inject({ method: 'POST', url: '/api/v1/sensors/a/toggle' });
    expect(flipped.statusCode).toBe(200);
    expect(flipped.json().sensors[0].running).toBe(true);

    const forced = await app.inject({ method: 'POST', url: '/api/v1/sensors/a/toggle', payload: { enable: false } });
    expect(forced.statusCode).toBe(200);
    expect(fx.manager.node('a').running).toBe(false);

    const invalid = await app.inject({ method: 'POST', url: '/api/v1/sensors/a/toggle', payload: { enable: 'yes' } });
    expect(invalid.statusCode).toBe(400);
  });

  it('answers 500 when a start fails', async () => {
    sensorOf(fx, 'a').failStart = true;
    const res = await app.inject({ method: 'POST', url: '/api/v1/sensors/a/toggle', payload: { enable: true } });

    expect(res.statusCode).toBe(500);
    expect(res.json().error_stack).toEqual(['start_failed']);
  });

  it('answers 404 for unknown sensor ids', async () => {
    const toggle = await app.inject({ method: 'POST', url: '/api/v1/sensors/ghost/toggle', payload: {} });
    const remove = await app.inject({ method: 'DELETE', url: '/api/v1/sensors/ghost' });

    expect(toggle.statusCode).toBe(404);
    expect(remove.statusCode).toBe(404);
    expect(remove.json().message).toBe("Sensor 'ghost' not found");
  });

  it('unregisters a sensor', async () => {
    const res = await app.inject({ method: 'DELETE', url: '/api/v1/sensors/a' });

    expect(res.statusCode).toBe(200);
    expect(fx.manager.has('a')).toBe(false);
  });

  it('answers 207 for a partly failed bulk action', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/sensors/bulk',
      payload: { sensor_ids: ['a', 'ghost'], enable: true },
    });

    expect(res.statusCode).toBe(207);
    expect(res.json().error_stack).toEqual(['sensor_not_found:ghost']);
    expect(fx.manager.node('a').running).toBe(true);
  });

  it('answers 400 for an empty bulk action', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/v1/sensors/bulk', payload: { sensor_ids: [] } });

    expect(res.statusCode).toBe(400);
    expect(res.json().error_stack).toEqual(['sensor_ids_empty']);
  });
});

// ─── chronicle ──────────────────────────────────────────────

describe('chronicle routes', () => {
  it('accepts one envelope and serves it back by id', async () => {
    const post = await app.inject({
      method: 'POST',
      url: '/api/v1/chronicle',
      payload: { object_id: 'r1', timestamp: T, source: 'note', content: 'hi' },
    });
    expect(post.statusCode).toBe(202);
    expect(post.json()).toEqual({ status: 'accepted', count: 1, ids: ['r1'] });

    await gate.flush();
    const get = await app.inject({ method: 'GET', url: '/api/v1/chronicle/r1' });
    expect(get.statusCode).toBe(200);
    expect(get.json()).toEqual({ id: 'r1', timestamp: T, source: 'note', content: 'hi', blob_path: null });
  });

  it('stores base64 blobs beside the record', async () => {
    const post = await app.inject({
      method: 'POST',
      url: '/api/v1/chronicle',
      payload: [{ object_id: 'img', timestamp: T, source: 'desktop_snapshot', blob_base64: 'AAEC', blob_ext: 'png' }],
    });
    expect(post.statusCode).toBe(202);

    await gate.flush();
    const record = await gate.readById('img');
    expect(record?.blob_path).toBe('2024/blobs/06-10/img.png');
    expect(await gate.blobStore.read('2024/blobs/06-10/img.png')).toEqual(Buffer.from([0, 1, 2]));
  });

  it('rejects an empty batch and bad base64', async () => {
    const empty = await app.inject({ method: 'POST', url: '/api/v1/chronicle', payload: [] });
    const badBlob = await app.inject({
      method: 'POST',
      url: '/api/v1/chronicle',
      payload: { source: 's', blob_base64: '###' },
    });

    expect(empty.statusCode).toBe(400);
    expect(badBlob.statusCode).toBe(400);
  });

  it('answers 503 when the gate is stopped', async () => {
    await gate.shutdown();
    const res = await app.inject({ method: 'POST', url: '/api/v1/chronicle', payload: { source: 's' } });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ error: 'Chronicle gate has been shut down' });
  });

  it('lists by range and by source', async () => {
    await gate.appendMany([
      { object_id: 'x1', timestamp: T, source: 'note' },
      { object_id: 'x2', timestamp: T + 10, source: 'other' },
    ]);
    await gate.flush();

    const bySource = await app.inject({ method: 'GET', url: '/api/v1/chronicle?source=note' });
    expect(bySource.json().data.map((r: { id: string }) => r.id)).toEqual(['x1']);

    const byRange = await app.inject({
      method: 'GET',
      url: '/api/v1/chronicle?from=2024-06-10T12:00:00Z&to=2024-06-10T12:00:10Z',
    });
    expect(byRange.statusCode).toBe(200);
    expect(byRange.json().pagination).toEqual({ limit: 100, offset: 0, count: 2, total: 2 });
  });

  it('validates list parameters', async () => {
    const cases: Array<[string, string]> = [
      ['/api/v1/chronicle', 'Provide from/to or source'],
      ['/api/v1/chronicle?source=a&limit=abc', 'limit must be an integer'],
      ['/api/v1/chronicle?source=a&offset=1.5', 'offset must be an integer'],
      ['/api/v1/chronicle?from=yesterday', 'from must be epoch seconds or an ISO-8601 timestamp'],
      ['/api/v1/chronicle?from=20&to=10', 'from must not be after to'],
    ];
    for (const [url, error] of cases) {
      const res = await app.inject({ method: 'GET', url });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error });
    }
  });

  it('answers 404 for an unknown record', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/chronicle/missing' });
    expect(res.statusCode).toBe(404);
  });

  it('exposes gate counters', async () => {
    await gate.append({ source: 's', timestamp: T });
    await gate.flush();

    const res = await app.inject({ method: 'GET', url: '/api/v1/chronicle/stats' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(expect.objectContaining({ state: 'running', written: 1, abandoned: 0 }));
  });
});
