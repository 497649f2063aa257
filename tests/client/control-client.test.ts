import { describe, it, expect, vi } from 'vitest';
import { ControlApiError, ControlClient } from '../../src/client/control-client.js';

const BASE = 'http://chronicle.test:35011';

const NODE = {
  id: 'window_focus',
  name: 'WindowFocusSensor',
  description: 'Capture foreground window focus metadata',
  status: 'running',
  running: true,
  last_error: null,
  error_count: 0,
};

function fakeFetch(status: number, body: unknown) {
  return vi.fn<typeof fetch>(async () => new Response(JSON.stringify(body), { status }));
}

function clientWith(fetchImpl: typeof fetch): ControlClient {
  return new ControlClient({ baseUrl: `${BASE}/`, fetch: fetchImpl });
}

function callOf(mock: ReturnType<typeof fakeFetch>): { url: string; method: string | undefined; body: unknown } {
  const [input, init] = mock.mock.calls[0] ?? [];
  return { url: String(input), method: init?.method, body: init?.body };
}

// ─── sensors ────────────────────────────────────────────────

describe('ControlClient sensors', () => {
  it('lists sensors from /api/v1/sensors', async () => {
    const fetchMock = fakeFetch(200, [NODE]);

    expect(await clientWith(fetchMock).listSensors()).toEqual([NODE]);
    expect(callOf(fetchMock)).toEqual({ url: `${BASE}/api/v1/sensors`, method: 'GET', body: undefined });
  });

  it('sends an empty toggle body to flip, and enable to force', async () => {
    const result = { status_code: 200, message: 'sensor updated', error_stack: [], sensors: [NODE] };
    const flip = fakeFetch(200, result);
    const force = fakeFetch(200, result);

    await clientWith(flip).toggleSensor('my sensor');
    await clientWith(force).toggleSensor('a', false);

    expect(callOf(flip)).toEqual({ url: `${BASE}/api/v1/sensors/my%20sensor/toggle`, method: 'POST', body: '{}' });
    expect(callOf(force).body).toBe('{"enable":false}');
  });

  it('returns a failed action result as data', async () => {
    const refused = { status_code: 400, message: 'sensor registration failed', error_stack: ['nope'], sensors: [] };
    const fetchMock = fakeFetch(400, refused);

    expect(await clientWith(fetchMock).registerSensor('nope', { sensorId: 'n' })).toEqual(refused);
    expect(callOf(fetchMock).body).toBe('{"sensor_type":"nope","sensor_id":"n"}');
  });

  it('posts bulk actions', async () => {
    const fetchMock = fakeFetch(207, { status_code: 207, message: 'm', error_stack: ['x'], sensors: [] });
    await clientWith(fetchMock).bulkAction(['a', 'b'], true);

    expect(callOf(fetchMock).body).toBe('{"sensor_ids":["a","b"],"enable":true}');
  });
});

// ─── chronicle ──────────────────────────────────────────────

describe('ControlClient chronicle', () => {
  it('builds the query string from the given filters only', async () => {
    const fetchMock = fakeFetch(200, { data: [], pagination: { limit: 5, offset: 0, count: 0, total: 0 } });
    await clientWith(fetchMock).queryRecords({ from: 1700000000, source: 'note', limit: 5 });

    expect(callOf(fetchMock).url).toBe(`${BASE}/api/v1/chronicle?from=1700000000&source=note&limit=5`);
  });

  it('answers null for a missing record', async () => {
    expect(await clientWith(fakeFetch(404, { error: 'Record not found' })).getRecord('x')).toBeNull();
  });

  it('throws ControlApiError with the server message on other failures', async () => {
    const client = clientWith(fakeFetch(500, { error: 'disk full' }));

    await expect(client.getRecord('x')).rejects.toBeInstanceOf(ControlApiError);
    await expect(client.getRecord('x')).rejects.toThrow('API 500: disk full');
  });

  it('posts envelopes and reads the receipt', async () => {
    const fetchMock = fakeFetch(202, { status: 'accepted', count: 1, ids: ['r1'] });
    const receipt = await clientWith(fetchMock).append({ object_id: 'r1', source: 'note', content: 'hi' });

    expect(receipt.ids).toEqual(['r1']);
    expect(callOf(fetchMock).body).toBe('{"object_id":"r1","source":"note","content":"hi"}');
  });
});

// ─── transport ──────────────────────────────────────────────

describe('ControlClient transport', () => {
  it('accepts a degraded health answer', async () => {
    const health = { status: 'degraded', gate: 'stopped', pending: 0, sensors: { registered: 2, running: 0 } };
    expect(await clientWith(fakeFetch(503, health)).health()).toEqual(health);
  });

  it('wraps network failures with status 0', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });

    const err: unknown = await clientWith(fetchMock).listSensors().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ControlApiError);
    expect(err).toMatchObject({ status: 0, message: `Request to ${BASE}/api/v1/sensors failed: fetch failed` });
  });

  it('rejects a body of the wrong shape', async () => {
    await expect(clientWith(fakeFetch(200, { sensors: 'many' })).listSensors()).rejects.toThrow(
      'Unexpected response from GET /sensors',
    );
  });
});
