import { describe, it, expect, vi, afterEach } from 'vitest';
import type { NetworkInterfaceInfo } from 'node:os';
import {
  HeartbeatSensor,
  UNKNOWN_DEVICE,
  WindowFocusSensor,
  hardwareDeviceId,
  platformWindowProbe,
  registerBuiltinSensors,
  resolveDeviceId,
  xdotoolWindowProbe,
} from '../../src/infrastructure/sensors/index.js';
import type { ForegroundWindow, ForegroundWindowProbe } from '../../src/infrastructure/sensors/index.js';
import { SensorRegistry } from '../../src/application/sensor-registry.js';
import type { EventEnvelope } from '../../src/domain/index.js';
import { ManualClock, silentLog } from '../application/helpers.js';

function iface(mac: string, internal: boolean): NetworkInterfaceInfo {
  return { address: '10.0.0.2', netmask: '255.255.255.0', family: 'IPv4', mac, internal, cidr: '10.0.0.2/24' };
}

function probeOf(...windows: Array<ForegroundWindow | null>): ForegroundWindowProbe {
  let i = 0;
  return { read: () => windows[Math.min(i++, windows.length - 1)] ?? null };
}

// ─── device id ──────────────────────────────────────────────

describe('device id', () => {
  it('takes the first external interface with a real address', () => {
    const table = {
      lo: [iface('00:00:00:00:00:00', true)],
      docker0: [iface('00:00:00:00:00:00', false)],
      eth0: [iface('aa:bb:cc:dd:ee:0f', false)],
    };
    expect(hardwareDeviceId(table)).toBe('Node-AABBCCDDEE0F');
  });

  it('prefers an explicit id and trims it', () => {
    expect(resolveDeviceId('  desk-7 ', {})).toBe('desk-7');
  });

  it('falls back to the constant without hardware', () => {
    expect(resolveDeviceId(undefined, { lo: [iface('00:00:00:00:00:00', true)] })).toBe(UNKNOWN_DEVICE);
    expect(resolveDeviceId('', {})).toBe(UNKNOWN_DEVICE);
  });
});

// ─── window focus ───────────────────────────────────────────

describe('WindowFocusSensor', () => {
  const editor: ForegroundWindow = { handle: '1', app_name: 'Editor', window_title: 'doc.txt' };

  it('wraps the foreground window into an event envelope', () => {
    const clock = new ManualClock(Date.UTC(2024, 2, 5, 9, 0, 0));
    const sensor = new WindowFocusSensor({ log: silentLog, clock, probe: probeOf(editor) });
    expect(sensor.initialize({ device_id: 'desk-1' })).toBe(true);

    expect(sensor.capture()).toEqual([
      {
        kind: 'event',
        object_id: 'id-1',
        source: 'window_focus',
        content_format: 'text',
        content: { app_name: 'Editor', window_title: 'doc.txt' },
        create_time: Date.UTC(2024, 2, 5, 9, 0, 0) / 1000,
        device_id: 'desk-1',
        event_type: 'focus_change',
      },
    ]);
  });

  it('reports the same window once until focus moves', () => {
    const browser: ForegroundWindow = { handle: '2', app_name: 'Browser', window_title: 'Docs', url: 'https://example.test' };
    const sensor = new WindowFocusSensor({ log: silentLog, probe: probeOf(editor, editor, browser) });
    sensor.initialize({});

    expect(sensor.capture()).toHaveLength(1);
    expect(sensor.capture()).toEqual([]);
    expect(sensor.capture()[0]?.content).toEqual({ app_name: 'Browser', window_title: 'Docs', url: 'https://example.test' });
  });

  it('reports every sample when the probe has no handle', () => {
    const sensor = new WindowFocusSensor({ log: silentLog, probe: probeOf({ ...editor, handle: null }) });
    sensor.initialize({});

    expect(sensor.capture()).toHaveLength(1);
    expect(sensor.capture()).toHaveLength(1);
  });

  it('uses the stub probe when asked', () => {
    const sensor = new WindowFocusSensor({ log: silentLog });
    sensor.initialize({ stub: true });

    expect(sensor.capture()[0]?.content).toEqual({
      app_name: 'StubApp',
      window_title: 'Stub Window Title',
      process_id: 1234,
    });
  });

  it('counts a throwing probe and keeps going', () => {
    const probe: ForegroundWindowProbe = {
      read: () => {
        throw new Error('display gone');
      },
    };
    const sensor = new WindowFocusSensor({ log: silentLog, probe });
    sensor.initialize({});

    expect(sensor.capture()).toEqual([]);
    expect(sensor.capture()).toEqual([]);
    expect(sensor.health()).toEqual({ running: false, lastError: 'display gone', errorCount: 2 });
  });

  it('picks a platform probe only where one exists', () => {
    expect(platformWindowProbe('linux')).toBe(xdotoolWindowProbe);
    expect(platformWindowProbe('darwin')).toBeNull();
  });
});

// ─── heartbeat & sampling loop ──────────────────────────────

describe('HeartbeatSensor', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('reports process uptime rounded to seconds', () => {
    const sensor = new HeartbeatSensor({ log: silentLog, clock: new ManualClock(), uptime: () => 12.6 });
    sensor.initialize({ device_id: 'desk-1' });

    const [envelope] = sensor.capture();
    expect(envelope?.source).toBe('system_lifecycle');
    expect(envelope?.event_type).toBe('heartbeat');
    expect(envelope?.content).toEqual({ event: 'heartbeat', pid: process.pid, uptime_seconds: 13 });
  });

  it('delivers to the sink every capture_interval while running', async () => {
    vi.useFakeTimers();
    const sensor = new HeartbeatSensor({ log: silentLog, uptime: () => 1 });
    const delivered: EventEnvelope[][] = [];
    sensor.bindSink(async (envelopes) => {
      delivered.push([...envelopes]);
    });
    sensor.initialize({ capture_interval: 2 });

    expect(sensor.start()).toBe(true);
    expect(sensor.isRunning()).toBe(true);
    await vi.advanceTimersByTimeAsync(1999);
    expect(delivered).toHaveLength(0);
    await vi.advanceTimersByTimeAsync(1);
    expect(delivered).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(4000);
    expect(delivered).toHaveLength(3);

    expect(sensor.stop()).toBe(true);
    await vi.advanceTimersByTimeAsync(10_000);
    expect(delivered).toHaveLength(3);
  });

  it('counts a rejected delivery as an error', async () => {
    vi.useFakeTimers();
    const sensor = new HeartbeatSensor({ log: silentLog, uptime: () => 1 });
    sensor.bindSink(async () => {
      throw new Error('gate closed');
    });
    sensor.initialize({ capture_interval: 1 });
    sensor.start();

    await vi.advanceTimersByTimeAsync(1000);
    sensor.stop();
    expect(sensor.health()).toEqual({ running: false, lastError: 'gate closed', errorCount: 1 });
  });
});

describe('registerBuiltinSensors', () => {
  it('installs the window focus and heartbeat types', () => {
    const registry = registerBuiltinSensors(new SensorRegistry(), silentLog);
    expect(registry.factoryTypes()).toEqual(['system_lifecycle', 'window_focus']);

    const entry = registry.create('window_focus', { config: { stub: true } });
    expect(entry.adapter.name).toBe('WindowFocusSensor');
  });
});
