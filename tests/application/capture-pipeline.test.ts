import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ChronicleGate } from '../../src/application/chronicle-gate.js';
import { SensorManager, LIFECYCLE_SOURCE } from '../../src/application/sensor-manager.js';
import { SensorRegistry } from '../../src/application/sensor-registry.js';
import { WindowFocusSensor } from '../../src/infrastructure/sensors/index.js';
import { silentLog } from './helpers.js';

describe('window focus capture into the chronicle', () => {
  let root: string;
  let gate: ChronicleGate;
  let manager: SensorManager;

  afterEach(async () => {
    manager.stopAll();
    await gate.shutdown();
    rmSync(root, { recursive: true, force: true });
  });

  it('persists one focus sample with no blob', async () => {
    root = mkdtempSync(join(tmpdir(), 'chronicle-pipeline-'));
    gate = new ChronicleGate({ root, log: silentLog, flushIntervalMs: 20 });

    let reads = 0;
    const registry = new SensorRegistry().registerFactory(
      'window_focus',
      () =>
        new WindowFocusSensor({
          log: silentLog,
          probe: {
            read: () => {
              reads += 1;
              return { handle: '1', app_name: 'Editor', window_title: 'doc.txt' };
            },
          },
        }),
    );
    manager = new SensorManager({ registry, log: silentLog });
    manager.bindSink(async (envelopes) => {
      await gate.appendMany(envelopes);
    });

    manager.registerSensor('window_focus', { config: { capture_interval: 0.02 } });
    expect(manager.startSensor('window_focus')).toBe(true);
    // the same window on every tick yields one sample
    await vi.waitFor(() => expect(reads).toBeGreaterThanOrEqual(3));
    await gate.flush();

    const records = await gate.readBySource('window_focus');
    expect(records).toHaveLength(1);
    expect(records[0]?.blob_path).toBeNull();
    expect(records[0]?.content).toBe('{"app_name":"Editor","window_title":"doc.txt"}');

    const lifecycle = await gate.readBySource(LIFECYCLE_SOURCE);
    expect(lifecycle.map((r) => JSON.parse(r.content).event).sort()).toEqual(['sensor_registered', 'sensor_started']);
  });
});
