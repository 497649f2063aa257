import { describe, it, expect } from 'vitest';
import { SensorRegistry, isPlainObject, normalizeSensorType } from '../../src/application/sensor-registry.js';
import { SensorNotFoundError, SensorRegistrationError } from '../../src/application/errors.js';
import { FakeSensor } from './helpers.js';

function registryWith(sensor = new FakeSensor()): SensorRegistry {
  return new SensorRegistry().registerFactory('Fake', () => sensor);
}

describe('normalizeSensorType', () => {
  it('trims and lowercases', () => {
    expect(normalizeSensorType('  Window_Focus ')).toBe('window_focus');
  });
});

describe('isPlainObject', () => {
  it('accepts object literals and null-prototype objects', () => {
    expect(isPlainObject({ a: 1 })).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
  });

  it('rejects arrays, null, primitives and class instances', () => {
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject('x')).toBe(false);
    expect(isPlainObject(new Date())).toBe(false);
  });
});

describe('SensorRegistry.create', () => {
  it('uses the normalized type as the default id', () => {
    const registry = registryWith();
    const entry = registry.create(' FAKE ');

    expect(entry.sensorId).toBe('fake');
    expect(entry.sensorType).toBe('fake');
    expect(registry.has('fake')).toBe(true);
  });

  it('layers the adapter config over the defaults at initialize', () => {
    const sensor = new FakeSensor();
    const registry = registryWith(sensor);
    const entry = registry.create('fake', {
      sensorId: 'f1',
      config: { capture_interval: 5 },
      defaults: { capture_interval: 1, device_id: 'dev-1' },
    });

    expect(sensor.initConfigs).toEqual([{ capture_interval: 5, device_id: 'dev-1' }]);
    expect(entry.config).toEqual({ capture_interval: 5 });
  });

  it('refuses an unknown type', () => {
    expect(() => registryWith().create('nope')).toThrow("Unknown sensor type 'nope'");
  });

  it('refuses an empty type', () => {
    expect(() => registryWith().create('   ')).toThrow(SensorRegistrationError);
  });

  it('refuses a config that is not an object', () => {
    expect(() => registryWith().create('fake', { config: [1, 2] })).toThrow(
      "Config for sensor type 'fake' must be an object",
    );
  });

  it('refuses a taken id', () => {
    const registry = new SensorRegistry().registerFactory('fake', () => new FakeSensor());
    registry.create('fake', { sensorId: 'one' });
    expect(() => registry.create('fake', { sensorId: 'one' })).toThrow("Sensor 'one' is already registered");
  });

  it('refuses an adapter whose initialize returns false', () => {
    const sensor = new FakeSensor();
    sensor.failInit = true;
    const registry = registryWith(sensor);

    expect(() => registry.create('fake')).toThrow("Sensor 'fake' failed to initialize");
    expect(registry.size).toBe(0);
  });

  it('wraps an initialize that throws', () => {
    const sensor = new FakeSensor();
    sensor.initialize = () => {
      throw new Error('no display');
    };
    expect(() => registryWith(sensor).create('fake')).toThrow("Sensor 'fake' failed to initialize: no display");
  });
});

describe('SensorRegistry lookups', () => {
  it('lists factory types sorted', () => {
    const registry = new SensorRegistry()
      .registerFactory('window_focus', () => new FakeSensor())
      .registerFactory('Clipboard_Update', () => new FakeSensor());

    expect(registry.factoryTypes()).toEqual(['clipboard_update', 'window_focus']);
    expect(registry.hasFactory('WINDOW_FOCUS')).toBe(true);
  });

  it('re-adding the same adapter under its id is allowed', () => {
    const sensor = new FakeSensor();
    const registry = new SensorRegistry();
    registry.add('s', 'fake', sensor);

    expect(() => registry.add('s', 'fake', sensor)).not.toThrow();
    expect(() => registry.add('s', 'fake', new FakeSensor())).toThrow(SensorRegistrationError);
  });

  it('remove returns the entry once, then null', () => {
    const registry = registryWith();
    registry.create('fake');

    expect(registry.remove('fake')?.sensorId).toBe('fake');
    expect(registry.remove('fake')).toBeNull();
    expect(registry.get('fake')).toBeNull();
  });

  it('require throws SensorNotFoundError for unknown ids', () => {
    expect(() => new SensorRegistry().require('ghost')).toThrow(SensorNotFoundError);
  });
});
