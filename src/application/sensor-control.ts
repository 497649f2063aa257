import type { SensorNode } from '../domain/index.js';
import { errorMessage } from './errors.js';
import type { SensorManager } from './sensor-manager.js';

/** Outcome of a control operation, returned as data rather than thrown. */
export interface SensorActionResult {
  readonly status_code: number;
  readonly message: string;
  readonly error_stack: string[];
  readonly sensors: SensorNode[];
}

export interface RegisterSensorCommand {
  readonly sensor_type: string;
  readonly sensor_id?: string | undefined;
  readonly config?: unknown;
}

function notFound(sensorId: string): SensorActionResult {
  return {
    status_code: 404,
    message: `Sensor '${sensorId}' not found`,
    error_stack: ['sensor_not_found'],
    sensors: [],
  };
}

export function listSensors(manager: SensorManager): SensorNode[] {
  return manager.nodes();
}

/** 201 on success, 400 with the reason when the registry refuses. */
export function registerSensor(manager: SensorManager, command: RegisterSensorCommand): SensorActionResult {
  try {
    const entry = manager.registerSensor(command.sensor_type, {
      sensorId: command.sensor_id,
      config: command.config,
    });
    return {
      status_code: 201,
      message: 'sensor registered',
      error_stack: [],
      sensors: [manager.node(entry.sensorId)],
    };
  } catch (err: unknown) {
    return {
      status_code: 400,
      message: 'sensor registration failed',
      error_stack: [errorMessage(err)],
      sensors: [],
    };
  }
}

export function unregisterSensor(manager: SensorManager, sensorId: string): SensorActionResult {
  if (!manager.has(sensorId)) return notFound(sensorId);

  const before = manager.node(sensorId);
  manager.unregisterSensor(sensorId);
  return {
    status_code: 200,
    message: 'sensor unregistered',
    error_stack: [],
    sensors: [{ ...before, status: 'stopped', running: false }],
  };
}

/**
 * Starts or stops one sensor. Without `enable` the sensor flips.
 * A failed transition answers 500 with the node as it ended up.
 */
export function toggleSensor(manager: SensorManager, sensorId: string, enable?: boolean): SensorActionResult {
  if (!manager.has(sensorId)) return notFound(sensorId);

  const desired = enable ?? !manager.node(sensorId).running;
  const ok = manager.toggleSensor(sensorId, desired);
  const errors = ok ? [] : [desired ? 'start_failed' : 'stop_failed'];

  return {
    status_code: ok ? 200 : 500,
    message: ok ? 'sensor updated' : 'sensor update failed',
    error_stack: errors,
    sensors: [manager.node(sensorId)],
  };
}

/**
 * Applies one toggle to many sensors. Unknown ids and failed transitions
 * are collected into `error_stack` and answer 207; the rest still run.
 */
export function bulkAction(manager: SensorManager, sensorIds: readonly string[], enable?: boolean): SensorActionResult {
  if (sensorIds.length === 0) {
    return {
      status_code: 400,
      message: 'No sensors provided',
      error_stack: ['sensor_ids_empty'],
      sensors: [],
    };
  }

  const errors: string[] = [];
  const updated: SensorNode[] = [];
  for (const sensorId of sensorIds) {
    if (!manager.has(sensorId)) {
      errors.push(`sensor_not_found:${sensorId}`);
      continue;
    }
    const desired = enable ?? !manager.node(sensorId).running;
    if (!manager.toggleSensor(sensorId, desired)) {
      errors.push(`${desired ? 'start_failed' : 'stop_failed'}:${sensorId}`);
    }
    updated.push(manager.node(sensorId));
  }

  return {
    status_code: errors.length === 0 ? 200 : 207,
    message: errors.length === 0 ? 'sensors updated' : 'sensors updated with errors',
    error_stack: errors,
    sensors: updated,
  };
}
