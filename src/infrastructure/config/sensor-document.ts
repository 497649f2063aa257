import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { Logger } from 'pino';
import { SensorConfigError, errorMessage } from '../../application/errors.js';
import { DEFAULT_SENSOR_DOCUMENT, parseSensorDocument } from '../../application/sensor-config.js';
import type { SensorDocument } from '../../application/sensor-config.js';

export const DEFAULT_SENSOR_CONFIG_PATH = 'data/sensor-config.json';

export interface SensorDocumentSource {
  readonly configPath?: string | undefined;
  readonly inlineConfig?: string | undefined;
  /** Written with the default sensor set when neither of the above is given. */
  readonly defaultPath?: string;
}

function parseJson(text: string, origin: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    throw new SensorConfigError(`Sensor configuration from ${origin} is not valid JSON: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/**
 * Resolves the sensor configuration document.
 *
 * Order: explicit file → inline JSON → default file (created on first run).
 */
export async function loadSensorDocument(source: SensorDocumentSource, log: Logger): Promise<SensorDocument> {
  if (source.configPath) {
    const path = resolve(source.configPath);
    log.info({ path }, 'Loading sensor configuration file');
    return parseSensorDocument(parseJson(await readFile(path, 'utf-8'), path));
  }

  if (source.inlineConfig) {
    log.info('Loading inline sensor configuration');
    return parseSensorDocument(parseJson(source.inlineConfig, 'SENSOR_CONFIG'));
  }

  const path = resolve(source.defaultPath ?? DEFAULT_SENSOR_CONFIG_PATH);
  if (!existsSync(path)) {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(DEFAULT_SENSOR_DOCUMENT, null, 2)}\n`, 'utf-8');
    log.info({ path }, 'Default sensor configuration written');
  }
  return parseSensorDocument(parseJson(await readFile(path, 'utf-8'), path));
}
