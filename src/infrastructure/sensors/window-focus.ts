import { execFileSync } from 'node:child_process';
import { readFileSync } from 'node:fs';
import type { Logger } from 'pino';
import type { EnvelopeClock, SensorConfig } from '../../domain/index.js';
import { BaseSensor } from './base-sensor.js';

export interface ForegroundWindow {
  /** Opaque window handle; null disables repeat suppression. */
  readonly handle: string | null;
  readonly app_name: string;
  readonly window_title: string;
  readonly url?: string | null;
  readonly process_id?: number | null;
}

export interface ForegroundWindowProbe {
  read(): ForegroundWindow | null;
}

export const stubWindowProbe: ForegroundWindowProbe = {
  read: () => ({
    handle: null,
    app_name: 'StubApp',
    window_title: 'Stub Window Title',
    url: null,
    process_id: 1234,
  }),
};

const XDOTOOL_TIMEOUT_MS = 500;

function xdotool(args: string[]): string {
  return execFileSync('xdotool', args, { encoding: 'utf-8', timeout: XDOTOOL_TIMEOUT_MS }).trim();
}

function processName(pid: number): string {
  try {
    return readFileSync(`/proc/${pid}/comm`, 'utf-8').trim() || String(pid);
  } catch {
    return String(pid);
  }
}

/** X11 foreground window through `xdotool`; the process name from /proc. */
export const xdotoolWindowProbe: ForegroundWindowProbe = {
  read: () => {
    const handle = xdotool(['getactivewindow']);
    if (handle === '') return null;
    const title = xdotool(['getwindowname', handle]);
    const pid = Number.parseInt(xdotool(['getwindowpid', handle]), 10);
    const known = Number.isInteger(pid) && pid > 0;
    return {
      handle,
      app_name: known ? processName(pid) : 'unknown',
      window_title: title,
      url: null,
      process_id: known ? pid : null,
    };
  },
};

export function platformWindowProbe(platform: NodeJS.Platform = process.platform): ForegroundWindowProbe | null {
  return platform === 'linux' ? xdotoolWindowProbe : null;
}

export interface WindowFocusSensorOptions {
  readonly log: Logger;
  readonly clock?: EnvelopeClock;
  /** Overrides the platform probe. */
  readonly probe?: ForegroundWindowProbe;
}

/**
 * Samples the foreground window and reports focus changes.
 * The same window seen twice in a row is reported once.
 */
export class WindowFocusSensor extends BaseSensor {
  private readonly injectedProbe: ForegroundWindowProbe | undefined;
  private probe: ForegroundWindowProbe | null = null;
  private lastHandle: string | null = null;

  constructor(options: WindowFocusSensorOptions) {
    super({
      name: 'WindowFocusSensor',
      description: 'Capture foreground window focus metadata',
      source: 'window_focus',
      eventType: 'focus_change',
      log: options.log,
      ...(options.clock ? { clock: options.clock } : {}),
    });
    this.injectedProbe = options.probe;
  }

  protected initSensor(config: SensorConfig): boolean {
    this.lastHandle = null;
    if (config['stub'] === true) {
      this.probe = stubWindowProbe;
      return true;
    }
    this.probe = this.injectedProbe ?? platformWindowProbe();
    if (!this.probe) {
      this.log.warn({ platform: process.platform }, 'No foreground window probe for this platform');
      return false;
    }
    return true;
  }

  protected collect(): unknown[] {
    const window = this.probe?.read() ?? null;
    if (!window) return [];
    if (window.handle !== null) {
      if (window.handle === this.lastHandle) return [];
      this.lastHandle = window.handle;
    }
    return [
      {
        app_name: window.app_name,
        window_title: window.window_title,
        ...(window.url != null ? { url: window.url } : {}),
        ...(window.process_id != null ? { process_id: window.process_id } : {}),
      },
    ];
  }
}
