import { networkInterfaces } from 'node:os';

export const UNKNOWN_DEVICE = 'Unknown-Device';
const ZERO_MAC = '00:00:00:00:00:00';

type InterfaceTable = ReturnType<typeof networkInterfaces>;

/** `Node-<MAC>` from the first external interface with a real hardware address. */
export function hardwareDeviceId(interfaces: InterfaceTable = networkInterfaces()): string | null {
  for (const entries of Object.values(interfaces)) {
    for (const entry of entries ?? []) {
      if (entry.internal || entry.mac === ZERO_MAC) continue;
      return `Node-${entry.mac.replace(/:/g, '').toUpperCase()}`;
    }
  }
  return null;
}

/**
 * Explicit config value, then the hardware id, then a constant.
 * Sensors resolve this once, at initialize.
 */
export function resolveDeviceId(configured: unknown, interfaces?: InterfaceTable): string {
  if (typeof configured === 'string' && configured.trim() !== '') return configured.trim();
  try {
    return hardwareDeviceId(interfaces) ?? UNKNOWN_DEVICE;
  } catch {
    return UNKNOWN_DEVICE;
  }
}
