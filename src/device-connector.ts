import type { DeviceRole } from './types.js';

export type NotificationListener = (data: Uint8Array) => void;

/**
 * A connected peripheral with its role's characteristics already resolved.
 * Only the characteristics listed in the role profile can be used.
 */
export interface DeviceLink {
  readonly role: DeviceRole;
  readonly id: string;
  readonly name: string;
  subscribe(characteristicUuid: string, listener: NotificationListener): Promise<void>;
  write(characteristicUuid: string, data: Uint8Array, withResponse: boolean): Promise<void>;
  onDisconnect(listener: (reason?: unknown) => void): void;
  disconnect(): Promise<void>;
}

/**
 * Finds a device by advertised name and returns a resolved link.
 *
 * Rejects with DeviceNotFoundError when nothing matches within the timeout and
 * ConnectionError when GATT setup fails after a match. Never retries.
 */
export interface DeviceConnector {
  discover(
    role: DeviceRole,
    nameSubstring: string,
    timeoutSeconds: number,
    signal?: AbortSignal
  ): Promise<DeviceLink>;
  shutdown(): Promise<void>;
}

export function matchesName(advertisedName: string | undefined, nameSubstring: string): boolean {
  if (!advertisedName) {
    return false;
  }
  return advertisedName.toLowerCase().includes(nameSubstring.toLowerCase());
}

export interface ScannedDevice {
  id: string;
  name: string | null;
  rssi: number;
}

// Advertised names worth pointing out in a scan listing
const LIKELY_NAMES = ['KICKR', 'CLICK', 'ZWIFT', 'WAHOO'];

export function sortScannedDevices(devices: ScannedDevice[]): ScannedDevice[] {
  return [...devices].sort((a, b) => {
    if (a.name && b.name) return a.name.localeCompare(b.name);
    if (a.name) return -1;
    if (b.name) return 1;
    return a.id.localeCompare(b.id);
  });
}

export function formatScannedDevice(device: ScannedDevice): string {
  const line = `${device.name ?? '(no name)'} [${device.id}] ${device.rssi} dBm`;
  const upper = device.name?.toUpperCase() ?? '';
  return LIKELY_NAMES.some(name => upper.includes(name)) ? `${line} (likely match)` : line;
}
