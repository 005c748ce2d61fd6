import type { DeviceRole } from './types.js';

/**
 * Invalid configuration values. Raised before any Bluetooth activity.
 */
export class ConfigurationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * No advertised device matched the configured name within the scan timeout.
 */
export class DeviceNotFoundError extends Error {
  constructor(
    public readonly role: DeviceRole,
    public readonly nameSubstring: string,
    timeoutSeconds: number
  ) {
    super(`No device matching '${nameSubstring}' found for ${role} within ${timeoutSeconds}s`);
    this.name = 'DeviceNotFoundError';
  }
}

/**
 * A device matched but GATT connect, discovery or subscription failed.
 */
export class ConnectionError extends Error {
  constructor(
    public readonly role: DeviceRole,
    message: string
  ) {
    super(`${role}: ${message}`);
    this.name = 'ConnectionError';
  }
}

export class NotificationDecodeError extends Error {
  constructor(
    message: string,
    public readonly payload: Uint8Array
  ) {
    super(message);
    this.name = 'NotificationDecodeError';
  }
}

export class TrainerWriteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TrainerWriteError';
  }
}
