import noble, { type Characteristic, type Peripheral } from '@stoprocent/noble';
import { ROLE_PROFILES } from './constants.js';
import { translateBluetoothError } from './bluetooth-errors.js';
import type { DeviceConnector, DeviceLink, NotificationListener, ScannedDevice } from './device-connector.js';
import { matchesName, sortScannedDevices } from './device-connector.js';
import { ConnectionError, DeviceNotFoundError } from './errors.js';
import { Logger } from './logger.js';
import type { DeviceRole } from './types.js';
import { delay, describeError, expandUuidVariants, uuidMatches, withTimeout } from './utils.js';

const POWER_ON_TIMEOUT_MS = 15000;
const GATT_TIMEOUT_MS = 10000;
const DISCONNECT_TIMEOUT_MS = 5000;

const ADAPTER_TIMEOUT_MESSAGE = 'Bluetooth adapter timeout - check if Bluetooth is enabled';

/**
 * Noble BLE link
 *
 * Wraps one connected peripheral and the characteristics resolved for its
 * role. Disconnect listeners only fire for link loss, not for our own
 * disconnect(). Either way the link is released exactly once, which frees
 * the peripheral for the next discovery.
 */
class NobleDeviceLink implements DeviceLink {
  private readonly logger: Logger;
  private readonly disconnectListeners: Array<(reason?: unknown) => void> = [];
  private closing = false;

  constructor(
    readonly role: DeviceRole,
    private readonly peripheral: Peripheral,
    private readonly characteristics: Characteristic[],
    private readonly onRelease: (link: NobleDeviceLink) => void
  ) {
    this.logger = new Logger(`Noble:${role}`);
    this.peripheral.once('disconnect', (reason: unknown) => this.handleLinkLoss(reason));
  }

  get id(): string {
    return this.peripheral.id;
  }

  get name(): string {
    return this.peripheral.advertisement.localName || this.peripheral.id;
  }

  private resolve(characteristicUuid: string): Characteristic {
    const characteristic = this.characteristics.find(c => uuidMatches(c.uuid, characteristicUuid));
    if (!characteristic) {
      throw new Error(`Characteristic ${characteristicUuid} not resolved for ${this.role}`);
    }
    return characteristic;
  }

  async subscribe(characteristicUuid: string, listener: NotificationListener): Promise<void> {
    const characteristic = this.resolve(characteristicUuid);
    characteristic.on('data', (data: Buffer) => {
      listener(new Uint8Array(data));
    });
    await withTimeout(
      characteristic.subscribeAsync(),
      GATT_TIMEOUT_MS,
      `Notification subscription timeout for ${characteristicUuid}`
    );
    this.logger.debug(`Subscribed to ${characteristicUuid}`);
  }

  async write(characteristicUuid: string, data: Uint8Array, withResponse: boolean): Promise<void> {
    const characteristic = this.resolve(characteristicUuid);
    await characteristic.writeAsync(Buffer.from(data), !withResponse);
  }

  onDisconnect(listener: (reason?: unknown) => void): void {
    this.disconnectListeners.push(listener);
  }

  private handleLinkLoss(reason: unknown): void {
    if (this.closing) {
      return;
    }
    this.closing = true;
    this.release();
    this.logger.debug(`Link to ${this.name} dropped${reason === undefined ? '' : `: ${translateBluetoothError(reason)}`}`);

    const listeners = this.disconnectListeners.splice(0);
    for (const listener of listeners) {
      listener(reason);
    }
  }

  private release(): void {
    for (const characteristic of this.characteristics) {
      characteristic.removeAllListeners('data');
    }
    this.peripheral.removeAllListeners('disconnect');
    this.onRelease(this);
  }

  async disconnect(): Promise<void> {
    if (this.closing) {
      return;
    }
    this.closing = true;
    this.disconnectListeners.length = 0;

    for (const characteristic of this.characteristics) {
      characteristic.removeAllListeners('data');
    }

    const disconnectStart = Date.now();
    try {
      await withTimeout(this.peripheral.disconnectAsync(), DISCONNECT_TIMEOUT_MS, 'Disconnect timeout');
      this.logger.info(`Disconnected from ${this.name} in ${Date.now() - disconnectStart}ms`);
    } catch (error) {
      this.logger.warn(`Disconnect from ${this.name} did not complete: ${translateBluetoothError(error)}`);
    } finally {
      this.release();
    }
  }
}

/**
 * Noble device connector
 *
 * One adapter, one scanner: discoveries run one at a time. A peripheral that
 * is already claimed by another role is skipped, so two controllers sharing
 * an advertised name resolve to two different devices.
 */
export class NobleConnector implements DeviceConnector {
  private readonly logger = new Logger('Noble');
  private readonly claimedIds = new Set<string>();
  private readonly links = new Set<NobleDeviceLink>();
  private scanChain: Promise<void> = Promise.resolve();
  private findDeviceCleanup: (() => void) | null = null;

  discover(
    role: DeviceRole,
    nameSubstring: string,
    timeoutSeconds: number,
    signal?: AbortSignal
  ): Promise<DeviceLink> {
    return this.serialize(() => this.discoverNow(role, nameSubstring, timeoutSeconds, signal));
  }

  /**
   * Every advertising peripheral seen within durationSeconds, one entry per
   * device, named devices first.
   */
  scan(durationSeconds: number): Promise<ScannedDevice[]> {
    return this.serialize(() => this.scanNow(durationSeconds));
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.scanChain.then(task);
    this.scanChain = run.then(() => undefined, () => undefined);
    return run;
  }

  private async waitForPoweredOn(timeoutError: () => Error): Promise<void> {
    if (noble.state === 'poweredOn') {
      return;
    }
    this.logger.info(`State: ${noble.state}, waiting for power on...`);

    await new Promise<void>((resolve, reject) => {
      const onStateChange = (state: string) => {
        if (state === 'poweredOn') {
          clearTimeout(timeout);
          noble.removeListener('stateChange', onStateChange);
          resolve();
        }
      };
      const timeout = setTimeout(() => {
        noble.removeListener('stateChange', onStateChange);
        reject(timeoutError());
      }, POWER_ON_TIMEOUT_MS);
      noble.on('stateChange', onStateChange);
    });
  }

  private async discoverNow(
    role: DeviceRole,
    nameSubstring: string,
    timeoutSeconds: number,
    signal?: AbortSignal
  ): Promise<DeviceLink> {
    await this.waitForPoweredOn(() => new ConnectionError(role, ADAPTER_TIMEOUT_MESSAGE));

    const peripheral = await this.findDevice(role, nameSubstring, timeoutSeconds, signal);
    const deviceName = peripheral.advertisement.localName || peripheral.id;
    this.claimedIds.add(peripheral.id);

    try {
      this.logger.info(`Connecting to ${deviceName} as ${role}...`);
      await withTimeout(peripheral.connectAsync(), GATT_TIMEOUT_MS, 'Device connection timeout');

      const { services, characteristics } = await withTimeout(
        peripheral.discoverAllServicesAndCharacteristicsAsync(),
        GATT_TIMEOUT_MS,
        'Service discovery timeout'
      );

      const profile = ROLE_PROFILES[role];
      if (!services.some(service => uuidMatches(service.uuid, profile.serviceUuid))) {
        throw new Error(`Service ${profile.serviceUuid} not found`);
      }

      const resolved: Characteristic[] = [];
      for (const uuid of profile.characteristicUuids) {
        const characteristic = characteristics.find(c => uuidMatches(c.uuid, uuid));
        if (!characteristic) {
          throw new Error(`Characteristic ${uuid} not found (variants: ${expandUuidVariants(uuid).join(', ')})`);
        }
        resolved.push(characteristic);
      }

      const link = new NobleDeviceLink(role, peripheral, resolved, released => {
        this.links.delete(released);
        this.claimedIds.delete(peripheral.id);
      });
      this.links.add(link);
      this.logger.info(`Connected successfully to ${deviceName} as ${role}`);
      return link;

    } catch (error) {
      this.claimedIds.delete(peripheral.id);
      const reason = translateBluetoothError(error);
      this.logger.error(`Connection to ${deviceName} failed: ${reason}`);

      // Incomplete connections leave the adapter in a bad state
      if (peripheral.state === 'connected' || peripheral.state === 'connecting') {
        try {
          await withTimeout(peripheral.disconnectAsync(), DISCONNECT_TIMEOUT_MS, 'Disconnect timeout');
        } catch (cleanupError) {
          this.logger.warn(`Cleanup after connection error failed: ${describeError(cleanupError)}`);
        }
      }
      peripheral.removeAllListeners();

      throw new ConnectionError(role, reason);
    }
  }

  private async scanNow(durationSeconds: number): Promise<ScannedDevice[]> {
    await this.waitForPoweredOn(() => new Error(ADAPTER_TIMEOUT_MESSAGE));
    await noble.stopScanningAsync();

    const found = new Map<string, ScannedDevice>();
    const onDiscover = (peripheral: Peripheral) => {
      found.set(peripheral.id, {
        id: peripheral.id,
        name: peripheral.advertisement.localName || null,
        rssi: peripheral.rssi
      });
    };

    this.logger.info(`Scanning for ${durationSeconds}s...`);
    noble.on('discover', onDiscover);
    try {
      await noble.startScanningAsync([], true);
      await delay(durationSeconds * 1000);
    } finally {
      noble.removeListener('discover', onDiscover);
      await noble.stopScanningAsync();
    }

    this.logger.info(`Scan finished, ${found.size} device(s) seen`);
    return sortScannedDevices([...found.values()]);
  }

  private async findDevice(
    role: DeviceRole,
    nameSubstring: string,
    timeoutSeconds: number,
    signal?: AbortSignal
  ): Promise<Peripheral> {
    await noble.stopScanningAsync();

    return new Promise((resolve, reject) => {
      let timeout: NodeJS.Timeout | null = null;

      const onDiscover = (peripheral: Peripheral) => {
        const name = peripheral.advertisement.localName;
        if (!matchesName(name, nameSubstring) || this.claimedIds.has(peripheral.id)) {
          return;
        }
        cleanupScan();
        this.logger.info(`Found ${name} [${peripheral.id}] for ${role}`);
        resolve(peripheral);
      };

      const onAbort = () => {
        cleanupScan();
        reject(new ConnectionError(role, 'discovery cancelled'));
      };

      const cleanupScan = () => {
        if (timeout) {
          clearTimeout(timeout);
          timeout = null;
        }
        noble.removeListener('discover', onDiscover);
        signal?.removeEventListener('abort', onAbort);
        noble.stopScanningAsync().catch((error: unknown) => {
          this.logger.debug(`Stop scanning failed: ${describeError(error)}`);
        });
        this.findDeviceCleanup = null;
      };

      if (signal?.aborted) {
        reject(new ConnectionError(role, 'discovery cancelled'));
        return;
      }

      this.findDeviceCleanup = onAbort;
      signal?.addEventListener('abort', onAbort, { once: true });

      timeout = setTimeout(() => {
        cleanupScan();
        reject(new DeviceNotFoundError(role, nameSubstring, timeoutSeconds));
      }, timeoutSeconds * 1000);

      noble.on('discover', onDiscover);

      this.logger.info(`Scanning for '${nameSubstring}' (${role}), timeout ${timeoutSeconds}s...`);
      noble.startScanningAsync([], true).catch((error: unknown) => {
        cleanupScan();
        reject(new ConnectionError(role, `scan failed: ${translateBluetoothError(error)}`));
      });
    });
  }

  async shutdown(): Promise<void> {
    if (this.findDeviceCleanup) {
      this.findDeviceCleanup();
    }

    try {
      await noble.stopScanningAsync();
    } catch (error) {
      this.logger.debug(`Stop scanning failed: ${describeError(error)}`);
    }

    await Promise.all([...this.links].map(link => link.disconnect()));
  }
}
