import { EventEmitter } from 'events';
import { FTMS_CONTROL_POINT_UUID, INDOOR_BIKE_DATA_UUID } from './constants.js';
import type { DeviceLink } from './device-connector.js';
import { TrainerWriteError } from './errors.js';
import {
  buildTrainerCommand,
  getRequestControlCommand,
  getResetCommand,
  parseControlPointResponse,
  parseIndoorBikeData
} from './ftms-commands.js';
import { Logger } from './logger.js';
import type { TrainerCommand } from './types.js';
import { delay, describeError, formatHex, withTimeout } from './utils.js';
import { describeCommand } from './resistance-mapper.js';

export interface TrainerControllerOptions {
  writeTimeoutMs: number;
  minWriteIntervalMs: number;
}

/**
 * FTMS trainer control
 *
 * Events:
 * - 'bikeData': (data: IndoorBikeData) - Indoor Bike Data notification
 * - 'controlPointResponse': (response: ControlPointResponse) - Control point indication
 */
export class TrainerController extends EventEmitter {
  private readonly logger = new Logger('Trainer');
  private lastWriteAt: number | null = null;

  constructor(
    private readonly link: DeviceLink,
    private readonly options: TrainerControllerOptions
  ) {
    super();
  }

  get name(): string {
    return this.link.name;
  }

  /**
   * Subscribe to trainer notifications and take control of the machine.
   */
  async initialize(): Promise<void> {
    await this.link.subscribe(FTMS_CONTROL_POINT_UUID, data => {
      const response = parseControlPointResponse(data);
      if (!response) {
        this.logger.debug(`Unexpected control point frame: ${formatHex(data)}`);
        return;
      }
      if (response.success) {
        this.logger.debug(`Control point op 0x${response.requestOpCode.toString(16).padStart(2, '0')} acknowledged`);
      } else {
        this.logger.warn(`Control point op 0x${response.requestOpCode.toString(16).padStart(2, '0')} rejected: ${response.message}`);
      }
      this.emit('controlPointResponse', response);
    });

    await this.link.subscribe(INDOOR_BIKE_DATA_UUID, data => {
      this.emit('bikeData', parseIndoorBikeData(data));
    });

    await this.writeControlPoint(getRequestControlCommand(), 'request control');
  }

  async apply(command: TrainerCommand): Promise<void> {
    await this.writeControlPoint(buildTrainerCommand(command), describeCommand(command));
  }

  /**
   * Hand the trainer back. A neutral command (flat road in simulation mode)
   * goes out before the reset when one is given.
   */
  async release(neutral?: TrainerCommand): Promise<void> {
    if (neutral) {
      try {
        await this.apply(neutral);
      } catch (error) {
        this.logger.warn(`Could not restore neutral setting: ${describeError(error)}`);
      }
    }
    await this.writeControlPoint(getResetCommand(), 'reset');
  }

  /**
   * One control point write, spaced at least minWriteIntervalMs after the
   * previous one and bounded by writeTimeoutMs.
   */
  private async writeControlPoint(data: Uint8Array, label: string): Promise<void> {
    if (this.lastWriteAt !== null && this.options.minWriteIntervalMs > 0) {
      const wait = this.lastWriteAt + this.options.minWriteIntervalMs - Date.now();
      if (wait > 0) {
        await delay(wait);
      }
    }

    this.logger.debug(`TX ${label}: ${formatHex(data)}`);
    try {
      await withTimeout(
        this.link.write(FTMS_CONTROL_POINT_UUID, data, true),
        this.options.writeTimeoutMs,
        `timed out after ${this.options.writeTimeoutMs}ms`
      );
    } catch (error) {
      throw new TrainerWriteError(`${label} failed: ${describeError(error)}`);
    } finally {
      this.lastWriteAt = Date.now();
    }
  }
}
