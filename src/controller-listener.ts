import { ClickButtonTracker } from './click-protocol.js';
import { CLICK_ASYNC_CHARACTERISTIC_UUID } from './constants.js';
import type { DeviceLink } from './device-connector.js';
import { NotificationDecodeError } from './errors.js';
import { Logger } from './logger.js';
import type { ControllerSide, ShiftDirection, ShiftEvent } from './types.js';
import { formatHex } from './utils.js';

/**
 * Turns one controller's button notifications into ShiftEvents.
 */
export class ControllerListener {
  private readonly logger: Logger;
  private readonly tracker = new ClickButtonTracker();

  constructor(
    readonly side: ControllerSide,
    private readonly link: DeviceLink,
    private readonly onShift: (event: ShiftEvent) => void
  ) {
    this.logger = new Logger(`Controller:${side}`);
  }

  get name(): string {
    return this.link.name;
  }

  async start(): Promise<void> {
    this.tracker.reset();
    await this.link.subscribe(CLICK_ASYNC_CHARACTERISTIC_UUID, data => this.handleNotification(data));
    this.logger.info(`Listening for shifts on ${this.link.name}`);
  }

  handleNotification(data: Uint8Array): void {
    this.logger.debug(`RX ${formatHex(data)}`);

    let directions: ShiftDirection[];
    try {
      directions = this.tracker.process(data);
    } catch (error) {
      if (error instanceof NotificationDecodeError) {
        this.logger.warn(`Discarding notification [${formatHex(error.payload)}]: ${error.message}`);
        return;
      }
      throw error;
    }

    for (const direction of directions) {
      this.onShift({ source: this.side, direction, timestamp: Date.now() });
    }
  }
}
