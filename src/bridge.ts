import { EventEmitter } from 'events';
import { translateBluetoothError } from './bluetooth-errors.js';
import type { AppConfig } from './config.js';
import { ControllerListener } from './controller-listener.js';
import type { DeviceConnector, DeviceLink } from './device-connector.js';
import { ConnectionError, TrainerWriteError } from './errors.js';
import type { IndoorBikeData } from './ftms-commands.js';
import { GearState } from './gear-state.js';
import { Logger } from './logger.js';
import { commandFor, describeCommand, simulationCommand } from './resistance-mapper.js';
import { ShiftQueue } from './shift-queue.js';
import { BridgeState, StateMachine } from './state-machine.js';
import { TrainerController } from './trainer-controller.js';
import type { ControllerSide, DeviceRole, ShiftEvent, TargetState, TrainerCommand, TrainerMode } from './types.js';
import { delay, describeError } from './utils.js';

export interface ShiftBridgeOptions {
  config: AppConfig;
  connector: DeviceConnector;
}

export interface GearChange {
  event: ShiftEvent;
  previousGear: number;
  gear: number;
  display: string;
  command: TrainerCommand;
  applied: boolean;
}

interface BluetoothTarget {
  role: DeviceRole;
  nameSubstring: string;
  state: TargetState;
  link: DeviceLink | null;
}

interface TerminationWaiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

const DEVICE_ROLES: DeviceRole[] = ['trainer', 'left_controller', 'right_controller'];

const MODE_LABELS: Record<TrainerMode, string> = {
  resistance: 'resistance',
  erg: 'ERG',
  simulation: 'simulation'
};

function sideOf(role: DeviceRole): ControllerSide | null {
  if (role === 'left_controller') return 'left';
  if (role === 'right_controller') return 'right';
  return null;
}

function formatBikeData(data: IndoorBikeData): string {
  const parts: string[] = [];
  if (data.speedKmh !== undefined) parts.push(`${data.speedKmh.toFixed(1)} km/h`);
  if (data.cadenceRpm !== undefined) parts.push(`${data.cadenceRpm} rpm`);
  if (data.powerWatts !== undefined) parts.push(`${data.powerWatts} W`);
  if (data.heartRateBpm !== undefined) parts.push(`${data.heartRateBpm} bpm`);
  return parts.join(', ') || 'no fields';
}

/**
 * Virtual shifting bridge
 *
 * Controller notifications feed one bounded queue; a single consumer applies
 * each shift to the gear state and writes the mapped command to the trainer,
 * strictly in arrival order. Lost devices are rediscovered individually.
 *
 * Events:
 * - 'gearChange': (change: GearChange) - A shift moved the gear
 */
export class ShiftBridge extends EventEmitter {
  private readonly logger = new Logger('Bridge');
  private readonly stateMachine = new StateMachine();
  private readonly config: AppConfig;
  private readonly connector: DeviceConnector;
  readonly gearState: GearState;
  private readonly queue: ShiftQueue;
  private readonly targets = new Map<DeviceRole, BluetoothTarget>();
  private readonly controllers = new Map<ControllerSide, ControllerListener>();
  private readonly lostRoles = new Set<DeviceRole>();
  private readonly reconnects = new Set<Promise<void>>();
  private readonly abortController = new AbortController();
  private readonly terminationWaiters: TerminationWaiter[] = [];

  private trainer: TrainerController | null = null;
  private trainerReady: Promise<void> = Promise.resolve();
  private resolveTrainerReady: (() => void) | null = null;
  private loop: Promise<void> | null = null;
  private stopPromise: Promise<void> | null = null;
  private stopping = false;
  private failure: Error | null = null;

  constructor(options: ShiftBridgeOptions) {
    super();
    this.config = options.config;
    this.connector = options.connector;
    this.gearState = new GearState(options.config.gears, options.config.gearTable);
    this.queue = new ShiftQueue(options.config.maxPendingShifts);

    const names: Record<DeviceRole, string> = {
      trainer: options.config.bluetooth.trainerName,
      left_controller: options.config.bluetooth.leftControllerName,
      right_controller: options.config.bluetooth.rightControllerName
    };
    for (const role of DEVICE_ROLES) {
      this.targets.set(role, { role, nameSubstring: names[role], state: 'unresolved', link: null });
    }
  }

  getState(): BridgeState {
    return this.stateMachine.getState();
  }

  getTargetState(role: DeviceRole): TargetState {
    return this.target(role).state;
  }

  get pendingShifts(): number {
    return this.queue.size;
  }

  private target(role: DeviceRole): BluetoothTarget {
    const target = this.targets.get(role);
    if (!target) {
      throw new Error(`Unknown device role: ${role}`);
    }
    return target;
  }

  /**
   * Connect every device and start processing shifts. Any device that cannot
   * be resolved is fatal: everything is released and the error propagates.
   * A stop() during start-up resolves instead, with the bridge terminated.
   */
  async start(): Promise<void> {
    this.stateMachine.transition(BridgeState.SCANNING, 'start');

    try {
      for (const role of DEVICE_ROLES) {
        this.target(role).state = 'scanning';
        await this.connectRole(role);
      }
    } catch (error) {
      if (this.stopping) {
        await this.stop();
        if (this.failure) {
          throw this.failure;
        }
        this.logger.info('Start-up cancelled by shutdown');
        return;
      }
      this.failure = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Start-up failed: ${this.failure.message}`);
      await this.stop();
      throw this.failure;
    }

    this.stateMachine.transition(BridgeState.CONNECTED, 'all devices connected');
    this.stateMachine.transition(BridgeState.RUNNING);
    this.logger.info(
      `Virtual shifting active - gear ${this.gearState.display()}/${this.gearState.maxGear}, ` +
      `${MODE_LABELS[this.config.mode]} mode`
    );
    this.loop = this.runLoop();
  }

  /**
   * Resolves after a clean stop(); rejects with the cause when the bridge
   * terminated on an unrecoverable failure.
   */
  waitForTermination(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.terminationWaiters.push({ resolve, reject });
      if (this.getState() === BridgeState.TERMINATED) {
        this.settleWaiters();
      }
    });
  }

  private settleWaiters(): void {
    const waiters = this.terminationWaiters.splice(0);
    for (const waiter of waiters) {
      if (this.failure) {
        waiter.reject(this.failure);
      } else {
        waiter.resolve();
      }
    }
  }

  enqueue(event: ShiftEvent): void {
    if (this.stopping) {
      this.logger.debug(`Ignoring ${event.direction} from ${event.source}: shutting down`);
      return;
    }
    if (!this.queue.push(event)) {
      this.logger.warn(`Shift queue full (${this.queue.size} pending), dropping ${event.direction} from ${event.source}`);
      return;
    }
    this.logger.debug(`Queued ${event.direction} from ${event.source}`);
  }

  private async connectRole(role: DeviceRole): Promise<void> {
    const target = this.target(role);
    const link = await this.connector.discover(
      role,
      target.nameSubstring,
      this.config.bluetooth.scanTimeoutSeconds,
      this.abortController.signal
    );

    try {
      this.throwIfStopping(role);
      await this.attach(role, link);
      this.throwIfStopping(role);
    } catch (error) {
      this.detach(role);
      await link.disconnect();
      throw error instanceof ConnectionError ? error : new ConnectionError(role, describeError(error));
    }

    target.link = link;
    target.state = 'connected';
    link.onDisconnect(reason => this.handleLinkLoss(role, reason));
  }

  // A link that arrives after stop() began is never handed to the running bridge
  private throwIfStopping(role: DeviceRole): void {
    if (this.stopping) {
      throw new ConnectionError(role, 'cancelled by shutdown');
    }
  }

  private detach(role: DeviceRole): void {
    const side = sideOf(role);
    if (side) {
      this.controllers.delete(side);
    } else {
      this.trainer?.removeAllListeners();
      this.trainer = null;
    }
  }

  private async attach(role: DeviceRole, link: DeviceLink): Promise<void> {
    const side = sideOf(role);
    if (side) {
      const listener = new ControllerListener(side, link, event => this.enqueue(event));
      await listener.start();
      this.controllers.set(side, listener);
      return;
    }

    const trainer = new TrainerController(link, {
      writeTimeoutMs: this.config.bluetooth.writeTimeoutMs,
      minWriteIntervalMs: this.config.shiftSmoothingMs
    });
    trainer.on('bikeData', (data: IndoorBikeData) => {
      if (this.logger.isEnabled('debug')) {
        this.logger.debug(`Bike data: ${formatBikeData(data)}`);
      }
    });
    await trainer.initialize();
    this.trainer = trainer;

    // Bring the trainer in line with the current gear before any shift is applied
    const command = commandFor(this.gearState.currentGear, this.gearState, this.config);
    try {
      await trainer.apply(command);
      this.logger.info(`Trainer ${trainer.name} synced to gear ${this.gearState.display()} (${describeCommand(command)})`);
    } catch (error) {
      this.logger.error(`Initial trainer sync failed: ${describeError(error)}`);
    }
    this.unblockTrainer();
  }

  private blockTrainer(): void {
    if (this.resolveTrainerReady) {
      return;
    }
    this.trainerReady = new Promise(resolve => {
      this.resolveTrainerReady = resolve;
    });
  }

  private unblockTrainer(): void {
    const resolve = this.resolveTrainerReady;
    this.resolveTrainerReady = null;
    resolve?.();
  }

  private async runLoop(): Promise<void> {
    for (;;) {
      const event = await this.queue.take();
      if (!event) {
        return;
      }
      await this.trainerReady;
      if (this.stopping) {
        return;
      }
      await this.processShift(event);
    }
  }

  private async processShift(event: ShiftEvent): Promise<void> {
    const log = (message: string) => this.config.showGearChanges
      ? this.logger.info(message)
      : this.logger.debug(message);

    const previousGear = this.gearState.currentGear;
    if (this.gearState.isAtLimit(event.direction)) {
      log(`Already in ${event.direction === 'up' ? 'highest' : 'lowest'} gear (${previousGear})`);
      return;
    }
    const gear = this.gearState.shift(event.direction);

    const command = commandFor(gear, this.gearState, this.config);
    const display = this.gearState.display();
    log(`Gear: ${display}/${this.gearState.maxGear} | ${describeCommand(command)} (${event.source} ${event.direction})`);

    let applied = false;
    const trainer = this.trainer;
    if (!trainer) {
      this.logger.error(`No trainer connected, gear ${gear} not applied`);
    } else {
      try {
        await trainer.apply(command);
        applied = true;
      } catch (error) {
        // Not retried: the next shift writes the then-current gear anyway
        const kind = error instanceof TrainerWriteError ? 'Trainer write failed' : 'Unexpected trainer error';
        this.logger.error(`${kind} for gear ${gear}: ${describeError(error)}`);
      }
    }

    const change: GearChange = { event, previousGear, gear, display, command, applied };
    this.emit('gearChange', change);
  }

  private handleLinkLoss(role: DeviceRole, reason?: unknown): void {
    if (this.stopping) {
      return;
    }

    const target = this.target(role);
    target.state = 'disconnected';
    target.link = null;
    const detail = reason === undefined ? '' : `: ${translateBluetoothError(reason)}`;
    this.logger.warn(`Lost connection to ${role}${detail}`);

    this.detach(role);
    if (!sideOf(role)) {
      this.blockTrainer();
    }

    const state = this.getState();
    if (state !== BridgeState.RUNNING && state !== BridgeState.DISCONNECTED && state !== BridgeState.RECONNECTING) {
      this.fail(new ConnectionError(role, `link lost during ${state.toLowerCase()}`));
      return;
    }

    this.lostRoles.add(role);
    if (state === BridgeState.RUNNING) {
      this.stateMachine.transition(BridgeState.DISCONNECTED, `${role} link lost`);
    }

    const reconnect = this.reconnect(role)
      .catch((error: unknown) => {
        this.fail(error instanceof Error ? error : new Error(String(error)));
      })
      .finally(() => {
        this.reconnects.delete(reconnect);
      });
    this.reconnects.add(reconnect);
  }

  private async reconnect(role: DeviceRole): Promise<void> {
    const { reconnectAttempts, reconnectDelayMs } = this.config.bluetooth;
    const target = this.target(role);

    if (this.getState() === BridgeState.DISCONNECTED) {
      this.stateMachine.transition(BridgeState.RECONNECTING, role);
    }
    target.state = 'reconnecting';

    for (let attempt = 1; attempt <= reconnectAttempts; attempt++) {
      if (this.stopping) {
        return;
      }
      try {
        this.logger.info(`Reconnecting ${role} (attempt ${attempt}/${reconnectAttempts})`);
        await this.connectRole(role);
      } catch (error) {
        if (this.stopping) {
          return;
        }
        this.logger.warn(`Reconnect attempt ${attempt}/${reconnectAttempts} for ${role} failed: ${describeError(error)}`);
        if (attempt < reconnectAttempts) {
          await delay(reconnectDelayMs, this.abortController.signal);
        }
        continue;
      }

      this.lostRoles.delete(role);
      this.logger.info(`Reconnected ${role}`);
      if (this.lostRoles.size === 0 && this.getState() === BridgeState.RECONNECTING) {
        this.stateMachine.transition(BridgeState.CONNECTED, 'all devices connected');
        this.stateMachine.transition(BridgeState.RUNNING);
      }
      return;
    }

    if (!this.stopping) {
      throw new ConnectionError(role, `reconnection failed after ${reconnectAttempts} attempts`);
    }
  }

  private fail(error: Error): void {
    if (this.stopping) {
      return;
    }
    this.failure = error;
    this.logger.error(`Fatal: ${error.message}`);
    this.stop().catch((stopError: unknown) => {
      this.logger.error(`Shutdown after failure did not complete: ${describeError(stopError)}`);
    });
  }

  /**
   * Cancel scans and reconnect waits, let an in-flight write finish, release
   * the trainer and every link.
   */
  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.teardown();
    }
    return this.stopPromise;
  }

  private async teardown(): Promise<void> {
    this.stopping = true;
    this.abortController.abort();

    const dropped = this.queue.drain();
    if (dropped > 0) {
      this.logger.warn(`Dropping ${dropped} pending shift(s) on shutdown`);
    }
    this.unblockTrainer();

    if (this.loop) {
      await this.loop;
    }
    await Promise.allSettled([...this.reconnects]);

    if (this.trainer) {
      try {
        // Simulation mode leaves the trainer on a flat road
        const neutral = this.config.mode === 'simulation' ? simulationCommand(0, this.config.simulation) : undefined;
        await this.trainer.release(neutral);
      } catch (error) {
        this.logger.warn(`Could not release trainer: ${describeError(error)}`);
      }
      this.trainer.removeAllListeners();
      this.trainer = null;
    }

    const links: DeviceLink[] = [];
    for (const target of this.targets.values()) {
      if (target.link) {
        links.push(target.link);
      }
      target.link = null;
      target.state = 'terminated';
    }
    const results = await Promise.allSettled(links.map(link => link.disconnect()));
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn(`Disconnect failed: ${translateBluetoothError(result.reason)}`);
      }
    }

    try {
      await this.connector.shutdown();
    } catch (error) {
      this.logger.warn(`Connector shutdown failed: ${describeError(error)}`);
    }

    this.controllers.clear();
    this.stateMachine.transition(BridgeState.TERMINATED, this.failure ? 'failure' : 'shutdown');
    this.settleWaiters();
  }
}
