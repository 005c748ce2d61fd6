import { Logger } from './logger.js';

export enum BridgeState {
  IDLE = 'IDLE',
  SCANNING = 'SCANNING',
  CONNECTED = 'CONNECTED',
  RUNNING = 'RUNNING',
  DISCONNECTED = 'DISCONNECTED',
  RECONNECTING = 'RECONNECTING',
  TERMINATED = 'TERMINATED'
}

interface StateTransition {
  from: BridgeState;
  to: BridgeState;
}

export class StateMachine {
  private currentState: BridgeState = BridgeState.IDLE;
  private logger: Logger;

  private readonly validTransitions: StateTransition[] = [
    { from: BridgeState.IDLE, to: BridgeState.SCANNING },
    { from: BridgeState.SCANNING, to: BridgeState.CONNECTED },
    { from: BridgeState.CONNECTED, to: BridgeState.RUNNING },
    { from: BridgeState.RUNNING, to: BridgeState.DISCONNECTED },
    { from: BridgeState.DISCONNECTED, to: BridgeState.RECONNECTING },
    { from: BridgeState.RECONNECTING, to: BridgeState.CONNECTED },
    // Shutdown or fatal failure is reachable from everywhere but TERMINATED
    { from: BridgeState.IDLE, to: BridgeState.TERMINATED },
    { from: BridgeState.SCANNING, to: BridgeState.TERMINATED },
    { from: BridgeState.CONNECTED, to: BridgeState.TERMINATED },
    { from: BridgeState.RUNNING, to: BridgeState.TERMINATED },
    { from: BridgeState.DISCONNECTED, to: BridgeState.TERMINATED },
    { from: BridgeState.RECONNECTING, to: BridgeState.TERMINATED }
  ];

  constructor() {
    this.logger = new Logger('StateMachine');
  }

  getState(): BridgeState {
    return this.currentState;
  }

  canTransition(to: BridgeState): boolean {
    return this.validTransitions.some(
      t => t.from === this.currentState && t.to === to
    );
  }

  transition(to: BridgeState, context?: string): void {
    const from = this.currentState;

    if (!this.canTransition(to)) {
      const error = `Invalid state transition: ${from} -> ${to}`;
      this.logger.error(error);
      throw new Error(error);
    }

    this.currentState = to;
    this.logger.info(`State transition: ${from} -> ${to}${context ? ` (${context})` : ''}`);
  }
}
