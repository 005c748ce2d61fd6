import type { ShiftEvent } from './types.js';

/**
 * Bounded FIFO with a single consumer. take() resolves with the next event in
 * arrival order, or null once the queue is closed and drained.
 */
export class ShiftQueue {
  private readonly items: ShiftEvent[] = [];
  private waiter: ((event: ShiftEvent | null) => void) | null = null;
  private closed = false;

  constructor(private readonly limit: number) {}

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @returns false when the event was dropped (queue full or closed)
   */
  push(event: ShiftEvent): boolean {
    if (this.closed) {
      return false;
    }
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(event);
      return true;
    }
    if (this.items.length >= this.limit) {
      return false;
    }
    this.items.push(event);
    return true;
  }

  take(): Promise<ShiftEvent | null> {
    const next = this.items.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    if (this.waiter) {
      return Promise.reject(new Error('ShiftQueue supports a single consumer'));
    }
    return new Promise(resolve => {
      this.waiter = resolve;
    });
  }

  /**
   * Stop accepting events. Anything already queued is still delivered.
   */
  close(): void {
    this.closed = true;
    if (this.waiter && this.items.length === 0) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(null);
    }
  }

  /**
   * Close and discard anything still queued.
   */
  drain(): number {
    const dropped = this.items.length;
    this.items.length = 0;
    this.close();
    return dropped;
  }
}
