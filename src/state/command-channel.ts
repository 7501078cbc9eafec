import { logger } from '../logger.js';

const MAX_PENDING = 256;

export type ChannelHandler<T> = (item: T) => Promise<void> | void;

/**
 * Multi-producer, single-consumer FIFO.
 *
 * Producers (detection loop, hotkey listener, UI) call `publish` from
 * whatever callback they are in; nothing runs synchronously. Items are
 * drained on a later turn of the event loop and handed to the consumer one
 * at a time, each awaited before the next, so dispatch is serialized.
 */
export class CommandChannel<T> {
  private queue: T[] = [];
  private handler: ChannelHandler<T> | null = null;
  private draining = false;
  private scheduled = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Attach the single consumer. Replaces any previous consumer. */
  consume(handler: ChannelHandler<T>): void {
    this.handler = handler;
    this.schedule();
  }

  /** Returns false if the item was not accepted (channel closed or full). */
  publish(item: T): boolean {
    if (this.closed) {
      logger.debug('CommandChannel: dropped item after close');
      return false;
    }
    if (this.queue.length >= MAX_PENDING) {
      logger.warn(`CommandChannel: queue full (${MAX_PENDING}) — dropping item`);
      return false;
    }
    this.queue.push(item);
    this.schedule();
    return true;
  }

  /** Resolves once the queue is empty and no item is being handled. */
  whenIdle(): Promise<void> {
    if (!this.draining && !this.scheduled && (this.queue.length === 0 || !this.handler)) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Stop accepting items. Items already queued are still delivered. */
  close(): void {
    this.closed = true;
  }

  private schedule(): void {
    if (this.scheduled || this.draining || !this.handler || this.queue.length === 0) return;
    this.scheduled = true;
    setImmediate(() => {
      this.scheduled = false;
      this.drain().catch((err) => logger.error('CommandChannel: drain failed:', err));
    });
  }

  private async drain(): Promise<void> {
    const handler = this.handler;
    if (this.draining || !handler) return;
    this.draining = true;
    try {
      let item = this.queue.shift();
      while (item !== undefined) {
        try {
          await handler(item);
        } catch (err) {
          logger.warn('CommandChannel: handler failed:', err);
        }
        item = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
    this.notifyIdle();
  }

  private notifyIdle(): void {
    if (this.queue.length > 0 && this.handler) {
      this.schedule();
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
