/**
 * Promise-based queue for asynchronously delivered items.
 *
 * BLE delivers notifications via callbacks. This queue buffers items and
 * provides a Promise-based interface for consuming them, with timeout support.
 * The session uses it for hub responses, the signal queue for signals.
 */

import { BLETimeoutError } from '../exceptions';

interface PendingResolver<T> {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
  timeoutId: ReturnType<typeof setTimeout>;
}

/**
 * FIFO queue with waiting consumers.
 *
 * - Buffers items that arrive before being requested
 * - Queues consumers that wait for future items, oldest first
 * - Every item goes to exactly one consumer
 */
export class NotificationQueue<T> {
  private queue: T[] = [];
  private pendingResolvers: PendingResolver<T>[] = [];

  /**
   * Add an item to the queue.
   *
   * If consumers are waiting, the oldest one receives it immediately.
   * Otherwise it is buffered.
   */
  enqueue(item: T): void {
    const pending = this.pendingResolvers.shift();
    if (pending) {
      clearTimeout(pending.timeoutId);
      pending.resolve(item);
    } else {
      this.queue.push(item);
    }
  }

  /**
   * Take the next item, waiting up to `timeoutMs` for one to arrive.
   *
   * @throws {BLETimeoutError} If timeout expires before an item arrives
   */
  async dequeue(timeoutMs: number): Promise<T> {
    if (this.queue.length > 0) {
      const [item] = this.queue.splice(0, 1);
      return item;
    }

    return new Promise<T>((resolve, reject) => {
      const pending: PendingResolver<T> = {
        resolve,
        reject,
        timeoutId: setTimeout(() => {
          const index = this.pendingResolvers.indexOf(pending);
          if (index !== -1) {
            this.pendingResolvers.splice(index, 1);
            reject(
              new BLETimeoutError(`Nothing received within ${timeoutMs}ms timeout`)
            );
          }
        }, timeoutMs),
      };

      this.pendingResolvers.push(pending);
    });
  }

  /**
   * Take the next buffered item without waiting.
   */
  tryDequeue(): T | undefined {
    return this.queue.shift();
  }

  /**
   * Drop buffered items and reject all waiting consumers.
   *
   * @param reason - Reason for clearing (default: "Connection closed")
   */
  clear(reason: string = 'Connection closed'): void {
    this.queue = [];

    for (const pending of this.pendingResolvers) {
      clearTimeout(pending.timeoutId);
      pending.reject(new Error(reason));
    }

    this.pendingResolvers = [];
  }

  /**
   * Drop buffered items, leaving waiting consumers in place.
   */
  drain(): number {
    const dropped = this.queue.length;
    this.queue = [];
    return dropped;
  }

  /**
   * Get the number of buffered items.
   */
  get size(): number {
    return this.queue.length;
  }

  /**
   * Get the number of consumers waiting for items.
   */
  get pendingCount(): number {
    return this.pendingResolvers.length;
  }
}
