/**
 * Completion signals parsed from hub console output.
 */

import { BLETimeoutError } from './exceptions';
import { NotificationQueue } from './transport/notification-queue';

/**
 * One `DONE:<n>` line printed by a hub program.
 */
export interface Signal {
  sourceDeviceId: string;
  sequenceNumber: number;
  rawText: string;

  /** Epoch milliseconds */
  receivedAt: number;
}

/**
 * Anything that emits console text, such as a {@link HubSession}.
 */
export interface ConsoleSource {
  readonly deviceId: string;
  onConsole(listener: (text: string, deviceId: string) => void): () => void;
}

export interface SignalQueueOptions {
  /** Line pattern; the first capture group is the sequence number */
  pattern?: RegExp;

  /** Source id used when a notification names none */
  defaultSource?: string;
}

/**
 * FIFO of completion signals with any number of waiting consumers.
 *
 * Each signal is handed to exactly one consumer. Lines that do not match
 * the pattern are ignored.
 */
export class SignalQueue {
  static readonly DEFAULT_PATTERN = /DONE:(\d+)/;

  private readonly queue = new NotificationQueue<Signal>();
  private readonly pattern: RegExp;
  private readonly defaultSource: string;

  constructor(options: SignalQueueOptions = {}) {
    const pattern = options.pattern ?? SignalQueue.DEFAULT_PATTERN;
    // Lines are matched one at a time; a global or sticky lastIndex would carry over
    this.pattern = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
    this.defaultSource = options.defaultSource ?? 'hub';
  }

  /**
   * Parse console text and enqueue one signal per matching line.
   *
   * @returns The signals produced, in order
   */
  onNotification(text: string, sourceDeviceId: string = this.defaultSource): Signal[] {
    const signals: Signal[] = [];

    for (const line of text.split(/\r?\n/)) {
      const match = this.pattern.exec(line);
      if (!match) {
        continue;
      }

      const sequenceNumber = Number.parseInt(match[1] ?? '', 10);
      if (Number.isNaN(sequenceNumber)) {
        continue;
      }

      const signal: Signal = {
        sourceDeviceId,
        sequenceNumber,
        rawText: line.trim(),
        receivedAt: Date.now(),
      };
      this.queue.enqueue(signal);
      signals.push(signal);
    }

    return signals;
  }

  /**
   * Wait for the next signal.
   *
   * @returns The signal, or null if none arrived within `timeoutMs`
   */
  async wait(timeoutMs: number): Promise<Signal | null> {
    try {
      return await this.queue.dequeue(timeoutMs);
    } catch (error) {
      if (error instanceof BLETimeoutError) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Take the next buffered signal without waiting.
   */
  tryTake(): Signal | null {
    return this.queue.tryDequeue() ?? null;
  }

  /**
   * Drop buffered signals and release waiting consumers with an error.
   */
  clear(reason: string = 'Signal queue cleared'): void {
    this.queue.clear(reason);
  }

  /**
   * Drop buffered signals, leaving waiting consumers in place.
   *
   * @returns Number of signals dropped
   */
  drain(): number {
    return this.queue.drain();
  }

  /**
   * Feed every console line printed on `source` into this queue.
   *
   * @returns Function that stops listening
   */
  attach(source: ConsoleSource): () => void {
    return source.onConsole((text, deviceId) => {
      this.onNotification(text, deviceId);
    });
  }

  get size(): number {
    return this.queue.size;
  }

  get pendingCount(): number {
    return this.queue.pendingCount;
  }
}
