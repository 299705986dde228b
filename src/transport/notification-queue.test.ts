import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BLETimeoutError } from '../exceptions';
import { NotificationQueue } from './notification-queue';

describe('NotificationQueue', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('hands buffered items out in order', async () => {
    const queue = new NotificationQueue<number>();
    queue.enqueue(1);
    queue.enqueue(2);

    expect(queue.size).toBe(2);
    await expect(queue.dequeue(100)).resolves.toBe(1);
    await expect(queue.dequeue(100)).resolves.toBe(2);
    expect(queue.size).toBe(0);
  });

  it('resolves a waiting consumer on enqueue', async () => {
    const queue = new NotificationQueue<string>();
    const pending = queue.dequeue(1000);
    expect(queue.pendingCount).toBe(1);

    queue.enqueue('a');
    await expect(pending).resolves.toBe('a');
    expect(queue.pendingCount).toBe(0);
  });

  it('gives concurrent consumers distinct items', async () => {
    const queue = new NotificationQueue<number>();
    const first = queue.dequeue(1000);
    const second = queue.dequeue(1000);

    queue.enqueue(10);
    queue.enqueue(20);

    await expect(first).resolves.toBe(10);
    await expect(second).resolves.toBe(20);
  });

  it('times out with BLETimeoutError', async () => {
    const queue = new NotificationQueue<number>();
    const pending = queue.dequeue(250);
    const assertion = expect(pending).rejects.toThrow(BLETimeoutError);

    await vi.advanceTimersByTimeAsync(250);
    await assertion;
    expect(queue.pendingCount).toBe(0);
  });

  it('does not hand an item to a consumer that timed out', async () => {
    const queue = new NotificationQueue<number>();
    const pending = queue.dequeue(50);
    const assertion = expect(pending).rejects.toThrow('Nothing received within 50ms timeout');
    await vi.advanceTimersByTimeAsync(50);
    await assertion;

    queue.enqueue(7);
    expect(queue.tryDequeue()).toBe(7);
    expect(queue.tryDequeue()).toBeUndefined();
  });

  it('rejects waiters on clear', async () => {
    const queue = new NotificationQueue<number>();
    queue.enqueue(1);
    const assertion = expect(queue.dequeue(1000).then(() => queue.dequeue(1000))).rejects.toThrow(
      'Link lost'
    );

    await vi.advanceTimersByTimeAsync(0);
    queue.clear('Link lost');
    await assertion;
    expect(queue.size).toBe(0);
  });

  it('drains items but keeps waiters', async () => {
    const queue = new NotificationQueue<number>();
    queue.enqueue(1);
    queue.enqueue(2);
    expect(queue.drain()).toBe(2);

    const pending = queue.dequeue(1000);
    queue.enqueue(3);
    await expect(pending).resolves.toBe(3);
  });
});
