import { BackpressurePolicy } from '../types';

export type PutOutcome<T> =
  | { kind: 'queued' }
  | { kind: 'dropped-oldest'; dropped: T }
  | { kind: 'closed' };

interface Waiter {
  resolve: () => void;
}

/**
 * Single-producer, single-consumer queue with a fixed capacity. Under `block` a full
 * queue suspends `put` until the consumer takes an item; under `drop-oldest` the
 * oldest pending item makes room instead.
 */
export class BoundedQueue<T> {
  private items: T[] = [];
  private closed = false;
  private putWaiters: Waiter[] = [];
  private takeWaiters: Waiter[] = [];

  public constructor(
    private readonly capacity: number,
    private readonly policy: BackpressurePolicy
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('BoundedQueue capacity must be a positive integer');
    }
  }

  public get size(): number {
    return this.items.length;
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public async put(item: T): Promise<PutOutcome<T>> {
    while (!this.closed && this.items.length >= this.capacity) {
      if (this.policy === 'drop-oldest') {
        const dropped = this.items.shift();
        this.items.push(item);
        this.wake(this.takeWaiters);
        return dropped === undefined ? { kind: 'queued' } : { kind: 'dropped-oldest', dropped };
      }

      await new Promise<void>((resolve) => {
        this.putWaiters.push({ resolve });
      });
    }

    if (this.closed) {
      return { kind: 'closed' };
    }

    this.items.push(item);
    this.wake(this.takeWaiters);
    return { kind: 'queued' };
  }

  /** Next item in order, or undefined once the queue is closed and empty. */
  public async take(): Promise<T | undefined> {
    while (this.items.length === 0) {
      if (this.closed) {
        return undefined;
      }

      await new Promise<void>((resolve) => {
        this.takeWaiters.push({ resolve });
      });
    }

    const item = this.items.shift();
    this.wake(this.putWaiters);
    return item;
  }

  /** Removes and returns every pending item. */
  public clear(): T[] {
    const pending = this.items;
    this.items = [];
    this.wake(this.putWaiters);
    return pending;
  }

  public close(): void {
    this.closed = true;
    this.wakeAll(this.putWaiters);
    this.wakeAll(this.takeWaiters);
  }

  private wake(waiters: Waiter[]): void {
    const next = waiters.shift();
    next?.resolve();
  }

  private wakeAll(waiters: Waiter[]): void {
    const pending = waiters.splice(0, waiters.length);
    for (const waiter of pending) {
      waiter.resolve();
    }
  }
}
