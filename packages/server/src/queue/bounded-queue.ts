/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

type Taker<T> = (item: T | undefined) => void;

type Putter<T> = {
  item: T;
  resolve: (accepted: boolean) => void;
};

/**
 * FIFO with a fixed capacity. `put` waits while the queue is full and
 * `poll` waits up to a timeout for an item, so one producer and one
 * consumer can hand items over without either spinning.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Array<Taker<T>> = [];
  private readonly putters: Array<Putter<T>> = [];
  private disposed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Queue capacity must be a positive integer, got ${capacity}`,
      );
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Adds `item`, waiting for room if the queue is full. Resolves `false` if
   * the queue was disposed before the item got in.
   */
  put(item: T): Promise<boolean> {
    if (this.disposed) {
      return Promise.resolve(false);
    }
    const taker = this.takers.shift();
    if (taker) {
      taker(item);
      return Promise.resolve(true);
    }
    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      this.putters.push({ item, resolve });
    });
  }

  /**
   * Takes the head item, waiting at most `timeoutMs` for one to arrive.
   * Resolves `undefined` on timeout or once the queue is disposed.
   */
  poll(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.take());
    }
    if (this.disposed) {
      return Promise.resolve(undefined);
    }
    return new Promise<T | undefined>((resolve) => {
      const taker: Taker<T> = (item) => {
        clearTimeout(timer);
        resolve(item);
      };
      const timer = setTimeout(() => {
        const index = this.takers.indexOf(taker);
        if (index >= 0) {
          this.takers.splice(index, 1);
        }
        resolve(undefined);
      }, timeoutMs);
      this.takers.push(taker);
    });
  }

  /**
   * Removes every queued item matching `predicate`; returns how many were
   * removed. Items still waiting in `put` are not inspected.
   */
  removeIf(predicate: (item: T) => boolean): number {
    let removed = 0;
    for (let i = this.items.length - 1; i >= 0; i -= 1) {
      if (predicate(this.items[i])) {
        this.items.splice(i, 1);
        removed += 1;
      }
    }
    this.admitPutters();
    return removed;
  }

  /**
   * The queued items, head first.
   */
  toArray(): T[] {
    return [...this.items];
  }

  /**
   * Drops queued items, releases waiting pollers with `undefined` and
   * waiting producers with `false`.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.items.length = 0;
    for (const taker of this.takers.splice(0)) {
      taker(undefined);
    }
    for (const putter of this.putters.splice(0)) {
      putter.resolve(false);
    }
  }

  private take(): T {
    const [item] = this.items.splice(0, 1);
    this.admitPutters();
    return item;
  }

  private admitPutters(): void {
    while (this.items.length < this.capacity) {
      const putter = this.putters.shift();
      if (!putter) {
        return;
      }
      this.items.push(putter.item);
      putter.resolve(true);
    }
  }
}
