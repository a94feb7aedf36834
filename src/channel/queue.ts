/**
 * Per-role FIFO inbound queue with optional bound.
 *
 * `block` parks the producer until a slot frees up and admits parked items in
 * arrival order; `drop-oldest` evicts the head and counts the loss.
 */

import { ChannelClosedError } from '../errors';
import { AbortedError } from '../utils/backoff';
import type { BackpressurePolicy, SubscribeOptions } from './types';

interface ParkedPut<T> {
  item: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

export class InboundQueue<T> {
  private items: T[] = [];
  private parked: ParkedPut<T>[] = [];
  private readers: Array<() => void> = [];
  private closed = false;
  private droppedCount = 0;
  readonly bound: number | undefined;
  readonly policy: BackpressurePolicy;

  constructor(
    readonly name: string,
    options: SubscribeOptions = {}
  ) {
    if (options.bound !== undefined && (!Number.isInteger(options.bound) || options.bound < 1)) {
      throw new RangeError(`Queue bound must be a positive integer, got ${options.bound}`);
    }
    this.bound = options.bound;
    this.policy = options.policy ?? 'block';
  }

  /** Queued plus parked items */
  get size(): number {
    return this.items.length + this.parked.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  put(item: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError(`Queue ${this.name} is closed`));
    }
    if (!this.isFull() && this.parked.length === 0) {
      this.items.push(item);
      this.wakeReaders();
      return Promise.resolve();
    }
    if (this.policy === 'drop-oldest') {
      this.items.shift();
      this.droppedCount++;
      this.items.push(item);
      this.wakeReaders();
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.parked.push({ item, resolve, reject });
    });
  }

  tryTake(): T | undefined {
    const item = this.items.shift();
    this.admitParked();
    return item;
  }

  async take(signal?: AbortSignal): Promise<T> {
    for (;;) {
      const item = this.tryTake();
      if (item !== undefined) return item;
      if (this.closed) throw new ChannelClosedError(`Queue ${this.name} is closed`);
      await this.waitReadable(signal);
    }
  }

  /**
   * Resolves once an item is available or the queue closes.
   */
  waitReadable(signal?: AbortSignal): Promise<void> {
    if (this.items.length > 0 || this.closed) return Promise.resolve();
    if (signal?.aborted) return Promise.reject(new AbortedError());

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.readers = this.readers.filter((reader) => reader !== wake);
        reject(new AbortedError());
      };
      const wake = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.readers.push(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const parked = this.parked;
    this.parked = [];
    for (const put of parked) {
      put.reject(new ChannelClosedError(`Queue ${this.name} closed before delivery`));
    }
    this.wakeReaders();
  }

  private isFull(): boolean {
    return this.bound !== undefined && this.items.length >= this.bound;
  }

  private admitParked(): void {
    while (this.parked.length > 0 && !this.isFull()) {
      const next = this.parked.shift();
      if (!next) break;
      this.items.push(next.item);
      next.resolve();
    }
    if (this.items.length > 0) this.wakeReaders();
  }

  private wakeReaders(): void {
    const readers = this.readers;
    this.readers = [];
    for (const wake of readers) wake();
  }
}
