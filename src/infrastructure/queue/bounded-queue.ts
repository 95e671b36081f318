import { QueueClosedError } from '../../domain/index.js';
import type { Event, EventQueue } from '../../domain/index.js';

interface Waiter<T> {
  resolve(value: T): void;
  reject(err: Error): void;
}

interface PendingPush extends Waiter<void> {
  event: Event;
}

/**
 * In-process FIFO queue with a fixed capacity.
 *
 * `push` stays pending while the queue is full and resolves once its event
 * has a place; `pop` stays pending while it is empty. Producers are served
 * in arrival order. `close` rejects every waiter with `QueueClosedError`.
 */
export class BoundedQueue implements EventQueue {
  private readonly items: Event[] = [];
  private readonly producers: PendingPush[] = [];
  private readonly consumers: Array<Waiter<Event>> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`BoundedQueue capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Events currently held. */
  get size(): number {
    return this.items.length;
  }

  /** Producers waiting for room. */
  get blockedProducers(): number {
    return this.producers.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(event: Event): Promise<void> {
    if (this.closed) return Promise.reject(new QueueClosedError());

    const consumer = this.consumers.shift();
    if (consumer) {
      consumer.resolve(event);
      return Promise.resolve();
    }

    if (this.items.length < this.capacity) {
      this.items.push(event);
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      this.producers.push({ event, resolve, reject });
    });
  }

  pop(): Promise<Event> {
    const event = this.items.shift();
    if (event !== undefined) {
      this.admitProducer();
      return Promise.resolve(event);
    }

    if (this.closed) return Promise.reject(new QueueClosedError());

    return new Promise((resolve, reject) => {
      this.consumers.push({ resolve, reject });
    });
  }

  /** Takes an event without waiting; undefined when empty. */
  tryPop(): Event | undefined {
    const event = this.items.shift();
    if (event !== undefined) this.admitProducer();
    return event;
  }

  /**
   * Stops the queue. Waiting producers and consumers are rejected; events
   * already held can still be taken with `pop`/`tryPop`.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const err = new QueueClosedError();
    for (const producer of this.producers.splice(0)) producer.reject(err);
    for (const consumer of this.consumers.splice(0)) consumer.reject(err);
  }

  private admitProducer(): void {
    const producer = this.producers.shift();
    if (!producer) return;
    this.items.push(producer.event);
    producer.resolve();
  }
}
