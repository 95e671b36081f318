import type { Redis } from 'ioredis';
import type { Event, EventQueue } from '../../domain/index.js';

export const DEFAULT_STREAM_KEY = 'events_stream';
export const DEFAULT_CONSUMER_GROUP = 'events_consumers';

export interface RedisStreamQueueOptions {
  /** Stream the events are appended to. */
  streamKey?: string | undefined;
  /** Consumer group whose backlog bounds the queue. */
  consumerGroup?: string | undefined;
  /** `push` waits while the backlog holds this many entries or more. */
  maxLength: number;
  /** Delay between backlog checks while the queue is full (ms). */
  pollIntervalMs?: number | undefined;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** XINFO GROUPS entry: flat [key, value, key, value, ...] list. */
function toFields(entry: unknown): Map<string, unknown> {
  const fields = new Map<string, unknown>();
  if (!Array.isArray(entry)) return fields;

  for (let i = 0; i + 1 < entry.length; i += 2) {
    const key: unknown = entry[i];
    if (typeof key === 'string') fields.set(key, entry[i + 1]);
  }
  return fields;
}

function toCount(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Bounded queue backed by a Redis Stream.
 *
 * Uses `XADD` with auto-generated stream IDs (`*`). The event is stored as a
 * single JSON-serialized `event` field.
 *
 * Capacity is measured against the consumer group, not the stream length:
 * entries the group has read and acknowledged stay in the stream but no
 * longer count. The backlog is the group's pending entries plus the ones it
 * has not read yet (`lag`, or an `XRANGE` after `last-delivered-id` when
 * Redis cannot report a lag). Before the group exists every entry counts.
 */
export class RedisStreamQueue implements EventQueue {
  readonly streamKey: string;
  readonly consumerGroup: string;
  private readonly maxLength: number;
  private readonly pollIntervalMs: number;

  constructor(
    private readonly redis: Redis,
    options: RedisStreamQueueOptions,
  ) {
    if (!Number.isInteger(options.maxLength) || options.maxLength < 1) {
      throw new RangeError(`RedisStreamQueue maxLength must be a positive integer, got ${options.maxLength}`);
    }
    this.streamKey = options.streamKey ?? DEFAULT_STREAM_KEY;
    this.consumerGroup = options.consumerGroup ?? DEFAULT_CONSUMER_GROUP;
    this.maxLength = options.maxLength;
    this.pollIntervalMs = options.pollIntervalMs ?? 50;
  }

  async push(event: Event): Promise<void> {
    while ((await this.backlog()) >= this.maxLength) {
      await sleep(this.pollIntervalMs);
    }

    await this.redis.xadd(this.streamKey, '*', 'event', JSON.stringify(event));
  }

  /** Entries not yet acknowledged by the consumer group. */
  async backlog(): Promise<number> {
    const group = await this.groupInfo();
    if (!group) return this.redis.xlen(this.streamKey);

    const pending = toCount(group.get('pending')) ?? 0;
    const lag = toCount(group.get('lag'));
    if (lag !== undefined) return pending + lag;

    const lastDelivered = group.get('last-delivered-id');
    if (typeof lastDelivered !== 'string') return this.redis.xlen(this.streamKey);

    const unread = await this.redis.xrange(this.streamKey, `(${lastDelivered}`, '+', 'COUNT', this.maxLength);
    return pending + unread.length;
  }

  private async groupInfo(): Promise<Map<string, unknown> | undefined> {
    let reply: unknown;
    try {
      reply = await this.redis.xinfo('GROUPS', this.streamKey);
    } catch (err: unknown) {
      // Stream not created yet.
      if (err instanceof Error && err.message.includes('no such key')) return undefined;
      throw err;
    }

    if (!Array.isArray(reply)) return undefined;
    for (const entry of reply) {
      const fields = toFields(entry);
      if (fields.get('name') === this.consumerGroup) return fields;
    }
    return undefined;
  }
}
