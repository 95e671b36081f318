import { describe, it, expect, vi } from 'vitest';
import type { Redis } from 'ioredis';
import type { Event } from '../../src/domain/index.js';
import {
  DEFAULT_CONSUMER_GROUP,
  DEFAULT_STREAM_KEY,
  RedisStreamQueue,
} from '../../src/infrastructure/index.js';

const event: Event = { host: '127.0.0.1', '@timestamp': '2026-01-01T00:00:00.000Z', message: 'hello' };

function groupEntry(name: string, pending: number, lag: number | null, lastDeliveredId = '5-0'): unknown[] {
  return [
    'name', name,
    'consumers', 1,
    'pending', pending,
    'last-delivered-id', lastDeliveredId,
    'entries-read', 5,
    'lag', lag,
  ];
}

function fakeRedis(options: { groups?: unknown[][]; lengths?: number[] } = {}) {
  const groups = options.groups ?? [];
  const lengths = options.lengths ?? [];
  const xinfo = vi.fn(async () => groups.shift() ?? []);
  const xlen = vi.fn(async () => lengths.shift() ?? 0);
  const xrange = vi.fn(async (): Promise<Array<[string, string[]]>> => []);
  const xadd = vi.fn(async () => '1-0');
  return { redis: { xinfo, xlen, xrange, xadd } as unknown as Redis, xinfo, xlen, xrange, xadd };
}

describe('RedisStreamQueue', () => {
  it('appends the serialized event to the default stream', async () => {
    const { redis, xadd } = fakeRedis();
    const queue = new RedisStreamQueue(redis, { maxLength: 10 });

    await queue.push(event);

    expect(queue.streamKey).toBe(DEFAULT_STREAM_KEY);
    expect(queue.consumerGroup).toBe(DEFAULT_CONSUMER_GROUP);
    expect(xadd).toHaveBeenCalledWith('events_stream', '*', 'event', JSON.stringify(event));
  });

  it('uses the configured stream key', async () => {
    const { redis, xinfo, xadd } = fakeRedis();
    const queue = new RedisStreamQueue(redis, { streamKey: 'ingest', maxLength: 10 });

    await queue.push(event);

    expect(xinfo).toHaveBeenCalledWith('GROUPS', 'ingest');
    expect(xadd).toHaveBeenCalledWith('ingest', '*', 'event', JSON.stringify(event));
  });

  it.each([0, -1, 1.5, Number.NaN])('rejects maxLength %s', (maxLength) => {
    const { redis } = fakeRedis();
    expect(() => new RedisStreamQueue(redis, { maxLength })).toThrow(RangeError);
  });

  describe('backlog', () => {
    it('ignores entries the group has acknowledged', async () => {
      const { redis, xlen, xadd } = fakeRedis({
        groups: [[groupEntry('events_consumers', 0, 0)]],
        lengths: [1000],
      });
      const queue = new RedisStreamQueue(redis, { maxLength: 1000 });

      await queue.push(event);

      expect(xlen).not.toHaveBeenCalled();
      expect(xadd).toHaveBeenCalledTimes(1);
    });

    it('counts pending and unread entries of the configured group', async () => {
      const { redis } = fakeRedis({
        groups: [[groupEntry('other', 0, 0), groupEntry('indexers', 3, 4)]],
      });
      const queue = new RedisStreamQueue(redis, { consumerGroup: 'indexers', maxLength: 10 });

      await expect(queue.backlog()).resolves.toBe(7);
    });

    it('reads unread entries after last-delivered-id when the lag is unknown', async () => {
      const { redis, xrange } = fakeRedis({
        groups: [[groupEntry('events_consumers', 1, null, '42-0')]],
      });
      xrange.mockResolvedValueOnce([
        ['43-0', ['event', '{}']],
        ['44-0', ['event', '{}']],
      ]);
      const queue = new RedisStreamQueue(redis, { maxLength: 10 });

      await expect(queue.backlog()).resolves.toBe(3);
      expect(xrange).toHaveBeenCalledWith('events_stream', '(42-0', '+', 'COUNT', 10);
    });

    it('counts the whole stream before the group exists', async () => {
      const { redis, xlen } = fakeRedis({ groups: [[]], lengths: [6] });
      const queue = new RedisStreamQueue(redis, { maxLength: 10 });

      await expect(queue.backlog()).resolves.toBe(6);
      expect(xlen).toHaveBeenCalledWith('events_stream');
    });

    it('treats a missing stream as empty', async () => {
      const { redis, xinfo } = fakeRedis();
      xinfo.mockRejectedValueOnce(new Error('ERR no such key'));
      const queue = new RedisStreamQueue(redis, { maxLength: 10 });

      await expect(queue.backlog()).resolves.toBe(0);
    });
  });

  it('waits while the backlog is at capacity', async () => {
    const { redis, xinfo, xadd } = fakeRedis({
      groups: [
        [groupEntry('events_consumers', 1, 1)],
        [groupEntry('events_consumers', 2, 0)],
        [groupEntry('events_consumers', 0, 1)],
      ],
    });
    const queue = new RedisStreamQueue(redis, { maxLength: 2, pollIntervalMs: 1 });

    await queue.push(event);

    expect(xinfo).toHaveBeenCalledTimes(3);
    expect(xadd).toHaveBeenCalledTimes(1);
  });

  it('propagates redis failures', async () => {
    const { redis, xadd } = fakeRedis();
    xadd.mockRejectedValueOnce(new Error('connection lost'));
    const queue = new RedisStreamQueue(redis, { maxLength: 10 });

    await expect(queue.push(event)).rejects.toThrow('connection lost');
  });
});
