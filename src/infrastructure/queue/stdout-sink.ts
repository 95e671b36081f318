import { once } from 'node:events';
import type { Writable } from 'node:stream';
import type { Logger } from 'pino';
import { QueueClosedError } from '../../domain/index.js';
import type { BoundedQueue } from './bounded-queue.js';

/**
 * Drains a `BoundedQueue` into a writable stream as JSON lines.
 *
 * Stands in for the downstream pipeline when no external queue is
 * configured. Waits for the stream to drain before taking the next event,
 * so a slow reader backs up into the queue. Resolves when the queue is
 * closed and empty; rejects when the stream errors.
 */
export async function startStdoutSink(
  queue: BoundedQueue,
  log: Logger,
  out: Writable = process.stdout,
): Promise<void> {
  log.info({ capacity: queue.capacity }, 'Stdout sink started');

  for (;;) {
    let line: string;
    try {
      line = `${JSON.stringify(await queue.pop())}\n`;
    } catch (err: unknown) {
      if (err instanceof QueueClosedError) break;
      throw err;
    }

    if (!out.write(line)) {
      await once(out, 'drain');
    }
  }

  log.info('Stdout sink stopped');
}
