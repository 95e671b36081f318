import { createEvent } from '../domain/index.js';
import type { Event, EventQueue } from '../domain/index.js';
import type { CodecRegistry } from './codecs/index.js';
import { decompress } from './decompress.js';

/** What the pipeline needs from one HTTP request. */
export interface IngestRequest {
  remoteAddress: string;
  contentType?: string | undefined;
  contentEncoding?: string | undefined;
  body: Buffer;
}

export interface IngestDeps {
  registry: CodecRegistry;
  queue: EventQueue;
  /** Upper bound on the decompressed body size, in bytes. */
  maxDecompressedBytes?: number | undefined;
}

export type IngestOutcome =
  | { status: 'enqueued'; codec: string; events: number }
  | { status: 'decompression_failed'; encoding: string; reason: string }
  | { status: 'decode_failed'; codec: string; message: string };

/**
 * Raised when the queue rejects a push part-way through a request.
 * `enqueued` events of the batch were already accepted downstream.
 */
export class EnqueueError extends Error {
  override readonly name = 'EnqueueError';

  constructor(
    readonly enqueued: number,
    readonly total: number,
    options: { cause: unknown },
  ) {
    super(`Enqueue failed after ${enqueued} of ${total} events`, options);
  }
}

/**
 * Runs one admitted request through the pipeline:
 * decompress → resolve codec → decode → stamp host → enqueue.
 *
 * The whole body is decoded before the first push, so a decode failure
 * never leaves part of a request in the queue. Each push is awaited in
 * codec order; while the queue is full the caller's worker slot stays busy.
 */
export async function ingest(request: IngestRequest, deps: IngestDeps): Promise<IngestOutcome> {
  const decompressed = await decompress(request.contentEncoding, request.body, {
    maxOutputLength: deps.maxDecompressedBytes,
  });
  if (!decompressed.ok) {
    return { status: 'decompression_failed', encoding: decompressed.encoding, reason: decompressed.reason };
  }

  const codec = deps.registry.resolve(request.contentType);
  const decoded = deps.registry.decode(codec, decompressed.payload);
  if (!decoded.ok) {
    return { status: 'decode_failed', codec: decoded.codec, message: decoded.message };
  }

  const receivedAt = new Date();
  const events: Event[] = decoded.events.map((fields) => createEvent(fields, request.remoteAddress, receivedAt));

  let enqueued = 0;
  try {
    for (const event of events) {
      await deps.queue.push(event);
      enqueued++;
    }
  } catch (err: unknown) {
    throw new EnqueueError(enqueued, events.length, { cause: err });
  }

  return { status: 'enqueued', codec: codec.name, events: events.length };
}
