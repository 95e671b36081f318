import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ingest } from '../../application/index.js';
import type { CodecRegistry } from '../../application/index.js';
import type { EventQueue } from '../../domain/index.js';

export const DECOMPRESSION_FAILED_MESSAGE = 'Failed to decompress body';

export interface IngestRoutesOptions {
  registry: CodecRegistry;
  queue: EventQueue;
  /** Status sent once every event of the request is enqueued. */
  successCode: number;
  /** Raw and decompressed body limit, in bytes. */
  maxContentLength: number;
}

const EMPTY_BODY = Buffer.alloc(0);

/**
 * Registers the ingest route.
 *
 * POST|PUT /* — any path. The raw body is kept as a Buffer for every
 * content type; decompression and decoding happen in the handler, inside
 * the worker slot taken at admission.
 */
async function ingestRoutes(fastify: FastifyInstance, opts: IngestRoutesOptions): Promise<void> {
  const { registry, queue, successCode, maxContentLength } = opts;

  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser(
    '*',
    { parseAs: 'buffer', bodyLimit: maxContentLength },
    (_request, body, done) => {
      done(null, body);
    },
  );

  const handler = async (request: FastifyRequest, reply: FastifyReply) => {
    // The slot is held until the last push settles, even if the client
    // has gone away in the meantime.
    const slot = request.workerSlot;
    request.workerSlot = null;

    try {
      const outcome = await ingest(
        {
          remoteAddress: request.ip,
          contentType: request.headers['content-type'],
          contentEncoding: request.headers['content-encoding'],
          body: Buffer.isBuffer(request.body) ? request.body : EMPTY_BODY,
        },
        { registry, queue, maxDecompressedBytes: maxContentLength },
      );

      switch (outcome.status) {
        case 'decompression_failed':
          request.log.warn({ encoding: outcome.encoding, reason: outcome.reason }, 'Decompression failed');
          return reply.code(400).send(DECOMPRESSION_FAILED_MESSAGE);

        case 'decode_failed':
          request.log.warn({ codec: outcome.codec, reason: outcome.message }, 'Decode failed');
          return reply.code(400).send(`Failed to decode body as ${outcome.codec}: ${outcome.message}`);

        case 'enqueued':
          request.log.debug({ codec: outcome.codec, events: outcome.events }, 'Events enqueued');
          return successCode === 204 ? reply.code(204).send() : reply.code(successCode).send('ok');
      }
    } finally {
      slot?.release();
    }
  };

  fastify.route({ method: ['POST', 'PUT'], url: '/', handler });
  fastify.route({ method: ['POST', 'PUT'], url: '/*', handler });
}

export default fp(ingestRoutes, {
  name: 'ingest-routes',
  dependencies: ['admission'],
  fastify: '5.x',
});
