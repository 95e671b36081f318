import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { admit } from '../../application/index.js';
import type { WorkerPool, WorkerSlot } from '../../application/index.js';

export interface AdmissionPluginOptions {
  pool: WorkerPool;
  /** Merged into every response, rejections included. */
  responseHeaders: Readonly<Record<string, string>>;
}

/**
 * Admission control, run before anything else touches the request.
 *
 * - Free worker slot → bound to the request as `request.workerSlot`.
 * - No free slot → 429 with an empty body. The body is never read and no
 *   slot is consumed.
 *
 * The slot goes back to the pool when the response is sent or the client
 * aborts. A route that takes the slot over (sets `request.workerSlot` to
 * null) becomes responsible for releasing it.
 */
async function admissionPlugin(fastify: FastifyInstance, opts: AdmissionPluginOptions): Promise<void> {
  const { pool, responseHeaders } = opts;

  fastify.decorateRequest('workerSlot', null);

  fastify.addHook('onRequest', async (request, reply) => {
    reply.headers(responseHeaders);

    const admission = admit(pool);
    if (!admission.accepted) {
      request.log.warn({ threads: pool.size }, 'All workers busy, rejecting request');
      return reply.code(429).send();
    }

    request.workerSlot = admission.slot;
  });

  fastify.addHook('onResponse', async (request) => {
    request.workerSlot?.release();
  });

  fastify.addHook('onRequestAbort', async (request) => {
    request.workerSlot?.release();
  });
}

export default fp(admissionPlugin, {
  name: 'admission',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyRequest {
    workerSlot: WorkerSlot | null;
  }
}
