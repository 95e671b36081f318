import Fastify from 'fastify';
import type { FastifyError } from 'fastify';
import { createServer } from 'node:http';
import { createServer as createHttpsServer } from 'node:https';
import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { CodecRegistry, EnqueueError, WorkerPool } from '../../application/index.js';
import type { Settings } from '../../application/index.js';
import { QueueClosedError } from '../../domain/index.js';
import type { EventQueue } from '../../domain/index.js';
import { credentialsFrom } from '../../infrastructure/index.js';
import type { TlsMaterial } from '../../infrastructure/index.js';
import admissionPlugin from './admission-plugin.js';
import authPlugin from './auth-plugin.js';
import ingestRoutes from './ingest-routes.js';

export interface IngestServerDeps {
  settings: Settings;
  queue: EventQueue;
  logger: Logger;
  /** Serve HTTPS with this keystore; plain HTTP when absent. */
  tls?: TlsMaterial | undefined;
}

/**
 * Builds the ingest endpoint. Does not listen.
 *
 * Order:
 * 1) Admission (worker slot or 429, response headers)
 * 2) Basic authentication
 * 3) Ingest route (decompress → decode → enqueue)
 *
 * Throws `ConfigurationError` if the settings name an unknown codec.
 */
export async function buildIngestServer(deps: IngestServerDeps) {
  const { settings, queue, logger, tls } = deps;

  const registry = new CodecRegistry({
    defaultCodec: settings.codec,
    overrides: settings.additional_codecs,
  });
  const pool = new WorkerPool(settings.threads);

  const fastify = Fastify({
    loggerInstance: logger,
    bodyLimit: settings.max_content_length,
    serverFactory: (handler) =>
      tls
        ? createHttpsServer({ pfx: tls.pfx, passphrase: tls.passphrase }, handler)
        : createServer(handler),
  });

  fastify.decorate('workerPool', pool);

  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof EnqueueError) {
      const closed = error.cause instanceof QueueClosedError;
      request.log.error(
        { err: error, enqueued: error.enqueued, total: error.total },
        'Enqueue failed',
      );
      return reply.code(closed ? 503 : 500).send(closed ? 'Queue is closed' : 'Internal Server Error');
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Request failed');
      return reply.code(500).send('Internal Server Error');
    }

    request.log.warn({ err: error, statusCode }, 'Request rejected');
    return reply.code(statusCode).send(error.message);
  });

  await fastify.register(admissionPlugin, {
    pool,
    responseHeaders: settings.response_headers,
  });
  await fastify.register(authPlugin, {
    credentials: credentialsFrom(settings),
  });
  await fastify.register(ingestRoutes, {
    registry,
    queue,
    successCode: settings.response_code,
    maxContentLength: settings.max_content_length,
  });

  return fastify;
}

export type IngestServer = Awaited<ReturnType<typeof buildIngestServer>>;

/**
 * Stops accepting requests and waits for in-flight workers.
 *
 * Resolves true once the listener is closed and every worker slot is free,
 * or false when `timeoutMs` passes first; the remaining requests are then
 * abandoned.
 */
export async function stopIngestServer(server: IngestServer, timeoutMs: number): Promise<boolean> {
  const drained = Promise.all([server.close(), server.workerPool.whenIdle()]).then(() => true);
  const stopped = await Promise.race([drained, delay(timeoutMs, false, { ref: false })]);

  if (!stopped) {
    server.log.warn({ busy: server.workerPool.busy, timeoutMs }, 'Stop timeout reached, abandoning in-flight requests');
  }
  return stopped;
}

declare module 'fastify' {
  interface FastifyInstance {
    workerPool: WorkerPool;
  }
}
