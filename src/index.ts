import pino from 'pino';
import { Redis } from 'ioredis';

import {
  BoundedQueue,
  RedisStreamQueue,
  createShutdown,
  loadSettingsFromEnv,
  loadTlsMaterial,
  startStdoutSink,
} from './infrastructure/index.js';

import { buildIngestServer, stopIngestServer } from './interfaces/http/index.js';
import type { IngestServer } from './interfaces/http/index.js';
import type { EventQueue } from './domain/index.js';

// stdout carries events when the stdout sink is active; logs go to stderr.
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' }, pino.destination(2));

/**
 * Bootstrap the ingest endpoint.
 *
 * Order:
 * 1) Settings + keystore (fail before anything binds)
 * 2) Shutdown routine (server first, then the queue)
 * 3) Downstream queue (Redis stream, or in-process queue drained to stdout)
 * 4) Fastify server
 * 5) Register shutdown hooks
 * 6) listen()
 */
async function main(): Promise<void> {

  const settings = loadSettingsFromEnv(process.env);
  const tls = loadTlsMaterial(settings);

  let server: IngestServer | undefined;
  let closeQueue: () => Promise<void> = async () => {};

  const shutdown = createShutdown(
    [
      async () => {
        if (server) await stopIngestServer(server, settings.stop_timeout_ms);
      },
      () => closeQueue(),
    ],
    { log },
  );

  // --------------------------------------------------
  // Downstream queue
  // --------------------------------------------------

  let queue: EventQueue;

  const redisUrl = process.env['REDIS_URL'];

  if (redisUrl) {
    const redis = new Redis(redisUrl, {
      maxRetriesPerRequest: null,
      enableReadyCheck: true,
      lazyConnect: true,
    });
    await redis.connect();
    log.info('Redis connected');

    queue = new RedisStreamQueue(redis, {
      streamKey: settings.stream_key,
      consumerGroup: settings.consumer_group,
      maxLength: settings.queue_capacity,
    });
    closeQueue = async () => {
      await redis.quit();
      log.info('Redis disconnected');
    };
  } else {
    const bounded = new BoundedQueue(settings.queue_capacity);
    // Nothing drains the queue once the sink is gone.
    const sink = startStdoutSink(bounded, log).catch((err: unknown) => {
      log.fatal({ err }, 'Stdout sink failed');
      void shutdown('stdout sink failed', 1);
    });
    queue = bounded;
    closeQueue = async () => {
      bounded.close();
      await sink;
    };
  }

  // --------------------------------------------------
  // HTTP server
  // --------------------------------------------------

  const ingestServer = await buildIngestServer({ settings, queue, logger: log, tls });
  server = ingestServer;

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await ingestServer.listen({
    host: settings.host,
    port: settings.port,
  });

  log.info(
    { threads: settings.threads, ssl: settings.ssl, codec: settings.codec },
    'Ingest endpoint ready',
  );
}

main().catch((err: unknown) => {

  log.fatal({ err }, 'Fatal: failed to start server');

  process.exit(1);

});
