import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { authenticate } from '../../application/index.js';
import type { BasicCredentials } from '../../application/index.js';

export interface AuthPluginOptions {
  credentials?: BasicCredentials | undefined;
}

/**
 * HTTP Basic authentication gate.
 *
 * Registered after admission so it runs inside a worker slot. Without
 * credentials it adds no hook at all. Every failure is the same bare 401.
 */
async function authPlugin(fastify: FastifyInstance, opts: AuthPluginOptions): Promise<void> {
  const { credentials } = opts;
  if (!credentials) return;

  fastify.addHook('onRequest', async (request, reply) => {
    if (authenticate(request.headers.authorization, credentials)) return;

    request.log.warn('Authentication failed');
    return reply.code(401).send();
  });
}

export default fp(authPlugin, {
  name: 'basic-auth',
  dependencies: ['admission'],
  fastify: '5.x',
});
