import { pino } from 'pino';
import type { Logger } from 'pino';
import { BoundedQueue, resolveSettings } from '../src/infrastructure/index.js';
import { buildIngestServer } from '../src/interfaces/http/index.js';
import type { SettingsInput } from '../src/application/index.js';
import type { IngestServer } from '../src/interfaces/http/index.js';

/** Logger that swallows everything. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** Builds the ingest server over an in-process queue. */
export async function buildTestServer(
  overrides: SettingsInput = {},
  queue: BoundedQueue = new BoundedQueue(100),
): Promise<{ server: IngestServer; queue: BoundedQueue }> {
  const settings = resolveSettings({ threads: 4, ...overrides });
  const server = await buildIngestServer({ settings, queue, logger: silentLogger() });
  return { server, queue };
}

export function basicAuth(user: string, password: string): string {
  return `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`;
}
