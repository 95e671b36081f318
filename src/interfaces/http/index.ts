export { buildIngestServer, stopIngestServer } from './server.js';
export type { IngestServer, IngestServerDeps } from './server.js';
export { DECOMPRESSION_FAILED_MESSAGE } from './ingest-routes.js';
