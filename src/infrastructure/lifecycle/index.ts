export { createShutdown } from './shutdown.js';
export type { ShutdownStep, ShutdownOptions } from './shutdown.js';
