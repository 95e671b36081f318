import type { Logger } from 'pino';

/** One teardown action, run in registration order. */
export type ShutdownStep = () => Promise<unknown>;

export interface ShutdownOptions {
  log: Logger;
  /** Defaults to `process.exit`. */
  exit?: ((code: number) => void) | undefined;
}

/**
 * Builds the process shutdown routine.
 *
 * Only the first call runs the steps; later calls (a second signal, a sink
 * failing during shutdown) get the same promise. Exits with `exitCode`, or 1
 * if a step throws.
 */
export function createShutdown(
  steps: readonly ShutdownStep[],
  options: ShutdownOptions,
): (reason: string, exitCode?: number) => Promise<void> {
  const { log } = options;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let running: Promise<void> | undefined;

  const run = async (reason: string, exitCode: number): Promise<void> => {
    log.info({ reason }, 'Shutting down');
    try {
      for (const step of steps) await step();
      log.info('Shutdown complete');
      exit(exitCode);
    } catch (err: unknown) {
      log.error({ err }, 'Shutdown error');
      exit(1);
    }
  };

  return (reason, exitCode = 0) => {
    if (!running) running = run(reason, exitCode);
    return running;
  };
}
