// pattern: Imperative Shell
import type { Logger } from "pino";

export type Stoppable = {
  readonly stop: () => void;
};

export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  /** Resolves once no aggregation run is in progress. */
  readonly idle: () => Promise<void>;
  readonly closeDb: () => void;
  readonly logger: Logger;
  readonly exit?: (code: number) => void;
};

/**
 * Builds the shutdown routine: stop the schedulers so no new run starts,
 * wait for a run in progress to finish its cache writes, close the cache
 * database, exit 0. Calls after the first are ignored and every step runs
 * even if an earlier one throws.
 */
export function createShutdown(deps: ShutdownDeps): (signal: string) => Promise<void> {
  let shuttingDown = false;
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  return async (signal) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      try {
        scheduler.stop();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error stopping scheduler");
      }
    }

    try {
      await deps.idle();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "in-flight aggregation ended with an error");
    }

    try {
      deps.closeDb();
      deps.logger.info("cache database closed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error closing cache database");
    }

    exit(0);
  };
}

export function registerShutdownHandlers(deps: ShutdownDeps): void {
  const shutdown = createShutdown(deps);
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}
