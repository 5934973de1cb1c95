// pattern: Imperative Shell
import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";

export type AggregationScheduler = {
  readonly stop: () => void;
};

/**
 * Runs `runOnce` on every tick of the cron expression. A tick that arrives
 * while the previous run is still going is skipped rather than queued, so
 * two runs never write the cache at the same time.
 *
 * Errors thrown by a run are logged; the schedule keeps going.
 */
export function createAggregationScheduler(
  schedule: string,
  runOnce: () => Promise<void>,
  logger: Logger,
): AggregationScheduler {
  let running = false;

  const task: ScheduledTask = cron.schedule(schedule, async () => {
    if (running) {
      logger.warn({ schedule }, "previous aggregation still running, skipping tick");
      return;
    }

    running = true;
    try {
      await runOnce();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "scheduled aggregation failed");
    } finally {
      running = false;
    }
  });

  return {
    stop: () => {
      task.stop();
    },
  };
}
