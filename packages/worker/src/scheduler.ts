// =============================================================================
// @paper-courier/worker — Cron scheduler for the digest job
// =============================================================================
// Wraps node-cron to run the digest on CRON_SCHEDULE when CRON_ENABLED is set.
// Runs never overlap: a tick that fires while a run is still in progress is
// skipped. Returns a handle with stop() for graceful shutdown.
// =============================================================================

import cron from "node-cron";
import type { Config, Logger } from "@paper-courier/shared";

export interface SchedulerHandle {
  stop(): void;
}

export function startScheduler(
  config: Pick<Config, "CRON_SCHEDULE">,
  logger: Logger,
  job: () => Promise<unknown>,
): SchedulerHandle {
  if (!cron.validate(config.CRON_SCHEDULE)) {
    throw new Error(`Invalid CRON_SCHEDULE: ${config.CRON_SCHEDULE}`);
  }

  let running = false;
  const task = cron.schedule(config.CRON_SCHEDULE, async () => {
    if (running) {
      logger.warn("Previous digest still running, skipping tick");
      return;
    }
    running = true;
    const start = performance.now();
    logger.info("Cron job starting: digest");
    try {
      const result = await job();
      const durationMs = Math.round(performance.now() - start);
      logger.info("Cron job completed: digest", { durationMs, result });
    } catch (err) {
      const durationMs = Math.round(performance.now() - start);
      logger.error("Cron job failed: digest", {
        durationMs,
        error: err instanceof Error ? err.message : String(err),
      });
    } finally {
      running = false;
    }
  });

  logger.info("Cron scheduler started", { schedule: config.CRON_SCHEDULE });

  return {
    stop() {
      task.stop();
      logger.info("Cron scheduler stopped");
    },
  };
}
