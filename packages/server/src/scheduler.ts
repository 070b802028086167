// =============================================================================
// @tidewire/server: Cron scheduler for pipeline jobs
// =============================================================================
// Wraps node-cron to run the cycles on configurable schedules. Controlled
// via env vars: CRON_ENABLED (kill switch), plus per-job schedules. A job
// still running when its next tick fires is not started twice.
// =============================================================================

import cron from "node-cron";
import { errorMessage } from "@tidewire/shared";
import type { AppDependencies } from "./server.js";
import {
  runAnalyzeCycle,
  runMaintenance,
  runPublishCycle,
  runScrapeCycle,
} from "./tools/pipeline.js";

export interface SchedulerHandle {
  stop(): void;
}

export function startScheduler(deps: AppDependencies): SchedulerHandle {
  const { config, logger } = deps;
  const tasks: cron.ScheduledTask[] = [];

  if (!config.CRON_ENABLED) {
    logger.info("Cron scheduler disabled (CRON_ENABLED=false)");
    return { stop() {} };
  }

  const running = new Set<string>();

  function scheduleJob(
    name: string,
    schedule: string,
    job: () => Promise<unknown>,
  ): void {
    if (!cron.validate(schedule)) {
      logger.error(`Invalid cron expression for ${name}, job not scheduled`, { schedule });
      return;
    }
    const task = cron.schedule(
      schedule,
      async () => {
        if (running.has(name)) {
          logger.warn(`Cron job still running, tick skipped: ${name}`);
          return;
        }
        running.add(name);
        const start = performance.now();
        logger.info(`Cron job starting: ${name}`);
        try {
          const result = await job();
          const durationMs = Math.round(performance.now() - start);
          logger.info(`Cron job completed: ${name}`, { durationMs, result });
        } catch (err) {
          const durationMs = Math.round(performance.now() - start);
          logger.error(`Cron job failed: ${name}`, {
            durationMs,
            error: errorMessage(err),
          });
        } finally {
          running.delete(name);
        }
      },
      { timezone: "UTC" },
    );
    tasks.push(task);
  }

  scheduleJob("run_scrape", config.CRON_SCRAPE, () => runScrapeCycle(deps));
  scheduleJob("run_analyze", config.CRON_ANALYZE, () => runAnalyzeCycle(deps));
  scheduleJob("run_publish", config.CRON_PUBLISH, () => runPublishCycle(deps));
  scheduleJob("run_maintenance", config.CRON_MAINTENANCE, () => runMaintenance(deps));

  logger.info("Cron scheduler started", {
    schedules: {
      run_scrape: config.CRON_SCRAPE,
      run_analyze: config.CRON_ANALYZE,
      run_publish: config.CRON_PUBLISH,
      run_maintenance: config.CRON_MAINTENANCE,
    },
  });

  return {
    stop() {
      for (const t of tasks) t.stop();
      logger.info("Cron scheduler stopped");
    },
  };
}
