#!/usr/bin/env node
import cron from "node-cron";
import { AppConfig, loadConfig } from "./config";
import { CalendarJobDeps, createCalendarJobDeps, runCalendarJob } from "./calendarJob";
import { logger } from "./logger";

async function runOnce(config: AppConfig, deps: CalendarJobDeps): Promise<boolean> {
  try {
    const result = await runCalendarJob(config, deps);
    logger.info(`Calendar saved to: ${result.outputPath}`);
    return true;
  } catch (error) {
    logger.error(
      `Failed to generate calendar: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
    return false;
  }
}

function startScheduler(
  config: AppConfig,
  deps: CalendarJobDeps,
  cronPattern: string
): void {
  let running = false;

  const tick = async (): Promise<void> => {
    if (running) {
      logger.warn("Previous run still in progress, skipping this tick");
      return;
    }
    running = true;
    try {
      await runOnce(config, deps);
    } finally {
      running = false;
    }
  };

  const schedule = cron.schedule(cronPattern, () => void tick(), {
    timezone: config.timezone,
  });

  logger.info(`Scheduler ready with pattern "${cronPattern}"`);
  logger.info(`Calendar will be written to ${config.outputPath}`);

  void tick();

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}. Shutting down scheduler...`);
    schedule.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

async function bootstrap(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    logger.error(`Configuration error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
    return;
  }
  logger.redact(config.uprn);

  const deps = createCalendarJobDeps(config);

  if (config.cronPattern) {
    startScheduler(config, deps, config.cronPattern);
    return;
  }

  const ok = await runOnce(config, deps);
  if (!ok) {
    process.exitCode = 1;
  }
}

bootstrap().catch((error) => {
  logger.error(`Unexpected failure: ${error instanceof Error ? error.message : String(error)}`, error);
  process.exitCode = 1;
});
