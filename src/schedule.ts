#!/usr/bin/env node

/**
 * Long-running scheduler: the retention sweep on SWEEP_CRON and the heartbeat on HEARTBEAT_CRON.
 * Stops on SIGINT/SIGTERM once in-flight runs have settled.
 */

import { config } from "dotenv";
import { resolve } from "path";

config({ path: resolve(process.cwd(), ".env") });
config({ path: resolve(process.cwd(), ".env.local"), override: true });

import { CommanderError } from "commander";
import { parseScheduleArgs, type ScheduleCliOptions } from "./cli/scheduleArgs";
import { initializeServices } from "./cli/orchestration";
import { initializeEnvConfig } from "./config/env";
import { CronScheduler } from "./services/SchedulerService";
import { setColorsEnabled } from "./utils/colors";
import { ErrorFormatter } from "./utils/errorFormatter";
import { Logger } from "./utils/logger";
import { OutputFormatter } from "./utils/outputFormatter";

const RETENTION_SWEEP_JOB = "retention-sweep";
const HEARTBEAT_JOB = "heartbeat";
const SHUTDOWN_POLL_MS = 200;

function waitForIdle(scheduler: CronScheduler, jobNames: string[]): Promise<void> {
  return new Promise((resolveIdle) => {
    const check = (): void => {
      if (jobNames.some((name) => scheduler.isRunning(name))) {
        setTimeout(check, SHUTDOWN_POLL_MS);
      } else {
        resolveIdle();
      }
    };
    check();
  });
}

async function main(): Promise<void> {
  let args: ScheduleCliOptions;
  try {
    args = parseScheduleArgs();
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exit(error.exitCode);
    }
    throw error;
  }

  if (args.noColor) {
    setColorsEnabled(false);
  }

  const env = initializeEnvConfig();
  const services = initializeServices(env);
  const scheduler = new CronScheduler({ timezone: args.timezone ?? env.SCHEDULER_TIMEZONE });
  const jobNames: string[] = [];

  try {
    scheduler.schedule({
      name: RETENTION_SWEEP_JOB,
      cronExpression: args.sweepCron ?? env.SWEEP_CRON,
      run: async () => {
        const response = await services.retentionSweepHandler.execute({ dryRun: false });
        Logger.info("Retention sweep finished", { runId: response.runId, deletedCount: response.deletedCount });
      },
    });
    jobNames.push(RETENTION_SWEEP_JOB);

    if (args.heartbeat) {
      scheduler.schedule({
        name: HEARTBEAT_JOB,
        cronExpression: args.heartbeatCron ?? env.HEARTBEAT_CRON,
        run: async () => {
          await services.heartbeatUseCase.execute();
        },
      });
      jobNames.push(HEARTBEAT_JOB);
    }
  } catch (error) {
    scheduler.stopAll();
    await services.connection.close();
    throw error;
  }

  console.log(OutputFormatter.success(`Scheduler started with ${OutputFormatter.count(jobNames.length, "job")}`));

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    Logger.info("Shutting down scheduler", { signal });
    scheduler.stopAll();

    waitForIdle(scheduler, jobNames)
      .then(() => services.connection.close())
      .then(() => {
        process.exit(0);
      })
      .catch((error) => {
        Logger.error("Scheduler shutdown failed", error);
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  if (args.runOnStart) {
    for (const name of jobNames) {
      if (shuttingDown) {
        break;
      }
      await scheduler.runNow(name);
    }
  }
}

main().catch((error) => {
  const failure = error instanceof Error ? error : new Error(String(error));
  Logger.error("Scheduler failed to start", failure);
  console.error(`\n${ErrorFormatter.formatAsString(failure, { step: "Scheduler startup" })}\n`);
  process.exit(1);
});
