#!/usr/bin/env node

/**
 * CLI entry point for the weekly retention sweep
 *
 * 1. Loads .env / .env.local and validates the environment
 * 2. Deletes customers past the retention window with no orders
 * 3. Appends one line to the cleanup log
 */

import { config } from "dotenv";
import { resolve } from "path";

// Load .env first, then .env.local (which will override .env values)
config({ path: resolve(process.cwd(), ".env") });
config({ path: resolve(process.cwd(), ".env.local"), override: true });

// Suppress verbose logging during normal operations (show only warnings/errors)
process.env.LOG_LEVEL = process.env.LOG_LEVEL || "warn";

import { CommanderError } from "commander";
import { parseSweepArgs, type SweepCliOptions } from "./cli/args";
import { executeSweep, initializeServices } from "./cli/orchestration";
import { initializeEnvConfig } from "./config/env";
import { setColorsEnabled } from "./utils/colors";
import { ErrorFormatter } from "./utils/errorFormatter";
import { Logger } from "./utils/logger";

async function main(): Promise<number> {
  let args: SweepCliOptions;
  try {
    args = parseSweepArgs();
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  if (args.noColor) {
    setColorsEnabled(false);
  }

  try {
    const env = initializeEnvConfig();
    const services = initializeServices(env, { retentionDays: args.retentionDays, cleanupLogPath: args.logFile });

    try {
      await executeSweep(services, {
        dryRun: args.dryRun,
        showSpinner: Boolean(process.stdout.isTTY) && !args.noColor,
      });
    } finally {
      await services.connection.close();
    }
    return 0;
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    Logger.error("Retention sweep failed", failure);
    console.error(`\n${ErrorFormatter.formatAsString(failure, { step: "Retention sweep" })}\n`);

    if (failure.stack && process.env.NODE_ENV === "development") {
      console.error(`Stack trace:\n${failure.stack}\n`);
    }
    return 1;
  }
}

main()
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error) => {
    console.error("Unhandled error:", error);
    process.exit(1);
  });
