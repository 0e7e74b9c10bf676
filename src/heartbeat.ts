#!/usr/bin/env node

/**
 * CLI entry point for the CRM heartbeat: appends a liveness line and a database ping line
 */

import { config } from "dotenv";
import { resolve } from "path";

config({ path: resolve(process.cwd(), ".env") });
config({ path: resolve(process.cwd(), ".env.local"), override: true });

process.env.LOG_LEVEL = process.env.LOG_LEVEL || "warn";

import { CommanderError } from "commander";
import { parseHeartbeatArgs, type HeartbeatCliOptions } from "./cli/heartbeatArgs";
import { executeHeartbeat, initializeServices } from "./cli/orchestration";
import { initializeEnvConfig } from "./config/env";
import { ErrorFormatter } from "./utils/errorFormatter";
import { Logger } from "./utils/logger";

async function main(): Promise<number> {
  let args: HeartbeatCliOptions;
  try {
    args = parseHeartbeatArgs();
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  try {
    const env = initializeEnvConfig();
    const services = initializeServices(env, { heartbeatLogPath: args.logFile });

    try {
      await executeHeartbeat(services);
    } finally {
      await services.connection.close();
    }
    return 0;
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    Logger.error("Heartbeat failed", failure);
    console.error(`\n${ErrorFormatter.formatAsString(failure, { step: "Heartbeat" })}\n`);
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
