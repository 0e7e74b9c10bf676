/**
 * Orchestration for the sweep and heartbeat commands
 */

import type { EnvConfig } from "../config/env";
import { buildRetentionSweepConfig, type RetentionSweepConfig } from "../config/sweepConfig";
import { createDatabaseConnection, type DatabaseConnection } from "../repositories/drizzle/database";
import { CustomerDrizzleRepository } from "../repositories/drizzle/CustomerDrizzleRepository";
import type { CustomerRepository } from "../repositories/interface/CustomerRepository";
import { LogFileWriter } from "../services/LogFileWriter";
import { RetentionSweepUseCase } from "../business/retentionSweep/RetentionSweepUseCase";
import { RetentionSweepHandler } from "../business/retentionSweep/RetentionSweepHandler";
import { HeartbeatUseCase } from "../business/heartbeat/HeartbeatUseCase";
import type { RetentionSweepResponse } from "../shared/responses/RetentionSweepResponse";
import type { HeartbeatResponse } from "../shared/responses/HeartbeatResponse";
import { ProgressTracker } from "../utils/progress";
import { OutputFormatter } from "../utils/outputFormatter";
import { displayHeartbeatResult, displaySweepSummary } from "./output";

/**
 * Service dependencies container
 */
export interface ServiceDependencies {
  connection: DatabaseConnection;
  customerRepository: CustomerRepository;
  sweepConfig: RetentionSweepConfig;
  retentionSweepHandler: RetentionSweepHandler;
  heartbeatUseCase: HeartbeatUseCase;
}

export interface ServiceOverrides {
  retentionDays?: number;
  cleanupLogPath?: string;
  heartbeatLogPath?: string;
}

/**
 * Initialize all services and handlers. The caller owns the connection and must close it.
 */
export function initializeServices(env: EnvConfig, overrides: ServiceOverrides = {}): ServiceDependencies {
  const connection = createDatabaseConnection(env.DATABASE_URL, { maxConnections: env.DATABASE_CONNECTION_LIMIT });
  const customerRepository = new CustomerDrizzleRepository(connection.db);

  const sweepConfig = buildRetentionSweepConfig(env, {
    retentionDays: overrides.retentionDays,
    logPath: overrides.cleanupLogPath,
  });
  const retentionSweepUseCase = new RetentionSweepUseCase(
    customerRepository,
    new LogFileWriter(sweepConfig.logPath),
    sweepConfig,
  );
  const retentionSweepHandler = new RetentionSweepHandler(retentionSweepUseCase);

  const heartbeatUseCase = new HeartbeatUseCase(
    customerRepository,
    new LogFileWriter(overrides.heartbeatLogPath ?? env.HEARTBEAT_LOG_PATH),
  );

  return { connection, customerRepository, sweepConfig, retentionSweepHandler, heartbeatUseCase };
}

export interface SweepExecutionOptions {
  dryRun: boolean;
  showSpinner: boolean;
}

/**
 * Run one sweep with console feedback. Errors are rethrown after the spinner is failed.
 */
export async function executeSweep(
  services: Pick<ServiceDependencies, "retentionSweepHandler" | "sweepConfig">,
  options: SweepExecutionOptions,
): Promise<RetentionSweepResponse> {
  if (options.dryRun) {
    console.log(OutputFormatter.header("DRY RUN MODE - No changes will be made", "🔍"));
  } else {
    console.log(OutputFormatter.header("Retention Sweep", "🧹"));
  }
  console.log(OutputFormatter.separator());
  console.log(
    OutputFormatter.info(
      `Removing customers older than ${OutputFormatter.count(services.sweepConfig.retentionDays, "day")} with no orders`,
    ),
  );

  const operation = options.dryRun ? "Counting inactive customers" : "Deleting inactive customers";
  const progressTracker = new ProgressTracker({ showSpinner: options.showSpinner });
  progressTracker.start(operation);

  let response: RetentionSweepResponse;
  try {
    response = await services.retentionSweepHandler.execute({ dryRun: options.dryRun });
  } catch (error) {
    progressTracker.fail(`${operation} failed`);
    throw error;
  }

  const verb = options.dryRun ? "Would delete" : "Deleted";
  progressTracker.complete(`${verb} ${OutputFormatter.count(response.deletedCount, "inactive customer")}`);

  displaySweepSummary(response);
  return response;
}

export async function executeHeartbeat(
  services: Pick<ServiceDependencies, "heartbeatUseCase">,
): Promise<HeartbeatResponse> {
  const response = await services.heartbeatUseCase.execute();
  displayHeartbeatResult(response);
  return response;
}
