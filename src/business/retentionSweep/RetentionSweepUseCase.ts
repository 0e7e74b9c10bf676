import { v4 as uuidv4 } from "uuid";

import type { CustomerRepository } from "../../repositories/interface/CustomerRepository";
import type { LogFileWriter } from "../../services/LogFileWriter";
import type { RetentionSweepConfig } from "../../config/sweepConfig";
import type { RetentionSweepRequest } from "../../shared/requests/RetentionSweepRequest";
import type { RetentionSweepResponse } from "../../shared/responses/RetentionSweepResponse";
import { formatLogTimestamp } from "../../utils/timestamp";
import { Logger } from "../../utils/logger";
import { MAX_RETENTION_DAYS } from "../../config/defaults";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export class RetentionSweepUseCaseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RetentionSweepUseCaseError";
    Object.setPrototypeOf(this, RetentionSweepUseCaseError.prototype);
  }
}

export function computeCutoff(now: Date, retentionDays: number): Date {
  return new Date(now.getTime() - retentionDays * MS_PER_DAY);
}

export function formatCleanupLogLine(completedAt: Date, deletedCount: number): string {
  return `${formatLogTimestamp(completedAt)} - Deleted ${deletedCount} inactive customers`;
}

/**
 * Deletes customers past the retention window that never placed an order, then
 * appends one audit line. The line is written only once the count is known, so a
 * failed store call leaves the cleanup log untouched.
 */
export class RetentionSweepUseCase {
  constructor(
    private readonly customerRepository: CustomerRepository,
    private readonly cleanupLog: LogFileWriter,
    private readonly config: RetentionSweepConfig,
    private readonly clock: () => Date = () => new Date(),
  ) {
    if (
      !Number.isInteger(config.retentionDays) ||
      config.retentionDays <= 0 ||
      config.retentionDays > MAX_RETENTION_DAYS
    ) {
      throw new RetentionSweepUseCaseError(
        `Retention window must be between 1 and ${MAX_RETENTION_DAYS} days, got ${config.retentionDays}`,
      );
    }
  }

  async execute(request: RetentionSweepRequest): Promise<RetentionSweepResponse> {
    const startTime = Date.now();
    const runId = uuidv4();
    const log = Logger.withContext({ runId });

    const cutoff = computeCutoff(this.clock(), this.config.retentionDays);
    const criteria = { createdBefore: cutoff };

    log.info("Starting retention sweep", {
      cutoff: cutoff.toISOString(),
      retentionDays: this.config.retentionDays,
      dryRun: request.dryRun,
    });

    if (request.dryRun) {
      const eligibleCount = await Logger.trackOperation(
        "countInactiveCustomers",
        () => this.customerRepository.countInactiveCustomers(criteria),
        { runId },
      );
      this.assertValidCount(eligibleCount);
      log.info("DRY RUN: Would delete inactive customers", { eligibleCount });

      return this.buildResponse(runId, cutoff, eligibleCount, null, true, startTime);
    }

    const deletedCount = await Logger.trackOperation(
      "deleteInactiveCustomers",
      () => this.customerRepository.deleteInactiveCustomers(criteria),
      { runId },
    );
    this.assertValidCount(deletedCount);

    // Deletion is committed at this point; a failed append leaves the run without an audit line
    const logLine = formatCleanupLogLine(this.clock(), deletedCount);
    try {
      await this.cleanupLog.append(logLine);
    } catch (error) {
      log.error("Inactive customers deleted but the cleanup log could not be written", error, {
        deletedCount,
        logPath: this.cleanupLog.path,
      });
      throw error;
    }

    log.info("Retention sweep completed", { deletedCount, logPath: this.cleanupLog.path });

    return this.buildResponse(runId, cutoff, deletedCount, logLine, false, startTime);
  }

  private assertValidCount(count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new RetentionSweepUseCaseError(`Customer store returned an invalid deleted count: ${count}`);
    }
  }

  private buildResponse(
    runId: string,
    cutoff: Date,
    deletedCount: number,
    logLine: string | null,
    dryRun: boolean,
    startTime: number,
  ): RetentionSweepResponse {
    return {
      runId,
      cutoff,
      retentionDays: this.config.retentionDays,
      deletedCount,
      dryRun,
      logLine,
      logPath: this.cleanupLog.path,
      durationMs: Date.now() - startTime,
    };
  }
}
