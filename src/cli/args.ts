/**
 * CLI argument parsing
 */

import { Command, InvalidArgumentError } from "commander";
import { sweeperVersion } from "../index";
import { MAX_RETENTION_DAYS } from "../config/defaults";

export interface SweepCliOptions {
  dryRun: boolean;
  retentionDays?: number;
  logFile?: string;
  noColor: boolean;
}

interface SweepCommandOptions {
  dryRun?: boolean;
  retentionDays?: number;
  logFile?: string;
  color: boolean;
}

export function parseRetentionDays(value: string): number {
  const days = parsePositiveInteger(value);
  if (days > MAX_RETENTION_DAYS) {
    throw new InvalidArgumentError(`must be at most ${MAX_RETENTION_DAYS} days.`);
  }
  return days;
}

export function parsePositiveInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("must be a positive integer.");
  }
  const parsed = parseInt(value, 10);
  if (parsed <= 0) {
    throw new InvalidArgumentError("must be a positive integer.");
  }
  return parsed;
}

/**
 * Parse sweep arguments using commander.
 * Help, version and usage errors surface as a thrown CommanderError carrying the exit code.
 */
export function parseSweepArgs(argv: readonly string[] = process.argv): SweepCliOptions {
  const program = new Command();

  program
    .name("sweep")
    .description("Delete customers past the retention window who never placed an order")
    .version(sweeperVersion, "-v, --version", "display version number")
    .option("--dry-run", "Count the customers that would be deleted without deleting or logging")
    .option("--retention-days <days>", "Override RETENTION_DAYS (default: 365)", parseRetentionDays)
    .option("--log-file <path>", "Override CLEANUP_LOG_PATH (default: /tmp/customer_cleanup_log.txt)")
    .option("--no-color", "Disable colored output (useful for cron or non-TTY environments)")
    .exitOverride()
    .addHelpText(
      "after",
      `
Examples:
  Weekly run (cron):
    $ npm run sweep

  Preview how many customers would be removed:
    $ npm run sweep -- --dry-run

  Shorter window and a custom audit file:
    $ npm run sweep -- --retention-days 180 --log-file ./logs/cleanup.txt

Each completed run appends one line to the cleanup log:
  2026-10-19 02:00:00 - Deleted 3 inactive customers
      `,
    );

  program.parse([...argv]);

  const options = program.opts<SweepCommandOptions>();

  return {
    dryRun: options.dryRun || false,
    retentionDays: options.retentionDays,
    logFile: options.logFile || undefined,
    noColor: !options.color,
  };
}
