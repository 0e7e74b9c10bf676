import { DEFAULT_CLEANUP_LOG_PATH, DEFAULT_RETENTION_DAYS } from "./defaults";
import type { EnvConfig } from "./env";

/**
 * Settings of one retention sweep, fixed when the use case is constructed.
 */
export interface RetentionSweepConfig {
  /** Customers older than this with no orders are removed */
  retentionDays: number;
  /** Append-only audit file receiving one line per run */
  logPath: string;
}

export const DEFAULT_RETENTION_SWEEP_CONFIG: Readonly<RetentionSweepConfig> = Object.freeze({
  retentionDays: DEFAULT_RETENTION_DAYS,
  logPath: DEFAULT_CLEANUP_LOG_PATH,
});

/**
 * CLI overrides win over the environment, which wins over the defaults.
 */
export function buildRetentionSweepConfig(
  env: Partial<Pick<EnvConfig, "RETENTION_DAYS" | "CLEANUP_LOG_PATH">>,
  overrides: Partial<RetentionSweepConfig> = {},
): RetentionSweepConfig {
  return {
    retentionDays: overrides.retentionDays ?? env.RETENTION_DAYS ?? DEFAULT_RETENTION_SWEEP_CONFIG.retentionDays,
    logPath: overrides.logPath ?? env.CLEANUP_LOG_PATH ?? DEFAULT_RETENTION_SWEEP_CONFIG.logPath,
  };
}
