import { z } from "zod";
import { Logger } from "../utils/logger";
import {
  DEFAULT_CLEANUP_LOG_PATH,
  DEFAULT_DATABASE_CONNECTION_LIMIT,
  DEFAULT_HEARTBEAT_CRON,
  DEFAULT_HEARTBEAT_LOG_PATH,
  DEFAULT_RETENTION_DAYS,
  DEFAULT_SWEEP_CRON,
  MAX_RETENTION_DAYS,
} from "./defaults";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

// Schema for raw env vars (before numeric processing)
const rawEnvSchema = z.object({
  DATABASE_URL: z.string().url(),
  DATABASE_CONNECTION_LIMIT: optionalString,
  RETENTION_DAYS: optionalString,
  CLEANUP_LOG_PATH: optionalString,
  HEARTBEAT_LOG_PATH: optionalString,
  SWEEP_CRON: optionalString,
  HEARTBEAT_CRON: optionalString,
  SCHEDULER_TIMEZONE: optionalString,
});

const envSchema = z.object({
  DATABASE_URL: z.string().url(),
  DATABASE_CONNECTION_LIMIT: z.number().int().positive(),
  RETENTION_DAYS: z.number().int().positive().max(MAX_RETENTION_DAYS),
  CLEANUP_LOG_PATH: z.string().min(1),
  HEARTBEAT_LOG_PATH: z.string().min(1),
  SWEEP_CRON: z.string().min(1),
  HEARTBEAT_CRON: z.string().min(1),
  SCHEDULER_TIMEZONE: z.string().optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

let cachedConfig: EnvConfig | null = null;

function parsePositiveInteger(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  const parsed = parseInt(value, 10);
  return parsed > 0 ? parsed : null;
}

function resolveConnectionLimit(value: string | undefined): number {
  if (value === undefined) {
    return DEFAULT_DATABASE_CONNECTION_LIMIT;
  }
  const parsed = parsePositiveInteger(value);
  if (parsed === null) {
    Logger.warn("Invalid DATABASE_CONNECTION_LIMIT value, using default", {
      providedValue: value,
      defaultValue: DEFAULT_DATABASE_CONNECTION_LIMIT,
    });
    return DEFAULT_DATABASE_CONNECTION_LIMIT;
  }
  return parsed;
}

/**
 * A bad retention window changes which customers get deleted, so unlike the pool size it never falls back.
 */
function resolveRetentionDays(value: string | undefined): number {
  if (value === undefined) {
    return DEFAULT_RETENTION_DAYS;
  }
  const parsed = parsePositiveInteger(value);
  if (parsed === null || parsed > MAX_RETENTION_DAYS) {
    throw new Error(
      `Invalid RETENTION_DAYS value "${value}": must be a positive integer number of days, at most ${MAX_RETENTION_DAYS}.`,
    );
  }
  return parsed;
}

/**
 * Validate the environment and cache the result.
 * Call once at startup, after dotenv has loaded the .env files.
 */
export function initializeEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  if (cachedConfig) {
    Logger.debug("Config already initialized, using cached config");
    return cachedConfig;
  }

  const rawResult = rawEnvSchema.safeParse(env);
  if (!rawResult.success) {
    const missingVars = rawResult.error.errors.map((err) => err.path.join(".")).join(", ");
    throw new Error(`Missing or invalid required environment variables: ${missingVars}. Please check your .env files.`);
  }

  const raw = rawResult.data;
  const result = envSchema.safeParse({
    DATABASE_URL: raw.DATABASE_URL,
    DATABASE_CONNECTION_LIMIT: resolveConnectionLimit(raw.DATABASE_CONNECTION_LIMIT),
    RETENTION_DAYS: resolveRetentionDays(raw.RETENTION_DAYS),
    CLEANUP_LOG_PATH: raw.CLEANUP_LOG_PATH ?? DEFAULT_CLEANUP_LOG_PATH,
    HEARTBEAT_LOG_PATH: raw.HEARTBEAT_LOG_PATH ?? DEFAULT_HEARTBEAT_LOG_PATH,
    SWEEP_CRON: raw.SWEEP_CRON ?? DEFAULT_SWEEP_CRON,
    HEARTBEAT_CRON: raw.HEARTBEAT_CRON ?? DEFAULT_HEARTBEAT_CRON,
    SCHEDULER_TIMEZONE: raw.SCHEDULER_TIMEZONE,
  });

  if (!result.success) {
    const invalidVars = result.error.errors.map((err) => err.path.join(".")).join(", ");
    throw new Error(`Missing or invalid required environment variables: ${invalidVars}. Please check your .env files.`);
  }

  cachedConfig = result.data;
  Logger.info("Environment configuration initialized", {
    retentionDays: cachedConfig.RETENTION_DAYS,
    cleanupLogPath: cachedConfig.CLEANUP_LOG_PATH,
  });

  return cachedConfig;
}

/**
 * Get the cached environment configuration
 *
 * @throws Error if called before initializeEnvConfig()
 */
export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    throw new Error(
      "Environment configuration not initialized. " + "Call initializeEnvConfig() before using getEnvConfig().",
    );
  }

  return cachedConfig;
}
