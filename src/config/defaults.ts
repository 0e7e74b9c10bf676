export const DEFAULT_RETENTION_DAYS = 365;
// 100 years; larger windows push the cutoff outside the Date range
export const MAX_RETENTION_DAYS = 36500;
export const DEFAULT_CLEANUP_LOG_PATH = "/tmp/customer_cleanup_log.txt";
export const DEFAULT_HEARTBEAT_LOG_PATH = "/tmp/crm_heartbeat_log.txt";
export const DEFAULT_DATABASE_CONNECTION_LIMIT = 10;

// Weekly, Sunday 02:00
export const DEFAULT_SWEEP_CRON = "0 2 * * 0";
export const DEFAULT_HEARTBEAT_CRON = "*/5 * * * *";
