/**
 * Local-time timestamp formats used by the audit log files.
 */

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * `YYYY-MM-DD HH:MM:SS` in local time
 */
export function formatLogTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * `DD/MM/YYYY-HH:MM:SS` in local time
 */
export function formatHeartbeatTimestamp(date: Date): string {
  const day = `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}
