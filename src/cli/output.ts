/**
 * Output formatting functions for CLI
 */

import type { RetentionSweepResponse } from "../shared/responses/RetentionSweepResponse";
import type { HeartbeatResponse } from "../shared/responses/HeartbeatResponse";
import { OutputFormatter } from "../utils/outputFormatter";

export function displaySweepSummary(response: RetentionSweepResponse): void {
  const items: Array<{ label: string; value: string | number }> = [
    { label: "Run ID", value: response.runId },
    { label: "Retention Window", value: OutputFormatter.count(response.retentionDays, "day") },
    { label: "Cutoff", value: response.cutoff.toISOString() },
    { label: response.dryRun ? "Would Delete" : "Deleted", value: response.deletedCount },
    { label: "Log File", value: response.logLine === null ? `${response.logPath} (not written)` : response.logPath },
    { label: "Duration", value: OutputFormatter.duration(response.durationMs) },
  ];

  console.log();
  console.log(
    OutputFormatter.summary({
      title: response.dryRun
        ? OutputFormatter.header("DRY RUN MODE - No changes will be made", "🔍")
        : OutputFormatter.success("Retention sweep complete"),
      items,
    }),
  );

  if (response.logLine !== null) {
    console.log(response.logLine);
  }

  if (response.dryRun) {
    console.log(OutputFormatter.warning("DRY RUN - No actual changes were made"));
  }
  console.log();
}

export function displayHeartbeatResult(response: HeartbeatResponse): void {
  for (const line of response.lines) {
    console.log(line);
  }
  if (!response.databaseReachable) {
    console.log(OutputFormatter.warning("Database did not answer the ping"));
  }
}
