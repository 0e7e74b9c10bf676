export type RetentionSweepResponse = {
  runId: string;
  cutoff: Date;
  retentionDays: number;
  /** In a dry run, the number of customers that would be deleted */
  deletedCount: number;
  dryRun: boolean;
  /** Line appended to the cleanup log; null for dry runs */
  logLine: string | null;
  logPath: string;
  durationMs: number;
};
