import { Command } from "commander";
import { sweeperVersion } from "../index";

export interface ScheduleCliOptions {
  sweepCron?: string;
  heartbeatCron?: string;
  timezone?: string;
  heartbeat: boolean;
  runOnStart: boolean;
  noColor: boolean;
}

interface ScheduleCommandOptions {
  sweepCron?: string;
  heartbeatCron?: string;
  timezone?: string;
  heartbeat: boolean;
  runOnStart?: boolean;
  color: boolean;
}

export function parseScheduleArgs(argv: readonly string[] = process.argv): ScheduleCliOptions {
  const program = new Command();

  program
    .name("schedule")
    .description("Run the retention sweep and the heartbeat on their cron schedules until stopped")
    .version(sweeperVersion, "-v, --version", "display version number")
    .option("--sweep-cron <expression>", 'Override SWEEP_CRON (default: "0 2 * * 0", Sundays at 02:00)')
    .option("--heartbeat-cron <expression>", 'Override HEARTBEAT_CRON (default: "*/5 * * * *")')
    .option("--timezone <zone>", "Override SCHEDULER_TIMEZONE (default: server local time)")
    .option("--no-heartbeat", "Do not schedule the heartbeat job")
    .option("--run-on-start", "Run every scheduled job once at startup")
    .option("--no-color", "Disable colored output")
    .exitOverride();

  program.parse([...argv]);

  const options = program.opts<ScheduleCommandOptions>();

  return {
    sweepCron: options.sweepCron,
    heartbeatCron: options.heartbeatCron,
    timezone: options.timezone,
    heartbeat: options.heartbeat,
    runOnStart: options.runOnStart || false,
    noColor: !options.color,
  };
}
