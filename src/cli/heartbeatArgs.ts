import { Command } from "commander";
import { sweeperVersion } from "../index";

export interface HeartbeatCliOptions {
  logFile?: string;
}

export function parseHeartbeatArgs(argv: readonly string[] = process.argv): HeartbeatCliOptions {
  const program = new Command();

  program
    .name("heartbeat")
    .description("Append a liveness line and a database ping result to the heartbeat log")
    .version(sweeperVersion, "-v, --version", "display version number")
    .option("--log-file <path>", "Override HEARTBEAT_LOG_PATH (default: /tmp/crm_heartbeat_log.txt)")
    .exitOverride();

  program.parse([...argv]);

  const options = program.opts<{ logFile?: string }>();
  return { logFile: options.logFile || undefined };
}
