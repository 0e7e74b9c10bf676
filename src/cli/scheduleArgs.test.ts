import { describe, expect, it, beforeEach, afterEach, vi } from "vitest";
import { CommanderError } from "commander";

import { parseScheduleArgs } from "./scheduleArgs";

describe("parseScheduleArgs", () => {
  beforeEach(() => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should leave schedules to the environment by default", () => {
    expect(parseScheduleArgs(["node", "schedule.ts"])).toEqual({
      sweepCron: undefined,
      heartbeatCron: undefined,
      timezone: undefined,
      heartbeat: true,
      runOnStart: false,
      noColor: false,
    });
  });

  it("should parse cron overrides and timezone", () => {
    const args = parseScheduleArgs([
      "node",
      "schedule.ts",
      "--sweep-cron",
      "0 3 * * 1",
      "--heartbeat-cron",
      "* * * * *",
      "--timezone",
      "Europe/London",
    ]);

    expect(args.sweepCron).toBe("0 3 * * 1");
    expect(args.heartbeatCron).toBe("* * * * *");
    expect(args.timezone).toBe("Europe/London");
  });

  it("should parse --no-heartbeat and --run-on-start", () => {
    const args = parseScheduleArgs(["node", "schedule.ts", "--no-heartbeat", "--run-on-start"]);

    expect(args.heartbeat).toBe(false);
    expect(args.runOnStart).toBe(true);
  });

  it("should reject a missing cron value", () => {
    expect(() => parseScheduleArgs(["node", "schedule.ts", "--sweep-cron"])).toThrow(CommanderError);
  });
});
