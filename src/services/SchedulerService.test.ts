import { describe, expect, it, vi, beforeEach, afterEach } from "vitest";

const { scheduleMock, validateMock, stopMock } = vi.hoisted(() => ({
  scheduleMock: vi.fn(),
  validateMock: vi.fn(),
  stopMock: vi.fn(),
}));

vi.mock("node-cron", () => {
  const api = { schedule: scheduleMock, validate: validateMock };
  return { ...api, default: api };
});

import { CronScheduler, SchedulerError, type ScheduledJob } from "./SchedulerService";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe("CronScheduler", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    scheduleMock.mockReset().mockReturnValue({ stop: stopMock });
    validateMock.mockReset().mockReturnValue(true);
    stopMock.mockReset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function job(overrides: Partial<ScheduledJob> = {}): ScheduledJob {
    return {
      name: "retention-sweep",
      cronExpression: "0 2 * * 0",
      run: vi.fn().mockResolvedValue(undefined),
      ...overrides,
    };
  }

  describe("schedule", () => {
    it("should register the job with node-cron and the configured timezone", () => {
      const scheduler = new CronScheduler({ timezone: "UTC" });

      scheduler.schedule(job());

      expect(validateMock).toHaveBeenCalledWith("0 2 * * 0");
      expect(scheduleMock).toHaveBeenCalledWith("0 2 * * 0", expect.any(Function), { timezone: "UTC" });
    });

    it("should reject invalid cron expressions", () => {
      validateMock.mockReturnValue(false);
      const scheduler = new CronScheduler();

      expect(() => scheduler.schedule(job({ cronExpression: "every sunday" }))).toThrow(SchedulerError);
      expect(() => scheduler.schedule(job({ cronExpression: "every sunday" }))).toThrow(
        'Invalid cron expression for job "retention-sweep": "every sunday"',
      );
      expect(scheduleMock).not.toHaveBeenCalled();
    });

    it("should reject a second job with the same name", () => {
      const scheduler = new CronScheduler();
      scheduler.schedule(job());

      expect(() => scheduler.schedule(job())).toThrow('Job "retention-sweep" is already scheduled');
    });

    it("should run the job when the cron tick fires", async () => {
      const scheduled = job();
      const scheduler = new CronScheduler();
      scheduler.schedule(scheduled);

      const tick = scheduleMock.mock.calls[0][1];
      tick();

      await vi.waitFor(() => expect(scheduler.isRunning("retention-sweep")).toBe(false));
      expect(scheduled.run).toHaveBeenCalledTimes(1);
    });
  });

  describe("runNow", () => {
    it("should skip a run while the previous one is in progress", async () => {
      const pending = deferred();
      const scheduled = job({ run: vi.fn(() => pending.promise) });
      const scheduler = new CronScheduler();
      scheduler.schedule(scheduled);

      const first = scheduler.runNow("retention-sweep");
      const second = await scheduler.runNow("retention-sweep");

      expect(second).toBe(false);
      expect(scheduler.isRunning("retention-sweep")).toBe(true);

      pending.resolve();

      expect(await first).toBe(true);
      expect(scheduler.isRunning("retention-sweep")).toBe(false);
      expect(scheduled.run).toHaveBeenCalledTimes(1);
    });

    it("should allow a new run once the previous one finished", async () => {
      const scheduled = job();
      const scheduler = new CronScheduler();
      scheduler.schedule(scheduled);

      await scheduler.runNow("retention-sweep");
      await scheduler.runNow("retention-sweep");

      expect(scheduled.run).toHaveBeenCalledTimes(2);
    });

    it("should log job failures and release the job", async () => {
      const scheduled = job({ run: vi.fn().mockRejectedValue(new Error("Database unreachable")) });
      const scheduler = new CronScheduler();
      scheduler.schedule(scheduled);

      await expect(scheduler.runNow("retention-sweep")).resolves.toBe(true);

      expect(scheduler.isRunning("retention-sweep")).toBe(false);
      const entry = JSON.parse(vi.mocked(console.error).mock.calls[0][0]);
      expect(entry).toMatchObject({ message: "Scheduled job failed", context: { job: "retention-sweep" } });
    });

    it("should reject unknown job names", async () => {
      const scheduler = new CronScheduler();

      await expect(scheduler.runNow("missing")).rejects.toThrow('Job "missing" is not scheduled');
    });
  });

  describe("stopAll", () => {
    it("should stop every task and forget the jobs", async () => {
      const scheduler = new CronScheduler();
      scheduler.schedule(job());
      scheduler.schedule(job({ name: "heartbeat", cronExpression: "*/5 * * * *" }));

      scheduler.stopAll();

      expect(stopMock).toHaveBeenCalledTimes(2);
      await expect(scheduler.runNow("heartbeat")).resolves.toBe(false);
    });

    it("should skip the remaining jobs when stopped from inside a run", async () => {
      const scheduler = new CronScheduler();
      const heartbeat = job({ name: "heartbeat", cronExpression: "*/5 * * * *" });
      scheduler.schedule(
        job({
          run: vi.fn(async () => {
            scheduler.stopAll();
          }),
        }),
      );
      scheduler.schedule(heartbeat);

      expect(await scheduler.runNow("retention-sweep")).toBe(true);
      expect(await scheduler.runNow("heartbeat")).toBe(false);

      expect(heartbeat.run).not.toHaveBeenCalled();
      expect(scheduler.isRunning("retention-sweep")).toBe(false);
    });

    it("should accept a job scheduled again after a stop", async () => {
      const scheduler = new CronScheduler();
      scheduler.schedule(job());
      scheduler.stopAll();

      const rescheduled = job();
      scheduler.schedule(rescheduled);

      expect(await scheduler.runNow("retention-sweep")).toBe(true);
      expect(rescheduled.run).toHaveBeenCalledTimes(1);
    });
  });
});
