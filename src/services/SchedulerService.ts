import cron, { type ScheduledTask } from "node-cron";
import { Logger } from "../utils/logger";

export interface ScheduledJob {
  name: string;
  cronExpression: string;
  run: () => Promise<void>;
}

/**
 * Drives jobs on a timer. Jobs know nothing about scheduling; they expose a single run function.
 */
export interface Scheduler {
  schedule(job: ScheduledJob): void;
  stopAll(): void;
}

export interface CronSchedulerOptions {
  timezone?: string;
}

export class SchedulerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchedulerError";
    Object.setPrototypeOf(this, SchedulerError.prototype);
  }
}

interface RegisteredJob {
  job: ScheduledJob;
  task: ScheduledTask;
}

/**
 * node-cron backed scheduler allowing at most one concurrent run per job.
 * A tick that fires while the previous run is still going is skipped.
 */
export class CronScheduler implements Scheduler {
  private readonly jobs = new Map<string, RegisteredJob>();
  private readonly running = new Set<string>();
  private readonly stopped = new Set<string>();

  constructor(private readonly options: CronSchedulerOptions = {}) {}

  schedule(job: ScheduledJob): void {
    if (!cron.validate(job.cronExpression)) {
      throw new SchedulerError(`Invalid cron expression for job "${job.name}": "${job.cronExpression}"`);
    }
    if (this.jobs.has(job.name)) {
      throw new SchedulerError(`Job "${job.name}" is already scheduled`);
    }

    const task = cron.schedule(
      job.cronExpression,
      () => {
        void this.runNow(job.name);
      },
      { timezone: this.options.timezone },
    );
    this.jobs.set(job.name, { job, task });
    this.stopped.delete(job.name);

    Logger.info("Job scheduled", {
      job: job.name,
      cronExpression: job.cronExpression,
      timezone: this.options.timezone ?? "local",
    });
  }

  /**
   * Run a scheduled job outside its timer
   * @returns false when the run was skipped because one is already in progress or the job was stopped
   */
  async runNow(name: string): Promise<boolean> {
    if (this.stopped.has(name)) {
      Logger.warn("Skipping run, job has been stopped", { job: name });
      return false;
    }

    const registered = this.jobs.get(name);
    if (!registered) {
      throw new SchedulerError(`Job "${name}" is not scheduled`);
    }

    if (this.running.has(name)) {
      Logger.warn("Skipping run, previous run still in progress", { job: name });
      return false;
    }

    this.running.add(name);
    try {
      await Logger.trackOperation(`job:${name}`, () => registered.job.run());
    } catch (error) {
      // The next tick retries; the schedule itself keeps going
      Logger.error("Scheduled job failed", error, { job: name });
    } finally {
      this.running.delete(name);
    }
    return true;
  }

  isRunning(name: string): boolean {
    return this.running.has(name);
  }

  stopAll(): void {
    for (const [name, { task }] of this.jobs) {
      task.stop();
      this.stopped.add(name);
      Logger.info("Job stopped", { job: name });
    }
    this.jobs.clear();
  }
}
