/**
 * Spinner for single long-running CLI steps such as the retention delete.
 */

import ora, { type Ora } from "ora";

import { OutputFormatter } from "./outputFormatter";

export interface ProgressOptions {
  /**
   * Whether to show a spinner (default: true). Plain lines are printed otherwise.
   */
  showSpinner?: boolean;
}

export class ProgressTracker {
  private spinner: Ora | null = null;
  private startTime = 0;
  private operation = "";
  private readonly showSpinner: boolean;

  constructor(options: ProgressOptions = {}) {
    this.showSpinner = options.showSpinner !== false;
  }

  /**
   * @param operation - e.g. "Deleting inactive customers"
   */
  start(operation: string): void {
    this.operation = operation;
    this.startTime = Date.now();

    if (this.showSpinner) {
      this.spinner = ora({ text: operation, spinner: "dots", color: "cyan" }).start();
    } else {
      console.log(`${operation}...`);
    }
  }

  complete(message?: string): void {
    const finalMessage = `${message || `${this.operation} complete`} (${OutputFormatter.duration(this.getElapsedTime())})`;

    if (this.spinner) {
      this.spinner.succeed(finalMessage);
      this.spinner = null;
    } else {
      console.log(finalMessage);
    }

    this.reset();
  }

  fail(message?: string): void {
    const errorMessage = message || `${this.operation} failed`;

    if (this.spinner) {
      this.spinner.fail(errorMessage);
      this.spinner = null;
    } else {
      console.error(errorMessage);
    }

    this.reset();
  }

  getElapsedTime(): number {
    return this.startTime > 0 ? Date.now() - this.startTime : 0;
  }

  private reset(): void {
    this.operation = "";
    this.startTime = 0;
  }
}
