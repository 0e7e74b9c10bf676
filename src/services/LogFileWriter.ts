import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";

export class LogFileWriteError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly reason: string,
  ) {
    super(`Failed to append to log file ${filePath}: ${reason}`);
    this.name = "LogFileWriteError";
    Object.setPrototypeOf(this, LogFileWriteError.prototype);
  }
}

/**
 * Append-only writer for flat audit log files. Lines already in the file are never rewritten.
 */
export class LogFileWriter {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async append(line: string): Promise<void> {
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, `${line}\n`, { encoding: "utf-8", flag: "a" });
    } catch (error) {
      throw new LogFileWriteError(this.filePath, error instanceof Error ? error.message : String(error));
    }
  }
}
