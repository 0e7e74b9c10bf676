/**
 * Structured logger for the maintenance jobs with operation tracking.
 * Writes one JSON object per line to the console; the audit log files are written separately.
 */

type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

interface OperationState {
  operationId: string;
  operation: string;
  startTime: number;
  context?: LogContext;
}

export interface ContextLogger {
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, error?: Error | unknown, context?: LogContext) => void;
  debug: (message: string, context?: LogContext) => void;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const activeOperations = new Map<string, OperationState>();

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const getLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
};

const shouldLog = (level: LogLevel): boolean => {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(getLogLevel());
};

function maskEmail(email: string): string {
  if (!email || !email.includes("@")) {
    return email;
  }
  const [local, domain] = email.split("@");
  if (local.length <= 2) {
    return `${local[0]}*@${domain}`;
  }
  return `${local.substring(0, 2)}***@${domain}`;
}

// Customer emails must not leak into operator logs
function maskPii(context: LogContext): LogContext {
  const masked: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (typeof value === "string" && (key.toLowerCase().includes("email") || value.includes("@"))) {
      masked[key] = maskEmail(value);
    } else {
      masked[key] = value;
    }
  }
  return masked;
}

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) {
    return undefined;
  }
  return cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
}

export class Logger {
  private static log(level: LogLevel, message: string, context?: LogContext): void {
    if (!shouldLog(level)) {
      return;
    }

    const logEntry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };
    if (context) {
      logEntry.context = maskPii(context);
    }

    if (level === "error") {
      console.error(JSON.stringify(logEntry));
    } else if (level === "warn") {
      console.warn(JSON.stringify(logEntry));
    } else {
      console.log(JSON.stringify(logEntry));
    }
  }

  static info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  static warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  static error(message: string, error?: Error | unknown, context?: LogContext): void {
    const errorContext: LogContext = {
      ...context,
      error:
        error instanceof Error
          ? { message: error.message, name: error.name, stack: error.stack, cause: describeCause(error.cause) }
          : String(error),
    };
    this.log("error", message, errorContext);
  }

  static debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  /**
   * Start tracking an operation
   * @param operation - Name of the operation (e.g., "deleteInactiveCustomers")
   * @returns Operation ID for {@link Logger.endOperation}
   */
  static startOperation(operation: string, context?: LogContext): string {
    const operationId = `${operation}-${Date.now()}-${Math.random().toString(36).substring(7)}`;

    activeOperations.set(operationId, {
      operationId,
      operation,
      startTime: Date.now(),
      context,
    });

    this.info(`Operation started: ${operation}`, {
      operationId,
      operation,
      ...context,
    });

    return operationId;
  }

  static endOperation(operationId: string, success: boolean, result?: LogContext): void {
    const operationState = activeOperations.get(operationId);
    if (!operationState) {
      this.warn(`Operation ${operationId} not found in tracking`, { operationId });
      return;
    }

    const duration = Date.now() - operationState.startTime;
    activeOperations.delete(operationId);

    const logContext: LogContext = {
      operationId,
      operation: operationState.operation,
      duration,
      success,
      ...operationState.context,
      ...result,
    };

    if (success) {
      this.info(`Operation completed: ${operationState.operation}`, logContext);
    } else {
      this.warn(`Operation failed: ${operationState.operation}`, logContext);
    }
  }

  /**
   * Logger bound to a base context, e.g. the run id of one sweep
   */
  static withContext(baseContext: LogContext): ContextLogger {
    const mergeContext = (context?: LogContext): LogContext => ({ ...baseContext, ...context });

    return {
      info: (message, context) => Logger.info(message, mergeContext(context)),
      warn: (message, context) => Logger.warn(message, mergeContext(context)),
      error: (message, error, context) => Logger.error(message, error, mergeContext(context)),
      debug: (message, context) => Logger.debug(message, mergeContext(context)),
    };
  }

  /**
   * Track an async operation with automatic start/end logging.
   * Errors are logged and rethrown.
   */
  static async trackOperation<T>(operation: string, fn: () => Promise<T>, context?: LogContext): Promise<T> {
    const operationId = this.startOperation(operation, context);
    try {
      const result = await fn();
      this.endOperation(operationId, true, { result: "success" });
      return result;
    } catch (error) {
      this.endOperation(operationId, false, { error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  }
}
