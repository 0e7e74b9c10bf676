/**
 * Error formatting utility for operator-facing failure messages
 * with context and recovery steps.
 */

import { InputValidationError } from "../shared/errors/InputValidationError";
import {
  CustomerRepositoryError,
  CustomerRepositoryErrorType,
} from "../repositories/errors/CustomerRepositoryError";
import { LogFileWriteError } from "../services/LogFileWriter";
import { SchedulerError } from "../services/SchedulerService";
import { RetentionSweepUseCaseError } from "../business/retentionSweep/RetentionSweepUseCase";

export interface ErrorContext {
  /**
   * Step/operation where error occurred (e.g., "Retention sweep")
   */
  step?: string;
  runId?: string;
  job?: string;
  [key: string]: unknown;
}

export interface FormattedError {
  message: string;
  suggestions: string[];
  context?: string;
  structured?: {
    what: string;
    why: string;
    whatToDo: string[];
  };
}

export class ErrorFormatter {
  static format(error: Error, context?: ErrorContext): FormattedError {
    const structured = this.getStructuredDetails(error);

    return {
      message: this.getBaseMessage(error, context),
      suggestions: structured ? structured.whatToDo : this.getGenericSuggestions(),
      context: this.formatContext(context) || undefined,
      structured,
    };
  }

  /**
   * Format error as a single string for console output
   */
  static formatAsString(error: Error, context?: ErrorContext): string {
    const formatted = this.format(error, context);
    const parts: string[] = [];

    if (formatted.context) {
      parts.push(`📍 ${formatted.context}`);
    }

    parts.push(`❌ ${formatted.message}`);

    if (formatted.structured) {
      parts.push("");
      parts.push(`What happened: ${formatted.structured.what}`);
      parts.push(`Why: ${formatted.structured.why}`);
      parts.push("What to do:");
      formatted.structured.whatToDo.forEach((step, index) => {
        parts.push(`  ${index + 1}. ${step}`);
      });
    } else {
      parts.push("\n💡 Suggestions:");
      for (const suggestion of formatted.suggestions) {
        parts.push(`   • ${suggestion}`);
      }
    }

    return parts.join("\n");
  }

  private static getBaseMessage(error: Error, context?: ErrorContext): string {
    if (error instanceof LogFileWriteError) {
      return `Cleanup log not written: ${error.message}`;
    }

    return context?.step ? `${context.step}: ${error.message}` : error.message;
  }

  private static getStructuredDetails(error: Error): FormattedError["structured"] {
    if (error instanceof CustomerRepositoryError) {
      return this.getRepositoryDetails(error);
    }

    if (error instanceof LogFileWriteError) {
      return {
        what: "Inactive customers were deleted but the audit line could not be appended",
        why: error.reason,
        whatToDo: [
          `Check that the directory of ${error.filePath} exists and is writable by this user`,
          "Check free disk space on the log volume",
          "Add the missing audit line by hand; the deletion is already committed and is not rolled back",
        ],
      };
    }

    if (error instanceof InputValidationError) {
      return {
        what: "Run options failed validation",
        why: "The request passed to the job does not match the expected shape",
        whatToDo: ["Run with --help to see the accepted options", "Remove unknown options from the command line"],
      };
    }

    if (error instanceof SchedulerError) {
      return {
        what: "A job could not be scheduled",
        why: error.message,
        whatToDo: [
          "Check SWEEP_CRON and HEARTBEAT_CRON use five or six cron fields",
          "Check SCHEDULER_TIMEZONE is an IANA zone name such as Europe/London",
        ],
      };
    }

    if (error instanceof RetentionSweepUseCaseError) {
      return {
        what: "Retention sweep refused to run or to log its result",
        why: error.message,
        whatToDo: [
          "Set RETENTION_DAYS or --retention-days to a whole number of days between 1 and 36500",
          "If the store returned an invalid count, check the database driver version",
        ],
      };
    }

    return undefined;
  }

  private static getRepositoryDetails(error: CustomerRepositoryError): FormattedError["structured"] {
    switch (error.type) {
      case CustomerRepositoryErrorType.CONNECTION_FAILED:
        return {
          what: "The customer database could not be reached",
          why: error.databaseErrorCode
            ? `Connection failed with ${error.databaseErrorCode}`
            : "Connection to the database failed",
          whatToDo: [
            "Check DATABASE_URL host, port and credentials",
            "Check the database is running and accepts connections from this host",
            "Nothing was deleted and no log line was written; rerun once the database is back",
          ],
        };
      case CustomerRepositoryErrorType.FOREIGN_KEY_VIOLATION:
        return {
          what: "An order was created for a customer while the sweep was deleting it",
          why: "The database rejected the delete to keep the order linked to its customer",
          whatToDo: ["Rerun the sweep; the whole delete was rolled back"],
        };
      case CustomerRepositoryErrorType.SERIALIZATION_FAILURE:
        return {
          what: "The delete conflicted with a concurrent transaction",
          why: "The database aborted the statement to keep the data consistent",
          whatToDo: ["Rerun the sweep; the whole delete was rolled back"],
        };
      case CustomerRepositoryErrorType.UNKNOWN_DATABASE_ERROR:
        return {
          what: `Unexpected database error during ${error.context}`,
          why: this.withCause(
            error.databaseErrorCode ? `Database returned ${error.databaseErrorCode}` : "Database returned an error",
            error.cause,
          ),
          whatToDo: [
            "Check the crm_customer and crm_order tables exist with the expected columns",
            "Review database logs for the failing statement",
          ],
        };
    }
  }

  private static withCause(summary: string, cause: unknown): string {
    return cause instanceof Error ? `${summary}: ${cause.message}` : summary;
  }

  private static getGenericSuggestions(): string[] {
    const suggestions = ["Check the error message above for details", "Review logs for additional context"];
    if (process.env.NODE_ENV === "development") {
      suggestions.push("Check stack trace for debugging information");
    }
    return suggestions;
  }

  private static formatContext(context?: ErrorContext): string | null {
    if (!context) {
      return null;
    }

    const parts: string[] = [];

    if (context.step) {
      parts.push(`Step: ${context.step}`);
    }

    if (context.job) {
      parts.push(`Job: ${context.job}`);
    }

    if (context.runId) {
      parts.push(`Run: ${context.runId}`);
    }

    return parts.length > 0 ? parts.join(" | ") : null;
  }
}
