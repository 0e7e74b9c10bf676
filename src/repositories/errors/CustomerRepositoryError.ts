/**
 * Driver error codes that we handle: PostgreSQL SQLSTATE codes, plus the
 * Node socket and postgres.js client codes raised when the server cannot be reached
 */
export enum DatabaseErrorCode {
  FOREIGN_KEY_VIOLATION = "23503",
  SERIALIZATION_FAILURE = "40001",
}

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "CONNECT_TIMEOUT",
  "CONNECTION_CLOSED",
  "CONNECTION_ENDED",
  "CONNECTION_DESTROYED",
]);

// SQLSTATE class 08: connection exception
const CONNECTION_SQLSTATE_CLASS = "08";

export enum CustomerRepositoryErrorType {
  CONNECTION_FAILED = "CONNECTION_FAILED",
  FOREIGN_KEY_VIOLATION = "FOREIGN_KEY_VIOLATION",
  SERIALIZATION_FAILURE = "SERIALIZATION_FAILURE",
  UNKNOWN_DATABASE_ERROR = "UNKNOWN_DATABASE_ERROR",
}

/**
 * Structured error for customer store operations
 */
export class CustomerRepositoryError extends Error {
  public readonly type: CustomerRepositoryErrorType;
  public readonly context: string;
  public readonly databaseErrorCode?: string;

  /**
   * @param cause - Driver error, kept for the operator log
   */
  constructor(type: CustomerRepositoryErrorType, context: string, databaseErrorCode?: string, cause?: unknown) {
    super(CustomerRepositoryError.formatMessage(type, context), cause === undefined ? undefined : { cause });
    this.name = "CustomerRepositoryError";
    this.type = type;
    this.context = context;
    this.databaseErrorCode = databaseErrorCode;
    Object.setPrototypeOf(this, CustomerRepositoryError.prototype);
  }

  private static formatMessage(type: CustomerRepositoryErrorType, context: string): string {
    switch (type) {
      case CustomerRepositoryErrorType.CONNECTION_FAILED:
        return `Database unreachable during ${context}`;
      case CustomerRepositoryErrorType.FOREIGN_KEY_VIOLATION:
        return `Foreign key constraint failed during ${context}`;
      case CustomerRepositoryErrorType.SERIALIZATION_FAILURE:
        return `Concurrent update conflict during ${context}`;
      case CustomerRepositoryErrorType.UNKNOWN_DATABASE_ERROR:
        return `Database error during ${context}`;
    }
  }

  /**
   * Classify an error thrown by the database driver
   * @param context - Operation that failed (e.g., "inactive customer delete")
   */
  static fromDatabaseError(error: unknown, context: string): CustomerRepositoryError {
    if (error instanceof CustomerRepositoryError) {
      return error;
    }

    const code =
      typeof error === "object" && error !== null && "code" in error && typeof error.code === "string"
        ? error.code
        : undefined;

    if (code === undefined) {
      return new CustomerRepositoryError(CustomerRepositoryErrorType.UNKNOWN_DATABASE_ERROR, context, undefined, error);
    }

    if (CONNECTION_ERROR_CODES.has(code) || code.startsWith(CONNECTION_SQLSTATE_CLASS)) {
      return new CustomerRepositoryError(CustomerRepositoryErrorType.CONNECTION_FAILED, context, code, error);
    }

    switch (code) {
      case DatabaseErrorCode.FOREIGN_KEY_VIOLATION:
        return new CustomerRepositoryError(CustomerRepositoryErrorType.FOREIGN_KEY_VIOLATION, context, code, error);
      case DatabaseErrorCode.SERIALIZATION_FAILURE:
        return new CustomerRepositoryError(CustomerRepositoryErrorType.SERIALIZATION_FAILURE, context, code, error);
      default:
        return new CustomerRepositoryError(CustomerRepositoryErrorType.UNKNOWN_DATABASE_ERROR, context, code, error);
    }
  }
}
