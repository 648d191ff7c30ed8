/**
 * Error Classes for ingest-watch
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",
  CONFIG_NOT_FOUND = "E1001",
  CONFIG_PARSE_FAILED = "E1002",
  CONFIG_WRITE_FAILED = "E1003",
  CONFIG_UNSUPPORTED_FORMAT = "E1004",

  // Scan errors (2xxx)
  SCAN_FAILED = "E2000",
  SCAN_STAT_FAILED = "E2002",

  // Dispatch errors (3xxx)
  DISPATCH_FAILED = "E3000",
  DISPATCH_TIMEOUT = "E3001",
  DISPATCH_BROKER_UNREACHABLE = "E3002",
  DISPATCH_REJECTED = "E3003",
  DISPATCH_SERIALIZATION_FAILED = "E3004",

  // Completion errors (4xxx)
  COMPLETION_INVALID_PAYLOAD = "E4000",
  COMPLETION_SERVER_START_FAILED = "E4001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
}

/**
 * Base error class for all ingest-watch errors
 */
export class IngestWatchError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "IngestWatchError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Configuration errors. Always fatal at startup.
 */
export class ConfigurationError extends IngestWatchError {
  public readonly configPath?: string;
  public readonly issues: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: Record<string, unknown> & { configPath?: string; issues?: string[] }
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
    this.configPath = context?.configPath;
    this.issues = context?.issues ?? [];
  }

  override toString(): string {
    const location = this.configPath ? ` (${this.configPath})` : "";
    const details = this.issues.length > 0 ? `\n  - ${this.issues.join("\n  - ")}` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}${details}`;
  }
}

/**
 * Scan errors: a watch root or a file could not be read
 */
export class ScanError extends IngestWatchError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SCAN_FAILED,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "ScanError";
    this.filePath = context?.filePath;
  }
}

/**
 * Dispatch errors: the unit of work did not reach the queue
 */
export class DispatchError extends IngestWatchError {
  public readonly filePath?: string;
  public readonly destination?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DISPATCH_FAILED,
    context?: Record<string, unknown> & { filePath?: string; destination?: string }
  ) {
    super(message, code, context);
    this.name = "DispatchError";
    this.filePath = context?.filePath;
    this.destination = context?.destination;
  }
}

/**
 * Completion callback errors
 */
export class CompletionError extends IngestWatchError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.COMPLETION_INVALID_PAYLOAD,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "CompletionError";
  }
}

/**
 * Normalizes an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Reads the message off an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
