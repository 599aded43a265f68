/**
 * Error Classes for corpus extraction
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Parsing errors (2xxx)
  PARSE_FAILED = "E2000",
  PARSE_UNEXPECTED_TOKEN = "E2001",
  PARSE_UNTERMINATED = "E2002",
  PARSE_ILLEGAL_CHARACTER = "E2003",
  PARSE_UNSUPPORTED = "E2004",
  PARSE_INVALID_PATTERN = "E2005",
  PARSE_HEAD_MISMATCH = "E2006",

  // Grouping errors (3xxx)
  GROUP_NON_CONTIGUOUS = "E3000",
  GROUP_EMPTY = "E3001",

  // Analysis errors (4xxx)
  ANALYSIS_UNBOUND_VARIABLE = "E4000",

  // Record errors (5xxx)
  RECORD_INVALID = "E5000",

  // Pipeline errors (7xxx)
  FILE_TIMEOUT = "E7000",
  SINK_WRITE_FAILED = "E7001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  FILE_SYSTEM_ERROR = "E9002",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Error kinds reported in the run summary
 */
export type ErrorKind =
  | "ParseError"
  | "NonContiguousClauseError"
  | "ScopeError"
  | "EmptyClauseGroupError"
  | "RecordValidationError"
  | "FileTimeoutError"
  | "SinkWriteError"
  | "FileSystemError"
  | "UnknownError";

/**
 * How a failure is logged and counted
 */
export type ErrorSeverity = "warning" | "error" | "internal" | "fatal";

/**
 * Base error class for all corpus extraction errors
 */
export class CorpusError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "CorpusError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  get kind(): ErrorKind {
    return "UnknownError";
  }

  get severity(): ErrorSeverity {
    return "error";
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
 * Malformed source: unexpected token, unterminated construct, illegal
 * character or unsupported grammar extension. Aborts the file.
 */
export class ParseError extends CorpusError {
  public readonly filePath?: string;
  public readonly line?: number;
  public readonly column?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_FAILED,
    context?: Record<string, unknown> & { filePath?: string; line?: number; column?: number }
  ) {
    super(message, code, context);
    this.name = "ParseError";
    this.filePath = context?.filePath;
    this.line = context?.line;
    this.column = context?.column;
  }

  override get kind(): ErrorKind {
    return "ParseError";
  }

  /** Copy of this error attributed to a file */
  withFile(filePath: string): ParseError {
    return new ParseError(this.message, this.code, { ...this.context, filePath });
  }

  override toString(): string {
    let location = "";
    if (this.filePath) {
      location = ` at ${this.filePath}`;
      if (this.line !== undefined) {
        location += `:${this.line}`;
        if (this.column !== undefined) {
          location += `:${this.column}`;
        }
      }
    }
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * Clauses of one function are split by another declaration.
 */
export class NonContiguousClauseError extends CorpusError {
  public readonly functionName: string;
  public readonly arity: number;

  constructor(
    message: string,
    context: Record<string, unknown> & { functionName: string; arity: number; filePath?: string }
  ) {
    super(message, ErrorCode.GROUP_NON_CONTIGUOUS, context);
    this.name = "NonContiguousClauseError";
    this.functionName = context.functionName;
    this.arity = context.arity;
  }

  override get kind(): ErrorKind {
    return "NonContiguousClauseError";
  }
}

/**
 * A variable is read with no reaching binding in its clause.
 * Recorded per occurrence; the record is still emitted.
 */
export class ScopeError extends CorpusError {
  public readonly variable: string;
  public readonly tokenIndex: number;

  constructor(
    message: string,
    context: Record<string, unknown> & { variable: string; tokenIndex: number; clauseIndex: number }
  ) {
    super(message, ErrorCode.ANALYSIS_UNBOUND_VARIABLE, context);
    this.name = "ScopeError";
    this.variable = context.variable;
    this.tokenIndex = context.tokenIndex;
  }

  override get kind(): ErrorKind {
    return "ScopeError";
  }

  override get severity(): ErrorSeverity {
    return "warning";
  }
}

/**
 * A clause group with no clauses reached the assembler.
 */
export class EmptyClauseGroupError extends CorpusError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.GROUP_EMPTY, context);
    this.name = "EmptyClauseGroupError";
  }

  override get kind(): ErrorKind {
    return "EmptyClauseGroupError";
  }

  override get severity(): ErrorSeverity {
    return "internal";
  }
}

/**
 * An assembled record failed validation (e.g. an edge outside the tokens).
 */
export class RecordValidationError extends CorpusError {
  public readonly issues: string[];

  constructor(message: string, context: Record<string, unknown> & { issues: string[] }) {
    super(message, ErrorCode.RECORD_INVALID, context);
    this.name = "RecordValidationError";
    this.issues = context.issues;
  }

  override get kind(): ErrorKind {
    return "RecordValidationError";
  }

  override get severity(): ErrorSeverity {
    return "internal";
  }
}

/**
 * A file exceeded the per-file processing timeout.
 */
export class FileTimeoutError extends CorpusError {
  constructor(message: string, context: Record<string, unknown> & { filePath: string; timeoutMs: number }) {
    super(message, ErrorCode.FILE_TIMEOUT, context);
    this.name = "FileTimeoutError";
  }

  override get kind(): ErrorKind {
    return "FileTimeoutError";
  }
}

/**
 * The output sink rejected a write. Fatal for the run.
 */
export class SinkWriteError extends CorpusError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.SINK_WRITE_FAILED, context);
    this.name = "SinkWriteError";
  }

  override get kind(): ErrorKind {
    return "SinkWriteError";
  }

  override get severity(): ErrorSeverity {
    return "fatal";
  }
}

/**
 * Invalid configuration. The run refuses to start.
 */
export class ConfigurationError extends CorpusError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, ErrorCode.CONFIGURATION_ERROR, { issues });
    this.name = "ConfigurationError";
    this.issues = issues;
  }

  override get severity(): ErrorSeverity {
    return "fatal";
  }
}

/**
 * Reading a source file failed.
 */
export class FileSystemError extends CorpusError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.FILE_SYSTEM_ERROR, context);
    this.name = "FileSystemError";
  }

  override get kind(): ErrorKind {
    return "FileSystemError";
  }
}

/**
 * Check if an error is a CorpusError
 */
export function isCorpusError(error: unknown): error is CorpusError {
  return error instanceof CorpusError;
}

/**
 * Wrap an unknown error in a CorpusError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): CorpusError {
  if (isCorpusError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new CorpusError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new CorpusError(
    typeof error === "string" ? error : defaultMessage,
    code
  );
}
