/**
 * Error Classes for openapi-xmldoc
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // XML errors (1xxx)
  XML_PARSE_FAILED = "E1000",
  XML_EMPTY_INPUT = "E1001",

  // Documentation errors (2xxx)
  DOC_INVALID = "E2000",
  DOC_VALUE_AND_URL = "E2001",
  DOC_MISSING_VALUE_OR_URL = "E2002",
  DOC_MISSING_VALUE = "E2003",
  DOC_MISSING_ATTRIBUTE = "E2004",
  DOC_INVALID_CREF = "E2005",
  DOC_DUPLICATE_KEY = "E2006",
  DOC_INVALID_EXAMPLE_VALUE = "E2007",

  // Lookup errors (3xxx)
  TYPE_NOT_FOUND = "E3000",
  FIELD_NOT_FOUND = "E3001",
  ASSEMBLY_NOT_FOUND = "E3002",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
  FILE_SYSTEM_ERROR = "E9002",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all openapi-xmldoc errors
 */
export class AnnotationError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "AnnotationError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    // Maintains proper stack trace for where error was thrown
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
 * Malformed documentation fragment: the XML is well formed but does not
 * describe a valid example or header.
 */
export class DocumentationError extends AnnotationError {
  public readonly element?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DOC_INVALID,
    context?: Record<string, unknown> & { element?: string }
  ) {
    super(message, code, context);
    this.name = "DocumentationError";
    this.element = context?.element;
  }
}

/**
 * A cross-reference names a type, field or assembly that cannot be found
 */
export class NotFoundError extends AnnotationError {
  /** The missing symbol (type name, field name or assembly path) */
  public readonly symbol: string;
  /** Where the symbol was looked for */
  public readonly searched: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.TYPE_NOT_FOUND,
    context: Record<string, unknown> & { symbol: string; searched?: string[] }
  ) {
    super(message, code, context);
    this.name = "NotFoundError";
    this.symbol = context.symbol;
    this.searched = context.searched ?? [];
  }
}

export class XmlParseError extends AnnotationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.XML_PARSE_FAILED,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "XmlParseError";
  }
}

export class ConfigurationError extends AnnotationError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIGURATION_ERROR,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
    this.filePath = context?.filePath;
  }
}

/**
 * Check if an error is an AnnotationError
 */
export function isAnnotationError(error: unknown): error is AnnotationError {
  return error instanceof AnnotationError;
}

/**
 * Wrap an unknown error in an AnnotationError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): AnnotationError {
  if (isAnnotationError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AnnotationError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new AnnotationError(
    typeof error === "string" ? error : defaultMessage,
    code
  );
}
