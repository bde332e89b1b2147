/**
 * Rowcast Error Hierarchy
 *
 * All errors extend RowcastError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * @example
 * ```typescript
 * try {
 *   row.get("email");
 * } catch (error) {
 *   if (isRowcastError(error)) {
 *     console.error(error.toUserMessage());
 *   }
 * }
 * ```
 */

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by invalid input or incorrect usage. Recoverable by fixing input.
 * - `constraint`: A rule of the result set was violated (e.g. ambiguity).
 * - `system`: Driver or infrastructure failure. May require investigation or retry.
 */
export type ErrorCategory = "user" | "constraint" | "system";

/**
 * Options for RowcastError constructor.
 */
export type RowcastErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (
    typeof cause === "number" ||
    typeof cause === "boolean" ||
    typeof cause === "bigint"
  ) {
    return String(cause);
  }
  if (typeof cause === "symbol") {
    return cause.description ?? "Symbol";
  }
  if (cause === undefined) {
    return "Unknown cause";
  }

  try {
    return JSON.stringify(cause);
  } catch (error) {
    return `Unserializable cause: ${
      error instanceof Error ? error.message : "Unknown error"
    }`;
  }
}

/**
 * Renders a lookup key (string, index or construct) for messages.
 */
export function describeKey(key: unknown): string {
  if (typeof key === "string") return key;
  if (typeof key === "number" || typeof key === "bigint") return String(key);
  if (typeof key === "object" && key !== null && "description" in key) {
    const description = key.description;
    if (typeof description === "string") return description;
  }
  return Object.prototype.toString.call(key);
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all rowcast errors.
 */
export class RowcastError extends Error {
  /** Machine-readable error code (e.g., "NO_SUCH_COLUMN") */
  readonly code: string;

  /** Error category for handling strategies */
  readonly category: ErrorCategory;

  /** Structured context about the error */
  readonly details: Readonly<Record<string, unknown>>;

  /** Recovery guidance for users */
  readonly suggestion?: string;

  constructor(message: string, code: string, options: RowcastErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "RowcastError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns a user-friendly error message with suggestion if available.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a detailed string representation for logging.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    const detailKeys = Object.keys(this.details);
    if (detailKeys.length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Column Lookup Errors (category: "user" / "constraint")
// ============================================================

/**
 * Thrown when a key is not present in a row's keymap.
 *
 * @example
 * ```typescript
 * try {
 *   row.get("missing");
 * } catch (error) {
 *   if (error instanceof NoSuchColumnError) {
 *     console.log(error.details.key); // "missing"
 *   }
 * }
 * ```
 */
export class NoSuchColumnError extends RowcastError {
  constructor(key: unknown, options?: { cause?: unknown }) {
    const rendered = describeKey(key);
    super(
      `Could not locate column in row for column '${rendered}'`,
      "NO_SUCH_COLUMN",
      {
        details: { key: rendered },
        category: "user",
        suggestion: `Check result.keys() for the available column names, or select "${rendered}" in the statement.`,
        cause: options?.cause,
      },
    );
    this.name = "NoSuchColumnError";
  }
}

/**
 * Thrown when a key matches more than one column of the result.
 *
 * The key stays ambiguous for every row produced under the same metadata;
 * reading the same column through a unique key (its column object, or its
 * position) still works.
 */
export class AmbiguousColumnError extends RowcastError {
  constructor(key: string, options?: { cause?: unknown }) {
    super(
      `Ambiguous column name '${key}' in result set column descriptions`,
      "AMBIGUOUS_COLUMN",
      {
        details: { key },
        category: "constraint",
        suggestion: `Label the conflicting columns with distinct names, or read them by position or by column object.`,
        cause: options?.cause,
      },
    );
    this.name = "AmbiguousColumnError";
  }
}

/**
 * Thrown when a missing column is read through attribute-style access.
 */
export class RowAttributeError extends RowcastError {
  constructor(name: string, options?: { cause?: unknown }) {
    super(`Row has no attribute '${name}'`, "NO_SUCH_ATTRIBUTE", {
      details: { name },
      category: "user",
      suggestion: `Use row.fields to list the attribute names of this row.`,
      cause: options?.cause,
    });
    this.name = "RowAttributeError";
  }
}

// ============================================================
// Lifecycle Errors (category: "user")
// ============================================================

/**
 * Thrown on reads after a hard close, or on a result that never returned rows.
 */
export class ResourceClosedError extends RowcastError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "RESOURCE_CLOSED", {
      details: {},
      category: "user",
      suggestion: `Fetch rows before calling close(), and only fetch from statements that return rows.`,
      cause: options?.cause,
    });
    this.name = "ResourceClosedError";
  }
}

/**
 * Thrown when the result API is used incorrectly.
 */
export class InvalidRequestError extends RowcastError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "INVALID_REQUEST", {
      details,
      category: "user",
      ...(options?.suggestion !== undefined && {
        suggestion: options.suggestion,
      }),
      cause: options?.cause,
    });
    this.name = "InvalidRequestError";
  }
}

/**
 * Thrown by `one()` when the result has no rows.
 */
export class NoResultError extends InvalidRequestError {
  constructor() {
    super("No row was found when one was required", {
      expected: "exactly one row",
    });
    this.name = "NoResultError";
  }
}

/**
 * Thrown by `one()` and `oneOrUndefined()` when more than one row remains.
 */
export class MultipleResultsError extends InvalidRequestError {
  constructor() {
    super("Multiple rows were found when exactly one was required", {
      expected: "exactly one row",
    });
    this.name = "MultipleResultsError";
  }
}

// ============================================================
// Configuration Errors (category: "user")
// ============================================================

/**
 * Validation issue from Zod or custom validation.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid field (e.g., "maxRowBuffer") */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code if from Zod validation */
  code?: string;
}>;

/**
 * Thrown when execution options or serialized state are invalid.
 */
export class ConfigurationError extends RowcastError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ?? `Review the options passed to rowcast.`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

// ============================================================
// Database Errors (category: "system")
// ============================================================

/**
 * Thrown when the driver fails while executing or fetching.
 *
 * Every fetch strategy reports driver failures through this error, with the
 * original driver error as `cause`.
 */
export class DatabaseOperationError extends RowcastError {
  constructor(
    message: string,
    details: Readonly<{ operation: string; statement?: string }>,
    options?: { cause?: unknown },
  ) {
    super(message, "DATABASE_OPERATION_ERROR", {
      details,
      category: "system",
      suggestion: `This is a driver-level error. Check the database connection and the statement, then retry.`,
      cause: options?.cause,
    });
    this.name = "DatabaseOperationError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Type guard for RowcastError.
 */
export function isRowcastError(error: unknown): error is RowcastError {
  return error instanceof RowcastError;
}

/**
 * Check if error is recoverable by user action (user or constraint error).
 */
export function isUserRecoverable(error: unknown): boolean {
  if (!isRowcastError(error)) return false;
  return error.category === "user" || error.category === "constraint";
}

/**
 * Check if error indicates a system/infrastructure issue.
 */
export function isSystemError(error: unknown): boolean {
  return isRowcastError(error) && error.category === "system";
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isRowcastError(error) ? error.suggestion : undefined;
}
