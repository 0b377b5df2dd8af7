/**
 * nanoident Error Hierarchy
 *
 * All errors extend NanoIdentError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * @example
 * ```typescript
 * try {
 *   NanoId.generate(10, "a");
 * } catch (error) {
 *   if (isNanoIdentError(error)) {
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
 * - `system`: A collaborator (such as a random source) misbehaved.
 */
export type ErrorCategory = "user" | "system";

/**
 * Options for NanoIdentError constructor.
 */
export type NanoIdentErrorOptions = Readonly<{
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

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all nanoident errors.
 */
export class NanoIdentError extends Error {
  /** Machine-readable error code (e.g., "INVALID_ALPHABET") */
  readonly code: string;

  /** Error category for handling strategies */
  readonly category: ErrorCategory;

  /** Structured context about the error */
  readonly details: Readonly<Record<string, unknown>>;

  /** Recovery guidance for users */
  readonly suggestion?: string;

  constructor(message: string, code: string, options: NanoIdentErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "NanoIdentError";
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

    if (Object.keys(this.details).length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Validation Errors (category: "user")
// ============================================================

/**
 * Validation issue from Zod or custom validation.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid field (e.g., "alphabet") */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code if from Zod validation */
  code?: string;
}>;

/**
 * Details for ValidationError.
 */
export type ValidationErrorDetails = Readonly<{
  /** Individual validation issues */
  issues: readonly ValidationIssue[];
}>;

/**
 * Thrown when an options object or an identifier string fails validation.
 *
 * @example
 * ```typescript
 * try {
 *   createIdGenerator({ size: -1 });
 * } catch (error) {
 *   if (error instanceof ValidationError) {
 *     console.log(error.details.issues);
 *     // [{ path: "size", message: "Too small: expected number to be >=0", ... }]
 *   }
 * }
 * ```
 */
export class ValidationError extends NanoIdentError {
  declare readonly details: ValidationErrorDetails;

  constructor(
    message: string,
    details: ValidationErrorDetails,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    const fieldList =
      details.issues.length > 0 ?
        details.issues.map((issue) => issue.path || "(root)").join(", ")
      : "unknown";

    super(message, "VALIDATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the following fields: ${fieldList}. See error.details.issues for specific validation failures.`,
      cause: options?.cause,
    });
    this.name = "ValidationError";
  }
}

/**
 * Thrown when an alphabet cannot drive the generator: fewer than 2 symbols,
 * more than 256 symbols, or a repeated symbol.
 */
export class InvalidAlphabetError extends NanoIdentError {
  constructor(
    reason: string,
    details: Readonly<{ alphabetLength: number; duplicate?: string }>,
    options?: { cause?: unknown },
  ) {
    super(`Invalid alphabet: ${reason}`, "INVALID_ALPHABET", {
      details,
      category: "user",
      suggestion:
        "Use between 2 and 256 distinct symbols, or one of the named alphabets such as URL_SAFE.",
      cause: options?.cause,
    });
    this.name = "InvalidAlphabetError";
  }
}

/**
 * Thrown when a requested identifier size is not a non-negative safe integer.
 */
export class InvalidSizeError extends NanoIdentError {
  constructor(size: number, options?: { cause?: unknown }) {
    super(
      `Invalid size: ${size}. Expected a non-negative integer`,
      "INVALID_SIZE",
      {
        details: { size },
        category: "user",
        suggestion: "Pass a whole number of symbols; 0 yields an empty identifier.",
        cause: options?.cause,
      },
    );
    this.name = "InvalidSizeError";
  }
}

// ============================================================
// Random Source Errors (category: "system")
// ============================================================

/**
 * Thrown when a random source returns fewer bytes than were requested.
 */
export class RandomSourceError extends NanoIdentError {
  constructor(
    details: Readonly<{ requested: number; received: number }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Random source returned ${details.received} byte(s), expected ${details.requested}`,
      "RANDOM_SOURCE_ERROR",
      {
        details,
        category: "system",
        suggestion:
          "A random source must return a Uint8Array of exactly the requested length.",
        cause: options?.cause,
      },
    );
    this.name = "RandomSourceError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Type guard for NanoIdentError.
 */
export function isNanoIdentError(error: unknown): error is NanoIdentError {
  return error instanceof NanoIdentError;
}

/**
 * Check if error is recoverable by fixing the caller's input.
 */
export function isUserRecoverable(error: unknown): boolean {
  return isNanoIdentError(error) && error.category === "user";
}

/**
 * Check if error indicates a misbehaving collaborator.
 */
export function isSystemError(error: unknown): boolean {
  return isNanoIdentError(error) && error.category === "system";
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isNanoIdentError(error) ? error.suggestion : undefined;
}
