import type { Context, Errors } from "./types";

/**
 * Renders a context as a dotted path. Entries without a key contribute
 * their type name instead.
 */
export function formatPath(context: Context): string {
  return context.map((entry) => (entry.key !== "" ? entry.key : entry.type)).join(".");
}

const describeCause = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause));

export interface ValidationErrorProps {
  /** The value that failed validation */
  value: unknown;
  /** Where the value sits in the validated structure */
  context?: Context;
  message: string;
  /** The underlying error, if the failure wraps one */
  cause?: unknown;
}

/**
 * A single validation failure.
 *
 * The wrapped `cause` is the standard `Error.cause`, so cause chains can be
 * walked the same way as for any other error.
 *
 * @example
 * ```typescript
 * const error = new ValidationError({
 *   value: "not-an-email",
 *   context: [{ key: "user", type: "User" }, { key: "email", type: "string" }],
 *   message: "invalid email format",
 * });
 * error.path;       // "user.email"
 * String(error);    // "at user.email: invalid email format"
 * ```
 */
export class ValidationError extends Error {
  public readonly value: unknown;
  public readonly context: Context;

  constructor({ value, context = [], message, cause }: ValidationErrorProps) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = "ValidationError";
    this.value = value;
    this.context = context;
  }

  get path(): string {
    return formatPath(this.context);
  }

  /**
   * `at <path>: <message>`, followed by ` (caused by: <cause>)` when the
   * error wraps one.
   */
  toString(): string {
    const path = this.path;
    const text = path !== "" ? `at ${path}: ${this.message}` : this.message;
    return this.cause !== undefined ? `${text} (caused by: ${describeCause(this.cause)})` : text;
  }
}

/**
 * The aggregate of a failed validation as one standard error, for code
 * that expects a single error value.
 */
export class ValidationErrors extends Error {
  public readonly errors: Errors;

  constructor(errors: Errors, cause?: unknown) {
    super(
      errors.length === 0
        ? "ValidationErrors: no errors"
        : errors.length === 1
          ? "ValidationErrors: 1 error"
          : `ValidationErrors: ${errors.length} errors`,
      cause !== undefined ? { cause } : undefined
    );
    this.name = "ValidationErrors";
    this.errors = errors;
  }
}

export const makeValidationErrors = (errors: Errors, cause?: unknown): ValidationErrors =>
  new ValidationErrors(errors, cause);

export const isValidationError = (e: unknown): e is ValidationError => e instanceof ValidationError;

export const isValidationErrors = (e: unknown): e is ValidationErrors => e instanceof ValidationErrors;
