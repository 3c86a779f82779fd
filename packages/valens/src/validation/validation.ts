import { array, type Monoid } from "../monoid";
import { ok, err, type Result } from "../result";
import { ValidationError, makeValidationErrors, type ValidationErrors } from "./errors";
import type { Context, Errors, Failure, Reader, Success, Validation } from "./types";

// =============================================================================
// Constructors
// =============================================================================

export const success = <A>(value: A): Validation<A> => ({ ok: true, value });

/** Lifts a value into a successful validation. */
export const of = success;

/**
 * A failure carrying the given errors. `Failure` fits any `Validation<A>`.
 */
export const failures = (errors: Errors): Failure => ({ ok: false, errors });

/**
 * A failure with a message, waiting for the context it happened in.
 *
 * @example
 * ```typescript
 * const fail = failureWithMessage("abc", "expected integer");
 * fail([{ key: "age", type: "number" }]);
 * ```
 */
export const failureWithMessage =
  (value: unknown, message: string): Reader<Context, Failure> =>
  (context) =>
    failures([new ValidationError({ value, context, message })]);

/**
 * Like `failureWithMessage`, wrapping an underlying error as the cause.
 *
 * @example
 * ```typescript
 * failureWithError("abc", "parse failed")(parseError)(context);
 * ```
 */
export const failureWithError =
  (value: unknown, message: string) =>
  (cause: unknown): Reader<Context, Failure> =>
  (context) =>
    failures([new ValidationError({ value, context, message, cause })]);

// =============================================================================
// Guards and destructors
// =============================================================================

export const isSuccess = <A>(fa: Validation<A>): fa is Success<A> => fa.ok;

export const isFailure = <A>(fa: Validation<A>): fa is Failure => !fa.ok;

export const fold =
  <A, B>(onFailure: (errors: Errors) => B, onSuccess: (a: A) => B) =>
  (fa: Validation<A>): B =>
    fa.ok ? onSuccess(fa.value) : onFailure(fa.errors);

/** The errors of a validation; empty on success. */
export const getErrors = <A>(fa: Validation<A>): Errors => (fa.ok ? [] : fa.errors);

// =============================================================================
// Errors monoid and interop
// =============================================================================

/**
 * Concatenation of error sequences, identity the empty sequence.
 */
export const errorsMonoid = (): Monoid<Errors> => array<ValidationError>();

/**
 * Collapses the accumulated errors into one `ValidationErrors` value.
 */
export const toResult = <A>(fa: Validation<A>): Result<A, ValidationErrors> =>
  fa.ok ? ok(fa.value) : err(makeValidationErrors(fa.errors));
