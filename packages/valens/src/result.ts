/**
 * valens/result
 *
 * Either, spelled as `{ ok: true, value } | { ok: false, error }`. Validation
 * failures cross into it through `toResult`, and decoding functions that
 * return one come back through `fromReaderResult`.
 *
 * Combinators are curried and take the result last, like `valens/option`:
 *
 * @example
 * ```typescript
 * const port = pipe(
 *   R.fromNullable(() => "PORT is not set")(env.PORT),
 *   R.chain(parsePort),
 *   R.getOrElse(() => 8080)
 * );
 * ```
 */

import type { Lazy, Predicate } from "./function";

export type Ok<A> = { ok: true; value: A };

/** `cause` holds the underlying failure, when there is one. */
export type Err<E> = { ok: false; error: E; cause?: unknown };

export type Result<A, E = unknown> = Ok<A> | Err<E>;

/** A function returning a result. */
export type Kleisli<A, B, E> = (a: A) => Result<B, E>;

export const ok = <A>(value: A): Ok<A> => ({ ok: true, value });

export const err = <E>(error: E, cause?: unknown): Err<E> =>
  cause === undefined ? { ok: false, error } : { ok: false, error, cause };

export const of = ok;

export const isOk = <A, E>(r: Result<A, E>): r is Ok<A> => r.ok;

export const isErr = <A, E>(r: Result<A, E>): r is Err<E> => !r.ok;

// =============================================================================
// Conversions
// =============================================================================

export const fromNullable =
  <E>(onNullish: Lazy<E>) =>
  <A>(a: A | null | undefined): Result<A, E> =>
    a == null ? err(onNullish()) : ok(a);

export const fromPredicate =
  <A, E>(predicate: Predicate<A>, onFalse: (a: A) => E) =>
  (a: A): Result<A, E> =>
    predicate(a) ? ok(a) : err(onFalse(a));

/**
 * Runs `f`, turning a throw into an error result. The thrown value is the
 * error, or with `onThrow` it becomes the `cause` of the mapped error.
 *
 * @example
 * ```typescript
 * tryCatch(() => JSON.parse(text), () => "invalid json");
 * // err("invalid json") with the SyntaxError as cause
 * ```
 */
export function tryCatch<A>(f: Lazy<A>): Result<A, unknown>;
export function tryCatch<A, E>(f: Lazy<A>, onThrow: (thrown: unknown) => E): Result<A, E>;
export function tryCatch<A, E>(f: Lazy<A>, onThrow?: (thrown: unknown) => E): Result<A, unknown> {
  try {
    return ok(f());
  } catch (thrown) {
    return onThrow === undefined ? err(thrown) : err(onThrow(thrown), thrown);
  }
}

// =============================================================================
// Combinators (curried for pipe)
// =============================================================================

export const map =
  <A, B>(f: (a: A) => B) =>
  <E>(fa: Result<A, E>): Result<B, E> =>
    fa.ok ? ok(f(fa.value)) : fa;

/** Maps the error and keeps the cause. */
export const mapError =
  <E, F>(f: (e: E) => F) =>
  <A>(fa: Result<A, E>): Result<A, F> =>
    fa.ok ? fa : err(f(fa.error), fa.cause);

export const chain =
  <A, B, E>(f: Kleisli<A, B, E>) =>
  (fa: Result<A, E>): Result<B, E> =>
    fa.ok ? f(fa.value) : fa;

/** Replaces an error result with the one `f` builds from its error. */
export const orElse =
  <E, A, F>(f: Kleisli<E, A, F>) =>
  (fa: Result<A, E>): Result<A, F> =>
    fa.ok ? fa : f(fa.error);

export const fold =
  <E, A, B>(onErr: (e: E) => B, onOk: (a: A) => B) =>
  (fa: Result<A, E>): B =>
    fa.ok ? onOk(fa.value) : onErr(fa.error);

export const getOrElse =
  <E, A>(onErr: (e: E) => A) =>
  (fa: Result<A, E>): A =>
    fa.ok ? fa.value : onErr(fa.error);

// =============================================================================
// Leaving Result
// =============================================================================

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : typeof error === "string" ? error : JSON.stringify(error);

/**
 * Thrown by `unwrap` for an error result. `error` is the result's error;
 * `cause` is its cause, or the error itself when it has none.
 */
export class UnwrapError<E = unknown> extends Error {
  public readonly error: E;

  constructor(fa: Err<E>) {
    super(`unwrap called on an error result: ${describe(fa.error)}`, {
      cause: fa.cause !== undefined ? fa.cause : fa.error,
    });
    this.name = "UnwrapError";
    this.error = fa.error;
  }
}

/** The value of an ok result; throws `UnwrapError` otherwise. */
export const unwrap = <A, E>(fa: Result<A, E>): A => {
  if (fa.ok) {
    return fa.value;
  }
  throw new UnwrapError(fa);
};
