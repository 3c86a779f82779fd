import type { Predicate, Refinement } from "../function";
import type { Result } from "../result";
import * as V from "../validation";
import type { Validate } from "./types";
import { chain, of } from "./validate";

type Message<I> = string | ((input: I) => string);

const render = <I>(message: Message<I>, input: I): string =>
  typeof message === "string" ? message : message(input);

/**
 * Lifts a decoding function into a validator. An `err` becomes one
 * `ValidationError` with the message `unable to decode`, the input as its
 * value and the error as its cause.
 *
 * @example
 * ```typescript
 * const port = fromReaderResult((s: string) => {
 *   const n = Number(s);
 *   return Number.isInteger(n) ? ok(n) : err(new RangeError(`bad port ${s}`));
 * });
 * ```
 */
export const fromReaderResult =
  <I, A, E>(f: (input: I) => Result<A, E>): Validate<I, A> =>
  (input) =>
  (context) => {
    const result = f(input);
    return result.ok ? V.success(result.value) : V.failureWithError(input, "unable to decode")(result.error)(context);
  };

/** Accepts every input as it is. */
export const success =
  <I>(): Validate<I, I> =>
  (input) =>
  () =>
    V.success(input);

/**
 * Rejects every input with `message`.
 */
export const failure =
  <I, A = never>(message: Message<I>): Validate<I, A> =>
  (input) =>
    V.failureWithMessage(input, render(message, input));

/**
 * Accepts the inputs that satisfy `predicate`, as they are.
 *
 * @example
 * ```typescript
 * const positive = fromPredicate((n: number) => n > 0, (n) => `${n} is not positive`);
 * ```
 */
export const fromPredicate =
  <I>(predicate: Predicate<I>, message: Message<I>): Validate<I, I> =>
  (input) =>
  (context) =>
    predicate(input) ? V.success(input) : V.failureWithMessage(input, render(message, input))(context);

/** Accepts the inputs `refinement` narrows to `A`. */
export const fromRefinement =
  <I, A extends I>(refinement: Refinement<I, A>, message: Message<I>): Validate<I, A> =>
  (input) =>
  (context) =>
    refinement(input) ? V.success(input) : V.failureWithMessage(input, render(message, input))(context);

// =============================================================================
// Primitive validators
// =============================================================================

export const string: Validate<unknown, string> = fromRefinement(
  (u: unknown): u is string => typeof u === "string",
  "expected string"
);

/** Numbers other than `NaN`. */
export const number: Validate<unknown, number> = fromRefinement(
  (u: unknown): u is number => typeof u === "number" && !Number.isNaN(u),
  "expected number"
);

export const boolean: Validate<unknown, boolean> = fromRefinement(
  (u: unknown): u is boolean => typeof u === "boolean",
  "expected boolean"
);

export const nonEmptyString: Validate<unknown, string> = chain((s: string) =>
  s.length > 0 ? of<unknown, string>(s) : failure<unknown, string>("expected non-empty string")
)(string);
