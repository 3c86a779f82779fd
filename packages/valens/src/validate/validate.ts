import type { Lazy } from "../function";
import * as V from "../validation";
import type { Errors } from "../validation";
import type { Kleisli, Validate } from "./types";

/** A validator that accepts any input and yields `a`. */
export const of =
  <I, A>(a: A): Validate<I, A> =>
  () =>
  () =>
    V.success(a);

// =============================================================================
// Functor / Applicative / Monad
// =============================================================================

export const monadMap =
  <I, A, B>(fa: Validate<I, A>, f: (a: A) => B): Validate<I, B> =>
  (input) =>
  (context) =>
    V.monadMap(fa(input)(context), f);

export const map =
  <A, B>(f: (a: A) => B) =>
  <I>(fa: Validate<I, A>): Validate<I, B> =>
    monadMap(fa, f);

/**
 * Runs both validators on the same input and context; see
 * `Validation.monadAp` for how their errors combine.
 */
export const monadAp =
  <I, B, A>(fab: Validate<I, (a: A) => B>, fa: Validate<I, A>): Validate<I, B> =>
  (input) =>
  (context) =>
    V.monadAp(fab(input)(context), fa(input)(context));

export const ap =
  <I, A>(fa: Validate<I, A>) =>
  <B>(fab: Validate<I, (a: A) => B>): Validate<I, B> =>
    monadAp(fab, fa);

/**
 * Feeds a successful value into `f` and runs the validator it returns on
 * the same input and context.
 */
export const monadChain =
  <I, A, B>(fa: Validate<I, A>, f: Kleisli<I, A, B>): Validate<I, B> =>
  (input) =>
  (context) =>
    V.monadChain(fa(input)(context), (a) => f(a)(input)(context));

export const chain =
  <I, A, B>(f: Kleisli<I, A, B>) =>
  (fa: Validate<I, A>): Validate<I, B> =>
    monadChain(fa, f);

// =============================================================================
// Error channel
// =============================================================================

export const monadChainLeft =
  <I, A>(fa: Validate<I, A>, f: Kleisli<I, Errors, A>): Validate<I, A> =>
  (input) =>
  (context) =>
    V.monadChainLeft(fa(input)(context), (errors) => f(errors)(input)(context));

/**
 * Recovers from, or adds to, the errors of a failed validator. When the
 * recovery fails too, its errors follow the original ones.
 *
 * @example
 * ```typescript
 * const port = pipe(
 *   number,
 *   chainLeft(() => failure("expected a port number"))
 * );
 * ```
 */
export const chainLeft =
  <I, A>(f: Kleisli<I, Errors, A>) =>
  (fa: Validate<I, A>): Validate<I, A> =>
    monadChainLeft(fa, f);

export const orElse = chainLeft;

/** `second` is built and run only when `first` fails. */
export const monadAlt =
  <I, A>(first: Validate<I, A>, second: Lazy<Validate<I, A>>): Validate<I, A> =>
  (input) =>
  (context) =>
    V.monadAlt(first(input)(context), () => second()(input)(context));

export const alt =
  <I, A>(second: Lazy<Validate<I, A>>) =>
  (first: Validate<I, A>): Validate<I, A> =>
    monadAlt(first, second);
