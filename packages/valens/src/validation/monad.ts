import type { Lazy } from "../function";
import { errorsMonoid, failures, success } from "./validation";
import type { Errors, Kleisli, Operator, Validation } from "./types";

const errorsM = errorsMonoid();

// =============================================================================
// Functor
// =============================================================================

export function monadMap<A, B>(fa: Validation<A>, f: (a: A) => B): Validation<B> {
  return fa.ok ? success(f(fa.value)) : fa;
}

/**
 * Transforms a successful value; failures pass through unchanged.
 *
 * @example
 * ```typescript
 * pipe(success(21), map((x) => x * 2)); // success(42)
 * ```
 */
export const map =
  <A, B>(f: (a: A) => B): Operator<A, B> =>
  (fa) =>
    monadMap(fa, f);

// =============================================================================
// Applicative
// =============================================================================

/**
 * Applies a validated function to a validated value.
 *
 * Unlike a fail-fast Either, two failures are not short-circuited: the
 * function's errors come first, followed by the value's errors.
 *
 * @example
 * ```typescript
 * const makeUser = (name: string) => (age: number) => ({ name, age });
 * monadAp(monadAp(success(makeUser), validateName("ab")), validateAge(16));
 * // failures with both the name error and the age error
 * ```
 */
export function monadAp<B, A>(fab: Validation<(a: A) => B>, fa: Validation<A>): Validation<B> {
  if (fab.ok) {
    return fa.ok ? success(fab.value(fa.value)) : fa;
  }
  return fa.ok ? fab : failures(errorsM.concat(fab.errors, fa.errors));
}

export const ap =
  <A>(fa: Validation<A>) =>
  <B>(fab: Validation<(a: A) => B>): Validation<B> =>
    monadAp(fab, fa);

// =============================================================================
// Monad
// =============================================================================

/**
 * Sequences a dependent validation. A failure stops the chain: nothing
 * after it runs, so there is nothing further to accumulate.
 */
export function monadChain<A, B>(fa: Validation<A>, f: Kleisli<A, B>): Validation<B> {
  return fa.ok ? f(fa.value) : fa;
}

export const chain =
  <A, B>(f: Kleisli<A, B>): Operator<A, B> =>
  (fa) =>
    monadChain(fa, f);

// =============================================================================
// Error channel
// =============================================================================

/**
 * Runs `f` on the errors of a failure.
 *
 * - success: returned unchanged, `f` is not called
 * - `f` succeeds: the recovered value replaces the failure
 * - `f` fails: the original errors followed by the new ones
 */
export function monadChainLeft<A>(fa: Validation<A>, f: Kleisli<Errors, A>): Validation<A> {
  if (fa.ok) {
    return fa;
  }
  const recovered = f(fa.errors);
  return recovered.ok ? recovered : failures(errorsM.concat(fa.errors, recovered.errors));
}

export const chainLeft =
  <A>(f: Kleisli<Errors, A>): Operator<A, A> =>
  (fa) =>
    monadChainLeft(fa, f);

/** Same as `chainLeft`. */
export const orElse = chainLeft;

// =============================================================================
// Alt
// =============================================================================

/**
 * "Try first, else second." `second` is only evaluated when `first` fails;
 * when both fail the errors of both are kept, first's before second's.
 *
 * @example
 * ```typescript
 * monadAlt(parsePort(env.PORT), () => success(8080));
 * ```
 */
export function monadAlt<A>(first: Validation<A>, second: Lazy<Validation<A>>): Validation<A> {
  return monadChainLeft(first, () => second());
}

export const alt =
  <A>(second: Lazy<Validation<A>>): Operator<A, A> =>
  (fa) =>
    monadAlt(fa, second);

// =============================================================================
// Traversal
// =============================================================================

/**
 * Validates every element, collecting the errors of all failing elements
 * in order. Succeeds only if every element does.
 */
export const traverseArray =
  <A, B>(f: (a: A, index: number) => Validation<B>) =>
  (as: readonly A[]): Validation<readonly B[]> => {
    const values: B[] = [];
    let errors: Errors = [];
    as.forEach((a, index) => {
      const result = f(a, index);
      if (result.ok) {
        values.push(result.value);
      } else {
        errors = errorsM.concat(errors, result.errors);
      }
    });
    return errors.length > 0 ? failures(errors) : success(values);
  };

export const sequenceArray = <A>(as: readonly Validation<A>[]): Validation<readonly A[]> =>
  traverseArray((fa: Validation<A>) => fa)(as);
