import type { Lazy } from "../function";
import { altMonoid as deriveAltMonoid, applicativeMonoid as deriveApplicativeMonoid, makeMonoid, type Monoid } from "../monoid";
import * as V from "../validation";
import { monadAlt, monadAp, monadMap, of } from "./validate";
import type { Validate } from "./types";

/**
 * Runs both validators on the same input and combines their values with
 * `m`; every error from either side is reported, left first.
 *
 * @example
 * ```typescript
 * const tags = applicativeMonoid<Input, string>(M.string);
 * const label = tags.concat(prefix, suffix);
 * ```
 */
export const applicativeMonoid = <I, A>(m: Monoid<A>): Monoid<Validate<I, A>> =>
  deriveApplicativeMonoid<A, Validate<I, A>, Validate<I, (b: A) => A>>(of, monadMap, monadAp, m);

/**
 * Combines with `m` when both validators succeed and tolerates one of them
 * failing: its errors are dropped and the other value is kept. Errors are
 * reported only when both fail.
 */
export const alternativeMonoid = <I, A>(m: Monoid<A>): Monoid<Validate<I, A>> => {
  const values = V.alternativeMonoid(m);
  return makeMonoid<Validate<I, A>>(
    (x, y) => (input) => (context) => values.concat(x(input)(context), y(input)(context)),
    of<I, A>(m.empty)
  );
};

/**
 * "First success wins" over validators: the second is only run when the
 * first fails. `empty` is `zero()`, built each time it is read.
 */
export const altMonoid = <I, A>(zero: Lazy<Validate<I, A>>): Monoid<Validate<I, A>> =>
  deriveAltMonoid<Validate<I, A>>(zero, monadAlt);
