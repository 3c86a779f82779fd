import type { Lazy } from "../function";
import { altMonoid as deriveAltMonoid, applicativeMonoid as deriveApplicativeMonoid, makeMonoid, type Monoid } from "../monoid";
import { monadAlt, monadAp, monadMap } from "./monad";
import { errorsMonoid, failures, success } from "./validation";
import type { Validation } from "./types";

/**
 * Combines two validations with `m` when both succeed and accumulates the
 * errors otherwise.
 *
 * @example
 * ```typescript
 * const m = applicativeMonoid(M.string);
 * m.concat(success("a"), success("b")); // success("ab")
 * ```
 */
export const applicativeMonoid = <A>(m: Monoid<A>): Monoid<Validation<A>> =>
  deriveApplicativeMonoid<A, Validation<A>, Validation<(b: A) => A>>(success, monadMap, monadAp, m);

/**
 * Combines with `m` when both succeed, falls back to whichever side
 * succeeded when only one does (its partner's errors are dropped), and
 * keeps both error sets when neither does.
 */
export const alternativeMonoid = <A>(m: Monoid<A>): Monoid<Validation<A>> => {
  const errors = errorsMonoid();
  return makeMonoid<Validation<A>>((x, y) => {
    if (x.ok) {
      return y.ok ? success(m.concat(x.value, y.value)) : x;
    }
    return y.ok ? y : failures(errors.concat(x.errors, y.errors));
  }, success(m.empty));
};

/**
 * First success wins. `empty` is `zero`, evaluated on demand.
 */
export const altMonoid = <A>(zero: Lazy<Validation<A>>): Monoid<Validation<A>> =>
  deriveAltMonoid<Validation<A>>(zero, monadAlt);

export { errorsMonoid };
