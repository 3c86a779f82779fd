/**
 * valens/monoid
 *
 * Semigroups and monoids, plus the two derivations that lift a monoid into
 * a container: the applicative one (combine both results) and the alt one
 * (first success wins).
 */

import type { Lazy } from "../function";

export interface Semigroup<A> {
  readonly concat: (x: A, y: A) => A;
}

export interface Monoid<A> extends Semigroup<A> {
  readonly empty: A;
}

export const makeMonoid = <A>(concat: (x: A, y: A) => A, empty: A): Monoid<A> => ({
  concat,
  empty,
});

/**
 * Folds a list with the monoid, starting from `empty`.
 */
export const concatAll =
  <A>(m: Monoid<A>) =>
  (as: readonly A[]): A =>
    as.reduce(m.concat, m.empty);

/** The dual monoid: arguments of `concat` swapped. */
export const reverse = <A>(m: Monoid<A>): Monoid<A> =>
  makeMonoid((x, y) => m.concat(y, x), m.empty);

// =============================================================================
// Instances
// =============================================================================

export const string: Monoid<string> = makeMonoid((x, y) => x + y, "");

export const sum: Monoid<number> = makeMonoid((x, y) => x + y, 0);

export const product: Monoid<number> = makeMonoid((x, y) => x * y, 1);

export const all: Monoid<boolean> = makeMonoid((x, y) => x && y, true);

export const any: Monoid<boolean> = makeMonoid((x, y) => x || y, false);

/**
 * Concatenation of read-only arrays. The empty side is returned as is, so
 * combining with `empty` never copies.
 */
export const array = <A>(): Monoid<readonly A[]> =>
  makeMonoid<readonly A[]>((x, y) => (x.length === 0 ? y : y.length === 0 ? x : [...x, ...y]), []);

// =============================================================================
// Derived monoids
// =============================================================================

/**
 * Lifts a monoid into an applicative container.
 *
 * `concat(x, y)` maps `x` to a partially applied `m.concat` and applies it
 * to `y`, so whatever `ap` does with two failures is what the monoid does.
 */
export const applicativeMonoid = <A, HKTA, HKTF>(
  of: (a: A) => HKTA,
  map: (fa: HKTA, f: (a: A) => (b: A) => A) => HKTF,
  ap: (fab: HKTF, fa: HKTA) => HKTA,
  m: Monoid<A>
): Monoid<HKTA> =>
  makeMonoid(
    (x, y) =>
      ap(
        map(x, (a) => (b) => m.concat(a, b)),
        y
      ),
    of(m.empty)
  );

/**
 * Monoid of "first success wins" built from an `alt` operation.
 * `empty` evaluates `zero` each time it is read.
 */
export const altMonoid = <HKTA>(
  zero: Lazy<HKTA>,
  alt: (first: HKTA, second: Lazy<HKTA>) => HKTA
): Monoid<HKTA> => ({
  concat: (x, y) => alt(x, () => y),
  get empty() {
    return zero();
  },
});
