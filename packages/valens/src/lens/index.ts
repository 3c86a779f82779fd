/**
 * valens/lens
 *
 * A lens focuses on a part `A` that is always present in a whole `S`.
 * Setting never modifies `S` in place: the setter returns the new whole.
 *
 * Laws (for a lawful lens):
 * - GetSet: `set(get(s))(s)` equals `s`
 * - SetGet: `get(set(a)(s))` equals `a`
 * - SetSet: `set(b)(set(a)(s))` equals `set(b)(s)`
 *
 * @example
 * ```typescript
 * type Person = { name: string; age: number };
 *
 * const age = makeLens(
 *   (p: Person) => p.age,
 *   (p, age) => ({ ...p, age })
 * );
 *
 * age.get({ name: "Ada", age: 36 });          // 36
 * age.set(37)({ name: "Ada", age: 36 });      // { name: "Ada", age: 37 }
 * ```
 */

import type { Endomorphism, Eq } from "../function";
import { shallowCopy } from "../internal/copy";

export interface Lens<S, A> {
  readonly get: (s: S) => A;
  readonly set: (a: A) => (s: S) => S;
  /** Nested into the names of composed lenses. */
  readonly name: string;
}

const make = <S, A>(get: (s: S) => A, set: (a: A) => (s: S) => S, name: string): Lens<S, A> => ({
  get,
  set,
  name,
});

// =============================================================================
// Constructors
// =============================================================================

export function makeLens<S, A>(get: (s: S) => A, set: (s: S, a: A) => S, name = "Lens"): Lens<S, A> {
  return make(get, (a) => (s) => set(s, a), name);
}

export function makeLensCurried<S, A>(
  get: (s: S) => A,
  set: (a: A) => (s: S) => S,
  name = "Lens"
): Lens<S, A> {
  return make(get, set, name);
}

/**
 * A lens whose setter may assign to the structure it receives: it is
 * handed a shallow copy, so the caller's object is never touched.
 *
 * @example
 * ```typescript
 * class Counter { count = 0; }
 *
 * const count = makeLensRef(
 *   (c: Counter) => c.count,
 *   (c, n) => { c.count = n; return c; }
 * );
 *
 * const before = new Counter();
 * const after = count.set(1)(before);
 * before.count;                 // 0
 * after instanceof Counter;     // true
 * ```
 */
export function makeLensRef<S extends object, A>(
  get: (s: S) => A,
  set: (s: S, a: A) => S,
  name = "LensRef"
): Lens<S, A> {
  return make(get, (a) => (s) => set(shallowCopy(s), a), name);
}

/**
 * Like `makeLensRef`, but setting a value equal to the current one returns
 * the same structure without copying.
 */
export function makeLensWithEq<S extends object, A>(
  eq: Eq<A>,
  get: (s: S) => A,
  set: (s: S, a: A) => S,
  name = "LensWithEq"
): Lens<S, A> {
  return make(get, (a) => (s) => (eq(get(s), a) ? s : set(shallowCopy(s), a)), name);
}

/** `makeLensWithEq` with `Object.is` as the equality. */
export const makeLensStrict = <S extends object, A>(
  get: (s: S) => A,
  set: (s: S, a: A) => S,
  name = "LensStrict"
): Lens<S, A> => makeLensWithEq(Object.is, get, set, name);

/** The lens from a whole to itself. */
export const id = <S>(): Lens<S, S> =>
  make(
    (s) => s,
    (a) => () => a,
    "LensIdentity"
  );

// =============================================================================
// Combinators
// =============================================================================

const composeWith = <S, A, B>(
  creator: (get: (s: S) => B, set: (b: B) => (s: S) => S, name: string) => Lens<S, B>,
  sa: Lens<S, A>,
  ab: Lens<A, B>
): Lens<S, B> =>
  creator(
    (s) => ab.get(sa.get(s)),
    (b) => (s) => sa.set(ab.set(b)(sa.get(s)))(s),
    `LensCompose[${sa.name} -> ${ab.name}]`
  );

/**
 * Focuses through `sa` and then `ab`.
 *
 * @example
 * ```typescript
 * const city = pipe(address, compose(cityOfAddress));
 * city.set("Paris")(person);
 * ```
 */
export const compose =
  <A, B>(ab: Lens<A, B>) =>
  <S>(sa: Lens<S, A>): Lens<S, B> =>
    composeWith(make, sa, ab);

/**
 * `compose` for object wholes: the outer structure is copied before the
 * inner setters run.
 */
export const composeRef =
  <A, B>(ab: Lens<A, B>) =>
  <S extends object>(sa: Lens<S, A>): Lens<S, B> =>
    composeWith<S, A, B>((get, set, name) => make(get, (b) => (s) => set(b)(shallowCopy(s)), name), sa, ab);

/** Applies `f` to the focused part. */
export const modify =
  <A>(f: Endomorphism<A>) =>
  <S>(sa: Lens<S, A>): Endomorphism<S> =>
  (s) =>
    sa.set(f(sa.get(s)))(s);

/**
 * Changes the focus type through an isomorphism `ab` / `ba`.
 *
 * @example
 * ```typescript
 * const celsius = makeLens((w: Weather) => w.celsius, (w, c) => ({ ...w, celsius: c }));
 * const fahrenheit = pipe(
 *   celsius,
 *   imap((c: number) => (c * 9) / 5 + 32, (f: number) => ((f - 32) * 5) / 9)
 * );
 * ```
 */
export const imap =
  <A, B>(ab: (a: A) => B, ba: (b: B) => A) =>
  <S>(sa: Lens<S, A>): Lens<S, B> =>
    make(
      (s) => ab(sa.get(s)),
      (b) => sa.set(ba(b)),
      `IMap[${sa.name}]`
    );
