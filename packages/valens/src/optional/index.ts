/**
 * valens/optional
 *
 * An optional focuses on a part `A` that may be missing from a whole `S`.
 * `getOption` reports whether it is there; `set` only replaces a part that
 * is there, and returns the whole unchanged otherwise.
 */

import type { Endomorphism, Predicate } from "../function";
import { shallowCopy } from "../internal/copy";
import type { Lens } from "../lens";
import * as O from "../option";
import type { Option } from "../option";
import type { Prism } from "../prism";

export interface Optional<S, A> {
  readonly getOption: (s: S) => Option<A>;
  readonly set: (a: A) => (s: S) => S;
  readonly name: string;
}

const make = <S, A>(getOption: (s: S) => Option<A>, set: (a: A) => (s: S) => S, name: string): Optional<S, A> => ({
  getOption,
  set,
  name,
});

/** `set` that leaves `s` alone when nothing is focused. */
const guarded =
  <S, A>(getOption: (s: S) => Option<A>, set: (a: A) => (s: S) => S) =>
  (a: A) =>
  (s: S): S =>
    getOption(s).some ? set(a)(s) : s;

// =============================================================================
// Constructors
// =============================================================================

/**
 * @example
 * ```typescript
 * type Config = { timeout?: number };
 *
 * const timeout = makeOptional(
 *   (c: Config) => O.fromNullable(c.timeout),
 *   (c, timeout) => ({ ...c, timeout })
 * );
 *
 * timeout.set(30)({});             // {} (nothing to replace)
 * timeout.set(30)({ timeout: 5 }); // { timeout: 30 }
 * ```
 */
export function makeOptional<S, A>(
  getOption: (s: S) => Option<A>,
  set: (s: S, a: A) => S,
  name = "Optional"
): Optional<S, A> {
  return make(
    getOption,
    guarded(getOption, (a: A) => (s: S) => set(s, a)),
    name
  );
}

export function makeOptionalCurried<S, A>(
  getOption: (s: S) => Option<A>,
  set: (a: A) => (s: S) => S,
  name = "Optional"
): Optional<S, A> {
  return make(getOption, guarded(getOption, set), name);
}

/**
 * An optional over an object that may itself be `null` or `undefined`.
 * A nullish whole focuses nothing and is returned as is by `set`;
 * otherwise the setter works on a shallow copy.
 */
export function makeOptionalRef<S extends object, A>(
  getOption: (s: S) => Option<A>,
  set: (s: S, a: A) => S,
  name = "OptionalRef"
): Optional<S | null | undefined, A> {
  const getRef = (s: S | null | undefined): Option<A> => (s == null ? O.none() : getOption(s));
  return make(
    getRef,
    (a) => (s) => (s != null && getOption(s).some ? set(shallowCopy(s), a) : s),
    name
  );
}

export const id = <S>(): Optional<S, S> =>
  make<S, S>(
    O.some,
    (a) => () => a,
    "OptionalIdentity"
  );

/**
 * Focuses on the part selected by `get` only while it satisfies
 * `predicate`. The setter checks the current part, not the new one.
 *
 * @example
 * ```typescript
 * const positiveBalance = fromPredicate((n: number) => n > 0)(
 *   (a: Account) => a.balance,
 *   (a, balance) => ({ ...a, balance })
 * );
 * ```
 */
export const fromPredicate =
  <A>(predicate: Predicate<A>) =>
  <S>(get: (s: S) => A, set: (s: S, a: A) => S): Optional<S, A> =>
    makeOptional(
      (s: S) => O.fromPredicate(predicate)(get(s)),
      set,
      "OptionalFromPredicate"
    );

/** `fromPredicate` over an object whole, setting on a copy. */
export const fromPredicateRef =
  <A>(predicate: Predicate<A>) =>
  <S extends object>(get: (s: S) => A, set: (s: S, a: A) => S): Optional<S | null | undefined, A> =>
    makeOptionalRef(
      (s: S) => O.fromPredicate(predicate)(get(s)),
      set,
      "OptionalFromPredicateRef"
    );

/** Every lens is an optional whose part is always there. */
export const lensAsOptional = <S, A>(sa: Lens<S, A>): Optional<S, A> =>
  make(
    (s) => O.some(sa.get(s)),
    sa.set,
    sa.name
  );

/**
 * A prism seen as an optional: `set` replaces the whole with
 * `reverseGet(a)` when the prism matches it.
 */
export const prismAsOptional = <S, A>(sa: Prism<S, A>): Optional<S, A> =>
  makeOptionalCurried(sa.getOption, (a) => () => sa.reverseGet(a), sa.name);

// =============================================================================
// Modification
// =============================================================================

/**
 * Applies `f` to the focused part. `none` when nothing is focused.
 */
export const modifyOption =
  <A>(f: Endomorphism<A>) =>
  <S>(sa: Optional<S, A>) =>
  (s: S): Option<S> =>
    O.map((a: A) => sa.set(f(a))(s))(sa.getOption(s));

/** Applies `f` to the focused part; the whole is unchanged when nothing is focused. */
export const modify =
  <A>(f: Endomorphism<A>) =>
  <S>(sa: Optional<S, A>): Endomorphism<S> =>
  (s) => {
    const modified = modifyOption(f)(sa)(s);
    return modified.some ? modified.value : s;
  };

export const setOption = <A>(a: A) => modifyOption<A>(() => a);

// =============================================================================
// Composition
// =============================================================================

const composeWith = <S, A, B>(
  creator: (getOption: (s: S) => Option<B>, set: (b: B) => (s: S) => S, name: string) => Optional<S, B>,
  sa: Optional<S, A>,
  ab: Optional<A, B>
): Optional<S, B> =>
  creator(
    (s) => O.chain(ab.getOption)(sa.getOption(s)),
    (b) => modify(ab.set(b))(sa),
    `OptionalCompose[${sa.name} -> ${ab.name}]`
  );

/**
 * Focuses through `sa` and then `ab`. Setting is a no-op if either step
 * finds nothing.
 */
export const compose =
  <A, B>(ab: Optional<A, B>) =>
  <S>(sa: Optional<S, A>): Optional<S, B> =>
    composeWith(makeOptionalCurried, sa, ab);

export const composeRef =
  <A, B>(ab: Optional<A, B>) =>
  <S extends object>(sa: Optional<S | null | undefined, A>): Optional<S | null | undefined, B> =>
    composeWith<S | null | undefined, A, B>(
      (getOption, set, name) =>
        makeOptionalCurried(getOption, (b) => (s) => (s == null ? s : set(b)(shallowCopy(s))), name),
      sa,
      ab
    );

// =============================================================================
// Focus transformations
// =============================================================================

/** Changes the focus type through an isomorphism. */
export const imap =
  <A, B>(ab: (a: A) => B, ba: (b: B) => A) =>
  <S>(sa: Optional<S, A>): Optional<S, B> =>
    make(
      (s) => O.map(ab)(sa.getOption(s)),
      (b) => sa.set(ba(b)),
      `IMap[${sa.name}]`
    );

/**
 * Changes the focus type through a partial isomorphism. `set` leaves the
 * whole unchanged when `ab` rejects the current part or `ba` finds no `A`
 * for the new value.
 *
 * @example
 * ```typescript
 * const port = pipe(
 *   portString,
 *   ichain(
 *     (s: string) => (/^\d+$/.test(s) ? O.some(Number(s)) : O.none()),
 *     (n: number) => (Number.isInteger(n) ? O.some(String(n)) : O.none())
 *   )
 * );
 * ```
 */
export const ichain =
  <A, B>(ab: O.Kleisli<A, B>, ba: O.Kleisli<B, A>) =>
  <S>(sa: Optional<S, A>): Optional<S, B> =>
    makeOptionalCurried(
      (s: S) => O.chain(ab)(sa.getOption(s)),
      (b: B) => {
        const a = ba(b);
        return a.some ? sa.set(a.value) : (s: S) => s;
      },
      `IChain[${sa.name}]`
    );
