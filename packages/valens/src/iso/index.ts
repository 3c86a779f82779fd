/**
 * valens/iso
 *
 * An isomorphism: two views of the same data with a lossless conversion
 * each way. Every iso is also a lens and a prism.
 *
 * Laws: `reverseGet(get(s))` equals `s`, `get(reverseGet(a))` equals `a`.
 */

import type { Endomorphism } from "../function";
import { makeLensCurried, type Lens } from "../lens";
import * as O from "../option";
import { makePrism, type Prism } from "../prism";

export interface Iso<S, A> {
  readonly get: (s: S) => A;
  readonly reverseGet: (a: A) => S;
  readonly name: string;
}

export const makeIso = <S, A>(get: (s: S) => A, reverseGet: (a: A) => S, name = "Iso"): Iso<S, A> => ({
  get,
  reverseGet,
  name,
});

export const id = <S>(): Iso<S, S> =>
  makeIso<S, S>(
    (s) => s,
    (s) => s,
    "IsoIdentity"
  );

// =============================================================================
// Combinators
// =============================================================================

export const compose =
  <A, B>(ab: Iso<A, B>) =>
  <S>(sa: Iso<S, A>): Iso<S, B> =>
    makeIso(
      (s: S) => ab.get(sa.get(s)),
      (b: B) => sa.reverseGet(ab.reverseGet(b)),
      `IsoCompose[${sa.name} -> ${ab.name}]`
    );

/** The same iso read the other way round. */
export const reverse = <S, A>(sa: Iso<S, A>): Iso<A, S> => makeIso(sa.reverseGet, sa.get, `Reverse[${sa.name}]`);

/** Edits `S` through its `A` view. */
export const modify =
  <A>(f: Endomorphism<A>) =>
  <S>(sa: Iso<S, A>): Endomorphism<S> =>
  (s) =>
    sa.reverseGet(f(sa.get(s)));

export const to =
  <S>(s: S) =>
  <A>(sa: Iso<S, A>): A =>
    sa.get(s);

export const from =
  <A>(a: A) =>
  <S>(sa: Iso<S, A>): S =>
    sa.reverseGet(a);

export const imap =
  <A, B>(ab: (a: A) => B, ba: (b: B) => A) =>
  <S>(sa: Iso<S, A>): Iso<S, B> =>
    makeIso(
      (s: S) => ab(sa.get(s)),
      (b: B) => sa.reverseGet(ba(b)),
      `IMap[${sa.name}]`
    );

/** `set` ignores the old whole and rebuilds it from the new part. */
export const asLens = <S, A>(sa: Iso<S, A>): Lens<S, A> =>
  makeLensCurried(sa.get, (a: A) => () => sa.reverseGet(a), sa.name);

export const asPrism = <S, A>(sa: Iso<S, A>): Prism<S, A> =>
  makePrism((s: S) => O.some(sa.get(s)), sa.reverseGet, sa.name);

// =============================================================================
// Stock isos
// =============================================================================

/**
 * Lines joined with `separator`, and split again on the way back.
 *
 * @example
 * ```typescript
 * lines().get(["a", "b"]);   // "a\nb"
 * lines().reverseGet("a\nb"); // ["a", "b"]
 * ```
 */
export const lines = (separator = "\n"): Iso<readonly string[], string> =>
  makeIso<readonly string[], string>(
    (ls) => ls.join(separator),
    (s) => s.split(separator),
    "IsoLines"
  );

/** Milliseconds since the epoch as a `Date`. */
export const unixMilli = (): Iso<number, Date> =>
  makeIso<number, Date>(
    (ms) => new Date(ms),
    (date) => date.getTime(),
    "IsoUnixMilli"
  );

export const add = (n: number): Iso<number, number> =>
  makeIso<number, number>(
    (x) => x + n,
    (x) => x - n,
    `IsoAdd[${n}]`
  );

export const sub = (n: number): Iso<number, number> =>
  makeIso<number, number>(
    (x) => x - n,
    (x) => x + n,
    `IsoSub[${n}]`
  );

export const reverseArray = <A>(): Iso<readonly A[], readonly A[]> =>
  makeIso<readonly A[], readonly A[]>(
    (as) => [...as].reverse(),
    (as) => [...as].reverse(),
    "IsoReverseArray"
  );

export const swap = <A, B>(): Iso<readonly [A, B], readonly [B, A]> =>
  makeIso<readonly [A, B], readonly [B, A]>(
    ([a, b]) => [b, a],
    ([b, a]) => [a, b],
    "IsoSwap"
  );
