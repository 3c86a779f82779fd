import type { Endomorphism, Predicate } from "../function";
import * as O from "../option";
import type { Option } from "../option";

export interface Prism<S, A> {
  readonly getOption: (s: S) => Option<A>;
  readonly reverseGet: (a: A) => S;
  readonly name: string;
}

export function makePrism<S, A>(
  getOption: (s: S) => Option<A>,
  reverseGet: (a: A) => S,
  name = "Prism"
): Prism<S, A> {
  return { getOption, reverseGet, name };
}

export const id = <S>(): Prism<S, S> => makePrism<S, S>(O.some, (s) => s, "PrismIdentity");

/**
 * Matches the values that satisfy `predicate`; `reverseGet` is the identity.
 *
 * @example
 * ```typescript
 * const positive = fromPredicate((n: number) => n > 0);
 * positive.getOption(5);  // some(5)
 * positive.getOption(-1); // none
 * ```
 */
export const fromPredicate = <A>(predicate: Predicate<A>, name = "PrismFromPredicate"): Prism<A, A> =>
  makePrism(O.fromPredicate(predicate), (a) => a, name);

// =============================================================================
// Combinators
// =============================================================================

/** Matches `sa` and then `ab`. */
export const compose =
  <A, B>(ab: Prism<A, B>) =>
  <S>(sa: Prism<S, A>): Prism<S, B> =>
    makePrism(
      (s: S) => O.chain(ab.getOption)(sa.getOption(s)),
      (b: B) => sa.reverseGet(ab.reverseGet(b)),
      `PrismCompose[${sa.name} -> ${ab.name}]`
    );

export const imap =
  <A, B>(ab: (a: A) => B, ba: (b: B) => A) =>
  <S>(sa: Prism<S, A>): Prism<S, B> =>
    makePrism(
      (s: S) => O.map(ab)(sa.getOption(s)),
      (b: B) => sa.reverseGet(ba(b)),
      `IMap[${sa.name}]`
    );

/**
 * Replaces a matching `s` with `reverseGet(a)`; any other `s` is returned
 * unchanged.
 */
export const set =
  <A>(a: A) =>
  <S>(sa: Prism<S, A>): Endomorphism<S> =>
  (s) =>
    sa.getOption(s).some ? sa.reverseGet(a) : s;

/** Applies `f` to a matching value and rebuilds the whole. */
export const modify =
  <A>(f: Endomorphism<A>) =>
  <S>(sa: Prism<S, A>): Endomorphism<S> =>
  (s) => {
    const a = sa.getOption(s);
    return a.some ? sa.reverseGet(f(a.value)) : s;
  };
