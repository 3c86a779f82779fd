/**
 * valens/option
 *
 * An explicit optional value. Optics report "not there" with `none()`
 * instead of a null sentinel, so a present `undefined` or `0` is never
 * confused with a missing one.
 */

import type { Lazy, Predicate } from "../function";
import type { Result } from "../result";

export type Some<A> = { some: true; value: A };

export type None = { some: false };

export type Option<A> = Some<A> | None;

/** A function returning an optional value. */
export type Kleisli<A, B> = (a: A) => Option<B>;

const NONE: None = Object.freeze({ some: false });

export const some = <A>(value: A): Option<A> => ({ some: true, value });

export const none = <A = never>(): Option<A> => NONE;

export const of = some;

export const isSome = <A>(fa: Option<A>): fa is Some<A> => fa.some;

export const isNone = <A>(fa: Option<A>): fa is None => !fa.some;

/**
 * `none` for `null` and `undefined`, `some` for everything else.
 */
export const fromNullable = <A>(a: A | null | undefined): Option<A> =>
  a == null ? NONE : some(a);

export const fromPredicate =
  <A>(predicate: Predicate<A>): Kleisli<A, A> =>
  (a) =>
    predicate(a) ? some(a) : NONE;

/**
 * Keeps the value of an `ok` result and drops the error.
 */
export const fromResult = <A, E>(r: Result<A, E>): Option<A> => (r.ok ? some(r.value) : NONE);

// =============================================================================
// Combinators (curried for pipe)
// =============================================================================

export const map =
  <A, B>(f: (a: A) => B) =>
  (fa: Option<A>): Option<B> =>
    fa.some ? some(f(fa.value)) : NONE;

export const chain =
  <A, B>(f: Kleisli<A, B>) =>
  (fa: Option<A>): Option<B> =>
    fa.some ? f(fa.value) : NONE;

export const fold =
  <A, B>(onNone: Lazy<B>, onSome: (a: A) => B) =>
  (fa: Option<A>): B =>
    fa.some ? onSome(fa.value) : onNone();

export const getOrElse =
  <A>(onNone: Lazy<A>) =>
  (fa: Option<A>): A =>
    fa.some ? fa.value : onNone();

/**
 * Keeps the first present value, evaluating `second` only when needed.
 */
export const alt =
  <A>(second: Lazy<Option<A>>) =>
  (fa: Option<A>): Option<A> =>
    fa.some ? fa : second();

export const toUndefined = <A>(fa: Option<A>): A | undefined => (fa.some ? fa.value : undefined);

/**
 * Structural equality of two options using `eq` for the payloads.
 */
export const equals =
  <A>(eq: (x: A, y: A) => boolean = Object.is) =>
  (x: Option<A>, y: Option<A>): boolean =>
    x.some ? y.some && eq(x.value, y.value) : !y.some;
