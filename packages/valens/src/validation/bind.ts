import type { Endomorphism } from "../function";
import type { Lens } from "../lens";
import { monadAp, monadChain, monadMap } from "./monad";
import { success } from "./validation";
import type { Kleisli, Operator, Validation } from "./types";

/**
 * Starts a do-notation pipeline with an initial state.
 *
 * @example
 * ```typescript
 * type State = { x?: number; y?: number };
 * const result = pipe(
 *   Do<State>({}),
 *   bind(setX, () => success(10)),
 *   bind(setY, (s) => success((s.x ?? 0) * 2))
 * ); // success({ x: 10, y: 20 })
 * ```
 */
export const Do = <S>(empty: S): Validation<S> => success(empty);

/**
 * Adds a field whose validation may read the state built so far.
 * A failed state is passed through without calling `f`.
 */
export const bind =
  <S1, S2, A>(setter: (a: A) => (s1: S1) => S2, f: Kleisli<S1, A>): Operator<S1, S2> =>
  (fa) =>
    monadChain(fa, (s1) => monadMap(f(s1), (a) => setter(a)(s1)));

/**
 * Adds a field computed by a total function of the state.
 */
export const let_ =
  <S1, S2, B>(setter: (b: B) => (s1: S1) => S2, f: (s1: S1) => B): Operator<S1, S2> =>
  (fa) =>
    monadMap(fa, (s1) => setter(f(s1))(s1));

export const letTo = <S1, S2, B>(setter: (b: B) => (s1: S1) => S2, b: B): Operator<S1, S2> =>
  let_(setter, () => b);

/**
 * Wraps a single validated value into an initial state.
 */
export const bindTo =
  <S1, T>(setter: (t: T) => S1): Operator<T, S1> =>
  (fa) =>
    monadMap(fa, setter);

/**
 * Adds a field from an independent validation, combined applicatively:
 * when both the state and the field have failed, both error sets are kept,
 * the state's first.
 */
export const apS =
  <S1, S2, T>(setter: (t: T) => (s1: S1) => S2, fa: Validation<T>): Operator<S1, S2> =>
  (fs) =>
    monadAp(
      monadMap(fs, (s1) => (t: T) => setter(t)(s1)),
      fa
    );

export const apSL = <S, T>(lens: Lens<S, T>, fa: Validation<T>): Operator<S, S> => apS(lens.set, fa);

/**
 * `bind` through a lens: `f` receives the focused value and its result is
 * written back to the same place.
 */
export const bindL = <S, T>(lens: Lens<S, T>, f: Kleisli<T, T>): Operator<S, S> =>
  bind(lens.set, (s: S) => f(lens.get(s)));

export const letL = <S, T>(lens: Lens<S, T>, f: Endomorphism<T>): Operator<S, S> =>
  let_(lens.set, (s: S) => f(lens.get(s)));

export const letToL = <S, T>(lens: Lens<S, T>, b: T): Operator<S, S> => letTo(lens.set, b);
