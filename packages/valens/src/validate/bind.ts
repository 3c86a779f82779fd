import type { Endomorphism } from "../function";
import type { Lens } from "../lens";
import * as V from "../validation";
import { of } from "./validate";
import type { Kleisli, Operator, Validate } from "./types";

/**
 * Starts a validator pipeline that builds a state value field by field.
 *
 * @example
 * ```typescript
 * type Signup = { email: string; password: string; confirm: string };
 *
 * const signup = pipe(
 *   Do<Input, Partial<Signup>>({}),
 *   apS(setEmail, emailField),
 *   apS(setPassword, passwordField),
 *   bind(setConfirm, (s) => matches(s.password))
 * );
 * ```
 */
export const Do = <I, S>(empty: S): Validate<I, S> => of<I, S>(empty);

/**
 * Adds a field whose validator is chosen from the state so far. Once the
 * state has failed, `f` is not called and no further errors are added.
 */
export const bind =
  <I, S1, S2, A>(setter: (a: A) => (s1: S1) => S2, f: Kleisli<I, S1, A>): Operator<I, S1, S2> =>
  (fa) =>
  (input) =>
  (context) =>
    V.bind(setter, (s1: S1) => f(s1)(input)(context))(fa(input)(context));

export const let_ =
  <S1, S2, B>(setter: (b: B) => (s1: S1) => S2, f: (s1: S1) => B) =>
  <I>(fa: Validate<I, S1>): Validate<I, S2> =>
  (input) =>
  (context) =>
    V.let_(setter, f)(fa(input)(context));

export const letTo =
  <S1, S2, B>(setter: (b: B) => (s1: S1) => S2, b: B) =>
  <I>(fa: Validate<I, S1>): Validate<I, S2> =>
    let_(setter, () => b)(fa);

export const bindTo =
  <S1, T>(setter: (t: T) => S1) =>
  <I>(fa: Validate<I, T>): Validate<I, S1> =>
  (input) =>
  (context) =>
    V.bindTo(setter)(fa(input)(context));

/**
 * Adds a field from a validator that does not depend on the state. The
 * field validator always runs; if both it and the state have failed, the
 * state's errors come first.
 */
export const apS =
  <I, S1, S2, T>(setter: (t: T) => (s1: S1) => S2, fa: Validate<I, T>): Operator<I, S1, S2> =>
  (fs) =>
  (input) =>
  (context) =>
    V.apS(setter, fa(input)(context))(fs(input)(context));

export const apSL = <I, S, T>(lens: Lens<S, T>, fa: Validate<I, T>): Operator<I, S, S> => apS(lens.set, fa);

/**
 * `bind` through a lens: the focused value is validated by `f` and the
 * result written back in its place.
 *
 * @example
 * ```typescript
 * const normalised = pipe(
 *   Do<unknown, Settings>(defaults),
 *   bindL(retriesLens, (n) => (n > 10 ? failure("too many retries") : of(n)))
 * );
 * ```
 */
export const bindL = <I, S, T>(lens: Lens<S, T>, f: Kleisli<I, T, T>): Operator<I, S, S> =>
  bind(lens.set, (s: S) => f(lens.get(s)));

export const letL =
  <S, T>(lens: Lens<S, T>, f: Endomorphism<T>) =>
  <I>(fa: Validate<I, S>): Validate<I, S> =>
    let_(lens.set, (s: S) => f(lens.get(s)))(fa);

export const letToL =
  <S, T>(lens: Lens<S, T>, b: T) =>
  <I>(fa: Validate<I, S>): Validate<I, S> =>
    letTo(lens.set, b)(fa);
