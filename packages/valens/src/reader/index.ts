/**
 * valens/reader
 *
 * A computation that reads a shared environment. Validators are readers
 * of the validation context, which is how they stay context-agnostic until
 * they are run.
 */

export type Reader<R, A> = (r: R) => A;

export const of =
  <R, A>(a: A): Reader<R, A> =>
  () =>
    a;

/** Reads the whole environment. */
export const ask =
  <R>(): Reader<R, R> =>
  (r) =>
    r;

export const asks = <R, A>(f: (r: R) => A): Reader<R, A> => f;

export const map =
  <R, A, B>(f: (a: A) => B) =>
  (fa: Reader<R, A>): Reader<R, B> =>
  (r) =>
    f(fa(r));

export const chain =
  <R, A, B>(f: (a: A) => Reader<R, B>) =>
  (fa: Reader<R, A>): Reader<R, B> =>
  (r) =>
    f(fa(r))(r);

/**
 * Runs a reader against a modified environment.
 */
export const local =
  <R1, R2, A>(f: (r: R1) => R2) =>
  (fa: Reader<R2, A>): Reader<R1, A> =>
  (r) =>
    fa(f(r));
