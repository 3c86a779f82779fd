/**
 * valens/function
 *
 * Function composition helpers and the small function-shaped types the
 * rest of the library is written in.
 */

// =============================================================================
// Types
// =============================================================================

/** A deferred computation, evaluated when called. */
export type Lazy<A> = () => A;

/** A function from a type to itself. */
export type Endomorphism<A> = (a: A) => A;

export type Predicate<A> = (a: A) => boolean;

export type Refinement<A, B extends A> = (a: A) => a is B;

/** Equality of two values of the same type. */
export type Eq<A> = (x: A, y: A) => boolean;

// =============================================================================
// Composition
// =============================================================================

/**
 * Pipe a value through a series of functions left-to-right.
 *
 * @example
 * ```typescript
 * const result = pipe(
 *   V.success(5),
 *   V.map((x) => x * 2),
 *   V.map((x) => x + 1)
 * ); // V.success(11)
 * ```
 */
export function pipe<A>(a: A): A;
export function pipe<A, B>(a: A, ab: (a: A) => B): B;
export function pipe<A, B, C>(a: A, ab: (a: A) => B, bc: (b: B) => C): C;
export function pipe<A, B, C, D>(a: A, ab: (a: A) => B, bc: (b: B) => C, cd: (c: C) => D): D;
export function pipe<A, B, C, D, E>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E
): E;
export function pipe<A, B, C, D, E, F>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F
): F;
export function pipe<A, B, C, D, E, F, G>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F,
  fg: (f: F) => G
): G;
export function pipe<A, B, C, D, E, F, G, H>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F,
  fg: (f: F) => G,
  gh: (g: G) => H
): H;
export function pipe<A, B, C, D, E, F, G, H, I>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F,
  fg: (f: F) => G,
  gh: (g: G) => H,
  hi: (h: H) => I
): I;
export function pipe<A, B, C, D, E, F, G, H, I, J>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F,
  fg: (f: F) => G,
  gh: (g: G) => H,
  hi: (h: H) => I,
  ij: (i: I) => J
): J;
export function pipe<A, B, C, D, E, F, G, H, I, J, K>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F,
  fg: (f: F) => G,
  gh: (g: G) => H,
  hi: (h: H) => I,
  ij: (i: I) => J,
  jk: (j: J) => K
): K;
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export function pipe(a: unknown, ...fns: Array<(x: any) => any>): unknown {
  return fns.reduce((acc, fn) => fn(acc), a);
}

/**
 * Compose functions left-to-right into a new function.
 */
export function flow<A extends readonly unknown[], B>(ab: (...a: A) => B): (...a: A) => B;
export function flow<A extends readonly unknown[], B, C>(
  ab: (...a: A) => B,
  bc: (b: B) => C
): (...a: A) => C;
export function flow<A extends readonly unknown[], B, C, D>(
  ab: (...a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D
): (...a: A) => D;
export function flow<A extends readonly unknown[], B, C, D, E>(
  ab: (...a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E
): (...a: A) => E;
export function flow<A extends readonly unknown[], B, C, D, E, F>(
  ab: (...a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F
): (...a: A) => F;
export function flow<A extends readonly unknown[], B, C, D, E, F, G>(
  ab: (...a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F,
  fg: (f: F) => G
): (...a: A) => G;
export function flow(
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  first: (...args: any[]) => unknown,
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  ...rest: Array<(x: any) => any>
): (...args: unknown[]) => unknown {
  return (...args: unknown[]) => rest.reduce((acc, fn) => fn(acc), first(...args));
}

/**
 * Compose functions right-to-left.
 *
 * @example
 * ```typescript
 * const double = (x: number) => x * 2;
 * const addOne = (x: number) => x + 1;
 * compose(addOne, double)(5); // 11
 * ```
 */
export function compose<A, B>(ab: (a: A) => B): (a: A) => B;
export function compose<A, B, C>(bc: (b: B) => C, ab: (a: A) => B): (a: A) => C;
export function compose<A, B, C, D>(cd: (c: C) => D, bc: (b: B) => C, ab: (a: A) => B): (a: A) => D;
export function compose<A, B, C, D, E>(
  de: (d: D) => E,
  cd: (c: C) => D,
  bc: (b: B) => C,
  ab: (a: A) => B
): (a: A) => E;
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export function compose(...fns: Array<(x: any) => any>): (a: unknown) => unknown {
  return (a: unknown) => fns.reduceRight((acc, fn) => fn(acc), a);
}

export const identity = <A>(a: A): A => a;

/**
 * A lazy value that always returns `a`.
 */
export const constant =
  <A>(a: A): Lazy<A> =>
  () =>
    a;
