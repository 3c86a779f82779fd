import type { Lazy } from "../function";
import { altMonoid as deriveAltMonoid, type Monoid } from "../monoid";
import * as VD from "../validate";
import { makeType } from "./codec";
import type { Operator, Type } from "./types";

/**
 * Decodes with `first`, and with `second` only when `first` fails. When
 * both fail, the errors of both are reported. Encoding and `is` come from
 * `first`.
 *
 * @example
 * ```typescript
 * const text = pipe(string(), compose(intFromString()));
 * const port = monadAlt(text, () => makeType("int", isInt, int().validate, String));
 * port.decode("8080"); // success(8080)
 * port.decode(8080);   // success(8080)
 * ```
 */
export const monadAlt = <A, O, I>(first: Type<A, O, I>, second: Lazy<Type<A, O, I>>): Type<A, O, I> =>
  makeType(
    `Alt[${first.name}]`,
    first.is,
    VD.monadAlt(first.validate, () => second().validate),
    first.encode
  );

export const alt =
  <A, O, I>(second: Lazy<Type<A, O, I>>): Operator<A, A, O, I> =>
  (first) =>
    monadAlt(first, second);

/**
 * "First codec that decodes wins". `empty` is `zero()`, built each time it
 * is read.
 */
export const altMonoid = <A, O, I>(zero: Lazy<Type<A, O, I>>): Monoid<Type<A, O, I>> =>
  deriveAltMonoid<Type<A, O, I>>(zero, monadAlt);
