import { identity } from "../function";
import * as O from "../option";
import { makePrism, type Prism } from "../prism";
import * as R from "../result";
import type { Result } from "../result";
import * as VD from "../validate";
import type { Validate } from "../validate";
import * as V from "../validation";
import type { Encode, Is, Type } from "./types";

// =============================================================================
// Constructors
// =============================================================================

/**
 * @example
 * ```typescript
 * const port = makeType(
 *   "Port",
 *   (u): u is number => Number.isInteger(u),
 *   VD.fromPredicate((n: number) => n > 0 && n < 65536, "expected port"),
 *   (n) => n
 * );
 *
 * port.decode(0); // failure "at Port: expected port"
 * ```
 */
export function makeType<A, O, I>(
  name: string,
  is: Is<A>,
  validate: Validate<I, A>,
  encode: Encode<A, O>
): Type<A, O, I> {
  return { name, is, validate, decode: VD.decode(validate, name), encode };
}

const validateFromPrism =
  <A, B>(prism: Prism<A, B>, message: string): Validate<A, B> =>
  (a) =>
  (context) => {
    const b = prism.getOption(a);
    return b.some ? V.success(b.value) : V.failureWithMessage(a, message)(context);
  };

/**
 * A codec that decodes with `prism.getOption` and encodes with
 * `prism.reverseGet`. Inputs the prism does not match fail with `message`.
 */
export const fromPrism = <A, B>(prism: Prism<A, B>, is: Is<B>, name: string, message: string): Type<B, A, A> =>
  makeType(name, is, validateFromPrism(prism, message), prism.reverseGet);

/** `fromPrism` with a name and message derived from the prism's name. */
export const fromRefinement = <A, B>(refinement: Prism<A, B>, is: Is<B>): Type<B, A, A> =>
  fromPrism(refinement, is, `FromRefinement(${refinement.name})`, `type cannot be refined: ${refinement.name}`);

/** Decoding that succeeds for every input; `is` still decides membership. */
export const id = <T>(is: Is<T>, name = "Id"): Type<T, T, T> => makeType(name, is, VD.success<T>(), identity);

// =============================================================================
// Primitives
// =============================================================================

const isString = (u: unknown): u is string => typeof u === "string";
const isNumber = (u: unknown): u is number => typeof u === "number" && !Number.isNaN(u);
const isInt = (u: unknown): u is number => Number.isSafeInteger(u);
const isBoolean = (u: unknown): u is boolean => typeof u === "boolean";

export const string = (): Type<string, string, unknown> => makeType("string", isString, VD.string, identity);

export const number = (): Type<number, number, unknown> => makeType("number", isNumber, VD.number, identity);

/** Safe integers. */
export const int = (): Type<number, number, unknown> =>
  makeType("int", isInt, VD.fromRefinement(isInt, "expected integer"), identity);

export const boolean = (): Type<boolean, boolean, unknown> => makeType("boolean", isBoolean, VD.boolean, identity);

// =============================================================================
// Containers
// =============================================================================

const isArrayOf =
  <A>(is: Is<A>) =>
  (u: unknown): u is readonly A[] =>
    Array.isArray(u) && u.every((element) => is(element));

/**
 * Arrays of `item`. Each element is checked under the key `[i]`, and the
 * errors of every failing element are reported.
 *
 * @example
 * ```typescript
 * array(int()).decode([1, "2", 3.5]);
 * // "at Array[int].[1]: expected integer", "at Array[int].[2]: expected integer"
 * ```
 */
export const array = <A, O>(item: Type<A, O, unknown>): Type<readonly A[], readonly O[], unknown> =>
  makeType(`Array[${item.name}]`, isArrayOf(item.is), VD.array(item.validate, item.name), (as) =>
    as.map((a) => item.encode(a))
  );

/** `array` for inputs that are already arrays of the item's input type. */
export const transcodeArray = <A, O, I>(item: Type<A, O, I>): Type<readonly A[], readonly O[], readonly I[]> => {
  const validate: Validate<readonly I[], readonly A[]> = (inputs) => (context) =>
    V.traverseArray((input: I, index: number) =>
      item.validate(input)(VD.appendContext(`[${index}]`, item.name, input)(context))
    )(inputs);
  return makeType(`Array[${item.name}]`, isArrayOf(item.is), validate, (as) => as.map((a) => item.encode(a)));
};

/**
 * Decodes the `key` property of an object input with `item`, reporting
 * errors under `key`. Encoding is the item's.
 */
export const field = <A, O>(key: string, item: Type<A, O, unknown>): Type<A, O, unknown> =>
  makeType(item.name, item.is, VD.field(key, item.validate, item.name), item.encode);

const isResultOf = <A, B>(u: unknown, isError: Is<A>, isValue: Is<B>): u is Result<B, A> => {
  if (typeof u !== "object" || u === null) {
    return false;
  }
  const tag: unknown = Reflect.get(u, "ok");
  return tag === true ? isValue(Reflect.get(u, "value")) : tag === false && isError(Reflect.get(u, "error"));
};

/**
 * Decodes with `right` first and falls back to `left`; the decoded value
 * records which one matched as `ok(b)` or `err(a)`. Both error sets are
 * kept when neither matches.
 */
export const either = <A, B, O, I>(left: Type<A, O, I>, right: Type<B, O, I>): Type<Result<B, A>, O, I> =>
  makeType(
    `Either[${left.name}, ${right.name}]`,
    (u: unknown): u is Result<B, A> => isResultOf(u, left.is, right.is),
    VD.alt(() => VD.map((a: A): Result<B, A> => R.err(a))(left.validate))(
      VD.map((b: B): Result<B, A> => R.ok(b))(right.validate)
    ),
    R.fold<A, B, O>(left.encode, right.encode)
  );

// =============================================================================
// Composition
// =============================================================================

/**
 * Decodes with `self` and then with `ab`; encodes with `ab` and then with
 * `self`.
 *
 * @example
 * ```typescript
 * const port = pipe(intFromString(), compose(portRange));
 * port.decode("8080"); // success(8080)
 * port.encode(8080);   // "8080"
 * ```
 */
export const compose =
  <A, B>(ab: Type<B, A, A>) =>
  <O, I>(self: Type<A, O, I>): Type<B, O, I> =>
    makeType(
      `Pipe(${self.name}, ${ab.name})`,
      ab.is,
      VD.chain<I, A, B>((a) => () => ab.validate(a))(self.validate),
      (b) => self.encode(ab.encode(b))
    );

/**
 * A codec whose input and output agree, seen as a prism: `getOption`
 * decodes and `reverseGet` encodes.
 */
export const toPrism = <A, I>(type: Type<A, I, I>): Prism<I, A> =>
  makePrism<I, A>(
    (i) => {
      const decoded = type.decode(i);
      return decoded.ok ? O.some(decoded.value) : O.none();
    },
    type.encode,
    type.name
  );
