import * as V from "../validation";
import type { Context, ContextEntry } from "../validation";
import { traverseArray } from "../validation";
import type { Validate } from "./types";

/**
 * The context one level below `context`.
 */
export const appendContext =
  (key: string, type: string, actual?: unknown) =>
  (context: Context): Context => {
    const entry: ContextEntry = { key, type, actual };
    return [...context, entry];
  };

/**
 * Runs `validator` with `key` appended to the context, so its errors are
 * reported one level deeper.
 */
export const withContext =
  (key: string, type: string) =>
  <I, A>(validator: Validate<I, A>): Validate<I, A> =>
  (input) =>
  (context) =>
    validator(input)(appendContext(key, type, input)(context));

const isObject = (u: unknown): u is object => typeof u === "object" && u !== null;

/**
 * Validates the `key` property of an object input. A missing property is
 * passed to `validator` as `undefined`; an input that is not an object
 * fails with `expected object`.
 *
 * @example
 * ```typescript
 * const user = pipe(
 *   Do<unknown, Partial<User>>({}),
 *   apS(setName, field("name", nonEmptyString, "string")),
 *   apS(setAge, field("age", number, "number"))
 * );
 *
 * decode(user, "User")({ name: "", age: "x" });
 * // failures at "User.name" and "User.age"
 * ```
 */
export const field =
  <A>(key: string, validator: Validate<unknown, A>, type = "unknown"): Validate<unknown, A> =>
  (input) =>
  (context) => {
    if (!isObject(input)) {
      return V.failureWithMessage(input, "expected object")(context);
    }
    const value: unknown = Reflect.get(input, key);
    return validator(value)(appendContext(key, type, value)(context));
  };

/**
 * Validates every element of an array input, each under the key `[i]`.
 * The errors of all failing elements are reported together.
 */
export const array =
  <A>(item: Validate<unknown, A>, type = "unknown"): Validate<unknown, readonly A[]> =>
  (input) =>
  (context) => {
    if (!Array.isArray(input)) {
      return V.failureWithMessage(input, "expected array")(context);
    }
    return traverseArray((element: unknown, index: number) =>
      item(element)(appendContext(`[${index}]`, type, element)(context))
    )(input);
  };

/**
 * Runs a validator from the root. The root context entry has no key and
 * `name` as its type, so error paths start with `name`.
 */
export const decode =
  <I, A>(validator: Validate<I, A>, name = "root") =>
  (input: I): V.Validation<A> =>
    validator(input)([{ key: "", type: name, actual: input }]);
