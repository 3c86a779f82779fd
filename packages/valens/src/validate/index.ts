/**
 * valens/validate
 *
 * Validators: functions from an input and a context path to a
 * `Validation`. They compose with the same operations as `Validation`
 * itself, lifted over the input and the context, and report where in the
 * input each error was found.
 *
 * @example
 * ```typescript
 * import { pipe } from "valens/function";
 * import * as VD from "valens/validate";
 *
 * type User = { name: string; age: number };
 *
 * const user = pipe(
 *   VD.Do<unknown, Partial<User>>({}),
 *   VD.apS((name: string) => (s) => ({ ...s, name }), VD.field("name", VD.nonEmptyString, "string")),
 *   VD.apS((age: number) => (s) => ({ ...s, age }), VD.field("age", VD.number, "number"))
 * );
 *
 * VD.decode(user, "User")({ name: "", age: "x" });
 * // two errors: "at User.name: expected non-empty string", "at User.age: expected number"
 * ```
 */

export type { Kleisli, Operator, Validate } from "./types";

export {
  of,
  monadMap,
  map,
  monadAp,
  ap,
  monadChain,
  chain,
  monadChainLeft,
  chainLeft,
  orElse,
  monadAlt,
  alt,
} from "./validate";

export { Do, bind, let_, let_ as let, letTo, bindTo, apS, apSL, bindL, letL, letToL } from "./bind";

export { applicativeMonoid, alternativeMonoid, altMonoid } from "./monoid";

export {
  fromReaderResult,
  success,
  failure,
  fromPredicate,
  fromRefinement,
  string,
  number,
  boolean,
  nonEmptyString,
} from "./from";

export { appendContext, withContext, field, array, decode } from "./context";

export { logged, type LoggedOptions } from "./log";

export { toResult } from "../validation";
