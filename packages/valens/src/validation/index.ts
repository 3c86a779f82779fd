/**
 * valens/validation
 *
 * Validation that keeps going: independent checks combined with `ap`,
 * `apS` or the applicative monoid report every error they find, while
 * `chain` and `bind` sequence dependent steps.
 *
 * @example
 * ```typescript
 * import { pipe } from "valens/function";
 * import * as V from "valens/validation";
 *
 * const result = pipe(
 *   V.Do<{ name?: string; age?: number }>({}),
 *   V.apS((name: string) => (s) => ({ ...s, name }), checkName(input.name)),
 *   V.apS((age: number) => (s) => ({ ...s, age }), checkAge(input.age))
 * );
 * ```
 */

export type { Context, ContextEntry, Errors, Failure, Kleisli, Operator, Reader, Success, Validation } from "./types";

export {
  ValidationError,
  ValidationErrors,
  formatPath,
  isValidationError,
  isValidationErrors,
  makeValidationErrors,
  type ValidationErrorProps,
} from "./errors";

export {
  success,
  of,
  failures,
  failureWithMessage,
  failureWithError,
  isSuccess,
  isFailure,
  fold,
  getErrors,
  toResult,
} from "./validation";

export {
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
  traverseArray,
  sequenceArray,
} from "./monad";

export { Do, bind, let_, let_ as let, letTo, bindTo, apS, apSL, bindL, letL, letToL } from "./bind";

export { applicativeMonoid, alternativeMonoid, altMonoid, errorsMonoid } from "./monoid";
