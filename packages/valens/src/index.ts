/**
 * valens
 *
 * Error-accumulating validation and composable optics.
 *
 * The root entry exposes the composition helpers, the Result toolkit and
 * the validation error types by name, and every other module as a
 * namespace. Import `valens/<module>` directly for the rest.
 *
 * @example
 * ```typescript
 * import { validate, toResult } from "valens";
 *
 * const tags = validate.decode(validate.array(validate.nonEmptyString), "tags");
 * toResult(tags(["a", ""]));
 * // err(ValidationErrors: 1 error), with "at tags.[1]: expected non-empty string"
 * ```
 */

import { pipe, flow, compose, identity, constant } from "./function";
import * as result from "./result";
import * as validation from "./validation";
import * as validate from "./validate";
import * as option from "./option";
import * as reader from "./reader";
import * as monoid from "./monoid";
import * as lens from "./lens";
import * as optional from "./optional";
import * as prism from "./prism";
import * as iso from "./iso";
import * as codec from "./codec";

// =============================================================================
// Namespace object
// =============================================================================

/**
 * Everything in one object: `Valens.pipe`, `Valens.ok`,
 * `Valens.validation.apS`, `Valens.lens.makeLens`, ...
 */
const Valens = {
  // Result (all value exports)
  ...result,
  // Composition
  pipe,
  flow,
  compose,
  identity,
  constant,
  // Modules
  result,
  validation,
  validate,
  option,
  reader,
  monoid,
  lens,
  optional,
  prism,
  iso,
  codec,
} as const;

export { Valens };

// =============================================================================
// Named value exports (tree-shake friendly)
// =============================================================================

export { pipe, flow, compose, identity, constant } from "./function";

export { ok, err, isOk, isErr, UnwrapError, unwrap } from "./result";

export {
  ValidationError,
  ValidationErrors,
  makeValidationErrors,
  isValidationError,
  isValidationErrors,
  success,
  failures,
  isSuccess,
  isFailure,
  toResult,
} from "./validation";

export { result, validation, validate, option, reader, monoid, lens, optional, prism, iso, codec };

// =============================================================================
// Type exports
// =============================================================================

export type { Lazy, Endomorphism, Predicate, Refinement, Eq } from "./function";
export type { Ok, Err, Result } from "./result";
export type { Validation, Success, Failure, Errors, Context, ContextEntry } from "./validation";
export type { Validate } from "./validate";
export type { Option } from "./option";
export type { Reader } from "./reader";
export type { Monoid, Semigroup } from "./monoid";
export type { Lens } from "./lens";
export type { Optional } from "./optional";
export type { Prism } from "./prism";
export type { Iso } from "./iso";
export type { Type as Codec } from "./codec";
