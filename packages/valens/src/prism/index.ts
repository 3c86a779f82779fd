/**
 * valens/prism
 *
 * A prism focuses on one case `A` of a sum-like `S`: `getOption` matches
 * the case, `reverseGet` builds an `S` from an `A`. Parsers fit the shape
 * too (`string` to `number` and back).
 *
 * Law: `getOption(reverseGet(a))` is `some(a)`.
 */

export { makePrism, id, fromPredicate, compose, imap, set, modify, type Prism } from "./prism";

export {
  nonEmptyString,
  parseInt,
  parseNumber,
  parseBoolean,
  parseJson,
  parseUrl,
  parseDate,
  regexMatcher,
  instanceOf,
  fromOption,
  fromResult,
  fromNonZero,
  type RegexMatch,
} from "./prisms";
