/**
 * valens/codec
 *
 * Codecs pair a validator with an encoder: `decode` turns untrusted input
 * into a typed value with every error and its path, `encode` turns the
 * value back. They compose like the validators they are built from.
 *
 * @example
 * ```typescript
 * import { pipe } from "valens/function";
 * import * as C from "valens/codec";
 *
 * const ports = C.array(pipe(C.string(), C.compose(C.intFromString())));
 *
 * ports.decode(["80", "http"]);
 * // failure: "at Array[Pipe(string, IntFromString)].[1]: expected integer string"
 * ports.encode([80, 443]); // ["80", "443"]
 * ```
 */

export type { Encode, Is, Operator, Type } from "./types";

export {
  makeType,
  fromPrism,
  fromRefinement,
  id,
  string,
  number,
  int,
  boolean,
  array,
  transcodeArray,
  field,
  either,
  compose,
  toPrism,
} from "./codec";

export { monadAlt, alt, altMonoid } from "./alt";

export { apSL, apSO } from "./bind";

export { intFromString, numberFromString, booleanFromString, url, date, regex } from "./codecs";
