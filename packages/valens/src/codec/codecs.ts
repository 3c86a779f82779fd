import * as P from "../prism";
import type { RegexMatch } from "../prism";
import { tryCatch } from "../result";
import * as VD from "../validate";
import { fromPrism, fromRefinement, makeType } from "./codec";
import type { Type } from "./types";

// =============================================================================
// Strings to values
// =============================================================================

export const intFromString = (): Type<number, string, string> =>
  fromPrism(P.parseInt(), (u): u is number => Number.isSafeInteger(u), "IntFromString", "expected integer string");

export const numberFromString = (): Type<number, string, string> =>
  fromPrism(
    P.parseNumber(),
    (u): u is number => typeof u === "number" && Number.isFinite(u),
    "NumberFromString",
    "expected number string"
  );

export const booleanFromString = (): Type<boolean, string, string> =>
  fromPrism(P.parseBoolean(), (u): u is boolean => typeof u === "boolean", "BooleanFromString", "expected \"true\" or \"false\"");

/**
 * Absolute URLs. A string `URL` rejects fails with `unable to decode`, the
 * `TypeError` it threw as the cause.
 */
export const url = (): Type<URL, string, string> =>
  makeType(
    "URL",
    (u): u is URL => u instanceof URL,
    VD.fromReaderResult((s: string) => tryCatch(() => new URL(s))),
    (u) => u.href
  );

/** ISO 8601 timestamps; encodes with `toISOString()`. */
export const date = (): Type<Date, string, string> =>
  fromPrism(
    P.parseDate(),
    (u): u is Date => u instanceof Date && !Number.isNaN(u.getTime()),
    "Date",
    "expected ISO 8601 date"
  );

const isRegexMatch = (u: unknown): u is RegexMatch =>
  typeof u === "object" &&
  u !== null &&
  typeof Reflect.get(u, "before") === "string" &&
  typeof Reflect.get(u, "after") === "string" &&
  Array.isArray(Reflect.get(u, "groups"));

/**
 * The first match of `re`. Encoding rebuilds the original string.
 *
 * @example
 * ```typescript
 * regex(/(\d+)\.(\d+)/).decode("v1.2");
 * // success({ before: "v", groups: ["1.2", "1", "2"], after: "" })
 * ```
 */
export const regex = (re: RegExp): Type<RegexMatch, string, string> => fromRefinement(P.regexMatcher(re), isRegexMatch);
