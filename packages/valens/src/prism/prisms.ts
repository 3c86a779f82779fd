import * as O from "../option";
import type { Option } from "../option";
import { ok, type Result } from "../result";
import { makePrism, type Prism } from "./prism";

// =============================================================================
// Strings
// =============================================================================

/** Matches every string except `""`. */
export const nonEmptyString = (): Prism<string, string> => fromNonZero<string>("");

/**
 * Decimal integers. Strings that are not a whole base-10 integer (with an
 * optional sign) do not match.
 *
 * @example
 * ```typescript
 * parseInt().getOption("42");  // some(42)
 * parseInt().getOption("4.2"); // none
 * parseInt().reverseGet(7);    // "7"
 * ```
 */
export const parseInt = (): Prism<string, number> =>
  makePrism<string, number>(
    (s) => (/^[+-]?\d+$/.test(s) ? O.fromPredicate<number>(Number.isSafeInteger)(Number(s)) : O.none()),
    (n) => String(n),
    "PrismParseInt"
  );

/** Finite decimal numbers, as `Number` reads them. Blank strings do not match. */
export const parseNumber = (): Prism<string, number> =>
  makePrism<string, number>(
    (s) => (s.trim() === "" ? O.none() : O.fromPredicate<number>(Number.isFinite)(Number(s))),
    (n) => String(n),
    "PrismParseNumber"
  );

/** Exactly `"true"` and `"false"`. */
export const parseBoolean = (): Prism<string, boolean> =>
  makePrism<string, boolean>(
    (s) => (s === "true" ? O.some(true) : s === "false" ? O.some(false) : O.none()),
    (b) => String(b),
    "PrismParseBoolean"
  );

/**
 * Any string `JSON.parse` accepts. The parsed value is `unknown`; validate
 * it before using it.
 */
export const parseJson = (): Prism<string, unknown> =>
  makePrism<string, unknown>(
    (s) => {
      try {
        return O.some<unknown>(JSON.parse(s));
      } catch {
        return O.none();
      }
    },
    (a) => JSON.stringify(a) ?? "",
    "PrismParseJson"
  );

/** Absolute URLs. */
export const parseUrl = (): Prism<string, URL> =>
  makePrism<string, URL>(
    (s) => {
      try {
        return O.some(new URL(s));
      } catch {
        return O.none();
      }
    },
    (url) => url.href,
    "PrismParseUrl"
  );

const isValidDate = (date: Date): boolean => !Number.isNaN(date.getTime());

/**
 * ISO 8601 timestamps as `Date`s. Strings `Date` cannot read do not match.
 * `reverseGet` writes `toISOString()`, or `"Invalid Date"` for an invalid
 * `Date`, which `getOption` does not match.
 */
export const parseDate = (): Prism<string, Date> =>
  makePrism<string, Date>(
    (s) => {
      const date = new Date(s);
      return s.trim() === "" || !isValidDate(date) ? O.none() : O.some(date);
    },
    (date) => (isValidDate(date) ? date.toISOString() : "Invalid Date"),
    "PrismParseDate"
  );

/**
 * The first match of a regular expression, with the text around it so
 * the original string can be rebuilt.
 */
export interface RegexMatch {
  readonly before: string;
  /** Index 0 is the full match; unmatched groups are `""`. */
  readonly groups: readonly string[];
  readonly after: string;
}

/**
 * @example
 * ```typescript
 * const version = regexMatcher(/(\d+)\.(\d+)/);
 * version.getOption("v1.2-beta");
 * // some({ before: "v", groups: ["1.2", "1", "2"], after: "-beta" })
 * ```
 */
export const regexMatcher = (re: RegExp): Prism<string, RegexMatch> => {
  const pattern = new RegExp(re.source, re.flags.replace("g", "").replace("y", ""));
  return makePrism<string, RegexMatch>(
    (s) => {
      const match = pattern.exec(s);
      if (match === null) {
        return O.none();
      }
      return O.some({
        before: s.slice(0, match.index),
        groups: match.map((group) => group ?? ""),
        after: s.slice(match.index + match[0].length),
      });
    },
    (m) => m.before + (m.groups[0] ?? "") + m.after,
    `PrismRegex[${re}]`
  );
};

// =============================================================================
// Values
// =============================================================================

/**
 * Values that are instances of `ctor`.
 *
 * @example
 * ```typescript
 * instanceOf(Error).getOption(new TypeError("x")); // some(TypeError)
 * ```
 */
export const instanceOf = <T>(ctor: abstract new (...args: never[]) => T): Prism<unknown, T> =>
  makePrism<unknown, T>(
    (u) => (u instanceof ctor ? O.some(u) : O.none()),
    (t) => t,
    `PrismInstanceOf[${ctor.name}]`
  );

/** The value of a `some`. */
export const fromOption = <T>(): Prism<Option<T>, T> =>
  makePrism<Option<T>, T>((fa) => fa, O.some, "PrismFromOption");

/** The value of an `ok`; `reverseGet` wraps with `ok`. */
export const fromResult = <T, E = unknown>(): Prism<Result<T, E>, T> =>
  makePrism<Result<T, E>, T>(O.fromResult, (t) => ok(t), "PrismFromResult");

/**
 * Values other than `zero` (compared with `Object.is`).
 *
 * @example
 * ```typescript
 * fromNonZero(0).getOption(0); // none
 * fromNonZero(0).getOption(3); // some(3)
 * ```
 */
export const fromNonZero = <T>(zero: T): Prism<T, T> =>
  makePrism<T, T>(
    O.fromPredicate((t: T) => !Object.is(t, zero)),
    (t) => t,
    "PrismFromNonZero"
  );
