import { describe, it, expect } from "vitest";
import { err, ok, type Result } from "../result";
import { success, type Context, type Validation } from "../validation";
import {
  boolean,
  failure,
  fromPredicate,
  fromReaderResult,
  fromRefinement,
  nonEmptyString,
  number,
  string,
  success as accept,
} from "./from";

const context: Context = [{ key: "", type: "Config" }, { key: "port", type: "number" }];
const messages = <A>(fa: Validation<A>): string[] => (fa.ok ? [] : fa.errors.map((e) => e.message));

describe("fromReaderResult", () => {
  const parsePort = fromReaderResult((s: string): Result<number, RangeError> => {
    const n = Number(s);
    return Number.isInteger(n) && n > 0 ? ok(n) : err(new RangeError(`bad port ${s}`));
  });

  it("passes an ok value through", () => {
    expect(parsePort("8080")(context)).toEqual(success(8080));
  });

  it("turns an error into one validation error", () => {
    const result = parsePort("eighty")(context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toHaveLength(1);
      const [error] = result.errors;
      expect(error?.message).toBe("unable to decode");
      expect(error?.value).toBe("eighty");
      expect(error?.context).toBe(context);
      expect(error?.cause).toBeInstanceOf(RangeError);
      expect(error?.cause).toEqual(new RangeError("bad port eighty"));
      expect(String(error)).toBe("at Config.port: unable to decode (caused by: bad port eighty)");
    }
  });
});

describe("fromPredicate and fromRefinement", () => {
  it("accepts what the predicate accepts", () => {
    const short = fromPredicate((s: string) => s.length <= 3, "too long");

    expect(short("abc")(context)).toEqual(success("abc"));
    expect(messages(short("abcd")(context))).toEqual(["too long"]);
  });

  it("builds the message from the input", () => {
    const short = fromPredicate((s: string) => s.length <= 3, (s) => `"${s}" is too long`);

    expect(messages(short("abcd")(context))).toEqual(['"abcd" is too long']);
  });

  it("narrows with a refinement", () => {
    const isDate = fromRefinement((u: unknown): u is Date => u instanceof Date, "expected date");
    const date = new Date(0);

    expect(isDate(date)(context)).toEqual(success(date));
    expect(messages(isDate("1970")(context))).toEqual(["expected date"]);
  });

  it("records the rejected input and the context", () => {
    const result = fromPredicate((n: number) => n > 0, "not positive")(-1)(context);

    expect(result.ok ? [] : result.errors.map((e) => [e.value, e.path])).toEqual([[-1, "Config.port"]]);
  });
});

describe("success and failure", () => {
  it("success accepts any input as is", () => {
    expect(accept<string>()("x")(context)).toEqual(success("x"));
  });

  it("failure rejects any input", () => {
    expect(messages(failure<string>("never")("x")(context))).toEqual(["never"]);
    expect(messages(failure((s: string) => `${s} rejected`)("x")(context))).toEqual(["x rejected"]);
  });
});

describe("primitive validators", () => {
  it("string", () => {
    expect(string("a")(context)).toEqual(success("a"));
    expect(messages(string(1)(context))).toEqual(["expected string"]);
  });

  it("number rejects NaN", () => {
    expect(number(1.5)(context)).toEqual(success(1.5));
    expect(messages(number(Number.NaN)(context))).toEqual(["expected number"]);
    expect(messages(number("1")(context))).toEqual(["expected number"]);
  });

  it("boolean", () => {
    expect(boolean(false)(context)).toEqual(success(false));
    expect(messages(boolean("false")(context))).toEqual(["expected boolean"]);
  });

  it("nonEmptyString", () => {
    expect(nonEmptyString("x")(context)).toEqual(success("x"));
    expect(messages(nonEmptyString("")(context))).toEqual(["expected non-empty string"]);
    expect(messages(nonEmptyString(null)(context))).toEqual(["expected string"]);
  });
});
