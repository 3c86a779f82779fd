import { describe, it, expect } from "vitest";
import { pipe } from "./function";
import {
  chain,
  err,
  fold,
  fromNullable,
  fromPredicate,
  getOrElse,
  isErr,
  isOk,
  map,
  mapError,
  ok,
  orElse,
  tryCatch,
  unwrap,
  UnwrapError,
  type Result,
} from "./result";

const half = (n: number): Result<number, string> => (n % 2 === 0 ? ok(n / 2) : err("odd"));

describe("Result", () => {
  describe("constructors", () => {
    it("ok wraps a value", () => {
      expect(ok(1)).toEqual({ ok: true, value: 1 });
    });

    it("err leaves out an absent cause", () => {
      expect(err("E")).toEqual({ ok: false, error: "E" });
      expect("cause" in err("E")).toBe(false);
    });

    it("err keeps a cause", () => {
      const cause = new Error("root");
      expect(err("E", cause)).toEqual({ ok: false, error: "E", cause });
    });

    it("guards narrow", () => {
      const r: Result<number, string> = ok(1);
      expect(isOk(r)).toBe(true);
      expect(isErr(r)).toBe(false);
      expect(isErr(err("E"))).toBe(true);
    });
  });

  describe("conversions", () => {
    it("fromNullable treats only null and undefined as missing", () => {
      const required = fromNullable(() => "missing");

      expect(required(null)).toEqual(err("missing"));
      expect(required(undefined)).toEqual(err("missing"));
      expect(required(0)).toEqual(ok(0));
    });

    it("fromPredicate builds the error from the rejected value", () => {
      const positive = fromPredicate(
        (n: number) => n > 0,
        (n) => `${n} is not positive`
      );

      expect(positive(3)).toEqual(ok(3));
      expect(positive(-1)).toEqual(err("-1 is not positive"));
    });

    it("tryCatch keeps the thrown value as the error", () => {
      const thrown = new Error("parse");
      expect(
        tryCatch(() => {
          throw thrown;
        })
      ).toEqual({ ok: false, error: thrown });
    });

    it("tryCatch maps the thrown value and keeps it as cause", () => {
      const r = tryCatch(
        (): unknown => JSON.parse("{"),
        () => "invalid json"
      );

      expect(r.ok).toBe(false);
      if (!r.ok) {
        expect(r.error).toBe("invalid json");
        expect(r.cause).toBeInstanceOf(SyntaxError);
      }
      expect(tryCatch(() => 1, () => "never")).toEqual(ok(1));
    });
  });

  describe("combinators", () => {
    it("map transforms ok and passes errors through", () => {
      expect(pipe(ok(2), map((n: number) => n * 3))).toEqual(ok(6));
      expect(pipe(half(3), map((n: number) => n * 3))).toEqual(err("odd"));
    });

    it("mapError transforms the error and keeps the cause", () => {
      const cause = new Error("root");
      expect(pipe(err("E", cause), mapError((e: string) => `${e}!`))).toEqual(err("E!", cause));
      expect(pipe(ok(1), mapError((e: string) => `${e}!`))).toEqual(ok(1));
    });

    it("chain stops at the first error", () => {
      expect(pipe(ok(8), chain(half), chain(half))).toEqual(ok(2));
      expect(pipe(ok(6), chain(half), chain(half))).toEqual(err("odd"));
    });

    it("orElse recovers from an error", () => {
      const recover = orElse((e: string) => (e === "odd" ? ok(0) : err(e.length)));

      expect(recover(half(3))).toEqual(ok(0));
      expect(recover(err("bad"))).toEqual(err(3));
      expect(recover(half(4))).toEqual(ok(2));
    });

    it("fold picks the branch", () => {
      const render = fold(
        (e: string) => `err:${e}`,
        (n: number) => `ok:${n}`
      );

      expect(render(ok(1))).toBe("ok:1");
      expect(render(err("x"))).toBe("err:x");
    });

    it("getOrElse falls back on an error", () => {
      expect(pipe(half(3), getOrElse(() => -1))).toBe(-1);
      expect(pipe(half(4), getOrElse(() => -1))).toBe(2);
    });
  });

  describe("unwrap", () => {
    it("returns the value of an ok result", () => {
      expect(unwrap(ok(5))).toBe(5);
    });

    it("throws UnwrapError carrying the error", () => {
      const failure = new Error("boom");

      expect(() => unwrap(err(failure))).toThrow(UnwrapError);
      try {
        unwrap(err(failure));
      } catch (e) {
        expect(e).toBeInstanceOf(UnwrapError);
        if (e instanceof UnwrapError) {
          expect(e.error).toBe(failure);
          expect(e.message).toBe("unwrap called on an error result: boom");
          expect(e.cause).toBe(failure);
        }
      }
    });

    it("prefers the result's own cause", () => {
      const cause = new RangeError("too big");

      expect(() => unwrap(err({ code: 7 }, cause))).toThrow('unwrap called on an error result: {"code":7}');
      try {
        unwrap(err("E", cause));
      } catch (e) {
        expect(e instanceof UnwrapError && e.cause).toBe(cause);
      }
    });
  });
});
