import { describe, it, expect, vi } from "vitest";
import { pipe } from "../function";
import { ok, err } from "../result";
import * as O from ".";

describe("Option", () => {
  it("keeps present falsy values distinct from absence", () => {
    expect(O.fromNullable(0)).toEqual(O.some(0));
    expect(O.fromNullable("")).toEqual(O.some(""));
    expect(O.fromNullable(null)).toEqual(O.none());
    expect(O.some(undefined)).toEqual({ some: true, value: undefined });
  });

  it("fromPredicate filters", () => {
    const positive = O.fromPredicate((n: number) => n > 0);
    expect(positive(3)).toEqual(O.some(3));
    expect(positive(-3)).toEqual(O.none());
  });

  it("fromResult drops the error", () => {
    expect(O.fromResult(ok(1))).toEqual(O.some(1));
    expect(O.fromResult(err("E"))).toEqual(O.none());
  });

  it("map and chain compose over present values", () => {
    const result = pipe(
      O.some(4),
      O.map((n) => n + 1),
      O.chain((n) => (n % 2 === 1 ? O.some(`odd ${n}`) : O.none()))
    );
    expect(result).toEqual(O.some("odd 5"));
  });

  it("map and chain pass absence through", () => {
    const f = vi.fn((n: number) => O.some(n));
    expect(pipe(O.none<number>(), O.chain(f))).toEqual(O.none());
    expect(f).not.toHaveBeenCalled();
  });

  it("fold and getOrElse pick the branch", () => {
    const describe_ = O.fold(
      () => "none",
      (n: number) => `some ${n}`
    );
    expect(describe_(O.some(1))).toBe("some 1");
    expect(describe_(O.none())).toBe("none");
    expect(pipe(O.none<number>(), O.getOrElse(() => 7))).toBe(7);
  });

  it("alt evaluates the fallback only when absent", () => {
    const fallback = vi.fn(() => O.some(2));
    expect(pipe(O.some(1), O.alt(fallback))).toEqual(O.some(1));
    expect(fallback).not.toHaveBeenCalled();
    expect(pipe(O.none<number>(), O.alt(fallback))).toEqual(O.some(2));
    expect(fallback).toHaveBeenCalledTimes(1);
  });

  it("equals compares payloads", () => {
    const eq = O.equals<number>();
    expect(eq(O.some(1), O.some(1))).toBe(true);
    expect(eq(O.some(1), O.some(2))).toBe(false);
    expect(eq(O.none(), O.none())).toBe(true);
    expect(eq(O.some(1), O.none())).toBe(false);
  });

  it("toUndefined unwraps", () => {
    expect(O.toUndefined(O.some("a"))).toBe("a");
    expect(O.toUndefined(O.none())).toBeUndefined();
  });
});
