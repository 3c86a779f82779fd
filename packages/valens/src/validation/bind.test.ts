import { describe, it, expect, vi } from "vitest";
import { pipe } from "../function";
import { makeLens } from "../lens";
import { apS, apSL, bind, bindL, bindTo, Do, let_, letL, letTo, letToL } from "./bind";
import { ValidationError } from "./errors";
import { failures, success } from "./validation";
import type { Validation } from "./types";

type State = { x?: number; y?: number; label?: string };

const setX = (x: number) => (s: State): State => ({ ...s, x });
const setY = (y: number) => (s: State): State => ({ ...s, y });
const setLabel = (label: string) => (s: State): State => ({ ...s, label });

const error = (message: string) => new ValidationError({ value: message, message });
const fail = <A>(...texts: string[]): Validation<A> => failures(texts.map(error));
const messages = <A>(fa: Validation<A>): string[] => (fa.ok ? [] : fa.errors.map((e) => e.message));

describe("Do", () => {
  it("starts from the given state", () => {
    expect(Do<State>({})).toEqual(success({}));
  });
});

describe("bind", () => {
  it("threads fields that depend on earlier ones", () => {
    const result = pipe(
      Do<State>({}),
      bind(setX, () => success(10)),
      bind(setY, (s) => success((s.x ?? 0) * 2))
    );

    expect(result).toEqual(success({ x: 10, y: 20 }));
  });

  it("reports the failing field", () => {
    const result = pipe(
      Do<State>({}),
      bind(setX, () => success(10)),
      bind(setY, () => fail<number>("y failed"))
    );

    expect(messages(result)).toEqual(["y failed"]);
  });

  it("does not run later fields once the state has failed", () => {
    const later = vi.fn(() => success(1));
    const result = pipe(
      Do<State>({}),
      bind(setX, () => fail<number>("x failed")),
      bind(setY, later)
    );

    expect(messages(result)).toEqual(["x failed"]);
    expect(later).not.toHaveBeenCalled();
  });
});

describe("let and letTo", () => {
  it("adds computed and constant fields", () => {
    const result = pipe(
      Do<State>({ x: 2 }),
      let_(setY, (s) => (s.x ?? 0) + 1),
      letTo(setLabel, "point")
    );

    expect(result).toEqual(success({ x: 2, y: 3, label: "point" }));
  });

  it("passes a failure through without computing", () => {
    const f = vi.fn((s: State) => s.x ?? 0);
    const result = pipe(fail<State>("broken"), let_(setY, f), letTo(setLabel, "point"));

    expect(messages(result)).toEqual(["broken"]);
    expect(f).not.toHaveBeenCalled();
  });
});

describe("bindTo", () => {
  it("wraps a single value into a state", () => {
    const result = pipe(success(5), bindTo((x: number): State => ({ x })));

    expect(result).toEqual(success({ x: 5 }));
  });

  it("keeps a failure", () => {
    expect(messages(pipe(fail<number>("no"), bindTo((x: number): State => ({ x }))))).toEqual(["no"]);
  });
});

describe("apS", () => {
  it("adds independent fields", () => {
    const result = pipe(Do<State>({}), apS(setX, success(1)), apS(setY, success(2)));

    expect(result).toEqual(success({ x: 1, y: 2 }));
  });

  it("accumulates the errors of every failing field", () => {
    const result = pipe(
      Do<State>({}),
      apS(setX, fail<number>("x invalid")),
      apS(setY, success(2)),
      apS(setLabel, fail<string>("label invalid"))
    );

    expect(messages(result)).toEqual(["x invalid", "label invalid"]);
  });

  it("puts the state's errors before the field's", () => {
    const result = pipe(fail<State>("state error"), apS(setX, fail<number>("value error")));

    expect(messages(result)).toEqual(["state error", "value error"]);
  });

  it("bind after a failed apS propagates without evaluating", () => {
    const next = vi.fn(() => fail<string>("never reported"));
    const result = pipe(
      Do<State>({}),
      apS(setX, fail<number>("x invalid")),
      apS(setY, fail<number>("y invalid")),
      bind(setLabel, next)
    );

    expect(messages(result)).toEqual(["x invalid", "y invalid"]);
    expect(next).not.toHaveBeenCalled();
  });
});

describe("lens variants", () => {
  type Person = { name: string; address: { city: string; zip: string } };

  const address = makeLens(
    (p: Person) => p.address,
    (p, a) => ({ ...p, address: a })
  );
  const city = makeLens(
    (p: Person) => p.address.city,
    (p, c) => ({ ...p, address: { ...p.address, city: c } })
  );
  const name = makeLens(
    (p: Person) => p.name,
    (p, n) => ({ ...p, name: n })
  );

  const ada: Person = { name: "ada", address: { city: "london", zip: "N1" } };

  it("apSL sets through the lens", () => {
    const result = pipe(Do(ada), apSL(city, success("paris")));

    expect(result).toEqual(success({ name: "ada", address: { city: "paris", zip: "N1" } }));
  });

  it("apSL accumulates like apS", () => {
    const result = pipe(Do(ada), apSL(city, fail<string>("bad city")), apSL(name, fail<string>("bad name")));

    expect(messages(result)).toEqual(["bad city", "bad name"]);
  });

  it("bindL validates the focused value and writes it back", () => {
    const upper = (s: string): Validation<string> => (s.length > 0 ? success(s.toUpperCase()) : fail("empty"));

    expect(pipe(Do(ada), bindL(name, upper))).toEqual(success({ ...ada, name: "ADA" }));
    expect(messages(pipe(Do({ ...ada, name: "" }), bindL(name, upper)))).toEqual(["empty"]);
  });

  it("letL transforms the focused value", () => {
    const result = pipe(
      Do(ada),
      letL(address, (a) => ({ ...a, zip: a.zip.toLowerCase() }))
    );

    expect(result).toEqual(success({ name: "ada", address: { city: "london", zip: "n1" } }));
  });

  it("letToL sets a constant", () => {
    expect(pipe(Do(ada), letToL(city, "rome"))).toEqual(success({ ...ada, address: { city: "rome", zip: "N1" } }));
  });

  it("does not modify the initial state", () => {
    pipe(Do(ada), letToL(city, "rome"), apSL(name, success("grace")));

    expect(ada).toEqual({ name: "ada", address: { city: "london", zip: "N1" } });
  });
});
