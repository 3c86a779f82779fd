import { describe, expect, it } from "vitest";
import { Valens, ok, err, pipe, result, success, failures, toResult, validate, validation, lens, codec, iso } from "./index";
import * as V from "./validation";
import * as VD from "./validate";

describe("root named exports", () => {
  it("keeps named exports aligned with Valens namespace", () => {
    expect(ok(1)).toEqual(Valens.ok(1));
    expect(err("E")).toEqual(Valens.err("E"));

    const mapped = pipe(ok(2), result.map((n: number) => n + 1));
    const mappedViaNamespace = Valens.pipe(Valens.ok(2), Valens.map((n: number) => n + 1));
    expect(mapped).toEqual(mappedViaNamespace);

    const piped = pipe(2, (n) => n * 2);
    const pipedViaNamespace = Valens.pipe(2, (n) => n * 2);
    expect(piped).toBe(pipedViaNamespace);
  });

  it("exposes modules as namespaces", () => {
    expect(result.map).toBe(Valens.map);
    expect(validation).toBe(Valens.validation);
    expect(validate).toBe(Valens.validate);
    expect(lens).toBe(Valens.lens);
    expect(codec).toBe(Valens.codec);
    expect(iso).toBe(Valens.iso);
    expect(success).toBe(V.success);
    expect(failures).toBe(V.failures);
    expect(toResult).toBe(V.toResult);
  });

  it("exports let under its keyword name", () => {
    expect(V.let).toBe(V.let_);
    expect(VD.let).toBe(VD.let_);
  });
});
