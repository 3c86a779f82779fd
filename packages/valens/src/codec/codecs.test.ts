import { describe, it, expect } from "vitest";
import { success, type Validation } from "../validation";
import { booleanFromString, date, intFromString, numberFromString, regex, url } from "./codecs";

const rendered = <A>(fa: Validation<A>): string[] => (fa.ok ? [] : fa.errors.map((e) => e.toString()));

describe("intFromString", () => {
  it("decodes integer strings", () => {
    expect(intFromString().decode("42")).toEqual(success(42));
    expect(intFromString().decode("-7")).toEqual(success(-7));
  });

  it("rejects anything else", () => {
    expect(rendered(intFromString().decode("4.2"))).toEqual(["at IntFromString: expected integer string"]);
    expect(rendered(intFromString().decode(""))).toEqual(["at IntFromString: expected integer string"]);
  });

  it("encodes and checks integers", () => {
    expect(intFromString().encode(7)).toBe("7");
    expect(intFromString().is(7)).toBe(true);
    expect(intFromString().is("7")).toBe(false);
  });
});

describe("numberFromString", () => {
  it("decodes finite numbers", () => {
    expect(numberFromString().decode("2.5")).toEqual(success(2.5));
    expect(rendered(numberFromString().decode(" "))).toEqual(["at NumberFromString: expected number string"]);
    expect(rendered(numberFromString().decode("Infinity"))).toEqual(["at NumberFromString: expected number string"]);
  });

  it("encodes with String", () => {
    expect(numberFromString().encode(0.5)).toBe("0.5");
  });
});

describe("booleanFromString", () => {
  it("decodes exactly true and false", () => {
    expect(booleanFromString().decode("false")).toEqual(success(false));
    expect(rendered(booleanFromString().decode("yes"))).toEqual(['at BooleanFromString: expected "true" or "false"']);
    expect(booleanFromString().encode(true)).toBe("true");
  });
});

describe("url", () => {
  it("decodes absolute URLs", () => {
    const decoded = url().decode("https://example.com/a?b=1");

    expect(decoded.ok && decoded.value.href).toBe("https://example.com/a?b=1");
  });

  it("keeps the error URL threw as the cause", () => {
    const decoded = url().decode("not a url");

    expect(decoded.ok).toBe(false);
    if (!decoded.ok) {
      expect(decoded.errors).toHaveLength(1);
      expect(decoded.errors[0]?.path).toBe("URL");
      expect(decoded.errors[0]?.message).toBe("unable to decode");
      expect(decoded.errors[0]?.cause).toBeInstanceOf(TypeError);
    }
  });

  it("encodes to the href", () => {
    expect(url().encode(new URL("https://example.com/x"))).toBe("https://example.com/x");
    expect(url().is(new URL("https://example.com"))).toBe(true);
    expect(url().is("https://example.com")).toBe(false);
  });
});

describe("date", () => {
  it("decodes ISO 8601 timestamps", () => {
    expect(date().decode("2024-01-02T03:04:05.000Z")).toEqual(success(new Date(Date.UTC(2024, 0, 2, 3, 4, 5))));
    expect(rendered(date().decode("soon"))).toEqual(["at Date: expected ISO 8601 date"]);
  });

  it("encodes with toISOString", () => {
    expect(date().encode(new Date(Date.UTC(2020, 5, 1)))).toBe("2020-06-01T00:00:00.000Z");
  });

  it("does not count an invalid Date as decoded", () => {
    expect(date().is(new Date(Number.NaN))).toBe(false);
  });
});

describe("regex", () => {
  const re = /(\d+)\.(\d+)/;
  const version = regex(re);
  const prismName = `PrismRegex[${re}]`;

  it("decodes the first match", () => {
    expect(version.decode("v1.2")).toEqual(success({ before: "v", groups: ["1.2", "1", "2"], after: "" }));
  });

  it("names the failure after the underlying prism", () => {
    expect(version.name).toBe(`FromRefinement(${prismName})`);
    expect(rendered(version.decode("none"))).toEqual([
      `at FromRefinement(${prismName}): type cannot be refined: ${prismName}`,
    ]);
  });

  it("encodes back to the original string", () => {
    expect(version.encode({ before: "v", groups: ["1.2", "1", "2"], after: "-rc" })).toBe("v1.2-rc");
    expect(version.is({ before: "", groups: [], after: "" })).toBe(true);
    expect(version.is("v1.2")).toBe(false);
  });
});
