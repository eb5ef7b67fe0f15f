import { describe, expect, it } from "vitest";
import { interpolate } from "./interpolate.ts";

describe("interpolate", () => {
  const values: Record<string, string> = {
    name: "World",
    "hosts.1": "a.example",
    "hosts.1.5": "deep",
    "my-key": "dashed",
  };
  const functions = {
    get: (key: unknown) => values[String(key)],
    upper: (text: unknown) => String(text).toUpperCase(),
    join: (...parts: unknown[]) => parts.map(String).join("+"),
  };

  it("resolves bare paths through get", () => {
    expect(interpolate("Hello ${ name }!", { functions })).toBe("Hello World!");
    expect(interpolate("${hosts.1}", { functions })).toBe("a.example");
    expect(interpolate("${ hosts.1.5 }", { functions })).toBe("deep");
    expect(interpolate("${ my-key }", { functions })).toBe("dashed");
  });

  it("calls functions with literal and nested arguments", () => {
    expect(interpolate('${ upper("x") }', { functions })).toBe("X");
    expect(interpolate("${ upper(get('name')) }", { functions })).toBe("WORLD");
    expect(interpolate('${ join("a", 1, -2.5, true) }', { functions }))
      .toBe("a+1+-2.5+true");
    expect(interpolate('${ upper("a}b") }', { functions })).toBe("A}B");
  });

  it("renders literals", () => {
    expect(interpolate("${ 42 }")).toBe("42");
    expect(interpolate("${ false }")).toBe("false");
    expect(interpolate("${ 'it\\'s' }")).toBe("it's");
  });

  it("handles missing values by strategy", () => {
    expect(interpolate("a${ nope }b", { functions })).toBe("a${ nope }b");
    expect(interpolate("a${ null }b")).toBe("a${ null }b");
    expect(interpolate("a${ nope }b", { functions, missing: "empty" }))
      .toBe("ab");
    expect(() => interpolate("a${ nope }b", { functions, missing: "throw" }))
      .toThrow("Missing value for 'nope'");
  });

  it("uses a custom path resolver and renderer", () => {
    expect(
      interpolate("${ a.b }", {
        resolvePath: (path) => path.length,
        render: (value) => `<${String(value)}>`,
      }),
    ).toBe("<2>");
  });

  it("rejects unknown functions and malformed expressions", () => {
    expect(() => interpolate("${ zzz() }", { functions }))
      .toThrow("Unknown function 'zzz'");
    expect(() => interpolate("${ toString() }", { functions }))
      .toThrow("Unknown function 'toString'");
    expect(() => interpolate("${ a b }", { functions }))
      .toThrow("Unexpected token 'b' after expression");
    expect(() => interpolate("${ upper('x' }", { functions }))
      .toThrow("Expected ')' at end of arguments");
  });

  it("leaves text without complete expressions alone", () => {
    expect(interpolate("plain text")).toBe("plain text");
    expect(interpolate("cost: $5 ${ unterminated")).toBe(
      "cost: $5 ${ unterminated",
    );
  });
});
