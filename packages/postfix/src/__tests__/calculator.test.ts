import { describe, it, expect } from "vitest";
import { RemainingInput } from "@rulelex/core";
import { calculate, formatResult, tokenize } from "../index.js";

describe("tokenize", () => {
  it("splits numbers and operators", () => {
    expect(tokenize("3 4 +")).toEqual(["3", "4", "+"]);
    expect(tokenize("10 2/")).toEqual(["10", "2", "/"]);
  });

  it("rejects trailing whitespace", () => {
    expect(() => tokenize("3 4 + ")).toThrow(RemainingInput);
  });
});

describe("calculate", () => {
  it("evaluates a valid line", () => {
    expect(calculate("3 4 +")).toEqual({ ok: true, value: 7n });
  });

  it("reports a syntax error for unlexable input", () => {
    expect(calculate("3 4 + x")).toEqual({ ok: false, message: 'syntax error: "3 4 + x"' });
    expect(calculate("+ 1")).toEqual({ ok: false, message: 'syntax error: "+ 1"' });
  });

  it("reports evaluation errors", () => {
    expect(calculate("1 +")).toEqual({ ok: false, message: 'error: stack underflow at "+"' });
  });
});

describe("formatResult", () => {
  it("prints values and messages", () => {
    expect(formatResult({ ok: true, value: 42n })).toBe("42");
    expect(formatResult({ ok: false, message: "error: x" })).toBe("error: x");
  });
});
