import { describe, it, expect } from "vitest";
import { RuleChain, rule, literal, pattern, RemainingInput } from "../index.js";

describe("RuleChain", () => {
  it("lexes postfix notation", () => {
    const number = rule(pattern("\\d+"));
    const postfix = number.then(number.or(pattern("[+\\-*/^]")).repeat());
    expect(postfix.lex("3 4 +", { ignoreWhitespace: true })).toEqual(["3", "4", "+"]);
  });

  it("renders its rule", () => {
    expect(rule("a").then("b").or("c").toString()).toBe('(("a" "b") | "c")');
  });

  it("returns an existing chain unchanged", () => {
    const chain = rule("a");
    expect(rule(chain)).toBe(chain);
    expect(chain).toBeInstanceOf(RuleChain);
  });

  it("supports optional and atomize", () => {
    expect(rule("a").optional().tryMatch("")).toEqual({ ok: true, rest: "", tree: [] });
    expect(rule(pattern("[0-9]")).repeat().atomize().match("123abc")).toEqual({
      rest: "abc",
      tree: ["123"],
    });
  });

  it("takes the same whitespace option in tryMatch as in match", () => {
    const digits = rule(pattern("[0-9]+"));
    expect(digits.tryMatch("  7", { ignoreWhitespace: true })).toEqual({ ok: true, rest: "", tree: "7" });
    expect(digits.tryMatch("  7").ok).toBe(false);
    expect(() => digits.match("  7")).toThrow();
  });

  it("supports capture", () => {
    expect(rule("a").capture().match("a").tree).toEqual(["a"]);
  });

  it("supports ignore with a custom discard", () => {
    expect(rule("x").ignore(rule(literal("--"))).lex("--x", { ignoreWhitespace: true })).toEqual([
      "x",
    ]);
  });

  it("supports ignore with the default discard", () => {
    expect(rule(pattern("[a-z]+")).ignore().lex("  ab", { ignoreWhitespace: true })).toEqual(["ab"]);
  });

  it("supports counted repetition", () => {
    expect(rule("ab").exactly(2).lex("abab")).toEqual(["ab", "ab"]);
    expect(rule("a").many(0, 2).lex("aa")).toEqual(["a", "a"]);
    expect(rule("a").multiple().lex("aaa")).toEqual(["a", "a", "a"]);
  });

  it("reports lexing failures through tryLex", () => {
    const r = rule("a").many(0, 2).tryLex("aaa");
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error).toBeInstanceOf(RemainingInput);
    }
  });

  it("produces tokens lazily", () => {
    expect(Array.from(rule("a").then("b").tokens("ab"))).toEqual(["a", "b"]);
  });
});
