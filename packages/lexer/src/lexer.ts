/**
 * Lexer driver.
 *
 * Runs a rule over a whole input and flattens what it matched into tokens.
 * The top-level rule is treated as a chain of steps: a sequence contributes
 * its children, anything else is a one-step chain. Tokens from each step are
 * yielded as soon as the step matches, and the first step that fails ends
 * the run.
 */

import { FailedMatching, LexError, RemainingInput } from "./errors.js";
import { flatten } from "./flatten.js";
import { tryMatch } from "./match.js";
import { describeRule } from "./describe.js";
import { preview, trace } from "./debug.js";
import type { MatchOptions, Rule } from "./types.js";

export type LexOptions = MatchOptions;

export type LexResult =
  | { readonly ok: true; readonly tokens: string[] }
  | { readonly ok: false; readonly error: LexError };

/**
 * Lazily produce the tokens of `input`.
 *
 * The generator throws {@link FailedMatching} at the first step that does
 * not match, and {@link RemainingInput} after the last step if input is
 * left over. It can be consumed once.
 */
export function* tokens(rule: Rule, input: string, options: LexOptions = {}): Generator<string, void, undefined> {
  const ignoreWhitespace = options.ignoreWhitespace ?? false;
  const steps = rule.kind === "sequence" ? rule.rules : [rule];
  trace(`lex ${describeRule(rule)} over ${preview(input)} (ignoreWhitespace=${ignoreWhitespace})`);

  let rest = input;
  let count = 0;
  for (const step of steps) {
    const r = tryMatch(step, rest, ignoreWhitespace);
    if (!r.ok) {
      const error = new FailedMatching(r.rule, r.stream, r.expected, input);
      trace(error.message);
      throw error;
    }
    rest = r.rest;
    for (const token of flatten(r.tree)) {
      count++;
      yield token;
    }
  }

  if (rest.length > 0) {
    const error = new RemainingInput(rest, input);
    trace(error.message);
    throw error;
  }
  trace(`lexed ${count} token(s)`);
}

/** Lex `input` completely, returning every token. */
export function lex(rule: Rule, input: string, options: LexOptions = {}): string[] {
  return Array.from(tokens(rule, input, options));
}

/** Like {@link lex}, but reports lexing failures as a value instead of throwing. */
export function tryLex(rule: Rule, input: string, options: LexOptions = {}): LexResult {
  try {
    return { ok: true, tokens: lex(rule, input, options) };
  } catch (error) {
    if (error instanceof LexError) {
      return { ok: false, error };
    }
    throw error;
  }
}
