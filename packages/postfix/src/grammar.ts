import { alternate, lex, pattern, repeat, sequence } from "@rulelex/core";
import type { PatternRule, SequenceRule } from "@rulelex/core";

/** A run of decimal digits. */
export const number: PatternRule = pattern("\\d+");

/** One of `+ - * / ^`. */
export const operator: PatternRule = pattern("[+\\-*/^]");

/** A number followed by any mix of numbers and operators. */
export const postfix: SequenceRule = sequence(number, repeat(alternate(number, operator)));

/** Split a postfix expression into number and operator tokens, skipping whitespace. */
export function tokenize(line: string): string[] {
  return lex(postfix, line, { ignoreWhitespace: true });
}
