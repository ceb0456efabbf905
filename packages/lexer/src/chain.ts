/**
 * Fluent wrapper over the builder functions.
 *
 * ```ts
 * const number = rule(pattern("\\d+"));
 * const postfix = number.then(number.or(pattern("[+\\-*\/^]")).repeat());
 * postfix.lex("3 4 +", { ignoreWhitespace: true }); // ["3", "4", "+"]
 * ```
 */

import {
  alternate,
  atomize,
  capture,
  exactly,
  ignore,
  many,
  multiple,
  optional,
  repeat,
  sequence,
  toRule,
} from "./builders.js";
import { describeRule } from "./describe.js";
import { lex, tokens, tryLex } from "./lexer.js";
import type { LexOptions, LexResult } from "./lexer.js";
import { match, tryMatch } from "./match.js";
import type { MatchOptions, MatchResult, MatchTree, Rule, RuleLike } from "./types.js";

export type ChainLike = RuleLike | RuleChain;

export class RuleChain {
  constructor(readonly rule: Rule) {}

  then(next: ChainLike): RuleChain {
    return new RuleChain(sequence(this.rule, unwrap(next)));
  }

  or(other: ChainLike): RuleChain {
    return new RuleChain(alternate(this.rule, unwrap(other)));
  }

  optional(): RuleChain {
    return new RuleChain(optional(this.rule));
  }

  repeat(): RuleChain {
    return new RuleChain(repeat(this.rule));
  }

  multiple(): RuleChain {
    return new RuleChain(multiple(this.rule));
  }

  exactly(n: number): RuleChain {
    return new RuleChain(exactly(this.rule, n));
  }

  many(min: number, max: number): RuleChain {
    return new RuleChain(many(this.rule, min, max));
  }

  atomize(): RuleChain {
    return new RuleChain(atomize(this.rule));
  }

  capture(): RuleChain {
    return new RuleChain(capture(this.rule));
  }

  ignore(discard?: ChainLike): RuleChain {
    return new RuleChain(
      discard === undefined ? ignore(this.rule) : ignore(this.rule, unwrap(discard))
    );
  }

  match(stream: string, options?: MatchOptions): { rest: string; tree: MatchTree } {
    return match(this.rule, stream, options);
  }

  tryMatch(stream: string, options: MatchOptions = {}): MatchResult {
    return tryMatch(this.rule, stream, options.ignoreWhitespace ?? false);
  }

  lex(input: string, options?: LexOptions): string[] {
    return lex(this.rule, input, options);
  }

  tryLex(input: string, options?: LexOptions): LexResult {
    return tryLex(this.rule, input, options);
  }

  tokens(input: string, options?: LexOptions): Generator<string, void, undefined> {
    return tokens(this.rule, input, options);
  }

  toString(): string {
    return describeRule(this.rule);
  }
}

/** Start a fluent chain from a rule, a literal string or another chain. */
export function rule(r: ChainLike): RuleChain {
  return r instanceof RuleChain ? r : new RuleChain(toRule(r));
}

function unwrap(r: ChainLike): Rule {
  return r instanceof RuleChain ? r.rule : toRule(r);
}
