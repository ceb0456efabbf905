/**
 * Composition algebra for @rulelex/core
 *
 * Every builder is pure: operands are never modified and the returned rule
 * is frozen. Strings given where a rule is expected become literal rules.
 */

import { WHITESPACE_SOURCE, compileAnchored } from "./pattern.js";
import type {
  AlternationRule,
  AtomRule,
  IgnoreRule,
  LiteralRule,
  OptionalRule,
  PatternRule,
  RepetitionRule,
  Rule,
  RuleLike,
  SequenceRule,
} from "./types.js";

function freeze<T extends Rule>(rule: T): T {
  Object.freeze(rule);
  return rule;
}

// ---------------------------------------------------------------------------
// Leaves
// ---------------------------------------------------------------------------

/** Match an exact string. */
export function literal(text: string): LiteralRule {
  return freeze<LiteralRule>({ kind: "literal", text });
}

/**
 * Match a regular-expression fragment anchored at the start of the stream.
 * Invalid expressions throw a SyntaxError here rather than at match time.
 */
export function pattern(source: string | RegExp): PatternRule {
  const src = typeof source === "string" ? source : source.source;
  const flags = typeof source === "string" ? "" : source.flags.replace(/[gy]/g, "");
  compileAnchored(src, flags);
  return freeze<PatternRule>({ kind: "pattern", source: src, flags });
}

/** One or more whitespace characters. */
export const WHITESPACE: PatternRule = pattern(WHITESPACE_SOURCE);

/** Normalize a string operand into a literal rule. */
export function toRule(r: RuleLike): Rule {
  return typeof r === "string" ? literal(r) : r;
}

// ---------------------------------------------------------------------------
// Sequence and alternation
// ---------------------------------------------------------------------------

/**
 * `a` then `b`. Always adds one level of nesting, even when `a` is itself a
 * sequence.
 */
export function sequence(a: RuleLike, b: RuleLike): SequenceRule {
  return seq(a, b);
}

/**
 * `a` or else `b`. When `a` is already an alternation, `b` is appended to
 * its alternatives instead of nesting, so left-to-right chains stay flat.
 */
export function alternate(a: RuleLike, b: RuleLike): AlternationRule {
  const left = toRule(a);
  if (left.kind === "alternation") {
    return alt(...left.rules, b);
  }
  return alt(left, b);
}

/** All `rules` in order, as a single sequence. */
export function seq(...rules: RuleLike[]): SequenceRule {
  return freeze<SequenceRule>({ kind: "sequence", rules: Object.freeze(rules.map(toRule)) });
}

/** The first of `rules` that matches, tried in order. */
export function alt(...rules: RuleLike[]): AlternationRule {
  return freeze<AlternationRule>({ kind: "alternation", rules: Object.freeze(rules.map(toRule)) });
}

// ---------------------------------------------------------------------------
// Unary combinators
// ---------------------------------------------------------------------------

/** Zero or more, greedily. Never fails. */
export function repeat(r: RuleLike): RepetitionRule {
  return freeze<RepetitionRule>({ kind: "repetition", rule: toRule(r) });
}

/** Zero or one. Never fails; with no operand it matches the empty string. */
export function optional(r?: RuleLike): OptionalRule {
  return freeze<OptionalRule>({ kind: "optional", rule: r === undefined ? null : toRule(r) });
}

/** Concatenate everything `r` matches into a single token. */
export function atomize(r: RuleLike): AtomRule {
  return freeze<AtomRule>({ kind: "atom", rule: toRule(r) });
}

/** Wrap `r` in a singleton sequence, grouping its tokens one level deeper. */
export function capture(r: RuleLike): SequenceRule {
  return seq(r);
}

/** Skip `discard` (whitespace by default) before `r` when whitespace skipping is on. */
export function ignore(r: RuleLike, discard: RuleLike = WHITESPACE): IgnoreRule {
  return freeze<IgnoreRule>({ kind: "ignore", rule: toRule(r), discard: toRule(discard) });
}

// ---------------------------------------------------------------------------
// Counted repetition
// ---------------------------------------------------------------------------

/** One or more. */
export function multiple(r: RuleLike): Rule {
  const rule = toRule(r);
  switch (rule.kind) {
    case "pattern":
      return pattern(new RegExp(`(?:${rule.source})+`, rule.flags));
    case "optional":
      return rule.rule ? repeat(rule.rule) : rule;
    default:
      return sequence(rule, repeat(rule));
  }
}

/** Exactly `n` occurrences, as a sequence of `n` copies. */
export function exactly(r: RuleLike, n: number): SequenceRule {
  assertCount("n", n);
  return seq(...Array.from({ length: n }, () => toRule(r)));
}

/** Between `min` and `max` occurrences: `min` required copies, then `max - min` optional ones. */
export function many(r: RuleLike, min: number, max: number): SequenceRule {
  assertCount("min", min);
  assertCount("max", max);
  if (max < min) {
    throw new RangeError(`many(): max (${max}) is less than min (${min})`);
  }
  const rule = toRule(r);
  const required = Array.from({ length: min }, () => rule);
  const extra = Array.from({ length: max - min }, () => optional(rule));
  return seq(...required, ...extra);
}

function assertCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}
