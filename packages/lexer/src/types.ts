/**
 * Core types for @rulelex/core
 *
 * Defines the rule tree, the match tree and the match result that every
 * combinator produces.
 */

/** The unconsumed suffix of the input at some point during matching. */
export type Stream = string;

/**
 * Nested result of a successful match. Leaves are the text actually
 * consumed; lists mirror the shape of the rule that produced them.
 */
export type MatchTree = string | readonly MatchTree[];

/** Rule tree nodes. Immutable once built, freely shared between parents. */
export type Rule =
  | LiteralRule
  | PatternRule
  | SequenceRule
  | AlternationRule
  | RepetitionRule
  | OptionalRule
  | AtomRule
  | IgnoreRule;

export interface LiteralRule {
  readonly kind: "literal";
  readonly text: string;
}

export interface PatternRule {
  readonly kind: "pattern";
  /** Regular-expression fragment, matched anchored at the start of the stream. */
  readonly source: string;
  readonly flags: string;
}

export interface SequenceRule {
  readonly kind: "sequence";
  readonly rules: readonly Rule[];
}

export interface AlternationRule {
  readonly kind: "alternation";
  readonly rules: readonly Rule[];
}

export interface RepetitionRule {
  readonly kind: "repetition";
  readonly rule: Rule;
}

export interface OptionalRule {
  readonly kind: "optional";
  /** An absent child matches the empty string. */
  readonly rule: Rule | null;
}

export interface AtomRule {
  readonly kind: "atom";
  readonly rule: Rule;
}

export interface IgnoreRule {
  readonly kind: "ignore";
  readonly rule: Rule;
  /** Skipped once before `rule`, when whitespace skipping is on. */
  readonly discard: Rule;
}

export type RuleKind = Rule["kind"];

/** Anything accepted where a rule is expected; bare strings become literals. */
export type RuleLike = Rule | string;

/** Result of a match attempt: the remaining stream and match tree, or why it failed. */
export type MatchResult =
  | { readonly ok: true; readonly rest: Stream; readonly tree: MatchTree }
  | {
      readonly ok: false;
      /** The rule that could not match. */
      readonly rule: Rule;
      /** The stream it was tried against. */
      readonly stream: Stream;
      readonly expected: string;
    };

export type MatchFailure = Extract<MatchResult, { ok: false }>;
export type MatchSuccess = Extract<MatchResult, { ok: true }>;

export interface MatchOptions {
  /**
   * Skip leading whitespace before literals and patterns, and run the
   * discard rule of `ignore` nodes. Off unless set.
   */
  readonly ignoreWhitespace?: boolean;
}
