/**
 * @rulelex/core
 *
 * Lexer combinators: build a token grammar from literal and pattern rules
 * with sequence, alternation, repetition, optional, atom and ignore, then
 * lex input into a flat list of tokens.
 *
 * @module
 */

// Core types
export type {
  Stream,
  MatchTree,
  Rule,
  RuleKind,
  RuleLike,
  LiteralRule,
  PatternRule,
  SequenceRule,
  AlternationRule,
  RepetitionRule,
  OptionalRule,
  AtomRule,
  IgnoreRule,
  MatchResult,
  MatchSuccess,
  MatchFailure,
  MatchOptions,
} from "./types.js";

// Composition algebra
export {
  WHITESPACE,
  literal,
  pattern,
  toRule,
  sequence,
  alternate,
  seq,
  alt,
  repeat,
  optional,
  atomize,
  capture,
  ignore,
  multiple,
  exactly,
  many,
} from "./builders.js";

// Fluent API
export { RuleChain, rule } from "./chain.js";
export type { ChainLike } from "./chain.js";

// Matching and lexing
export { tryMatch, match } from "./match.js";
export { tokens, lex, tryLex } from "./lexer.js";
export type { LexOptions, LexResult } from "./lexer.js";
export { flatten } from "./flatten.js";
export { matchAnchored } from "./pattern.js";
export type { AnchoredMatch } from "./pattern.js";

// Errors and diagnostics
export { LexError, FailedMatching, RemainingInput, isLexError } from "./errors.js";
export { describeRule } from "./describe.js";

// Configuration
export { config } from "./config.js";
export type { RulelexConfig } from "./config.js";
