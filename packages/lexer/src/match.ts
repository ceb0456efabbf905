/**
 * The matching engine.
 *
 * `tryMatch` is a pure function of (rule, stream, ignoreWhitespace): rules
 * and streams are never mutated, so a failed attempt is undone simply by
 * discarding its result. Failures are recovered only by optional,
 * repetition, alternation candidates and the discard step of ignore;
 * everywhere else the first failure is returned as-is.
 */

import { describeRule } from "./describe.js";
import { FailedMatching } from "./errors.js";
import { flatten } from "./flatten.js";
import { WHITESPACE_SOURCE, matchAnchored } from "./pattern.js";
import type {
  MatchOptions,
  MatchResult,
  MatchTree,
  Rule,
  Stream,
} from "./types.js";

function ok(rest: Stream, tree: MatchTree): MatchResult {
  return { ok: true, rest, tree };
}

function fail(rule: Rule, stream: Stream, expected: string = describeRule(rule)): MatchResult {
  return { ok: false, rule, stream, expected };
}

const EMPTY: readonly MatchTree[] = Object.freeze([]);

/** Attempt `rule` at the start of `stream`. */
export function tryMatch(rule: Rule, stream: Stream, ignoreWhitespace = false): MatchResult {
  switch (rule.kind) {
    case "literal": {
      const input = ignoreWhitespace ? stream.trimStart() : stream;
      if (input.startsWith(rule.text)) {
        return ok(input.slice(rule.text.length), rule.text);
      }
      return fail(rule, stream);
    }

    case "pattern": {
      let input = stream;
      if (ignoreWhitespace) {
        const ws = matchAnchored(WHITESPACE_SOURCE, input);
        if (ws) input = input.slice(ws.length);
      }
      const m = matchAnchored(rule.source, input, rule.flags);
      if (m) {
        return ok(input.slice(m.length), m.text);
      }
      return fail(rule, stream);
    }

    case "sequence": {
      const trees: MatchTree[] = [];
      let rest = stream;
      for (const child of rule.rules) {
        const r = tryMatch(child, rest, ignoreWhitespace);
        if (!r.ok) return r;
        trees.push(r.tree);
        rest = r.rest;
      }
      return ok(rest, trees);
    }

    case "alternation": {
      const expected: string[] = [];
      for (const child of rule.rules) {
        const r = tryMatch(child, stream, ignoreWhitespace);
        if (r.ok) return r;
        expected.push(r.expected);
      }
      return fail(rule, stream, expected.length > 0 ? expected.join(" or ") : "nothing");
    }

    case "repetition": {
      const trees: MatchTree[] = [];
      let rest = stream;
      for (;;) {
        const r = tryMatch(rule.rule, rest, ignoreWhitespace);
        if (!r.ok) break;
        // a zero-width iteration would repeat forever
        if (r.rest.length === rest.length) break;
        trees.push(r.tree);
        rest = r.rest;
      }
      return ok(rest, trees);
    }

    case "optional": {
      if (!rule.rule) return ok(stream, EMPTY);
      const r = tryMatch(rule.rule, stream, ignoreWhitespace);
      return r.ok ? r : ok(stream, EMPTY);
    }

    case "atom": {
      const r = tryMatch(rule.rule, stream, ignoreWhitespace);
      if (!r.ok) return r;
      return ok(r.rest, [flatten(r.tree).join("")]);
    }

    case "ignore": {
      let rest = stream;
      if (ignoreWhitespace) {
        const skipped = tryMatch(rule.discard, rest, ignoreWhitespace);
        if (skipped.ok) rest = skipped.rest;
      }
      return tryMatch(rule.rule, rest, ignoreWhitespace);
    }
  }
}

/**
 * Match `rule` at the start of `stream`, throwing {@link FailedMatching}
 * on failure. Does not require the whole stream to be consumed.
 */
export function match(
  rule: Rule,
  stream: Stream,
  options: MatchOptions = {}
): { rest: Stream; tree: MatchTree } {
  const r = tryMatch(rule, stream, options.ignoreWhitespace ?? false);
  if (!r.ok) {
    throw new FailedMatching(r.rule, r.stream, r.expected, stream);
  }
  return { rest: r.rest, tree: r.tree };
}
