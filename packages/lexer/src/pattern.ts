/**
 * Single-position regular-expression matching.
 *
 * The only capability the engine needs from the regex implementation:
 * match an expression anchored at the start of a string and report what
 * was consumed.
 */

export interface AnchoredMatch {
  /** Number of characters consumed. */
  readonly length: number;
  /** The consumed text. */
  readonly text: string;
}

/** One or more whitespace characters; skipped before patterns when enabled. */
export const WHITESPACE_SOURCE = "\\s+";

const compiled = new Map<string, RegExp>();

/** Compile (and cache) `source` as a sticky expression. Throws SyntaxError on an invalid source. */
export function compileAnchored(source: string, flags = ""): RegExp {
  const key = `${flags}/${source}`;
  let re = compiled.get(key);
  if (!re) {
    re = new RegExp(source, stickyFlags(flags));
    compiled.set(key, re);
  }
  return re;
}

/** Match `source` at position 0 of `input`, or return null. */
export function matchAnchored(source: string, input: string, flags = ""): AnchoredMatch | null {
  const re = compileAnchored(source, flags);
  re.lastIndex = 0;
  const m = re.exec(input);
  if (!m) return null;
  return { length: m[0].length, text: m[0] };
}

/** Strip `g` (meaningless here) and force `y`. */
export function stickyFlags(flags: string): string {
  return flags.replace(/[gy]/g, "") + "y";
}
