/**
 * Lexing errors.
 *
 * Only two things can go wrong when lexing: a required rule did not match,
 * or every rule matched but input was left over.
 */

import { describeRule } from "./describe.js";
import type { Rule, Stream } from "./types.js";

/** Base class for both lexing failures. */
export abstract class LexError extends Error {
  /** Zero-based offset into the original input where lexing stopped. */
  readonly offset: number;
  /** 1-based line of `offset`. */
  readonly line: number;
  /** 1-based column of `offset`. */
  readonly column: number;

  protected constructor(message: (at: string) => string, input: string, offset: number) {
    const { line, col } = lineCol(input, offset);
    super(message(`line ${line}, col ${col}`));
    this.offset = offset;
    this.line = line;
    this.column = col;
  }
}

/** A rule that was required to match did not match the stream. */
export class FailedMatching extends LexError {
  readonly rule: Rule;
  /** The remaining stream at the point of failure. */
  readonly stream: Stream;
  readonly expected: string;

  /**
   * @param input - The whole input being lexed; `stream` must be a suffix of it.
   *   Defaults to `stream` itself when the original input is not known.
   */
  constructor(rule: Rule, stream: Stream, expected: string, input: string = stream) {
    super(
      (at) => `Failed to match ${describeRule(rule)} at ${at}: expected ${expected}`,
      input,
      input.length - stream.length
    );
    this.name = "FailedMatching";
    this.rule = rule;
    this.stream = stream;
    this.expected = expected;
  }
}

/** Every rule matched, but input remained unconsumed. */
export class RemainingInput extends LexError {
  readonly remaining: string;

  constructor(remaining: string, input: string = remaining) {
    super(
      (at) => `Unconsumed input at ${at}: ${JSON.stringify(remaining.slice(0, 20))}`,
      input,
      input.length - remaining.length
    );
    this.name = "RemainingInput";
    this.remaining = remaining;
  }
}

export function isLexError(value: unknown): value is LexError {
  return value instanceof LexError;
}

/** Convert a zero-based offset to 1-based line/col. */
export function lineCol(input: string, pos: number): { line: number; col: number } {
  let line = 1;
  let col = 1;
  for (let i = 0; i < pos && i < input.length; i++) {
    if (input[i] === "\n") {
      line++;
      col = 1;
    } else {
      col++;
    }
  }
  return { line, col };
}
