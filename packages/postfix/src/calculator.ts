import { tryLex } from "@rulelex/core";
import { postfix } from "./grammar.js";
import { EvaluationError, evaluate } from "./evaluator.js";

export type CalcResult =
  | { readonly ok: true; readonly value: bigint }
  | { readonly ok: false; readonly message: string };

/** Lex and evaluate one line of postfix notation. */
export function calculate(line: string): CalcResult {
  const lexed = tryLex(postfix, line, { ignoreWhitespace: true });
  if (!lexed.ok) {
    return { ok: false, message: `syntax error: ${JSON.stringify(line)}` };
  }
  try {
    return { ok: true, value: evaluate(lexed.tokens) };
  } catch (error) {
    if (error instanceof EvaluationError) {
      return { ok: false, message: `error: ${error.message}` };
    }
    throw error;
  }
}

export function formatResult(result: CalcResult): string {
  return result.ok ? result.value.toString() : result.message;
}
