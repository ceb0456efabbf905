/**
 * Stack evaluation of postfix tokens.
 *
 * Numbers are pushed; an operator pops the top two values `b` then `a` and
 * pushes `a op b`. Arithmetic is on bigint, so results never overflow.
 */

export type Operator = "+" | "-" | "*" | "/" | "^";

export class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EvaluationError";
  }
}

const OPERATORS: Record<Operator, (a: bigint, b: bigint) => bigint> = {
  "+": (a, b) => a + b,
  "-": (a, b) => a - b,
  "*": (a, b) => a * b,
  "/": floorDiv,
  "^": (a, b) => {
    if (b < 0n) throw new EvaluationError(`negative exponent ${b}`);
    return a ** b;
  },
};

export function isOperator(token: string): token is Operator {
  return Object.hasOwn(OPERATORS, token);
}

/** Integer division rounding toward negative infinity. */
export function floorDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) throw new EvaluationError("division by zero");
  const q = a / b;
  return a % b !== 0n && a < 0n !== b < 0n ? q - 1n : q;
}

/** Evaluate a postfix token list to a single value. */
export function evaluate(tokens: readonly string[]): bigint {
  const stack: bigint[] = [];

  for (const token of tokens) {
    if (/^\d+$/.test(token)) {
      stack.push(BigInt(token));
      continue;
    }
    if (!isOperator(token)) {
      throw new EvaluationError(`unknown token ${JSON.stringify(token)}`);
    }
    const b = stack.pop();
    const a = stack.pop();
    if (a === undefined || b === undefined) {
      throw new EvaluationError(`stack underflow at ${JSON.stringify(token)}`);
    }
    stack.push(OPERATORS[token](a, b));
  }

  const [result, ...extra] = stack;
  if (result === undefined) {
    throw new EvaluationError("empty expression");
  }
  if (extra.length > 0) {
    throw new EvaluationError(`${stack.length} values left on the stack`);
  }
  return result;
}
