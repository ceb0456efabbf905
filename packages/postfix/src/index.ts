/**
 * @rulelex/postfix
 *
 * Postfix-notation calculator: a two-rule grammar lexed with @rulelex/core
 * and evaluated on a stack.
 *
 * @module
 */

export { number, operator, postfix, tokenize } from "./grammar.js";
export { evaluate, floorDiv, isOperator, EvaluationError } from "./evaluator.js";
export type { Operator } from "./evaluator.js";
export { calculate, formatResult } from "./calculator.js";
export type { CalcResult } from "./calculator.js";
export { runRepl, PROMPT } from "./repl.js";
