import type { Rule } from "./types.js";

/**
 * Render a rule in compact grammar notation, for error messages.
 *
 * ```
 * "text"   literal          (a b)    sequence
 * /src/    pattern          (a | b)  alternation
 * x*       repetition       x?       optional
 * <x>      atom             x~d      ignore (d discarded first)
 * ```
 */
export function describeRule(rule: Rule): string {
  switch (rule.kind) {
    case "literal":
      return JSON.stringify(rule.text);
    case "pattern":
      return `/${rule.source}/${rule.flags}`;
    case "sequence":
      return `(${rule.rules.map(describeRule).join(" ")})`;
    case "alternation":
      return `(${rule.rules.map(describeRule).join(" | ")})`;
    case "repetition":
      return `${describeRule(rule.rule)}*`;
    case "optional":
      return rule.rule ? `${describeRule(rule.rule)}?` : "()?";
    case "atom":
      return `<${describeRule(rule.rule)}>`;
    case "ignore":
      return `${describeRule(rule.rule)}~${describeRule(rule.discard)}`;
  }
}
