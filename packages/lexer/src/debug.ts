import { isDebugEnabled } from "./config.js";

/** Log a lexer trace line when `debug` is configured. */
export function trace(message: string): void {
  if (isDebugEnabled()) {
    console.log(`[rulelex] ${message}`);
  }
}

/** Shorten input for log lines. */
export function preview(text: string, max = 30): string {
  return JSON.stringify(text.length > max ? `${text.slice(0, max)}…` : text);
}
