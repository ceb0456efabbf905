import * as readline from "readline";
import type { Readable, Writable } from "stream";
import { calculate, formatResult } from "./calculator.js";

export const PROMPT = "$ ";

/**
 * Read postfix expressions line by line and print each result.
 * Resolves on an empty line or at end of input.
 */
export function runRepl(input: Readable, output: Writable): Promise<void> {
  const rl = readline.createInterface({ input, terminal: false });
  let done = false;

  return new Promise((resolve) => {
    rl.on("close", () => {
      done = true;
      resolve();
    });

    rl.on("line", (line) => {
      if (done) return;
      if (line === "") {
        done = true;
        rl.close();
        return;
      }
      output.write(`${formatResult(calculate(line))}\n${PROMPT}`);
    });

    output.write(PROMPT);
  });
}
