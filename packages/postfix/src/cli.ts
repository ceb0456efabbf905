#!/usr/bin/env node

/**
 * Postfix calculator REPL.
 *
 * Usage (after `npm run build`):
 *   node packages/postfix/dist/cli.js
 *   $ 3 4 +
 *   7
 */

import { realpathSync } from "fs";
import type { Readable, Writable } from "stream";
import { pathToFileURL } from "url";
import { runRepl } from "./repl.js";

export async function main(
  input: Readable = process.stdin,
  output: Writable = process.stdout
): Promise<void> {
  await runRepl(input, output);
  output.write("\n");
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  return script !== undefined && import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
