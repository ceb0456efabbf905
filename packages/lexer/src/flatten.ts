import type { MatchTree } from "./types.js";

/** Leaf tokens of a match tree, depth-first, left to right. */
export function flatten(tree: MatchTree): string[] {
  const out: string[] = [];
  collect(tree, out);
  return out;
}

function collect(tree: MatchTree, out: string[]): void {
  if (typeof tree === "string") {
    out.push(tree);
    return;
  }
  for (const child of tree) {
    collect(child, out);
  }
}
