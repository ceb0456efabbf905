import { describe, it, expect } from "vitest";
import { Readable, Writable } from "stream";
import { runRepl } from "../repl.js";
import { main } from "../cli.js";

function collect(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

describe("runRepl", () => {
  it("prints one result per line and stops at an empty line", async () => {
    const out = collect();
    await runRepl(Readable.from(["3 4 +\n2 3 ^\n1 +\n\n9\n"]), out.stream);
    await new Promise((resolve) => setImmediate(resolve));
    expect(out.text()).toBe('$ 7\n$ 8\n$ error: stack underflow at "+"\n$ ');
  });

  it("stops at end of input", async () => {
    const out = collect();
    await runRepl(Readable.from(["1 2 +\n3 x\n"]), out.stream);
    await new Promise((resolve) => setImmediate(resolve));
    expect(out.text()).toBe('$ 3\n$ syntax error: "3 x"\n$ ');
  });
});

describe("main", () => {
  it("runs the REPL over the given streams and ends with a newline", async () => {
    const out = collect();
    await main(Readable.from(["3 4 +\n"]), out.stream);
    await new Promise((resolve) => setImmediate(resolve));
    expect(out.text()).toBe("$ 7\n$ \n");
  });
});
