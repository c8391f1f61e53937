// test/core/session/repl.spec.ts
// Interactive driver

import { describe, it, expect } from "vitest";
import { runRepl, REPL_PROMPT } from "../../../src/core/session/repl";
import { MemoryOutput } from "../../../src/ports/sink";
import { MemoryDiagnostics } from "../../../src/ports/diagnostics";
import type { SessionFlags } from "../../../src/core/engine/machine";
import { linesOf, makeParams } from "../../helpers/bfHarness";

async function repl(lines: string[], flags: Partial<SessionFlags> = {}) {
  const output = new MemoryOutput();
  const diagnostics = new MemoryDiagnostics();
  const prompts: string[] = [];
  const summary = await runRepl(makeParams({ flags }), {
    lines: linesOf(...lines),
    output,
    diagnostics,
    prompt: (text) => prompts.push(text),
  });
  return { summary, output, diagnostics, prompts };
}

describe("runRepl", () => {
  it("keeps the tape between lines", async () => {
    const { output, summary } = await repl(["+++", "."]);
    expect(output.bytes()).toEqual([3]);
    expect(summary).toEqual({ accepted: 2, rejected: 0, steps: 6 });
  });

  it("prompts before every line and once more at the end", async () => {
    const { prompts } = await repl(["+"]);
    expect(prompts).toEqual([REPL_PROMPT, REPL_PROMPT]);
  });

  it("'@' resets the session", async () => {
    const { output } = await repl(["+++", "@", "."]);
    expect(output.bytes()).toEqual([0]);
  });

  it("rejects an unbalanced line and keeps going", async () => {
    const { output, diagnostics, summary } = await repl(["+[", "++", "."]);

    expect(diagnostics.lines()).toEqual(["Error (1,2): Unmatched opening bracket '['."]);
    expect(output.bytes()).toEqual([2]);
    expect(summary.accepted).toBe(2);
    expect(summary.rejected).toBe(1);
  });

  it("runs loops that refer to earlier tape contents", async () => {
    const { output } = await repl(["+++", "[-]", "."]);
    expect(output.bytes()).toEqual([0]);
  });

  it("uses the next line as input for ','", async () => {
    const { output, summary } = await repl([",.", "A"]);
    expect(output.bytes()).toEqual([65]);
    expect(summary.accepted).toBe(1);
  });

  it("ends input when the line stream ends", async () => {
    const { output } = await repl(["+++,."]);
    expect(output.bytes()).toEqual([0]);
  });

  it("numbers lines over the whole session", async () => {
    const { diagnostics } = await repl(["+", "<"]);
    expect(diagnostics.lines()).toEqual(["Warning (2,1): Tape pointer underflow. Tape pointer set to zero."]);
  });

  it("enables '#' in debug mode", async () => {
    const { diagnostics } = await repl(["+#"], { debug: true });
    expect(diagnostics.text).toBe("Line: 1,2\nTape pointer: 0\nInstruction pointer: 1\nMemory map:\n0: 1\n");
  });
});
