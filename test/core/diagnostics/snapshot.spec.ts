// test/core/diagnostics/snapshot.spec.ts

import { describe, it, expect } from "vitest";
import { formatSnapshot, writeSnapshot } from "../../../src/core/diagnostics/snapshot";
import { MemoryDiagnostics } from "../../../src/ports/diagnostics";
import { makeSession } from "../../helpers/bfHarness";

describe("formatSnapshot", () => {
  it("lists cells up to and including the high-water mark", () => {
    const tape = new Uint8Array([5, 0, 7, 9]);
    expect(formatSnapshot({ line: 3, column: 4, tp: 1, ip: 12, tape, tpMax: 2 })).toBe(
      "Line: 3,4\nTape pointer: 1\nInstruction pointer: 12\nMemory map:\n0: 5\n1: 0\n2: 7\n"
    );
  });

  it("never reads past the tape", () => {
    const tape = new Uint8Array([1, 2]);
    const text = formatSnapshot({ line: 1, column: 0, tp: 0, ip: 0, tape, tpMax: 5 });
    expect(text.endsWith("Memory map:\n0: 1\n1: 2\n")).toBe(true);
  });
});

describe("writeSnapshot", () => {
  it("writes to the given sink without touching the machine", () => {
    const { session } = makeSession();
    const m = session.machine;
    m.tape[0] = 42;
    const sink = new MemoryDiagnostics();

    writeSnapshot(m, sink);

    expect(sink.text).toBe("Line: 1,0\nTape pointer: 0\nInstruction pointer: 0\nMemory map:\n0: 42\n");
    expect(m.tape[0]).toBe(42);
    expect(m.ip).toBe(0);
  });
});
