// test/core/engine/run.spec.ts

import { describe, it, expect } from "vitest";
import { runMachine } from "../../../src/core/engine/run";
import { StreamOutput } from "../../../src/ports/sink";
import { ByteInput } from "../../../src/ports/source";
import { MemoryDiagnostics } from "../../../src/ports/diagnostics";
import { Session } from "../../../src/core/session/session";
import { makeParams, makeSession } from "../../helpers/bfHarness";

describe("runMachine", () => {
  it("stops at the step limit and resumes where it left off", () => {
    const { session } = makeSession();
    session.load(Buffer.from("+++", "latin1"));

    expect(runMachine(session.machine, { maxSteps: 2 })).toEqual({ status: "step-limit", steps: 2 });
    expect(session.machine.ip).toBe(2);
    expect(runMachine(session.machine)).toEqual({ status: "halted", steps: 1 });
    expect(session.machine.tape[0]).toBe(3);
  });

  it("reports halted when the limit is reached exactly at the end", () => {
    const { session } = makeSession();
    session.load(Buffer.from("++", "latin1"));
    expect(runMachine(session.machine, { maxSteps: 2 })).toEqual({ status: "halted", steps: 2 });
  });

  it("flushes buffered output before returning", () => {
    const chunks: Uint8Array[] = [];
    const session = new Session(makeParams(), {
      input: ByteInput.fromText(""),
      output: new StreamOutput({ write: (c: Uint8Array) => chunks.push(c) }),
      diagnostics: new MemoryDiagnostics(),
    });
    session.load(Buffer.from("+.+.", "latin1"));
    session.run();

    expect(chunks.map(c => Array.from(c))).toEqual([[1, 2]]);
  });
});
