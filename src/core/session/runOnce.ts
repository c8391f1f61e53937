// src/core/session/runOnce.ts
// File mode: load, resolve once, execute to the end

import type { Outcome } from "../../outcome/outcome";
import { isFail } from "../../outcome/outcome";
import { done } from "../../outcome/constructors";
import type { DiagnosticSink } from "../../ports/diagnostics";
import type { OutputSink } from "../../ports/sink";
import { QueuedInput } from "../../ports/source";
import type { SessionParams } from "../engine/machine";
import { loadProgramFile } from "./loadFile";
import { Session } from "./session";

export type RunOnceIO = {
  /** Live input for `,`; pulled one chunk at a time, only when needed. */
  input?: AsyncIterable<Uint8Array | string>;
  output: OutputSink;
  diagnostics: DiagnosticSink;
};

export type RunSummary = {
  steps: number;
  loops: number;
  programLength: number;
};

/**
 * Run a complete program once. Unbalanced brackets abort before anything
 * executes.
 */
export async function runOnce(
  bytes: Uint8Array,
  params: SessionParams,
  io: RunOnceIO
): Promise<Outcome<RunSummary>> {
  const live = new QueuedInput();
  const session = new Session(params, {
    input: live,
    output: io.output,
    diagnostics: io.diagnostics,
  });

  const loaded = session.load(bytes);
  if (isFail(loaded)) return loaded;

  const chunks = io.input?.[Symbol.asyncIterator]();
  let steps = 0;

  try {
    for (;;) {
      const result = session.run();
      steps += result.steps;
      if (result.status !== "awaiting-input") break;

      const next = chunks ? await chunks.next() : undefined;
      if (!next || next.done) {
        live.end();
      } else {
        live.push(next.value);
      }
    }
  } finally {
    await chunks?.return?.();
  }

  return done(
    { steps, loops: loaded.value.size, programLength: session.machine.program.length },
    { steps }
  );
}

/**
 * Load a file and run it once.
 */
export async function runFile(
  filePath: string,
  params: SessionParams,
  io: RunOnceIO
): Promise<Outcome<RunSummary>> {
  const loaded = loadProgramFile(filePath);
  if (isFail(loaded)) return loaded;
  return runOnce(loaded.value, params, io);
}
