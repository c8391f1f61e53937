// src/core/session/repl.ts
// Interactive mode: append a line, rebuild loops, resume where we stopped

import { isFail } from "../../outcome/outcome";
import { allDiagnostics } from "../../outcome/failure";
import type { DiagnosticSink } from "../../ports/diagnostics";
import type { OutputSink } from "../../ports/sink";
import { QueuedInput } from "../../ports/source";
import type { SessionParams } from "../engine/machine";
import { Session } from "./session";

export const REPL_PROMPT = "> ";

export type ReplIO = {
  /** Program lines without their trailing newline. Also feeds `,`. */
  lines: AsyncIterable<string>;
  output: OutputSink;
  diagnostics: DiagnosticSink;
  prompt?: (text: string) => void;
};

export type ReplSummary = {
  accepted: number;
  rejected: number;
  steps: number;
};

/**
 * Read-append-run loop. The loop table is rebuilt from the whole buffer for
 * every line, and execution resumes at the previous instruction pointer, so
 * tape contents carry over between lines.
 *
 * A line that leaves the brackets unbalanced is reported and dropped; the
 * session keeps going. When `,` needs a byte, the next line of the same
 * stream is consumed as input. The loop ends when the stream does.
 */
export async function runRepl(params: SessionParams, io: ReplIO): Promise<ReplSummary> {
  const input = new QueuedInput();
  const session = new Session(
    { ...params, flags: { ...params.flags, repl: true } },
    { input, output: io.output, diagnostics: io.diagnostics }
  );

  const lines = io.lines[Symbol.asyncIterator]();
  const summary: ReplSummary = { accepted: 0, rejected: 0, steps: 0 };

  try {
    for (;;) {
      io.prompt?.(REPL_PROMPT);
      const next = await lines.next();
      if (next.done) break;

      const appended = session.append(`${next.value}\n`);
      if (isFail(appended)) {
        for (const diag of allDiagnostics(appended.failure)) {
          io.diagnostics.report(diag);
        }
        summary.rejected++;
        continue;
      }
      summary.accepted++;

      for (;;) {
        const result = session.run();
        summary.steps += result.steps;
        if (result.status !== "awaiting-input") break;

        const more = await lines.next();
        if (more.done) {
          input.end();
        } else {
          input.push(`${more.value}\n`);
        }
      }
    }
  } finally {
    await lines.return?.();
  }

  return summary;
}
