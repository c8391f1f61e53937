// src/core/diagnostics/snapshot.ts
// The `#` memory dump

import type { DiagnosticSink } from "../../ports/diagnostics";
import type { Machine } from "../engine/machine";
import { formatPosition } from "../source/position";

export type SnapshotInput = {
  line: number;
  column: number;
  tp: number;
  ip: number;
  tape: Uint8Array;
  tpMax: number;
};

/**
 * Render the current position, both pointers and tape cells 0..tpMax inclusive.
 */
export function formatSnapshot(s: SnapshotInput): string {
  const lines = [
    `Line: ${formatPosition(s)}`,
    `Tape pointer: ${s.tp}`,
    `Instruction pointer: ${s.ip}`,
    "Memory map:",
  ];
  const last = Math.min(s.tpMax, s.tape.length - 1);
  for (let i = 0; i <= last; i++) {
    lines.push(`${i}: ${s.tape[i]}`);
  }
  return lines.join("\n") + "\n";
}

export function writeSnapshot(m: Machine, sink: DiagnosticSink = m.ports.diagnostics): void {
  sink.write(
    formatSnapshot({
      line: m.cursor.line,
      column: m.cursor.column,
      tp: m.tp,
      ip: m.ip,
      tape: m.tape,
      tpMax: m.tpMax,
    })
  );
}
