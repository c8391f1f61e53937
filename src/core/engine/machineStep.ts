// src/core/engine/machineStep.ts
// Single-operator dispatch

import { makeDiagnostic } from "../../outcome/codes";
import { END_OF_INPUT } from "../../ports/source";
import { writeSnapshot } from "../diagnostics/snapshot";
import { resetMachine, type Machine, type StepOutcome } from "./machine";

export const Op = {
  Inc: 0x2b,     // '+'
  Input: 0x2c,   // ','
  Dec: 0x2d,     // '-'
  Output: 0x2e,  // '.'
  Left: 0x3c,    // '<'
  Right: 0x3e,   // '>'
  Open: 0x5b,    // '['
  Close: 0x5d,   // ']'
  Debug: 0x23,   // '#'
  Reset: 0x40,   // '@'
  Newline: 0x0a,
} as const;

const STEPPED: StepOutcome = { tag: "Stepped" };
const HALTED: StepOutcome = { tag: "Halted" };
const AWAITING_INPUT: StepOutcome = { tag: "AwaitingInput" };
const RESET: StepOutcome = { tag: "Reset" };

/**
 * Execute the byte at the instruction pointer and advance past it.
 *
 * A taken jump moves the instruction pointer onto the matching bracket; the
 * regular advance then steps over it. `,` with no input available yet leaves
 * the machine untouched and reports `AwaitingInput`.
 */
export function stepOnce(m: Machine): StepOutcome {
  const op = m.program.at(m.ip);
  if (op === undefined) return HALTED;

  if (op === Op.Input) {
    const next = m.receiving ? m.ports.input.read() : END_OF_INPUT;
    if (next.tag === "Pending") return AWAITING_INPUT;
    m.cursor.column++;
    if (next.tag === "Byte") {
      m.tape[m.tp] = next.value;
    } else {
      m.receiving = false;
      applyEof(m);
    }
    m.ip++;
    return STEPPED;
  }

  m.cursor.column++;

  switch (op) {
    case Op.Inc:
      m.tape[m.tp]++;
      break;

    case Op.Dec:
      m.tape[m.tp]--;
      break;

    case Op.Right:
      m.tp++;
      if (m.tp >= m.tape.length) {
        m.ports.diagnostics.report(makeDiagnostic("W0001", undefined, { offset: m.ip, ...m.cursor }));
        m.tp = 0;
      } else if (m.tp > m.tpMax) {
        m.tpMax = m.tp;
      }
      break;

    case Op.Left:
      m.tp--;
      if (m.tp < 0) {
        m.ports.diagnostics.report(makeDiagnostic("W0002", undefined, { offset: m.ip, ...m.cursor }));
        m.tp = 0;
      }
      break;

    case Op.Output:
      m.ports.output.write(m.tape[m.tp]);
      break;

    case Op.Open:
      if (m.tape[m.tp] === 0) {
        const target = m.loops.closeFor(m.ip);
        if (target) {
          m.ip = target.offset;
          m.cursor = { line: target.line, column: target.column };
        }
      }
      break;

    case Op.Close:
      if (m.tape[m.tp] !== 0) {
        const target = m.loops.openFor(m.ip);
        if (target) {
          m.ip = target.offset;
          m.cursor = { line: target.line, column: target.column };
        }
      }
      break;

    case Op.Debug:
      if (m.params.flags.debug && m.params.flags.specialOps) {
        writeSnapshot(m);
      }
      break;

    case Op.Reset:
      if (m.params.flags.repl && m.params.flags.specialOps) {
        resetMachine(m);
        return RESET;
      }
      break;

    case Op.Newline:
      m.cursor.line++;
      m.cursor.column = 0;
      break;
  }

  m.ip++;
  return STEPPED;
}

function applyEof(m: Machine): void {
  switch (m.params.eofBehavior) {
    case "zero":
      m.tape[m.tp] = 0;
      break;
    case "decrement":
      m.tape[m.tp]--;
      break;
    case "unchanged":
      break;
  }
}
