// src/core/engine/machine.ts
// Interpreter state: tape, pointers, program, loop table

import type { PortSet } from "../../ports/composite";
import { LoopTable } from "../loops/table";
import { ProgramBuffer } from "../session/programBuffer";
import { startCursor, type Cursor } from "../source/position";

export type EofBehavior = "zero" | "decrement" | "unchanged";

export const EOF_BEHAVIORS: readonly EofBehavior[] = ["zero", "decrement", "unchanged"];

export type SessionFlags = {
  /** `#` prints a snapshot */
  debug: boolean;
  /** interactive session; enables `@` */
  repl: boolean;
  /** `#` and `@` are recognized at all */
  specialOps: boolean;
  /** `!` splits a loaded file into program and input */
  separateInput: boolean;
};

export type SessionParams = {
  tapeSize: number;
  inputSeedSize: number;
  eofBehavior: EofBehavior;
  flags: SessionFlags;
};

export const DEFAULT_TAPE_SIZE = 30_000;

export const DEFAULT_SESSION_PARAMS: SessionParams = {
  tapeSize: DEFAULT_TAPE_SIZE,
  inputSeedSize: 1024,
  eofBehavior: "zero",
  flags: { debug: false, repl: false, specialOps: true, separateInput: false },
};

export type Machine = {
  readonly params: SessionParams;
  readonly program: ProgramBuffer;
  loops: LoopTable;
  readonly tape: Uint8Array;
  /** tape pointer */
  tp: number;
  /** highest tape pointer reached */
  tpMax: number;
  /** instruction pointer */
  ip: number;
  cursor: Cursor;
  /** false once the input source has ended; never reset */
  receiving: boolean;
  ports: PortSet;
};

export type StepOutcome =
  | { tag: "Stepped" }
  | { tag: "Halted" }
  | { tag: "AwaitingInput" }
  | { tag: "Reset" };

export function createMachine(params: SessionParams, ports: PortSet): Machine {
  if (!Number.isInteger(params.tapeSize) || params.tapeSize <= 0) {
    throw new Error(`Tape size must be a positive integer, got ${params.tapeSize}`);
  }
  return {
    params,
    program: new ProgramBuffer(params.inputSeedSize),
    loops: LoopTable.empty(),
    tape: new Uint8Array(params.tapeSize),
    tp: 0,
    tpMax: 0,
    ip: 0,
    cursor: startCursor(),
    receiving: true,
    ports,
  };
}

/**
 * Clear program, tape, loop table and pointers in place.
 * The tape keeps its allocation; the end-of-input state is kept.
 */
export function resetMachine(m: Machine): void {
  m.program.clear();
  m.loops = LoopTable.empty();
  m.tape.fill(0);
  m.tp = 0;
  m.tpMax = 0;
  m.ip = 0;
  m.cursor = startCursor();
}

export function isHalted(m: Machine): boolean {
  return m.ip >= m.program.length;
}
