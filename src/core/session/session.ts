// src/core/session/session.ts
// One interpreter session: owns the program buffer, loop table and tape

import type { Outcome } from "../../outcome/outcome";
import { isFail } from "../../outcome/outcome";
import type { PortSet } from "../../ports/composite";
import { ByteInput } from "../../ports/source";
import { createMachine, resetMachine, type Machine, type SessionParams } from "../engine/machine";
import { runMachine, type RunOptions, type RunResult } from "../engine/run";
import { resolveLoops } from "../loops/resolve";
import type { LoopTable } from "../loops/table";
import { startCursor } from "../source/position";
import { splitSeparatedInput } from "./separate";

export class Session {
  readonly machine: Machine;

  constructor(readonly params: SessionParams, ports: PortSet) {
    this.machine = createMachine(params, ports);
  }

  /**
   * Replace the program with a loaded file. In separated-input mode the text
   * after the first `!` becomes the input of every `,`.
   */
  load(bytes: Uint8Array): Outcome<LoopTable> {
    let program = bytes;
    if (this.params.flags.separateInput) {
      const split = splitSeparatedInput(bytes);
      program = split.program;
      if (split.input) {
        this.machine.ports.input = new ByteInput(split.input);
      }
    }

    this.machine.program.clear();
    this.machine.ip = 0;
    this.machine.cursor = startCursor();
    return this.append(program);
  }

  /**
   * Append text and rebuild the loop table over the whole buffer.
   * If the result does not balance, the appended text is dropped again.
   */
  append(text: Uint8Array | string): Outcome<LoopTable> {
    const { program } = this.machine;
    const previous = program.length;
    program.append(text);

    const resolved = resolveLoops(program.view());
    if (isFail(resolved)) {
      program.truncate(previous);
      return resolved;
    }

    this.machine.loops = resolved.value;
    return resolved;
  }

  /** Execute from the current instruction pointer. */
  run(options?: RunOptions): RunResult {
    return runMachine(this.machine, options);
  }

  reset(): void {
    resetMachine(this.machine);
  }
}
