// src/core/engine/run.ts
// Run a machine until it halts or needs input

import type { Machine } from "./machine";
import { stepOnce } from "./machineStep";

export type RunStatus = "halted" | "awaiting-input";

export type RunOptions = {
  /** Stop after this many steps; reports "halted" only if the program really ended. */
  maxSteps?: number;
};

export type RunResult = {
  status: RunStatus | "step-limit";
  steps: number;
};

/**
 * Step from the current instruction pointer to the end of the program buffer.
 * Output is flushed before returning.
 */
export function runMachine(m: Machine, options: RunOptions = {}): RunResult {
  const maxSteps = options.maxSteps ?? Infinity;
  let steps = 0;

  try {
    while (steps < maxSteps) {
      const out = stepOnce(m);
      switch (out.tag) {
        case "Stepped":
          steps++;
          continue;
        case "Reset":
          return { status: "halted", steps: steps + 1 };
        case "Halted":
          return { status: "halted", steps };
        case "AwaitingInput":
          return { status: "awaiting-input", steps };
      }
    }
    return { status: m.ip >= m.program.length ? "halted" : "step-limit", steps };
  } finally {
    m.ports.output.flush();
  }
}
