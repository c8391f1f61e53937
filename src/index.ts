// src/index.ts
// bfkit - Public API
//
// Interpreter, compiler backend and configuration for embedding and tooling.

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome/outcome";
export { isDone, isFail } from "./outcome/outcome";
export type { Failure, FailureReason } from "./outcome/failure";
export { failure, allDiagnostics } from "./outcome/failure";
export type { Diagnostic, DiagnosticSeverity } from "./outcome/diagnostic";
export { formatDiagnostic } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export {
  done,
  ok,
  fail,
  unbalancedBrackets,
  ioError,
  writeError,
  toolchainError,
  invalidConfig,
  type BracketProblem,
} from "./outcome/constructors";
export { unwrap } from "./outcome/matchers";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./ports";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE
// ═══════════════════════════════════════════════════════════════════════════════

export type { SourcePosition, Cursor } from "./core/source/position";
export { formatPosition } from "./core/source/position";

export { LoopTable, type Loop } from "./core/loops/table";
export { resolveLoops } from "./core/loops/resolve";

export {
  createMachine,
  resetMachine,
  isHalted,
  DEFAULT_TAPE_SIZE,
  DEFAULT_SESSION_PARAMS,
  EOF_BEHAVIORS,
  type Machine,
  type EofBehavior,
  type SessionFlags,
  type SessionParams,
  type StepOutcome,
} from "./core/engine/machine";
export { stepOnce, Op } from "./core/engine/machineStep";
export { runMachine, type RunOptions, type RunResult, type RunStatus } from "./core/engine/run";
export { formatSnapshot, writeSnapshot, type SnapshotInput } from "./core/diagnostics/snapshot";

export * from "./core/session";
export * from "./core/compiler";
export * from "./core/config";
