import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "unbalanced-brackets"
  | "io-error"
  | "invalid-config"
  | "toolchain-error";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  recoverable: boolean;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    recoverable: opts?.recoverable ?? false,
    context: opts?.context,
  };
}

/** Diagnostics in report order, each one once. */
export function allDiagnostics(f: Failure): Diagnostic[] {
  return Array.from(new Set(f.diagnostics));
}
