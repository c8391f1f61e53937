import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";
import type { SourcePosition } from "../core/source/position";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export const ok = done;

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export type BracketProblem = "unmatched-close" | "unmatched-open";

export function unbalancedBrackets(problem: BracketProblem, position: SourcePosition, meta: OutcomeMeta = {}): Fail {
  const diag = makeDiagnostic(problem === "unmatched-close" ? "E0001" : "E0002", undefined, position);
  return fail(
    failure("unbalanced-brackets", diag.message, {
      diagnostics: [diag],
      context: { problem, offset: position.offset },
      recoverable: false,
    }),
    meta
  );
}

export function ioError(path: string, cause?: string, meta: OutcomeMeta = {}): Fail {
  const diag = makeDiagnostic("E0100", { path });
  return fail(
    failure("io-error", diag.message, {
      diagnostics: [diag],
      context: cause ? { path, cause } : { path },
      recoverable: false,
    }),
    meta
  );
}

export function writeError(path: string, cause?: string, meta: OutcomeMeta = {}): Fail {
  const diag = makeDiagnostic("E0102", { path });
  return fail(
    failure("io-error", diag.message, {
      diagnostics: [diag],
      context: cause ? { path, cause } : { path },
      recoverable: false,
    }),
    meta
  );
}

export function toolchainError(reason: string, meta: OutcomeMeta = {}): Fail {
  const diag = makeDiagnostic("E0101", { reason });
  return fail(
    failure("toolchain-error", diag.message, {
      diagnostics: [diag],
      recoverable: false,
    }),
    meta
  );
}

export function invalidConfig(reasons: string[], meta: OutcomeMeta = {}): Fail {
  const diagnostics = reasons.map(reason => makeDiagnostic("E0200", { reason }));
  return fail(
    failure("invalid-config", `Invalid configuration: ${reasons.join("; ")}`, {
      diagnostics,
      recoverable: true,
    }),
    meta
  );
}
