import { formatPosition, type SourcePosition } from "../core/source/position";

export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  position?: Pick<SourcePosition, "line" | "column"> & { offset?: number };
  data?: Record<string, unknown>;
}

const SEVERITY_LABELS: Record<DiagnosticSeverity, string> = {
  error: "Error",
  warning: "Warning",
};

/**
 * Render a diagnostic as a single line, e.g.
 * `Warning (2,7): Tape pointer overflow. Tape pointer set to zero.`
 */
export function formatDiagnostic(diag: Diagnostic): string {
  const label = SEVERITY_LABELS[diag.severity];
  if (diag.position) {
    return `${label} (${formatPosition(diag.position)}): ${diag.message}`;
  }
  return `${label}: ${diag.message}`;
}
