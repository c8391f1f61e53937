import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Unmatched closing bracket ']'." },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Unmatched opening bracket '['." },

  E0100: { code: "E0100", severity: "error", category: "IO", template: "Cannot open file {path} for reading." },
  E0101: { code: "E0101", severity: "error", category: "IO", template: "Failed to compile program: {reason}" },
  E0102: { code: "E0102", severity: "error", category: "IO", template: "Cannot write file {path}." },

  E0200: { code: "E0200", severity: "error", category: "Config", template: "Invalid configuration: {reason}" },

  W0001: { code: "W0001", severity: "warning", category: "Runtime", template: "Tape pointer overflow. Tape pointer set to zero." },
  W0002: { code: "W0002", severity: "warning", category: "Runtime", template: "Tape pointer underflow. Tape pointer set to zero." },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  position?: Diagnostic["position"]
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    position,
    data: params,
  };
}
