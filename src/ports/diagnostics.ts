import { formatDiagnostic, type Diagnostic } from "../outcome/diagnostic";

/**
 * Diagnostic port interface.
 * Warnings, errors and `#` snapshots end up here, never on the output sink.
 */
export interface DiagnosticSink {
  report(diag: Diagnostic): void;
  write(text: string): void;
}

/**
 * Writes to stderr through the console.
 */
export class ConsoleDiagnostics implements DiagnosticSink {
  report(diag: Diagnostic): void {
    console.error(formatDiagnostic(diag));
  }

  write(text: string): void {
    process.stderr.write(text);
  }
}

/**
 * Keeps diagnostics in memory.
 */
export class MemoryDiagnostics implements DiagnosticSink {
  readonly reported: Diagnostic[] = [];
  private chunks: string[] = [];

  report(diag: Diagnostic): void {
    this.reported.push(diag);
  }

  write(text: string): void {
    this.chunks.push(text);
  }

  get text(): string {
    return this.chunks.join("");
  }

  /** Every report rendered the way the console sink would print it. */
  lines(): string[] {
    return this.reported.map(formatDiagnostic);
  }
}
