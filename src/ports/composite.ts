import type { InputSource } from "./source";
import type { OutputSink } from "./sink";
import type { DiagnosticSink } from "./diagnostics";

/**
 * Complete set of ports a machine executes against.
 */
export interface PortSet {
  input: InputSource;
  output: OutputSink;
  diagnostics: DiagnosticSink;
}

