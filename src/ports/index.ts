export type { PortSet } from "./composite";
export { ByteInput, QueuedInput, END_OF_INPUT, PENDING_INPUT, type InputSource, type ReadResult } from "./source";
export { StreamOutput, MemoryOutput, type OutputSink, type ByteWritable } from "./sink";
export { ConsoleDiagnostics, MemoryDiagnostics, type DiagnosticSink } from "./diagnostics";
