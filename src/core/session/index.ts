export { Session } from "./session";
export { ProgramBuffer, DEFAULT_SEED_SIZE } from "./programBuffer";
export { splitSeparatedInput, SEPARATOR, type SeparatedProgram } from "./separate";
export { loadProgramFile } from "./loadFile";
export { runOnce, runFile, type RunOnceIO, type RunSummary } from "./runOnce";
export { runRepl, REPL_PROMPT, type ReplIO, type ReplSummary } from "./repl";
