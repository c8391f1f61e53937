export { C_TEMPLATES, C_TAIL, cHead } from "./templates";
export { emitC, type EmitOptions } from "./emitC";
export {
  buildExecutable,
  compileProgram,
  DEFAULT_TOOLCHAIN,
  DEFAULT_BINARY_OUTPUT,
  DEFAULT_C_OUTPUT,
  type CommandResult,
  type CommandRunner,
  type CompileOptions,
  type ToolchainOptions,
} from "./toolchain";
