// src/core/compiler/toolchain.ts
// Hand generated C to an external compiler

import { spawn } from "child_process";
import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";

import type { Outcome } from "../../outcome/outcome";
import { isFail } from "../../outcome/outcome";
import { done, toolchainError, writeError } from "../../outcome/constructors";
import { emitC } from "./emitC";

export type CommandResult = { ok: boolean; stdout: string; stderr: string; code: number | null };

export type CommandRunner = (argv: string[]) => Promise<CommandResult>;

export type ToolchainOptions = {
  /** C compiler executable */
  command: string;
  /** Extra flags, whitespace separated */
  flags: string;
};

export const DEFAULT_TOOLCHAIN: ToolchainOptions = {
  command: "gcc",
  flags: "-O3 -s -ffast-math",
};

export const DEFAULT_BINARY_OUTPUT = "./a.out";
export const DEFAULT_C_OUTPUT = "./a.out.c";

export type CompileOptions = {
  /** "binary" runs the toolchain, "c" stops after writing C source */
  target: "binary" | "c";
  outputPath?: string;
  tapeSize?: number;
  toolchain?: ToolchainOptions;
  runner?: CommandRunner;
};

/**
 * Compile a C file with the configured toolchain.
 * The C source goes through a temporary file that is removed afterwards.
 */
export async function buildExecutable(
  cSource: string,
  outputPath: string,
  toolchain: ToolchainOptions = DEFAULT_TOOLCHAIN,
  runner: CommandRunner = runCommand
): Promise<Outcome<string>> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "bfkit-"));
  const cPath = path.join(dir, "program.c");

  try {
    await fs.writeFile(cPath, cSource, "utf8");
    const flags = toolchain.flags.split(/\s+/).filter(f => f.length > 0);
    const res = await runner([toolchain.command, ...flags, "-o", outputPath, cPath]);
    if (!res.ok) {
      const reason = res.stderr.trim() || `${toolchain.command} exited with code ${res.code}`;
      return toolchainError(reason);
    }
    return done(outputPath);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

/**
 * Translate a program to C and either write it out or build a binary.
 */
export async function compileProgram(
  source: Uint8Array | string,
  options: CompileOptions
): Promise<Outcome<string>> {
  const cSource = emitC(source, { tapeSize: options.tapeSize });
  if (isFail(cSource)) return cSource;

  if (options.target === "c") {
    const outputPath = options.outputPath ?? DEFAULT_C_OUTPUT;
    try {
      await fs.writeFile(outputPath, cSource.value, "utf8");
    } catch (e) {
      return writeError(outputPath, e instanceof Error ? e.message : String(e));
    }
    return done(outputPath);
  }

  return buildExecutable(
    cSource.value,
    options.outputPath ?? DEFAULT_BINARY_OUTPUT,
    options.toolchain,
    options.runner
  );
}

async function runCommand(argv: string[]): Promise<CommandResult> {
  const [cmd, ...args] = argv;
  if (!cmd) return { ok: false, stdout: "", stderr: "empty argv", code: 127 };

  return await new Promise((resolve) => {
    const child = spawn(cmd, args, { stdio: "pipe" });

    let stdout = "";
    let stderr = "";

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");

    child.stdout.on("data", (d: string) => { stdout += d; });
    child.stderr.on("data", (d: string) => { stderr += d; });

    child.on("error", (e) => {
      resolve({ ok: false, stdout, stderr: e.message, code: null });
    });

    child.on("close", (code) => {
      resolve({ ok: code === 0, stdout, stderr, code });
    });
  });
}
