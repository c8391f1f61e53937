#!/usr/bin/env npx tsx
// bin/bfkit.ts
// bfkit CLI - run, compile, REPL and debug server
//
// Run:  npx tsx bin/bfkit.ts [options] [file]

import * as readline from "readline";
import {
  parseCliArgs,
  getHelpText,
  getUsage,
  getVersion,
  buildConfig,
  formatFailure,
  type CliConfig,
} from "./bfkit-cli-lib";
import {
  loadConfig,
  sessionParamsFromConfig,
  validateConfig,
  type BfkitConfig,
} from "../src/core/config/config";
import { runFile } from "../src/core/session/runOnce";
import { runRepl } from "../src/core/session/repl";
import { loadProgramFile } from "../src/core/session/loadFile";
import { compileProgram } from "../src/core/compiler/toolchain";
import { invalidConfig } from "../src/outcome/constructors";
import { isFail, type Outcome } from "../src/outcome/outcome";
import { StreamOutput } from "../src/ports/sink";
import { ConsoleDiagnostics } from "../src/ports/diagnostics";
import { startDebugServer } from "../src/server";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<number> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return 0;
  }

  if (cliArgs.version) {
    console.log(getVersion());
    return 0;
  }

  const cli = buildConfig(cliArgs);
  if (cli.mode === "usage") {
    for (const err of cli.errors) console.error(`Error: ${err}`);
    console.error(getUsage());
    return 1;
  }

  const config = loadConfig({ configFile: cli.configFile, overrides: cli.overrides });
  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    console.warn(`Warning: ${warning}`);
  }
  if (!validation.valid) {
    return report(invalidConfig(validation.errors));
  }

  switch (cli.mode) {
    case "run":
      return runMode(cli, config);
    case "repl":
      return replMode(config);
    case "compile":
      return compileMode(cli, config);
    case "serve":
      return serveMode(config);
  }
}

function report<A>(outcome: Outcome<A>): number {
  if (!isFail(outcome)) return 0;
  for (const line of formatFailure(outcome.failure)) {
    console.error(line);
  }
  return 1;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODES
// ═══════════════════════════════════════════════════════════════════════════════

async function runMode(cli: CliConfig, config: BfkitConfig): Promise<number> {
  if (!cli.file) return 1;
  const outcome = await runFile(cli.file, sessionParamsFromConfig(config, { repl: false }), {
    input: process.stdin,
    output: new StreamOutput(process.stdout),
    diagnostics: new ConsoleDiagnostics(),
  });
  return report(outcome);
}

async function replMode(config: BfkitConfig): Promise<number> {
  const rl = readline.createInterface({ input: process.stdin, terminal: false });

  try {
    await runRepl(sessionParamsFromConfig(config, { repl: true }), {
      lines: rl,
      output: new StreamOutput(process.stdout),
      diagnostics: new ConsoleDiagnostics(),
      prompt: (text) => {
        process.stdout.write(text);
      },
    });
  } finally {
    rl.close();
  }
  return 0;
}

async function compileMode(cli: CliConfig, config: BfkitConfig): Promise<number> {
  if (!cli.file) return 1;
  const source = loadProgramFile(cli.file);
  if (isFail(source)) return report(source);

  const outcome = await compileProgram(source.value, {
    target: cli.target,
    outputPath: cli.outputPath,
    tapeSize: config.interpreter.tapeSize,
    toolchain: config.compiler,
  });
  return report(outcome);
}

async function serveMode(config: BfkitConfig): Promise<number> {
  const server = await startDebugServer(config.server.port);

  await new Promise<void>((resolve) => {
    process.once("SIGINT", () => {
      console.log("\nShutting down...");
      resolve();
    });
  });

  await server.stop();
  return 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
