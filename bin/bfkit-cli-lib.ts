// bin/bfkit-cli-lib.ts
// Shared CLI utilities for the bfkit command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { isEofBehavior, type PartialBfkitConfig } from "../src/core/config/config";
import { EOF_BEHAVIORS } from "../src/core/engine/machine";
import type { Failure } from "../src/outcome/failure";
import { allDiagnostics } from "../src/outcome/failure";
import { formatDiagnostic } from "../src/outcome/diagnostic";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  compile?: boolean;
  emitC?: boolean;
  output?: string;
  debug?: boolean;
  eof?: string;
  repl?: boolean;
  noSpecial?: boolean;
  separateInput?: boolean;
  tapeSize?: string;
  config?: string;
  serve?: boolean;
  port?: string;
  file?: string;
  /** Flags that were not recognized, or lacked their value */
  unknown?: string[];
};

export type CliMode = "run" | "repl" | "compile" | "serve" | "usage";

export type CliConfig = {
  mode: CliMode;
  file?: string;
  /** Only meaningful in compile mode */
  target: "binary" | "c";
  outputPath?: string;
  port?: number;
  configFile?: string;
  /** Settings given on the command line; they win over files and env */
  overrides: PartialBfkitConfig;
  errors: string[];
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

const SHORT_FLAGS: Record<string, string> = {
  c: "--compile",
  C: "--emit-c",
  o: "--output",
  d: "--debug",
  e: "--eof",
  r: "--repl",
  s: "--no-special",
  i: "--separate-input",
  t: "--tape-size",
  v: "--version",
  h: "--help",
};

/** `-cd` becomes `-c -d`. */
function expandClusters(args: string[]): string[] {
  const out: string[] = [];
  for (const arg of args) {
    if (/^-[a-zA-Z]{2,}$/.test(arg)) {
      for (const ch of arg.slice(1)) out.push(`-${ch}`);
    } else {
      out.push(arg);
    }
  }
  return out;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const result: CliArgs = {};
  const args = expandClusters(argv);

  const unknown = (flag: string) => {
    result.unknown = [...(result.unknown ?? []), flag];
  };

  const takeValue = (i: number, flag: string): string | undefined => {
    const value = args[i + 1];
    if (value === undefined) {
      unknown(flag);
      return undefined;
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const raw = args[i];
    const arg = raw.length === 2 && raw.startsWith("-") ? SHORT_FLAGS[raw[1]] ?? raw : raw;

    switch (arg) {
      case "--help":
        result.help = true;
        break;
      case "--version":
        result.version = true;
        break;
      case "--compile":
        result.compile = true;
        break;
      case "--emit-c":
        result.emitC = true;
        break;
      case "--debug":
        result.debug = true;
        break;
      case "--repl":
        result.repl = true;
        break;
      case "--no-special":
        result.noSpecial = true;
        break;
      case "--separate-input":
        result.separateInput = true;
        break;
      case "--output":
        result.output = takeValue(i, raw);
        i++;
        break;
      case "--eof":
        result.eof = takeValue(i, raw);
        i++;
        break;
      case "--tape-size":
        result.tapeSize = takeValue(i, raw);
        i++;
        break;
      case "--config":
        result.config = takeValue(i, raw);
        i++;
        break;
      case "--serve":
        result.serve = true;
        // Optional port
        if (/^\d+$/.test(args[i + 1] ?? "")) {
          result.port = args[++i];
        }
        break;
      default:
        if (arg.startsWith("-") && arg !== "-") {
          unknown(raw);
        } else if (!result.file) {
          // First non-flag argument is the file
          result.file = arg;
        } else {
          unknown(raw);
        }
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getUsage(argv0 = "bfkit"): string {
  return `usage: ${argv0} [-cCdirsv] [-e eof] [-o output_file] [-t tape_size] [--config file] [--serve [port]] [file]`;
}

export function getHelpText(): string {
  return `
bfkit - Brainfuck interpreter, compiler and REPL

USAGE:
  bfkit <file>                       Run a program
  bfkit -r                           Start the interactive REPL
  bfkit -c [-o a.out] <file>         Compile to a native executable
  bfkit -C [-o a.out.c] <file>       Translate to C source only
  bfkit --serve [port]               Start the debug server

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -c, --compile                      Compile with the configured C compiler
  -C, --emit-c                       Write C source instead of a binary
  -o, --output <file>                Output path for -c / -C
  -d, --debug                        Enable '#' (print position, pointers and memory)
  -e, --eof <mode>                   Value stored by ',' at end of input: ${EOF_BEHAVIORS.join(" | ")}
  -r, --repl                         Interactive mode; enables '@' (reset)
  -s, --no-special                   Disable '#' and '@'
  -i, --separate-input               Text after the first '!' in the file is the input
  -t, --tape-size <n>                Number of tape cells (default: 30000)
  --config <file>                    Read settings from a JSON file
  --serve [port]                     HTTP + WebSocket debug server (default port: 3456)

ENVIRONMENT:
  BFKIT_TAPE_SIZE, BFKIT_INPUT_SEED_SIZE, BFKIT_EOF, BFKIT_DEBUG,
  BFKIT_SPECIAL_OPS, BFKIT_SEPARATE_INPUT, BFKIT_CC, BFKIT_CFLAGS,
  BFKIT_DEBUG_PORT

EXAMPLES:
  bfkit hello.bf                     # Run a file
  bfkit -d -t 100 hello.bf           # Run with a 100-cell tape and '#' enabled
  echo "+++++[>+++++++++++++<-]>." | bfkit -r
  bfkit -c -o hello hello.bf         # Build ./hello
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const here = path.dirname(fileURLToPath(import.meta.url));
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(here, "..", "package.json"), "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `bfkit v${pkg.version}`;
    }
  } catch (e) {
    console.error(`Could not read package version: ${e instanceof Error ? e.message : String(e)}`);
  }
  return "bfkit v0.1.0";
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODE DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

export function detectMode(args: Partial<CliArgs>): CliMode {
  if (args.serve) {
    return "serve";
  }
  if (args.compile || args.emitC) {
    return args.file ? "compile" : "usage";
  }
  if (args.repl) {
    return args.file ? "usage" : "repl";
  }
  if (args.file) {
    return "run";
  }
  return "usage";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

function parsePositiveInt(raw: string): number | undefined {
  if (!/^\d+$/.test(raw)) return undefined;
  const n = Number(raw);
  return n > 0 ? n : undefined;
}

export function buildConfig(args: Partial<CliArgs>): CliConfig {
  const errors: string[] = [];
  const overrides: PartialBfkitConfig = { interpreter: {} };
  const interpreter = overrides.interpreter ?? {};

  for (const flag of args.unknown ?? []) {
    errors.push(`unknown or incomplete option: ${flag}`);
  }

  if (args.eof !== undefined) {
    if (isEofBehavior(args.eof)) {
      interpreter.eofBehavior = args.eof;
    } else {
      errors.push(`invalid end-of-input behavior: ${args.eof}`);
    }
  }

  if (args.tapeSize !== undefined) {
    const n = parsePositiveInt(args.tapeSize);
    if (n === undefined) {
      errors.push(`invalid tape size: ${args.tapeSize}`);
    } else {
      interpreter.tapeSize = n;
    }
  }

  let port: number | undefined;
  if (args.port !== undefined) {
    const n = Number(args.port);
    if (Number.isInteger(n) && n >= 0 && n <= 65535) {
      port = n;
      overrides.server = { port };
    } else {
      errors.push(`invalid port: ${args.port}`);
    }
  }

  if (args.debug) interpreter.debug = true;
  if (args.noSpecial) interpreter.specialOps = false;
  if (args.separateInput) interpreter.separateInput = true;

  const mode = errors.length > 0 ? "usage" : detectMode(args);

  return {
    mode,
    file: args.file,
    target: args.emitC ? "c" : "binary",
    outputPath: args.output,
    port,
    configFile: args.config,
    overrides,
    errors,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR REPORTING
// ═══════════════════════════════════════════════════════════════════════════════

/** One line per diagnostic; the failure message when there are none. */
export function formatFailure(failure: Failure): string[] {
  const diags = allDiagnostics(failure);
  if (diags.length === 0) return [`Error: ${failure.message}`];
  return diags.map(formatDiagnostic);
}
