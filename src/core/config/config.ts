// src/core/config/config.ts
// Configuration system for bfkit

import * as fs from "fs";
import * as path from "path";
import { DEFAULT_TAPE_SIZE, EOF_BEHAVIORS, type EofBehavior, type SessionParams } from "../engine/machine";
import { DEFAULT_SEED_SIZE } from "../session/programBuffer";
import { DEFAULT_TOOLCHAIN } from "../compiler/toolchain";

// =========================================================================
// Configuration Types
// =========================================================================

export type InterpreterConfig = {
  /** Number of cells on the tape */
  tapeSize: number;
  /** Initial capacity of the REPL program buffer */
  inputSeedSize: number;
  /** What `,` stores once input has ended */
  eofBehavior: EofBehavior;
  /** `#` dumps state */
  debug: boolean;
  /** `#` and `@` are recognized */
  specialOps: boolean;
  /** `!` separates program from input in loaded files */
  separateInput: boolean;
};

export type CompilerConfig = {
  /** C compiler executable */
  command: string;
  /** Flags passed before `-o` */
  flags: string;
};

export type ServerConfig = {
  port: number;
};

export type BfkitConfig = {
  interpreter: InterpreterConfig;
  compiler: CompilerConfig;
  server: ServerConfig;
};

export type PartialBfkitConfig = {
  interpreter?: Partial<InterpreterConfig>;
  compiler?: Partial<CompilerConfig>;
  server?: Partial<ServerConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_INTERPRETER_CONFIG: InterpreterConfig = {
  tapeSize: DEFAULT_TAPE_SIZE,
  inputSeedSize: DEFAULT_SEED_SIZE,
  eofBehavior: "zero",
  debug: false,
  specialOps: true,
  separateInput: false,
};

export const DEFAULT_COMPILER_CONFIG: CompilerConfig = { ...DEFAULT_TOOLCHAIN };

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 3456,
};

export const DEFAULT_CONFIG: BfkitConfig = {
  interpreter: DEFAULT_INTERPRETER_CONFIG,
  compiler: DEFAULT_COMPILER_CONFIG,
  server: DEFAULT_SERVER_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["bfkit.config.json", ".bfkitrc.json"];

// =========================================================================
// Configuration Loading
// =========================================================================

export function isEofBehavior(value: unknown): value is EofBehavior {
  return typeof value === "string" && EOF_BEHAVIORS.some(b => b === value);
}

function parseIntEnv(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isInteger(n) ? n : undefined;
}

function parseBoolEnv(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return undefined;
}

/**
 * Drop keys whose value is undefined so spreads don't erase defaults.
 */
function defined<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in obj) {
    if (obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

/**
 * Load configuration from environment variables.
 * Only variables that are set (and parse) appear in the result.
 */
export function configFromEnv(prefix = "BFKIT"): PartialBfkitConfig {
  const env = process.env;
  const eof = env[`${prefix}_EOF`];

  return {
    interpreter: defined({
      tapeSize: parseIntEnv(env[`${prefix}_TAPE_SIZE`]),
      inputSeedSize: parseIntEnv(env[`${prefix}_INPUT_SEED_SIZE`]),
      eofBehavior: isEofBehavior(eof) ? eof : undefined,
      debug: parseBoolEnv(env[`${prefix}_DEBUG`]),
      specialOps: parseBoolEnv(env[`${prefix}_SPECIAL_OPS`]),
      separateInput: parseBoolEnv(env[`${prefix}_SEPARATE_INPUT`]),
    }),
    compiler: defined({
      command: env[`${prefix}_CC`] || undefined,
      flags: env[`${prefix}_CFLAGS`],
    }),
    server: defined({
      port: parseIntEnv(env[`${prefix}_DEBUG_PORT`]),
    }),
  };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): PartialBfkitConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }
  return configFromObject(data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function num(...candidates: unknown[]): number | undefined {
  for (const c of candidates) if (typeof c === "number") return c;
  return undefined;
}

function bool(...candidates: unknown[]): boolean | undefined {
  for (const c of candidates) if (typeof c === "boolean") return c;
  return undefined;
}

function str(...candidates: unknown[]): string | undefined {
  for (const c of candidates) if (typeof c === "string") return c;
  return undefined;
}

/**
 * Create configuration from a plain object (e.g., parsed JSON).
 * Accepts camelCase and snake_case keys; values of the wrong type are ignored.
 */
export function configFromObject(data: Record<string, unknown>): PartialBfkitConfig {
  const interp = isRecord(data.interpreter) ? data.interpreter : {};
  const compiler = isRecord(data.compiler) ? data.compiler : {};
  const server = isRecord(data.server) ? data.server : {};

  const eof = str(interp.eofBehavior, interp.eof_behavior);

  return {
    interpreter: defined({
      tapeSize: num(interp.tapeSize, interp.tape_size),
      inputSeedSize: num(interp.inputSeedSize, interp.input_seed_size),
      eofBehavior: isEofBehavior(eof) ? eof : undefined,
      debug: bool(interp.debug),
      specialOps: bool(interp.specialOps, interp.special_ops),
      separateInput: bool(interp.separateInput, interp.separate_input),
    }),
    compiler: defined({
      command: str(compiler.command),
      flags: str(compiler.flags),
    }),
    server: defined({
      port: num(server.port),
    }),
  };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialBfkitConfig[]): BfkitConfig {
  const result: BfkitConfig = {
    interpreter: { ...DEFAULT_CONFIG.interpreter },
    compiler: { ...DEFAULT_CONFIG.compiler },
    server: { ...DEFAULT_CONFIG.server },
  };

  for (const cfg of configs) {
    if (cfg.interpreter) {
      result.interpreter = { ...result.interpreter, ...defined(cfg.interpreter) };
    }
    if (cfg.compiler) {
      result.compiler = { ...result.compiler, ...defined(cfg.compiler) };
    }
    if (cfg.server) {
      result.server = { ...result.server, ...defined(cfg.server) };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: CLI args > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialBfkitConfig;
  cwd?: string;
}): BfkitConfig {
  const layers: PartialBfkitConfig[] = [configFromEnv()];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        layers.push(configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Session Parameters
// =========================================================================

export function sessionParamsFromConfig(config: BfkitConfig, mode: { repl: boolean }): SessionParams {
  const { interpreter } = config;
  return {
    tapeSize: interpreter.tapeSize,
    inputSeedSize: interpreter.inputSeedSize,
    eofBehavior: interpreter.eofBehavior,
    flags: {
      debug: interpreter.debug,
      repl: mode.repl,
      specialOps: interpreter.specialOps,
      separateInput: interpreter.separateInput,
    },
  };
}

// =========================================================================
// Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: BfkitConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.interpreter.tapeSize) || config.interpreter.tapeSize < 1) {
    errors.push("tapeSize must be a positive integer");
  }
  if (!Number.isInteger(config.interpreter.inputSeedSize) || config.interpreter.inputSeedSize < 1) {
    errors.push("inputSeedSize must be a positive integer");
  }
  if (!isEofBehavior(config.interpreter.eofBehavior)) {
    errors.push(`eofBehavior must be one of: ${EOF_BEHAVIORS.join(", ")}`);
  }
  if (config.compiler.command.trim() === "") {
    errors.push("compiler command must not be empty");
  }
  if (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535) {
    errors.push("server port must be an integer between 0 and 65535");
  }

  if (config.server.port > 0 && config.server.port < 1024) {
    warnings.push(`server port ${config.server.port} usually needs elevated privileges`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
