// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  sessionParamsFromConfig,
  validateConfig,
  DEFAULT_CONFIG,
} from "../../../src/core/config/config";

const originalEnv = process.env;

function cleanEnv(): NodeJS.ProcessEnv {
  const env = { ...originalEnv };
  for (const key of Object.keys(env)) {
    if (key.startsWith("BFKIT_")) delete env[key];
  }
  return env;
}

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "bfkit-config-"));
}

describe("configFromEnv", () => {
  beforeEach(() => {
    process.env = cleanEnv();
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("returns nothing when no env vars are set", () => {
    expect(configFromEnv()).toEqual({ interpreter: {}, compiler: {}, server: {} });
  });

  it("reads interpreter, compiler and server settings", () => {
    process.env.BFKIT_TAPE_SIZE = "500";
    process.env.BFKIT_EOF = "decrement";
    process.env.BFKIT_DEBUG = "true";
    process.env.BFKIT_SPECIAL_OPS = "0";
    process.env.BFKIT_CC = "clang";
    process.env.BFKIT_CFLAGS = "-O2";
    process.env.BFKIT_DEBUG_PORT = "4000";

    expect(configFromEnv()).toEqual({
      interpreter: { tapeSize: 500, eofBehavior: "decrement", debug: true, specialOps: false },
      compiler: { command: "clang", flags: "-O2" },
      server: { port: 4000 },
    });
  });

  it("ignores values that do not parse", () => {
    process.env.BFKIT_TAPE_SIZE = "lots";
    process.env.BFKIT_EOF = "sideways";
    process.env.BFKIT_DEBUG = "maybe";

    expect(configFromEnv().interpreter).toEqual({});
  });

  it("supports a custom prefix", () => {
    process.env.MYBF_TAPE_SIZE = "64";
    expect(configFromEnv("MYBF").interpreter).toEqual({ tapeSize: 64 });
  });
});

describe("configFromObject", () => {
  it("accepts camelCase and snake_case keys", () => {
    const config = configFromObject({
      interpreter: { tape_size: 100, eofBehavior: "unchanged", separate_input: true },
      compiler: { command: "tcc" },
    });

    expect(config.interpreter).toEqual({ tapeSize: 100, eofBehavior: "unchanged", separateInput: true });
    expect(config.compiler).toEqual({ command: "tcc" });
    expect(config.server).toEqual({});
  });

  it("drops values of the wrong type", () => {
    const config = configFromObject({ interpreter: { tapeSize: "big", debug: "yes" }, server: "nope" });
    expect(config).toEqual({ interpreter: {}, compiler: {}, server: {} });
  });
});

describe("configFromFile", () => {
  it("reads a JSON file", () => {
    const dir = tempDir();
    const file = path.join(dir, "bf.json");
    fs.writeFileSync(file, JSON.stringify({ interpreter: { tapeSize: 256 } }));
    try {
      expect(configFromFile(file).interpreter).toEqual({ tapeSize: 256 });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("throws for missing files and other formats", () => {
    const dir = tempDir();
    const yaml = path.join(dir, "bf.yaml");
    fs.writeFileSync(yaml, "interpreter: {}");
    try {
      expect(() => configFromFile(path.join(dir, "absent.json"))).toThrow("Config file not found:");
      expect(() => configFromFile(yaml)).toThrow("Unsupported config file format: .yaml");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("throws when the JSON is not an object", () => {
    const dir = tempDir();
    const file = path.join(dir, "list.json");
    fs.writeFileSync(file, "[1, 2]");
    try {
      expect(() => configFromFile(file)).toThrow("Config file must contain a JSON object");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("mergeConfigs", () => {
  it("starts from the defaults", () => {
    const config = mergeConfigs();
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.interpreter.tapeSize).toBe(30000);
    expect(config.compiler).toEqual({ command: "gcc", flags: "-O3 -s -ffast-math" });
    expect(config.server.port).toBe(3456);
  });

  it("lets later layers win and never erases with undefined", () => {
    const config = mergeConfigs(
      { interpreter: { tapeSize: 10, debug: true } },
      { interpreter: { tapeSize: 20, debug: undefined } }
    );
    expect(config.interpreter.tapeSize).toBe(20);
    expect(config.interpreter.debug).toBe(true);
  });

  it("does not mutate the defaults", () => {
    mergeConfigs({ interpreter: { tapeSize: 1 } });
    expect(DEFAULT_CONFIG.interpreter.tapeSize).toBe(30000);
  });
});

describe("loadConfig", () => {
  beforeEach(() => {
    process.env = cleanEnv();
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("layers env < file < overrides", () => {
    const dir = tempDir();
    const file = path.join(dir, "custom.json");
    fs.writeFileSync(file, JSON.stringify({ interpreter: { tapeSize: 600, eofBehavior: "unchanged" } }));
    process.env.BFKIT_TAPE_SIZE = "500";
    process.env.BFKIT_CC = "clang";

    try {
      const config = loadConfig({ configFile: file, overrides: { interpreter: { tapeSize: 700 } } });
      expect(config.interpreter.tapeSize).toBe(700);
      expect(config.interpreter.eofBehavior).toBe("unchanged");
      expect(config.compiler.command).toBe("clang");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("finds a default config file in the working directory", () => {
    const dir = tempDir();
    fs.writeFileSync(path.join(dir, ".bfkitrc.json"), JSON.stringify({ server: { port: 9999 } }));
    try {
      expect(loadConfig({ cwd: dir }).server.port).toBe(9999);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("falls back to defaults without files or env", () => {
    const dir = tempDir();
    try {
      expect(loadConfig({ cwd: dir })).toEqual(DEFAULT_CONFIG);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("rejects a non-positive tape size", () => {
    const config = mergeConfigs({ interpreter: { tapeSize: 0 } });
    const result = validateConfig(config);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["tapeSize must be a positive integer"]);
  });

  it("rejects an empty compiler command and a bad port", () => {
    const config = mergeConfigs({ compiler: { command: " " }, server: { port: 70000 } });
    expect(validateConfig(config).errors).toEqual([
      "compiler command must not be empty",
      "server port must be an integer between 0 and 65535",
    ]);
  });

  it("accepts small tapes and separated input without special operators", () => {
    const config = mergeConfigs({ interpreter: { tapeSize: 100, separateInput: true, specialOps: false } });
    expect(validateConfig(config)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("warns about privileged server ports", () => {
    const result = validateConfig(mergeConfigs({ server: { port: 80 } }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(["server port 80 usually needs elevated privileges"]);
  });
});

describe("sessionParamsFromConfig", () => {
  it("copies interpreter settings and the mode", () => {
    const config = mergeConfigs({ interpreter: { tapeSize: 64, debug: true, eofBehavior: "decrement" } });
    expect(sessionParamsFromConfig(config, { repl: true })).toEqual({
      tapeSize: 64,
      inputSeedSize: 1024,
      eofBehavior: "decrement",
      flags: { debug: true, repl: true, specialOps: true, separateInput: false },
    });
  });
});
