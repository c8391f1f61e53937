// test/core/compiler/toolchain.spec.ts
// C compiler invocation through an injected runner

import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  buildExecutable,
  compileProgram,
  type CommandResult,
  type CommandRunner,
} from "../../../src/core/compiler/toolchain";
import { emitC } from "../../../src/core/compiler/emitC";
import { isDone, isFail } from "../../../src/outcome/outcome";
import { unwrap } from "../../../src/outcome/matchers";

function recordingRunner(result: Partial<CommandResult> = {}) {
  const calls: Array<{ argv: string[]; source: string }> = [];
  const runner: CommandRunner = async (argv) => {
    const cPath = argv[argv.length - 1];
    calls.push({ argv, source: fs.readFileSync(cPath, "utf8") });
    return { ok: true, stdout: "", stderr: "", code: 0, ...result };
  };
  return { runner, calls };
}

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "bfkit-test-"));
}

describe("buildExecutable", () => {
  it("passes flags, output path and a temporary C file to the compiler", async () => {
    const { runner, calls } = recordingRunner();
    const res = await buildExecutable("int main(void){return 0;}", "out/prog", { command: "cc", flags: " -O2  -g " }, runner);

    expect(unwrap(res)).toBe("out/prog");
    expect(calls).toHaveLength(1);
    const { argv, source } = calls[0];
    expect(argv.slice(0, 5)).toEqual(["cc", "-O2", "-g", "-o", "out/prog"]);
    expect(path.basename(argv[5])).toBe("program.c");
    expect(source).toBe("int main(void){return 0;}");
    expect(fs.existsSync(argv[5])).toBe(false);
  });

  it("uses the default toolchain flags", async () => {
    const { runner, calls } = recordingRunner();
    await buildExecutable("x", "a.out", undefined, runner);
    expect(calls[0].argv.slice(0, 6)).toEqual(["gcc", "-O3", "-s", "-ffast-math", "-o", "a.out"]);
  });

  it("reports compiler errors", async () => {
    const { runner } = recordingRunner({ ok: false, stderr: "syntax error\n", code: 1 });
    const res = await buildExecutable("x", "a.out", { command: "cc", flags: "" }, runner);

    if (!isFail(res)) throw new Error("expected failure");
    expect(res.failure.reason).toBe("toolchain-error");
    expect(res.failure.message).toBe("Failed to compile program: syntax error");
  });

  it("falls back to the exit code when the compiler prints nothing", async () => {
    const { runner } = recordingRunner({ ok: false, code: 2 });
    const res = await buildExecutable("x", "a.out", { command: "cc", flags: "" }, runner);

    if (!isFail(res)) throw new Error("expected failure");
    expect(res.failure.message).toBe("Failed to compile program: cc exited with code 2");
  });
});

describe("compileProgram", () => {
  it("writes C source for the 'c' target", async () => {
    const dir = tempDir();
    const out = path.join(dir, "prog.c");
    try {
      const res = await compileProgram("+.", { target: "c", outputPath: out, tapeSize: 10 });
      expect(unwrap(res)).toBe(out);
      expect(fs.readFileSync(out, "utf8")).toBe(unwrap(emitC("+.", { tapeSize: 10 })));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("fails when the C file cannot be written", async () => {
    const out = path.join(tempDir(), "missing-dir", "prog.c");
    const res = await compileProgram("+.", { target: "c", outputPath: out });

    if (!isFail(res)) throw new Error("expected failure");
    expect(res.failure.message).toBe(`Cannot write file ${out}.`);
  });

  it("hands the generated C to the toolchain for the 'binary' target", async () => {
    const { runner, calls } = recordingRunner();
    const res = await compileProgram(Buffer.from("-."), {
      target: "binary",
      outputPath: "hello",
      toolchain: { command: "cc", flags: "-O1" },
      runner,
    });

    expect(isDone(res)).toBe(true);
    expect(calls[0].source).toBe(unwrap(emitC("-.")));
    expect(calls[0].argv.slice(0, 4)).toEqual(["cc", "-O1", "-o", "hello"]);
  });

  it("never runs the compiler for unbalanced programs", async () => {
    const { runner, calls } = recordingRunner();
    const res = await compileProgram("]", { target: "binary", runner });

    expect(isFail(res)).toBe(true);
    expect(calls).toHaveLength(0);
  });
});
