// src/core/compiler/emitC.ts
// Brainfuck -> C source, one template per operator

import type { Outcome } from "../../outcome/outcome";
import { isFail } from "../../outcome/outcome";
import { done } from "../../outcome/constructors";
import { DEFAULT_TAPE_SIZE } from "../engine/machine";
import { resolveLoops } from "../loops/resolve";
import { C_TAIL, C_TEMPLATES, cHead } from "./templates";

export type EmitOptions = {
  tapeSize?: number;
};

export function emitC(source: Uint8Array | string, options: EmitOptions = {}): Outcome<string> {
  const bytes = typeof source === "string" ? Buffer.from(source, "latin1") : source;

  const loops = resolveLoops(bytes);
  if (isFail(loops)) return loops;

  const parts = [cHead(options.tapeSize ?? DEFAULT_TAPE_SIZE)];
  for (const byte of bytes) {
    const stmt = C_TEMPLATES[String.fromCharCode(byte)];
    if (stmt !== undefined) parts.push(stmt);
  }
  parts.push(C_TAIL);

  return done(parts.join(""));
}
