// src/core/session/loadFile.ts

import * as fs from "fs";
import type { Outcome } from "../../outcome/outcome";
import { done, ioError } from "../../outcome/constructors";

/**
 * Read a whole program file into memory.
 */
export function loadProgramFile(filePath: string): Outcome<Uint8Array> {
  try {
    return done(fs.readFileSync(filePath));
  } catch (e) {
    return ioError(filePath, e instanceof Error ? e.message : String(e));
  }
}
