// src/core/session/separate.ts
// Separated-input mode: `program!input`

export const SEPARATOR = 0x21; // '!'

export type SeparatedProgram = {
  program: Uint8Array;
  /** Bytes after the first separator, or undefined when there is none. */
  input?: Uint8Array;
};

export function splitSeparatedInput(bytes: Uint8Array): SeparatedProgram {
  const at = bytes.indexOf(SEPARATOR);
  if (at < 0) return { program: bytes };
  return {
    program: bytes.subarray(0, at),
    input: bytes.subarray(at + 1),
  };
}
