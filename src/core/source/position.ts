// src/core/source/position.ts
// Source positions inside a program buffer

/**
 * A location in the program buffer.
 * `line` is 1-based. `column` is 1 for the first byte of a line and 0 right
 * after a newline has been consumed.
 */
export type SourcePosition = {
  offset: number;
  line: number;
  column: number;
};

/** Line/column pair tracked while executing. */
export type Cursor = {
  line: number;
  column: number;
};

export const NEWLINE = 0x0a;

export function startCursor(): Cursor {
  return { line: 1, column: 0 };
}

export function formatPosition(pos: { line: number; column: number }): string {
  return `${pos.line},${pos.column}`;
}
