// src/core/loops/table.ts
// Resolved bracket pairs with constant-time lookup by offset

import type { SourcePosition } from "../source/position";

export type Loop = {
  start: SourcePosition;
  end: SourcePosition;
};

/**
 * Matched `[`/`]` pairs of one program buffer.
 *
 * Entries are independent of each other (no nesting is recorded). An
 * offset-indexed array maps every bracket offset to its entry, so a jump
 * never scans the entry list.
 */
export class LoopTable {
  private readonly byOffset: Array<Loop | undefined>;

  constructor(readonly entries: readonly Loop[], programLength: number) {
    this.byOffset = new Array<Loop | undefined>(programLength);
    for (const loop of entries) {
      this.byOffset[loop.start.offset] = loop;
      this.byOffset[loop.end.offset] = loop;
    }
  }

  static empty(): LoopTable {
    return new LoopTable([], 0);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Position of the `]` matching the `[` at `offset`. */
  closeFor(offset: number): SourcePosition | undefined {
    const loop = this.byOffset[offset];
    return loop && loop.start.offset === offset ? loop.end : undefined;
  }

  /** Position of the `[` matching the `]` at `offset`. */
  openFor(offset: number): SourcePosition | undefined {
    const loop = this.byOffset[offset];
    return loop && loop.end.offset === offset ? loop.start : undefined;
  }
}
