// src/core/loops/resolve.ts
// Stack-based bracket matcher

import type { Outcome } from "../../outcome/outcome";
import { done, unbalancedBrackets } from "../../outcome/constructors";
import { NEWLINE, type SourcePosition } from "../source/position";
import { LoopTable, type Loop } from "./table";

const OPEN = 0x5b;  // '['
const CLOSE = 0x5d; // ']'

/**
 * Match every bracket in `buffer[0, length)` in a single scan.
 *
 * An unmatched `]` fails immediately at its own position; leftover `[`s fail
 * at the innermost unclosed one. Brackets count wherever they appear.
 */
export function resolveLoops(buffer: Uint8Array, length = buffer.length): Outcome<LoopTable> {
  const pending: SourcePosition[] = [];
  const entries: Loop[] = [];
  let line = 1;
  let column = 0;

  for (let i = 0; i < length; i++) {
    column++;
    const c = buffer[i];

    if (c === OPEN) {
      pending.push({ offset: i, line, column });
    } else if (c === CLOSE) {
      const start = pending.pop();
      if (!start) {
        return unbalancedBrackets("unmatched-close", { offset: i, line, column });
      }
      entries.push({ start, end: { offset: i, line, column } });
    } else if (c === NEWLINE) {
      line++;
      column = 0;
    }
  }

  const unclosed = pending[pending.length - 1];
  if (unclosed) {
    return unbalancedBrackets("unmatched-open", unclosed);
  }

  return done(new LoopTable(entries, length));
}
