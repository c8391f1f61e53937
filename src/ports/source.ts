/**
 * Result of pulling one byte from an input source.
 * `Pending` means the source has nothing buffered yet but has not ended;
 * the caller is expected to suspend and retry after more input arrives.
 */
export type ReadResult =
  | { tag: "Byte"; value: number }
  | { tag: "End" }
  | { tag: "Pending" };

export const END_OF_INPUT: ReadResult = { tag: "End" };
export const PENDING_INPUT: ReadResult = { tag: "Pending" };

/**
 * Source port interface.
 * Supplies bytes to the `,` operator.
 */
export interface InputSource {
  read(): ReadResult;
}

/**
 * A fixed, pre-supplied input. Ends after the last byte.
 */
export class ByteInput implements InputSource {
  private pos = 0;

  constructor(private readonly bytes: Uint8Array) {}

  static fromText(text: string): ByteInput {
    return new ByteInput(Buffer.from(text, "utf8"));
  }

  read(): ReadResult {
    if (this.pos >= this.bytes.length) return END_OF_INPUT;
    return { tag: "Byte", value: this.bytes[this.pos++] };
  }
}

/**
 * Input fed incrementally by a driver (stdin chunks, REPL lines).
 * Reports `Pending` while empty until `end()` is called.
 */
export class QueuedInput implements InputSource {
  private chunks: Uint8Array[] = [];
  private pos = 0;
  private ended = false;

  push(chunk: Uint8Array | string): void {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    if (bytes.length > 0) this.chunks.push(bytes);
  }

  end(): void {
    this.ended = true;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  get buffered(): number {
    let n = -this.pos;
    for (const c of this.chunks) n += c.length;
    return Math.max(n, 0);
  }

  read(): ReadResult {
    while (this.chunks.length > 0) {
      const head = this.chunks[0];
      if (this.pos < head.length) {
        return { tag: "Byte", value: head[this.pos++] };
      }
      this.chunks.shift();
      this.pos = 0;
    }
    return this.ended ? END_OF_INPUT : PENDING_INPUT;
  }
}
