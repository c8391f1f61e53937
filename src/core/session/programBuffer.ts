// src/core/session/programBuffer.ts
// Growable byte buffer holding the program text

export const DEFAULT_SEED_SIZE = 1024;

/**
 * Append-only program storage. Capacity starts at the seed size and doubles
 * whenever an append would not fit.
 */
export class ProgramBuffer {
  private data: Uint8Array;
  private len = 0;

  constructor(readonly seedSize = DEFAULT_SEED_SIZE) {
    if (!Number.isInteger(seedSize) || seedSize <= 0) {
      throw new Error(`Program buffer seed size must be a positive integer, got ${seedSize}`);
    }
    this.data = new Uint8Array(seedSize);
  }

  static from(bytes: Uint8Array | string, seedSize = DEFAULT_SEED_SIZE): ProgramBuffer {
    const buf = new ProgramBuffer(seedSize);
    buf.append(bytes);
    return buf;
  }

  get length(): number {
    return this.len;
  }

  get capacity(): number {
    return this.data.length;
  }

  at(offset: number): number | undefined {
    return offset >= 0 && offset < this.len ? this.data[offset] : undefined;
  }

  append(chunk: Uint8Array | string): void {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    const needed = this.len + bytes.length;
    if (needed > this.data.length) {
      let next = this.data.length;
      while (next < needed) next *= 2;
      const grown = new Uint8Array(next);
      grown.set(this.data.subarray(0, this.len));
      this.data = grown;
    }
    this.data.set(bytes, this.len);
    this.len = needed;
  }

  /** Drop everything past `length`. */
  truncate(length: number): void {
    if (length < 0 || length > this.len) {
      throw new RangeError(`Cannot truncate program of length ${this.len} to ${length}`);
    }
    this.data.fill(0, length, this.len);
    this.len = length;
  }

  clear(): void {
    this.truncate(0);
  }

  /** Live view of the stored bytes; invalidated by the next append. */
  view(): Uint8Array {
    return this.data.subarray(0, this.len);
  }

  toString(): string {
    return Buffer.from(this.view()).toString("latin1");
  }
}
