/**
 * Sink port interface.
 * Receives the bytes emitted by the `.` operator.
 */
export interface OutputSink {
  write(byte: number): void;
  /** Push buffered bytes to the underlying stream. */
  flush(): void;
}

/** Minimal writable surface; satisfied by `process.stdout`. */
export interface ByteWritable {
  write(chunk: Uint8Array): unknown;
}

/**
 * Buffers emitted bytes and hands them to a stream on flush.
 */
export class StreamOutput implements OutputSink {
  private pending: number[] = [];

  constructor(private readonly stream: ByteWritable, private readonly highWaterMark = 4096) {}

  write(byte: number): void {
    this.pending.push(byte);
    if (this.pending.length >= this.highWaterMark) this.flush();
  }

  flush(): void {
    if (this.pending.length === 0) return;
    this.stream.write(Uint8Array.from(this.pending));
    this.pending = [];
  }
}

/**
 * Collects everything in memory. Used by the debug server and tests.
 */
export class MemoryOutput implements OutputSink {
  private collected: number[] = [];

  write(byte: number): void {
    this.collected.push(byte);
  }

  flush(): void {}

  bytes(): number[] {
    return [...this.collected];
  }

  text(): string {
    return Buffer.from(this.collected).toString("latin1");
  }

  clear(): void {
    this.collected = [];
  }
}
