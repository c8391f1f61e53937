import { describe, expect, it } from "vitest";
import {
  ByteInput,
  MemoryDiagnostics,
  MemoryOutput,
  QueuedInput,
  StreamOutput,
  END_OF_INPUT,
  PENDING_INPUT,
} from "../../src/ports";
import { makeDiagnostic } from "../../src/outcome/codes";

describe("Input sources", () => {
  it("ByteInput yields its bytes then ends for good", () => {
    const input = ByteInput.fromText("Hi");

    expect(input.read()).toEqual({ tag: "Byte", value: 72 });
    expect(input.read()).toEqual({ tag: "Byte", value: 105 });
    expect(input.read()).toBe(END_OF_INPUT);
    expect(input.read()).toBe(END_OF_INPUT);
  });

  it("QueuedInput is pending until fed, and ends only when told", () => {
    const input = new QueuedInput();
    expect(input.read()).toBe(PENDING_INPUT);

    input.push("ab");
    input.push("");
    input.push(new Uint8Array([7]));
    expect(input.buffered).toBe(3);

    expect(input.read()).toEqual({ tag: "Byte", value: 97 });
    expect(input.buffered).toBe(2);
    expect(input.read()).toEqual({ tag: "Byte", value: 98 });
    expect(input.read()).toEqual({ tag: "Byte", value: 7 });
    expect(input.read()).toBe(PENDING_INPUT);

    input.end();
    expect(input.isEnded).toBe(true);
    expect(input.read()).toBe(END_OF_INPUT);
  });

  it("QueuedInput drains buffered bytes before reporting the end", () => {
    const input = new QueuedInput();
    input.push("z");
    input.end();

    expect(input.read()).toEqual({ tag: "Byte", value: 122 });
    expect(input.read()).toBe(END_OF_INPUT);
  });
});

describe("Output sinks", () => {
  it("MemoryOutput collects bytes", () => {
    const out = new MemoryOutput();
    out.write(72);
    out.write(105);

    expect(out.bytes()).toEqual([72, 105]);
    expect(out.text()).toBe("Hi");

    out.clear();
    expect(out.bytes()).toEqual([]);
  });

  it("StreamOutput holds bytes until flushed", () => {
    const chunks: Uint8Array[] = [];
    const out = new StreamOutput({ write: (chunk: Uint8Array) => chunks.push(chunk) });

    out.write(65);
    out.write(66);
    expect(chunks).toHaveLength(0);

    out.flush();
    out.flush();
    expect(chunks).toHaveLength(1);
    expect(Array.from(chunks[0])).toEqual([65, 66]);
  });

  it("StreamOutput flushes by itself at the high-water mark", () => {
    const chunks: Uint8Array[] = [];
    const out = new StreamOutput({ write: (chunk: Uint8Array) => chunks.push(chunk) }, 2);

    out.write(1);
    out.write(2);
    out.write(3);

    expect(chunks.map(c => Array.from(c))).toEqual([[1, 2]]);
  });
});

describe("Diagnostic sinks", () => {
  it("MemoryDiagnostics keeps reports and free text apart", () => {
    const sink = new MemoryDiagnostics();
    sink.report(makeDiagnostic("W0002", undefined, { line: 1, column: 1 }));
    sink.write("Line: 1,1\n");
    sink.write("Tape pointer: 0\n");

    expect(sink.reported).toHaveLength(1);
    expect(sink.lines()).toEqual(["Warning (1,1): Tape pointer underflow. Tape pointer set to zero."]);
    expect(sink.text).toBe("Line: 1,1\nTape pointer: 0\n");
  });
});
