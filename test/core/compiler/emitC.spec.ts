// test/core/compiler/emitC.spec.ts

import { describe, it, expect } from "vitest";
import { emitC } from "../../../src/core/compiler/emitC";
import { C_TEMPLATES, C_TAIL, cHead } from "../../../src/core/compiler/templates";
import { isFail } from "../../../src/outcome/outcome";
import { unwrap } from "../../../src/outcome/matchers";

describe("emitC", () => {
  it("translates each operator with its template", () => {
    expect(unwrap(emitC("+[-]."))).toBe(
      "#include <stdio.h>\nint main(void) {unsigned char t[30000];int p=0;" +
        "t[p]++;while(t[p]){t[p]--;}putchar(t[p]);" +
        "return 0;}"
    );
  });

  it("sizes the tape from the options", () => {
    expect(unwrap(emitC(",>", { tapeSize: 100 }))).toBe(
      "#include <stdio.h>\nint main(void) {unsigned char t[100];int p=0;t[p]=getchar();p++;return 0;}"
    );
  });

  it("drops everything that is not one of the eight operators", () => {
    const out = unwrap(emitC("a#b@c!\n<"));
    expect(out).toBe(cHead(30000) + C_TEMPLATES["<"] + C_TAIL);
  });

  it("accepts raw bytes", () => {
    expect(unwrap(emitC(new Uint8Array([0x2e])))).toBe(cHead(30000) + "putchar(t[p]);" + C_TAIL);
  });

  it("rejects unbalanced brackets", () => {
    const res = emitC("[[]");
    if (!isFail(res)) throw new Error("expected failure");
    expect(res.failure.reason).toBe("unbalanced-brackets");
    expect(res.failure.diagnostics[0].code).toBe("E0002");
  });
});
