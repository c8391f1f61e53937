// src/core/compiler/templates.ts
// Operator -> C statement table

export const C_TEMPLATES: Readonly<Record<string, string>> = {
  ">": "p++;",
  "<": "p--;",
  "+": "t[p]++;",
  "-": "t[p]--;",
  ".": "putchar(t[p]);",
  ",": "t[p]=getchar();",
  "[": "while(t[p]){",
  "]": "}",
};

export function cHead(tapeSize: number): string {
  return `#include <stdio.h>\nint main(void) {unsigned char t[${tapeSize}];int p=0;`;
}

export const C_TAIL = "return 0;}";
