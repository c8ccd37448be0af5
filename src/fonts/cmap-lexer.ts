/**
 * Operator stream over CMap files (both CID CMaps and ToUnicode CMaps).
 *
 * CMaps are PostScript programs, but everything a renderer needs sits in
 * `begin…`/`end…` blocks and `def`s, so the program is read as a flat
 * sequence of operands and keywords with the PDF token reader.
 */

import { Scanner } from "#src/io/scanner";
import { TokenReader } from "#src/parser/token-reader";

export type CMapOperand =
  | { type: "number"; value: number }
  | { type: "name"; value: string }
  | { type: "string"; value: Uint8Array }
  | { type: "array"; items: CMapOperand[] };

export interface CMapOperation {
  operator: string;
  operands: CMapOperand[];
}

export function* readCMapOperations(data: Uint8Array): Generator<CMapOperation> {
  const reader = new TokenReader(new Scanner(data));
  const arrays: CMapOperand[][] = [];
  let operands: CMapOperand[] = [];

  for (;;) {
    const token = reader.nextToken();
    const target = arrays.at(-1) ?? operands;

    switch (token.type) {
      case "eof":
        return;

      case "number":
        target.push({ type: "number", value: token.value });
        break;

      case "name":
        target.push({ type: "name", value: token.value });
        break;

      case "string":
        target.push({ type: "string", value: token.value });
        break;

      case "delimiter":
        if (token.value === "[") {
          arrays.push([]);
        } else if (token.value === "]") {
          const items = arrays.pop();

          if (items) {
            (arrays.at(-1) ?? operands).push({ type: "array", items });
          }
        }

        // dictionary and procedure delimiters carry nothing we read
        break;

      case "keyword":
        if (arrays.length === 0) {
          yield { operator: token.value, operands };
          operands = [];
        }

        break;
    }
  }
}

/**
 * Big-endian integer value of a string operand.
 */
export function codeValue(bytes: Uint8Array): number {
  let value = 0;

  for (const byte of bytes) {
    value = value * 256 + byte;
  }

  return value;
}
