/**
 * CID CMaps: map multi-byte character codes in show strings to CIDs.
 */

import { codeValue, readCMapOperations } from "./cmap-lexer";

export interface CharCode {
  code: number;
  /** Number of bytes the code occupies */
  length: number;
}

interface CodespaceRange {
  low: Uint8Array;
  high: Uint8Array;
}

interface CidRange {
  length: number;
  low: number;
  high: number;
  cid: number;
}

export interface CMapParseOptions {
  /** Resolve the CMap named by `usecmap` */
  useCMap?: (name: string) => CMap | undefined;
}

export class CMap {
  name = "";
  vertical = false;

  private readonly codespaces: CodespaceRange[] = [];
  private readonly ranges: CidRange[] = [];
  /** Per code length, code → CID */
  private readonly chars = new Map<number, Map<number, number>>();

  /**
   * `Identity-H` / `Identity-V`: two-byte codes equal to their CIDs.
   */
  static identity(vertical: boolean): CMap {
    const cmap = new CMap();

    cmap.name = vertical ? "Identity-V" : "Identity-H";
    cmap.vertical = vertical;
    cmap.addCodespace(new Uint8Array([0, 0]), new Uint8Array([0xff, 0xff]));
    cmap.addRange(2, 0, 0xffff, 0);

    return cmap;
  }

  addCodespace(low: Uint8Array, high: Uint8Array): void {
    if (low.length === high.length && low.length >= 1 && low.length <= 4) {
      this.codespaces.push({ low, high });
    }
  }

  addRange(length: number, low: number, high: number, cid: number): void {
    this.ranges.push({ length, low, high, cid });
  }

  addChar(length: number, code: number, cid: number): void {
    let byCode = this.chars.get(length);

    if (!byCode) {
      byCode = new Map();
      this.chars.set(length, byCode);
    }

    byCode.set(code, cid);
  }

  /**
   * Copy the mappings of a parent CMap (`usecmap`).
   */
  inherit(parent: CMap): void {
    this.codespaces.push(...parent.codespaces);
    this.ranges.push(...parent.ranges);

    for (const [length, byCode] of parent.chars) {
      for (const [code, cid] of byCode) {
        this.addChar(length, code, cid);
      }
    }

    this.vertical ||= parent.vertical;
  }

  /**
   * Read the code starting at `offset`: the shortest byte sequence that
   * falls inside a codespace range. Bytes matching no range are consumed
   * as a code of the shortest codespace length.
   */
  readCode(bytes: Uint8Array, offset: number): CharCode {
    let code = 0;

    for (let length = 1; length <= 4 && offset + length <= bytes.length; length++) {
      code = code * 256 + bytes[offset + length - 1];

      if (this.codespaces.some(range => inCodespace(range, bytes, offset, length))) {
        return { code, length };
      }
    }

    const shortest =
      this.codespaces.length === 0 ? 1 : Math.min(...this.codespaces.map(range => range.low.length));
    const length = Math.max(1, Math.min(shortest, bytes.length - offset));

    return { code: codeValue(bytes.subarray(offset, offset + length)), length };
  }

  /**
   * Split a show string into character codes.
   */
  decode(bytes: Uint8Array): CharCode[] {
    const codes: CharCode[] = [];
    let offset = 0;

    while (offset < bytes.length) {
      const code = this.readCode(bytes, offset);

      codes.push(code);
      offset += code.length;
    }

    return codes;
  }

  /**
   * CID for a code; later definitions override earlier ones.
   */
  lookup(code: CharCode): number | undefined {
    const single = this.chars.get(code.length)?.get(code.code);

    if (single !== undefined) {
      return single;
    }

    for (let i = this.ranges.length - 1; i >= 0; i--) {
      const range = this.ranges[i];

      if (range.length === code.length && code.code >= range.low && code.code <= range.high) {
        return range.cid + (code.code - range.low);
      }
    }

    return undefined;
  }
}

function inCodespace(range: CodespaceRange, bytes: Uint8Array, offset: number, length: number): boolean {
  if (range.low.length !== length) {
    return false;
  }

  for (let i = 0; i < length; i++) {
    const byte = bytes[offset + i];

    if (byte < range.low[i] || byte > range.high[i]) {
      return false;
    }
  }

  return true;
}

/**
 * Predefined CMap by name. Only the Identity CMaps are built in.
 */
export function predefinedCMap(name: string): CMap | undefined {
  if (name === "Identity-H" || name === "Identity-V") {
    return CMap.identity(name === "Identity-V");
  }

  return undefined;
}

/**
 * Parse an embedded CMap stream.
 */
export function parseCMap(data: Uint8Array, options: CMapParseOptions = {}): CMap {
  const cmap = new CMap();

  for (const { operator, operands } of readCMapOperations(data)) {
    switch (operator) {
      case "usecmap": {
        const parentName = operands.at(-1);
        const parent =
          parentName?.type === "name"
            ? (options.useCMap?.(parentName.value) ?? predefinedCMap(parentName.value))
            : undefined;

        if (parent) {
          cmap.inherit(parent);
        }

        break;
      }

      case "def": {
        const [key, value] = operands.slice(-2);

        if (key?.type === "name" && key.value === "WMode" && value?.type === "number") {
          cmap.vertical = value.value === 1;
        } else if (key?.type === "name" && key.value === "CMapName" && value?.type === "name") {
          cmap.name = value.value;
        }

        break;
      }

      case "endcodespacerange":
        for (let i = 0; i + 1 < operands.length; i += 2) {
          const low = operands[i];
          const high = operands[i + 1];

          if (low.type === "string" && high.type === "string") {
            cmap.addCodespace(low.value, high.value);
          }
        }

        break;

      case "endcidrange":
        for (let i = 0; i + 2 < operands.length; i += 3) {
          const low = operands[i];
          const high = operands[i + 1];
          const cid = operands[i + 2];

          if (low.type === "string" && high.type === "string" && cid.type === "number") {
            cmap.addRange(low.value.length, codeValue(low.value), codeValue(high.value), cid.value);
          }
        }

        break;

      case "endcidchar":
        for (let i = 0; i + 1 < operands.length; i += 2) {
          const code = operands[i];
          const cid = operands[i + 1];

          if (code.type === "string" && cid.type === "number") {
            cmap.addChar(code.value.length, codeValue(code.value), cid.value);
          }
        }

        break;
    }
  }

  return cmap;
}
