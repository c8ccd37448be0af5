/**
 * ToUnicode CMap parser.
 *
 * ToUnicode CMaps map character codes to Unicode strings. The renderer
 * uses them to pick glyphs from a substitute font when a composite font
 * is not embedded.
 *
 * - beginbfchar/endbfchar: `<srcCode> <dstString>`
 * - beginbfrange/endbfrange:
 *   `<srcCodeLo> <srcCodeHi> <dstString>` (incrementing) or
 *   `<srcCodeLo> <srcCodeHi> [<dst1> <dst2> ...]`
 */

import { codeValue, readCMapOperations } from "./cmap-lexer";

/** Upper bound on a single bfrange, against corrupt ranges */
const MAX_RANGE = 0xffff;

export class ToUnicodeMap {
  private readonly map = new Map<number, string>();

  get(code: number): string | undefined {
    return this.map.get(code);
  }

  set(code: number, unicode: string): void {
    this.map.set(code, unicode);
  }

  get size(): number {
    return this.map.size;
  }

  /**
   * First code point of the mapped string.
   */
  codePoint(code: number): number | undefined {
    return this.map.get(code)?.codePointAt(0);
  }
}

/**
 * Parse a decoded ToUnicode CMap stream.
 */
export function parseToUnicode(data: Uint8Array): ToUnicodeMap {
  const map = new ToUnicodeMap();

  for (const { operator, operands } of readCMapOperations(data)) {
    if (operator === "endbfchar") {
      for (let i = 0; i + 1 < operands.length; i += 2) {
        const src = operands[i];
        const dst = operands[i + 1];

        if (src.type === "string" && dst.type === "string") {
          map.set(codeValue(src.value), utf16beToString(dst.value));
        }
      }
    } else if (operator === "endbfrange") {
      for (let i = 0; i + 2 < operands.length; i += 3) {
        const lo = operands[i];
        const hi = operands[i + 1];
        const dst = operands[i + 2];

        if (lo.type !== "string" || hi.type !== "string") {
          continue;
        }

        const low = codeValue(lo.value);
        const high = codeValue(hi.value);

        if (high < low || high - low > MAX_RANGE) {
          continue;
        }

        if (dst.type === "array") {
          dst.items.forEach((item, offset) => {
            if (item.type === "string" && low + offset <= high) {
              map.set(low + offset, utf16beToString(item.value));
            }
          });
        } else if (dst.type === "string") {
          mapBfRange(low, high, dst.value, map);
        }
      }
    }
  }

  return map;
}

/**
 * Map a range of codes to incrementing destinations: the last byte of
 * the destination string is incremented per code, carrying into the
 * bytes before it.
 */
function mapBfRange(low: number, high: number, dst: Uint8Array, map: ToUnicodeMap): void {
  const current = Uint8Array.from(dst);

  for (let code = low; code <= high; code++) {
    map.set(code, utf16beToString(current));

    for (let i = current.length - 1; i >= 0; i--) {
      current[i] = (current[i] + 1) & 0xff;

      if (current[i] !== 0) {
        break;
      }
    }
  }
}

function utf16beToString(bytes: Uint8Array): string {
  // Single-byte destinations occur in the wild; read them as Latin-1
  if (bytes.length === 1) {
    return String.fromCharCode(bytes[0]);
  }

  const units: number[] = [];

  for (let i = 0; i + 1 < bytes.length; i += 2) {
    units.push((bytes[i] << 8) | bytes[i + 1]);
  }

  return String.fromCharCode(...units);
}
