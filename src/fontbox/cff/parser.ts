/**
 * Compact Font Format parser.
 *
 * Reads the structures needed to draw glyphs: the top DICT, charset,
 * built-in encoding, CharStrings, global and local subroutines, and for
 * CID-keyed fonts the FDArray / FDSelect.
 */

import type { Matrix } from "#src/helpers/matrix";
import { BinaryScanner } from "#src/io/binary-scanner";
import { CFFFont, type CFFPrivate } from "./cff-font";

type DictValue = number[];
type Dict = Map<number, DictValue>;

/** Two-byte operators are stored as 1200 + second byte */
const OP = {
  charset: 15,
  encoding: 16,
  charStrings: 17,
  private: 18,
  subrs: 19,
  defaultWidthX: 20,
  nominalWidthX: 21,
  fontMatrix: 1207,
  ros: 1230,
  fdArray: 1236,
  fdSelect: 1237,
} as const;

const DEFAULT_MATRIX: Matrix = [0.001, 0, 0, 0.001, 0, 0];

/**
 * Parse every font of a CFF FontSet (bare CFF data, as in `FontFile3`).
 *
 * @throws {Error} if the data is not CFF or a required structure is missing
 */
export function parseCFF(data: Uint8Array): CFFFont[] {
  const scanner = new BinaryScanner(data);
  const major = scanner.readUint8();

  if (major !== 1) {
    throw new Error(`Unsupported CFF version ${major}`);
  }

  scanner.readUint8(); // minor
  const headerSize = scanner.readUint8();

  scanner.seek(headerSize);

  const names = readIndex(scanner);
  const topDicts = readIndex(scanner);
  const strings = readIndex(scanner).map(bytes => String.fromCharCode(...bytes));
  const globalSubrs = readIndex(scanner);
  const fonts: CFFFont[] = [];

  topDicts.forEach((topDictData, i) => {
    const name = String.fromCharCode(...(names[i] ?? new Uint8Array()));

    fonts.push(parseFont(data, name, parseDict(topDictData), strings, globalSubrs));
  });

  return fonts;
}

function parseFont(
  data: Uint8Array,
  name: string,
  top: Dict,
  strings: string[],
  globalSubrs: Uint8Array[],
): CFFFont {
  const charStringsOffset = top.get(OP.charStrings)?.[0];

  if (charStringsOffset === undefined) {
    throw new Error("CFF font has no CharStrings");
  }

  const charStrings = readIndex(new BinaryScanner(data, charStringsOffset));
  const glyphCount = charStrings.length;
  const isCIDFont = top.has(OP.ros);
  const fontMatrix = readMatrix(top) ?? DEFAULT_MATRIX;
  const charset = readCharset(data, top.get(OP.charset)?.[0] ?? 0, glyphCount);
  const privateDict = readPrivate(data, top.get(OP.private));

  let fdPrivates: CFFPrivate[] = [];
  let fdMatrices: Array<Matrix | null> = [];
  let fdSelect: number[] = [];

  if (isCIDFont) {
    const fdArrayOffset = top.get(OP.fdArray)?.[0];
    const fdSelectOffset = top.get(OP.fdSelect)?.[0];

    if (fdArrayOffset !== undefined) {
      const fontDicts = readIndex(new BinaryScanner(data, fdArrayOffset)).map(parseDict);

      fdPrivates = fontDicts.map(dict => readPrivate(data, dict.get(OP.private)));
      fdMatrices = fontDicts.map(readMatrix);
    }

    if (fdSelectOffset !== undefined) {
      fdSelect = readFdSelect(data, fdSelectOffset, glyphCount);
    }
  }

  const encodingOffset = top.get(OP.encoding)?.[0] ?? 0;
  const encoding = isCIDFont ? null : readEncoding(data, encodingOffset, charset);

  return new CFFFont({
    name,
    isCIDFont,
    fontMatrix,
    charStrings,
    globalSubrs,
    privateDict,
    charset,
    encoding,
    strings,
    fdPrivates,
    fdMatrices,
    fdSelect,
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// INDEX and DICT
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read an INDEX structure, leaving the scanner after it.
 */
export function readIndex(scanner: BinaryScanner): Uint8Array[] {
  const count = scanner.readUint16();

  if (count === 0) {
    return [];
  }

  const offSize = scanner.readUint8();
  const offsets: number[] = [];

  for (let i = 0; i <= count; i++) {
    offsets.push(scanner.readOffset(offSize));
  }

  const base = scanner.position - 1;
  const items: Uint8Array[] = [];

  for (let i = 0; i < count; i++) {
    const start = base + offsets[i];
    const end = base + offsets[i + 1];

    if (end < start || end > scanner.length) {
      throw new Error(`Corrupt CFF INDEX entry ${i}`);
    }

    items.push(scanner.bytes.subarray(start, end));
  }

  scanner.seek(base + offsets[count]);

  return items;
}

/**
 * Decode a DICT into operator → operands.
 */
export function parseDict(data: Uint8Array): Dict {
  const dict: Dict = new Map();
  let operands: number[] = [];
  let i = 0;

  while (i < data.length) {
    const b0 = data[i];

    if (b0 <= 21) {
      let op = b0;

      i++;

      if (b0 === 12) {
        op = 1200 + (data[i] ?? 0);
        i++;
      }

      dict.set(op, operands);
      operands = [];
    } else if (b0 === 28) {
      operands.push(toInt16((data[i + 1] << 8) | data[i + 2]));
      i += 3;
    } else if (b0 === 29) {
      operands.push(((data[i + 1] << 24) | (data[i + 2] << 16) | (data[i + 3] << 8) | data[i + 4]) | 0);
      i += 5;
    } else if (b0 === 30) {
      const [value, next] = readReal(data, i + 1);

      operands.push(value);
      i = next;
    } else if (b0 >= 32 && b0 <= 246) {
      operands.push(b0 - 139);
      i++;
    } else if (b0 >= 247 && b0 <= 250) {
      operands.push((b0 - 247) * 256 + data[i + 1] + 108);
      i += 2;
    } else if (b0 >= 251 && b0 <= 254) {
      operands.push(-(b0 - 251) * 256 - data[i + 1] - 108);
      i += 2;
    } else {
      // reserved
      i++;
    }
  }

  return dict;
}

function toInt16(value: number): number {
  return value > 0x7fff ? value - 0x10000 : value;
}

const REAL_NIBBLES = ["0", "1", "2", "3", "4", "5", "6", "7", "8", "9", ".", "E", "E-", "", "-"];

function readReal(data: Uint8Array, start: number): [number, number] {
  let text = "";
  let i = start;

  while (i < data.length) {
    const byte = data[i++];
    const high = byte >> 4;
    const low = byte & 0x0f;

    if (high === 0x0f) {
      break;
    }

    text += REAL_NIBBLES[high];

    if (low === 0x0f) {
      break;
    }

    text += REAL_NIBBLES[low];
  }

  const value = Number.parseFloat(text);

  return [Number.isFinite(value) ? value : 0, i];
}

function readMatrix(dict: Dict): Matrix | null {
  const m = dict.get(OP.fontMatrix);

  if (!m || m.length !== 6) {
    return null;
  }

  return [m[0], m[1], m[2], m[3], m[4], m[5]];
}

function readPrivate(data: Uint8Array, entry: DictValue | undefined): CFFPrivate {
  const empty: CFFPrivate = { subrs: [], defaultWidthX: 0, nominalWidthX: 0 };

  if (!entry || entry.length < 2) {
    return empty;
  }

  const [size, offset] = entry;

  if (offset + size > data.length || size <= 0) {
    return empty;
  }

  const dict = parseDict(data.subarray(offset, offset + size));
  const subrsOffset = dict.get(OP.subrs)?.[0];

  return {
    subrs: subrsOffset !== undefined ? readIndex(new BinaryScanner(data, offset + subrsOffset)) : [],
    defaultWidthX: dict.get(OP.defaultWidthX)?.[0] ?? 0,
    nominalWidthX: dict.get(OP.nominalWidthX)?.[0] ?? 0,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Charset, encoding, FDSelect
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Glyph id → SID (CID for CID-keyed fonts). Predefined charsets
 * (offsets 0-2) are treated as identity.
 */
function readCharset(data: Uint8Array, offset: number, glyphCount: number): number[] {
  const charset = [0];

  if (offset <= 2) {
    for (let gid = 1; gid < glyphCount; gid++) {
      charset.push(gid);
    }

    return charset;
  }

  const scanner = new BinaryScanner(data, offset);
  const format = scanner.readUint8();

  while (charset.length < glyphCount) {
    if (format === 0) {
      charset.push(scanner.readUint16());
      continue;
    }

    const first = scanner.readUint16();
    const left = format === 1 ? scanner.readUint8() : scanner.readUint16();

    for (let i = 0; i <= left && charset.length < glyphCount; i++) {
      charset.push(first + i);
    }
  }

  return charset;
}

/**
 * Custom built-in encoding as code → glyph id, or null for the
 * predefined Standard (0) and Expert (1) encodings.
 */
function readEncoding(
  data: Uint8Array,
  offset: number,
  charset: number[],
): Map<number, number> | null {
  if (offset <= 1) {
    return null;
  }

  const scanner = new BinaryScanner(data, offset);
  const format = scanner.readUint8();
  const encoding = new Map<number, number>();

  if ((format & 0x7f) === 0) {
    const count = scanner.readUint8();

    for (let gid = 1; gid <= count; gid++) {
      encoding.set(scanner.readUint8(), gid);
    }
  } else {
    const ranges = scanner.readUint8();
    let gid = 1;

    for (let r = 0; r < ranges; r++) {
      const first = scanner.readUint8();
      const left = scanner.readUint8();

      for (let i = 0; i <= left; i++) {
        encoding.set(first + i, gid++);
      }
    }
  }

  if (format & 0x80) {
    const supplements = scanner.readUint8();

    for (let i = 0; i < supplements; i++) {
      const code = scanner.readUint8();
      const sid = scanner.readUint16();
      const gid = charset.indexOf(sid);

      if (gid >= 0) {
        encoding.set(code, gid);
      }
    }
  }

  return encoding;
}

function readFdSelect(data: Uint8Array, offset: number, glyphCount: number): number[] {
  const scanner = new BinaryScanner(data, offset);
  const format = scanner.readUint8();
  const select: number[] = [];

  if (format === 0) {
    for (let gid = 0; gid < glyphCount; gid++) {
      select.push(scanner.readUint8());
    }

    return select;
  }

  if (format === 3) {
    const ranges = scanner.readUint16();
    let first = scanner.readUint16();

    for (let r = 0; r < ranges; r++) {
      const fd = scanner.readUint8();
      const next = scanner.readUint16();

      for (let gid = first; gid < next && gid < glyphCount; gid++) {
        select[gid] = fd;
      }

      first = next;
    }

    return select;
  }

  throw new Error(`Unsupported FDSelect format ${format}`);
}
