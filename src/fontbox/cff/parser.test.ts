import { describe, expect, it } from "vitest";
import { ByteWriter } from "#src/test-utils";
import { parseCFF, parseDict } from "./parser";

function index(items: number[][]): number[] {
  if (items.length === 0) {
    return [0, 0];
  }

  const writer = new ByteWriter();
  let offset = 1;

  writer.u16(items.length).u8(1).u8(offset);

  for (const item of items) {
    offset += item.length;
    writer.u8(offset);
  }

  for (const item of items) {
    writer.raw(item);
  }

  return [...writer.bytes()];
}

function int32(value: number): number[] {
  return [29, (value >> 24) & 0xff, (value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff];
}

// "A": width 600, 100 0 rmoveto 400 700 -400 hlineto endchar
const GLYPH_A = [248, 236, 239, 139, 21, 248, 36, 249, 80, 252, 36, 6, 14];
// "B": -107 callsubr endchar (local subr 0 after bias)
const GLYPH_B = [32, 10, 14];
// 100 0 rmoveto 50 hlineto 50 vlineto return
const SUBR_0 = [239, 139, 21, 189, 6, 189, 7, 11];

function buildCff(): Uint8Array {
  const header = [1, 0, 4, 1];
  const nameIndex = index([[0x54, 0x65, 0x73, 0x74]]);
  // Top DICT has a fixed size: three int32 offsets + private size/offset
  const topDictSize = 23;
  const topIndexSize = 2 + 1 + 2 + topDictSize;
  const charsetOffset = header.length + nameIndex.length + topIndexSize + 2 + 2;
  const charset = [0, 0, 34, 0, 35];
  const charStringsOffset = charsetOffset + charset.length;
  const charStrings = index([[14], GLYPH_A, GLYPH_B]);
  const privateOffset = charStringsOffset + charStrings.length;
  // defaultWidthX 500, Subrs at +5
  const privateDict = [248, 136, 20, 144, 19];
  const subrs = index([SUBR_0]);

  const topDict = [
    ...int32(charsetOffset),
    15,
    ...int32(charStringsOffset),
    17,
    ...int32(privateDict.length),
    ...int32(privateOffset),
    18,
  ];

  return new Uint8Array([
    ...header,
    ...nameIndex,
    ...index([topDict]),
    ...index([]),
    ...index([]),
    ...charset,
    ...charStrings,
    ...privateDict,
    ...subrs,
  ]);
}

describe("parseDict", () => {
  it("decodes integer operands", () => {
    expect(parseDict(new Uint8Array([239, 20]))).toEqual(new Map([[20, [100]]]));
  });

  it("decodes real operands", () => {
    expect(parseDict(new Uint8Array([30, 0x1a, 0x5f, 20]))).toEqual(new Map([[20, [1.5]]]));
  });

  it("stores two-byte operators as 1200 + b1", () => {
    expect(parseDict(new Uint8Array([139, 139, 12, 7])).get(1207)).toEqual([0, 0]);
  });
});

describe("parseCFF", () => {
  it("reads the font set", () => {
    const [font] = parseCFF(buildCff());

    expect(font.name).toBe("Test");
    expect(font.isCIDFont).toBe(false);
    expect(font.numGlyphs).toBe(3);
  });

  it("maps glyph names through the charset", () => {
    const [font] = parseCFF(buildCff());

    expect(font.glyphName(1)).toBe("A");
    expect(font.glyphIdForName("B")).toBe(2);
    expect(font.glyphIdForName("C")).toBeUndefined();
  });

  it("uses StandardEncoding when the font has no encoding", () => {
    const [font] = parseCFF(buildCff());

    expect(font.glyphIdForCode(65)).toBe(1);
    expect(font.glyphIdForCode(66)).toBe(2);
  });

  it("draws a glyph with an explicit width", () => {
    const [font] = parseCFF(buildCff());
    const glyph = font.glyph(1);

    expect(glyph?.width).toBe(600);
    expect(glyph?.path.segments).toEqual([
      { kind: "moveTo", x: 100, y: 0 },
      { kind: "lineTo", x: 500, y: 0 },
      { kind: "lineTo", x: 500, y: 700 },
      { kind: "lineTo", x: 100, y: 700 },
      { kind: "close" },
    ]);
  });

  it("runs local subroutines and falls back to defaultWidthX", () => {
    const [font] = parseCFF(buildCff());
    const glyph = font.glyph(2);

    expect(glyph?.width).toBe(500);
    expect(glyph?.path.segments).toEqual([
      { kind: "moveTo", x: 100, y: 0 },
      { kind: "lineTo", x: 150, y: 0 },
      { kind: "lineTo", x: 150, y: 50 },
      { kind: "close" },
    ]);
  });

  it("rejects other major versions", () => {
    expect(() => parseCFF(new Uint8Array([2, 0, 5, 4]))).toThrow("Unsupported CFF version 2");
  });
});
