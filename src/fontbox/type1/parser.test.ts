import { describe, expect, it } from "vitest";
import { concatBytes } from "#src/helpers/buffer";
import { stringToBytes } from "#src/test-utils";
import { decrypt, parseType1 } from "./parser";

function encrypt(plain: Uint8Array, key: number): Uint8Array {
  let r = key;
  const out = new Uint8Array(plain.length);

  for (let i = 0; i < plain.length; i++) {
    out[i] = plain[i] ^ (r >> 8);
    r = ((out[i] + r) * 52845 + 22719) & 0xffff;
  }

  return out;
}

/** Charstring with four lenIV bytes, encrypted */
function charString(commands: number[]): Uint8Array {
  return encrypt(new Uint8Array([0, 0, 0, 0, ...commands]), 4330);
}

// hsbw 50 600, 50 0 rmoveto, 400 0 / 0 700 / -400 0 rlineto, closepath endchar
const GLYPH_A = [189, 248, 236, 13, 189, 139, 21, 248, 36, 139, 5, 139, 249, 80, 5, 252, 36, 139, 5, 9, 14];
// hsbw 0 500, 0 callsubr, closepath endchar
const GLYPH_B = [139, 248, 136, 13, 139, 10, 9, 14];
// 100 0 rmoveto 50 0 rlineto return
const SUBR_0 = [239, 139, 21, 189, 139, 5, 11];

function entry(prefix: string, data: Uint8Array, suffix: string): Uint8Array {
  return concatBytes([stringToBytes(`${prefix} ${data.length} RD `), data, stringToBytes(` ${suffix}\n`)]);
}

function buildType1(encoding = "/Encoding StandardEncoding def"): { data: Uint8Array; length1: number } {
  const cleartext = stringToBytes(
    "%!PS-AdobeFont-1.0: Test 001\n/FontName /Test def\n" +
      `/FontMatrix [0.001 0 0 0.001 0 0] readonly def\n${encoding}\ncurrentfile eexec\n`,
  );
  const privatePart = concatBytes([
    new Uint8Array([0, 0, 0, 0]),
    stringToBytes("dup /Private 8 dict dup begin\n/lenIV 4 def\n/Subrs 1 array\n"),
    entry("dup 0", charString(SUBR_0), "NP"),
    stringToBytes("ND\n2 index /CharStrings 3 dict dup begin\n"),
    entry("/.notdef", charString([139, 248, 136, 13, 14]), "ND"),
    entry("/A", charString(GLYPH_A), "ND"),
    entry("/B", charString(GLYPH_B), "ND"),
    stringToBytes("end\nend\n"),
  ]);

  return {
    data: concatBytes([cleartext, encrypt(privatePart, 55665)]),
    length1: cleartext.length,
  };
}

describe("decrypt", () => {
  it("inverts eexec encryption and drops the lead bytes", () => {
    const plain = stringToBytes("abcdhello");

    expect(decrypt(encrypt(plain, 55665), 55665, 4)).toEqual(stringToBytes("hello"));
  });
});

describe("parseType1", () => {
  it("reads the header and CharStrings", () => {
    const { data, length1 } = buildType1();
    const font = parseType1(data, { length1 });

    expect(font.fontName).toBe("Test");
    expect(font.numGlyphs).toBe(3);
    expect(font.glyphIdForName("A")).toBe(1);
  });

  it("finds the eexec section without Length1", () => {
    const { data } = buildType1();

    expect(parseType1(data).glyphIdForName("B")).toBe(2);
  });

  it("uses StandardEncoding as the built-in encoding", () => {
    const { data, length1 } = buildType1();

    expect(parseType1(data, { length1 }).encodedName(65)).toBe("A");
  });

  it("reads a custom built-in encoding", () => {
    const { data, length1 } = buildType1(
      "/Encoding 256 array\n0 1 255 {1 index exch /.notdef put} for\ndup 33 /B put\nreadonly def",
    );
    const font = parseType1(data, { length1 });

    expect(font.encodedName(33)).toBe("B");
    expect(font.encodedName(65)).toBeUndefined();
  });

  it("draws a glyph with its sidebearing and width", () => {
    const { data, length1 } = buildType1();
    const font = parseType1(data, { length1 });
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

  it("runs subroutines", () => {
    const { data, length1 } = buildType1();
    const glyph = parseType1(data, { length1 }).glyph(2);

    expect(glyph?.width).toBe(500);
    expect(glyph?.path.segments).toEqual([
      { kind: "moveTo", x: 100, y: 0 },
      { kind: "lineTo", x: 150, y: 0 },
      { kind: "close" },
    ]);
  });

  it("rejects data without an eexec section", () => {
    expect(() => parseType1(stringToBytes("%!PS-AdobeFont-1.0\n/FontName /X def\n"))).toThrow(
      "Type 1 font has no eexec section",
    );
  });
});
