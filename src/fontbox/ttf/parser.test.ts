import { describe, expect, it } from "vitest";
import { buildTrueTypeFont } from "#src/test-utils";
import { parseTTF, sfntFlavor } from "./parser";

const square = [
  [100, 0, true],
  [500, 0, true],
  [500, 700, true],
  [100, 700, true],
] satisfies Array<[number, number, boolean]>;

const arch = [
  [0, 0, true],
  [100, 100, false],
  [200, 0, true],
] satisfies Array<[number, number, boolean]>;

function sampleFont() {
  return buildTrueTypeFont({
    unitsPerEm: 2048,
    glyphs: [
      { advance: 500, name: ".notdef" },
      { advance: 600, contours: [square], name: "A" },
      { advance: 400, contours: [arch], name: "archglyph" },
    ],
    cmap: { 65: 1, 0x2022: 2 },
  });
}

describe("parseTTF", () => {
  it("reads head, maxp and hmtx", () => {
    const font = parseTTF(sampleFont());

    expect(font.unitsPerEm).toBe(2048);
    expect(font.numGlyphs).toBe(3);
    expect(font.advanceWidth(1)).toBe(600);
    expect(font.advanceWidth(2)).toBe(400);
  });

  it("repeats the last advance past numberOfHMetrics", () => {
    const font = parseTTF(sampleFont());

    expect(font.advanceWidth(10)).toBe(400);
  });

  it("looks up the (3,1) cmap", () => {
    const cmap = parseTTF(sampleFont()).findCmap(3, 1);

    expect(cmap?.format).toBe(4);
    expect(cmap?.lookup(65)).toBe(1);
    expect(cmap?.lookup(0x2022)).toBe(2);
    expect(cmap?.lookup(66)).toBe(0);
  });

  it("maps post names to glyph ids", () => {
    const font = parseTTF(sampleFont());

    expect(font.glyphIdForName("A")).toBe(1);
    expect(font.glyphIdForName("archglyph")).toBe(2);
    expect(font.glyphIdForName("B")).toBeUndefined();
  });

  it("converts an on-curve contour to lines", () => {
    const path = parseTTF(sampleFont()).glyphPath(1);

    expect(path.segments).toEqual([
      { kind: "moveTo", x: 100, y: 0 },
      { kind: "lineTo", x: 500, y: 0 },
      { kind: "lineTo", x: 500, y: 700 },
      { kind: "lineTo", x: 100, y: 700 },
      { kind: "close" },
    ]);
  });

  it("converts quadratic segments to cubics", () => {
    const path = parseTTF(sampleFont()).glyphPath(2);
    const curve = path.segments[1];

    expect(path.segments[0]).toEqual({ kind: "moveTo", x: 0, y: 0 });
    expect(curve.kind).toBe("curveTo");

    if (curve.kind === "curveTo") {
      expect(curve.x1).toBeCloseTo(66.667, 3);
      expect(curve.y1).toBeCloseTo(66.667, 3);
      expect(curve.x2).toBeCloseTo(133.333, 3);
      expect(curve.y2).toBeCloseTo(66.667, 3);
      expect([curve.x, curve.y]).toEqual([200, 0]);
    }

    expect(path.segments[2]).toEqual({ kind: "close" });
  });

  it("returns an empty path for empty and unknown glyphs", () => {
    const font = parseTTF(sampleFont());

    expect(font.glyphPath(0).isEmpty).toBe(true);
    expect(font.glyphPath(99).isEmpty).toBe(true);
  });

  it("rejects data that is not an sfnt", () => {
    expect(() => parseTTF(new Uint8Array([1, 2, 3, 4, 0, 0]))).toThrow(/unknown version/);
  });

  it("rejects collections", () => {
    expect(() => parseTTF(new Uint8Array([0x74, 0x74, 0x63, 0x66, 0, 0]))).toThrow(
      "TrueType collections (.ttc) are not supported",
    );
  });

  it("requires a head table", () => {
    const empty = new Uint8Array([0, 1, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]);

    expect(() => parseTTF(empty, { isEmbedded: true })).toThrow("Font has no 'head' table");
  });
});

describe("sfntFlavor", () => {
  it("classifies sfnt signatures", () => {
    expect(sfntFlavor(new Uint8Array([0, 1, 0, 0]))).toBe("truetype");
    expect(sfntFlavor(new Uint8Array([0x74, 0x72, 0x75, 0x65]))).toBe("truetype");
    expect(sfntFlavor(new Uint8Array([0x4f, 0x54, 0x54, 0x4f]))).toBe("opentype");
    expect(sfntFlavor(new Uint8Array([0x74, 0x74, 0x63, 0x66]))).toBe("collection");
  });

  it("returns null for other data", () => {
    expect(sfntFlavor(new Uint8Array([0x25, 0x21, 0, 0]))).toBeNull();
    expect(sfntFlavor(new Uint8Array([0, 1]))).toBeNull();
  });
});
