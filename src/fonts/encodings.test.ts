import { describe, expect, it } from "vitest";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import { applyDifferences, getEncoding, glyphNameToUnicode } from "./encodings";

describe("getEncoding", () => {
  it("returns the named base encodings", () => {
    expect(getEncoding("StandardEncoding")?.[0x27]).toBe("quoteright");
    expect(getEncoding("WinAnsiEncoding")?.[0x92]).toBe("quoteright");
    expect(getEncoding("MacRomanEncoding")?.[0x8e]).toBe("eacute");
    expect(getEncoding("StandardEncoding")?.[65]).toBe("A");
  });

  it("returns undefined for unknown names", () => {
    expect(getEncoding("MacExpertEncoding")).toBeUndefined();
  });
});

describe("applyDifferences", () => {
  it("overlays runs of names starting at each code", () => {
    const base = getEncoding("StandardEncoding") ?? [];
    const differences = PdfArray.of(
      PdfNumber.of(65),
      PdfName.of("alpha"),
      PdfName.of("beta"),
      PdfNumber.of(200),
      PdfName.of("gamma"),
    );
    const result = applyDifferences(base, differences);

    expect(result[65]).toBe("alpha");
    expect(result[66]).toBe("beta");
    expect(result[67]).toBe("C");
    expect(result[200]).toBe("gamma");
  });

  it("leaves the base encoding untouched", () => {
    const base = getEncoding("StandardEncoding") ?? [];

    applyDifferences(base, PdfArray.of(PdfNumber.of(65), PdfName.of("alpha")));

    expect(base[65]).toBe("A");
  });
});

describe("glyphNameToUnicode", () => {
  it("looks names up in the glyph list", () => {
    expect(glyphNameToUnicode("A")).toBe(65);
    expect(glyphNameToUnicode("Euro")).toBe(0x20ac);
  });

  it("parses uniXXXX and uXXXX names", () => {
    expect(glyphNameToUnicode("uni00E9")).toBe(0xe9);
    expect(glyphNameToUnicode("u1F600")).toBe(0x1f600);
  });

  it("ignores suffixes", () => {
    expect(glyphNameToUnicode("A.sc")).toBe(65);
  });

  it("returns undefined for unknown names", () => {
    expect(glyphNameToUnicode("g123")).toBeUndefined();
  });
});
