import { describe, expect, it } from "vitest";
import { standardFontName, standardMetrics, stripSubsetTag } from "./standard-14";

describe("standardFontName", () => {
  it("accepts the standard names", () => {
    expect(standardFontName("Times-Bold")).toBe("Times-Bold");
  });

  it("maps style variants that share metrics", () => {
    expect(standardFontName("Helvetica-Oblique")).toBe("Helvetica");
    expect(standardFontName("Courier-BoldOblique")).toBe("Courier");
  });

  it("maps common aliases with style suffixes", () => {
    expect(standardFontName("Arial")).toBe("Helvetica");
    expect(standardFontName("Arial,Bold")).toBe("Helvetica-Bold");
    expect(standardFontName("Arial-BoldMT")).toBe("Helvetica-Bold");
    expect(standardFontName("TimesNewRoman,BoldItalic")).toBe("Times-BoldItalic");
    expect(standardFontName("TimesNewRomanPS-ItalicMT")).toBe("Times-Italic");
    expect(standardFontName("CourierNew")).toBe("Courier");
  });

  it("strips subset tags", () => {
    expect(stripSubsetTag("ABCDEF+Helvetica")).toBe("Helvetica");
    expect(standardFontName("ABCDEF+Helvetica")).toBe("Helvetica");
  });

  it("returns undefined for other fonts", () => {
    expect(standardFontName("Garamond")).toBeUndefined();
  });
});

describe("standardMetrics", () => {
  it("gives glyph widths", () => {
    const helvetica = standardMetrics("Helvetica");

    expect(helvetica?.width("A")).toBe(667);
    expect(helvetica?.width("space")).toBe(278);
    expect(standardMetrics("Times-Roman")?.width("a")).toBe(444);
  });

  it("falls back to the missing width for unknown glyphs", () => {
    expect(standardMetrics("Helvetica")?.width("nosuchglyph")).toBe(556);
    expect(standardMetrics("Courier-Bold")?.width("A")).toBe(600);
  });

  it("is undefined for fonts outside the standard set", () => {
    expect(standardMetrics("Garamond")).toBeUndefined();
  });
});
