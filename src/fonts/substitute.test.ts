import { describe, expect, it } from "vitest";
import { boxGlyph, isBlank } from "./substitute";

describe("boxGlyph", () => {
  it("draws a frame inside the advance", () => {
    const path = boxGlyph(600, false);

    expect(path.bounds()).toEqual({ x0: 50, y0: 0, x1: 550, y1: 700 });
    expect(path.segments.filter(s => s.kind === "moveTo")).toEqual([
      { kind: "moveTo", x: 50, y: 0 },
      { kind: "moveTo", x: 90, y: 40 },
    ]);
  });

  it("draws nothing for blank or narrow glyphs", () => {
    expect(boxGlyph(600, true).isEmpty).toBe(true);
    expect(boxGlyph(80, false).isEmpty).toBe(true);
  });
});

describe("isBlank", () => {
  it("recognises whitespace code points", () => {
    expect(isBlank(0x20)).toBe(true);
    expect(isBlank(0x3000)).toBe(true);
    expect(isBlank(0x41)).toBe(false);
    expect(isBlank(undefined)).toBe(false);
  });
});
