import { describe, expect, it } from "vitest";
import { AlphaMask, rasterizeCoverage } from "./coverage";

/** Axis-aligned rectangle as a flat contour */
function box(x0: number, y0: number, x1: number, y1: number): number[] {
  return [x0, y0, x1, y0, x1, y1, x0, y1];
}

describe("rasterizeCoverage", () => {
  it("covers whole pixels of an integer rectangle exactly", () => {
    const mask = rasterizeCoverage([box(1, 1, 3, 3)], "nonzero", 5, 5);

    expect(mask.at(1, 1)).toBe(1);
    expect(mask.at(2, 2)).toBe(1);
    expect(mask.at(3, 2)).toBe(0);
    expect(mask.at(2, 3)).toBe(0);
    expect(mask.at(0, 0)).toBe(0);
  });

  it("gives fractional horizontal coverage", () => {
    const mask = rasterizeCoverage([box(0.5, 0, 1.5, 1)], "nonzero", 2, 1);

    expect(mask.at(0, 0)).toBe(0.5);
    expect(mask.at(1, 0)).toBe(0.5);
  });

  it("samples four sub-scanlines per row", () => {
    const mask = rasterizeCoverage([box(0, 0, 1, 0.5)], "nonzero", 1, 1);

    expect(mask.at(0, 0)).toBe(0.5);
  });

  it("applies the fill rule to nested contours", () => {
    const contours = [box(0, 0, 4, 4), box(1, 1, 3, 3)];
    const nonzero = rasterizeCoverage(contours, "nonzero", 4, 4);
    const evenodd = rasterizeCoverage(contours, "evenodd", 4, 4);

    expect(nonzero.at(2, 2)).toBe(1);
    expect(evenodd.at(2, 2)).toBe(0);
    expect(evenodd.at(0, 0)).toBe(1);
  });

  it("treats opposite windings as a hole under nonzero", () => {
    const inner = [1, 1, 1, 3, 3, 3, 3, 1];
    const mask = rasterizeCoverage([box(0, 0, 4, 4), inner], "nonzero", 4, 4);

    expect(mask.at(2, 2)).toBe(0);
    expect(mask.at(0, 2)).toBe(1);
  });

  it("clamps overlapping coverage to 1", () => {
    const mask = rasterizeCoverage([box(0, 0, 2, 2), box(0, 0, 2, 2)], "nonzero", 2, 2);

    expect(mask.at(1, 1)).toBe(1);
  });

  it("ignores geometry outside the target", () => {
    const mask = rasterizeCoverage([box(-5, -5, 1, 1)], "nonzero", 2, 2);

    expect(mask.at(0, 0)).toBe(1);
    expect(mask.at(1, 0)).toBe(0);
    expect(mask.at(0, 1)).toBe(0);
  });

  it("allocates only the pixels the shape reaches", () => {
    const mask = rasterizeCoverage([box(100.5, 200, 103, 204)], "nonzero", 1224, 1584);

    expect(mask.window).toEqual({ x0: 100, y0: 200, x1: 103, y1: 204 });
    expect(mask.data.length).toBe(12);
    expect(mask.at(100, 201)).toBe(0.5);
    expect(mask.at(102, 203)).toBe(1);
  });

  it("clamps the window to the target", () => {
    const mask = rasterizeCoverage([box(-10, -10, 2, 3)], "nonzero", 4, 4);

    expect(mask.window).toEqual({ x0: 0, y0: 0, x1: 2, y1: 3 });
  });

  it("returns an empty mask for degenerate contours", () => {
    const mask = rasterizeCoverage([[0, 0, 4, 0]], "nonzero", 4, 4);

    expect(mask.data.every(value => value === 0)).toBe(true);
  });
});

describe("AlphaMask", () => {
  it("multiplies pixelwise over the overlap of both windows", () => {
    const a = new AlphaMask({ x0: 0, y0: 0, x1: 2, y1: 1 }, new Float32Array([1, 0.5]));
    const b = new AlphaMask({ x0: 1, y0: 0, x1: 3, y1: 1 }, new Float32Array([0.5, 0.5]));
    const product = a.multiply(b);

    expect(product.window).toEqual({ x0: 1, y0: 0, x1: 2, y1: 1 });
    expect([...product.data]).toEqual([0.25]);
  });

  it("multiplies disjoint windows to an empty mask", () => {
    const a = new AlphaMask({ x0: 0, y0: 0, x1: 1, y1: 1 }, new Float32Array([1]));
    const b = new AlphaMask({ x0: 5, y0: 5, x1: 6, y1: 6 }, new Float32Array([1]));

    expect(a.multiply(b).data.length).toBe(0);
  });

  it("reads 0 outside its window", () => {
    const mask = new AlphaMask({ x0: 2, y0: 2, x1: 3, y1: 3 }, new Float32Array([1]));

    expect(mask.at(2, 2)).toBe(1);
    expect(mask.at(3, 3)).toBe(0);
    expect(mask.at(1, 2)).toBe(0);
  });
});
