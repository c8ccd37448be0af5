import { describe, expect, it } from "vitest";
import { IDENTITY, invert, multiply, transformPoint, transformRect, translate } from "./matrix";

describe("matrix", () => {
  it("applies the left operand first", () => {
    // scale by 2, then translate by (10, 0)
    const m = multiply([2, 0, 0, 2, 0, 0], translate(10, 0));

    expect(transformPoint(m, 1, 1)).toEqual({ x: 12, y: 2 });
  });

  it("composes in the opposite order when swapped", () => {
    const m = multiply(translate(10, 0), [2, 0, 0, 2, 0, 0]);

    expect(transformPoint(m, 1, 1)).toEqual({ x: 22, y: 2 });
  });

  it("leaves points unchanged under identity", () => {
    expect(transformPoint(IDENTITY, 3, -4)).toEqual({ x: 3, y: -4 });
  });

  it("inverts a transform", () => {
    const m: [number, number, number, number, number, number] = [2, 0, 0, 4, 5, 6];
    const inv = invert(m);

    expect(inv).not.toBeNull();

    if (inv) {
      const q = transformPoint(m, 7, 9);
      const p = transformPoint(inv, q.x, q.y);
      expect(p.x).toBeCloseTo(7);
      expect(p.y).toBeCloseTo(9);
    }
  });

  it("returns null for singular matrices", () => {
    expect(invert([0, 0, 0, 0, 1, 1])).toBeNull();
  });

  it("computes bounds of a rotated rectangle", () => {
    const rotate90: [number, number, number, number, number, number] = [0, 1, -1, 0, 0, 0];
    const r = transformRect(rotate90, { x0: 0, y0: 1, x1: 10, y1: 5 });

    expect(r).toEqual({ x0: -5, y0: 0, x1: -1, y1: 10 });
  });
});
