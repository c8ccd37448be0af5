import { describe, expect, it } from "vitest";
import { TRIANGLE_STRIDE, tessellateFans } from "./tessellator";

describe("tessellateFans", () => {
  it("fans a quad around its first vertex", () => {
    const triangles = tessellateFans([[0, 0, 4, 0, 4, 4, 0, 4]]);

    expect([...triangles]).toEqual([0, 0, 4, 0, 4, 4, 0, 0, 4, 4, 0, 4]);
  });

  it("emits one fan per contour", () => {
    const triangles = tessellateFans([
      [0, 0, 1, 0, 0, 1],
      [5, 5, 6, 5, 6, 6, 5, 6],
    ]);

    expect(triangles.length / TRIANGLE_STRIDE).toBe(3);
  });

  it("drops zero-area triangles", () => {
    // The middle vertex sits on the line from the first to the third
    const triangles = tessellateFans([[0, 0, 2, 0, 4, 0, 4, 4]]);

    expect([...triangles]).toEqual([0, 0, 4, 0, 4, 4]);
  });

  it("skips contours with fewer than three points", () => {
    expect(tessellateFans([[0, 0, 5, 5], []]).length).toBe(0);
  });
});
