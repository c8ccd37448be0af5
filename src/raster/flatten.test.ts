import { describe, expect, it } from "vitest";
import { IDENTITY, scale } from "#src/helpers/matrix";
import { Path, PathBuilder } from "#src/scene/path";
import { curveSegments, FLATTEN_TOLERANCE, flattenPath } from "./flatten";

/** Control point offset of a cubic approximating a quarter circle */
const KAPPA = 0.5522847498;

describe("flattenPath", () => {
  it("transforms line segments and marks closed subpaths", () => {
    const polylines = flattenPath(Path.rect(1, 1, 2, 2), scale(2));

    expect(polylines).toEqual([{ points: [2, 2, 6, 2, 6, 6, 2, 6], closed: true }]);
  });

  it("keeps open subpaths open", () => {
    const builder = new PathBuilder().moveTo(0, 0);

    builder.lineTo(10, 0);

    expect(flattenPath(builder.build(), IDENTITY)).toEqual([{ points: [0, 0, 10, 0], closed: false }]);
  });

  it("drops lone move-tos", () => {
    const path = new PathBuilder().moveTo(5, 5).moveTo(1, 1).build();

    expect(flattenPath(path, IDENTITY)).toEqual([]);
  });

  it("continues from the start point after a close", () => {
    const builder = new PathBuilder().moveTo(0, 0);

    builder.lineTo(4, 0);
    builder.lineTo(4, 4);
    builder.close();
    builder.lineTo(0, 4);

    const polylines = flattenPath(builder.build(), IDENTITY);

    expect(polylines).toEqual([
      { points: [0, 0, 4, 0, 4, 4], closed: true },
      { points: [0, 0, 0, 4], closed: false },
    ]);
  });

  it("keeps curves within the tolerance", () => {
    const builder = new PathBuilder().moveTo(100, 0);

    builder.curveTo(100, 100 * KAPPA, 100 * KAPPA, 100, 0, 100);

    const [polyline] = flattenPath(builder.build(), IDENTITY);
    const points = polyline.points;

    expect(points.slice(0, 2)).toEqual([100, 0]);
    expect(points.slice(-2)).toEqual([0, 100]);
    expect(points.length / 2).toBeGreaterThan(10);

    for (let i = 0; i + 3 < points.length; i += 2) {
      const midX = (points[i] + points[i + 2]) / 2;
      const midY = (points[i + 1] + points[i + 3]) / 2;

      expect(Math.abs(Math.hypot(midX, midY) - 100)).toBeLessThan(0.2);
    }
  });
});

describe("curveSegments", () => {
  it("uses one segment for a straight cubic", () => {
    expect(curveSegments(0, 0, 1, 0, 2, 0, 3, 0)).toBe(1);
  });

  it("needs more segments at a finer tolerance", () => {
    expect(curveSegments(0, 0, 0, 50, 50, 50, 50, 0, FLATTEN_TOLERANCE)).toBe(24);
    expect(curveSegments(0, 0, 0, 50, 50, 50, 50, 0, FLATTEN_TOLERANCE / 4)).toBe(47);
  });
});
