/**
 * Path flattening: transform to device space and replace curves by
 * polylines.
 */

import { type Matrix, transformPoint } from "#src/helpers/matrix";
import type { Path } from "#src/scene/path";

/** Maximum distance between a curve and its polyline, in device pixels */
export const FLATTEN_TOLERANCE = 0.1;

const MAX_CURVE_SEGMENTS = 1000;

/**
 * One subpath as a flat `[x0, y0, x1, y1, ...]` point list.
 */
export interface Polyline {
  points: number[];
  closed: boolean;
}

/**
 * Number of line segments that keep a cubic within `tolerance` of its
 * polyline, from the largest second difference of its control points.
 */
export function curveSegments(
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  x3: number,
  y3: number,
  tolerance = FLATTEN_TOLERANCE,
): number {
  const ddx = Math.max(Math.abs(x0 - 2 * x1 + x2), Math.abs(x1 - 2 * x2 + x3));
  const ddy = Math.max(Math.abs(y0 - 2 * y1 + y2), Math.abs(y1 - 2 * y2 + y3));
  const dd = Math.hypot(ddx, ddy);
  const n = Math.ceil(Math.sqrt((0.75 * dd) / tolerance));

  return Math.min(Math.max(n, 1), MAX_CURVE_SEGMENTS);
}

/**
 * Append the points of a cubic after its start point.
 */
function flattenCubic(
  out: number[],
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  x3: number,
  y3: number,
  tolerance: number,
): void {
  const n = curveSegments(x0, y0, x1, y1, x2, y2, x3, y3, tolerance);

  for (let i = 1; i <= n; i++) {
    const t = i / n;
    const mt = 1 - t;
    const a = mt * mt * mt;
    const b = 3 * mt * mt * t;
    const c = 3 * mt * t * t;
    const d = t * t * t;

    out.push(a * x0 + b * x1 + c * x2 + d * x3, a * y0 + b * y1 + c * y2 + d * y3);
  }
}

/**
 * Flatten a path under a transform. Each moveTo starts a polyline; a
 * close marks it closed and returns to its start.
 */
export function flattenPath(path: Path, transform: Matrix, tolerance = FLATTEN_TOLERANCE): Polyline[] {
  const result: Polyline[] = [];
  let current: Polyline | null = null;
  let startX = 0;
  let startY = 0;
  let lastX = 0;
  let lastY = 0;

  for (const segment of path.segments) {
    switch (segment.kind) {
      case "moveTo": {
        const p = transformPoint(transform, segment.x, segment.y);

        current = { points: [p.x, p.y], closed: false };
        result.push(current);
        startX = lastX = p.x;
        startY = lastY = p.y;
        break;
      }
      case "lineTo": {
        const p = transformPoint(transform, segment.x, segment.y);

        current?.points.push(p.x, p.y);
        lastX = p.x;
        lastY = p.y;
        break;
      }
      case "curveTo": {
        const c1 = transformPoint(transform, segment.x1, segment.y1);
        const c2 = transformPoint(transform, segment.x2, segment.y2);
        const p = transformPoint(transform, segment.x, segment.y);

        if (current) {
          flattenCubic(current.points, lastX, lastY, c1.x, c1.y, c2.x, c2.y, p.x, p.y, tolerance);
        }

        lastX = p.x;
        lastY = p.y;
        break;
      }
      case "close":
        if (current) {
          current.closed = true;
          // Segments after a close start a new subpath at the same point
          current = { points: [startX, startY], closed: false };
          result.push(current);
        }

        lastX = startX;
        lastY = startY;
        break;
    }
  }

  return result.filter(polyline => polyline.points.length > 2 || polyline.closed);
}
