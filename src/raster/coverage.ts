/**
 * Anti-aliased polygon coverage.
 *
 * Each pixel row is sampled on four sub-scanlines. Along a sub-scanline
 * the inside spans are computed exactly, so horizontal coverage is
 * fractional rather than sampled.
 */

import { intersectRects, type Rect } from "#src/helpers/matrix";
import type { FillRule } from "#src/scene/path";

export const SUBSCANLINES = 4;

const NO_PIXELS: Rect = { x0: 0, y0: 0, x1: 0, y1: 0 };

/**
 * Per-pixel coverage in the 0-1 range over a window of device pixels.
 * Everything outside the window has zero coverage.
 */
export class AlphaMask {
  readonly data: Float32Array;
  readonly width: number;
  readonly height: number;

  constructor(
    readonly window: Rect,
    data?: Float32Array,
  ) {
    this.width = Math.max(window.x1 - window.x0, 0);
    this.height = Math.max(window.y1 - window.y0, 0);
    this.data = data ?? new Float32Array(this.width * this.height);
  }

  static empty(): AlphaMask {
    return new AlphaMask(NO_PIXELS);
  }

  at(x: number, y: number): number {
    const { x0, y0, x1, y1 } = this.window;

    if (x < x0 || x >= x1 || y < y0 || y >= y1) {
      return 0;
    }

    return this.data[(y - y0) * this.width + (x - x0)] ?? 0;
  }

  /**
   * Pixelwise product over the overlap of both windows: the intersection
   * of two clips.
   */
  multiply(other: AlphaMask): AlphaMask {
    const window = intersectRects(this.window, other.window);

    if (!window) {
      return AlphaMask.empty();
    }

    const out = new AlphaMask(window);

    for (let y = window.y0; y < window.y1; y++) {
      const row = (y - window.y0) * out.width;

      for (let x = window.x0; x < window.x1; x++) {
        out.data[row + x - window.x0] = this.at(x, y) * other.at(x, y);
      }
    }

    return out;
  }
}

interface Edge {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  /** +1 when the edge runs downwards, -1 upwards */
  winding: number;
  /** dx/dy */
  slope: number;
}

function buildEdges(contours: readonly (readonly number[])[]): Edge[] {
  const edges: Edge[] = [];

  for (const points of contours) {
    const count = points.length >> 1;

    if (count < 2) {
      continue;
    }

    for (let i = 0; i < count; i++) {
      const j = (i + 1) % count;
      const xa = points[2 * i];
      const ya = points[2 * i + 1];
      const xb = points[2 * j];
      const yb = points[2 * j + 1];

      if (ya === yb || !Number.isFinite(ya) || !Number.isFinite(yb)) {
        continue;
      }

      if (ya < yb) {
        edges.push({ x0: xa, y0: ya, x1: xb, y1: yb, winding: 1, slope: (xb - xa) / (yb - ya) });
      } else {
        edges.push({ x0: xb, y0: yb, x1: xa, y1: ya, winding: -1, slope: (xa - xb) / (ya - yb) });
      }
    }
  }

  return edges.sort((a, b) => a.y0 - b.y0);
}

/**
 * Add a span of one sub-scanline's weight to a row. Whole pixels go
 * through the difference array, partial pixels straight into `row`.
 */
function addSpan(row: Float32Array, diff: Float32Array, xa: number, xb: number, weight: number): void {
  const width = row.length;
  const left = Math.max(xa, 0);
  const right = Math.min(xb, width);

  if (right <= left) {
    return;
  }

  const ia = Math.floor(left);
  const ib = Math.floor(right);

  if (ia === ib) {
    row[ia] += (right - left) * weight;
    return;
  }

  row[ia] += (ia + 1 - left) * weight;
  diff[ia + 1] += weight;
  diff[ib] -= weight;

  if (ib < width) {
    row[ib] += (right - ib) * weight;
  }
}

/**
 * Pixel window of the edges, clamped to the target.
 */
function edgeWindow(edges: readonly Edge[], width: number, height: number): Rect | null {
  let x0 = Infinity;
  let x1 = -Infinity;
  let y1 = -Infinity;

  for (const edge of edges) {
    x0 = Math.min(x0, edge.x0, edge.x1);
    x1 = Math.max(x1, edge.x0, edge.x1);
    y1 = Math.max(y1, edge.y1);
  }

  return intersectRects(
    { x0: Math.floor(x0), y0: Math.floor(edges[0].y0), x1: Math.ceil(x1), y1: Math.ceil(y1) },
    { x0: 0, y0: 0, x1: width, y1: height },
  );
}

/**
 * Coverage of a polygon set. Contours are flat point lists in device
 * pixels and are implicitly closed. The mask spans only the pixels the
 * contours reach within a `width` by `height` target.
 */
export function rasterizeCoverage(
  contours: readonly (readonly number[])[],
  fillRule: FillRule,
  width: number,
  height: number,
): AlphaMask {
  const edges = buildEdges(contours);
  const window = edges.length > 0 ? edgeWindow(edges, width, height) : null;

  if (!window) {
    return AlphaMask.empty();
  }

  const mask = new AlphaMask(window);
  const { x0: left, y0: top, y1: bottom } = window;
  const row = new Float32Array(mask.width);
  const diff = new Float32Array(mask.width + 1);
  const weight = 1 / SUBSCANLINES;
  const crossings: { x: number; winding: number }[] = [];
  let active: Edge[] = [];
  let next = 0;

  for (let y = top; y < bottom; y++) {
    row.fill(0);
    diff.fill(0);

    for (let s = 0; s < SUBSCANLINES; s++) {
      const sampleY = y + (s + 0.5) / SUBSCANLINES;

      while (next < edges.length && edges[next].y0 <= sampleY) {
        active.push(edges[next]);
        next++;
      }

      active = active.filter(edge => edge.y1 > sampleY);
      crossings.length = 0;

      for (const edge of active) {
        if (edge.y0 <= sampleY) {
          crossings.push({ x: edge.x0 + (sampleY - edge.y0) * edge.slope, winding: edge.winding });
        }
      }

      crossings.sort((a, b) => a.x - b.x);

      let winding = 0;

      for (let i = 0; i < crossings.length - 1; i++) {
        winding += crossings[i].winding;

        const inside = fillRule === "nonzero" ? winding !== 0 : (winding & 1) !== 0;

        if (inside) {
          addSpan(row, diff, crossings[i].x - left, crossings[i + 1].x - left, weight);
        }
      }
    }

    let running = 0;
    const offset = (y - top) * mask.width;

    for (let x = 0; x < mask.width; x++) {
      running += diff[x];
      mask.data[offset + x] = Math.min(row[x] + running, 1);
    }
  }

  return mask;
}
