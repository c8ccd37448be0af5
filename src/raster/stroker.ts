/**
 * Stroke-to-fill conversion.
 *
 * The flattened path is mapped back into user space, where the pen is
 * round, outlined there, and the outline mapped to device space. Every
 * piece (segment body, join, cap) is emitted as its own polygon with
 * positive orientation, so filling the set with the nonzero rule gives
 * their union.
 */

import { invert, type Matrix, meanScale, type Point, transformPoint } from "#src/helpers/matrix";
import type { Path } from "#src/scene/path";
import type { DashPattern, StrokeStyle } from "#src/scene/scene";
import { FLATTEN_TOLERANCE, flattenPath, type Polyline } from "./flatten";

/** Width in device pixels of a zero-width line */
const HAIRLINE_WIDTH = 1;

const MAX_DASH_SEGMENTS = 100_000;

type Polygon = number[];

interface PenPath {
  points: Point[];
  closed: boolean;
}

function signedArea(polygon: Polygon): number {
  let area = 0;
  const n = polygon.length >> 1;

  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;

    area += polygon[2 * i] * polygon[2 * j + 1] - polygon[2 * j] * polygon[2 * i + 1];
  }

  return area / 2;
}

/** The polygon with positive orientation */
function oriented(polygon: Polygon): Polygon {
  if (signedArea(polygon) >= 0) {
    return polygon;
  }

  const reversed: Polygon = [];

  for (let i = polygon.length - 2; i >= 0; i -= 2) {
    reversed.push(polygon[i], polygon[i + 1]);
  }

  return reversed;
}

function toPoints(flat: readonly number[]): Point[] {
  const points: Point[] = [];

  for (let i = 0; i + 1 < flat.length; i += 2) {
    points.push({ x: flat[i], y: flat[i + 1] });
  }

  return points;
}

/** Repeated points carry no direction */
function withoutRepeats(points: readonly Point[]): Point[] {
  return points.filter((p, i) => i === 0 || p.x !== points[i - 1].x || p.y !== points[i - 1].y);
}

/**
 * Outline builder for one pen width in one coordinate space.
 */
class Outliner {
  readonly polygons: Polygon[] = [];

  constructor(
    private readonly halfWidth: number,
    private readonly style: StrokeStyle,
    /** Line segments per full circle for round joins and caps */
    private readonly circleSegments: number,
  ) {}

  private emit(points: readonly Point[]): void {
    const polygon: Polygon = [];

    for (const p of points) {
      polygon.push(p.x, p.y);
    }

    if (Math.abs(signedArea(polygon)) > 0) {
      this.polygons.push(oriented(polygon));
    }
  }

  private normal(a: Point, b: Point): Point {
    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const length = Math.hypot(dx, dy);

    return { x: (-dy / length) * this.halfWidth, y: (dx / length) * this.halfWidth };
  }

  circle(center: Point): void {
    const points: Point[] = [];

    for (let i = 0; i < this.circleSegments; i++) {
      const angle = (2 * Math.PI * i) / this.circleSegments;

      points.push({
        x: center.x + Math.cos(angle) * this.halfWidth,
        y: center.y + Math.sin(angle) * this.halfWidth,
      });
    }

    this.emit(points);
  }

  private segment(a: Point, b: Point): void {
    const n = this.normal(a, b);

    this.emit([
      { x: a.x + n.x, y: a.y + n.y },
      { x: b.x + n.x, y: b.y + n.y },
      { x: b.x - n.x, y: b.y - n.y },
      { x: a.x - n.x, y: a.y - n.y },
    ]);
  }

  /**
   * Join at `p` between the segment arriving from `a` and the one leaving
   * to `b`.
   */
  private join(a: Point, p: Point, b: Point): void {
    const n0 = this.normal(a, p);
    const n1 = this.normal(p, b);
    const cross = n0.x * n1.y - n0.y * n1.x;

    if (Math.abs(cross) < 1e-12 && n0.x * n1.x + n0.y * n1.y > 0) {
      return;
    }

    if (this.style.lineJoin === "round") {
      this.circle(p);
      return;
    }

    // Outer side of the turn
    const sign = cross > 0 ? -1 : 1;
    const o0 = { x: p.x + sign * n0.x, y: p.y + sign * n0.y };
    const o1 = { x: p.x + sign * n1.x, y: p.y + sign * n1.y };

    if (this.style.lineJoin === "miter") {
      const dot = (n0.x * n1.x + n0.y * n1.y) / (this.halfWidth * this.halfWidth);
      const cosHalf = Math.sqrt(Math.max((1 + dot) / 2, 0));

      // Miter length over line width is 1 / sin(φ/2) = 1 / cos(half the turn)
      if (cosHalf > 1e-12 && 1 / cosHalf <= this.style.miterLimit) {
        const mx = n0.x + n1.x;
        const my = n0.y + n1.y;
        const scale = this.halfWidth / cosHalf / Math.hypot(mx, my);
        const tip = { x: p.x + sign * mx * scale, y: p.y + sign * my * scale };

        this.emit([p, o0, tip, o1]);
        return;
      }
    }

    this.emit([p, o0, o1]);
  }

  private cap(end: Point, from: Point): void {
    switch (this.style.lineCap) {
      case "butt":
        return;
      case "round":
        this.circle(end);
        return;
      case "square": {
        const n = this.normal(from, end);
        // Direction along the line, half a width long
        const d = { x: n.y, y: -n.x };

        this.emit([
          { x: end.x + n.x, y: end.y + n.y },
          { x: end.x + n.x + d.x, y: end.y + n.y + d.y },
          { x: end.x - n.x + d.x, y: end.y - n.y + d.y },
          { x: end.x - n.x, y: end.y - n.y },
        ]);
      }
    }
  }

  /**
   * A subpath that never moves: round caps give a dot, square caps an
   * axis-aligned square, butt caps nothing.
   */
  private dot(p: Point): void {
    const h = this.halfWidth;

    if (this.style.lineCap === "round") {
      this.circle(p);
    } else if (this.style.lineCap === "square") {
      this.emit([
        { x: p.x - h, y: p.y - h },
        { x: p.x + h, y: p.y - h },
        { x: p.x + h, y: p.y + h },
        { x: p.x - h, y: p.y + h },
      ]);
    }
  }

  polyline(path: PenPath): void {
    const points = withoutRepeats(path.points);
    const first = points[0];
    const last = points[points.length - 1];
    const closed = path.closed;

    if (!first) {
      return;
    }

    if (points.length === 1) {
      this.dot(first);
      return;
    }

    const ring = closed && (first.x !== last.x || first.y !== last.y) ? [...points, first] : points;

    for (let i = 0; i + 1 < ring.length; i++) {
      this.segment(ring[i], ring[i + 1]);
    }

    for (let i = 1; i + 1 < ring.length; i++) {
      this.join(ring[i - 1], ring[i], ring[i + 1]);
    }

    if (closed) {
      if (ring.length > 2) {
        this.join(ring[ring.length - 2], first, ring[1]);
      }
    } else {
      this.cap(first, ring[1]);
      this.cap(ring[ring.length - 1], ring[ring.length - 2]);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Dashing
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Split polylines into their dash-on pieces. The dash state restarts at
 * every subpath.
 */
export function applyDash(polylines: readonly PenPath[], dash: DashPattern): PenPath[] {
  const total = dash.array.reduce((sum, n) => sum + n, 0);
  const pieces: PenPath[] = [];

  if (total <= 0) {
    return [...polylines];
  }

  for (const polyline of polylines) {
    const points = withoutRepeats(
      polyline.closed && polyline.points.length > 1 ? [...polyline.points, polyline.points[0]] : polyline.points,
    );

    if (points.length < 2) {
      continue;
    }

    // Position within the pattern
    let index = 0;
    let remaining = dash.array[0];
    let phase = ((dash.phase % total) + total) % total;

    while (phase > 0) {
      if (phase >= remaining) {
        phase -= remaining;
        index = (index + 1) % dash.array.length;
        remaining = dash.array[index];
      } else {
        remaining -= phase;
        phase = 0;
      }
    }

    let on = index % 2 === 0;
    let current: Point[] | null = on ? [points[0]] : null;
    let emitted = 0;

    for (let i = 0; i + 1 < points.length && emitted < MAX_DASH_SEGMENTS; i++) {
      const a = points[i];
      const b = points[i + 1];
      const length = Math.hypot(b.x - a.x, b.y - a.y);
      let travelled = 0;

      while (length - travelled > remaining && emitted < MAX_DASH_SEGMENTS) {
        travelled += remaining;

        const t = travelled / length;
        const p = { x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t };

        if (on && current) {
          current.push(p);
          pieces.push({ points: current, closed: false });
          current = null;
          emitted++;
        } else {
          current = [p];
        }

        on = !on;
        index = (index + 1) % dash.array.length;
        remaining = dash.array[index];
      }

      remaining -= length - travelled;

      if (on && current) {
        current.push(b);
      }
    }

    if (on && current && current.length > 1) {
      pieces.push({ points: current, closed: false });
    }
  }

  return pieces;
}

// ─────────────────────────────────────────────────────────────────────────────
// Entry point
// ─────────────────────────────────────────────────────────────────────────────

function circleSegments(deviceRadius: number): number {
  if (deviceRadius <= FLATTEN_TOLERANCE) {
    return 8;
  }

  const step = 2 * Math.acos(1 - FLATTEN_TOLERANCE / deviceRadius);

  return Math.min(Math.max(Math.ceil((2 * Math.PI) / step), 8), 256);
}

/**
 * Outline a stroked path as device-space polygons to fill with the
 * nonzero rule.
 *
 * @param transform - User space to device pixels
 */
export function strokeToPolygons(path: Path, transform: Matrix, style: StrokeStyle): number[][] {
  const device = flattenPath(path, transform);
  const inverse = invert(transform);
  const hairline = style.lineWidth === 0 || !inverse;

  // Hairlines are outlined directly in device space
  const toPen = hairline ? null : inverse;
  const halfWidth = hairline ? HAIRLINE_WIDTH / 2 : style.lineWidth / 2;
  const deviceRadius = hairline ? halfWidth : halfWidth * meanScale(transform);

  let polylines = device.map((polyline: Polyline): PenPath => {
    const points = toPoints(polyline.points).map(p => (toPen ? transformPoint(toPen, p.x, p.y) : p));

    return { points, closed: polyline.closed };
  });

  if (style.dash) {
    // Hairline dashes are measured in device space
    const factor = toPen ? 1 : meanScale(transform);
    const dash =
      factor === 1
        ? style.dash
        : { array: style.dash.array.map(n => n * factor), phase: style.dash.phase * factor };

    polylines = applyDash(polylines, dash);
  }

  const outliner = new Outliner(halfWidth, style, circleSegments(deviceRadius));

  for (const polyline of polylines) {
    outliner.polyline(polyline);
  }

  if (!toPen) {
    return outliner.polygons;
  }

  return outliner.polygons.map(polygon => {
    const mapped: number[] = [];

    for (let i = 0; i < polygon.length; i += 2) {
      const p = transformPoint(transform, polygon[i], polygon[i + 1]);

      mapped.push(p.x, p.y);
    }

    return mapped;
  });
}
