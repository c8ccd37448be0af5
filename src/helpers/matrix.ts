/**
 * Affine transforms in PDF row-vector convention.
 *
 * A matrix `[a b c d e f]` maps a point as
 * `x' = a·x + c·y + e`, `y' = b·x + d·y + f`.
 * `multiply(m, n)` applies `m` first, then `n` (PDF writes this `m × n`).
 */
export type Matrix = readonly [number, number, number, number, number, number];

export const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export function multiply(m: Matrix, n: Matrix): Matrix {
  return [
    m[0] * n[0] + m[1] * n[2],
    m[0] * n[1] + m[1] * n[3],
    m[2] * n[0] + m[3] * n[2],
    m[2] * n[1] + m[3] * n[3],
    m[4] * n[0] + m[5] * n[2] + n[4],
    m[4] * n[1] + m[5] * n[3] + n[5],
  ];
}

export function translate(tx: number, ty: number): Matrix {
  return [1, 0, 0, 1, tx, ty];
}

export function scale(sx: number, sy: number = sx): Matrix {
  return [sx, 0, 0, sy, 0, 0];
}

export function transformPoint(m: Matrix, x: number, y: number): Point {
  return { x: m[0] * x + m[2] * y + m[4], y: m[1] * x + m[3] * y + m[5] };
}

export function determinant(m: Matrix): number {
  return m[0] * m[3] - m[1] * m[2];
}

/**
 * Inverse transform, or null for a singular matrix.
 */
export function invert(m: Matrix): Matrix | null {
  const det = determinant(m);

  if (Math.abs(det) < 1e-12) {
    return null;
  }

  return [
    m[3] / det,
    -m[1] / det,
    -m[2] / det,
    m[0] / det,
    (m[2] * m[5] - m[3] * m[4]) / det,
    (m[1] * m[4] - m[0] * m[5]) / det,
  ];
}

/**
 * Geometric mean of the axis scale factors; used to convert user-space
 * lengths (line widths, flatness) to device pixels.
 */
export function meanScale(m: Matrix): number {
  return Math.sqrt(Math.abs(determinant(m)));
}

/**
 * Axis-aligned bounds of a rectangle after transformation.
 */
export function transformRect(m: Matrix, rect: Rect): Rect {
  const corners = [
    transformPoint(m, rect.x0, rect.y0),
    transformPoint(m, rect.x1, rect.y0),
    transformPoint(m, rect.x0, rect.y1),
    transformPoint(m, rect.x1, rect.y1),
  ];

  return {
    x0: Math.min(...corners.map(p => p.x)),
    y0: Math.min(...corners.map(p => p.y)),
    x1: Math.max(...corners.map(p => p.x)),
    y1: Math.max(...corners.map(p => p.y)),
  };
}

/**
 * Normalize a rectangle so that x0 <= x1 and y0 <= y1.
 */
export function normalizeRect(x0: number, y0: number, x1: number, y1: number): Rect {
  return {
    x0: Math.min(x0, x1),
    y0: Math.min(y0, y1),
    x1: Math.max(x0, x1),
    y1: Math.max(y0, y1),
  };
}

export function intersectRects(a: Rect, b: Rect): Rect | null {
  const x0 = Math.max(a.x0, b.x0);
  const y0 = Math.max(a.y0, b.y0);
  const x1 = Math.min(a.x1, b.x1);
  const y1 = Math.min(a.y1, b.y1);

  if (x1 <= x0 || y1 <= y0) {
    return null;
  }

  return { x0, y0, x1, y1 };
}
