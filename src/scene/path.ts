/**
 * Vector paths in user space.
 *
 * A path is an immutable list of segments; every `moveTo` starts a new
 * subpath. Paths are built with {@link PathBuilder} and never mutated
 * afterwards, so scene items and cached glyphs can share them.
 */

import { type Matrix, type Rect, transformPoint } from "#src/helpers/matrix";

export type PathSegment =
  | { kind: "moveTo"; x: number; y: number }
  | { kind: "lineTo"; x: number; y: number }
  | { kind: "curveTo"; x1: number; y1: number; x2: number; y2: number; x: number; y: number }
  | { kind: "close" };

export type FillRule = "nonzero" | "evenodd";

export class Path {
  static readonly EMPTY = new Path([]);

  readonly segments: readonly PathSegment[];

  constructor(segments: readonly PathSegment[]) {
    this.segments = segments;
  }

  /**
   * True when the path contains no line or curve segments.
   */
  get isEmpty(): boolean {
    return !this.segments.some(s => s.kind === "lineTo" || s.kind === "curveTo");
  }

  transform(m: Matrix): Path {
    return new Path(
      this.segments.map((s): PathSegment => {
        switch (s.kind) {
          case "moveTo":
          case "lineTo": {
            const p = transformPoint(m, s.x, s.y);

            return { kind: s.kind, x: p.x, y: p.y };
          }
          case "curveTo": {
            const c1 = transformPoint(m, s.x1, s.y1);
            const c2 = transformPoint(m, s.x2, s.y2);
            const p = transformPoint(m, s.x, s.y);

            return { kind: "curveTo", x1: c1.x, y1: c1.y, x2: c2.x, y2: c2.y, x: p.x, y: p.y };
          }
          case "close":
            return s;
        }
      }),
    );
  }

  /**
   * Append the segments of another path.
   */
  concat(other: Path): Path {
    if (other.segments.length === 0) {
      return this;
    }

    return new Path([...this.segments, ...other.segments]);
  }

  /**
   * Control-point bounds (a superset of the exact curve bounds), or null
   * for a path without points.
   */
  bounds(): Rect | null {
    let x0 = Infinity;
    let y0 = Infinity;
    let x1 = -Infinity;
    let y1 = -Infinity;

    const add = (x: number, y: number) => {
      x0 = Math.min(x0, x);
      y0 = Math.min(y0, y);
      x1 = Math.max(x1, x);
      y1 = Math.max(y1, y);
    };

    for (const s of this.segments) {
      if (s.kind === "close") {
        continue;
      }

      if (s.kind === "curveTo") {
        add(s.x1, s.y1);
        add(s.x2, s.y2);
      }

      add(s.x, s.y);
    }

    return x0 <= x1 ? { x0, y0, x1, y1 } : null;
  }

  static rect(x: number, y: number, width: number, height: number): Path {
    return new PathBuilder().rect(x, y, width, height).build();
  }
}

/**
 * Incremental path construction with PDF current-point rules.
 */
export class PathBuilder {
  private segments: PathSegment[] = [];
  private current: { x: number; y: number } | null = null;
  private start: { x: number; y: number } | null = null;

  get currentPoint(): { x: number; y: number } | null {
    return this.current;
  }

  get isEmpty(): boolean {
    return this.segments.length === 0;
  }

  moveTo(x: number, y: number): this {
    this.segments.push({ kind: "moveTo", x, y });
    this.current = { x, y };
    this.start = { x, y };

    return this;
  }

  /**
   * Returns false (and adds nothing) when there is no current point.
   */
  lineTo(x: number, y: number): boolean {
    if (!this.current) {
      return false;
    }

    this.segments.push({ kind: "lineTo", x, y });
    this.current = { x, y };

    return true;
  }

  curveTo(x1: number, y1: number, x2: number, y2: number, x: number, y: number): boolean {
    if (!this.current) {
      return false;
    }

    this.segments.push({ kind: "curveTo", x1, y1, x2, y2, x, y });
    this.current = { x, y };

    return true;
  }

  /**
   * Quadratic Bézier, stored as the equivalent cubic.
   */
  quadTo(cx: number, cy: number, x: number, y: number): boolean {
    const from = this.current;

    if (!from) {
      return false;
    }

    return this.curveTo(
      from.x + (2 / 3) * (cx - from.x),
      from.y + (2 / 3) * (cy - from.y),
      x + (2 / 3) * (cx - x),
      y + (2 / 3) * (cy - y),
      x,
      y,
    );
  }

  close(): this {
    if (this.start) {
      this.segments.push({ kind: "close" });
      this.current = { ...this.start };
    }

    return this;
  }

  rect(x: number, y: number, width: number, height: number): this {
    this.moveTo(x, y);
    this.lineTo(x + width, y);
    this.lineTo(x + width, y + height);
    this.lineTo(x, y + height);

    return this.close();
  }

  /**
   * Append every segment of a finished path.
   */
  append(path: Path): this {
    for (const s of path.segments) {
      switch (s.kind) {
        case "moveTo":
          this.moveTo(s.x, s.y);
          break;
        case "lineTo":
          this.lineTo(s.x, s.y);
          break;
        case "curveTo":
          this.curveTo(s.x1, s.y1, s.x2, s.y2, s.x, s.y);
          break;
        case "close":
          this.close();
          break;
      }
    }

    return this;
  }

  build(): Path {
    return new Path([...this.segments]);
  }

  /**
   * Return the built path and start over with no current point.
   */
  take(): Path {
    const path = new Path(this.segments);

    this.segments = [];
    this.current = null;
    this.start = null;

    return path;
  }
}
