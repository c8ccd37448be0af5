/**
 * Display list produced by the interpreter and consumed by the raster
 * backends.
 *
 * Coordinates: each item's `transform` maps its path (or glyph, or unit
 * image square) into scene space, which is the page in points with the
 * origin at the top-left corner of the crop box and y pointing down.
 * Backends scale scene space to pixels.
 */

import type { RGBA } from "#src/helpers/colors";
import type { Matrix } from "#src/helpers/matrix";
import type { Glyph } from "#src/fonts/pdf-font";
import type { FillRule, Path } from "./path";

export type LineCap = "butt" | "round" | "square";
export type LineJoin = "miter" | "round" | "bevel";

export interface DashPattern {
  readonly array: readonly number[];
  readonly phase: number;
}

export interface StrokeStyle {
  /** In user space units; 0 is a one-pixel hairline */
  readonly lineWidth: number;
  readonly lineCap: LineCap;
  readonly lineJoin: LineJoin;
  readonly miterLimit: number;
  readonly dash: DashPattern | null;
}

/**
 * A glyph outline positioned in user space.
 */
export interface PlacedGlyph {
  readonly glyph: Glyph;
  /** Glyph space to user space */
  readonly matrix: Matrix;
}

/**
 * Decoded image pixels, RGBA8 not premultiplied, top row first.
 */
export interface SceneImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

export type SceneItem =
  | { kind: "fill"; path: Path; transform: Matrix; color: RGBA; fillRule: FillRule }
  | { kind: "stroke"; path: Path; transform: Matrix; color: RGBA; style: StrokeStyle }
  | {
      kind: "glyphs";
      glyphs: readonly PlacedGlyph[];
      transform: Matrix;
      color: RGBA;
      /** Outline the glyphs instead of filling them */
      stroke?: StrokeStyle;
    }
  /** Image unit square mapped by `transform`; the top row is at (0, 1) */
  | { kind: "image"; image: SceneImage; transform: Matrix; alpha: number }
  | { kind: "pushClip"; path: Path; transform: Matrix; fillRule: FillRule }
  | { kind: "popClip" };

export interface Scene {
  /** Page size in points, after rotation */
  readonly width: number;
  readonly height: number;
  readonly items: readonly SceneItem[];
}

/**
 * Append-only scene construction.
 *
 * Empty paths and glyph runs are dropped. Clips left open are closed by
 * {@link SceneBuilder.finish}; a `popClip` without a matching push is
 * ignored.
 */
export class SceneBuilder {
  private readonly items: SceneItem[] = [];
  private clipDepth = 0;

  constructor(
    private readonly width: number,
    private readonly height: number,
  ) {}

  get depth(): number {
    return this.clipDepth;
  }

  get length(): number {
    return this.items.length;
  }

  fill(path: Path, transform: Matrix, color: RGBA, fillRule: FillRule): void {
    if (path.isEmpty || color.alpha <= 0) {
      return;
    }

    this.items.push({ kind: "fill", path, transform, color, fillRule });
  }

  stroke(path: Path, transform: Matrix, color: RGBA, style: StrokeStyle): void {
    if (path.segments.length === 0 || color.alpha <= 0) {
      return;
    }

    this.items.push({ kind: "stroke", path, transform, color, style });
  }

  glyphs(glyphs: readonly PlacedGlyph[], transform: Matrix, color: RGBA, stroke?: StrokeStyle): void {
    if (glyphs.length === 0 || color.alpha <= 0) {
      return;
    }

    this.items.push(
      stroke
        ? { kind: "glyphs", glyphs, transform, color, stroke }
        : { kind: "glyphs", glyphs, transform, color },
    );
  }

  image(image: SceneImage, transform: Matrix, alpha: number): void {
    if (image.width === 0 || image.height === 0 || alpha <= 0) {
      return;
    }

    this.items.push({ kind: "image", image, transform, alpha });
  }

  /**
   * An empty clip path is kept: it clips everything.
   */
  pushClip(path: Path, transform: Matrix, fillRule: FillRule): void {
    this.items.push({ kind: "pushClip", path, transform, fillRule });
    this.clipDepth++;
  }

  popClip(): void {
    if (this.clipDepth === 0) {
      return;
    }

    this.items.push({ kind: "popClip" });
    this.clipDepth--;
  }

  finish(): Scene {
    while (this.clipDepth > 0) {
      this.popClip();
    }

    return { width: this.width, height: this.height, items: [...this.items] };
  }
}
