/**
 * PdfFont - base class for loaded PDF fonts.
 *
 * - SimpleFont: Type1, MMType1, TrueType (single-byte codes)
 * - CompositeFont: Type0 (CMap-decoded codes selecting CIDs)
 * - Type3Font: glyphs are content-stream procedures
 *
 * Simple and composite fonts draw outlines from a font program and share
 * {@link OutlineFont}; Type 3 glyphs are run by the interpreter.
 */

import type { Matrix } from "#src/helpers/matrix";
import type { Path } from "#src/scene/path";
import type { CharCode } from "./cmap";

/** Glyph space (1000 units per em) to text space */
export const GLYPH_SPACE_MATRIX: Matrix = [0.001, 0, 0, 0.001, 0, 0];

export interface Glyph {
  readonly glyphId: number;
  /** Outline in glyph space */
  readonly path: Path;
  /** Advance (w0) of the code that first selected the glyph, 1/1000 em */
  readonly advance: number;
}

/**
 * Vertical-writing metrics of a code, in 1/1000 text space units.
 */
export interface VerticalMetrics {
  /** Vertical displacement (w1y), negative downwards */
  advance: number;
  /** Position vector from the horizontal to the vertical origin */
  originX: number;
  originY: number;
}

export abstract class PdfFont {
  abstract readonly subtype: string;

  constructor(
    /** Identifies the font in glyph cache keys */
    readonly id: number,
    /** Base font name (e.g., "Helvetica", "ABCDEF+Arial-BoldMT") */
    readonly baseFontName: string,
  ) {}

  get fontMatrix(): Matrix {
    return GLYPH_SPACE_MATRIX;
  }

  get vertical(): boolean {
    return false;
  }

  /**
   * Split a show string into character codes.
   */
  abstract decode(bytes: Uint8Array): CharCode[];

  /**
   * Horizontal advance (w0) in 1/1000 text space units.
   */
  abstract width(code: CharCode): number;

  verticalMetrics(code: CharCode): VerticalMetrics {
    return { advance: -1000, originX: this.width(code) / 2, originY: 880 };
  }
}

/**
 * A font whose glyphs are outlines.
 */
export abstract class OutlineFont extends PdfFont {
  /**
   * Glyph id for a code, or undefined when the font has no glyph for it.
   */
  abstract glyphId(code: CharCode): number | undefined;

  /**
   * Outline of a glyph id, or undefined when the program lacks it.
   * `code` is the code that selected the glyph.
   */
  abstract glyphPath(glyphId: number, code: CharCode): Path | undefined;
}

/**
 * Single-byte codes.
 */
export function singleByteCodes(bytes: Uint8Array): CharCode[] {
  return Array.from(bytes, code => ({ code, length: 1 }));
}
