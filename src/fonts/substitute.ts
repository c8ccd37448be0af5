/**
 * The built-in substitute glyph: a hollow box filling the advance.
 */

import { Path, PathBuilder } from "#src/scene/path";

const BOX_TOP = 700;
const STROKE = 40;

/**
 * Box outline for a glyph of the given advance (glyph space). Blank
 * characters draw nothing.
 */
export function boxGlyph(advance: number, blank: boolean): Path {
  const margin = Math.min(50, advance / 10);
  const x0 = margin;
  const x1 = advance - margin;

  if (blank || x1 - x0 <= STROKE * 2) {
    return Path.EMPTY;
  }

  const inset = { x0: x0 + STROKE, y0: STROKE, x1: x1 - STROKE, y1: BOX_TOP - STROKE };
  const builder = new PathBuilder().rect(x0, 0, x1 - x0, BOX_TOP);

  // Inner contour runs the other way, so nonzero filling leaves a frame
  builder.moveTo(inset.x0, inset.y0);
  builder.lineTo(inset.x0, inset.y1);
  builder.lineTo(inset.x1, inset.y1);
  builder.lineTo(inset.x1, inset.y0);

  return builder.close().build();
}

/**
 * Whitespace code points draw nothing in the substitute font.
 */
export function isBlank(codePoint: number | undefined): boolean {
  return codePoint !== undefined && /\s/u.test(String.fromCodePoint(codePoint));
}
