/**
 * TrueType `glyf` outlines.
 *
 * Quadratic contours are converted to cubic path segments in font units.
 * Composite glyphs are resolved recursively with their component
 * transforms applied.
 */

import { type Matrix, multiply } from "#src/helpers/matrix";
import { BinaryScanner } from "#src/io/binary-scanner";
import { type Path, PathBuilder } from "#src/scene/path";

const ON_CURVE = 0x01;
const X_SHORT = 0x02;
const Y_SHORT = 0x04;
const REPEAT = 0x08;
const X_SAME_OR_POSITIVE = 0x10;
const Y_SAME_OR_POSITIVE = 0x20;

const ARG_1_AND_2_ARE_WORDS = 0x0001;
const ARGS_ARE_XY_VALUES = 0x0002;
const WE_HAVE_A_SCALE = 0x0008;
const MORE_COMPONENTS = 0x0020;
const WE_HAVE_AN_X_AND_Y_SCALE = 0x0040;
const WE_HAVE_A_TWO_BY_TWO = 0x0080;

/** Nesting limit for composite glyphs (also breaks reference cycles) */
const MAX_COMPOSITE_DEPTH = 8;

interface Point {
  x: number;
  y: number;
  onCurve: boolean;
}

/**
 * Glyph locations from the `loca` table: glyph `i` occupies
 * `[offsets[i], offsets[i + 1])` of `glyf`.
 */
export function parseLoca(data: Uint8Array, numGlyphs: number, longFormat: boolean): number[] {
  const scanner = new BinaryScanner(data);
  const offsets: number[] = [];
  const available = Math.floor(data.length / (longFormat ? 4 : 2));
  const count = Math.min(numGlyphs + 1, available);

  for (let i = 0; i < count; i++) {
    offsets.push(longFormat ? scanner.readUint32() : scanner.readUint16() * 2);
  }

  return offsets;
}

export class GlyfTable {
  constructor(
    private readonly data: Uint8Array,
    private readonly offsets: number[],
  ) {}

  get glyphCount(): number {
    return Math.max(0, this.offsets.length - 1);
  }

  /**
   * Outline of a glyph in font units. Empty glyphs (spaces) and ids
   * outside the table produce an empty path.
   */
  outline(glyphId: number): Path {
    const builder = new PathBuilder();

    this.appendGlyph(builder, glyphId, [1, 0, 0, 1, 0, 0], 0);

    return builder.build();
  }

  private appendGlyph(builder: PathBuilder, glyphId: number, transform: Matrix, depth: number): void {
    if (depth > MAX_COMPOSITE_DEPTH || glyphId < 0 || glyphId >= this.glyphCount) {
      return;
    }

    const start = this.offsets[glyphId];
    const end = this.offsets[glyphId + 1];

    if (end <= start || end > this.data.length) {
      return;
    }

    const scanner = new BinaryScanner(this.data.subarray(start, end));
    const contourCount = scanner.readInt16();

    scanner.skip(8); // bounding box

    if (contourCount >= 0) {
      for (const contour of readSimpleGlyph(scanner, contourCount)) {
        appendContour(builder, contour, transform);
      }

      return;
    }

    this.appendComposite(builder, scanner, transform, depth);
  }

  private appendComposite(
    builder: PathBuilder,
    scanner: BinaryScanner,
    transform: Matrix,
    depth: number,
  ): void {
    let flags: number;

    do {
      flags = scanner.readUint16();
      const componentId = scanner.readUint16();

      let arg1: number;
      let arg2: number;

      if (flags & ARG_1_AND_2_ARE_WORDS) {
        arg1 = flags & ARGS_ARE_XY_VALUES ? scanner.readInt16() : scanner.readUint16();
        arg2 = flags & ARGS_ARE_XY_VALUES ? scanner.readInt16() : scanner.readUint16();
      } else {
        arg1 = flags & ARGS_ARE_XY_VALUES ? scanner.readInt8() : scanner.readUint8();
        arg2 = flags & ARGS_ARE_XY_VALUES ? scanner.readInt8() : scanner.readUint8();
      }

      let a = 1;
      let b = 0;
      let c = 0;
      let d = 1;

      if (flags & WE_HAVE_A_SCALE) {
        a = d = scanner.readF2Dot14();
      } else if (flags & WE_HAVE_AN_X_AND_Y_SCALE) {
        a = scanner.readF2Dot14();
        d = scanner.readF2Dot14();
      } else if (flags & WE_HAVE_A_TWO_BY_TWO) {
        a = scanner.readF2Dot14();
        b = scanner.readF2Dot14();
        c = scanner.readF2Dot14();
        d = scanner.readF2Dot14();
      }

      // Point-matching placement (args are point indices) is not supported;
      // such components are placed at the origin.
      const dx = flags & ARGS_ARE_XY_VALUES ? arg1 : 0;
      const dy = flags & ARGS_ARE_XY_VALUES ? arg2 : 0;
      const component: Matrix = [a, b, c, d, dx, dy];

      this.appendGlyph(builder, componentId, multiply(component, transform), depth + 1);
    } while (flags & MORE_COMPONENTS);
  }
}

function readSimpleGlyph(scanner: BinaryScanner, contourCount: number): Point[][] {
  const endPoints: number[] = [];

  for (let i = 0; i < contourCount; i++) {
    endPoints.push(scanner.readUint16());
  }

  const pointCount = contourCount === 0 ? 0 : endPoints[contourCount - 1] + 1;

  scanner.skip(scanner.readUint16()); // instructions

  const flags: number[] = [];

  while (flags.length < pointCount) {
    const flag = scanner.readUint8();

    flags.push(flag);

    if (flag & REPEAT) {
      const repeat = scanner.readUint8();

      for (let i = 0; i < repeat && flags.length < pointCount; i++) {
        flags.push(flag);
      }
    }
  }

  const xs = readCoordinates(scanner, flags, X_SHORT, X_SAME_OR_POSITIVE);
  const ys = readCoordinates(scanner, flags, Y_SHORT, Y_SAME_OR_POSITIVE);
  const contours: Point[][] = [];
  let first = 0;

  for (const last of endPoints) {
    const contour: Point[] = [];

    for (let i = first; i <= last && i < pointCount; i++) {
      contour.push({ x: xs[i], y: ys[i], onCurve: (flags[i] & ON_CURVE) !== 0 });
    }

    contours.push(contour);
    first = last + 1;
  }

  return contours;
}

function readCoordinates(
  scanner: BinaryScanner,
  flags: number[],
  shortFlag: number,
  sameFlag: number,
): number[] {
  const values: number[] = [];
  let value = 0;

  for (const flag of flags) {
    if (flag & shortFlag) {
      const delta = scanner.readUint8();

      value += flag & sameFlag ? delta : -delta;
    } else if (!(flag & sameFlag)) {
      value += scanner.readInt16();
    }

    values.push(value);
  }

  return values;
}

/**
 * Convert one quadratic contour. Two consecutive off-curve points imply
 * an on-curve point at their midpoint.
 */
function appendContour(builder: PathBuilder, contour: Point[], m: Matrix): void {
  if (contour.length === 0) {
    return;
  }

  const points = contour.map(p => ({
    x: m[0] * p.x + m[2] * p.y + m[4],
    y: m[1] * p.x + m[3] * p.y + m[5],
    onCurve: p.onCurve,
  }));

  const firstPoint = points[0];
  const lastPoint = points[points.length - 1];
  let start: { x: number; y: number };
  let startIndex: number;

  if (firstPoint.onCurve) {
    start = firstPoint;
    startIndex = 1;
  } else if (lastPoint.onCurve) {
    start = lastPoint;
    startIndex = 0;
  } else {
    start = { x: (firstPoint.x + lastPoint.x) / 2, y: (firstPoint.y + lastPoint.y) / 2 };
    startIndex = 0;
  }

  builder.moveTo(start.x, start.y);

  let control: { x: number; y: number } | null = null;
  const count = firstPoint.onCurve || !lastPoint.onCurve ? points.length : points.length - 1;

  for (let i = startIndex; i < startIndex + count - (firstPoint.onCurve ? 1 : 0); i++) {
    const p = points[i % points.length];

    if (p.onCurve) {
      if (control) {
        builder.quadTo(control.x, control.y, p.x, p.y);
        control = null;
      } else {
        builder.lineTo(p.x, p.y);
      }
    } else {
      if (control) {
        const midX = (control.x + p.x) / 2;
        const midY = (control.y + p.y) / 2;

        builder.quadTo(control.x, control.y, midX, midY);
      }

      control = p;
    }
  }

  if (control) {
    builder.quadTo(control.x, control.y, start.x, start.y);
  }

  builder.close();
}
