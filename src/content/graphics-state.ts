/**
 * Graphics state and its save/restore stack.
 */

import type { Matrix, Rect } from "#src/helpers/matrix";
import type { PdfFont } from "#src/fonts/pdf-font";
import type { DashPattern, LineCap, LineJoin, StrokeStyle } from "#src/scene/scene";
import type { PdfObject } from "#src/objects/pdf-object";
import { type ColorSpace, DEVICE_GRAY } from "./color-space";

/**
 * Current colour for filling or stroking.
 */
export interface PaintState {
  space: ColorSpace;
  components: number[];
  /** Pattern resource selected with `scn /Name` in a Pattern space */
  pattern?: { name: string; object: PdfObject };
}

export interface TextState {
  font: PdfFont | null;
  fontSize: number;
  charSpacing: number;
  wordSpacing: number;
  /** Th as a fraction, 1 = 100% */
  horizontalScaling: number;
  leading: number;
  rise: number;
  renderMode: number;
}

export interface GraphicsState {
  ctm: Matrix;
  /** Scene clips in effect; restoring pops back to the saved depth */
  clipDepth: number;
  /** Scene-space bounds of the clip; null once the clip is empty */
  clipBounds: Rect | null;
  fill: PaintState;
  stroke: PaintState;
  lineWidth: number;
  lineCap: LineCap;
  lineJoin: LineJoin;
  miterLimit: number;
  dash: DashPattern | null;
  fillAlpha: number;
  strokeAlpha: number;
  blendMode: string;
  text: TextState;
}

export const LINE_CAPS: readonly LineCap[] = ["butt", "round", "square"];
export const LINE_JOINS: readonly LineJoin[] = ["miter", "round", "bevel"];

export function initialGraphicsState(ctm: Matrix, clipBounds: Rect | null): GraphicsState {
  return {
    ctm,
    clipDepth: 0,
    clipBounds,
    fill: { space: DEVICE_GRAY, components: [0] },
    stroke: { space: DEVICE_GRAY, components: [0] },
    lineWidth: 1,
    lineCap: "butt",
    lineJoin: "miter",
    miterLimit: 10,
    dash: null,
    fillAlpha: 1,
    strokeAlpha: 1,
    blendMode: "Normal",
    text: {
      font: null,
      fontSize: 0,
      charSpacing: 0,
      wordSpacing: 0,
      horizontalScaling: 1,
      leading: 0,
      rise: 0,
      renderMode: 0,
    },
  };
}

export function cloneGraphicsState(state: GraphicsState): GraphicsState {
  return {
    ...state,
    fill: { ...state.fill, components: [...state.fill.components] },
    stroke: { ...state.stroke, components: [...state.stroke.components] },
    text: { ...state.text },
  };
}

export function strokeStyle(state: GraphicsState): StrokeStyle {
  return {
    lineWidth: state.lineWidth,
    lineCap: state.lineCap,
    lineJoin: state.lineJoin,
    miterLimit: state.miterLimit,
    dash: state.dash,
  };
}

/**
 * The `q`/`Q` stack.
 */
export class GraphicsStateStack {
  private readonly saved: GraphicsState[] = [];

  current: GraphicsState;

  constructor(initial: GraphicsState) {
    this.current = initial;
  }

  get depth(): number {
    return this.saved.length;
  }

  save(): void {
    this.saved.push(cloneGraphicsState(this.current));
  }

  /**
   * Restore the last saved state. Returns the state being discarded, or
   * null when nothing was saved.
   */
  restore(): GraphicsState | null {
    const previous = this.saved.pop();

    if (!previous) {
      return null;
    }

    const discarded = this.current;

    this.current = previous;

    return discarded;
  }
}
