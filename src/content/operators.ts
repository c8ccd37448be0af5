/**
 * Content stream operations.
 *
 * The parser turns each operator and its operands into one variant of
 * {@link ContentOp}, with operands checked and converted up front. The
 * interpreter switches over `kind` exhaustively.
 */

import type { Matrix } from "#src/helpers/matrix";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { FillRule } from "#src/scene/path";

export type PaintTarget = "fill" | "stroke";

export type DeviceSpaceName = "DeviceGray" | "DeviceRGB" | "DeviceCMYK";

/** One element of a TJ array: a string to show, or a position adjustment */
export type TextArrayItem = Uint8Array | number;

export type ContentOpBody =
  // General graphics state
  | { kind: "save" }
  | { kind: "restore" }
  | { kind: "transform"; matrix: Matrix }
  | { kind: "lineWidth"; width: number }
  | { kind: "lineCap"; cap: number }
  | { kind: "lineJoin"; join: number }
  | { kind: "miterLimit"; limit: number }
  | { kind: "dash"; array: number[]; phase: number }
  | { kind: "renderingIntent"; intent: string }
  | { kind: "flatness"; tolerance: number }
  | { kind: "extGState"; name: string }
  // Path construction
  | { kind: "moveTo"; x: number; y: number }
  | { kind: "lineTo"; x: number; y: number }
  | { kind: "curveTo"; x1: number; y1: number; x2: number; y2: number; x3: number; y3: number }
  /** `v`: first control point is the current point */
  | { kind: "curveToInitial"; x2: number; y2: number; x3: number; y3: number }
  /** `y`: second control point is the end point */
  | { kind: "curveToFinal"; x1: number; y1: number; x3: number; y3: number }
  | { kind: "closePath" }
  | { kind: "rect"; x: number; y: number; width: number; height: number }
  // Painting and clipping
  | { kind: "paint"; close: boolean; fill: FillRule | null; stroke: boolean }
  | { kind: "clip"; rule: FillRule }
  // Text
  | { kind: "beginText" }
  | { kind: "endText" }
  | { kind: "charSpacing"; spacing: number }
  | { kind: "wordSpacing"; spacing: number }
  | { kind: "horizontalScaling"; percent: number }
  | { kind: "leading"; leading: number }
  | { kind: "font"; name: string; size: number }
  | { kind: "renderMode"; mode: number }
  | { kind: "rise"; rise: number }
  | { kind: "moveText"; tx: number; ty: number; setLeading: boolean }
  | { kind: "textMatrix"; matrix: Matrix }
  | { kind: "nextLine" }
  | { kind: "showText"; text: Uint8Array }
  | { kind: "showTextArray"; items: TextArrayItem[] }
  /** `'` and `"`; the latter also sets word and character spacing */
  | { kind: "nextLineShowText"; text: Uint8Array; wordSpacing?: number; charSpacing?: number }
  // Type 3 glyph metrics
  | { kind: "glyphWidth"; wx: number; wy: number }
  | { kind: "glyphWidthAndBounds"; wx: number; wy: number; bbox: [number, number, number, number] }
  // Colour
  | { kind: "colorSpace"; target: PaintTarget; name: string }
  | { kind: "color"; target: PaintTarget; components: number[]; pattern?: string }
  | { kind: "deviceColor"; target: PaintTarget; space: DeviceSpaceName; components: number[] }
  // External objects, images and shadings
  | { kind: "xObject"; name: string }
  | { kind: "inlineImage"; dict: PdfDict; data: Uint8Array }
  | { kind: "shading"; name: string }
  // Marked content and compatibility sections: accepted, no effect
  | { kind: "markedContent"; tag: string }
  | { kind: "compatibility"; begin: boolean }
  // Problems
  | { kind: "invalid"; message: string }
  | { kind: "unknown" };

export type ContentOp = ContentOpBody & {
  /** Operator as written, e.g. `re` or `TJ` */
  operator: string;
  /** Byte offset of the operator */
  position: number;
};
