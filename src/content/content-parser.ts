/**
 * Content stream parser.
 *
 * Reads a decoded content stream into {@link ContentOp}s. Operands are
 * collected until an operator keyword arrives; the operator's decoder
 * then checks and converts them. Nothing here throws: bad operands give
 * an `invalid` op and unrecognised keywords an `unknown` op.
 */

import { isWhitespace } from "#src/helpers/chars";
import type { Matrix } from "#src/helpers/matrix";
import { Scanner } from "#src/io/scanner";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfBool } from "#src/objects/pdf-bool";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNull } from "#src/objects/pdf-null";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfString } from "#src/objects/pdf-string";
import type { Token } from "#src/parser/token";
import { TokenReader } from "#src/parser/token-reader";
import type { ContentOp, ContentOpBody, PaintTarget, TextArrayItem } from "./operators";

const MAX_NESTING = 64;

/** Inline image keys and their full names */
const INLINE_IMAGE_KEYS: Record<string, string> = {
  BPC: "BitsPerComponent",
  CS: "ColorSpace",
  D: "Decode",
  DP: "DecodeParms",
  F: "Filter",
  H: "Height",
  IM: "ImageMask",
  I: "Interpolate",
  W: "Width",
  L: "Length",
};

const INLINE_COLOR_SPACES: Record<string, string> = {
  G: "DeviceGray",
  RGB: "DeviceRGB",
  CMYK: "DeviceCMYK",
  I: "Indexed",
};

const DEVICE_COMPONENTS: Record<string, number> = {
  DeviceGray: 1,
  DeviceRGB: 3,
  DeviceCMYK: 4,
  Indexed: 1,
};

class OperandError extends Error {}

/**
 * Typed access to an operator's operands. Accessors throw
 * {@link OperandError}, which the parser turns into an `invalid` op.
 */
class Operands {
  constructor(private readonly values: readonly PdfObject[]) {}

  get length(): number {
    return this.values.length;
  }

  expect(count: number): this {
    if (this.values.length !== count) {
      throw new OperandError(`expected ${count} operand${count === 1 ? "" : "s"}, got ${this.values.length}`);
    }

    return this;
  }

  number(index: number): number {
    const value = this.values[index];

    if (value?.type !== "number" || !Number.isFinite(value.value)) {
      throw new OperandError(`operand ${index + 1} is not a number`);
    }

    return value.value;
  }

  numbers(): number[] {
    return this.values.map((_, i) => this.number(i));
  }

  matrix(): Matrix {
    const [a, b, c, d, e, f] = this.expect(6).numbers();

    return [a, b, c, d, e, f];
  }

  name(index: number): string {
    const value = this.values[index];

    if (value?.type !== "name") {
      throw new OperandError(`operand ${index + 1} is not a name`);
    }

    return value.value;
  }

  string(index: number): Uint8Array {
    const value = this.values[index];

    if (value?.type !== "string") {
      throw new OperandError(`operand ${index + 1} is not a string`);
    }

    return value.bytes;
  }

  array(index: number): PdfArray {
    const value = this.values[index];

    if (value?.type !== "array") {
      throw new OperandError(`operand ${index + 1} is not an array`);
    }

    return value;
  }

  last(): PdfObject | undefined {
    return this.values[this.values.length - 1];
  }
}

type OperatorDecoder = (operands: Operands) => ContentOpBody;

const paint =
  (close: boolean, fill: "nonzero" | "evenodd" | null, stroke: boolean): OperatorDecoder =>
  operands => {
    operands.expect(0);

    return { kind: "paint", close, fill, stroke };
  };

const noOperands =
  (body: ContentOpBody): OperatorDecoder =>
  operands => {
    operands.expect(0);

    return body;
  };

const singleNumber =
  (build: (value: number) => ContentOpBody): OperatorDecoder =>
  operands =>
    build(operands.expect(1).number(0));

const colorSpace =
  (target: PaintTarget): OperatorDecoder =>
  operands => ({ kind: "colorSpace", target, name: operands.expect(1).name(0) });

/**
 * SC/sc take numbers only; SCN/scn may end with a pattern name.
 */
const color =
  (target: PaintTarget, allowPattern: boolean): OperatorDecoder =>
  operands => {
    const last = operands.last();

    if (allowPattern && last?.type === "name") {
      const components: number[] = [];

      for (let i = 0; i < operands.length - 1; i++) {
        components.push(operands.number(i));
      }

      return { kind: "color", target, components, pattern: last.value };
    }

    if (operands.length === 0) {
      throw new OperandError("expected colour components");
    }

    return { kind: "color", target, components: operands.numbers() };
  };

const deviceColor =
  (target: PaintTarget, space: "DeviceGray" | "DeviceRGB" | "DeviceCMYK"): OperatorDecoder =>
  operands => ({
    kind: "deviceColor",
    target,
    space,
    components: operands.expect(DEVICE_COMPONENTS[space]).numbers(),
  });

const markedContent =
  (count: number | [number, number]): OperatorDecoder =>
  operands => {
    const [min, max] = typeof count === "number" ? [count, count] : count;

    if (operands.length < min || operands.length > max) {
      throw new OperandError(`expected ${min} to ${max} operands, got ${operands.length}`);
    }

    return { kind: "markedContent", tag: operands.length > 0 ? operands.name(0) : "" };
  };

const OPERATORS: Record<string, OperatorDecoder> = {
  q: noOperands({ kind: "save" }),
  Q: noOperands({ kind: "restore" }),
  cm: operands => ({ kind: "transform", matrix: operands.matrix() }),
  w: singleNumber(width => ({ kind: "lineWidth", width })),
  J: singleNumber(cap => ({ kind: "lineCap", cap })),
  j: singleNumber(join => ({ kind: "lineJoin", join })),
  M: singleNumber(limit => ({ kind: "miterLimit", limit })),
  d: operands => {
    operands.expect(2);

    const array = operands.array(0).toNumbers();

    if (!array.every(Number.isFinite)) {
      throw new OperandError("dash array holds a non-number");
    }

    return { kind: "dash", array, phase: operands.number(1) };
  },
  ri: operands => ({ kind: "renderingIntent", intent: operands.expect(1).name(0) }),
  i: singleNumber(tolerance => ({ kind: "flatness", tolerance })),
  gs: operands => ({ kind: "extGState", name: operands.expect(1).name(0) }),

  m: operands => {
    const [x, y] = operands.expect(2).numbers();

    return { kind: "moveTo", x, y };
  },
  l: operands => {
    const [x, y] = operands.expect(2).numbers();

    return { kind: "lineTo", x, y };
  },
  c: operands => {
    const [x1, y1, x2, y2, x3, y3] = operands.expect(6).numbers();

    return { kind: "curveTo", x1, y1, x2, y2, x3, y3 };
  },
  v: operands => {
    const [x2, y2, x3, y3] = operands.expect(4).numbers();

    return { kind: "curveToInitial", x2, y2, x3, y3 };
  },
  y: operands => {
    const [x1, y1, x3, y3] = operands.expect(4).numbers();

    return { kind: "curveToFinal", x1, y1, x3, y3 };
  },
  h: noOperands({ kind: "closePath" }),
  re: operands => {
    const [x, y, width, height] = operands.expect(4).numbers();

    return { kind: "rect", x, y, width, height };
  },

  S: paint(false, null, true),
  s: paint(true, null, true),
  f: paint(false, "nonzero", false),
  F: paint(false, "nonzero", false),
  "f*": paint(false, "evenodd", false),
  B: paint(false, "nonzero", true),
  "B*": paint(false, "evenodd", true),
  b: paint(true, "nonzero", true),
  "b*": paint(true, "evenodd", true),
  n: paint(false, null, false),
  W: noOperands({ kind: "clip", rule: "nonzero" }),
  "W*": noOperands({ kind: "clip", rule: "evenodd" }),

  BT: noOperands({ kind: "beginText" }),
  ET: noOperands({ kind: "endText" }),
  Tc: singleNumber(spacing => ({ kind: "charSpacing", spacing })),
  Tw: singleNumber(spacing => ({ kind: "wordSpacing", spacing })),
  Tz: singleNumber(percent => ({ kind: "horizontalScaling", percent })),
  TL: singleNumber(leading => ({ kind: "leading", leading })),
  Tf: operands => ({ kind: "font", name: operands.expect(2).name(0), size: operands.number(1) }),
  Tr: singleNumber(mode => ({ kind: "renderMode", mode })),
  Ts: singleNumber(rise => ({ kind: "rise", rise })),
  Td: operands => {
    const [tx, ty] = operands.expect(2).numbers();

    return { kind: "moveText", tx, ty, setLeading: false };
  },
  TD: operands => {
    const [tx, ty] = operands.expect(2).numbers();

    return { kind: "moveText", tx, ty, setLeading: true };
  },
  Tm: operands => ({ kind: "textMatrix", matrix: operands.matrix() }),
  "T*": noOperands({ kind: "nextLine" }),
  Tj: operands => ({ kind: "showText", text: operands.expect(1).string(0) }),
  TJ: operands => {
    const items: TextArrayItem[] = [];

    for (const item of operands.expect(1).array(0)) {
      if (item.type === "string") {
        items.push(item.bytes);
      } else if (item.type === "number") {
        items.push(item.value);
      } else {
        throw new OperandError(`TJ array holds a ${item.type}`);
      }
    }

    return { kind: "showTextArray", items };
  },
  "'": operands => ({ kind: "nextLineShowText", text: operands.expect(1).string(0) }),
  '"': operands => ({
    kind: "nextLineShowText",
    wordSpacing: operands.expect(3).number(0),
    charSpacing: operands.number(1),
    text: operands.string(2),
  }),

  d0: operands => {
    const [wx, wy] = operands.expect(2).numbers();

    return { kind: "glyphWidth", wx, wy };
  },
  d1: operands => {
    const [wx, wy, x0, y0, x1, y1] = operands.expect(6).numbers();

    return { kind: "glyphWidthAndBounds", wx, wy, bbox: [x0, y0, x1, y1] };
  },

  CS: colorSpace("stroke"),
  cs: colorSpace("fill"),
  SC: color("stroke", false),
  SCN: color("stroke", true),
  sc: color("fill", false),
  scn: color("fill", true),
  G: deviceColor("stroke", "DeviceGray"),
  g: deviceColor("fill", "DeviceGray"),
  RG: deviceColor("stroke", "DeviceRGB"),
  rg: deviceColor("fill", "DeviceRGB"),
  K: deviceColor("stroke", "DeviceCMYK"),
  k: deviceColor("fill", "DeviceCMYK"),

  Do: operands => ({ kind: "xObject", name: operands.expect(1).name(0) }),
  sh: operands => ({ kind: "shading", name: operands.expect(1).name(0) }),

  BMC: markedContent(1),
  BDC: markedContent(2),
  EMC: markedContent(0),
  MP: markedContent(1),
  DP: markedContent(2),
  BX: noOperands({ kind: "compatibility", begin: true }),
  EX: noOperands({ kind: "compatibility", begin: false }),
};

/**
 * Parse a decoded content stream.
 */
export function parseContent(data: Uint8Array): ContentOp[] {
  return new ContentParser(data).parse();
}

class ContentParser {
  private readonly reader: TokenReader;
  private readonly ops: ContentOp[] = [];

  constructor(private readonly data: Uint8Array) {
    this.reader = new TokenReader(new Scanner(data));
  }

  parse(): ContentOp[] {
    let operands: PdfObject[] = [];
    let firstOperand = -1;

    for (;;) {
      const token = this.reader.nextToken();

      if (token.type === "eof") {
        break;
      }

      if (token.type === "keyword" && !isOperandKeyword(token.value)) {
        this.emitOperator(token.value, token.position, operands);
        operands = [];
        firstOperand = -1;
        continue;
      }

      if (token.type === "delimiter" && token.value !== "[" && token.value !== "<<") {
        this.push({ kind: "invalid", message: `Unexpected ${token.value}` }, token.value, token.position);
        operands = [];
        firstOperand = -1;
        continue;
      }

      if (firstOperand < 0) {
        firstOperand = token.position;
      }

      operands.push(this.readOperand(token, 0));
    }

    if (operands.length > 0) {
      this.push({ kind: "invalid", message: "Operands without an operator at end of stream" }, "", firstOperand);
    }

    return this.ops;
  }

  private push(body: ContentOpBody, operator: string, position: number): void {
    this.ops.push({ ...body, operator, position });
  }

  private emitOperator(operator: string, position: number, operands: PdfObject[]): void {
    if (operator === "BI") {
      if (operands.length > 0) {
        this.push({ kind: "invalid", message: "expected 0 operands" }, operator, position);
      }

      this.push(this.readInlineImage(), operator, position);

      return;
    }

    const decode = OPERATORS[operator];

    if (!Object.hasOwn(OPERATORS, operator) || !decode) {
      this.push({ kind: "unknown" }, operator, position);

      return;
    }

    try {
      this.push(decode(new Operands(operands)), operator, position);
    } catch (error) {
      if (!(error instanceof OperandError)) {
        throw error;
      }

      this.push({ kind: "invalid", message: error.message }, operator, position);
    }
  }

  private readOperand(token: Token, depth: number): PdfObject {
    switch (token.type) {
      case "number":
        return PdfNumber.of(token.value);
      case "name":
        return PdfName.of(token.value);
      case "string":
        return new PdfString(token.value, token.format);
      case "keyword":
        if (token.value === "true" || token.value === "false") {
          return PdfBool.of(token.value === "true");
        }

        return PdfNull.instance;
      case "delimiter":
        if (depth >= MAX_NESTING) {
          return PdfNull.instance;
        }

        if (token.value === "[") {
          return this.readArray(depth + 1);
        }

        return token.value === "<<" ? this.readDict(depth + 1) : PdfNull.instance;
      case "eof":
        return PdfNull.instance;
    }
  }

  private readArray(depth: number): PdfArray {
    const items: PdfObject[] = [];

    for (;;) {
      const token = this.reader.nextToken();

      if (token.type === "eof" || (token.type === "delimiter" && token.value === "]")) {
        break;
      }

      items.push(this.readOperand(token, depth));
    }

    return new PdfArray(items);
  }

  private readDict(depth: number): PdfDict {
    const entries: Array<[string, PdfObject]> = [];

    for (;;) {
      const token = this.reader.nextToken();

      if (token.type === "eof" || (token.type === "delimiter" && token.value === ">>")) {
        break;
      }

      if (token.type !== "name") {
        continue;
      }

      const value = this.reader.nextToken();

      if (value.type === "eof") {
        break;
      }

      entries.push([token.value, this.readOperand(value, depth)]);
    }

    return new PdfDict(entries);
  }

  /**
   * `BI <key value>* ID <data> EI`. The reader sits just after `BI`.
   */
  private readInlineImage(): ContentOpBody {
    const entries: Array<[string, PdfObject]> = [];

    for (;;) {
      const token = this.reader.nextToken();

      if (token.type === "eof") {
        return { kind: "invalid", message: "Inline image without ID" };
      }

      if (token.type === "keyword" && token.value === "ID") {
        break;
      }

      if (token.type !== "name") {
        continue;
      }

      const value = this.reader.nextToken();

      if (value.type === "eof") {
        return { kind: "invalid", message: "Inline image without ID" };
      }

      const key = INLINE_IMAGE_KEYS[token.value] ?? token.value;

      entries.push([key, expandColorSpace(key, this.readOperand(value, 0))]);
    }

    const dict = new PdfDict(entries);
    // One whitespace byte separates ID from the data
    const start = this.reader.position + 1;
    const end = this.inlineImageEnd(dict, start);

    if (end === null) {
      this.reader.moveTo(this.data.length);

      return { kind: "invalid", message: "Inline image without EI" };
    }

    const data = this.data.subarray(start, end.dataEnd);

    this.reader.moveTo(end.resume);

    return { kind: "inlineImage", dict, data };
  }

  /**
   * Locate the end of inline image data. Unfiltered images have a known
   * size; otherwise the data runs to the first `EI` between whitespace.
   */
  private inlineImageEnd(dict: PdfDict, start: number): { dataEnd: number; resume: number } | null {
    const known = unfilteredLength(dict);

    if (known !== undefined && start + known <= this.data.length) {
      let pos = start + known;

      while (pos < this.data.length && isWhitespace(this.data[pos])) {
        pos++;
      }

      if (this.isEndMarker(pos)) {
        return { dataEnd: start + known, resume: pos + 2 };
      }
    }

    for (let pos = start; pos + 1 < this.data.length; pos++) {
      if (pos > start && isWhitespace(this.data[pos - 1]) && this.isEndMarker(pos)) {
        return { dataEnd: pos - 1, resume: pos + 2 };
      }
    }

    return null;
  }

  private isEndMarker(pos: number): boolean {
    const after = this.data[pos + 2];

    return (
      this.data[pos] === 0x45 &&
      this.data[pos + 1] === 0x49 &&
      (pos + 2 >= this.data.length || after === undefined || isWhitespace(after))
    );
  }
}

function isOperandKeyword(value: string): boolean {
  return value === "true" || value === "false" || value === "null";
}

function expandColorSpace(key: string, value: PdfObject): PdfObject {
  if (key !== "ColorSpace") {
    return value;
  }

  const expand = (item: PdfObject) =>
    item.type === "name" ? PdfName.of(INLINE_COLOR_SPACES[item.value] ?? item.value) : item;

  return value.type === "array" ? new PdfArray(value.toArray().map(expand)) : expand(value);
}

/**
 * Byte length of an unfiltered inline image with a device or indexed
 * colour space, or undefined when it cannot be known up front.
 */
function unfilteredLength(dict: PdfDict): number | undefined {
  if (dict.has("Filter")) {
    return undefined;
  }

  const width = dict.getNumber("Width")?.value;
  const height = dict.getNumber("Height")?.value;

  if (width === undefined || height === undefined) {
    return undefined;
  }

  const imageMask = dict.getBool("ImageMask")?.value === true;
  const bits = imageMask ? 1 : (dict.getNumber("BitsPerComponent")?.value ?? 8);
  const space = dict.getNameOrFirst("ColorSpace")?.value;
  const components = imageMask ? 1 : space === undefined ? undefined : DEVICE_COMPONENTS[space];

  if (components === undefined) {
    return undefined;
  }

  return Math.ceil((width * components * bits) / 8) * height;
}
