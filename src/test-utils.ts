/**
 * Test utilities for pdf-raster.
 *
 * PDFs used by tests are assembled in memory; nothing is read from disk.
 */

import { deflate } from "pako";
import macGlyphNames from "#src/fontbox/ttf/mac-glyph-names.json";
import type { LoadContext } from "#src/content/load-context";
import type { RGBA } from "#src/helpers/colors";
import { Scanner } from "#src/io/scanner";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfStream } from "#src/objects/pdf-stream";
import { ObjectParser } from "#src/parser/object-parser";
import { TokenReader } from "#src/parser/token-reader";
import type { RenderTarget } from "#src/raster/render-target";
import { type Path, PathBuilder } from "#src/scene/path";

/**
 * One indirect object for {@link buildPdf}.
 *
 * A plain string is the object body (`<< /Type /Page ... >>`). An object
 * with `stream` becomes a stream; `/Length` is filled in automatically and
 * `compress` adds FlateDecode.
 */
export type ObjectSource =
  | string
  | {
      dict?: string;
      stream: string | Uint8Array;
      compress?: boolean;
    };

export interface BuildPdfOptions {
  /** Header version (default "1.7") */
  version?: string;
  /** Object number of the catalog (default 1) */
  root?: number;
  /** Extra trailer entries, e.g. "/Info 5 0 R" */
  trailer?: string;
  /** Omit the xref table and startxref */
  omitXref?: boolean;
  /** Overwrite the startxref offset */
  startXrefOverride?: number;
}

/**
 * Build a complete PDF file. Objects are numbered 1..n in array order.
 *
 * @example
 * ```ts
 * const bytes = buildPdf([
 *   "<< /Type /Catalog /Pages 2 0 R >>",
 *   "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
 *   "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 200 200] >>",
 * ]);
 * ```
 */
export function buildPdf(objects: ObjectSource[], options: BuildPdfOptions = {}): Uint8Array {
  const chunks: Uint8Array[] = [];
  const offsets: number[] = [];
  let length = 0;

  const push = (chunk: Uint8Array | string) => {
    const bytes = typeof chunk === "string" ? stringToBytes(chunk) : chunk;

    chunks.push(bytes);
    length += bytes.length;
  };

  push(`%PDF-${options.version ?? "1.7"}\n%\xe2\xe3\xcf\xd3\n`);

  objects.forEach((source, index) => {
    offsets.push(length);
    push(`${index + 1} 0 obj\n`);

    if (typeof source === "string") {
      push(`${source}\nendobj\n`);

      return;
    }

    const raw = typeof source.stream === "string" ? stringToBytes(source.stream) : source.stream;
    const data = source.compress ? deflate(raw) : raw;
    const dict = source.dict ?? "<< >>";
    const inner = dict.slice(dict.indexOf("<<") + 2, dict.lastIndexOf(">>")).trim();
    const filter = source.compress ? " /Filter /FlateDecode" : "";

    push(`<< ${inner}${inner ? " " : ""}/Length ${data.length}${filter} >>\nstream\n`);
    push(data);
    push("\nendstream\nendobj\n");
  });

  if (!options.omitXref) {
    const xrefOffset = length;

    push(`xref\n0 ${objects.length + 1}\n0000000000 65535 f\r\n`);

    for (const offset of offsets) {
      push(`${String(offset).padStart(10, "0")} 00000 n\r\n`);
    }

    const extra = options.trailer ? ` ${options.trailer}` : "";

    push(`trailer\n<< /Size ${objects.length + 1} /Root ${options.root ?? 1} 0 R${extra} >>\n`);
    push(`startxref\n${options.startXrefOverride ?? xrefOffset}\n%%EOF\n`);
  }

  const result = new Uint8Array(length);
  let position = 0;

  for (const chunk of chunks) {
    result.set(chunk, position);
    position += chunk.length;
  }

  return result;
}

export interface SinglePageOptions {
  /** MediaBox width and height in points (default 200 × 200) */
  width?: number;
  height?: number;
  /** Resource dictionary source (default "<< >>") */
  resources?: string;
  /** Extra page dictionary entries, e.g. "/Rotate 90" */
  pageEntries?: string;
  /** Additional objects numbered from 5 */
  extraObjects?: ObjectSource[];
}

/**
 * Build a one-page document whose page runs `content`.
 *
 * Objects: 1 catalog, 2 page tree, 3 page, 4 content stream, 5.. extras.
 */
export function buildSinglePagePdf(content: string, options: SinglePageOptions = {}): Uint8Array {
  const width = options.width ?? 200;
  const height = options.height ?? 200;
  const entries = options.pageEntries ? ` ${options.pageEntries}` : "";

  return buildPdf([
    "<< /Type /Catalog /Pages 2 0 R >>",
    "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
    `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 ${width} ${height}] ` +
      `/Resources ${options.resources ?? "<< >>"} /Contents 4 0 R${entries} >>`,
    { stream: content },
    ...(options.extraObjects ?? []),
  ]);
}

/**
 * RGBA of one pixel of a render target.
 */
export function pixelAt(target: RenderTarget, x: number, y: number): [number, number, number, number] {
  const i = (y * target.width + x) * 4;

  return [target.data[i], target.data[i + 1], target.data[i + 2], target.data[i + 3]];
}

/**
 * Parse one object from PDF syntax, e.g. `<< /FunctionType 2 >>`.
 */
export function parseObject(source: string): PdfObject {
  const result = new ObjectParser(new TokenReader(new Scanner(stringToBytes(source)))).parseObject();

  if (!result) {
    throw new Error(`No object in ${source}`);
  }

  return result.object;
}

/**
 * A stream whose dictionary is parsed from `dict` and whose data is
 * `data` (Latin-1 text or bytes).
 */
export function makeStream(dict: string, data: string | Uint8Array): PdfStream {
  const parsed = parseObject(dict);

  if (parsed.type !== "dict") {
    throw new Error(`Not a dictionary: ${dict}`);
  }

  return new PdfStream(parsed, typeof data === "string" ? stringToBytes(data) : data);
}

/**
 * Loader context over numbered objects; unknown references resolve to null.
 */
export function testLoadContext(objects: Record<number, PdfObject> = {}): LoadContext {
  return {
    resolver: ref => objects[ref.objectNumber] ?? null,
    decodeStream: stream => stream.getDecodedData(),
  };
}

export const RED: RGBA = { red: 1, green: 0, blue: 0, alpha: 1 };
export const BLUE: RGBA = { red: 0, green: 0, blue: 1, alpha: 1 };
export const WHITE_BACKGROUND: RGBA = { red: 1, green: 1, blue: 1, alpha: 1 };

/**
 * Circle of four cubic arcs, counter-clockwise in a y-up space.
 */
export function circlePath(cx: number, cy: number, r: number): Path {
  const k = 0.5522847498 * r;
  const builder = new PathBuilder().moveTo(cx + r, cy);

  builder.curveTo(cx + r, cy + k, cx + k, cy + r, cx, cy + r);
  builder.curveTo(cx - k, cy + r, cx - r, cy + k, cx - r, cy);
  builder.curveTo(cx - r, cy - k, cx - k, cy - r, cx, cy - r);
  builder.curveTo(cx + k, cy - r, cx + r, cy - k, cx + r, cy);
  builder.close();

  return builder.build();
}

/**
 * Largest per-channel difference between two equally sized targets.
 */
export function maxChannelDifference(a: RenderTarget, b: RenderTarget): number {
  if (a.width !== b.width || a.height !== b.height) {
    throw new Error(`Size mismatch: ${a.width}x${a.height} vs ${b.width}x${b.height}`);
  }

  let max = 0;

  for (let i = 0; i < a.data.length; i++) {
    max = Math.max(max, Math.abs(a.data[i] - b.data[i]));
  }

  return max;
}

/**
 * Mean per-channel difference between two equally sized targets.
 */
export function meanChannelDifference(a: RenderTarget, b: RenderTarget): number {
  if (a.width !== b.width || a.height !== b.height) {
    throw new Error(`Size mismatch: ${a.width}x${a.height} vs ${b.width}x${b.height}`);
  }

  let sum = 0;

  for (let i = 0; i < a.data.length; i++) {
    sum += Math.abs(a.data[i] - b.data[i]);
  }

  return a.data.length === 0 ? 0 : sum / a.data.length;
}

/**
 * Create a Uint8Array from a string (for creating test data).
 *
 * @param str - The Latin-1 string to convert
 */
export function stringToBytes(str: string) {
  return new Uint8Array(str.split("").map(c => c.charCodeAt(0) & 0xff));
}

/**
 * Decode bytes as Latin-1 text.
 */
export function bytesToString(bytes: Uint8Array) {
  let result = "";

  for (const byte of bytes) {
    result += String.fromCharCode(byte);
  }

  return result;
}

/**
 * Create a Uint8Array from hex string (for creating test data).
 *
 * @example
 * ```ts
 * const bytes = hexToBytes("25 50 44 46"); // %PDF
 * ```
 */
export function hexToBytes(hex: string) {
  const cleaned = hex.replace(/\s/g, "");
  const bytes = new Uint8Array(cleaned.length / 2);

  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Number.parseInt(cleaned.slice(i * 2, i * 2 + 2), 16);
  }

  return bytes;
}

// ─────────────────────────────────────────────────────────────────────────────
// Font programs
// ─────────────────────────────────────────────────────────────────────────────

/** A contour point: x, y and whether it is on the curve */
export type TestPoint = [number, number, boolean];

export interface TestGlyph {
  advance: number;
  contours?: TestPoint[][];
  /** Post table name (format 2 post table when any glyph has one) */
  name?: string;
}

export interface TrueTypeFontOptions {
  unitsPerEm?: number;
  glyphs: TestGlyph[];
  /** (3,1) cmap: character code to glyph id */
  cmap?: Record<number, number>;
}

/**
 * Assemble a minimal TrueType font: head, hhea, maxp, hmtx, loca (long),
 * glyf, a format 4 cmap and a post table.
 */
export function buildTrueTypeFont(options: TrueTypeFontOptions): Uint8Array {
  const glyphs = options.glyphs;
  const glyf = new ByteWriter();
  const loca = new ByteWriter();

  for (const glyph of glyphs) {
    loca.u32(glyf.length);

    const contours = glyph.contours ?? [];

    if (contours.length === 0) {
      continue;
    }

    const points = contours.flat();

    glyf.i16(contours.length);
    glyf.i16(Math.min(...points.map(p => p[0])));
    glyf.i16(Math.min(...points.map(p => p[1])));
    glyf.i16(Math.max(...points.map(p => p[0])));
    glyf.i16(Math.max(...points.map(p => p[1])));

    let end = -1;

    for (const contour of contours) {
      end += contour.length;
      glyf.u16(end);
    }

    glyf.u16(0); // instructions

    for (const point of points) {
      glyf.u8(point[2] ? 1 : 0);
    }

    let x = 0;

    for (const point of points) {
      glyf.i16(point[0] - x);
      x = point[0];
    }

    let y = 0;

    for (const point of points) {
      glyf.i16(point[1] - y);
      y = point[1];
    }

    glyf.pad(2);
  }

  loca.u32(glyf.length);

  const head = new ByteWriter();
  head.u32(0x00010000).u32(0x00010000).u32(0).u32(0x5f0f3cf5).u16(0);
  head.u16(options.unitsPerEm ?? 1000);
  head.zeros(16).zeros(8).u16(0).u16(0).i16(0);
  head.i16(1).i16(0);

  const hhea = new ByteWriter();
  hhea.u32(0x00010000).zeros(30).u16(glyphs.length);

  const maxp = new ByteWriter();
  maxp.u32(0x00005000).u16(glyphs.length);

  const hmtx = new ByteWriter();

  for (const glyph of glyphs) {
    hmtx.u16(glyph.advance).i16(0);
  }

  const tables: Array<[string, Uint8Array]> = [
    ["cmap", buildCmap(options.cmap ?? {})],
    ["glyf", glyf.bytes()],
    ["head", head.bytes()],
    ["hhea", hhea.bytes()],
    ["hmtx", hmtx.bytes()],
    ["loca", loca.bytes()],
    ["maxp", maxp.bytes()],
    ["post", buildPost(glyphs)],
  ];

  const font = new ByteWriter();
  font.u32(0x00010000).u16(tables.length).u16(0).u16(0).u16(0);

  let offset = 12 + tables.length * 16;

  for (const [tag, data] of tables) {
    font.tag(tag).u32(0).u32(offset).u32(data.length);
    offset += Math.ceil(data.length / 4) * 4;
  }

  for (const [, data] of tables) {
    font.raw(data).pad(4);
  }

  return font.bytes();
}

function buildCmap(mapping: Record<number, number>): Uint8Array {
  const codes = Object.keys(mapping)
    .map(Number)
    .sort((a, b) => a - b);
  const segments = [
    ...codes.map(code => ({ code, delta: (mapping[code] - code) & 0xffff })),
    { code: 0xffff, delta: 1 },
  ];
  const segCount = segments.length;
  const sub = new ByteWriter();

  sub.u16(4).u16(16 + segCount * 8).u16(0).u16(segCount * 2).u16(0).u16(0).u16(0);
  segments.forEach(s => sub.u16(s.code));
  sub.u16(0);
  segments.forEach(s => sub.u16(s.code));
  segments.forEach(s => sub.u16(s.delta));
  segments.forEach(() => sub.u16(0));

  const cmap = new ByteWriter();
  cmap.u16(0).u16(1).u16(3).u16(1).u32(12).raw(sub.bytes());

  return cmap.bytes();
}

function buildPost(glyphs: TestGlyph[]): Uint8Array {
  const post = new ByteWriter();
  const named = glyphs.some(g => g.name !== undefined);

  post.u32(named ? 0x00020000 : 0x00030000).zeros(28);

  if (!named) {
    return post.bytes();
  }

  const custom: string[] = [];

  post.u16(glyphs.length);

  for (const glyph of glyphs) {
    const name = glyph.name ?? ".notdef";
    const standard = macGlyphNames.indexOf(name);

    if (standard >= 0) {
      post.u16(standard);
    } else {
      post.u16(macGlyphNames.length + custom.length);
      custom.push(name);
    }
  }

  for (const name of custom) {
    post.u8(name.length).raw(stringToBytes(name));
  }

  return post.bytes();
}

/**
 * Big-endian byte writer for assembling binary fixtures.
 */
export class ByteWriter {
  private data: number[] = [];

  get length(): number {
    return this.data.length;
  }

  u8(value: number): this {
    this.data.push(value & 0xff);

    return this;
  }

  u16(value: number): this {
    return this.u8(value >> 8).u8(value);
  }

  i16(value: number): this {
    return this.u16(value & 0xffff);
  }

  u32(value: number): this {
    return this.u16(Math.floor(value / 0x10000)).u16(value & 0xffff);
  }

  tag(value: string): this {
    return this.raw(stringToBytes(value.padEnd(4, " ")));
  }

  zeros(count: number): this {
    for (let i = 0; i < count; i++) {
      this.u8(0);
    }

    return this;
  }

  pad(alignment: number): this {
    while (this.data.length % alignment !== 0) {
      this.u8(0);
    }

    return this;
  }

  raw(bytes: Uint8Array | number[]): this {
    for (const byte of bytes) {
      this.u8(byte);
    }

    return this;
  }

  bytes(): Uint8Array {
    return new Uint8Array(this.data);
  }
}
