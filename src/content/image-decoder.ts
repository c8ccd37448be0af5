/**
 * Image XObject and inline image decoding to RGBA8.
 *
 * Handles bits per component 1, 2, 4, 8 and 16, /Decode arrays, stencil
 * masks (/ImageMask), explicit masks (/Mask stream), colour-key masks
 * (/Mask array) and soft masks (/SMask). Images behind a codec filter
 * (DCT, JPX, JBIG2, CCITT) are refused as unsupported.
 */

import { canonicalFilterName, IMAGE_CODECS } from "#src/filters/filter-pipeline";
import type { RGB } from "#src/helpers/colors";
import type { PdfDict } from "#src/objects/pdf-dict";
import { isPdfStream, type PdfObject } from "#src/objects/pdf-object";
import type { PdfStream } from "#src/objects/pdf-stream";
import type { SceneImage } from "#src/scene/scene";
import { type ColorSpace, DEVICE_GRAY } from "./color-space";
import { ContentError, UnsupportedFeatureError } from "./errors";
import type { LoadContext } from "./load-context";

const MAX_PIXELS = 1 << 26;
const VALID_BITS = new Set([1, 2, 4, 8, 16]);

export interface ImageDecodeContext extends LoadContext {
  /** Colour space for an image's /ColorSpace value (name or array) */
  loadColorSpace: (obj: PdfObject) => Promise<ColorSpace>;
}

export interface ImageDecodeOptions {
  /** Colour painted through stencil masks */
  fillColor: RGB;
  /** Bytes already decoded by the caller (inline images) */
  data?: Uint8Array;
}

// ─────────────────────────────────────────────────────────────────────────────
// Sample reading
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reads packed samples row by row; every row starts on a byte boundary.
 */
class SampleReader {
  private readonly rowBytes: number;

  constructor(
    private readonly data: Uint8Array,
    readonly width: number,
    readonly components: number,
    readonly bits: number,
  ) {
    this.rowBytes = Math.ceil((width * components * bits) / 8);
  }

  /**
   * Raw sample `component` of pixel (x, y). Missing data reads as 0.
   */
  sample(x: number, y: number, component: number): number {
    const index = x * this.components + component;
    const rowStart = y * this.rowBytes;

    switch (this.bits) {
      case 8:
        return this.data[rowStart + index] ?? 0;
      case 16: {
        const offset = rowStart + index * 2;

        return ((this.data[offset] ?? 0) << 8) | (this.data[offset + 1] ?? 0);
      }
      default: {
        const bitOffset = index * this.bits;
        const byte = this.data[rowStart + (bitOffset >> 3)] ?? 0;
        const shift = 8 - this.bits - (bitOffset & 7);

        return (byte >> shift) & ((1 << this.bits) - 1);
      }
    }
  }
}

function positiveInt(dict: PdfDict, key: string, ctx: LoadContext): number {
  const value = dict.getNumber(key, ctx.resolver)?.value ?? 0;

  if (!Number.isInteger(value) || value <= 0) {
    throw new ContentError(`Image has invalid /${key}`);
  }

  return value;
}

function imageSize(dict: PdfDict, ctx: LoadContext): { width: number; height: number } {
  const width = positiveInt(dict, "Width", ctx);
  const height = positiveInt(dict, "Height", ctx);

  if (width * height > MAX_PIXELS) {
    throw new ContentError(`Image of ${width}x${height} pixels is too large`);
  }

  return { width, height };
}

function isImageMask(dict: PdfDict, ctx: LoadContext): boolean {
  return dict.getBool("ImageMask", ctx.resolver)?.value ?? false;
}

function decodeArray(dict: PdfDict, ctx: LoadContext, fallback: number[]): number[] {
  const values = dict.getArray("Decode", ctx.resolver)?.toNumbers(ctx.resolver);

  if (!values || values.length !== fallback.length || values.some(n => !Number.isFinite(n))) {
    return fallback;
  }

  return values;
}

/**
 * Stencil samples as a painted/not-painted bitmap. `paintedValue` is the
 * raw sample value that paints.
 */
function readStencil(
  dict: PdfDict,
  data: Uint8Array,
  ctx: LoadContext,
  paintedByDefault: 0 | 1,
): { width: number; height: number; painted: Uint8Array } {
  const { width, height } = imageSize(dict, ctx);
  const [d0] = decodeArray(dict, ctx, [0, 1]);
  const paintedValue = d0 === 1 ? 1 - paintedByDefault : paintedByDefault;
  const reader = new SampleReader(data, width, 1, 1);
  const painted = new Uint8Array(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      painted[y * width + x] = reader.sample(x, y, 0) === paintedValue ? 1 : 0;
    }
  }

  return { width, height, painted };
}

/**
 * Nearest-neighbour resampling of a one-channel plane.
 */
function resample(
  plane: Uint8Array,
  width: number,
  height: number,
  toWidth: number,
  toHeight: number,
): Uint8Array {
  if (width === toWidth && height === toHeight) {
    return plane;
  }

  const out = new Uint8Array(toWidth * toHeight);

  for (let y = 0; y < toHeight; y++) {
    const sy = Math.min(Math.floor(((y + 0.5) * height) / toHeight), height - 1);

    for (let x = 0; x < toWidth; x++) {
      const sx = Math.min(Math.floor(((x + 0.5) * width) / toWidth), width - 1);

      out[y * toWidth + x] = plane[sy * width + sx] ?? 0;
    }
  }

  return out;
}

// ─────────────────────────────────────────────────────────────────────────────
// Colour conversion
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Per-pixel converter from raw samples to RGB bytes. Single-component
 * images with up to 8 bits go through a precomputed table.
 */
function pixelConverter(
  space: ColorSpace,
  bits: number,
  decode: readonly number[],
): (samples: readonly number[], out: Uint8ClampedArray, offset: number) => void {
  const maxValue = 2 ** bits - 1;
  const toComponent = (raw: number, i: number) => {
    const min = decode[2 * i] ?? 0;
    const max = decode[2 * i + 1] ?? 1;

    return min + (raw * (max - min)) / maxValue;
  };

  const write = (color: RGB, out: Uint8ClampedArray, offset: number) => {
    out[offset] = Math.round(color.red * 255);
    out[offset + 1] = Math.round(color.green * 255);
    out[offset + 2] = Math.round(color.blue * 255);
  };

  if (space.components === 1 && bits <= 8) {
    const table = Array.from({ length: maxValue + 1 }, (_, raw) => space.toRgb([toComponent(raw, 0)]));

    return (samples, out, offset) => write(table[samples[0] ?? 0] ?? table[0], out, offset);
  }

  return (samples, out, offset) =>
    write(
      space.toRgb(samples.map((raw, i) => toComponent(raw, i))),
      out,
      offset,
    );
}

// ─────────────────────────────────────────────────────────────────────────────
// Decoding
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @throws {UnsupportedFeatureError} when the filter chain includes an
 * image codec
 */
export function rejectCodecImage(image: PdfStream | PdfDict, ctx: LoadContext): void {
  const filter = image.get("Filter", ctx.resolver);
  const entries = filter?.type === "array" ? filter.toArray() : filter ? [filter] : [];

  for (const entry of entries) {
    const resolved = entry.type === "ref" ? ctx.resolver(entry) : entry;

    if (resolved?.type !== "name") {
      continue;
    }

    const name = canonicalFilterName(resolved.value);

    if (IMAGE_CODECS.has(name)) {
      throw new UnsupportedFeatureError(`Image codec /${name} is not supported`);
    }
  }
}

/**
 * Decode an image to RGBA8.
 *
 * @throws {ContentError} for malformed image dictionaries
 * @throws {StreamDecodeError} when the image data uses an unsupported codec
 */
export async function decodeImage(
  image: PdfStream | PdfDict,
  ctx: ImageDecodeContext,
  options: ImageDecodeOptions,
): Promise<SceneImage> {
  rejectCodecImage(image, ctx);

  const data = options.data ?? (isPdfStream(image) ? await ctx.decodeStream(image) : new Uint8Array(0));

  if (isImageMask(image, ctx)) {
    return decodeStencil(image, data, ctx, options.fillColor);
  }

  const { width, height } = imageSize(image, ctx);
  const csObject = image.get("ColorSpace", ctx.resolver);

  if (!csObject) {
    throw new ContentError("Image has no /ColorSpace");
  }

  const space = await ctx.loadColorSpace(csObject);
  const bits = image.getNumber("BitsPerComponent", ctx.resolver)?.value ?? 8;

  if (!VALID_BITS.has(bits)) {
    throw new ContentError(`Image has invalid /BitsPerComponent ${bits}`);
  }

  const n = space.components;

  if (n === 0) {
    throw new ContentError(`Images cannot use a /${space.family} colour space`);
  }

  const decode = decodeArray(image, ctx, space.defaultDecode(bits));
  const convert = pixelConverter(space, bits, decode);
  const reader = new SampleReader(data, width, n, bits);
  const colorKey = colorKeyRanges(image, ctx, n);
  const out = new Uint8ClampedArray(width * height * 4);
  const samples = new Array<number>(n).fill(0);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      for (let i = 0; i < n; i++) {
        samples[i] = reader.sample(x, y, i);
      }

      const offset = (y * width + x) * 4;

      convert(samples, out, offset);
      out[offset + 3] = colorKey && matchesColorKey(samples, colorKey) ? 0 : 255;
    }
  }

  const alpha = await maskAlpha(image, ctx, width, height);

  if (alpha) {
    for (let i = 0; i < alpha.length; i++) {
      out[i * 4 + 3] = Math.round(((out[i * 4 + 3] ?? 0) * (alpha[i] ?? 0)) / 255);
    }
  }

  return { width, height, data: out };
}

function decodeStencil(dict: PdfDict, data: Uint8Array, ctx: LoadContext, color: RGB): SceneImage {
  const { width, height, painted } = readStencil(dict, data, ctx, 0);
  const out = new Uint8ClampedArray(width * height * 4);
  const r = Math.round(color.red * 255);
  const g = Math.round(color.green * 255);
  const b = Math.round(color.blue * 255);

  for (let i = 0; i < painted.length; i++) {
    out[i * 4] = r;
    out[i * 4 + 1] = g;
    out[i * 4 + 2] = b;
    out[i * 4 + 3] = painted[i] ? 255 : 0;
  }

  return { width, height, data: out };
}

function colorKeyRanges(dict: PdfDict, ctx: LoadContext, components: number): number[] | null {
  const mask = dict.get("Mask", ctx.resolver);

  if (mask?.type !== "array") {
    return null;
  }

  const ranges = mask.toNumbers(ctx.resolver);

  return ranges.length === components * 2 && ranges.every(Number.isFinite) ? ranges : null;
}

function matchesColorKey(samples: readonly number[], ranges: readonly number[]): boolean {
  return samples.every((s, i) => s >= (ranges[2 * i] ?? 0) && s <= (ranges[2 * i + 1] ?? 0));
}

/**
 * Alpha plane (0-255) from /SMask or a /Mask stencil, resampled to the
 * image size. Null when the image has neither.
 */
async function maskAlpha(
  dict: PdfDict,
  ctx: ImageDecodeContext,
  width: number,
  height: number,
): Promise<Uint8Array | null> {
  const smask = dict.getStream("SMask", ctx.resolver);

  if (smask) {
    const size = imageSize(smask, ctx);
    const bits = smask.getNumber("BitsPerComponent", ctx.resolver)?.value ?? 8;

    if (!VALID_BITS.has(bits)) {
      throw new ContentError(`Soft mask has invalid /BitsPerComponent ${bits}`);
    }

    const reader = new SampleReader(await ctx.decodeStream(smask), size.width, 1, bits);
    const [d0 = 0, d1 = 1] = decodeArray(smask, ctx, DEVICE_GRAY.defaultDecode(bits));
    const maxValue = 2 ** bits - 1;
    const plane = new Uint8Array(size.width * size.height);

    for (let y = 0; y < size.height; y++) {
      for (let x = 0; x < size.width; x++) {
        const value = d0 + (reader.sample(x, y, 0) * (d1 - d0)) / maxValue;

        plane[y * size.width + x] = Math.round(Math.min(Math.max(value, 0), 1) * 255);
      }
    }

    return resample(plane, size.width, size.height, width, height);
  }

  const mask = dict.getStream("Mask", ctx.resolver);

  if (mask) {
    // Explicit masks paint where the sample is 0, like stencils
    const stencil = readStencil(mask, await ctx.decodeStream(mask), ctx, 0);
    const plane = stencil.painted.map(p => p * 255);

    return resample(plane, stencil.width, stencil.height, width, height);
  }

  return null;
}
