/**
 * Colour spaces and their conversion to sRGB.
 */

import { clamp01, cmykToRgb, grayToRgb, type RGB, rgb } from "#src/helpers/colors";
import { isPdfStream, type PdfObject } from "#src/objects/pdf-object";
import { ContentError } from "./errors";
import { loadFunction, type PdfFunction } from "./functions";
import type { LoadContext } from "./load-context";

export interface ColorSpace {
  /** Family name, e.g. `DeviceRGB` or `Indexed` */
  readonly family: string;
  /** Number of colour components an operator or image sample supplies */
  readonly components: number;
  toRgb(components: readonly number[]): RGB;
  /** Colour set by `cs`/`CS` */
  initialColor(): number[];
  /** Image /Decode default for the given bits per component */
  defaultDecode(bitsPerComponent: number): number[];
}

const MAX_DEPTH = 8;

// ─────────────────────────────────────────────────────────────────────────────
// Device spaces
// ─────────────────────────────────────────────────────────────────────────────

class DeviceSpace implements ColorSpace {
  constructor(
    readonly family: string,
    readonly components: number,
    private readonly convert: (c: readonly number[]) => RGB,
    private readonly initial: readonly number[],
  ) {}

  toRgb(components: readonly number[]): RGB {
    return this.convert(components);
  }

  initialColor(): number[] {
    return [...this.initial];
  }

  defaultDecode(): number[] {
    return Array.from({ length: this.components }, () => [0, 1]).flat();
  }
}

export const DEVICE_GRAY: ColorSpace = new DeviceSpace(
  "DeviceGray",
  1,
  c => grayToRgb(c[0] ?? 0),
  [0],
);

export const DEVICE_RGB: ColorSpace = new DeviceSpace(
  "DeviceRGB",
  3,
  c => rgb(c[0] ?? 0, c[1] ?? 0, c[2] ?? 0),
  [0, 0, 0],
);

export const DEVICE_CMYK: ColorSpace = new DeviceSpace(
  "DeviceCMYK",
  4,
  c => cmykToRgb(c[0] ?? 0, c[1] ?? 0, c[2] ?? 0, c[3] ?? 0),
  [0, 0, 0, 1],
);

function deviceSpaceForComponents(n: number): ColorSpace | undefined {
  switch (n) {
    case 1:
      return DEVICE_GRAY;
    case 3:
      return DEVICE_RGB;
    case 4:
      return DEVICE_CMYK;
    default:
      return undefined;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// CIE-based spaces
// ─────────────────────────────────────────────────────────────────────────────

function srgbGamma(linear: number): number {
  const v = clamp01(linear);

  return v <= 0.0031308 ? 12.92 * v : 1.055 * v ** (1 / 2.4) - 0.055;
}

/**
 * CIE L*a*b* with a white point, converted through XYZ to sRGB.
 */
export class LabSpace implements ColorSpace {
  readonly family = "Lab";
  readonly components = 3;

  constructor(
    private readonly whitePoint: readonly [number, number, number],
    private readonly range: readonly [number, number, number, number],
  ) {}

  toRgb(components: readonly number[]): RGB {
    const [aMin, aMax, bMin, bMax] = this.range;
    const l = Math.min(Math.max(components[0] ?? 0, 0), 100);
    const a = Math.min(Math.max(components[1] ?? 0, aMin), aMax);
    const b = Math.min(Math.max(components[2] ?? 0, bMin), bMax);

    const fy = (l + 16) / 116;
    const fx = fy + a / 500;
    const fz = fy - b / 200;
    const g = (t: number) => (t > 6 / 29 ? t ** 3 : 3 * (6 / 29) ** 2 * (t - 4 / 29));

    const [xw, yw, zw] = this.whitePoint;
    const x = xw * g(fx);
    const y = yw * g(fy);
    const z = zw * g(fz);

    return rgb(
      srgbGamma(3.2406 * x - 1.5372 * y - 0.4986 * z),
      srgbGamma(-0.9689 * x + 1.8758 * y + 0.0415 * z),
      srgbGamma(0.0557 * x - 0.204 * y + 1.057 * z),
    );
  }

  initialColor(): number[] {
    const [aMin, aMax, bMin, bMax] = this.range;

    return [0, Math.min(Math.max(0, aMin), aMax), Math.min(Math.max(0, bMin), bMax)];
  }

  defaultDecode(): number[] {
    return [0, 100, ...this.range];
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Special spaces
// ─────────────────────────────────────────────────────────────────────────────

export class IndexedSpace implements ColorSpace {
  readonly family = "Indexed";
  readonly components = 1;

  constructor(
    readonly base: ColorSpace,
    readonly hival: number,
    private readonly lookup: Uint8Array,
  ) {}

  toRgb(components: readonly number[]): RGB {
    const index = Math.min(Math.max(Math.round(components[0] ?? 0), 0), this.hival);
    const n = this.base.components;
    const ranges = this.base.defaultDecode(8);
    const values: number[] = [];

    for (let i = 0; i < n; i++) {
      const byte = this.lookup[index * n + i] ?? 0;
      const min = ranges[2 * i] ?? 0;
      const max = ranges[2 * i + 1] ?? 1;

      values.push(min + (byte / 255) * (max - min));
    }

    return this.base.toRgb(values);
  }

  initialColor(): number[] {
    return [0];
  }

  defaultDecode(bitsPerComponent: number): number[] {
    return [0, 2 ** bitsPerComponent - 1];
  }
}

/**
 * Separation and DeviceN: tints run through the tint transform into the
 * alternate space.
 */
export class TintSpace implements ColorSpace {
  constructor(
    readonly family: "Separation" | "DeviceN",
    readonly components: number,
    readonly alternate: ColorSpace,
    private readonly tintTransform: PdfFunction,
  ) {}

  toRgb(components: readonly number[]): RGB {
    return this.alternate.toRgb(this.tintTransform(components));
  }

  initialColor(): number[] {
    return new Array<number>(this.components).fill(1);
  }

  defaultDecode(): number[] {
    return Array.from({ length: this.components }, () => [0, 1]).flat();
  }
}

/**
 * Pattern space. Uncoloured patterns carry an underlying space for the
 * colour supplied with `scn`.
 */
export class PatternSpace implements ColorSpace {
  readonly family = "Pattern";

  constructor(readonly base?: ColorSpace) {}

  get components(): number {
    return this.base?.components ?? 0;
  }

  toRgb(components: readonly number[]): RGB {
    return this.base ? this.base.toRgb(components) : grayToRgb(0);
  }

  initialColor(): number[] {
    return [];
  }

  defaultDecode(): number[] {
    return [];
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Colour space for a bare family name, or undefined when the name needs a
 * parameter array (or is a resource name).
 */
export function namedColorSpace(name: string): ColorSpace | undefined {
  switch (name) {
    case "DeviceGray":
    case "G":
    case "CalGray":
      return DEVICE_GRAY;
    case "DeviceRGB":
    case "RGB":
    case "CalRGB":
      return DEVICE_RGB;
    case "DeviceCMYK":
    case "CMYK":
      return DEVICE_CMYK;
    case "Pattern":
      return new PatternSpace();
    default:
      return undefined;
  }
}

/**
 * Load a colour space from a name or parameter array.
 *
 * @throws {ContentError} for unknown families and malformed arrays
 */
export async function loadColorSpace(obj: PdfObject, ctx: LoadContext, depth = 0): Promise<ColorSpace> {
  if (depth > MAX_DEPTH) {
    throw new ContentError("Colour spaces nested too deeply");
  }

  const value = obj.type === "ref" ? ctx.resolver(obj) : obj;

  if (value?.type === "name") {
    const space = namedColorSpace(value.value);

    if (!space) {
      throw new ContentError(`Unknown colour space /${value.value}`);
    }

    return space;
  }

  if (value?.type !== "array" || value.length === 0) {
    throw new ContentError("Colour space is not a name or array");
  }

  const family = value.at(0, ctx.resolver);

  if (family?.type !== "name") {
    throw new ContentError("Colour space array does not start with a name");
  }

  const param = (index: number): PdfObject => {
    const item = value.at(index, ctx.resolver);

    if (item === undefined) {
      throw new ContentError(`Colour space /${family.value} is missing parameters`);
    }

    return item;
  };

  switch (family.value) {
    case "DeviceGray":
    case "DeviceRGB":
    case "DeviceCMYK":
    case "CalGray":
    case "CalRGB":
    case "G":
    case "RGB":
    case "CMYK":
      return namedColorSpace(family.value) ?? DEVICE_GRAY;

    case "Lab": {
      const dict = param(1);

      if (dict.type !== "dict") {
        throw new ContentError("Lab colour space has no dictionary");
      }

      const white = dict.getArray("WhitePoint", ctx.resolver)?.toNumbers(ctx.resolver) ?? [];
      const range = dict.getArray("Range", ctx.resolver)?.toNumbers(ctx.resolver) ?? [];
      const [xw = 0.9505, yw = 1, zw = 1.089] = white;
      const [aMin = -100, aMax = 100, bMin = -100, bMax = 100] = range;

      return new LabSpace([xw, yw, zw], [aMin, aMax, bMin, bMax]);
    }

    case "ICCBased": {
      const stream = param(1);

      if (!isPdfStream(stream)) {
        throw new ContentError("ICCBased colour space has no profile stream");
      }

      const alternate = stream.get("Alternate", ctx.resolver);

      if (alternate) {
        return loadColorSpace(alternate, ctx, depth + 1);
      }

      const n = stream.getNumber("N", ctx.resolver)?.value ?? 0;
      const space = deviceSpaceForComponents(n);

      if (!space) {
        throw new ContentError(`ICCBased colour space has invalid /N ${n}`);
      }

      return space;
    }

    case "Indexed":
    case "I": {
      const base = await loadColorSpace(param(1), ctx, depth + 1);
      const hival = param(2);
      const lookup = param(3);

      if (hival.type !== "number") {
        throw new ContentError("Indexed colour space has no hival");
      }

      let table: Uint8Array;

      if (lookup.type === "string") {
        table = lookup.bytes;
      } else if (isPdfStream(lookup)) {
        table = await ctx.decodeStream(lookup);
      } else {
        throw new ContentError("Indexed colour space has no lookup table");
      }

      return new IndexedSpace(base, Math.min(Math.max(Math.trunc(hival.value), 0), 255), table);
    }

    case "Separation": {
      const alternate = await loadColorSpace(param(2), ctx, depth + 1);
      const tint = await loadFunction(param(3), ctx);

      return new TintSpace("Separation", 1, alternate, tint);
    }

    case "DeviceN": {
      const names = param(1);

      if (names.type !== "array" || names.length === 0) {
        throw new ContentError("DeviceN colour space has no colorant names");
      }

      const alternate = await loadColorSpace(param(2), ctx, depth + 1);
      const tint = await loadFunction(param(3), ctx);

      return new TintSpace("DeviceN", names.length, alternate, tint);
    }

    case "Pattern": {
      const base = value.at(1, ctx.resolver);

      return new PatternSpace(base ? await loadColorSpace(base, ctx, depth + 1) : undefined);
    }

    default:
      throw new ContentError(`Unknown colour space /${family.value}`);
  }
}
