/**
 * Shadings (function-based, axial and radial), rendered to sampled images.
 */

import { type RGB, rgb } from "#src/helpers/colors";
import { invert, type Matrix, type Rect, transformPoint } from "#src/helpers/matrix";
import type { PdfDict } from "#src/objects/pdf-dict";
import { isDictLike, type PdfObject } from "#src/objects/pdf-object";
import type { SceneImage } from "#src/scene/scene";
import type { ColorSpace } from "./color-space";
import { ContentError, UnsupportedFeatureError } from "./errors";
import { loadFunction, type PdfFunction } from "./functions";
import type { ImageDecodeContext } from "./image-decoder";

/** Longest side of a rendered shading, in pixels */
export const MAX_SHADING_SIZE = 4096;

export interface Shading {
  readonly shadingType: number;
  readonly colorSpace: ColorSpace;
  /** Shading-space bounds outside which nothing is painted */
  readonly bbox: Rect | null;
  /** Colour used by shading patterns where the shading itself paints nothing */
  readonly background: RGB | null;
  /** Colour at a shading-space point, or null where the shading paints nothing */
  colorAt(x: number, y: number): RGB | null;
}

export interface ShadingImage {
  image: SceneImage;
  /** Unit square to scene space */
  transform: Matrix;
}

function numbers(dict: PdfDict, key: string, ctx: ImageDecodeContext): number[] | undefined {
  const values = dict.getArray(key, ctx.resolver)?.toNumbers(ctx.resolver);

  return values?.every(Number.isFinite) ? values : undefined;
}

function extend(dict: PdfDict, ctx: ImageDecodeContext): [boolean, boolean] {
  const array = dict.getArray("Extend", ctx.resolver);
  const flag = (i: number) => {
    const item = array?.at(i, ctx.resolver);

    return item?.type === "bool" ? item.value : false;
  };

  return [flag(0), flag(1)];
}

/**
 * Load a shading dictionary (or a shading stream's dictionary).
 *
 * @throws {UnsupportedFeatureError} for mesh and patch shadings (types 4-7)
 * @throws {ContentError} for malformed shadings
 */
export async function loadShading(obj: PdfObject, ctx: ImageDecodeContext): Promise<Shading> {
  const dict = obj.type === "ref" ? ctx.resolver(obj) : obj;

  if (!isDictLike(dict)) {
    throw new ContentError("Shading is not a dictionary");
  }

  const shadingType = dict.getNumber("ShadingType", ctx.resolver)?.value;

  if (shadingType !== undefined && shadingType >= 4 && shadingType <= 7) {
    throw new UnsupportedFeatureError(`Shading type ${shadingType} is not supported`);
  }

  const csObject = dict.get("ColorSpace", ctx.resolver);

  if (!csObject) {
    throw new ContentError("Shading has no /ColorSpace");
  }

  const colorSpace = await ctx.loadColorSpace(csObject);
  const fnObject = dict.get("Function", ctx.resolver);
  const fn = fnObject ? await loadFunction(fnObject, ctx) : null;
  const bbox = dict.getRect("BBox", ctx.resolver) ?? null;
  const backgroundValues = numbers(dict, "Background", ctx);
  const background =
    backgroundValues?.length === colorSpace.components ? colorSpace.toRgb(backgroundValues) : null;

  // Function outputs are colour components; without a function the
  // shading types here have nothing to paint
  if (!fn) {
    throw new ContentError(`Shading type ${shadingType ?? "(missing)"} has no /Function`);
  }

  const color = (input: number[]) => colorSpace.toRgb(fn(input));
  const base = { shadingType, colorSpace, bbox, background };

  switch (shadingType) {
    case 1:
      return { ...base, shadingType, colorAt: functionBased(dict, ctx, color) };
    case 2:
      return { ...base, shadingType, colorAt: axial(dict, ctx, color) };
    case 3:
      return { ...base, shadingType, colorAt: radial(dict, ctx, color) };
    default:
      throw new ContentError(`Unknown shading type ${shadingType ?? "(missing)"}`);
  }
}

type ColorFn = (input: number[]) => RGB;
type ColorAt = Shading["colorAt"];

function functionBased(dict: PdfDict, ctx: ImageDecodeContext, color: ColorFn): ColorAt {
  const [x0 = 0, x1 = 1, y0 = 0, y1 = 1] = numbers(dict, "Domain", ctx) ?? [];
  const matrix = numbers(dict, "Matrix", ctx);
  const [a, b, c, d, e, f] = matrix ?? [];
  const inverse = matrix?.length === 6 ? invert([a, b, c, d, e, f]) : null;

  if (matrix?.length === 6 && !inverse) {
    throw new ContentError("Function-based shading has a singular /Matrix");
  }

  return (x, y) => {
    const p = inverse ? transformPoint(inverse, x, y) : { x, y };

    if (p.x < x0 || p.x > x1 || p.y < y0 || p.y > y1) {
      return null;
    }

    return color([p.x, p.y]);
  };
}

function axial(dict: PdfDict, ctx: ImageDecodeContext, color: ColorFn): ColorAt {
  const coords = numbers(dict, "Coords", ctx);

  if (coords?.length !== 4) {
    throw new ContentError("Axial shading has no valid /Coords");
  }

  const [x0, y0, x1, y1] = coords;
  const [t0 = 0, t1 = 1] = numbers(dict, "Domain", ctx) ?? [];
  const [extendStart, extendEnd] = extend(dict, ctx);
  const dx = x1 - x0;
  const dy = y1 - y0;
  const lengthSquared = dx * dx + dy * dy;

  return (x, y) => {
    let s = lengthSquared === 0 ? 0 : ((x - x0) * dx + (y - y0) * dy) / lengthSquared;

    if (s < 0) {
      if (!extendStart) {
        return null;
      }

      s = 0;
    } else if (s > 1) {
      if (!extendEnd) {
        return null;
      }

      s = 1;
    }

    return color([t0 + s * (t1 - t0)]);
  };
}

function radial(dict: PdfDict, ctx: ImageDecodeContext, color: ColorFn): ColorAt {
  const coords = numbers(dict, "Coords", ctx);

  if (coords?.length !== 6) {
    throw new ContentError("Radial shading has no valid /Coords");
  }

  const [x0, y0, r0, x1, y1, r1] = coords;
  const [t0 = 0, t1 = 1] = numbers(dict, "Domain", ctx) ?? [];
  const [extendStart, extendEnd] = extend(dict, ctx);
  const cdx = x1 - x0;
  const cdy = y1 - y0;
  const dr = r1 - r0;
  const a = cdx * cdx + cdy * cdy - dr * dr;

  const valid = (s: number) => {
    if (r0 + s * dr < 0) {
      return false;
    }

    return (s >= 0 || extendStart) && (s <= 1 || extendEnd);
  };

  return (x, y) => {
    const pdx = x - x0;
    const pdy = y - y0;
    const b = pdx * cdx + pdy * cdy + r0 * dr;
    const c = pdx * pdx + pdy * pdy - r0 * r0;
    const candidates: number[] = [];

    // a·s² − 2b·s + c = 0; the larger root is the circle drawn last
    if (Math.abs(a) < 1e-12) {
      if (b !== 0) {
        candidates.push(c / (2 * b));
      }
    } else {
      const discriminant = b * b - a * c;

      if (discriminant < 0) {
        return null;
      }

      const root = Math.sqrt(discriminant);

      candidates.push((b + root) / a, (b - root) / a);
      candidates.sort((p, q) => q - p);
    }

    const s = candidates.find(valid);

    if (s === undefined) {
      return null;
    }

    return color([t0 + Math.min(Math.max(s, 0), 1) * (t1 - t0)]);
  };
}

/**
 * Sample a shading over a scene-space area.
 *
 * @param toScene - Shading space to scene space
 * @param area - Scene-space rectangle to fill, already clipped
 * @param resolution - Pixels per scene unit
 * @param useBackground - Paint /Background where the shading paints nothing
 */
export function renderShading(
  shading: Shading,
  toScene: Matrix,
  area: Rect,
  resolution: number,
  alpha: number,
  useBackground = false,
): ShadingImage | null {
  const fromScene = invert(toScene);
  const areaWidth = area.x1 - area.x0;
  const areaHeight = area.y1 - area.y0;

  if (!fromScene || areaWidth <= 0 || areaHeight <= 0) {
    return null;
  }

  const width = Math.min(Math.max(Math.ceil(areaWidth * resolution), 1), MAX_SHADING_SIZE);
  const height = Math.min(Math.max(Math.ceil(areaHeight * resolution), 1), MAX_SHADING_SIZE);
  const data = new Uint8ClampedArray(width * height * 4);
  const opacity = Math.round(Math.min(Math.max(alpha, 0), 1) * 255);
  const { bbox } = shading;

  for (let j = 0; j < height; j++) {
    const sy = area.y0 + ((j + 0.5) / height) * areaHeight;

    for (let i = 0; i < width; i++) {
      const sx = area.x0 + ((i + 0.5) / width) * areaWidth;
      const p = transformPoint(fromScene, sx, sy);

      if (bbox && (p.x < bbox.x0 || p.x > bbox.x1 || p.y < bbox.y0 || p.y > bbox.y1)) {
        continue;
      }

      const color = shading.colorAt(p.x, p.y) ?? (useBackground ? shading.background : null);

      if (!color) {
        continue;
      }

      const offset = (j * width + i) * 4;

      data[offset] = Math.round(color.red * 255);
      data[offset + 1] = Math.round(color.green * 255);
      data[offset + 2] = Math.round(color.blue * 255);
      data[offset + 3] = opacity;
    }
  }

  return {
    image: { width, height, data },
    transform: [areaWidth, 0, 0, -areaHeight, area.x0, area.y0 + areaHeight],
  };
}

/**
 * Representative colour of a shading, used where it cannot be sampled
 * (stroking with a shading pattern).
 */
export function shadingMidColor(shading: Shading): RGB {
  const bbox = shading.bbox;
  const x = bbox ? (bbox.x0 + bbox.x1) / 2 : 0.5;
  const y = bbox ? (bbox.y0 + bbox.y1) / 2 : 0.5;

  return shading.colorAt(x, y) ?? shading.background ?? rgb(0.5, 0.5, 0.5);
}
