/**
 * The raster backend contract and the pieces both backends share:
 * target sizing, the scene-to-device transform and item geometry.
 */

import type { RGBA } from "#src/helpers/colors";
import { type Matrix, multiply, type Rect, scale, translate } from "#src/helpers/matrix";
import type { FillRule } from "#src/scene/path";
import type { Scene, SceneItem } from "#src/scene/scene";
import { flattenPath } from "./flatten";
import type { RenderTarget } from "./render-target";
import { strokeToPolygons } from "./stroker";

/**
 * Region of the rendered page, in device pixels at the render scale.
 */
export interface Viewport {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface RasterizeOptions {
  /** Device pixels per point */
  scale: number;
  /** Defaults to the whole page */
  viewport?: Viewport;
  /** Colour under the page; transparent when absent */
  background?: RGBA | null;
  signal?: AbortSignal;
}

export type BackendKind = "cpu" | "gpu";

export interface RasterBackend {
  readonly kind: BackendKind;
  rasterize(scene: Scene, options: RasterizeOptions): Promise<RenderTarget>;
  dispose(): void;
}

/** Scene items drawn between yields to the event loop */
export const YIELD_BATCH = 64;

/** Longest side of a render target */
export const MAX_TARGET_SIZE = 16384;

export function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 0));
}

/**
 * Pixel size of the whole page at a scale.
 */
export function pageViewport(scene: Scene, pixelsPerPoint: number): Viewport {
  const size = (points: number) => Math.max(Math.ceil(points * pixelsPerPoint - 1e-6), 1);

  return { x: 0, y: 0, width: size(scene.width), height: size(scene.height) };
}

/**
 * The viewport a render covers.
 *
 * @throws {RangeError} for a non-positive scale or an oversized target
 */
export function resolveViewport(scene: Scene, options: RasterizeOptions): Viewport {
  if (!(options.scale > 0) || !Number.isFinite(options.scale)) {
    throw new RangeError(`Invalid render scale ${options.scale}`);
  }

  const viewport = options.viewport ?? pageViewport(scene, options.scale);
  const width = Math.floor(viewport.width);
  const height = Math.floor(viewport.height);

  if (width < 1 || height < 1 || width > MAX_TARGET_SIZE || height > MAX_TARGET_SIZE) {
    throw new RangeError(`Invalid render target size ${viewport.width}x${viewport.height}`);
  }

  return { x: viewport.x, y: viewport.y, width, height };
}

/**
 * Scene space (points, y down) to target pixels.
 */
export function deviceMatrix(options: RasterizeOptions, viewport: Viewport): Matrix {
  return multiply(scale(options.scale), translate(-viewport.x, -viewport.y));
}

/**
 * Polygons to fill for a path-like item, in device pixels.
 */
export interface ItemGeometry {
  contours: number[][];
  fillRule: FillRule;
}

/**
 * Device-space polygons for fill, stroke, glyph and clip items; null for
 * images and clip pops.
 */
export function itemGeometry(item: SceneItem, device: Matrix): ItemGeometry | null {
  switch (item.kind) {
    case "fill":
    case "pushClip":
      return {
        contours: flattenPath(item.path, multiply(item.transform, device)).map(p => p.points),
        fillRule: item.fillRule,
      };
    case "stroke":
      return {
        contours: strokeToPolygons(item.path, multiply(item.transform, device), item.style),
        fillRule: "nonzero",
      };
    case "glyphs": {
      const toDevice = multiply(item.transform, device);
      const contours: number[][] = [];

      for (const { glyph, matrix } of item.glyphs) {
        if (item.stroke) {
          // Line widths are in user space, so outline the glyph there
          contours.push(...strokeToPolygons(glyph.path.transform(matrix), toDevice, item.stroke));
        } else {
          for (const polyline of flattenPath(glyph.path, multiply(matrix, toDevice))) {
            contours.push(polyline.points);
          }
        }
      }

      return { contours, fillRule: "nonzero" };
    }
    case "image":
    case "popClip":
      return null;
  }
}

/**
 * Integer pixel bounds of a polygon set within a target, or null when
 * they miss it.
 */
export function contourBounds(
  contours: readonly (readonly number[])[],
  width: number,
  height: number,
): Rect | null {
  let x0 = Infinity;
  let y0 = Infinity;
  let x1 = -Infinity;
  let y1 = -Infinity;

  for (const points of contours) {
    for (let i = 0; i + 1 < points.length; i += 2) {
      x0 = Math.min(x0, points[i]);
      x1 = Math.max(x1, points[i]);
      y0 = Math.min(y0, points[i + 1]);
      y1 = Math.max(y1, points[i + 1]);
    }
  }

  const bounds = {
    x0: Math.max(Math.floor(x0), 0),
    y0: Math.max(Math.floor(y0), 0),
    x1: Math.min(Math.ceil(x1), width),
    y1: Math.min(Math.ceil(y1), height),
  };

  return bounds.x1 > bounds.x0 && bounds.y1 > bounds.y0 ? bounds : null;
}
