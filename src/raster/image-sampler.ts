/**
 * Image resampling by inverse mapping.
 *
 * Each target pixel centre is mapped back into the image. Magnified
 * images take the nearest sample; minified ones average the box of
 * samples the pixel covers.
 */

import { invert, type Matrix, type Rect, transformRect } from "#src/helpers/matrix";
import type { SceneImage } from "#src/scene/scene";

/** Samples per side of a box filter before it strides */
const MAX_BOX_SAMPLES = 16;

const UNIT_SQUARE: Rect = { x0: 0, y0: 0, x1: 1, y1: 1 };

export interface ImageSample {
  /** Premultiplied colour and alpha, 0-1 */
  red: number;
  green: number;
  blue: number;
  alpha: number;
}

/**
 * Sampler for one image under one transform.
 */
export class ImageSampler {
  private readonly inverse: Matrix | null;
  private readonly footprintX: number;
  private readonly footprintY: number;

  constructor(
    private readonly image: SceneImage,
    /** Image unit square to target pixels */
    readonly transform: Matrix,
  ) {
    this.inverse = invert(transform);

    const inv = this.inverse ?? [0, 0, 0, 0, 0, 0];

    // Image samples spanned by one target pixel along each image axis
    this.footprintX = (Math.abs(inv[0]) + Math.abs(inv[2])) * image.width;
    this.footprintY = (Math.abs(inv[1]) + Math.abs(inv[3])) * image.height;
  }

  /**
   * Target pixels the image may touch, or null when it is degenerate.
   */
  bounds(width: number, height: number): Rect | null {
    if (!this.inverse) {
      return null;
    }

    const r = transformRect(this.transform, UNIT_SQUARE);
    const bounds = {
      x0: Math.max(Math.floor(r.x0), 0),
      y0: Math.max(Math.floor(r.y0), 0),
      x1: Math.min(Math.ceil(r.x1), width),
      y1: Math.min(Math.ceil(r.y1), height),
    };

    return bounds.x1 > bounds.x0 && bounds.y1 > bounds.y0 ? bounds : null;
  }

  /**
   * Sample at target pixel (px, py), or null outside the image.
   */
  sample(px: number, py: number, out: ImageSample): ImageSample | null {
    const inv = this.inverse;

    if (!inv) {
      return null;
    }

    const x = px + 0.5;
    const y = py + 0.5;
    const u = inv[0] * x + inv[2] * y + inv[4];
    const v = inv[1] * x + inv[3] * y + inv[5];

    if (u < 0 || u > 1 || v < 0 || v > 1) {
      return null;
    }

    const { width, height } = this.image;
    // Row 0 is the top of the image, at v = 1
    const ix = u * width;
    const iy = (1 - v) * height;

    if (this.footprintX <= 1 && this.footprintY <= 1) {
      this.read(Math.min(Math.floor(ix), width - 1), Math.min(Math.floor(iy), height - 1), out);
      return out;
    }

    return this.box(ix, iy, out);
  }

  private read(sx: number, sy: number, out: ImageSample): void {
    const data = this.image.data;
    const offset = (sy * this.image.width + sx) * 4;
    const alpha = data[offset + 3] / 255;

    out.red = (data[offset] / 255) * alpha;
    out.green = (data[offset + 1] / 255) * alpha;
    out.blue = (data[offset + 2] / 255) * alpha;
    out.alpha = alpha;
  }

  private box(ix: number, iy: number, out: ImageSample): ImageSample {
    const { width, height, data } = this.image;
    const halfX = Math.max(this.footprintX, 1) / 2;
    const halfY = Math.max(this.footprintY, 1) / 2;
    const xa = Math.min(Math.max(Math.floor(ix - halfX), 0), width - 1);
    const xb = Math.min(Math.max(Math.ceil(ix + halfX) - 1, xa), width - 1);
    const ya = Math.min(Math.max(Math.floor(iy - halfY), 0), height - 1);
    const yb = Math.min(Math.max(Math.ceil(iy + halfY) - 1, ya), height - 1);
    const strideX = Math.max(Math.ceil((xb - xa + 1) / MAX_BOX_SAMPLES), 1);
    const strideY = Math.max(Math.ceil((yb - ya + 1) / MAX_BOX_SAMPLES), 1);

    let red = 0;
    let green = 0;
    let blue = 0;
    let alpha = 0;
    let count = 0;

    for (let sy = ya; sy <= yb; sy += strideY) {
      for (let sx = xa; sx <= xb; sx += strideX) {
        const offset = (sy * width + sx) * 4;
        const a = data[offset + 3] / 255;

        red += (data[offset] / 255) * a;
        green += (data[offset + 1] / 255) * a;
        blue += (data[offset + 2] / 255) * a;
        alpha += a;
        count++;
      }
    }

    out.red = red / count;
    out.green = green / count;
    out.blue = blue / count;
    out.alpha = alpha / count;

    return out;
  }
}
