import { clamp01, type RGBA } from "#src/helpers/colors";

/**
 * RGBA8 pixels, not premultiplied, row-major from the top-left corner.
 */
export interface RenderTarget {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

export function createRenderTarget(width: number, height: number): RenderTarget {
  return { width, height, data: new Uint8ClampedArray(width * height * 4) };
}

/**
 * Convert premultiplied float RGBA (0..1) to a render target.
 */
export function fromPremultiplied(width: number, height: number, pixels: Float32Array): RenderTarget {
  const target = createRenderTarget(width, height);
  const out = target.data;

  for (let i = 0; i < pixels.length; i += 4) {
    const alpha = clamp01(pixels[i + 3]);

    if (alpha <= 0) {
      continue;
    }

    out[i] = Math.round(clamp01(pixels[i] / alpha) * 255);
    out[i + 1] = Math.round(clamp01(pixels[i + 1] / alpha) * 255);
    out[i + 2] = Math.round(clamp01(pixels[i + 2] / alpha) * 255);
    out[i + 3] = Math.round(alpha * 255);
  }

  return target;
}

/**
 * Premultiplied float buffer filled with one colour.
 */
export function premultipliedFill(width: number, height: number, color: RGBA | null): Float32Array {
  const pixels = new Float32Array(width * height * 4);

  if (!color || color.alpha <= 0) {
    return pixels;
  }

  const a = clamp01(color.alpha);

  for (let i = 0; i < pixels.length; i += 4) {
    pixels[i] = color.red * a;
    pixels[i + 1] = color.green * a;
    pixels[i + 2] = color.blue * a;
    pixels[i + 3] = a;
  }

  return pixels;
}
