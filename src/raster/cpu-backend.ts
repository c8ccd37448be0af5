/**
 * CPU rasterization: coverage masks composited source-over into a
 * premultiplied Float32 buffer.
 */

import type { RGBA } from "#src/helpers/colors";
import { intersectRects, multiply } from "#src/helpers/matrix";
import type { Scene } from "#src/scene/scene";
import {
  deviceMatrix,
  itemGeometry,
  type RasterBackend,
  type RasterizeOptions,
  resolveViewport,
  YIELD_BATCH,
  yieldToEventLoop,
} from "./backend";
import { AlphaMask, rasterizeCoverage } from "./coverage";
import { type ImageSample, ImageSampler } from "./image-sampler";
import { fromPremultiplied, premultipliedFill, type RenderTarget } from "./render-target";

export class CpuBackend implements RasterBackend {
  readonly kind = "cpu";

  async rasterize(scene: Scene, options: RasterizeOptions): Promise<RenderTarget> {
    options.signal?.throwIfAborted();

    const viewport = resolveViewport(scene, options);
    const { width, height } = viewport;
    const device = deviceMatrix(options, viewport);
    const pixels = premultipliedFill(width, height, options.background ?? null);
    // Each entry is the intersection of every clip up to it
    const clips: AlphaMask[] = [];

    for (let i = 0; i < scene.items.length; i++) {
      if (i > 0 && i % YIELD_BATCH === 0) {
        await yieldToEventLoop();
        options.signal?.throwIfAborted();
      }

      const item = scene.items[i];
      const clip = clips.at(-1) ?? null;

      switch (item.kind) {
        case "fill":
        case "stroke":
        case "glyphs": {
          const geometry = itemGeometry(item, device);

          if (geometry) {
            const mask = rasterizeCoverage(geometry.contours, geometry.fillRule, width, height);

            compositeMask(pixels, width, mask, clip, item.color);
          }

          break;
        }
        case "image": {
          const sampler = new ImageSampler(item.image, multiply(item.transform, device));

          compositeImage(pixels, width, height, sampler, clip, item.alpha);
          break;
        }
        case "pushClip": {
          const geometry = itemGeometry(item, device);
          const mask = geometry
            ? rasterizeCoverage(geometry.contours, geometry.fillRule, width, height)
            : AlphaMask.empty();

          clips.push(clip ? clip.multiply(mask) : mask);
          break;
        }
        case "popClip":
          clips.pop();
          break;
      }
    }

    options.signal?.throwIfAborted();

    return fromPremultiplied(width, height, pixels);
  }

  dispose(): void {}
}

function compositeMask(
  pixels: Float32Array,
  width: number,
  mask: AlphaMask,
  clip: AlphaMask | null,
  color: RGBA,
): void {
  const bounds = clip ? intersectRects(mask.window, clip.window) : mask.window;

  if (!bounds) {
    return;
  }

  for (let y = bounds.y0; y < bounds.y1; y++) {
    const maskRow = (y - mask.window.y0) * mask.width - mask.window.x0;

    for (let x = bounds.x0; x < bounds.x1; x++) {
      const coverage = mask.data[maskRow + x] * (clip ? clip.at(x, y) : 1) * color.alpha;

      if (coverage <= 0) {
        continue;
      }

      const offset = (y * width + x) * 4;
      const inverse = 1 - coverage;

      pixels[offset] = color.red * coverage + pixels[offset] * inverse;
      pixels[offset + 1] = color.green * coverage + pixels[offset + 1] * inverse;
      pixels[offset + 2] = color.blue * coverage + pixels[offset + 2] * inverse;
      pixels[offset + 3] = coverage + pixels[offset + 3] * inverse;
    }
  }
}

function compositeImage(
  pixels: Float32Array,
  width: number,
  height: number,
  sampler: ImageSampler,
  clip: AlphaMask | null,
  alpha: number,
): void {
  const bounds = sampler.bounds(width, height);
  const sample: ImageSample = { red: 0, green: 0, blue: 0, alpha: 0 };

  if (!bounds) {
    return;
  }

  for (let y = bounds.y0; y < bounds.y1; y++) {
    for (let x = bounds.x0; x < bounds.x1; x++) {
      const index = y * width + x;
      const weight = alpha * (clip ? clip.at(x, y) : 1);

      if (weight <= 0 || !sampler.sample(x, y, sample) || sample.alpha <= 0) {
        continue;
      }

      const offset = index * 4;
      const inverse = 1 - sample.alpha * weight;

      pixels[offset] = sample.red * weight + pixels[offset] * inverse;
      pixels[offset + 1] = sample.green * weight + pixels[offset + 1] * inverse;
      pixels[offset + 2] = sample.blue * weight + pixels[offset + 2] * inverse;
      pixels[offset + 3] = sample.alpha * weight + pixels[offset + 3] * inverse;
    }
  }
}
