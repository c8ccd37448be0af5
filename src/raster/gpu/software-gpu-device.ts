/**
 * In-process emulation of a multisampled stencil-and-blend pipeline.
 *
 * Every pixel carries 16 stencil samples on a rotated grid and one
 * premultiplied colour. A cover pass counts the samples the fill rule
 * and the clip layer keep and blends the colour with that fraction.
 */

import type { RGBA } from "#src/helpers/colors";
import type { Matrix, Rect } from "#src/helpers/matrix";
import type { FillRule } from "#src/scene/path";
import type { SceneImage } from "#src/scene/scene";
import { type ImageSample, ImageSampler } from "../image-sampler";
import { fromPremultiplied, premultipliedFill, type RenderTarget } from "../render-target";
import type { GpuDevice } from "./gpu-device";
import { TRIANGLE_STRIDE } from "./tessellator";

const SAMPLES = 16;

/**
 * Sample offsets within a pixel as x, y pairs. A 4x4 grid rotated so
 * that no two samples share a row or a column.
 */
const SAMPLE_OFFSETS: Float64Array = (() => {
  const offsets = new Float64Array(SAMPLES * 2);

  for (let i = 0; i < 4; i++) {
    for (let j = 0; j < 4; j++) {
      const k = i * 4 + j;

      offsets[2 * k] = (4 * i + j + 0.5) / SAMPLES;
      offsets[2 * k + 1] = (4 * j + (3 - i) + 0.5) / SAMPLES;
    }
  }

  return offsets;
})();

export class SoftwareGpuDevice implements GpuDevice {
  readonly name = "software";
  readonly sampleCount = SAMPLES;

  private width = 0;
  private height = 0;
  private color = new Float32Array(0);
  /** Winding count per sample; zero outside a fill in progress */
  private stencil = new Int16Array(0);
  /** One byte per sample, 1 where the clip keeps it */
  private clips: Uint8Array[] = [];

  begin(width: number, height: number, background: RGBA | null): void {
    this.width = width;
    this.height = height;
    this.color = premultipliedFill(width, height, background);
    this.stencil = new Int16Array(width * height * SAMPLES);
    this.clips = [];
  }

  fill(triangles: Float32Array, bounds: Rect, fillRule: FillRule, color: RGBA): void {
    const area = this.stencilTriangles(triangles, bounds);

    if (!area) {
      return;
    }

    const clip = this.clips.at(-1);

    this.cover(area, fillRule, clip, (index, kept) => {
      const coverage = (kept / SAMPLES) * color.alpha;
      const offset = index * 4;
      const inverse = 1 - coverage;

      this.color[offset] = color.red * coverage + this.color[offset] * inverse;
      this.color[offset + 1] = color.green * coverage + this.color[offset + 1] * inverse;
      this.color[offset + 2] = color.blue * coverage + this.color[offset + 2] * inverse;
      this.color[offset + 3] = coverage + this.color[offset + 3] * inverse;
    });
  }

  pushClip(triangles: Float32Array, bounds: Rect | null, fillRule: FillRule): void {
    const layer = new Uint8Array(this.width * this.height * SAMPLES);
    const previous = this.clips.at(-1);
    const area = bounds && this.stencilTriangles(triangles, bounds);

    if (area) {
      for (let y = area.y0; y < area.y1; y++) {
        for (let x = area.x0; x < area.x1; x++) {
          const base = (y * this.width + x) * SAMPLES;

          for (let s = base; s < base + SAMPLES; s++) {
            if (keeps(this.stencil[s], fillRule) && (!previous || previous[s])) {
              layer[s] = 1;
            }

            this.stencil[s] = 0;
          }
        }
      }
    }

    this.clips.push(layer);
  }

  popClip(): void {
    this.clips.pop();
  }

  drawImage(image: SceneImage, transform: Matrix, alpha: number): void {
    const sampler = new ImageSampler(image, transform);
    const bounds = sampler.bounds(this.width, this.height);
    const clip = this.clips.at(-1);
    const sample: ImageSample = { red: 0, green: 0, blue: 0, alpha: 0 };

    if (!bounds) {
      return;
    }

    for (let y = bounds.y0; y < bounds.y1; y++) {
      for (let x = bounds.x0; x < bounds.x1; x++) {
        const index = y * this.width + x;
        const weight = alpha * (clip ? clipFraction(clip, index) : 1);

        if (weight <= 0 || !sampler.sample(x, y, sample) || sample.alpha <= 0) {
          continue;
        }

        const offset = index * 4;
        const inverse = 1 - sample.alpha * weight;

        this.color[offset] = sample.red * weight + this.color[offset] * inverse;
        this.color[offset + 1] = sample.green * weight + this.color[offset + 1] * inverse;
        this.color[offset + 2] = sample.blue * weight + this.color[offset + 2] * inverse;
        this.color[offset + 3] = sample.alpha * weight + this.color[offset + 3] * inverse;
      }
    }
  }

  readPixels(): RenderTarget {
    return fromPremultiplied(this.width, this.height, this.color);
  }

  dispose(): void {
    this.color = new Float32Array(0);
    this.stencil = new Int16Array(0);
    this.clips = [];
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Stencil passes
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Add each triangle's orientation to the samples it covers. Returns the
   * pixel area touched, clipped to the target, or null when nothing is.
   */
  private stencilTriangles(triangles: Float32Array, bounds: Rect): Rect | null {
    const area = {
      x0: Math.max(Math.floor(bounds.x0), 0),
      y0: Math.max(Math.floor(bounds.y0), 0),
      x1: Math.min(Math.ceil(bounds.x1), this.width),
      y1: Math.min(Math.ceil(bounds.y1), this.height),
    };

    if (area.x1 <= area.x0 || area.y1 <= area.y0) {
      return null;
    }

    for (let t = 0; t + TRIANGLE_STRIDE <= triangles.length; t += TRIANGLE_STRIDE) {
      this.stencilTriangle(triangles.subarray(t, t + TRIANGLE_STRIDE), area);
    }

    return area;
  }

  private stencilTriangle(v: Float32Array, area: Rect): void {
    const [ax, ay, x1, y1, x2, y2] = v;
    const orientation = (x1 - ax) * (y2 - ay) - (y1 - ay) * (x2 - ax);

    if (orientation === 0) {
      return;
    }

    const delta = orientation > 0 ? 1 : -1;
    const [bx, by, cx, cy] = orientation > 0 ? [x1, y1, x2, y2] : [x2, y2, x1, y1];

    const edges = [
      new TriangleEdge(ax, ay, bx, by),
      new TriangleEdge(bx, by, cx, cy),
      new TriangleEdge(cx, cy, ax, ay),
    ];
    const left = Math.max(Math.floor(Math.min(ax, bx, cx)), area.x0);
    const top = Math.max(Math.floor(Math.min(ay, by, cy)), area.y0);
    const right = Math.min(Math.ceil(Math.max(ax, bx, cx)), area.x1);
    const bottom = Math.min(Math.ceil(Math.max(ay, by, cy)), area.y1);

    for (let y = top; y < bottom; y++) {
      for (let x = left; x < right; x++) {
        const base = (y * this.width + x) * SAMPLES;

        for (let s = 0; s < SAMPLES; s++) {
          const px = x + SAMPLE_OFFSETS[2 * s];
          const py = y + SAMPLE_OFFSETS[2 * s + 1];

          if (edges[0].includes(px, py) && edges[1].includes(px, py) && edges[2].includes(px, py)) {
            this.stencil[base + s] += delta;
          }
        }
      }
    }
  }

  /**
   * Visit each pixel of `area` with the number of samples kept by the fill
   * rule and the clip, resetting the stencil as it goes.
   */
  private cover(
    area: Rect,
    fillRule: FillRule,
    clip: Uint8Array | undefined,
    blend: (index: number, kept: number) => void,
  ): void {
    for (let y = area.y0; y < area.y1; y++) {
      for (let x = area.x0; x < area.x1; x++) {
        const index = y * this.width + x;
        const base = index * SAMPLES;
        let kept = 0;

        for (let s = base; s < base + SAMPLES; s++) {
          if (keeps(this.stencil[s], fillRule) && (!clip || clip[s])) {
            kept++;
          }

          this.stencil[s] = 0;
        }

        if (kept > 0) {
          blend(index, kept);
        }
      }
    }
  }
}

/**
 * One edge of a positively oriented triangle. Samples exactly on an edge
 * belong to one side only, so triangles sharing the edge never both
 * count them.
 */
class TriangleEdge {
  private readonly dx: number;
  private readonly dy: number;
  private readonly inclusive: boolean;

  constructor(
    private readonly x: number,
    private readonly y: number,
    toX: number,
    toY: number,
  ) {
    this.dx = toX - x;
    this.dy = toY - y;
    this.inclusive = this.dy > 0 || (this.dy === 0 && this.dx < 0);
  }

  includes(px: number, py: number): boolean {
    const side = this.dx * (py - this.y) - this.dy * (px - this.x);

    return side > 0 || (side === 0 && this.inclusive);
  }
}

function keeps(winding: number, fillRule: FillRule): boolean {
  return fillRule === "nonzero" ? winding !== 0 : (winding & 1) !== 0;
}

function clipFraction(clip: Uint8Array, index: number): number {
  const base = index * SAMPLES;
  let kept = 0;

  for (let s = base; s < base + SAMPLES; s++) {
    kept += clip[s];
  }

  return kept / SAMPLES;
}
