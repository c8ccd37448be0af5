import { multiply } from "#src/helpers/matrix";
import type { Scene } from "#src/scene/scene";
import {
  contourBounds,
  deviceMatrix,
  itemGeometry,
  type RasterBackend,
  type RasterizeOptions,
  resolveViewport,
  YIELD_BATCH,
  yieldToEventLoop,
} from "../backend";
import type { RenderTarget } from "../render-target";
import type { GpuDevice } from "./gpu-device";
import { SoftwareGpuDevice } from "./software-gpu-device";
import { tessellateFans } from "./tessellator";

/**
 * Rasterizes scenes by issuing stencil-then-cover batches to a
 * {@link GpuDevice}.
 *
 * A device holds one target at a time, so renders on the same backend
 * run one after another.
 *
 * @example
 * ```typescript
 * const backend = new GpuBackend(new WebGl2Device(canvas.getContext("webgl2")));
 * const target = await backend.rasterize(scene, { scale: 2 });
 * ```
 */
export class GpuBackend implements RasterBackend {
  readonly kind = "gpu";

  private queue: Promise<unknown> = Promise.resolve();

  constructor(readonly device: GpuDevice = new SoftwareGpuDevice()) {}

  rasterize(scene: Scene, options: RasterizeOptions): Promise<RenderTarget> {
    const run = this.queue.then(() => this.draw(scene, options));

    // Keep the queue going after a failed or cancelled render
    this.queue = run.catch(() => undefined);

    return run;
  }

  dispose(): void {
    this.device.dispose();
  }

  private async draw(scene: Scene, options: RasterizeOptions): Promise<RenderTarget> {
    options.signal?.throwIfAborted();

    const viewport = resolveViewport(scene, options);
    const { width, height } = viewport;
    const device = deviceMatrix(options, viewport);

    this.device.begin(width, height, options.background ?? null);

    for (let i = 0; i < scene.items.length; i++) {
      if (i > 0 && i % YIELD_BATCH === 0) {
        await yieldToEventLoop();
        options.signal?.throwIfAborted();
      }

      const item = scene.items[i];

      switch (item.kind) {
        case "fill":
        case "stroke":
        case "glyphs":
        case "pushClip": {
          const geometry = itemGeometry(item, device);
          const bounds = geometry && contourBounds(geometry.contours, width, height);
          const triangles = geometry ? tessellateFans(geometry.contours) : new Float32Array(0);

          if (item.kind === "pushClip") {
            this.device.pushClip(triangles, triangles.length > 0 ? bounds : null, item.fillRule);
          } else if (geometry && bounds && triangles.length > 0) {
            this.device.fill(triangles, bounds, geometry.fillRule, item.color);
          }

          break;
        }
        case "image":
          this.device.drawImage(item.image, multiply(item.transform, device), item.alpha);
          break;
        case "popClip":
          this.device.popClip();
          break;
      }
    }

    options.signal?.throwIfAborted();

    return this.device.readPixels();
  }
}
