import type { RGBA } from "#src/helpers/colors";
import type { Matrix, Rect } from "#src/helpers/matrix";
import type { FillRule } from "#src/scene/path";
import type { SceneImage } from "#src/scene/scene";
import type { RenderTarget } from "../render-target";

/**
 * The drawing surface a {@link GpuBackend} issues batches to.
 *
 * Coordinates are target pixels with the origin at the top-left. Paths
 * arrive as fan triangles (see `tessellateFans`) and are drawn
 * stencil-then-cover: the triangles build a winding count per sample and
 * a cover pass over `bounds` paints the samples the fill rule keeps.
 */
export interface GpuDevice {
  readonly name: string;

  /** Samples per pixel of the stencil and clip layers */
  readonly sampleCount: number;

  /** Start a new target, cleared to `background` (transparent when null). */
  begin(width: number, height: number, background: RGBA | null): void;

  fill(triangles: Float32Array, bounds: Rect, fillRule: FillRule, color: RGBA): void;

  /**
   * Push a clip layer: the intersection of the current layer with the
   * region. A null `bounds` pushes an empty clip.
   */
  pushClip(triangles: Float32Array, bounds: Rect | null, fillRule: FillRule): void;

  popClip(): void;

  /**
   * Draw an image as a texture.
   *
   * @param transform - Image unit square to target pixels
   */
  drawImage(image: SceneImage, transform: Matrix, alpha: number): void;

  /** Resolve and read back the target. */
  readPixels(): RenderTarget;

  dispose(): void;
}
