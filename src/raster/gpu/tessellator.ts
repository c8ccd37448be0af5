/**
 * Triangle fans for stencil-then-cover filling.
 *
 * Each contour becomes a fan around its first vertex. Drawing every fan
 * triangle into a stencil buffer, adding +1 or -1 by its orientation,
 * leaves the winding number of the contour set at each sample, whatever
 * the shape of the contours.
 */

/** Floats per triangle: three x, y pairs */
export const TRIANGLE_STRIDE = 6;

/**
 * Fan triangles of a polygon set as a flat list of vertex pairs.
 * Zero-area triangles are dropped.
 */
export function tessellateFans(contours: readonly (readonly number[])[]): Float32Array {
  const triangles: number[] = [];

  for (const points of contours) {
    const count = points.length >> 1;

    if (count < 3) {
      continue;
    }

    const x0 = points[0];
    const y0 = points[1];

    for (let i = 1; i + 1 < count; i++) {
      const x1 = points[2 * i];
      const y1 = points[2 * i + 1];
      const x2 = points[2 * i + 2];
      const y2 = points[2 * i + 3];

      if ((x1 - x0) * (y2 - y0) - (y1 - y0) * (x2 - x0) !== 0) {
        triangles.push(x0, y0, x1, y1, x2, y2);
      }
    }
  }

  return Float32Array.from(triangles);
}
