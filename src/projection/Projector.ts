import type { PixelPoint, Point3D } from "@/types";

/**
 * Approximate extents of the classic attractor, used to size the fixed view.
 * X spans about [-25, 25]; Z spans about [0, 50], with headroom up to 60.
 */
export const VIEW_X_SPAN = 50;
export const VIEW_Z_SPAN = 60;

/** Fraction of the image height where z = 0 lands */
export const VIEW_BASELINE = 0.8;

/**
 * Orthographic projection onto the X-Z plane (the classic butterfly view).
 *
 * X is centred horizontally; Z grows upwards from a baseline near the bottom
 * of the image. Y is dropped. The result is truncated towards zero and never
 * clamped, so it may lie outside the image or be NaN for non-finite input.
 */
export function project(p: Point3D, width: number, height: number): PixelPoint {
  const scaleX = width / VIEW_X_SPAN;
  const scaleZ = height / VIEW_Z_SPAN;

  const centerX = width / 2;
  const baselineZ = height * VIEW_BASELINE;

  return {
    x: Math.trunc(p.x * scaleX + centerX),
    y: Math.trunc(baselineZ - p.z * scaleZ),
  };
}
