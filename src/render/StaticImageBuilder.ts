import { DEFAULT_STATIC_IMAGE_CONFIG } from "@/config/simulationConfig";
import { LorenzSystem, skipTransient } from "@/lorenz/LorenzSystem";
import { project } from "@/projection/Projector";
import { PixelBuffer } from "@/raster/PixelBuffer";
import { clampColorIndex } from "@/raster/Palette";
import type { ColorIndex, Point3D, StaticImageConfig } from "@/types";

/**
 * Heat-palette index for a point, from its (otherwise unseen) Y coordinate.
 * Y ≈ −30 is cold, Y ≈ +55 saturates; never the background.
 */
export function colorIndexForDepth(p: Point3D): ColorIndex {
  return Math.max(1, clampColorIndex((p.y + 30) * 3));
}

/**
 * Plot the attractor as a cloud of single pixels, one per integration step
 * after the warm-up. Suited to the heat palette.
 */
export function renderStaticImage(
  config: StaticImageConfig = DEFAULT_STATIC_IMAGE_CONFIG
): PixelBuffer {
  const { width, height } = config;
  const buffer = new PixelBuffer(width, height);
  // Only the current point matters here, so keep the trail minimal
  const system = new LorenzSystem({ ...config.simulation, trailCapacity: 1 });

  skipTransient(system, config.warmUpSteps);

  for (let i = 0; i < config.iterations; i++) {
    const point = system.step();
    const pixel = project(point, width, height);
    buffer.set(pixel.x, pixel.y, colorIndexForDepth(point));
  }

  return buffer;
}
