import { DEFAULT_MANDELBROT_CONFIG } from "@/config/simulationConfig";
import { PixelBuffer } from "@/raster/PixelBuffer";
import type { MandelbrotConfig } from "@/types";

/**
 * Escape-time count for c = re + i·im: the iteration at which |z|² first
 * exceeds 4, or maxIterations if it never does.
 */
export function escapeTime(re: number, im: number, maxIterations: number): number {
  let zr = 0;
  let zi = 0;
  for (let i = 0; i < maxIterations; i++) {
    if (zr * zr + zi * zi > 4) return i;
    const nextZr = zr * zr - zi * zi + re;
    zi = 2 * zr * zi + im;
    zr = nextZr;
  }
  return maxIterations;
}

/**
 * Render the set: points inside are background, escaped points use index n + 1.
 * Pair with createEscapeTimePalette(maxIterations).
 */
export function renderMandelbrot(config: MandelbrotConfig = DEFAULT_MANDELBROT_CONFIG): PixelBuffer {
  const { width, height, maxIterations } = config;
  const [reMin, reMax] = config.realRange;
  const [imMin, imMax] = config.imaginaryRange;
  const buffer = new PixelBuffer(width, height);

  for (let py = 0; py < height; py++) {
    const im = imMin + ((imMax - imMin) * py) / height;
    for (let px = 0; px < width; px++) {
      const re = reMin + ((reMax - reMin) * px) / width;
      const n = escapeTime(re, im, maxIterations);
      if (n < maxIterations) buffer.set(px, py, n + 1);
    }
  }

  return buffer;
}
