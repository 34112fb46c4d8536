import type { ColorIndex, PixelBounds } from "@/types";

export const BACKGROUND: ColorIndex = 0;

/**
 * PixelBuffer - Indexed-color raster, one palette index per pixel, row-major
 *
 * Every write is clipped: coordinates outside the grid, fractional or
 * non-finite coordinates are ignored rather than reported.
 */
export class PixelBuffer {
  readonly width: number;
  readonly height: number;
  readonly indices: Uint8Array;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new RangeError(`Invalid buffer size ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.indices = new Uint8Array(width * height); // zero-filled = background
  }

  contains(x: number, y: number): boolean {
    return (
      Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < this.width && y >= 0 && y < this.height
    );
  }

  /** Write one pixel; out-of-range writes are dropped */
  set(x: number, y: number, color: ColorIndex): void {
    if (!this.contains(x, y)) return;
    this.indices[y * this.width + x] = color;
  }

  /** Read one pixel; background outside the grid */
  get(x: number, y: number): ColorIndex {
    if (!this.contains(x, y)) return BACKGROUND;
    return this.indices[y * this.width + x] ?? BACKGROUND;
  }

  isBlank(): boolean {
    return this.indices.every((value) => value === BACKGROUND);
  }

  countNonBackground(): number {
    let count = 0;
    for (const value of this.indices) {
      if (value !== BACKGROUND) count++;
    }
    return count;
  }

  /**
   * Smallest rectangle holding every non-background pixel
   * @returns null for a blank buffer
   */
  boundingBox(): PixelBounds | null {
    let minX = Number.POSITIVE_INFINITY;
    let minY = Number.POSITIVE_INFINITY;
    let maxX = Number.NEGATIVE_INFINITY;
    let maxY = Number.NEGATIVE_INFINITY;

    for (let y = 0; y < this.height; y++) {
      const row = y * this.width;
      for (let x = 0; x < this.width; x++) {
        if (this.indices[row + x] === BACKGROUND) continue;
        if (x < minX) minX = x;
        if (x > maxX) maxX = x;
        if (y < minY) minY = y;
        if (y > maxY) maxY = y;
      }
    }

    if (maxX < minX) return null;
    return { minX, minY, maxX, maxY };
  }

  equals(other: PixelBuffer): boolean {
    if (other.width !== this.width || other.height !== this.height) return false;
    return this.indices.every((value, i) => value === other.indices[i]);
  }
}
