import type { PixelBuffer } from "@/raster/PixelBuffer";

/** One frame and how long it stays on screen, in hundredths of a second */
export interface AnimationFrame {
  readonly buffer: PixelBuffer;
  readonly delay: number;
}

/**
 * FrameSequence - Append-only list of equally sized frames
 */
export class FrameSequence implements Iterable<AnimationFrame> {
  private readonly _frames: AnimationFrame[] = [];

  constructor(
    readonly width: number,
    readonly height: number
  ) {}

  get length(): number {
    return this._frames.length;
  }

  get frames(): readonly AnimationFrame[] {
    return this._frames;
  }

  /** Sum of all delays, in hundredths of a second */
  get totalDuration(): number {
    return this._frames.reduce((sum, frame) => sum + frame.delay, 0);
  }

  append(buffer: PixelBuffer, delay: number): void {
    if (buffer.width !== this.width || buffer.height !== this.height) {
      throw new RangeError(
        `Frame is ${buffer.width}x${buffer.height}, sequence is ${this.width}x${this.height}`
      );
    }
    if (!Number.isInteger(delay) || delay < 0) {
      throw new RangeError(`Frame delay must be a non-negative integer, got ${delay}`);
    }
    this._frames.push({ buffer, delay });
  }

  [Symbol.iterator](): Iterator<AnimationFrame> {
    return this._frames[Symbol.iterator]();
  }
}
