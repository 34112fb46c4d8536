import { FrameSequence } from "@/animation/FrameSequence";
import { PixelBuffer } from "@/raster/PixelBuffer";
import { describe, expect, it } from "vitest";

describe("FrameSequence", () => {
  it("should keep frames in append order", () => {
    const sequence = new FrameSequence(4, 3);
    const first = new PixelBuffer(4, 3);
    const second = new PixelBuffer(4, 3);
    second.set(0, 0, 1);

    sequence.append(first, 5);
    sequence.append(second, 7);

    expect(sequence.length).toBe(2);
    expect([...sequence].map((frame) => frame.buffer)).toEqual([first, second]);
    expect(sequence.frames.map((frame) => frame.delay)).toEqual([5, 7]);
  });

  it("should sum delays", () => {
    const sequence = new FrameSequence(2, 2);
    sequence.append(new PixelBuffer(2, 2), 5);
    sequence.append(new PixelBuffer(2, 2), 5);
    sequence.append(new PixelBuffer(2, 2), 0);

    expect(sequence.totalDuration).toBe(10);
  });

  it("should reject frames of another size", () => {
    const sequence = new FrameSequence(4, 3);

    expect(() => sequence.append(new PixelBuffer(3, 4), 5)).toThrow(RangeError);
    expect(sequence.length).toBe(0);
  });

  it("should reject negative or fractional delays", () => {
    const sequence = new FrameSequence(4, 3);

    expect(() => sequence.append(new PixelBuffer(4, 3), -1)).toThrow(RangeError);
    expect(() => sequence.append(new PixelBuffer(4, 3), 2.5)).toThrow(RangeError);
  });
});
