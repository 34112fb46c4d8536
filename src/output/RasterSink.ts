import type { FrameSequence } from "@/animation/FrameSequence";
import type { Palette } from "@/raster/Palette";
import type { PixelBuffer } from "@/raster/PixelBuffer";

/**
 * Destination for a finished animation
 */
export interface AnimationSink {
  writeAnimation(sequence: FrameSequence, palette: Palette): Promise<void>;
}

/**
 * Destination for a single still image
 */
export interface ImageSink {
  writeImage(buffer: PixelBuffer, palette: Palette): Promise<void>;
}
