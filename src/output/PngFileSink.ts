import type { Palette } from "@/raster/Palette";
import type { PixelBuffer } from "@/raster/PixelBuffer";
import { PNG } from "pngjs";
import { writeOutput } from "./GifFileSink";
import type { ImageSink } from "./RasterSink";

/**
 * Expand an indexed buffer to opaque RGBA and encode it as PNG
 */
export function encodePng(buffer: PixelBuffer, palette: Palette): Buffer {
  const png = new PNG({ width: buffer.width, height: buffer.height });

  buffer.indices.forEach((index, i) => {
    const { r, g, b } = palette.rgb(index);
    const offset = i * 4;
    png.data[offset] = r;
    png.data[offset + 1] = g;
    png.data[offset + 2] = b;
    png.data[offset + 3] = 0xff;
  });

  return PNG.sync.write(png);
}

/**
 * PngFileSink - Writes a still image to a .png file
 */
export class PngFileSink implements ImageSink {
  constructor(readonly path: string) {}

  async writeImage(buffer: PixelBuffer, palette: Palette): Promise<void> {
    await writeOutput(this.path, encodePng(buffer, palette));
  }
}
