import { writeFile } from "node:fs/promises";
import { FrameSequence } from "@/animation/FrameSequence";
import { OutputError } from "@/core/errors";
import type { Palette } from "@/raster/Palette";
import type { PixelBuffer } from "@/raster/PixelBuffer";
import { GifWriter } from "omggif";
import type { AnimationSink, ImageSink } from "./RasterSink";

export interface GifEncodeOptions {
  /** Netscape loop count, 0 loops forever */
  readonly loop: number;
}

const DEFAULT_GIF_OPTIONS: GifEncodeOptions = { loop: 0 };

// Header, logical screen descriptor, 256-entry global table, loop extension
const GIF_HEADER_BYTES = 1024;
// Graphic control extension, image descriptor, LZW minimum code size, terminators
const GIF_FRAME_OVERHEAD_BYTES = 64;

/**
 * Upper bound on the encoded size of one frame: every pixel emitting a 12-bit
 * code, plus one length byte per 255-byte sub-block.
 */
function worstCaseFrameBytes(width: number, height: number): number {
  const codeBytes = Math.ceil((width * height * 12) / 8);
  return codeBytes + Math.ceil(codeBytes / 255) + GIF_FRAME_OVERHEAD_BYTES;
}

/**
 * Encode a frame sequence as an animated GIF89a with one global palette.
 *
 * omggif writes into a caller-sized buffer and silently drops bytes past its
 * end, so encoding starts from a modest estimate and restarts with twice the
 * room whenever the reported length overshoots.
 */
export function encodeGif(
  sequence: FrameSequence,
  palette: Palette,
  options: Partial<GifEncodeOptions> = {}
): Buffer {
  const { loop } = { ...DEFAULT_GIF_OPTIONS, ...options };
  const { width, height } = sequence;

  if (sequence.length === 0) {
    throw new OutputError("Cannot encode an empty frame sequence");
  }

  const limit = GIF_HEADER_BYTES + sequence.length * worstCaseFrameBytes(width, height);
  let capacity = Math.min(
    limit,
    GIF_HEADER_BYTES + sequence.length * (Math.ceil((width * height) / 8) + GIF_FRAME_OVERHEAD_BYTES)
  );

  for (;;) {
    const output = Buffer.alloc(capacity);
    const writer = new GifWriter(output, width, height, { loop, palette: [...palette.colors] });
    for (const frame of sequence) {
      writer.addFrame(0, 0, width, height, Array.from(frame.buffer.indices), {
        delay: frame.delay,
      });
    }
    const length = writer.end();

    if (length <= capacity) return output.subarray(0, length);
    if (capacity >= limit) {
      throw new OutputError(`GIF grew past its ${limit}-byte bound`);
    }
    capacity = Math.min(limit, capacity * 2);
  }
}

/**
 * GifFileSink - Writes animations (or single frames) to a .gif file
 */
export class GifFileSink implements AnimationSink, ImageSink {
  constructor(
    readonly path: string,
    private readonly options: Partial<GifEncodeOptions> = {}
  ) {}

  async writeAnimation(sequence: FrameSequence, palette: Palette): Promise<void> {
    await writeOutput(this.path, encodeGif(sequence, palette, this.options));
  }

  async writeImage(buffer: PixelBuffer, palette: Palette): Promise<void> {
    const single = new FrameSequence(buffer.width, buffer.height);
    single.append(buffer, 0);
    await this.writeAnimation(single, palette);
  }
}

/**
 * Persist encoded bytes; any file-system failure becomes an OutputError
 */
export async function writeOutput(path: string, bytes: Uint8Array): Promise<void> {
  try {
    await writeFile(path, bytes);
  } catch (error) {
    throw new OutputError("Could not write output file", path, { cause: error });
  }
}
