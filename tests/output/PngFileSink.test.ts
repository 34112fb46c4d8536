import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { OutputError } from "@/core/errors";
import { PngFileSink, encodePng } from "@/output/PngFileSink";
import { createHeatPalette } from "@/raster/Palette";
import { PixelBuffer } from "@/raster/PixelBuffer";
import { PNG } from "pngjs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

describe("encodePng", () => {
  it("should expand indices through the palette to opaque RGBA", () => {
    const buffer = new PixelBuffer(3, 2);
    buffer.set(1, 0, 5);

    const png = PNG.sync.read(encodePng(buffer, createHeatPalette()));

    expect(png.width).toBe(3);
    expect(png.height).toBe(2);
    expect([...png.data.subarray(0, 4)]).toEqual([0, 0, 0, 255]);
    expect([...png.data.subarray(4, 8)]).toEqual([5, 2, 250, 255]);
  });
});

describe("PngFileSink", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "lorenz-trails-png-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should write a readable PNG", async () => {
    const path = join(dir, "still.png");
    const buffer = new PixelBuffer(8, 6);
    buffer.set(7, 5, 255);

    await new PngFileSink(path).writeImage(buffer, createHeatPalette());

    const png = PNG.sync.read(await readFile(path));
    const last = (5 * 8 + 7) * 4;
    expect([...png.data.subarray(last, last + 4)]).toEqual([255, 127, 0, 255]);
  });

  it("should fail with an OutputError when the directory is missing", async () => {
    const sink = new PngFileSink(join(dir, "nope", "still.png"));

    await expect(sink.writeImage(new PixelBuffer(2, 2), createHeatPalette())).rejects.toThrow(
      OutputError
    );
  });
});
