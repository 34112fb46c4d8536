import { CLEAR_SCREEN, runPreview } from "@/animation/PreviewLoop";
import { createPreviewConfig } from "@/config/simulationConfig";
import { describe, expect, it } from "vitest";

function captureOutput() {
  const chunks: string[] = [];
  return { chunks, write: (chunk: string) => chunks.push(chunk) };
}

describe("runPreview", () => {
  it("should write one cleared screen per frame", async () => {
    const output = captureOutput();
    const config = createPreviewConfig({ frameCount: 2, frameIntervalMs: 0, warmUpSteps: 10 });

    const frames = await runPreview(output, config);

    expect(frames).toBe(2);
    expect(output.chunks).toHaveLength(2);
    expect(output.chunks.every((chunk) => chunk.startsWith(CLEAR_SCREEN))).toBe(true);
  });

  it("should label each frame", async () => {
    const output = captureOutput();
    const config = createPreviewConfig({ frameCount: 2, frameIntervalMs: 0, columns: 40 });

    await runPreview(output, config);

    const headers = output.chunks.map((chunk) => chunk.slice(CLEAR_SCREEN.length).split("\n")[0]);
    expect(headers).toEqual([
      "Frame: 0 | Lorenz Attractor".padEnd(40),
      "Frame: 1 | Lorenz Attractor".padEnd(40),
    ]);
  });

  it("should emit the configured number of rows", async () => {
    const output = captureOutput();
    const config = createPreviewConfig({ frameCount: 1, frameIntervalMs: 0, rows: 12 });

    await runPreview(output, config);

    // Trailing newline after the last row
    expect(output.chunks[0]?.split("\n")).toHaveLength(13);
  });

  it("should pause between frames", async () => {
    const output = captureOutput();
    const config = createPreviewConfig({ frameCount: 2, frameIntervalMs: 5 });

    const started = Date.now();
    await runPreview(output, config);

    expect(Date.now() - started).toBeGreaterThanOrEqual(8);
  });
});
