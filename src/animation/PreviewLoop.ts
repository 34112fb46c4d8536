import { setTimeout as sleep } from "node:timers/promises";
import { DEFAULT_PREVIEW_CONFIG } from "@/config/simulationConfig";
import { LorenzSystem, skipTransient } from "@/lorenz/LorenzSystem";
import { renderAsciiFrame } from "@/render/AsciiRenderer";
import type { PreviewConfig } from "@/types";

/** Clear the screen and home the cursor */
export const CLEAR_SCREEN = "\u001b[2J\u001b[H";

export interface PreviewOutput {
  write(chunk: string): unknown;
}

/**
 * Real-time terminal animation, paced by a fixed sleep between frames.
 * Pacing is presentation only; the frames match an unpaced run.
 */
export async function runPreview(
  output: PreviewOutput,
  config: PreviewConfig = DEFAULT_PREVIEW_CONFIG
): Promise<number> {
  const system = new LorenzSystem(config.simulation);
  skipTransient(system, config.warmUpSteps);

  let frame = 0;
  for (; frame < config.frameCount; frame++) {
    system.advance(config.subStepsPerFrame);
    const rows = renderAsciiFrame(system.trail, config.columns, config.rows, frame);
    output.write(`${CLEAR_SCREEN}${rows.join("\n")}\n`);

    if (config.frameIntervalMs > 0) {
      await sleep(config.frameIntervalMs);
    }
  }

  return frame;
}
