import { DEFAULT_ANIMATION_CONFIG } from "@/config/simulationConfig";
import { LorenzSystem, skipTransient } from "@/lorenz/LorenzSystem";
import type { AnimationSink } from "@/output/RasterSink";
import { type Palette, createTrailPalette } from "@/raster/Palette";
import { buildFrame } from "@/render/FrameBuilder";
import type { AnimationConfig, RenderProgress } from "@/types";
import { FrameSequence } from "./FrameSequence";

export interface AnimationHooks {
  /** Called on frames 0, n, 2n, ... where n is the configured progress interval */
  onProgress?: (progress: RenderProgress) => void;
}

/**
 * AnimationDriver - Steps a fresh Lorenz system and turns its trail into frames
 *
 * Each run owns its own system: warm-up, then for every frame a few physics
 * sub-steps followed by one rendered frame. Everything is synchronous.
 */
export class AnimationDriver {
  private readonly config: AnimationConfig;
  private readonly hooks: AnimationHooks;
  readonly palette: Palette;

  constructor(config: AnimationConfig = DEFAULT_ANIMATION_CONFIG, hooks: AnimationHooks = {}) {
    this.config = config;
    this.hooks = hooks;
    this.palette = createTrailPalette();
  }

  /**
   * Produce `frameCount` frames of the given size
   */
  run(
    width: number = this.config.width,
    height: number = this.config.height,
    frameCount: number = this.config.frameCount
  ): FrameSequence {
    const { warmUpSteps, subStepsPerFrame, frameDelay, progressInterval, title } = this.config;
    const system = new LorenzSystem(this.config.simulation);
    const sequence = new FrameSequence(width, height);

    skipTransient(system, warmUpSteps);

    for (let frame = 0; frame < frameCount; frame++) {
      system.advance(subStepsPerFrame);
      sequence.append(buildFrame(system.trail, width, height, frame, { title }), frameDelay);

      if (frame % progressInterval === 0) {
        this.hooks.onProgress?.({ completed: frame + 1, total: frameCount });
      }
    }

    return sequence;
  }

  /**
   * Run, then hand the frames to a sink. Sink failures reach the caller as thrown.
   */
  async render(
    sink: AnimationSink,
    width: number = this.config.width,
    height: number = this.config.height,
    frameCount: number = this.config.frameCount
  ): Promise<FrameSequence> {
    const sequence = this.run(width, height, frameCount);
    await sink.writeAnimation(sequence, this.palette);
    return sequence;
  }
}
