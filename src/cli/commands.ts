import { extname } from "node:path";
import { AnimationDriver, type PreviewOutput, runPreview } from "@/animation";
import {
  createAnimationConfig,
  createMandelbrotConfig,
  createPreviewConfig,
  createSensitivityConfig,
  createStaticImageConfig,
} from "@/config/simulationConfig";
import type { RunLogger } from "@/debug/RunLogger";
import { compareTrajectories } from "@/lorenz";
import { GifFileSink, type ImageSink, PngFileSink } from "@/output";
import { createEscapeTimePalette, createHeatPalette } from "@/raster";
import { renderStaticImage } from "@/render/StaticImageBuilder";
import {
  REGIME_DESCRIPTIONS,
  classifyLogisticRegime,
  logisticSequence,
} from "@/showcase/LogisticMap";
import { renderMandelbrot } from "@/showcase/Mandelbrot";
import type { CliOptions, CommandName } from "./args";

export interface CommandContext {
  readonly logger: RunLogger;
  readonly terminal: PreviewOutput;
}

export const DEFAULT_OUTPUTS: Readonly<Record<"animate" | "image" | "mandelbrot", string>> = {
  animate: "lorenz_animation.gif",
  image: "lorenz_attractor.png",
  mandelbrot: "mandelbrot_set.png",
};

/** GIF for a .gif path, PNG for anything else */
export function imageSinkFor(path: string): ImageSink {
  return extname(path).toLowerCase() === ".gif" ? new GifFileSink(path) : new PngFileSink(path);
}

async function animate(options: CliOptions, { logger }: CommandContext): Promise<void> {
  const config = createAnimationConfig({ ...options.run, simulation: options.simulation });
  const out = options.out ?? DEFAULT_OUTPUTS.animate;

  logger.info(`Creating Lorenz attractor animation with ${config.frameCount} frames...`);
  const driver = new AnimationDriver(config, {
    onProgress: (progress) => logger.progress(progress),
  });
  const sequence = driver.run();

  logger.info("Encoding GIF...");
  await new GifFileSink(out).writeAnimation(sequence, driver.palette);
  logger.info(`✓ Animation saved as ${out}`);
}

async function image(options: CliOptions, { logger }: CommandContext): Promise<void> {
  const config = createStaticImageConfig({ ...options.run, simulation: options.simulation });
  const out = options.out ?? DEFAULT_OUTPUTS.image;

  logger.info(`Creating ${out} from ${config.iterations} points...`);
  const buffer = renderStaticImage(config);
  logger.debug(`${buffer.countNonBackground()} pixels lit`);

  await imageSinkFor(out).writeImage(buffer, createHeatPalette());
  logger.info(`✓ Lorenz attractor saved as ${out}`);
}

async function preview(options: CliOptions, { logger, terminal }: CommandContext): Promise<void> {
  const config = createPreviewConfig({ ...options.run, simulation: options.simulation });
  const frames = await runPreview(terminal, config);
  logger.debug(`Preview finished after ${frames} frames`);
}

function sensitivity(options: CliOptions, { logger }: CommandContext): void {
  const config = createSensitivityConfig({ ...options.run, simulation: options.simulation });
  const report = compareTrajectories(config);

  logger.info("=== SENSITIVITY TO INITIAL CONDITIONS ===");
  logger.info("Two Lorenz systems with nearly identical starting conditions:");
  logger.info(`Initial difference: ${report.initialDifference.toFixed(6)}`);
  logger.info("Time\tSystem1_X\tSystem2_X\tDifference");
  logger.info("----\t---------\t---------\t----------");
  for (const sample of report.samples) {
    logger.info(
      [
        sample.time.toFixed(2),
        sample.baseX.toFixed(4).padStart(9),
        sample.perturbedX.toFixed(4).padStart(9),
        sample.difference.toFixed(6).padStart(10),
      ].join("\t")
    );
  }
}

const LOGISTIC_RATES = [2.5, 3.2, 3.5, 3.8, 4.0] as const;
const LOGISTIC_SEED = 0.5;
const LOGISTIC_ITERATIONS = 20;
const LOGISTIC_SHOWN = 11;

function logistic(_options: CliOptions, { logger }: CommandContext): void {
  logger.info("=== LOGISTIC MAP DEMONSTRATION ===");
  logger.info("The logistic map: x(n+1) = r * x(n) * (1 - x(n))");

  for (const r of LOGISTIC_RATES) {
    const sequence = logisticSequence(r, LOGISTIC_SEED, LOGISTIC_ITERATIONS);
    const shown = sequence.slice(0, LOGISTIC_SHOWN).map((x) => x.toFixed(4));
    logger.info(`r = ${r.toFixed(1)} (x0 = ${LOGISTIC_SEED.toFixed(1)}):`);
    logger.info(`Sequence: ${shown.join(" ")} ...`);
    logger.info(`Behavior: ${REGIME_DESCRIPTIONS[classifyLogisticRegime(r)]}`);
  }
}

async function mandelbrot(options: CliOptions, { logger }: CommandContext): Promise<void> {
  const config = createMandelbrotConfig({
    ...(options.run.width === undefined ? {} : { width: options.run.width }),
    ...(options.run.height === undefined ? {} : { height: options.run.height }),
    ...(options.run.maxIterations === undefined
      ? {}
      : { maxIterations: options.run.maxIterations }),
  });
  const out = options.out ?? DEFAULT_OUTPUTS.mandelbrot;

  logger.info(`Creating ${out}...`);
  const buffer = renderMandelbrot(config);
  await imageSinkFor(out).writeImage(buffer, createEscapeTimePalette(config.maxIterations));
  logger.info(`✓ Mandelbrot set saved as ${out}`);
}

export async function runCommand(
  command: CommandName,
  options: CliOptions,
  context: CommandContext
): Promise<void> {
  switch (command) {
    case "animate":
      return animate(options, context);
    case "image":
      return image(options, context);
    case "preview":
      return preview(options, context);
    case "sensitivity":
      return sensitivity(options, context);
    case "logistic":
      return logistic(options, context);
    case "mandelbrot":
      return mandelbrot(options, context);
  }
}
