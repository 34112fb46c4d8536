import { UsageError } from "@/core/errors";
import type { LogLevel } from "@/debug/RunLogger";

export const COMMANDS = [
  "animate",
  "image",
  "preview",
  "sensitivity",
  "logistic",
  "mandelbrot",
] as const;

export type CommandName = (typeof COMMANDS)[number];

/** Numeric run settings; a key is present only when given on the command line */
export interface RunOverrides {
  width?: number;
  height?: number;
  columns?: number;
  rows?: number;
  frameCount?: number;
  iterations?: number;
  maxIterations?: number;
  warmUpSteps?: number;
  subStepsPerFrame?: number;
  frameDelay?: number;
  frameIntervalMs?: number;
  perturbation?: number;
  samples?: number;
  stride?: number;
}

export interface SimulationOverrides {
  dt?: number;
  trailCapacity?: number;
  parameters: { sigma?: number; rho?: number; beta?: number };
}

export interface CliOptions {
  command: CommandName | null;
  help: boolean;
  logLevel: LogLevel;
  out: string | null;
  run: RunOverrides;
  simulation: SimulationOverrides;
}

const RUN_FLAGS = new Map<string, keyof RunOverrides>([
  ["--width", "width"],
  ["--height", "height"],
  ["--columns", "columns"],
  ["--rows", "rows"],
  ["--frames", "frameCount"],
  ["--iterations", "iterations"],
  ["--max-iter", "maxIterations"],
  ["--warmup", "warmUpSteps"],
  ["--substeps", "subStepsPerFrame"],
  ["--delay", "frameDelay"],
  ["--interval", "frameIntervalMs"],
  ["--perturbation", "perturbation"],
  ["--samples", "samples"],
  ["--stride", "stride"],
]);

const PARAMETER_FLAGS = new Map<string, "sigma" | "rho" | "beta">([
  ["--sigma", "sigma"],
  ["--rho", "rho"],
  ["--beta", "beta"],
]);

function isCommand(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

function readNumber(flag: string, raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") {
    throw new UsageError(`${flag} expects a number`);
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new UsageError(`${flag} expects a number, got "${raw}"`);
  }
  return value;
}

/**
 * Parse argv (without the node and script entries).
 * Range checks are left to the config schemas.
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    command: null,
    help: false,
    logLevel: "info",
    out: null,
    run: {},
    simulation: { parameters: {} },
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";

    const runKey = RUN_FLAGS.get(arg);
    if (runKey) {
      options.run[runKey] = readNumber(arg, argv[++i]);
      continue;
    }

    const parameterKey = PARAMETER_FLAGS.get(arg);
    if (parameterKey) {
      options.simulation.parameters[parameterKey] = readNumber(arg, argv[++i]);
      continue;
    }

    switch (arg) {
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--quiet":
      case "-q":
        options.logLevel = "warn";
        break;
      case "--verbose":
        options.logLevel = "debug";
        break;
      case "--dt":
        options.simulation.dt = readNumber(arg, argv[++i]);
        break;
      case "--trail":
        options.simulation.trailCapacity = readNumber(arg, argv[++i]);
        break;
      case "--out":
      case "-o": {
        const value = argv[++i];
        if (!value) throw new UsageError(`${arg} expects a file path`);
        options.out = value;
        break;
      }
      default:
        if (arg.startsWith("-")) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (options.command !== null) {
          throw new UsageError(`Unexpected argument: ${arg}`);
        }
        if (!isCommand(arg)) {
          throw new UsageError(`Unknown command: ${arg}`);
        }
        options.command = arg;
    }
  }

  return options;
}

export const HELP_TEXT = `Usage: lorenz-trails <command> [options]

Commands:
  animate       Render the attractor's fading trail as an animated GIF
  image         Plot the whole attractor as a still PNG (or .gif)
  preview       Play the trail in the terminal
  sensitivity   Compare two trajectories whose x0 differ slightly
  logistic      Print logistic map sequences and their regimes
  mandelbrot    Render the Mandelbrot set as a PNG

Options:
  -o, --out <file>       Output path
  --width, --height      Image size in pixels
  --columns, --rows      Terminal size for preview
  --frames <n>           Frames to render (animate, preview)
  --iterations <n>       Points to plot (image)
  --max-iter <n>         Escape-time limit, at most 255 (mandelbrot)
  --warmup <n>           Steps discarded before drawing
  --substeps <n>         Physics steps per frame
  --delay <n>            Frame delay in hundredths of a second (animate)
  --interval <ms>        Pause between preview frames
  --trail <n>            Trail capacity in points
  --dt, --sigma, --rho, --beta   Integration step and Lorenz parameters
  --perturbation, --samples, --stride   Sensitivity report settings
  -q, --quiet            Only warnings and errors
  --verbose              Debug output
  -h, --help             Show this help
`;
