import { ConfigError } from "@/core/errors";
import type {
  AnimationConfig,
  LorenzParameters,
  MandelbrotConfig,
  Point3D,
  PreviewConfig,
  RunOptions,
  SensitivityConfig,
  SimulationConfig,
  SimulationOptions,
  StaticImageConfig,
} from "@/types";
import { z } from "zod";

/**
 * Classic chaotic regime
 */
export const DEFAULT_LORENZ_PARAMETERS: LorenzParameters = {
  sigma: 10.0,
  rho: 28.0,
  beta: 8.0 / 3.0,
};

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  parameters: DEFAULT_LORENZ_PARAMETERS,
  dt: 0.01,
  initial: { x: 1.0, y: 1.0, z: 1.0 },
  trailCapacity: 2000,
};

export const DEFAULT_ANIMATION_CONFIG: AnimationConfig = {
  simulation: DEFAULT_SIMULATION_CONFIG,
  width: 800,
  height: 600,
  frameCount: 360,
  warmUpSteps: 1000,
  subStepsPerFrame: 10,
  frameDelay: 5,
  progressInterval: 10,
  title: "Lorenz Attractor Animation",
};

export const DEFAULT_STATIC_IMAGE_CONFIG: StaticImageConfig = {
  simulation: DEFAULT_SIMULATION_CONFIG,
  width: 800,
  height: 600,
  iterations: 50_000,
  warmUpSteps: 1000,
};

export const DEFAULT_PREVIEW_CONFIG: PreviewConfig = {
  simulation: { ...DEFAULT_SIMULATION_CONFIG, trailCapacity: 100 },
  columns: 80,
  rows: 24,
  frameCount: 400,
  warmUpSteps: 1000,
  subStepsPerFrame: 5,
  frameIntervalMs: 30,
};

export const DEFAULT_SENSITIVITY_CONFIG: SensitivityConfig = {
  simulation: DEFAULT_SIMULATION_CONFIG,
  perturbation: 1e-4,
  samples: 20,
  stride: 100,
};

export const DEFAULT_MANDELBROT_CONFIG: MandelbrotConfig = {
  width: 800,
  height: 600,
  maxIterations: 100,
  realRange: [-2.5, 1.0],
  imaginaryRange: [-1.25, 1.25],
};

// =============================================================================
// SCHEMAS
// =============================================================================

const MAX_DIMENSION = 8192;

const finite = z.number().finite();
const dimension = z.number().int().min(1).max(MAX_DIMENSION);
const count = z.number().int().min(1);
const nonNegativeCount = z.number().int().min(0);

const pointSchema: z.ZodType<Point3D> = z.object({ x: finite, y: finite, z: finite });

const parametersSchema: z.ZodType<LorenzParameters> = z.object({
  sigma: finite,
  rho: finite,
  beta: finite,
});

export const simulationConfigSchema: z.ZodType<SimulationConfig> = z.object({
  parameters: parametersSchema,
  dt: finite.positive(),
  initial: pointSchema,
  trailCapacity: count.max(1_000_000),
});

export const animationConfigSchema: z.ZodType<AnimationConfig> = z.object({
  simulation: simulationConfigSchema,
  width: dimension,
  height: dimension,
  frameCount: count,
  warmUpSteps: nonNegativeCount,
  subStepsPerFrame: count,
  // GIF stores delays as an unsigned 16-bit count of hundredths
  frameDelay: nonNegativeCount.max(0xffff),
  progressInterval: count,
  title: z.string(),
});

export const staticImageConfigSchema: z.ZodType<StaticImageConfig> = z.object({
  simulation: simulationConfigSchema,
  width: dimension,
  height: dimension,
  iterations: count,
  warmUpSteps: nonNegativeCount,
});

export const previewConfigSchema: z.ZodType<PreviewConfig> = z.object({
  simulation: simulationConfigSchema,
  columns: dimension,
  rows: dimension,
  frameCount: count,
  warmUpSteps: nonNegativeCount,
  subStepsPerFrame: count,
  frameIntervalMs: nonNegativeCount,
});

export const sensitivityConfigSchema: z.ZodType<SensitivityConfig> = z.object({
  simulation: simulationConfigSchema,
  perturbation: finite,
  samples: count,
  stride: nonNegativeCount,
});

const rangeSchema = z
  .tuple([finite, finite])
  .refine(([min, max]) => min < max, { message: "range minimum must be below its maximum" });

export const mandelbrotConfigSchema: z.ZodType<MandelbrotConfig> = z.object({
  width: dimension,
  height: dimension,
  // Escape counts map onto palette indices 1..maxIterations
  maxIterations: count.max(255),
  realRange: rangeSchema,
  imaginaryRange: rangeSchema,
});

// =============================================================================
// FACTORIES
// =============================================================================

function validate<T>(name: string, schema: z.ZodType<T>, candidate: unknown): T {
  const result = schema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(
      name,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
}

function mergeSimulation(
  base: SimulationConfig,
  options: SimulationOptions = {}
): SimulationConfig {
  return {
    parameters: { ...base.parameters, ...options.parameters },
    dt: options.dt ?? base.dt,
    initial: options.initial ?? base.initial,
    trailCapacity: options.trailCapacity ?? base.trailCapacity,
  };
}

/**
 * Creates a validated simulation configuration from partial overrides
 */
export function createSimulationConfig(options: SimulationOptions = {}): SimulationConfig {
  return validate(
    "simulation",
    simulationConfigSchema,
    mergeSimulation(DEFAULT_SIMULATION_CONFIG, options)
  );
}

export function createAnimationConfig(options: RunOptions<AnimationConfig> = {}): AnimationConfig {
  const { simulation, ...rest } = options;
  return validate("animation", animationConfigSchema, {
    ...DEFAULT_ANIMATION_CONFIG,
    ...rest,
    simulation: mergeSimulation(DEFAULT_ANIMATION_CONFIG.simulation, simulation),
  });
}

export function createStaticImageConfig(
  options: RunOptions<StaticImageConfig> = {}
): StaticImageConfig {
  const { simulation, ...rest } = options;
  return validate("static image", staticImageConfigSchema, {
    ...DEFAULT_STATIC_IMAGE_CONFIG,
    ...rest,
    simulation: mergeSimulation(DEFAULT_STATIC_IMAGE_CONFIG.simulation, simulation),
  });
}

export function createPreviewConfig(options: RunOptions<PreviewConfig> = {}): PreviewConfig {
  const { simulation, ...rest } = options;
  return validate("preview", previewConfigSchema, {
    ...DEFAULT_PREVIEW_CONFIG,
    ...rest,
    simulation: mergeSimulation(DEFAULT_PREVIEW_CONFIG.simulation, simulation),
  });
}

export function createSensitivityConfig(
  options: RunOptions<SensitivityConfig> = {}
): SensitivityConfig {
  const { simulation, ...rest } = options;
  return validate("sensitivity", sensitivityConfigSchema, {
    ...DEFAULT_SENSITIVITY_CONFIG,
    ...rest,
    simulation: mergeSimulation(DEFAULT_SENSITIVITY_CONFIG.simulation, simulation),
  });
}

export function createMandelbrotConfig(options: Partial<MandelbrotConfig> = {}): MandelbrotConfig {
  return validate("mandelbrot", mandelbrotConfigSchema, {
    ...DEFAULT_MANDELBROT_CONFIG,
    ...options,
  });
}
