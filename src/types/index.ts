/**
 * Core type definitions for lorenz-trails
 */

// =============================================================================
// MATH TYPES
// =============================================================================

/** 3D point on a trajectory (immutable once produced) */
export interface Point3D {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** Integer pixel coordinate (may lie outside any buffer, or be non-finite) */
export interface PixelPoint {
  readonly x: number;
  readonly y: number;
}

/** Inclusive pixel rectangle */
export interface PixelBounds {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

// =============================================================================
// SIMULATION TYPES
// =============================================================================

/** Physical constants of the Lorenz system */
export interface LorenzParameters {
  readonly sigma: number;
  readonly rho: number;
  readonly beta: number;
}

/** Everything one integrator instance needs */
export interface SimulationConfig {
  readonly parameters: LorenzParameters;
  readonly dt: number; // > 0
  readonly initial: Point3D;
  readonly trailCapacity: number;
}

/**
 * Read-only window onto a trail, oldest point first.
 * Arrays satisfy it, and so does TrailBuffer.
 */
export interface TrailView {
  readonly length: number;
  at(index: number): Point3D | undefined;
}

// =============================================================================
// RENDER TYPES
// =============================================================================

/** Palette index, 0..255. Index 0 is the background. */
export type ColorIndex = number;

/** Options for the animated frame overlay */
export interface FrameOverlay {
  readonly title: string;
  readonly markerRadius: number;
}

/** Progress notification emitted while frames are produced */
export interface RenderProgress {
  readonly completed: number;
  readonly total: number;
}

// =============================================================================
// RUN CONFIGURATIONS
// =============================================================================

/** Animated GIF run */
export interface AnimationConfig {
  readonly simulation: SimulationConfig;
  readonly width: number;
  readonly height: number;
  readonly frameCount: number;
  readonly warmUpSteps: number;
  readonly subStepsPerFrame: number;
  readonly frameDelay: number; // hundredths of a second
  readonly progressInterval: number;
  readonly title: string;
}

/** Single still image of the whole attractor */
export interface StaticImageConfig {
  readonly simulation: SimulationConfig;
  readonly width: number;
  readonly height: number;
  readonly iterations: number;
  readonly warmUpSteps: number;
}

/** Real-time terminal preview */
export interface PreviewConfig {
  readonly simulation: SimulationConfig;
  readonly columns: number;
  readonly rows: number;
  readonly frameCount: number;
  readonly warmUpSteps: number;
  readonly subStepsPerFrame: number;
  readonly frameIntervalMs: number;
}

/** Butterfly-effect comparison of two trajectories */
export interface SensitivityConfig {
  readonly simulation: SimulationConfig;
  readonly perturbation: number;
  readonly samples: number;
  readonly stride: number;
}

/** Mandelbrot escape-time render */
export interface MandelbrotConfig {
  readonly width: number;
  readonly height: number;
  readonly maxIterations: number;
  readonly realRange: readonly [number, number];
  readonly imaginaryRange: readonly [number, number];
}

// =============================================================================
// PARTIAL OVERRIDES
// =============================================================================

/** Partial simulation settings, merged over the defaults */
export interface SimulationOptions {
  readonly parameters?: Partial<LorenzParameters>;
  readonly dt?: number;
  readonly initial?: Point3D;
  readonly trailCapacity?: number;
}

/** Partial run settings with a nested partial simulation */
export type RunOptions<T extends { readonly simulation: SimulationConfig }> = Partial<
  Omit<T, "simulation">
> & {
  readonly simulation?: SimulationOptions;
};
