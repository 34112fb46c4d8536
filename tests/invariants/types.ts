/**
 * Invariant Test Types
 *
 * Invariants are checked across a set of scenarios, each one a simulation
 * configuration stepped a fixed number of times and rendered at one size.
 */

import type { LorenzSystem } from "@/lorenz/LorenzSystem";
import type { PixelBuffer } from "@/raster/PixelBuffer";
import type { Point3D, SimulationConfig } from "@/types";

/**
 * A scenario defines one run to check.
 */
export interface Scenario {
  /** Unique identifier for the scenario */
  readonly name: string;

  /** Human-readable description */
  readonly description: string;

  readonly simulation: SimulationConfig;

  /** Integration steps taken before the frame is built */
  readonly steps: number;

  readonly width: number;
  readonly height: number;
}

/**
 * Context provided to each invariant assertion.
 */
export interface InvariantContext {
  readonly scenario: Scenario;

  /** The system after all steps */
  readonly system: LorenzSystem;

  /** Every position step() returned, oldest first */
  readonly positions: readonly Point3D[];

  /** Frame built from the final trail */
  readonly frame: PixelBuffer;

  readonly frameIndex: number;
}

/**
 * An invariant is an assertion that must always hold.
 */
export interface Invariant {
  /** Unique identifier */
  readonly id: string;

  /** Human-readable name */
  readonly name: string;

  /** Description of what this invariant checks */
  readonly description: string;

  /**
   * Assert the invariant holds for the given context.
   * Throws InvariantViolationError if it does not.
   */
  readonly assert: (context: InvariantContext) => void;
}

/**
 * Error thrown when an invariant is violated.
 */
export class InvariantViolationError extends Error {
  constructor(
    public readonly invariantId: string,
    public readonly violations: string[]
  ) {
    super(`Invariant ${invariantId} violated:\n${violations.join("\n")}`);
    this.name = "InvariantViolationError";
  }
}

/**
 * Assert that no violations occurred.
 */
export function assertNoViolations(invariantId: string, violations: string[]): void {
  if (violations.length > 0) {
    throw new InvariantViolationError(invariantId, violations);
  }
}
