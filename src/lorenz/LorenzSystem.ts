import { DEFAULT_SIMULATION_CONFIG } from "@/config/simulationConfig";
import type { LorenzParameters, Point3D, SimulationConfig, TrailView } from "@/types";
import { TrailBuffer } from "./TrailBuffer";
import { eulerStep } from "./lorenzMath";

/**
 * LorenzSystem - Fixed-step integrator of the Lorenz equations
 *
 * Owns the current position and a bounded trail of the points it produced.
 * Both are mutated only by step(); the trail is exposed read-only.
 * Instances share nothing, so perturbed copies evolve independently.
 */
export class LorenzSystem {
  readonly parameters: LorenzParameters;
  readonly dt: number;
  private _position: Point3D;
  private _stepCount = 0;
  private readonly _trail: TrailBuffer;

  constructor(config: SimulationConfig = DEFAULT_SIMULATION_CONFIG) {
    this.parameters = { ...config.parameters };
    this.dt = config.dt;
    this._position = { ...config.initial };
    this._trail = new TrailBuffer(config.trailCapacity);
  }

  get position(): Point3D {
    return this._position;
  }

  /** Number of steps taken since construction */
  get stepCount(): number {
    return this._stepCount;
  }

  /** Simulated time elapsed since construction */
  get time(): number {
    return this._stepCount * this.dt;
  }

  get trail(): TrailView {
    return this._trail;
  }

  get trailCapacity(): number {
    return this._trail.capacity;
  }

  /**
   * Advance by one time step
   * @returns The new position, which is also appended to the trail
   */
  step(): Point3D {
    const next = eulerStep(this.parameters, this.dt, this._position);
    this._position = next;
    this._stepCount++;
    this._trail.push(next);
    return next;
  }

  /**
   * Advance by several steps
   * @returns The final position (the current one when steps is 0)
   */
  advance(steps: number): Point3D {
    for (let i = 0; i < steps; i++) {
      this.step();
    }
    return this._position;
  }

  /** Snapshot of the trail, oldest first */
  trailPoints(): Point3D[] {
    return this._trail.toArray();
  }
}

/**
 * Discard the first steps of a run so the trajectory settles onto the attractor.
 * The discarded points still pass through the trail and are pushed out by later steps.
 */
export function skipTransient(system: LorenzSystem, steps: number): void {
  system.advance(steps);
}
