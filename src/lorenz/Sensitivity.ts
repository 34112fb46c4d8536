import { DEFAULT_SENSITIVITY_CONFIG } from "@/config/simulationConfig";
import type { SensitivityConfig, SimulationConfig } from "@/types";
import { LorenzSystem } from "./LorenzSystem";

/** One row of a divergence report */
export interface DivergenceSample {
  readonly step: number;
  readonly time: number;
  readonly baseX: number;
  readonly perturbedX: number;
  readonly difference: number;
}

export interface DivergenceReport {
  readonly initialDifference: number;
  readonly samples: readonly DivergenceSample[];
}

function perturbedCopy(simulation: SimulationConfig, perturbation: number): SimulationConfig {
  return {
    ...simulation,
    initial: { ...simulation.initial, x: simulation.initial.x + perturbation },
  };
}

/**
 * Build a pair of independent systems whose starting x differs by `perturbation`
 */
export function createTwinSystems(
  simulation: SimulationConfig,
  perturbation: number
): [LorenzSystem, LorenzSystem] {
  return [new LorenzSystem(simulation), new LorenzSystem(perturbedCopy(simulation, perturbation))];
}

/**
 * |x₁ − x₂| after stepping two twin systems `steps` times
 */
export function measureDivergence(
  simulation: SimulationConfig,
  perturbation: number,
  steps: number
): number {
  const [base, perturbed] = createTwinSystems(simulation, perturbation);
  const a = base.advance(steps);
  const b = perturbed.advance(steps);
  return Math.abs(a.x - b.x);
}

/**
 * Butterfly-effect table: each sample is read one step after the previous
 * sample plus `stride` further steps, so rows are `stride + 1` steps apart.
 */
export function compareTrajectories(
  config: SensitivityConfig = DEFAULT_SENSITIVITY_CONFIG
): DivergenceReport {
  const [base, perturbed] = createTwinSystems(config.simulation, config.perturbation);
  const initialDifference = Math.abs(perturbed.position.x - base.position.x);
  const samples: DivergenceSample[] = [];

  for (let i = 0; i < config.samples; i++) {
    const a = base.step();
    const b = perturbed.step();
    samples.push({
      step: base.stepCount,
      time: base.time,
      baseX: a.x,
      perturbedX: b.x,
      difference: Math.abs(a.x - b.x),
    });

    base.advance(config.stride);
    perturbed.advance(config.stride);
  }

  return { initialDifference, samples };
}
