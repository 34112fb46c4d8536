/**
 * Scenario Definitions for Invariant Tests
 */

import { DEFAULT_SIMULATION_CONFIG, createSimulationConfig } from "@/config/simulationConfig";
import type { Scenario } from "../types";

export const ALL_SCENARIOS: Scenario[] = [
  {
    name: "classic",
    description: "Default parameters, full trail, 800x600",
    simulation: DEFAULT_SIMULATION_CONFIG,
    steps: 1500,
    width: 800,
    height: 600,
  },
  {
    name: "overflowing-trail",
    description: "Seven-point trail after a hundred steps",
    simulation: createSimulationConfig({ trailCapacity: 7 }),
    steps: 100,
    width: 800,
    height: 600,
  },
  {
    name: "single-step",
    description: "Only one point so far, so nothing to connect",
    simulation: DEFAULT_SIMULATION_CONFIG,
    steps: 1,
    width: 800,
    height: 600,
  },
  {
    name: "tiny-canvas",
    description: "Most of the attractor falls outside a 40x30 frame",
    simulation: createSimulationConfig({ trailCapacity: 200 }),
    steps: 300,
    width: 40,
    height: 30,
  },
  {
    name: "fine-step",
    description: "Half the default time step",
    simulation: createSimulationConfig({ dt: 0.005 }),
    steps: 3000,
    width: 640,
    height: 480,
  },
  {
    name: "stable-fixed-point",
    description: "rho = 10 spirals into a fixed point instead of the butterfly",
    simulation: createSimulationConfig({ parameters: { rho: 10 } }),
    steps: 2000,
    width: 320,
    height: 240,
  },
];
