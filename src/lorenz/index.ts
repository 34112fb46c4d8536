export { LorenzSystem, skipTransient } from "./LorenzSystem";
export { TrailBuffer } from "./TrailBuffer";
export { eulerStep, lorenzDerivatives } from "./lorenzMath";
export { compareTrajectories, createTwinSystems, measureDivergence } from "./Sensitivity";
export type { DivergenceReport, DivergenceSample } from "./Sensitivity";
