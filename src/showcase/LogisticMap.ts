/**
 * Logistic map x(n+1) = r · x(n) · (1 − x(n))
 */
export function logisticMap(r: number, x: number): number {
  return r * x * (1 - x);
}

/**
 * Iterate the map; the seed itself is not included
 */
export function logisticSequence(r: number, x0: number, iterations: number): number[] {
  const sequence: number[] = [];
  let x = x0;
  for (let i = 0; i < iterations; i++) {
    x = logisticMap(r, x);
    sequence.push(x);
  }
  return sequence;
}

export type LogisticRegime = "fixed-point" | "period-2" | "period-4" | "periodic" | "chaotic";

/** Upper r bound of each regime below the onset of chaos */
const REGIME_THRESHOLDS: readonly { readonly below: number; readonly regime: LogisticRegime }[] = [
  { below: 3.0, regime: "fixed-point" },
  { below: 3.449, regime: "period-2" },
  { below: 3.544, regime: "period-4" },
  { below: 3.569, regime: "periodic" },
];

export function classifyLogisticRegime(r: number): LogisticRegime {
  return REGIME_THRESHOLDS.find(({ below }) => r < below)?.regime ?? "chaotic";
}

export const REGIME_DESCRIPTIONS: Readonly<Record<LogisticRegime, string>> = {
  "fixed-point": "Converges to fixed point",
  "period-2": "Oscillates between two values",
  "period-4": "Period-4 cycle",
  periodic: "More complex periodic behavior",
  chaotic: "Chaotic (sensitive to initial conditions)",
};
