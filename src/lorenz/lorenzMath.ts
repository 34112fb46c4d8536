import { Vec3 } from "@/math/Vec3";
import type { LorenzParameters, Point3D } from "@/types";

/**
 * Time derivative of the Lorenz system at a point:
 *   dx = σ(y − x), dy = x(ρ − z) − y, dz = xy − βz
 */
export function lorenzDerivatives(params: LorenzParameters, p: Point3D): Point3D {
  return {
    x: params.sigma * (p.y - p.x),
    y: p.x * (params.rho - p.z) - p.y,
    z: p.x * p.y - params.beta * p.z,
  };
}

/**
 * One explicit (forward) Euler step of size dt.
 *
 * First-order accurate only; a smaller dt is the remedy when fidelity matters.
 * Overflow is not checked and shows up as non-finite coordinates.
 */
export function eulerStep(params: LorenzParameters, dt: number, p: Point3D): Point3D {
  return Vec3.add(p, Vec3.scale(lorenzDerivatives(params, p), dt));
}
