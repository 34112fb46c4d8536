import type { Point3D } from "@/types";

/**
 * Vec3 - Pure utility functions for 3D points
 * All functions are immutable and return new points
 */
export const Vec3 = {
  /**
   * Add two points component-wise
   */
  add(a: Point3D, b: Point3D): Point3D {
    return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
  },

  /**
   * Scale a point by a scalar
   */
  scale(v: Point3D, scalar: number): Point3D {
    return { x: v.x * scalar, y: v.y * scalar, z: v.z * scalar };
  },

  /**
   * True when every coordinate is a finite number
   */
  isFinite(v: Point3D): boolean {
    return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
  },
};
