import { TrailBuffer } from "@/lorenz/TrailBuffer";
import type { Point3D } from "@/types";
import { beforeEach, describe, expect, it } from "vitest";

function point(n: number): Point3D {
  return { x: n, y: n * 10, z: n * 100 };
}

describe("TrailBuffer", () => {
  let trail: TrailBuffer;

  beforeEach(() => {
    trail = new TrailBuffer(3);
  });

  describe("constructor", () => {
    it("should start empty", () => {
      expect(trail.length).toBe(0);
      expect(trail.capacity).toBe(3);
      expect(trail.toArray()).toEqual([]);
    });

    it("should reject a capacity below one", () => {
      expect(() => new TrailBuffer(0)).toThrow(RangeError);
    });

    it("should reject a fractional capacity", () => {
      expect(() => new TrailBuffer(2.5)).toThrow(RangeError);
    });
  });

  describe("push", () => {
    it("should keep insertion order while below capacity", () => {
      trail.push(point(1));
      trail.push(point(2));

      expect(trail.length).toBe(2);
      expect(trail.toArray()).toEqual([point(1), point(2)]);
    });

    it("should evict the oldest point once full", () => {
      for (let n = 1; n <= 3; n++) trail.push(point(n));

      const evicted = trail.push(point(4));

      expect(evicted).toEqual(point(1));
      expect(trail.length).toBe(3);
      expect(trail.toArray()).toEqual([point(2), point(3), point(4)]);
    });

    it("should return null when nothing is evicted", () => {
      expect(trail.push(point(1))).toBeNull();
    });

    it("should keep the last capacity points after many pushes", () => {
      for (let n = 1; n <= 10; n++) trail.push(point(n));

      expect(trail.toArray()).toEqual([point(8), point(9), point(10)]);
      expect(trail.at(0)).toEqual(point(8));
      expect(trail.at(-1)).toEqual(point(10));
    });
  });

  describe("at", () => {
    beforeEach(() => {
      for (let n = 1; n <= 5; n++) trail.push(point(n));
    });

    it("should index from the oldest point", () => {
      expect(trail.at(0)).toEqual(point(3));
      expect(trail.at(2)).toEqual(point(5));
    });

    it("should index back from the newest with negative values", () => {
      expect(trail.at(-1)).toEqual(point(5));
      expect(trail.at(-3)).toEqual(point(3));
    });

    it("should return undefined out of range", () => {
      expect(trail.at(3)).toBeUndefined();
      expect(trail.at(-4)).toBeUndefined();
      expect(trail.at(0.5)).toBeUndefined();
    });
  });

  describe("iteration", () => {
    it("should iterate oldest to newest", () => {
      for (let n = 1; n <= 4; n++) trail.push(point(n));

      expect([...trail].map((p) => p.x)).toEqual([2, 3, 4]);
    });
  });
});
