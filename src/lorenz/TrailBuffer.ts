import type { Point3D, TrailView } from "@/types";

/**
 * TrailBuffer - Fixed-capacity ring of the most recent trajectory points
 *
 * Storage is allocated once. Pushing onto a full buffer overwrites the oldest
 * slot, so the retained points are always the last `capacity` pushed, oldest first.
 */
export class TrailBuffer implements TrailView, Iterable<Point3D> {
  readonly capacity: number;
  private readonly slots: (Point3D | undefined)[];
  private head = 0; // index of the oldest point
  private _length = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Trail capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<Point3D | undefined>(capacity).fill(undefined);
  }

  get length(): number {
    return this._length;
  }

  /**
   * Append a point, evicting the oldest one when full
   * @returns The evicted point, or null if nothing was evicted
   */
  push(point: Point3D): Point3D | null {
    if (this._length < this.capacity) {
      this.slots[(this.head + this._length) % this.capacity] = point;
      this._length++;
      return null;
    }

    const evicted = this.slots[this.head] ?? null;
    this.slots[this.head] = point;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /**
   * Point at a recency position: 0 is the oldest, length - 1 the newest.
   * Negative indices count back from the newest, like Array.prototype.at.
   */
  at(index: number): Point3D | undefined {
    const i = index < 0 ? this._length + index : index;
    if (!Number.isInteger(i) || i < 0 || i >= this._length) return undefined;
    return this.slots[(this.head + i) % this.capacity];
  }

  /** Copy of the retained points, oldest first */
  toArray(): Point3D[] {
    const points: Point3D[] = [];
    for (const point of this) {
      points.push(point);
    }
    return points;
  }

  *[Symbol.iterator](): Iterator<Point3D> {
    for (let i = 0; i < this._length; i++) {
      const point = this.slots[(this.head + i) % this.capacity];
      if (point) yield point;
    }
  }
}
