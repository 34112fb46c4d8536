import type { ColorIndex } from "@/types";
import type { PixelBuffer } from "./PixelBuffer";

/**
 * Walk the integer Bresenham path from (x1, y1) to (x2, y2), both ends included.
 * Each pixel of the path is visited exactly once, in order from the first point.
 * Fractional endpoints are truncated; a non-finite endpoint yields no visits.
 * The walk takes max(|dx|, |dy|) + 1 steps, so callers clip first.
 */
export function bresenham(
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  visit: (x: number, y: number) => void
): void {
  if (!Number.isFinite(x1) || !Number.isFinite(y1) || !Number.isFinite(x2) || !Number.isFinite(y2)) {
    return;
  }

  let x = Math.trunc(x1);
  let y = Math.trunc(y1);
  const endX = Math.trunc(x2);
  const endY = Math.trunc(y2);

  const dx = Math.abs(endX - x);
  const dy = Math.abs(endY - y);
  const sx = x < endX ? 1 : -1;
  const sy = y < endY ? 1 : -1;
  let err = dx - dy;

  for (;;) {
    visit(x, y);
    if (x === endX && y === endY) break;

    const e2 = 2 * err;
    if (e2 > -dy) {
      err -= dy;
      x += sx;
    }
    if (e2 < dx) {
      err += dx;
      y += sy;
    }
  }
}

// Cohen-Sutherland outcodes
const LEFT = 1;
const RIGHT = 2;
const TOP = 4;
const BOTTOM = 8;

interface Segment {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

function outcode(x: number, y: number, maxX: number, maxY: number): number {
  let code = 0;
  if (x < 0) code |= LEFT;
  else if (x > maxX) code |= RIGHT;
  if (y < 0) code |= TOP;
  else if (y > maxY) code |= BOTTOM;
  return code;
}

// Each pass pins one endpoint to an edge; rounding can need a second pass per edge
const MAX_CLIP_PASSES = 8;

/**
 * Clip a segment to the rectangle [0, maxX] x [0, maxY] in floating point
 * @returns The visible part, or null when none of it is visible
 */
export function clipSegment(
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  maxX: number,
  maxY: number
): Segment | null {
  const segment: Segment = { x1, y1, x2, y2 };
  let code1 = outcode(x1, y1, maxX, maxY);
  let code2 = outcode(x2, y2, maxX, maxY);

  for (let pass = 0; pass < MAX_CLIP_PASSES; pass++) {
    if ((code1 | code2) === 0) return segment;
    if ((code1 & code2) !== 0) return null;

    const code = code1 !== 0 ? code1 : code2;
    const dx = segment.x2 - segment.x1;
    const dy = segment.y2 - segment.y1;
    let x: number;
    let y: number;

    if (code & TOP) {
      x = segment.x1 + dx * ((0 - segment.y1) / dy);
      y = 0;
    } else if (code & BOTTOM) {
      x = segment.x1 + dx * ((maxY - segment.y1) / dy);
      y = maxY;
    } else if (code & RIGHT) {
      x = maxX;
      y = segment.y1 + dy * ((maxX - segment.x1) / dx);
    } else {
      x = 0;
      y = segment.y1 + dy * ((0 - segment.x1) / dx);
    }

    if (code === code1) {
      segment.x1 = x;
      segment.y1 = y;
      code1 = outcode(x, y, maxX, maxY);
    } else {
      segment.x2 = x;
      segment.y2 = y;
      code2 = outcode(x, y, maxX, maxY);
    }
  }

  return null;
}

/**
 * Draw a one-pixel line, clipped to the buffer.
 * The segment is clipped before it is walked, so the work is bounded by the
 * buffer size however far the endpoints lie off screen.
 */
export function drawLine(
  buffer: PixelBuffer,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  color: ColorIndex
): void {
  if (!Number.isFinite(x1) || !Number.isFinite(y1) || !Number.isFinite(x2) || !Number.isFinite(y2)) {
    return;
  }

  const visible = clipSegment(x1, y1, x2, y2, buffer.width - 1, buffer.height - 1);
  if (!visible) return;

  bresenham(visible.x1, visible.y1, visible.x2, visible.y2, (x, y) => buffer.set(x, y, color));
}

/**
 * Draw a filled disc: every (cx + dx, cy + dy) with dx² + dy² ≤ radius².
 * Only offsets that land inside the buffer are visited.
 */
export function drawFilledCircle(
  buffer: PixelBuffer,
  cx: number,
  cy: number,
  radius: number,
  color: ColorIndex
): void {
  if (!Number.isFinite(cx) || !Number.isFinite(cy)) return;
  if (!Number.isFinite(radius) || radius < 0) return;

  const r = Math.trunc(radius);
  const rSquared = r * r;
  const minDy = Math.max(-r, Math.ceil(-cy));
  const maxDy = Math.min(r, Math.floor(buffer.height - 1 - cy));
  const minDx = Math.max(-r, Math.ceil(-cx));
  const maxDx = Math.min(r, Math.floor(buffer.width - 1 - cx));

  for (let dy = minDy; dy <= maxDy; dy++) {
    for (let dx = minDx; dx <= maxDx; dx++) {
      if (dx * dx + dy * dy <= rSquared) {
        buffer.set(cx + dx, cy + dy, color);
      }
    }
  }
}
