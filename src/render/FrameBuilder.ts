import { project } from "@/projection/Projector";
import { PixelBuffer } from "@/raster/PixelBuffer";
import { MAX_COLOR_INDEX, clampColorIndex } from "@/raster/Palette";
import { drawText } from "@/raster/glyphs";
import { drawFilledCircle, drawLine } from "@/raster/primitives";
import type { ColorIndex, FrameOverlay, TrailView } from "@/types";

export const DEFAULT_FRAME_OVERLAY: FrameOverlay = {
  title: "Lorenz Attractor Animation",
  markerRadius: 3,
};

/** Fixed overlay placement and colors */
export const FRAME_LABEL = { x: 10, y: 20, color: 200 } as const;
export const TITLE_LABEL = { x: 10, y: 35, color: 150 } as const;
export const MARKER_COLOR: ColorIndex = MAX_COLOR_INDEX;

/**
 * Color of the segment ending at trail position i of len.
 * Older segments sit near the background end of the palette, newer ones near
 * the top; the result never lands on index 0.
 */
export function colorIndexForRecency(index: number, length: number): ColorIndex {
  const color = clampColorIndex((index / length) * (MAX_COLOR_INDEX - 1) + 1);
  return color === 0 ? 1 : color;
}

/**
 * Compose one animation frame from a trail.
 *
 * Draws the trail oldest to newest with recency coloring, a marker on the
 * newest point and the frame/title overlay. A trail shorter than two points
 * gives a blank frame. The trail is only read.
 */
export function buildFrame(
  trail: TrailView,
  width: number,
  height: number,
  frameIndex: number,
  overlay: Partial<FrameOverlay> = {}
): PixelBuffer {
  const { title, markerRadius } = { ...DEFAULT_FRAME_OVERLAY, ...overlay };
  const buffer = new PixelBuffer(width, height);

  const length = trail.length;
  if (length < 2) return buffer;

  let previous = trail.at(0);
  for (let i = 1; i < length; i++) {
    const current = trail.at(i);
    if (!previous || !current) continue;

    const from = project(previous, width, height);
    const to = project(current, width, height);
    drawLine(buffer, from.x, from.y, to.x, to.y, colorIndexForRecency(i, length));

    previous = current;
  }

  const newest = trail.at(length - 1);
  if (newest) {
    const marker = project(newest, width, height);
    drawFilledCircle(buffer, marker.x, marker.y, markerRadius, MARKER_COLOR);
  }

  drawText(buffer, FRAME_LABEL.x, FRAME_LABEL.y, `Frame: ${frameIndex}`, FRAME_LABEL.color);
  drawText(buffer, TITLE_LABEL.x, TITLE_LABEL.y, title, TITLE_LABEL.color);

  return buffer;
}
