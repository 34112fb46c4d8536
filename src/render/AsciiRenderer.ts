import { project } from "@/projection/Projector";
import type { TrailView } from "@/types";

const BLANK = " ";

/** Characters from newest to oldest, with the recency each one starts above */
const RECENCY_CHARS: readonly { readonly above: number; readonly char: string }[] = [
  { above: 0.9, char: "●" },
  { above: 0.7, char: "◆" },
  { above: 0.5, char: "▲" },
  { above: 0.3, char: "♦" },
];
const OLDEST_CHAR = "·";

export function charForRecency(recency: number): string {
  return RECENCY_CHARS.find(({ above }) => recency > above)?.char ?? OLDEST_CHAR;
}

/**
 * Render a trail into text rows for a terminal of `columns` x `rows` cells.
 * Later points overwrite earlier ones; the first row carries the frame label.
 */
export function renderAsciiFrame(
  trail: TrailView,
  columns: number,
  rows: number,
  frameIndex: number
): string[] {
  const canvas: string[][] = Array.from({ length: rows }, () =>
    new Array<string>(columns).fill(BLANK)
  );

  const length = trail.length;
  for (let i = 0; i < length; i++) {
    const point = trail.at(i);
    if (!point) continue;
    const { x, y } = project(point, columns, rows);
    const row = canvas[y];
    if (row && x >= 0 && x < columns) {
      row[x] = charForRecency(i / length);
    }
  }

  const header = canvas[0];
  if (header) {
    [...`Frame: ${frameIndex} | Lorenz Attractor`].slice(0, columns).forEach((char, i) => {
      header[i] = char;
    });
  }

  return canvas.map((row) => row.join(""));
}
