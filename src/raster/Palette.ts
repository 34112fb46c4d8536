import type { ColorIndex } from "@/types";

export const PALETTE_SIZE = 256;
export const MAX_COLOR_INDEX: ColorIndex = PALETTE_SIZE - 1;

export interface RGB {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/**
 * Map an arbitrary intensity onto a palette index.
 * NaN becomes the background (0); everything else is clamped to [0, 255]
 * and truncated.
 */
export function clampColorIndex(value: number): ColorIndex {
  if (Number.isNaN(value)) return 0;
  return Math.trunc(Math.min(MAX_COLOR_INDEX, Math.max(0, value)));
}

/**
 * Palette - Fixed 256-entry mapping from color index to 0xRRGGBB.
 * Index 0 is the background.
 */
export class Palette {
  readonly colors: readonly number[];

  constructor(colors: readonly number[]) {
    if (colors.length !== PALETTE_SIZE) {
      throw new RangeError(`A palette needs ${PALETTE_SIZE} colors, got ${colors.length}`);
    }
    this.colors = [...colors];
  }

  static fromRGB(entries: readonly RGB[]): Palette {
    return new Palette(entries.map(({ r, g, b }) => (r << 16) | (g << 8) | b));
  }

  /** 0xRRGGBB of an index; the background color for anything outside the table */
  color(index: ColorIndex): number {
    return this.colors[index] ?? this.colors[0] ?? 0;
  }

  rgb(index: ColorIndex): RGB {
    const value = this.color(index);
    return { r: (value >> 16) & 0xff, g: (value >> 8) & 0xff, b: value & 0xff };
  }
}

const BLACK: RGB = { r: 0, g: 0, b: 0 };

function buildPalette(entry: (index: number) => RGB): Palette {
  return Palette.fromRGB(
    Array.from({ length: PALETTE_SIZE }, (_, i) => (i === 0 ? BLACK : entry(i)))
  );
}

function sineChannel(t: number, phase: number): number {
  return Math.trunc(Math.sin(t * Math.PI * 2 + phase) * 127 + 128);
}

/**
 * Rainbow used for animated trails: three sine waves 120° apart over the index range
 */
export function createTrailPalette(): Palette {
  return buildPalette((i) => {
    const t = i / MAX_COLOR_INDEX;
    return {
      r: sineChannel(t, 0),
      g: sineChannel(t, (Math.PI * 2) / 3),
      b: sineChannel(t, (Math.PI * 4) / 3),
    };
  });
}

/**
 * Blue-to-red ramp used by the static image: index k is rgb(k, k/2, 255 − k)
 */
export function createHeatPalette(): Palette {
  return buildPalette((k) => ({ r: k, g: k >> 1, b: MAX_COLOR_INDEX - k }));
}

/**
 * Escape-time colors: index n + 1 is the color of a point that escaped after
 * n iterations. Indices past maxIterations stay black.
 */
export function createEscapeTimePalette(maxIterations: number): Palette {
  return buildPalette((index) => {
    const n = index - 1;
    if (n >= maxIterations) return BLACK;
    return {
      r: Math.trunc((n * 255) / maxIterations),
      g: (n * 7) % 255,
      b: (n * 13) % 255,
    };
  });
}
