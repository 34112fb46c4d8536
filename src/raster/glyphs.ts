import type { ColorIndex } from "@/types";
import { z } from "zod";
import rawGlyphTable from "./glyphs.json";
import type { PixelBuffer } from "./PixelBuffer";

/** Horizontal distance between consecutive characters of a string */
export const GLYPH_ADVANCE = 6;

/** Rows of lit/unlit cells, top to bottom */
export type GlyphBitmap = readonly (readonly boolean[])[];

const glyphRowsSchema = z.array(z.string().regex(/^[.#]+$/));

const glyphTableSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  fallback: glyphRowsSchema,
  glyphs: z.record(glyphRowsSchema),
});

function toBitmap(rows: string[]): GlyphBitmap {
  return rows.map((row) => [...row].map((cell) => cell === "#"));
}

function loadGlyphTable(raw: unknown) {
  const table = glyphTableSchema.parse(raw);
  const bitmaps = new Map<string, GlyphBitmap>();
  for (const [char, rows] of Object.entries(table.glyphs)) {
    bitmaps.set(char, toBitmap(rows));
  }
  return {
    width: table.width,
    height: table.height,
    fallback: toBitmap(table.fallback),
    bitmaps,
  };
}

const GLYPHS = loadGlyphTable(rawGlyphTable);

export const GLYPH_WIDTH = GLYPHS.width;
export const GLYPH_HEIGHT = GLYPHS.height;

export function hasGlyph(char: string): boolean {
  return GLYPHS.bitmaps.has(char);
}

/** Bitmap for a character; the centre-dot fallback when it has none */
export function glyphFor(char: string): GlyphBitmap {
  return GLYPHS.bitmaps.get(char) ?? GLYPHS.fallback;
}

/**
 * Draw one character with its top-left corner at (x, y)
 */
export function drawGlyph(
  buffer: PixelBuffer,
  x: number,
  y: number,
  char: string,
  color: ColorIndex
): void {
  glyphFor(char).forEach((row, rowIndex) => {
    row.forEach((lit, colIndex) => {
      if (lit) buffer.set(x + colIndex, y + rowIndex, color);
    });
  });
}

/**
 * Draw a string left to right, one fixed advance per character.
 * No kerning and no wrapping; characters past the edge are clipped.
 */
export function drawText(
  buffer: PixelBuffer,
  x: number,
  y: number,
  text: string,
  color: ColorIndex
): void {
  [...text].forEach((char, i) => {
    drawGlyph(buffer, x + i * GLYPH_ADVANCE, y, char, color);
  });
}

/** Pixel width a string occupies when drawn */
export function measureText(text: string): number {
  const length = [...text].length;
  if (length === 0) return 0;
  return (length - 1) * GLYPH_ADVANCE + GLYPH_WIDTH;
}
