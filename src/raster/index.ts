export { BACKGROUND, PixelBuffer } from "./PixelBuffer";
export {
  Palette,
  clampColorIndex,
  createEscapeTimePalette,
  createHeatPalette,
  createTrailPalette,
  MAX_COLOR_INDEX,
  PALETTE_SIZE,
} from "./Palette";
export type { RGB } from "./Palette";
export { bresenham, clipSegment, drawFilledCircle, drawLine } from "./primitives";
export {
  drawGlyph,
  drawText,
  glyphFor,
  GLYPH_ADVANCE,
  GLYPH_HEIGHT,
  GLYPH_WIDTH,
  hasGlyph,
  measureText,
} from "./glyphs";
export type { GlyphBitmap } from "./glyphs";
