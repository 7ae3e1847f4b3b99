import type { RenderOptions } from '../types/font';
import type { Line, Point, Stroke } from '../types/glyph';
import { strokeLines } from '../utils/stroke-utils';
import type { HersheyGlyph } from './glyph-parser';

export type GlyphMap = ReadonlyMap<string, HersheyGlyph>;

/** Glyphs of `text` in order; characters without a glyph are left out. */
export function* textGlyphs(glyphs: GlyphMap, text: string): Generator<HersheyGlyph> {
  for (const char of text) {
    const glyph = glyphs.get(char);
    if (glyph) {
      yield glyph;
    }
  }
}

/**
 * Strokes of `text` moved into output space. Each glyph is placed at the
 * running x offset, which then advances by `spacing + scalex * width`.
 */
export function* textStrokes(glyphs: GlyphMap, text: string, options: RenderOptions): Generator<Stroke> {
  const { yofs, scalex, scaley, spacing } = options;
  let xofs = options.xofs;

  for (const glyph of textGlyphs(glyphs, text)) {
    for (const stroke of glyph.strokes) {
      yield stroke.map(([x, y]): Point => [xofs + (x - glyph.leftSide) * scalex, yofs + y * scaley]);
    }
    xofs += spacing + scalex * glyph.width;
  }
}

export function textLines(glyphs: GlyphMap, text: string, options: RenderOptions): Generator<Line> {
  return strokeLines(textStrokes(glyphs, text, options));
}
