import { describe, expect, it } from 'vitest';
import { parseGlyphLine, type HersheyGlyph } from '../../src/services/glyph-parser';
import { DEFAULT_RENDER_OPTIONS } from '../../src/services/hershey-font';
import { textGlyphs, textLines, textStrokes } from '../../src/services/stroke-compositor';
import type { RenderOptions } from '../../src/types/font';
import { GLYPH_A, GLYPH_I, GLYPH_SPACE } from '../fixtures/glyphs';

function glyphMap(entries: Record<string, string>): Map<string, HersheyGlyph> {
  const glyphs = new Map<string, HersheyGlyph>();
  for (const [char, line] of Object.entries(entries)) {
    const parsed = parseGlyphLine(line);
    if (parsed.kind === 'glyph') {
      glyphs.set(char, parsed.glyph);
    }
  }
  return glyphs;
}

const glyphs = glyphMap({ A: GLYPH_A, I: GLYPH_I, ' ': GLYPH_SPACE, '.': '   46  2JZRFR' });

describe('textGlyphs', () => {
  it('should skip characters without glyphs', () => {
    expect([...textGlyphs(glyphs, 'A?I')].map((glyph) => glyph.charcode)).toEqual([65, 73]);
  });
});

describe('textStrokes', () => {
  it('should scale, offset and advance every glyph', () => {
    const options: RenderOptions = { ...DEFAULT_RENDER_OPTIONS, xofs: 10, yofs: 5, scalex: 2, scaley: -1, spacing: 3 };

    expect([...textStrokes(glyphs, 'AI', options)]).toEqual([
      [
        [28, 17],
        [12, -4],
      ],
      [
        [28, 17],
        [44, -4],
      ],
      [
        [18, 3],
        [38, 3],
      ],
      [
        [57, 17],
        [57, -4],
      ],
    ]);
  });

  it('should advance over glyphs without strokes', () => {
    expect([...textStrokes(glyphs, ' I', DEFAULT_RENDER_OPTIONS)]).toEqual([
      [
        [20, -12],
        [20, 9],
      ],
    ]);
  });

  it('should place a glyph the same with or without an unknown character before it', () => {
    const withUnknown = [...textStrokes(glyphs, 'AéI', DEFAULT_RENDER_OPTIONS)];
    const without = [...textStrokes(glyphs, 'AI', DEFAULT_RENDER_OPTIONS)];

    expect(withUnknown).toEqual(without);
  });

  it('should not change the options it was given', () => {
    const options: RenderOptions = { ...DEFAULT_RENDER_OPTIONS };
    [...textStrokes(glyphs, 'AAA', options)];

    expect(options.xofs).toBe(0);
  });
});

describe('textLines', () => {
  it('should pair adjacent points of every stroke in order', () => {
    expect([...textLines(glyphs, 'IA', DEFAULT_RENDER_OPTIONS)]).toEqual([
      [
        [4, -12],
        [4, 9],
      ],
      [
        [17, -12],
        [9, 9],
      ],
      [
        [17, -12],
        [25, 9],
      ],
      [
        [12, 2],
        [22, 2],
      ],
    ]);
  });

  it('should yield no line for a single point stroke', () => {
    expect([...textStrokes(glyphs, '.', DEFAULT_RENDER_OPTIONS)]).toEqual([[[8, -12]]]);
    expect([...textLines(glyphs, '.', DEFAULT_RENDER_OPTIONS)]).toEqual([]);
  });
});
