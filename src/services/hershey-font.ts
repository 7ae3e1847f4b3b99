import { z } from 'zod';
import { InvalidRenderOptionError } from '../errors';
import type { LoadOptions, RenderOptions } from '../types/font';
import type { Line, LineMetrics, Stroke } from '../types/glyph';
import { charForCode } from '../utils/unicode-utils';
import {
  applyDirective,
  DEFAULT_BASE_LINE,
  DEFAULT_BOTTOM_LINE,
  DEFAULT_CAP_LINE,
  emptyDirectiveContext,
  parseGlyphLine,
} from './glyph-parser';
import type { HersheyGlyph } from './glyph-parser';
import { textGlyphs, textLines, textStrokes } from './stroke-compositor';

export const DEFAULT_RENDER_OPTIONS: Readonly<RenderOptions> = {
  xofs: 0,
  yofs: 0,
  scalex: 1,
  scaley: 1,
  spacing: 0,
  capLine: DEFAULT_CAP_LINE,
  baseLine: DEFAULT_BASE_LINE,
  bottomLine: DEFAULT_BOTTOM_LINE,
};

const RENDER_OPTION_KEYS = [
  'xofs',
  'yofs',
  'scalex',
  'scaley',
  'spacing',
  'capLine',
  'baseLine',
  'bottomLine',
] as const satisfies readonly (keyof RenderOptions)[];

const renderOptionsUpdateSchema = z
  .object({
    xofs: z.number().finite(),
    yofs: z.number().finite(),
    scalex: z.number().finite(),
    scaley: z.number().finite(),
    spacing: z.number().finite(),
    capLine: z.number().finite(),
    baseLine: z.number().finite(),
    bottomLine: z.number().finite(),
  })
  .partial()
  .strict();

export function multimode(values: number[]): number[] {
  const counts = new Map<number, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  const highest = Math.max(0, ...counts.values());
  return [...counts.entries()].filter(([, count]) => count === highest).map(([value]) => value);
}

export function median(values: number[]): number | undefined {
  if (values.length === 0) {
    return undefined;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[middle] : (sorted[middle - 1] + sorted[middle]) / 2;
}

/**
 * Font-wide value of one reference line: an explicit definition wins,
 * otherwise the median of the most frequent glyph values.
 */
function aggregateLine(defined: number | undefined, values: number[], fallback: number): number {
  if (defined !== undefined) {
    return defined;
  }
  return median(multimode(values)) ?? fallback;
}

/**
 * A loaded Hershey font: glyphs keyed by character plus the options used to
 * place them. A load replaces the glyph table only once every line has been
 * read, so a failed load leaves the previous font in place.
 */
export class HersheyFont {
  private glyphs = new Map<string, HersheyGlyph>();
  private options: RenderOptions = { ...DEFAULT_RENDER_OPTIONS };

  constructor(lines?: Iterable<string>, loadOptions?: LoadOptions) {
    if (lines) {
      this.load(lines, loadOptions);
    }
  }

  get size(): number {
    return this.glyphs.size;
  }

  get allGlyphs(): Map<string, HersheyGlyph> {
    return new Map(this.glyphs);
  }

  getGlyph(char: string): HersheyGlyph | undefined {
    return this.glyphs.get(char);
  }

  get renderOptions(): RenderOptions {
    return { ...this.options };
  }

  /** Cap, base and bottom line in output space. */
  get referenceLines(): Required<LineMetrics> {
    const { capLine, baseLine, bottomLine, scaley } = this.options;
    return {
      capLine: capLine * scaley,
      baseLine: baseLine * scaley,
      bottomLine: bottomLine * scaley,
    };
  }

  setRenderOptions(update: Partial<RenderOptions>): void {
    const result = renderOptionsUpdateSchema.safeParse(update);
    if (!result.success) {
      const unknownKeys = result.error.issues.flatMap((issue) => (issue.code === 'unrecognized_keys' ? issue.keys : []));
      if (unknownKeys.length > 0) {
        throw new InvalidRenderOptionError(`Unable to set unknown render options: ${unknownKeys.join(', ')}`, unknownKeys);
      }
      const invalidKeys = result.error.issues.map((issue) => issue.path.join('.'));
      throw new InvalidRenderOptionError(`Invalid render option values: ${invalidKeys.join(', ')}`, invalidKeys);
    }
    const next = { ...this.options };
    for (const key of RENDER_OPTION_KEYS) {
      const value = result.data[key];
      if (value !== undefined) {
        next[key] = value;
      }
    }
    this.options = next;
  }

  /**
   * Scales the font so the distance from cap line to bottom line is `factor`,
   * flips y to grow upwards and puts the bottom line at y = 0.
   */
  normalize(factor = 1): void {
    const { capLine, bottomLine } = this.options;
    const span = bottomLine - capLine;
    if (span === 0) {
      throw new InvalidRenderOptionError('Cannot normalize a font whose bottom line equals its cap line');
    }
    if (!Number.isFinite(factor) || factor === 0) {
      throw new InvalidRenderOptionError(`Invalid normalize factor: ${factor}`);
    }
    const scale = factor / span;
    this.setRenderOptions({
      scalex: scale,
      scaley: -scale,
      xofs: 0,
      yofs: bottomLine * scale,
    });
  }

  /**
   * Reads `.jhf` lines. Unless `useEmbeddedCode` is set, glyphs are stored
   * under consecutive code points from `firstCode`; every non-metadata line
   * takes one code point, even one too short to hold a glyph. The reference
   * lines come from the glyphs read by this call only, merged or not.
   */
  load(lines: Iterable<string>, { firstCode = 32, useEmbeddedCode = false, merge = false }: LoadOptions = {}): void {
    const glyphs = merge ? new Map(this.glyphs) : new Map<string, HersheyGlyph>();
    const caps: number[] = [];
    const bases: number[] = [];
    const bottoms: number[] = [];
    let context = emptyDirectiveContext();
    let code = firstCode;

    for (const line of lines) {
      const parsed = parseGlyphLine(line, context);

      if (parsed.kind === 'directive') {
        context = applyDirective(context, parsed.directive);
        continue;
      }

      if (parsed.kind === 'glyph') {
        const { glyph } = parsed;
        glyphs.set(charForCode(useEmbeddedCode ? glyph.charcode : code), glyph);
        caps.push(glyph.capLine);
        bases.push(glyph.baseLine);
        bottoms.push(glyph.bottomLine);
      }
      code++;
    }

    const { font } = context;
    this.glyphs = glyphs;
    this.options = {
      ...this.options,
      capLine: aggregateLine(font.capLine, caps, DEFAULT_CAP_LINE),
      baseLine: aggregateLine(font.baseLine, bases, DEFAULT_BASE_LINE),
      bottomLine: aggregateLine(font.bottomLine, bottoms, DEFAULT_BOTTOM_LINE),
    };
  }

  loadText(text: string, options?: LoadOptions): void {
    this.load(text.split(/\r?\n/), options);
  }

  glyphsForText(text: string): Generator<HersheyGlyph> {
    return textGlyphs(this.glyphs, text);
  }

  strokesForText(text: string): Generator<Stroke> {
    return textStrokes(this.glyphs, text, this.renderOptions);
  }

  linesForText(text: string): Generator<Line> {
    return textLines(this.glyphs, text, this.renderOptions);
  }
}
