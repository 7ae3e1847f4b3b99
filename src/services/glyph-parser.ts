import { z } from 'zod';
import { DirectiveParseError } from '../errors';
import type { Box, DirectiveContext, GlyphData, Line, LineMetrics, Point, Stroke } from '../types/glyph';
import { strokeBounds, strokeLines } from '../utils/stroke-utils';

export const DEFAULT_CAP_LINE = -12;
export const DEFAULT_BASE_LINE = 9;
export const DEFAULT_BOTTOM_LINE = 16;

const MIN_DATA_LINE_LENGTH = 10;
const STROKE_SEPARATOR = ' R';
const ZERO_CODE = 'R'.charCodeAt(0);

// null clears a value an earlier directive set
const lineValue = z.number().nullish();

const directiveSchema = z.object({
  define_cap_line: lineValue,
  define_base_line: lineValue,
  define_bottom_line: lineValue,
  glyph_cap_line: lineValue,
  glyph_base_line: lineValue,
  glyph_bottom_line: lineValue,
});

/** Directive values: a number sets the line, `null` clears it, a missing key keeps it. */
export type DirectiveMetrics = { [K in keyof LineMetrics]?: number | null };

export interface Directive {
  font: DirectiveMetrics;
  glyph: DirectiveMetrics;
}

export type ParsedLine = { kind: 'glyph'; glyph: HersheyGlyph } | { kind: 'directive'; directive: Directive } | { kind: 'skip' };

export function emptyDirectiveContext(): DirectiveContext {
  return { font: {}, glyph: {} };
}

function copyStrokes(strokes: Stroke[]): Stroke[] {
  return strokes.map((stroke) => stroke.map(([x, y]): Point => [x, y]));
}

/**
 * A single Hershey glyph. Coordinates are in font units with y growing downwards.
 */
export class HersheyGlyph {
  readonly charcode: number;
  readonly leftSide: number;
  readonly rightSide: number;
  private readonly paths: Stroke[];
  private readonly metrics: LineMetrics;

  constructor(data: GlyphData) {
    this.charcode = data.charcode;
    this.leftSide = data.leftSide;
    this.rightSide = data.rightSide;
    this.paths = copyStrokes(data.strokes);
    this.metrics = { ...data.lines };
  }

  /** Copy of the pen strokes; changing it leaves the glyph as it was. */
  get strokes(): Stroke[] {
    return copyStrokes(this.paths);
  }

  /** Advance width. May differ from the drawn width and may be negative. */
  get width(): number {
    return this.rightSide - this.leftSide;
  }

  get capLine(): number {
    return this.metrics.capLine ?? DEFAULT_CAP_LINE;
  }

  get baseLine(): number {
    return this.metrics.baseLine ?? DEFAULT_BASE_LINE;
  }

  get bottomLine(): number {
    return this.metrics.bottomLine ?? DEFAULT_BOTTOM_LINE;
  }

  /** Bounds of the ink. */
  get drawBox(): Box {
    return (
      strokeBounds(this.paths) ?? [
        [0, 0],
        [0, 0],
      ]
    );
  }

  /** Typographic box: side bearings horizontally, bottom and cap line vertically. */
  get charBox(): Box {
    return [
      [this.leftSide, this.bottomLine],
      [this.rightSide, this.capLine],
    ];
  }

  lines(): Generator<Line> {
    return strokeLines(this.paths);
  }
}

export function decodeValue(char: string): number {
  return char.charCodeAt(0) - ZERO_CODE;
}

export function decodeStrokes(payload: string): Stroke[] {
  const strokes: Stroke[] = [];

  for (const segment of payload.split(STROKE_SEPARATOR)) {
    if (segment.length === 0) {
      continue;
    }
    const stroke: Stroke = [];
    for (let i = 0; i + 1 < segment.length; i += 2) {
      stroke.push([decodeValue(segment[i]), decodeValue(segment[i + 1])]);
    }
    strokes.push(stroke);
  }

  return strokes;
}

function parseDirective(line: string): Directive {
  let raw: unknown;
  try {
    raw = JSON.parse(line.slice(1));
  } catch (error) {
    throw new DirectiveParseError(line, { cause: error });
  }

  const result = directiveSchema.safeParse(raw);
  if (!result.success) {
    throw new DirectiveParseError(line, { cause: result.error });
  }

  const values = result.data;
  return {
    font: {
      capLine: values.define_cap_line,
      baseLine: values.define_base_line,
      bottomLine: values.define_bottom_line,
    },
    glyph: {
      capLine: values.glyph_cap_line,
      baseLine: values.glyph_base_line,
      bottomLine: values.glyph_bottom_line,
    },
  };
}

function updateLine(current: number | undefined, update: number | null | undefined): number | undefined {
  if (update === undefined) {
    return current;
  }
  return update ?? undefined;
}

function updateMetrics(current: LineMetrics, update: DirectiveMetrics): LineMetrics {
  return {
    capLine: updateLine(current.capLine, update.capLine),
    baseLine: updateLine(current.baseLine, update.baseLine),
    bottomLine: updateLine(current.bottomLine, update.bottomLine),
  };
}

function mergeMetrics(fallback: LineMetrics, preferred: LineMetrics): LineMetrics {
  return {
    capLine: preferred.capLine ?? fallback.capLine,
    baseLine: preferred.baseLine ?? fallback.baseLine,
    bottomLine: preferred.bottomLine ?? fallback.bottomLine,
  };
}

export function applyDirective(context: DirectiveContext, directive: Directive): DirectiveContext {
  return {
    font: updateMetrics(context.font, directive.font),
    glyph: updateMetrics(context.glyph, directive.glyph),
  };
}

/**
 * Parses one line of a `.jhf` font.
 *
 * Data lines are laid out as a 5 column glyph number, a 3 column length, the
 * left and right bearing and the stroke payload. Every data character is a
 * value biased by `'R'`, and `" R"` lifts the pen. Lines starting with `#` hold
 * JSON metadata. Anything too short to be a glyph is skipped.
 */
export function parseGlyphLine(line: string, context: DirectiveContext = emptyDirectiveContext()): ParsedLine {
  const trimmed = line.trimEnd();

  if (trimmed.startsWith('#')) {
    return { kind: 'directive', directive: parseDirective(trimmed) };
  }

  if (trimmed.length < MIN_DATA_LINE_LENGTH) {
    return { kind: 'skip' };
  }

  const charcode = Number.parseInt(trimmed.slice(0, 5), 10);
  if (Number.isNaN(charcode)) {
    return { kind: 'skip' };
  }

  const glyph = new HersheyGlyph({
    charcode,
    leftSide: decodeValue(trimmed[8]),
    rightSide: decodeValue(trimmed[9]),
    strokes: decodeStrokes(trimmed.slice(10)),
    lines: mergeMetrics(context.font, context.glyph),
  });

  return { kind: 'glyph', glyph };
}
