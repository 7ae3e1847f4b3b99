export type Point = [number, number];

/** One continuous pen-down polyline. */
export type Stroke = Point[];

export type Line = [Point, Point];

/** `[[xmin, ymin], [xmax, ymax]]` */
export type Box = [Point, Point];

export interface LineMetrics {
  capLine?: number;
  baseLine?: number;
  bottomLine?: number;
}

export interface DirectiveContext {
  /** Values from `define_*` keys; they also become the font-wide lines. */
  font: LineMetrics;
  /** Values from `glyph_*` keys. */
  glyph: LineMetrics;
}

export interface GlyphData {
  charcode: number;
  leftSide: number;
  rightSide: number;
  strokes: Stroke[];
  lines: LineMetrics;
}
