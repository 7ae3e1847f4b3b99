import type { RenderFormat } from '../types/font';
import type { Point, Stroke } from '../types/glyph';
import { strokesToPathData, strokesToSVG } from '../utils/svg-utils';
import type { HersheyFont } from './hershey-font';

export interface TextLayout {
  /** Distance from cap line to bottom line in output units. */
  size: number;
  spacing?: number;
  xofs?: number;
  /** Added to the offset that puts the bottom line at y = 0. */
  yofs?: number;
}

export interface RenderRequest extends TextLayout {
  text: string;
  format: RenderFormat;
  precision?: number;
  strokeWidth?: number;
}

export function applyLayout(font: HersheyFont, { size, spacing = 0, xofs = 0, yofs = 0 }: TextLayout): void {
  font.normalize(size);
  font.setRenderOptions({
    spacing,
    xofs,
    yofs: font.renderOptions.yofs + yofs,
  });
}

function roundPoint([x, y]: Point, precision: number): Point {
  return [Number(x.toFixed(precision)), Number(y.toFixed(precision))];
}

function toSvgSpace(strokes: Stroke[]): Stroke[] {
  return strokes.map((stroke) => stroke.map(([x, y]): Point => [x, -y]));
}

/**
 * Lays out `text` and formats it. `strokes` and `lines` keep plotting
 * coordinates (y up); `svg` and `path` are flipped into SVG coordinates.
 */
export function renderText(font: HersheyFont, request: RenderRequest): string {
  const { text, format, precision = 3, strokeWidth } = request;
  applyLayout(font, request);

  switch (format) {
    case 'strokes':
      return JSON.stringify([...font.strokesForText(text)].map((stroke) => stroke.map((point) => roundPoint(point, precision))));
    case 'lines':
      return JSON.stringify([...font.linesForText(text)].map(([start, end]) => [roundPoint(start, precision), roundPoint(end, precision)]));
    case 'path':
      return strokesToPathData(toSvgSpace([...font.strokesForText(text)]), precision);
    case 'svg':
      return strokesToSVG(toSvgSpace([...font.strokesForText(text)]), {
        precision,
        strokeWidth: strokeWidth ?? request.size / 20,
        padding: request.size / 4,
      });
  }
}
