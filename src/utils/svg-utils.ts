import type { Stroke } from '../types/glyph';
import { strokeBounds } from './stroke-utils';

export interface SvgOptions {
  strokeWidth?: number;
  padding?: number;
  precision?: number;
}

export function formatNumber(value: number, precision: number = 3): string {
  return String(Number(value.toFixed(precision)));
}

/** One `M` per stroke, `L` for every following point. Single points draw nothing and are left out. */
export function strokesToPathData(strokes: Iterable<Stroke>, precision: number = 3): string {
  const parts: string[] = [];

  for (const stroke of strokes) {
    if (stroke.length < 2) continue;
    const [first, ...rest] = stroke;
    parts.push(`M ${formatNumber(first[0], precision)} ${formatNumber(first[1], precision)}`);
    for (const [x, y] of rest) {
      parts.push(`L ${formatNumber(x, precision)} ${formatNumber(y, precision)}`);
    }
  }

  return parts.join(' ');
}

/**
 * Wraps strokes in a standalone SVG document. Strokes are taken as SVG
 * coordinates (y down); the view box fits their bounds plus `padding`.
 */
export function strokesToSVG(strokes: Stroke[], { strokeWidth = 1, padding = 1, precision = 3 }: SvgOptions = {}): string {
  const [[xmin, ymin], [xmax, ymax]] = strokeBounds(strokes) ?? [
    [0, 0],
    [0, 0],
  ];
  const viewBox = [xmin - padding, ymin - padding, xmax - xmin + 2 * padding, ymax - ymin + 2 * padding]
    .map((value) => formatNumber(value, precision))
    .join(' ');

  return `<svg xmlns="http://www.w3.org/2000/svg" viewBox="${viewBox}">
  <path d="${strokesToPathData(strokes, precision)}" fill="none" stroke="black" stroke-width="${formatNumber(strokeWidth, precision)}" stroke-linecap="round" stroke-linejoin="round"/>
</svg>`;
}
