import type { Box, Line, Stroke } from '../types/glyph';

export function* strokeLines(strokes: Iterable<Stroke>): Generator<Line> {
  for (const stroke of strokes) {
    for (let i = 1; i < stroke.length; i++) {
      yield [stroke[i - 1], stroke[i]];
    }
  }
}

/** Componentwise bounds of every point, or undefined when there are none. */
export function strokeBounds(strokes: Iterable<Stroke>): Box | undefined {
  let box: Box | undefined;

  for (const stroke of strokes) {
    for (const [x, y] of stroke) {
      if (!box) {
        box = [
          [x, y],
          [x, y],
        ];
        continue;
      }
      const [min, max] = box;
      min[0] = Math.min(min[0], x);
      min[1] = Math.min(min[1], y);
      max[0] = Math.max(max[0], x);
      max[1] = Math.max(max[1], y);
    }
  }

  return box;
}
