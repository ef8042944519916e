import { clamp01 } from '../types/index.js';

export const SPARK_GLYPHS = [' ', '▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'] as const;

/**
 * Render [0,1] values as a one-line bar chart.
 */
export function sparkline(values: readonly number[]): string {
  const maxIndex = SPARK_GLYPHS.length - 1;
  return values
    .map((value) => {
      const index = Math.min(Math.round(clamp01(value) * maxIndex), maxIndex);
      return SPARK_GLYPHS[index] ?? ' ';
    })
    .join('');
}
