/**
 * Clamp a value into [0, 1]. NaN maps to 0.
 */
export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

/**
 * Clamp a value into [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Round a number to 3 decimal places.
 * Use this for logged values to avoid floating point noise.
 */
export function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
