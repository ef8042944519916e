import type { ToneTag } from '../types/index.js';
import { clamp01 } from '../types/index.js';

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;

/**
 * Map text to two stable pseudo-random values in [0,1] using 64-bit FNV-1a.
 */
export function hash01(text: string): [number, number] {
  let h = FNV_OFFSET_BASIS;
  for (const byte of Buffer.from(text, 'utf8')) {
    h ^= BigInt(byte);
    h = BigInt.asUintN(64, h * FNV_PRIME);
  }

  const a = Number((h >> 11n) & 0xffffn) / 65535;
  const b = Number((h >> 27n) & 0xffffn) / 65535;
  return [a, b];
}

/**
 * Stand-in for semantic analysis: (drift, resonance) of an utterance.
 */
export function analyzePrompt(text: string): { drift: number; resonance: number } {
  const [drift, resonance] = hash01(text);
  return { drift: clamp01(drift), resonance: clamp01(resonance) };
}

/**
 * Nudge the measurement by the delivery tone.
 */
export function applyToneBias(
  drift: number,
  resonance: number,
  tone: ToneTag
): { drift: number; resonance: number } {
  switch (tone) {
    case 'Calm':
      return { drift: clamp01(drift), resonance: clamp01(resonance + 0.02) };
    case 'Energetic':
      return { drift: clamp01(drift + 0.02), resonance: clamp01(resonance - 0.01) };
    case 'Neutral':
      return { drift: clamp01(drift), resonance: clamp01(resonance) };
  }
}
