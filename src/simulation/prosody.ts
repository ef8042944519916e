import type { ToneTag } from '../types/index.js';
import { clamp01 } from '../types/index.js';

/**
 * Prosody of a synthesized utterance.
 */
export interface Prosody {
  /** Words per minute */
  wpm: number;
  /** Articulation clarity (0-1) */
  articulation: number;
  tone: ToneTag;
}

const BASE_WPM = 150;
const MAX_WPM = 220;
const MIN_PAUSE_MS = 20;
const CALM_BELOW_WPM = 120;
const ENERGETIC_ABOVE_WPM = 180;

/**
 * Estimate prosody from the delivery settings.
 *
 * The text does not affect the estimate yet; pace and pause alone decide
 * tempo and articulation.
 */
export function analyzeProsody(_text: string, paceFactor: number, pauseMs: number): Prosody {
  const pause = Math.max(pauseMs, MIN_PAUSE_MS);
  const raw = (BASE_WPM * paceFactor * (40 / pause)) / 200;
  const wpm = clamp01(raw) * MAX_WPM;

  const articulation = clamp01((0.85 / Math.max(paceFactor, 0.1)) * (pause / 80));

  return { wpm, articulation, tone: toneForTempo(wpm) };
}

export function toneForTempo(wpm: number): ToneTag {
  if (wpm < CALM_BELOW_WPM) return 'Calm';
  if (wpm > ENERGETIC_ABOVE_WPM) return 'Energetic';
  return 'Neutral';
}
