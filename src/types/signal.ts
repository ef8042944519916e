/**
 * Per-turn prosody signal.
 *
 * Produced once per turn by the prosody collaborator (simulated here) and
 * read by every stage of the regulation pipeline. Values are clamped on
 * construction, so no stage ever sees drift or resonance outside [0, 1].
 */

import { clamp01 } from './numeric.js';

/**
 * Coarse tone of the user's delivery.
 */
export type ToneTag = 'Neutral' | 'Calm' | 'Energetic';

/**
 * Immutable per-turn reading.
 */
export interface TurnSignal {
  /** Semantic/emotional instability (0 = stable, 1 = chaotic) */
  readonly drift: number;

  /** Perceived presence/connection (0 = absent, 1 = fully present) */
  readonly resonance: number;

  readonly tone: ToneTag;

  /** Speaking tempo in words per minute, always > 0 */
  readonly tempo: number;

  /** Silence that followed the turn, in ms */
  readonly pauseMs: number;
}

/** Lowest tempo a signal may carry */
export const MIN_TEMPO_WPM = 1;

/**
 * Build a signal from raw collaborator values, clamping every field into
 * its domain. NaN drift/resonance collapse to 0.
 */
export function createTurnSignal(raw: {
  drift: number;
  resonance: number;
  tone?: ToneTag;
  tempo?: number;
  pauseMs?: number;
}): TurnSignal {
  const tempo = raw.tempo ?? 150;
  const pauseMs = raw.pauseMs ?? 0;

  return Object.freeze({
    drift: clamp01(raw.drift),
    resonance: clamp01(raw.resonance),
    tone: raw.tone ?? 'Neutral',
    tempo: Number.isFinite(tempo) ? Math.max(MIN_TEMPO_WPM, tempo) : MIN_TEMPO_WPM,
    pauseMs: Number.isFinite(pauseMs) ? Math.max(0, pauseMs) : 0,
  });
}
