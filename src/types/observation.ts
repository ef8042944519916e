/**
 * State shapes of the observation layers (meta-cognition, compassion, silence).
 */

/**
 * Self-observation of the regulation loop.
 */
export interface MetaCognitionState {
  /** How much our own parameters are moving (0 = steady) */
  selfDrift: number;
  /** How present the system itself is */
  selfResonance: number;
  confidence: number;
  clarity: number;
  /** Never below 0.1 */
  doubt: number;
  observationCount: number;
}

export type SufferingType = 'None' | 'Mild' | 'Moderate' | 'Severe';

export interface CompassionState {
  userSuffering: number;
  sufferingType: SufferingType;
  responseKindness: number;
  healingIntent: number;
  compassionLevel: number;
  /** Distinct suffering episodes (rising edge over 0.2) */
  sufferingCount: number;
  /** Consecutive turns with a repeated theme */
  sufferingStreak: number;
}

/**
 * Compassion adjustments, linear in compassion level.
 */
export interface CompassionAdjustments {
  resonanceBoost: number;
  paceAdjustment: number;
  pauseAdjustmentMs: number;
  driftReduction: number;
}

export type SilenceType =
  | 'None'
  | 'Contemplation'
  | 'Peace'
  | 'Uncertainty'
  | 'Fear'
  | 'Disconnect';

export interface SilenceState {
  currentSilenceMs: number;
  silenceType: SilenceType;
  silenceQuality: number;
  isGenerative: boolean;
  shouldInterrupt: boolean;
  /** Distinct silence episodes this session */
  silenceCount: number;
  totalSilenceMs: number;
  maxSilenceMs: number;
  /** Running mean quality over closed episodes */
  avgSilenceQuality: number;
}
