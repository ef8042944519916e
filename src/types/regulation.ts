/**
 * Regulation state machine labels and the adjustment shapes stages emit.
 */

/**
 * Stabilizer state. Shared by value with every downstream stage.
 */
export enum RegulationState {
  /** Signal within normal range - no nudges */
  Normal = 'Normal',
  /** Drift building up */
  Warming = 'Warming',
  /** Drift high and resonance low - strongest nudges */
  Overheat = 'Overheat',
  /** One-turn latch after Overheat, held for coolSteps turns */
  Cooldown = 'Cooldown',
}

/**
 * Delivery nudges suggested by the stabilizer for its current state.
 */
export interface StabilizerAdvice {
  paceDelta: number;
  pauseDeltaMs: number;
  articulationHint: number;
}

/**
 * Per-turn residual correction produced by neural sync.
 */
export interface SyncCorrection {
  /** Bounded by the configured sync step */
  paceDelta: number;
  pauseDeltaMs: number;
  resonanceBoost: number;
  driftReduction: number;
}

/**
 * Merged per-turn deltas across all active stages.
 */
export interface AdjustmentDelta {
  paceDelta: number;
  pauseDeltaMs: number;
  resonanceDelta: number;
  driftDelta: number;
  articulationDelta: number;
}

/**
 * Final adjusted scalars handed to the synthesis collaborator.
 */
export interface AdjustedOutput {
  /** Pace factor, clamped to [0.7, 1.3] */
  pace: number;
  /** Pause between phrases in ms, clamped to [20, 250] */
  pauseMs: number;
  resonance: number;
  drift: number;
  articulation: number;
}

export function createEmptyAdjustment(): AdjustmentDelta {
  return {
    paceDelta: 0,
    pauseDeltaMs: 0,
    resonanceDelta: 0,
    driftDelta: 0,
    articulationDelta: 0,
  };
}

/**
 * Stabilizer state machine snapshot.
 */
export interface StabilizerState {
  state: RegulationState;
  emaDrift: number;
  emaResonance: number;
  /** Turns spent in the current state (0 on the turn of entry) */
  stepsInState: number;
}
