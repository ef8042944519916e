/**
 * Core type definitions for the regulation pipeline.
 */

export type * from './logger.js';
export type * from './signal.js';
export type * from './observation.js';
export type * from './guard.js';
export type * from './layers.js';
export type {
  StabilizerAdvice,
  StabilizerState,
  SyncCorrection,
  AdjustmentDelta,
  AdjustedOutput,
} from './regulation.js';

export { RegulationState, createEmptyAdjustment } from './regulation.js';
export { createTurnSignal, MIN_TEMPO_WPM } from './signal.js';
export { STAGE_ORDER } from './layers.js';
export { clamp, clamp01, round3 } from './numeric.js';
