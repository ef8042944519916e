/**
 * Stage interfaces for the per-turn regulation pipeline.
 *
 * A turn flows through the enabled stages in a fixed order:
 *
 *   STABILIZER → SYNC → GUARD → AWARENESS → COMPASSION → SILENCE
 *
 * Each stage reads the turn signal plus whatever earlier stages wrote into
 * the TurnContext, writes its own snapshot, and contributes deltas to the
 * merged adjustment. Stages never feed back within a turn.
 */

import type { TurnSignal } from './signal.js';
import type {
  AdjustmentDelta,
  RegulationState,
  StabilizerAdvice,
  StabilizerState,
  SyncCorrection,
} from './regulation.js';
import type { CompassionState, MetaCognitionState, SilenceState } from './observation.js';
import type { GuardAction } from './guard.js';

export type StageName = 'stabilizer' | 'sync' | 'guard' | 'awareness' | 'compassion' | 'silence';

/**
 * Pipeline order. Stages are always run in this order, whichever are enabled.
 */
export const STAGE_ORDER: readonly StageName[] = [
  'stabilizer',
  'sync',
  'guard',
  'awareness',
  'compassion',
  'silence',
];

export type SelfAssessment = 'Clear & Stable' | 'Uncertain' | 'Self-Adjusting' | 'Observing';

export interface AwarenessSnapshot extends MetaCognitionState {
  assessment: SelfAssessment;
  shouldExpressDoubt: boolean;
  isClearAndStable: boolean;
  emaSelfDrift: number;
  emaConfidence: number;
  needsMoreAwareness: boolean;
}

export interface CompassionSnapshot extends CompassionState {
  activated: boolean;
  offerSupport: boolean;
}

export interface StabilizerSnapshot extends StabilizerState {
  advice: StabilizerAdvice;
}

/**
 * What the driving loop hands the pipeline for one turn.
 */
export interface TurnInput {
  signal: TurnSignal;
  /** Text of the turn, used by the soft guard */
  utterance?: string;
  /** Theme/session collaborator: user is circling the same theme */
  repeatedTheme?: boolean;
  /** A new user input arrived since the last turn (closes the open silence) */
  newUserInput?: boolean;
}

export interface StageStatus {
  stage: StageName;
  text: string;
}

/**
 * Mutable per-turn context. Created fresh each turn; each stage fills its slot.
 */
export interface TurnContext {
  readonly turn: number;
  readonly signal: TurnSignal;
  readonly utterance: string;
  readonly repeatedTheme: boolean;
  readonly newUserInput: boolean;

  /** Current regulation state (undefined when the stabilizer is disabled) */
  regulationState?: RegulationState;

  stabilizer?: StabilizerSnapshot;
  sync?: SyncCorrection;
  guard?: GuardAction;
  awareness?: AwarenessSnapshot;
  compassion?: CompassionSnapshot;
  silence?: SilenceState;

  /** Deltas merged from every stage that ran */
  adjustment: AdjustmentDelta;

  statuses: StageStatus[];
  processedStages: StageName[];
}

/**
 * Result returned by a stage for the turn.
 */
export interface StageResult {
  /** Human-readable status line, consumed verbatim by reporting */
  status: string;
  /** Deltas to merge into the turn's adjustment */
  adjustment?: Partial<AdjustmentDelta>;
}

/**
 * A single pipeline stage.
 */
export interface RegulationStage {
  readonly name: StageName;

  /** Run the stage for one turn. Never throws. */
  process(context: TurnContext): StageResult;

  /** Restore the stage to its initial state for a new session */
  restart(): void;
}
