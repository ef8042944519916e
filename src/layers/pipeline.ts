import type {
  AdjustedOutput,
  AdjustmentDelta,
  AwarenessSnapshot,
  CompassionSnapshot,
  GuardAction,
  Logger,
  RegulationStage,
  RegulationState,
  SilenceState,
  StabilizerSnapshot,
  StageName,
  StageStatus,
  SyncCorrection,
  TurnContext,
  TurnInput,
  TurnSignal,
} from '../types/index.js';
import { clamp, clamp01 } from '../types/index.js';
import { createTurnContext } from './turn-context.js';
import { Stabilizer, type StabilizerConfig } from './regulation/stabilizer.js';
import { NeuralSync, type NeuralSyncConfig } from './regulation/neural-sync.js';
import { SoftGuard, type SoftGuardConfig } from './regulation/soft-guard.js';
import { MetaCognition, type MetaCognitionConfig } from './observation/meta-cognition.js';
import { CompassionDetector } from './observation/compassion-detector.js';
import {
  SilenceClassifier,
  type SilenceClassifierConfig,
} from './observation/silence-classifier.js';

/**
 * Delivery parameters the adjustments are applied to (device profile + prosody).
 */
export interface DeliveryBase {
  pace: number;
  pauseMs: number;
  articulation: number;
}

export const DEFAULT_DELIVERY_BASE: DeliveryBase = {
  pace: 1.0,
  pauseMs: 40,
  articulation: 0.5,
};

export const PACE_RANGE = { min: 0.7, max: 1.3 } as const;
export const PAUSE_RANGE_MS = { min: 20, max: 250 } as const;

/**
 * Which stages run, and how each is configured.
 */
export interface PipelineConfig {
  enabled: Record<StageName, boolean>;
  stabilizer?: Partial<StabilizerConfig>;
  sync?: Partial<NeuralSyncConfig>;
  guard?: Partial<SoftGuardConfig>;
  awareness?: Partial<MetaCognitionConfig>;
  silence?: Partial<SilenceClassifierConfig>;
}

/**
 * The enabled stages, by name. A disabled stage is simply absent.
 */
export interface StageSet {
  stabilizer?: Stabilizer;
  sync?: NeuralSync;
  guard?: SoftGuard;
  awareness?: MetaCognition;
  compassion?: CompassionDetector;
  silence?: SilenceClassifier;
}

/**
 * Result of running one turn through the pipeline.
 * Snapshots of disabled stages are absent, not null.
 */
export interface TurnResult {
  turn: number;
  signal: TurnSignal;
  adjustment: AdjustmentDelta;
  output: AdjustedOutput;
  regulationState?: RegulationState;
  stabilizer?: StabilizerSnapshot;
  sync?: SyncCorrection;
  guard?: GuardAction;
  awareness?: AwarenessSnapshot;
  compassion?: CompassionSnapshot;
  silence?: SilenceState;
  statuses: StageStatus[];
  stagesExecuted: StageName[];
}

/**
 * RegulationPipeline - runs one turn through the enabled stages in order:
 *
 * STABILIZER → SYNC → GUARD → AWARENESS → COMPASSION → SILENCE
 *
 * The stage list is fixed at construction. Each stage's deltas are merged
 * into the turn context as soon as it finishes, so later stages read the
 * corrections made so far.
 */
export class RegulationPipeline {
  private readonly stageSet: StageSet;
  private readonly stages: RegulationStage[];
  private readonly logger: Logger;
  private turn = 0;

  constructor(logger: Logger, stageSet: StageSet) {
    this.logger = logger.child({ component: 'regulation-pipeline' });
    this.stageSet = stageSet;

    const ordered: (RegulationStage | undefined)[] = [
      stageSet.stabilizer,
      stageSet.sync,
      stageSet.guard,
      stageSet.awareness,
      stageSet.compassion,
      stageSet.silence,
    ];
    this.stages = ordered.filter((stage): stage is RegulationStage => stage !== undefined);

    this.logger.debug({ stages: this.getStageNames() }, 'Pipeline assembled');
  }

  /**
   * Process one turn.
   */
  process(input: TurnInput, base: DeliveryBase = DEFAULT_DELIVERY_BASE): TurnResult {
    const context = createTurnContext(this.turn, input);
    this.turn++;

    for (const stage of this.stages) {
      const result = stage.process(context);
      if (result.adjustment) {
        mergeAdjustment(context.adjustment, result.adjustment);
      }
    }

    const output = applyAdjustment(context.signal, base, context.adjustment);

    this.logger.debug(
      {
        turn: context.turn,
        state: context.regulationState,
        pace: output.pace.toFixed(3),
        pauseMs: output.pauseMs,
        drift: output.drift.toFixed(3),
        resonance: output.resonance.toFixed(3),
      },
      'Turn processed'
    );

    return toTurnResult(context, output);
  }

  getStageNames(): StageName[] {
    return this.stages.map((s) => s.name);
  }

  getStages(): Readonly<StageSet> {
    return this.stageSet;
  }

  getTurnCount(): number {
    return this.turn;
  }

  /**
   * Restart every stage for a new session.
   */
  restart(): void {
    for (const stage of this.stages) {
      stage.restart();
    }
    this.turn = 0;
  }
}

function mergeAdjustment(target: AdjustmentDelta, delta: Partial<AdjustmentDelta>): void {
  target.paceDelta += delta.paceDelta ?? 0;
  target.pauseDeltaMs += delta.pauseDeltaMs ?? 0;
  target.resonanceDelta += delta.resonanceDelta ?? 0;
  target.driftDelta += delta.driftDelta ?? 0;
  target.articulationDelta += delta.articulationDelta ?? 0;
}

/**
 * Apply merged deltas to the delivery base and measured signal.
 */
export function applyAdjustment(
  signal: TurnSignal,
  base: DeliveryBase,
  adjustment: AdjustmentDelta
): AdjustedOutput {
  return {
    pace: clamp(base.pace + adjustment.paceDelta, PACE_RANGE.min, PACE_RANGE.max),
    pauseMs: clamp(
      Math.round(base.pauseMs + adjustment.pauseDeltaMs),
      PAUSE_RANGE_MS.min,
      PAUSE_RANGE_MS.max
    ),
    resonance: clamp01(signal.resonance + adjustment.resonanceDelta),
    drift: clamp01(signal.drift + adjustment.driftDelta),
    articulation: clamp01(base.articulation + adjustment.articulationDelta),
  };
}

function toTurnResult(context: TurnContext, output: AdjustedOutput): TurnResult {
  const result: TurnResult = {
    turn: context.turn,
    signal: context.signal,
    adjustment: context.adjustment,
    output,
    statuses: context.statuses,
    stagesExecuted: context.processedStages,
  };

  if (context.regulationState !== undefined) result.regulationState = context.regulationState;
  if (context.stabilizer) result.stabilizer = context.stabilizer;
  if (context.sync) result.sync = context.sync;
  if (context.guard) result.guard = context.guard;
  if (context.awareness) result.awareness = context.awareness;
  if (context.compassion) result.compassion = context.compassion;
  if (context.silence) result.silence = context.silence;

  return result;
}

/**
 * Build the pipeline once at startup from the enabled-stage map.
 */
export function createRegulationPipeline(logger: Logger, config: PipelineConfig): RegulationPipeline {
  const { enabled } = config;
  const stageSet: StageSet = {};

  if (enabled.stabilizer) stageSet.stabilizer = new Stabilizer(logger, config.stabilizer);
  if (enabled.sync) stageSet.sync = new NeuralSync(logger, config.sync);
  if (enabled.guard) stageSet.guard = new SoftGuard(logger, config.guard);
  if (enabled.awareness) stageSet.awareness = new MetaCognition(logger, config.awareness);
  if (enabled.compassion) stageSet.compassion = new CompassionDetector(logger);
  if (enabled.silence) stageSet.silence = new SilenceClassifier(logger, config.silence);

  return new RegulationPipeline(logger, stageSet);
}

export const ALL_STAGES_ENABLED: Record<StageName, boolean> = {
  stabilizer: true,
  sync: true,
  guard: true,
  awareness: true,
  compassion: true,
  silence: true,
};
