/**
 * Neural Sync
 *
 * Residual correction against configured baselines. Each turn the residual
 * (baseline - measured) for drift and resonance is turned into a small
 * pace/pause/resonance/drift correction scaled by the fast learning rate.
 *
 * The pace correction is clamped to ±syncStep after every other term has
 * been applied, so one outlier turn can never move tempo by more than a
 * single step. Turn-averaged residuals are exposed through
 * toSlowIncrements() for the caller to carry into the next session.
 */

import type { Logger, StageResult, SyncCorrection, TurnContext } from '../../types/index.js';
import { RegulationState, clamp } from '../../types/index.js';
import { BaseStage } from '../base-stage.js';

export interface SyncBaselines {
  drift: number;
  resonance: number;
}

/**
 * Biases carried over from earlier sessions, supplied by the caller.
 */
export interface SyncSeeds {
  paceBias: number;
  pauseBiasMs: number;
  resonanceWarm: number;
  driftSoften: number;
}

export interface NeuralSyncConfig {
  baselines: SyncBaselines;
  /** Within-session correction rate */
  lrFast: number;
  /** Cross-session bias rate (used only by toSlowIncrements) */
  lrSlow: number;
  /** Max absolute pace correction per turn */
  syncStep: number;
}

export const DEFAULT_NEURAL_SYNC_CONFIG: NeuralSyncConfig = {
  baselines: { drift: 0.35, resonance: 0.65 },
  lrFast: 0.15,
  lrSlow: 0.05,
  syncStep: 0.02,
};

/** Bound on slow increments handed to the consolidation store */
export const SLOW_INCREMENT_LIMIT = 0.03;

const PAUSE_SCALE_MS = 80;
const PAUSE_MIN_MS = -20;
const PAUSE_MAX_MS = 40;
const BOOST_SCALE = 0.05;
const OVERHEAT_PACE_NUDGE = -0.01;
const OVERHEAT_PAUSE_NUDGE_MS = 10;

export const EMPTY_SEEDS: SyncSeeds = {
  paceBias: 0,
  pauseBiasMs: 0,
  resonanceWarm: 0,
  driftSoften: 0,
};

export class NeuralSync extends BaseStage {
  readonly name = 'sync' as const;

  private readonly config: NeuralSyncConfig;
  private baselines: SyncBaselines;
  private seeds: SyncSeeds = { ...EMPTY_SEEDS };
  private seedsPending = false;
  private accumDrift = 0;
  private accumResonance = 0;
  private steps = 0;

  constructor(logger: Logger, config: Partial<NeuralSyncConfig> = {}) {
    super(logger, 'sync');
    this.config = { ...DEFAULT_NEURAL_SYNC_CONFIG, ...config };
    this.config.syncStep = Math.abs(this.config.syncStep);
    this.baselines = { ...this.config.baselines };
  }

  /**
   * Start a session from carried-over seeds and baselines.
   * Seeds are applied once, on the first processed turn.
   */
  warmStart(seeds: SyncSeeds, baselines: SyncBaselines = this.config.baselines): void {
    this.seeds = { ...seeds };
    this.seedsPending = true;
    this.baselines = { ...baselines };
    this.accumDrift = 0;
    this.accumResonance = 0;
    this.steps = 0;

    this.logger.debug({ seeds, baselines }, 'Neural sync warm-started');
  }

  /**
   * Compute the correction for one turn's measured drift and resonance.
   */
  step(drift: number, resonance: number, state?: RegulationState): SyncCorrection {
    const residualDrift = clamp(this.baselines.drift - drift, -1, 1);
    const residualResonance = clamp(this.baselines.resonance - resonance, -1, 1);

    this.accumDrift += residualDrift;
    this.accumResonance += residualResonance;
    this.steps++;

    const { lrFast, syncStep } = this.config;
    const overheated = state === RegulationState.Overheat;

    let pace = residualResonance * lrFast;
    let pause = Math.trunc(residualDrift * lrFast * PAUSE_SCALE_MS);
    if (overheated) {
      pace += OVERHEAT_PACE_NUDGE;
      pause += OVERHEAT_PAUSE_NUDGE_MS;
    }

    return {
      paceDelta: clamp(pace, -syncStep, syncStep),
      pauseDeltaMs: clamp(pause, PAUSE_MIN_MS, PAUSE_MAX_MS),
      resonanceBoost: clamp(lrFast * Math.max(residualResonance, 0) * BOOST_SCALE, 0, syncStep),
      driftReduction: clamp(lrFast * Math.max(residualDrift, 0) * BOOST_SCALE, 0, syncStep),
    };
  }

  /**
   * Turn-averaged residuals scaled by the slow rate, for biasing the next
   * session's baseline. Zero when no turn has been processed.
   */
  toSlowIncrements(): { driftBias: number; resonanceBias: number } {
    if (this.steps === 0) {
      return { driftBias: 0, resonanceBias: 0 };
    }

    const meanDrift = this.accumDrift / this.steps;
    const meanResonance = this.accumResonance / this.steps;

    return {
      driftBias: clamp(meanDrift * this.config.lrSlow, -SLOW_INCREMENT_LIMIT, SLOW_INCREMENT_LIMIT),
      resonanceBias: clamp(
        meanResonance * this.config.lrSlow,
        -SLOW_INCREMENT_LIMIT,
        SLOW_INCREMENT_LIMIT
      ),
    };
  }

  getBaselines(): SyncBaselines {
    return { ...this.baselines };
  }

  getStepCount(): number {
    return this.steps;
  }

  restart(): void {
    this.baselines = { ...this.config.baselines };
    this.seeds = { ...EMPTY_SEEDS };
    this.seedsPending = false;
    this.accumDrift = 0;
    this.accumResonance = 0;
    this.steps = 0;
  }

  protected processImpl(context: TurnContext): StageResult {
    const correction = this.step(
      context.signal.drift,
      context.signal.resonance,
      context.regulationState
    );
    context.sync = correction;

    let paceDelta = correction.paceDelta;
    let pauseDeltaMs = correction.pauseDeltaMs;
    let resonanceDelta = correction.resonanceBoost;
    let driftDelta = -correction.driftReduction;

    if (this.seedsPending) {
      paceDelta += this.seeds.paceBias;
      pauseDeltaMs += this.seeds.pauseBiasMs;
      resonanceDelta += this.seeds.resonanceWarm;
      driftDelta -= this.seeds.driftSoften;
      this.seedsPending = false;
    }

    return this.result(formatSyncStatus(correction), {
      paceDelta,
      pauseDeltaMs,
      resonanceDelta,
      driftDelta,
    });
  }
}

/**
 * Magnitude of a turn's correction as observed by meta-cognition:
 * |pace| plus the pause change in hundreds of ms.
 */
export function correctionMagnitude(correction: SyncCorrection): number {
  return Math.abs(correction.paceDelta) + correction.pauseDeltaMs / 100;
}

export function formatSyncStatus(correction: SyncCorrection): string {
  return `[sync] pace=${correction.paceDelta.toFixed(3)} pause=${String(correction.pauseDeltaMs)}ms res_boost=${correction.resonanceBoost.toFixed(3)} drift_relief=${correction.driftReduction.toFixed(3)}`;
}

export function createNeuralSync(logger: Logger, config?: Partial<NeuralSyncConfig>): NeuralSync {
  return new NeuralSync(logger, config);
}
