/**
 * Stabilizer
 *
 * Smooths drift and resonance with an EMA and runs a hysteresis state machine
 * over the smoothed values:
 *
 *   Normal → Warming → Overheat → Cooldown → Normal
 *
 * Overheat is only reachable through Warming, and is latched into Cooldown on
 * the very next turn so noise cannot bounce the loop straight back into
 * Warming. Cooldown holds for coolSteps turns unless both EMAs return to the
 * normal range first.
 */

import type {
  Logger,
  StabilizerAdvice,
  StabilizerSnapshot,
  StabilizerState,
  StageResult,
  TurnContext,
} from '../../types/index.js';
import { RegulationState, clamp, clamp01 } from '../../types/index.js';
import { BaseStage } from '../base-stage.js';

export interface StabilizerConfig {
  /** EMA smoothing factor (0-1) */
  emaAlpha: number;
  /** EMA drift at or above which Normal moves to Warming */
  warmDrift: number;
  /** EMA drift at or above which Warming may overheat */
  hotDrift: number;
  /** EMA resonance at or below which Warming may overheat */
  lowResonance: number;
  /** Turns Cooldown is held before returning to Normal (>= 1) */
  coolSteps: number;
  /** Extra calming applied to Overheat advice (0-0.2) */
  calmBoost: number;
}

export const DEFAULT_STABILIZER_CONFIG: StabilizerConfig = {
  emaAlpha: 0.4,
  warmDrift: 0.32,
  hotDrift: 0.42,
  lowResonance: 0.58,
  coolSteps: 3,
  calmBoost: 0.08,
};

export class Stabilizer extends BaseStage {
  readonly name = 'stabilizer' as const;

  private readonly config: StabilizerConfig;
  private state: RegulationState = RegulationState.Normal;
  private stepsInState = 0;
  private emaDrift = 0;
  private emaResonance = 0;
  private initialized = false;

  constructor(logger: Logger, config: Partial<StabilizerConfig> = {}) {
    super(logger, 'stabilizer');
    const merged = { ...DEFAULT_STABILIZER_CONFIG, ...config };
    this.config = {
      emaAlpha: clamp01(merged.emaAlpha),
      warmDrift: clamp01(merged.warmDrift),
      hotDrift: clamp01(merged.hotDrift),
      lowResonance: clamp01(merged.lowResonance),
      coolSteps: Math.max(1, Math.floor(merged.coolSteps)),
      calmBoost: clamp(merged.calmBoost, 0, 0.2),
    };
  }

  /**
   * Feed one turn's drift and resonance and advance the state machine.
   */
  push(drift: number, resonance: number): RegulationState {
    const d = clamp01(drift);
    const r = clamp01(resonance);

    if (!this.initialized) {
      this.emaDrift = d;
      this.emaResonance = r;
      this.initialized = true;
    } else {
      const alpha = this.config.emaAlpha;
      this.emaDrift = clamp01(alpha * d + (1 - alpha) * this.emaDrift);
      this.emaResonance = clamp01(alpha * r + (1 - alpha) * this.emaResonance);
    }

    const next = this.nextState();

    if (next !== this.state) {
      this.logger.debug(
        {
          from: this.state,
          to: next,
          emaDrift: this.emaDrift.toFixed(3),
          emaResonance: this.emaResonance.toFixed(3),
        },
        'Regulation state changed'
      );
      this.state = next;
      this.stepsInState = 0;
    } else {
      this.stepsInState = Math.min(this.stepsInState + 1, this.config.coolSteps * 2);
    }

    return this.state;
  }

  /**
   * Nudges scaled to the current state: none in Normal, largest in Overheat.
   */
  advice(): StabilizerAdvice {
    switch (this.state) {
      case RegulationState.Normal:
        return { paceDelta: 0, pauseDeltaMs: 0, articulationHint: 0 };
      case RegulationState.Warming:
        return { paceDelta: -0.03, pauseDeltaMs: 10, articulationHint: 0.02 };
      case RegulationState.Overheat:
        return {
          paceDelta: -0.07 - this.config.calmBoost,
          pauseDeltaMs: 30 + Math.round(this.config.calmBoost * 100),
          articulationHint: 0.05,
        };
      case RegulationState.Cooldown:
        return { paceDelta: -0.04, pauseDeltaMs: 20, articulationHint: 0.03 };
    }
  }

  getState(): StabilizerState {
    return {
      state: this.state,
      emaDrift: this.emaDrift,
      emaResonance: this.emaResonance,
      stepsInState: this.stepsInState,
    };
  }

  getConfig(): Readonly<StabilizerConfig> {
    return this.config;
  }

  restart(): void {
    this.state = RegulationState.Normal;
    this.stepsInState = 0;
    this.emaDrift = 0;
    this.emaResonance = 0;
    this.initialized = false;
  }

  protected processImpl(context: TurnContext): StageResult {
    const state = this.push(context.signal.drift, context.signal.resonance);
    const advice = this.advice();
    const snapshot: StabilizerSnapshot = { ...this.getState(), advice };

    context.regulationState = state;
    context.stabilizer = snapshot;

    return this.result(formatStabilizerStatus(snapshot), {
      paceDelta: advice.paceDelta,
      pauseDeltaMs: advice.pauseDeltaMs,
      articulationDelta: advice.articulationHint,
    });
  }

  private isCalm(): boolean {
    return this.emaDrift < this.config.warmDrift && this.emaResonance > this.config.lowResonance;
  }

  private nextState(): RegulationState {
    // Overheat always latches into Cooldown, even if the EMAs already look calm
    if (this.state !== RegulationState.Overheat && this.isCalm()) {
      return RegulationState.Normal;
    }

    switch (this.state) {
      case RegulationState.Normal:
        return this.emaDrift >= this.config.warmDrift
          ? RegulationState.Warming
          : RegulationState.Normal;
      case RegulationState.Warming:
        if (this.emaDrift >= this.config.hotDrift && this.emaResonance <= this.config.lowResonance) {
          return RegulationState.Overheat;
        }
        // Drift alone decides the way back, whatever resonance does
        return this.emaDrift < this.config.warmDrift
          ? RegulationState.Normal
          : RegulationState.Warming;
      case RegulationState.Overheat:
        return RegulationState.Cooldown;
      case RegulationState.Cooldown:
        return this.stepsInState + 1 >= this.config.coolSteps
          ? RegulationState.Normal
          : RegulationState.Cooldown;
    }
  }
}

export function formatStabilizerStatus(state: StabilizerState): string {
  return `[stabilizer] state=${state.state} ema_drift=${state.emaDrift.toFixed(2)} ema_res=${state.emaResonance.toFixed(2)}`;
}

export function createStabilizer(
  logger: Logger,
  config?: Partial<StabilizerConfig>
): Stabilizer {
  return new Stabilizer(logger, config);
}
