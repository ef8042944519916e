/**
 * Compassion Detector
 *
 * Estimates user distress from independent, additive conversational signals
 * and turns it into a graduated kindness response:
 *
 * - chaos: high drift with low resonance
 * - overload: the stabilizer is in Overheat
 * - anxious tempo: energetic delivery above 180 wpm
 * - stuck: the user keeps returning to the same theme (streak tracked)
 * - extended streak: more than two stuck turns in a row
 *
 * Adjustments scale linearly with the compassion level and are only applied
 * once compassion activates (level > 0.5).
 */

import type {
  CompassionAdjustments,
  CompassionSnapshot,
  CompassionState,
  Logger,
  StageResult,
  SufferingType,
  TurnContext,
  TurnSignal,
} from '../../types/index.js';
import { RegulationState, clamp01 } from '../../types/index.js';
import { BaseStage } from '../base-stage.js';

/** Suffering above this counts as an episode */
export const SUFFERING_EPISODE_THRESHOLD = 0.2;

const ACTIVATION_THRESHOLD = 0.5;
const ANXIOUS_TEMPO_WPM = 180;

export function createInitialCompassionState(): CompassionState {
  return {
    userSuffering: 0,
    sufferingType: 'None',
    responseKindness: 0.5,
    healingIntent: 0.3,
    compassionLevel: 0,
    sufferingCount: 0,
    sufferingStreak: 0,
  };
}

export function classifySuffering(suffering: number): SufferingType {
  if (suffering < 0.2) return 'None';
  if (suffering < 0.4) return 'Mild';
  if (suffering < 0.7) return 'Moderate';
  return 'Severe';
}

export class CompassionDetector extends BaseStage {
  readonly name = 'compassion' as const;

  private state: CompassionState = createInitialCompassionState();
  private inEpisode = false;

  constructor(logger: Logger) {
    super(logger, 'compassion');
  }

  /**
   * Score the turn's suffering. Resets the streak whenever the theme is not repeated.
   */
  detectSuffering(
    signal: Pick<TurnSignal, 'drift' | 'resonance' | 'tone' | 'tempo'>,
    regulationState: RegulationState | undefined,
    repeatedTheme: boolean
  ): CompassionState {
    const drift = clamp01(signal.drift);
    const resonance = clamp01(signal.resonance);
    let score = 0;

    if (drift > 0.5 && resonance < 0.6) {
      score += (drift - 0.5) * 2.0;
      score += (0.6 - resonance) * 1.5;
    }

    if (regulationState === RegulationState.Overheat) {
      score += 0.3;
    }

    if (signal.tone === 'Energetic' && signal.tempo > ANXIOUS_TEMPO_WPM) {
      score += 0.2;
    }

    let streak = this.state.sufferingStreak;
    if (repeatedTheme) {
      score += 0.25;
      streak++;
    } else {
      streak = 0;
    }

    if (streak > 2) {
      score += 0.3;
    }

    const suffering = clamp01(score);
    const isEpisode = suffering > SUFFERING_EPISODE_THRESHOLD;

    this.state = {
      ...this.state,
      userSuffering: suffering,
      sufferingType: classifySuffering(suffering),
      healingIntent: clamp01(0.3 + suffering * 0.7),
      sufferingStreak: streak,
      sufferingCount:
        isEpisode && !this.inEpisode
          ? this.state.sufferingCount + 1
          : this.state.sufferingCount,
    };
    this.inEpisode = isEpisode;

    return this.getState();
  }

  /**
   * Kindness of the actions actually taken this turn.
   */
  calculateKindness(
    wasRephrased: boolean,
    paceDelta: number,
    pauseDeltaMs: number,
    resonanceBoost: number
  ): number {
    let kindness = 0.5;

    if (wasRephrased) {
      kindness += 0.2;
    }
    // Slowing down is gentle
    if (paceDelta < 0) {
      kindness += Math.min(Math.abs(paceDelta) * 0.5, 0.1);
    }
    // Longer pauses give space
    if (pauseDeltaMs > 0) {
      kindness += Math.min(pauseDeltaMs / 100, 0.2);
    }
    if (resonanceBoost > 0) {
      kindness += Math.min(resonanceBoost * 2, 0.2);
    }

    this.state.responseKindness = clamp01(kindness);
    return this.state.responseKindness;
  }

  updateCompassionLevel(): number {
    const { userSuffering, healingIntent, responseKindness } = this.state;
    this.state.compassionLevel = clamp01(
      userSuffering * 0.5 + healingIntent * 0.3 + responseKindness * 0.2
    );
    return this.state.compassionLevel;
  }

  shouldActivateCompassion(): boolean {
    return this.state.compassionLevel > ACTIVATION_THRESHOLD;
  }

  shouldOfferSupport(): boolean {
    return this.state.sufferingType === 'Moderate' || this.state.sufferingType === 'Severe';
  }

  adjustments(): CompassionAdjustments {
    return compassionAdjustments(this.state.compassionLevel);
  }

  statusMessage(): string {
    return formatCompassionStatus(this.state);
  }

  getState(): CompassionState {
    return { ...this.state };
  }

  snapshot(): CompassionSnapshot {
    return {
      ...this.state,
      activated: this.shouldActivateCompassion(),
      offerSupport: this.shouldOfferSupport(),
    };
  }

  restart(): void {
    this.state = createInitialCompassionState();
    this.inEpisode = false;
  }

  protected processImpl(context: TurnContext): StageResult {
    this.detectSuffering(context.signal, context.regulationState, context.repeatedTheme);

    const sync = context.sync;
    this.calculateKindness(
      context.guard?.kind === 'rephrased',
      sync?.paceDelta ?? 0,
      sync?.pauseDeltaMs ?? 0,
      sync?.resonanceBoost ?? 0
    );
    this.updateCompassionLevel();

    const snapshot = this.snapshot();
    context.compassion = snapshot;

    if (snapshot.offerSupport) {
      this.logger.info(
        { turn: context.turn, suffering: snapshot.userSuffering.toFixed(2) },
        'Offering support to user'
      );
    }

    if (!snapshot.activated) {
      return this.result(this.statusMessage());
    }

    const adj = this.adjustments();
    return this.result(this.statusMessage(), {
      resonanceDelta: adj.resonanceBoost,
      paceDelta: adj.paceAdjustment,
      pauseDeltaMs: adj.pauseAdjustmentMs,
      driftDelta: -adj.driftReduction,
    });
  }
}

export function compassionAdjustments(level: number): CompassionAdjustments {
  const l = clamp01(level);
  return {
    resonanceBoost: l * 0.1,
    paceAdjustment: -l * 0.05,
    pauseAdjustmentMs: Math.trunc(l * 30),
    driftReduction: l * 0.08,
  };
}

export function formatCompassionStatus(state: CompassionState): string {
  const suffering = state.userSuffering.toFixed(2);
  switch (state.sufferingType) {
    case 'None':
      return `Compassion: Observing (suffering=${suffering})`;
    case 'Mild':
      return `Compassion: Gentle Care (suffering=${suffering}, healing=${state.healingIntent.toFixed(2)})`;
    case 'Moderate':
      return `Compassion: Active Support (suffering=${suffering}, kindness=${state.responseKindness.toFixed(2)})`;
    case 'Severe':
      return `Compassion: Deep Care (suffering=${suffering}, streak=${String(state.sufferingStreak)})`;
  }
}

export function createCompassionDetector(logger: Logger): CompassionDetector {
  return new CompassionDetector(logger);
}
