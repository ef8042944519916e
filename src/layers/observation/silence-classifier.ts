/**
 * Silence Classifier
 *
 * Types the pause that follows a turn and decides whether the system should
 * break it. Classification is a first-match rule list over the pre-silence
 * turn's signal and the current suffering level:
 *
 *   Peace → Contemplation (short) → Fear → Disconnect → Uncertainty → Contemplation
 *
 * Pauses shorter than minSilenceMs are not silences at all. Session counters
 * (count, total time, longest silence) survive resetting; only the open
 * period is cleared.
 */

import type {
  Logger,
  SilenceState,
  SilenceType,
  StageResult,
  ToneTag,
  TurnContext,
} from '../../types/index.js';
import { RegulationState, clamp01 } from '../../types/index.js';
import { BaseStage } from '../base-stage.js';

export interface SilenceClassifierConfig {
  /** Shortest pause treated as silence, in ms */
  minSilenceMs: number;
}

export const DEFAULT_SILENCE_CONFIG: SilenceClassifierConfig = {
  minSilenceMs: 1500,
};

/**
 * The turn right before the silence, plus what the other layers know.
 */
export interface SilenceContext {
  drift: number;
  resonance: number;
  tone: ToneTag;
  /** Current suffering level (0 when compassion is disabled) */
  suffering: number;
  regulationState?: RegulationState | undefined;
}

const GENERATIVE_QUALITY = 0.6;

export function createInitialSilenceState(): SilenceState {
  return {
    currentSilenceMs: 0,
    silenceType: 'None',
    silenceQuality: 0,
    isGenerative: false,
    shouldInterrupt: false,
    silenceCount: 0,
    totalSilenceMs: 0,
    maxSilenceMs: 0,
    avgSilenceQuality: 0,
  };
}

export function classifySilence(durationMs: number, ctx: SilenceContext): SilenceType {
  const { drift, resonance, tone, suffering, regulationState } = ctx;

  if (drift < 0.3 && resonance > 0.7 && tone === 'Calm') {
    return 'Peace';
  }
  if (
    durationMs < 5000 &&
    drift < 0.5 &&
    resonance > 0.5 &&
    (tone === 'Neutral' || tone === 'Calm')
  ) {
    return 'Contemplation';
  }
  if (suffering > 0.6 && durationMs > 3000) {
    return 'Fear';
  }
  if (drift > 0.6 && resonance < 0.4) {
    return 'Disconnect';
  }
  if (regulationState === RegulationState.Overheat || regulationState === RegulationState.Warming) {
    return 'Uncertainty';
  }
  return 'Contemplation';
}

export function silenceQuality(ctx: Pick<SilenceContext, 'drift' | 'resonance' | 'suffering'>): number {
  return clamp01(
    0.5 + 0.4 * (ctx.resonance - 0.5) + 0.3 * (0.5 - ctx.drift) + 0.3 * (1 - ctx.suffering)
  );
}

/**
 * Type-specific interruption policy.
 */
export function shouldInterruptSilence(
  type: SilenceType,
  durationMs: number,
  quality: number
): boolean {
  switch (type) {
    case 'None':
      return false;
    case 'Peace':
    case 'Contemplation':
      return durationMs > (quality > GENERATIVE_QUALITY ? 12_000 : 6_000);
    case 'Fear':
    case 'Disconnect':
      return durationMs > 4_000;
    case 'Uncertainty':
      return durationMs > 5_000;
  }
}

export class SilenceClassifier extends BaseStage {
  readonly name = 'silence' as const;

  private readonly config: SilenceClassifierConfig;
  private state: SilenceState = createInitialSilenceState();
  private episodeOpen = false;
  private closedEpisodes = 0;

  constructor(logger: Logger, config: Partial<SilenceClassifierConfig> = {}) {
    super(logger, 'silence');
    this.config = { ...DEFAULT_SILENCE_CONFIG, ...config };
  }

  /**
   * Classify the elapsed silence. May be called repeatedly as the same
   * silence grows; it counts as one episode until reset(). A pause below
   * the minimum does not touch an open episode.
   */
  detect(durationMs: number, ctx: SilenceContext): SilenceState {
    const duration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
    const normalized: SilenceContext = {
      drift: clamp01(ctx.drift),
      resonance: clamp01(ctx.resonance),
      tone: ctx.tone,
      suffering: clamp01(ctx.suffering),
      regulationState: ctx.regulationState,
    };

    if (duration < this.config.minSilenceMs) {
      // A blip inside an open silence leaves the episode as it was
      if (this.episodeOpen) {
        return this.getState();
      }
      this.state = {
        ...this.state,
        currentSilenceMs: duration,
        silenceType: 'None',
        silenceQuality: 0,
        isGenerative: false,
        shouldInterrupt: false,
      };
      return this.getState();
    }

    const previousDuration = this.episodeOpen ? this.state.currentSilenceMs : 0;
    if (!this.episodeOpen) {
      this.episodeOpen = true;
      this.state.silenceCount++;
    }

    const type = classifySilence(duration, normalized);
    const quality = silenceQuality(normalized);

    this.state = {
      ...this.state,
      currentSilenceMs: Math.max(previousDuration, duration),
      silenceType: type,
      silenceQuality: quality,
      isGenerative: (type === 'Peace' || type === 'Contemplation') && quality > GENERATIVE_QUALITY,
      shouldInterrupt: shouldInterruptSilence(type, duration, quality),
      totalSilenceMs: this.state.totalSilenceMs + Math.max(0, duration - previousDuration),
      maxSilenceMs: Math.max(this.state.maxSilenceMs, duration),
    };

    return this.getState();
  }

  /**
   * Close the open period on new user input. Folds its quality into the
   * session average and clears the current period; session counters stay.
   */
  reset(): void {
    if (this.episodeOpen) {
      this.closedEpisodes++;
      this.state.avgSilenceQuality +=
        (this.state.silenceQuality - this.state.avgSilenceQuality) / this.closedEpisodes;
      this.episodeOpen = false;
    }

    this.state = {
      ...this.state,
      currentSilenceMs: 0,
      silenceType: 'None',
      silenceQuality: 0,
      isGenerative: false,
      shouldInterrupt: false,
    };
  }

  /**
   * Clear everything, session counters included.
   */
  restart(): void {
    this.state = createInitialSilenceState();
    this.episodeOpen = false;
    this.closedEpisodes = 0;
  }

  getState(): SilenceState {
    return { ...this.state };
  }

  protected processImpl(context: TurnContext): StageResult {
    if (context.newUserInput) {
      this.reset();
    }

    const state = this.detect(context.signal.pauseMs, {
      drift: context.signal.drift,
      resonance: context.signal.resonance,
      tone: context.signal.tone,
      suffering: context.compassion?.userSuffering ?? 0,
      regulationState: context.regulationState,
    });
    context.silence = state;

    if (state.shouldInterrupt) {
      this.logger.info(
        { turn: context.turn, type: state.silenceType, durationMs: state.currentSilenceMs },
        'Silence should be interrupted'
      );
    }

    return this.result(formatSilenceStatus(state));
  }
}

export function formatSilenceStatus(state: SilenceState): string {
  const seconds = (state.currentSilenceMs / 1000).toFixed(1);
  if (state.silenceType === 'None') {
    return `Silence: none (${seconds}s)`;
  }

  const flags = [state.isGenerative ? 'generative' : null, state.shouldInterrupt ? 'interrupt' : null]
    .filter((flag): flag is string => flag !== null)
    .join(', ');
  const suffix = flags ? `, ${flags}` : '';
  return `Silence: ${state.silenceType} (${seconds}s, quality=${state.silenceQuality.toFixed(2)}${suffix})`;
}

export function createSilenceClassifier(
  logger: Logger,
  config?: Partial<SilenceClassifierConfig>
): SilenceClassifier {
  return new SilenceClassifier(logger, config);
}
