/**
 * Meta-Cognition
 *
 * The loop observing itself. Once per turn it looks at how hard neural sync
 * had to correct, which state the stabilizer is in, and how clean the
 * measured signal was, and derives confidence, clarity and doubt.
 *
 * Doubt has a floor of 0.1: the system never becomes fully certain.
 */

import type {
  AwarenessSnapshot,
  Logger,
  MetaCognitionState,
  SelfAssessment,
  StageResult,
  TurnContext,
} from '../../types/index.js';
import { RegulationState, clamp01 } from '../../types/index.js';
import { BaseStage } from '../base-stage.js';
import { correctionMagnitude } from '../regulation/neural-sync.js';
import { MetaStabilizer, DEFAULT_META_ALPHA } from './meta-stabilizer.js';

export interface MetaCognitionConfig {
  /** Smoothing rate of the meta-stabilizer */
  metaAlpha: number;
}

export const DEFAULT_META_COGNITION_CONFIG: MetaCognitionConfig = {
  metaAlpha: DEFAULT_META_ALPHA,
};

const SELF_DRIFT_GAIN = 5;
const FAMILIARITY_STEP = 0.05;
const FAMILIARITY_CAP = 0.3;
const DOUBT_FLOOR = 0.1;

/** Self-resonance offset per regulation state */
const STATE_RESONANCE_OFFSET: Record<RegulationState, number> = {
  [RegulationState.Normal]: 0.1,
  [RegulationState.Warming]: 0,
  [RegulationState.Overheat]: -0.2,
  [RegulationState.Cooldown]: -0.1,
};

export function createInitialMetaCognitionState(): MetaCognitionState {
  return {
    selfDrift: 0,
    selfResonance: 1,
    confidence: 0.5,
    clarity: 0.5,
    doubt: 0.5,
    observationCount: 0,
  };
}

export class MetaCognition extends BaseStage {
  readonly name = 'awareness' as const;

  private state: MetaCognitionState = createInitialMetaCognitionState();
  private readonly stabilizer: MetaStabilizer;

  constructor(logger: Logger, config: Partial<MetaCognitionConfig> = {}) {
    super(logger, 'awareness');
    const { metaAlpha } = { ...DEFAULT_META_COGNITION_CONFIG, ...config };
    this.stabilizer = new MetaStabilizer(metaAlpha);
  }

  /**
   * Observe one turn.
   *
   * @param syncCorrection Total sync correction this turn (see correctionMagnitude)
   * @param regulationState Undefined when no stabilizer runs (no offset applied)
   */
  observe(
    measuredDrift: number,
    measuredResonance: number,
    regulationState: RegulationState | undefined,
    syncCorrection: number
  ): MetaCognitionState {
    const drift = clamp01(measuredDrift);
    const resonance = clamp01(measuredResonance);
    const observationCount = this.state.observationCount + 1;

    const offset = regulationState ? STATE_RESONANCE_OFFSET[regulationState] : 0;
    const confidence = clamp01((1 - drift) * resonance);
    const familiarity = Math.min(observationCount * FAMILIARITY_STEP, FAMILIARITY_CAP);

    this.state = {
      selfDrift: clamp01(Math.abs(syncCorrection) * SELF_DRIFT_GAIN),
      selfResonance: clamp01(resonance + offset),
      confidence,
      clarity: clamp01(confidence + familiarity),
      doubt: Math.max(clamp01(1 - confidence), DOUBT_FLOOR),
      observationCount,
    };

    this.stabilizer.update(this.state);

    return this.getState();
  }

  shouldExpressDoubt(): boolean {
    return this.state.doubt > 0.6 && this.state.confidence < 0.4;
  }

  isClearAndStable(): boolean {
    return this.state.clarity > 0.7 && this.state.selfDrift < 0.3;
  }

  needsMoreAwareness(): boolean {
    return this.stabilizer.needsMoreAwareness();
  }

  selfAssess(): SelfAssessment {
    if (this.isClearAndStable()) return 'Clear & Stable';
    if (this.shouldExpressDoubt()) return 'Uncertain';
    if (this.state.selfDrift > 0.5) return 'Self-Adjusting';
    return 'Observing';
  }

  getState(): MetaCognitionState {
    return { ...this.state };
  }

  snapshot(): AwarenessSnapshot {
    const { emaSelfDrift, emaConfidence } = this.stabilizer.getStableMetrics();
    return {
      ...this.state,
      assessment: this.selfAssess(),
      shouldExpressDoubt: this.shouldExpressDoubt(),
      isClearAndStable: this.isClearAndStable(),
      emaSelfDrift,
      emaConfidence,
      needsMoreAwareness: this.stabilizer.needsMoreAwareness(),
    };
  }

  restart(): void {
    this.state = createInitialMetaCognitionState();
    this.stabilizer.reset();
  }

  protected processImpl(context: TurnContext): StageResult {
    this.observe(
      context.signal.drift,
      context.signal.resonance,
      context.regulationState,
      context.sync ? correctionMagnitude(context.sync) : 0
    );

    const snapshot = this.snapshot();
    context.awareness = snapshot;

    if (snapshot.shouldExpressDoubt) {
      this.logger.info(
        { turn: context.turn, confidence: snapshot.confidence.toFixed(2) },
        'System is uncertain about measurements'
      );
    }

    return this.result(`[meta] ${formatSelfAssessment(snapshot)}`);
  }
}

export function formatSelfAssessment(snapshot: AwarenessSnapshot): string {
  return `self_state=${snapshot.assessment} conf=${snapshot.confidence.toFixed(2)} clarity=${snapshot.clarity.toFixed(2)} doubt=${snapshot.doubt.toFixed(2)}`;
}

export function createMetaCognition(
  logger: Logger,
  config?: Partial<MetaCognitionConfig>
): MetaCognition {
  return new MetaCognition(logger, config);
}
