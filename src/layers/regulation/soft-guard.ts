/**
 * Soft guard - light-touch heuristics on the sync-corrected signal.
 *
 * High drift alone earns a warning; high drift with low resonance gets the
 * reply rephrased into a calmer form. The rephrase flag feeds the
 * compassion detector's kindness term.
 */

import type { GuardAction, Logger, StageResult, TurnContext } from '../../types/index.js';
import { clamp01 } from '../../types/index.js';
import { BaseStage } from '../base-stage.js';

export interface SoftGuardConfig {
  /** Drift above this is considered high */
  driftLimit: number;
  /** Resonance below this is considered low */
  resonanceLimit: number;
}

export const DEFAULT_SOFT_GUARD_CONFIG: SoftGuardConfig = {
  driftLimit: 0.4,
  resonanceLimit: 0.6,
};

export function checkAndRephrase(
  text: string,
  drift: number,
  resonance: number,
  config: SoftGuardConfig = DEFAULT_SOFT_GUARD_CONFIG
): GuardAction {
  const highDrift = drift > config.driftLimit;
  const lowResonance = resonance < config.resonanceLimit;

  if (!highDrift) {
    return { kind: 'none' };
  }

  if (!lowResonance) {
    return {
      kind: 'warn',
      message: `[soft-guard] high drift ${drift.toFixed(2)} → adjusting tone`,
    };
  }

  const calmer = text.trim().replaceAll('!', '.').replaceAll('  ', ' ');
  return { kind: 'rephrased', text: `${calmer} [recentered]` };
}

export class SoftGuard extends BaseStage {
  readonly name = 'guard' as const;

  private readonly config: SoftGuardConfig;
  private warnings = 0;
  private rephrases = 0;

  constructor(logger: Logger, config: Partial<SoftGuardConfig> = {}) {
    super(logger, 'guard');
    this.config = { ...DEFAULT_SOFT_GUARD_CONFIG, ...config };
  }

  getCounts(): { warnings: number; rephrases: number } {
    return { warnings: this.warnings, rephrases: this.rephrases };
  }

  restart(): void {
    this.warnings = 0;
    this.rephrases = 0;
  }

  protected processImpl(context: TurnContext): StageResult {
    // Judge the signal as corrected so far this turn
    const drift = clamp01(context.signal.drift + context.adjustment.driftDelta);
    const resonance = clamp01(context.signal.resonance + context.adjustment.resonanceDelta);

    const action = checkAndRephrase(context.utterance, drift, resonance, this.config);
    context.guard = action;

    switch (action.kind) {
      case 'none':
        return this.result('[soft-guard] ok');
      case 'warn':
        this.warnings++;
        return this.result(action.message);
      case 'rephrased':
        this.rephrases++;
        this.logger.info({ turn: context.turn, text: action.text }, 'Reply rephrased');
        return this.result(`[soft-guard] rephrased: ${action.text}`);
    }
  }
}

export function createSoftGuard(logger: Logger, config?: Partial<SoftGuardConfig>): SoftGuard {
  return new SoftGuard(logger, config);
}
