import type { MetaCognitionState } from '../../types/index.js';
import { clamp01 } from '../../types/index.js';

export const DEFAULT_META_ALPHA = 0.3;

/**
 * Smooths the meta-cognition layer itself: EMAs of self-drift and confidence.
 */
export class MetaStabilizer {
  private emaSelfDrift = 0;
  private emaConfidence = 0.5;
  private readonly alpha: number;

  constructor(alpha: number = DEFAULT_META_ALPHA) {
    this.alpha = clamp01(alpha);
  }

  update(meta: Pick<MetaCognitionState, 'selfDrift' | 'confidence'>): void {
    this.emaSelfDrift = clamp01(
      this.alpha * meta.selfDrift + (1 - this.alpha) * this.emaSelfDrift
    );
    this.emaConfidence = clamp01(
      this.alpha * meta.confidence + (1 - this.alpha) * this.emaConfidence
    );
  }

  getStableMetrics(): { emaSelfDrift: number; emaConfidence: number } {
    return { emaSelfDrift: this.emaSelfDrift, emaConfidence: this.emaConfidence };
  }

  /**
   * Self-drift trending high or confidence trending low.
   */
  needsMoreAwareness(): boolean {
    return this.emaSelfDrift > 0.4 || this.emaConfidence < 0.5;
  }

  reset(): void {
    this.emaSelfDrift = 0;
    this.emaConfidence = 0.5;
  }
}
