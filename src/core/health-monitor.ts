/**
 * Session Health Monitor
 *
 * Counts turns whose delivered drift or resonance crossed the configured
 * baselines and keeps the worst values seen. A strict run fails when any
 * breach was recorded.
 */

import type { Logger } from '../types/index.js';

export interface HealthBaselines {
  drift: number;
  resonance: number;
}

export interface HealthStats {
  driftBreaches: number;
  resonanceBreaches: number;
  total: number;
  maxDrift: number;
  minResonance: number;
}

/** Process exit code of a strict run with breaches */
export const STRICT_EXIT_CODE = 2;

export class HealthMonitor {
  private readonly baselines: HealthBaselines;
  private readonly logger: Logger;
  private stats: HealthStats = createEmptyStats();

  constructor(logger: Logger, baselines: HealthBaselines) {
    this.logger = logger.child({ component: 'health-monitor' });
    this.baselines = { ...baselines };
  }

  /**
   * Record one turn's delivered drift and resonance.
   */
  update(drift: number, resonance: number): void {
    const stats = this.stats;
    stats.total++;

    const driftBreach = drift > this.baselines.drift;
    const resonanceBreach = resonance < this.baselines.resonance;
    if (driftBreach) stats.driftBreaches++;
    if (resonanceBreach) stats.resonanceBreaches++;

    if (stats.total === 1) {
      stats.maxDrift = drift;
      stats.minResonance = resonance;
    } else {
      stats.maxDrift = Math.max(stats.maxDrift, drift);
      stats.minResonance = Math.min(stats.minResonance, resonance);
    }

    if (driftBreach || resonanceBreach) {
      this.logger.debug(
        { drift: drift.toFixed(3), resonance: resonance.toFixed(3), driftBreach, resonanceBreach },
        'Baseline breached'
      );
    }
  }

  isHealthy(): boolean {
    return this.stats.driftBreaches === 0 && this.stats.resonanceBreaches === 0;
  }

  getStats(): HealthStats {
    return { ...this.stats };
  }

  getBaselines(): HealthBaselines {
    return { ...this.baselines };
  }

  /**
   * Exit code for the run: STRICT_EXIT_CODE when strict and unhealthy.
   */
  exitCode(strict: boolean): number {
    return strict && !this.isHealthy() ? STRICT_EXIT_CODE : 0;
  }

  summaryLines(): string[] {
    return formatHealthSummary(this.stats, this.baselines);
  }

  reset(): void {
    this.stats = createEmptyStats();
  }
}

function createEmptyStats(): HealthStats {
  return {
    driftBreaches: 0,
    resonanceBreaches: 0,
    total: 0,
    maxDrift: 0,
    minResonance: 0,
  };
}

export function formatHealthSummary(stats: HealthStats, baselines: HealthBaselines): string[] {
  const ok = stats.driftBreaches === 0 && stats.resonanceBreaches === 0;
  return [
    `[health] baseline_drift>${baselines.drift.toFixed(2)}, baseline_res<${baselines.resonance.toFixed(2)}`,
    `[health] breaches: drift=${String(stats.driftBreaches)}, res=${String(stats.resonanceBreaches)}, total=${String(stats.total)}`,
    `[health] worst: drift_max=${stats.maxDrift.toFixed(2)}, res_min=${stats.minResonance.toFixed(2)}`,
    `[health] status: ${ok ? 'OK ✅' : 'ATTENTION ⚠️'}`,
  ];
}
