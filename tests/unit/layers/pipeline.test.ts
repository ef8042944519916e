/**
 * Tests for the RegulationPipeline.
 */

import { describe, it, expect } from 'vitest';
import {
  ALL_STAGES_ENABLED,
  DEFAULT_DELIVERY_BASE,
  PACE_RANGE,
  PAUSE_RANGE_MS,
  applyAdjustment,
  createRegulationPipeline,
} from '../../../src/layers/pipeline.js';
import { RegulationState, createEmptyAdjustment } from '../../../src/types/index.js';
import type { StageName } from '../../../src/types/index.js';
import { createMockLogger, createSignal } from '../../helpers/factories.js';

function onlyStages(...names: StageName[]): Record<StageName, boolean> {
  return {
    stabilizer: names.includes('stabilizer'),
    sync: names.includes('sync'),
    guard: names.includes('guard'),
    awareness: names.includes('awareness'),
    compassion: names.includes('compassion'),
    silence: names.includes('silence'),
  };
}

describe('RegulationPipeline', () => {
  it('runs every enabled stage in a fixed order', () => {
    const pipeline = createRegulationPipeline(createMockLogger(), { enabled: ALL_STAGES_ENABLED });

    const result = pipeline.process({ signal: createSignal() });

    const order: StageName[] = ['stabilizer', 'sync', 'guard', 'awareness', 'compassion', 'silence'];
    expect(pipeline.getStageNames()).toEqual(order);
    expect(result.stagesExecuted).toEqual(order);
    expect(result.statuses.map((s) => s.stage)).toEqual(order);
  });

  it('leaves disabled stages out of the result', () => {
    const pipeline = createRegulationPipeline(createMockLogger(), {
      enabled: onlyStages('sync', 'silence'),
    });

    const result = pipeline.process({ signal: createSignal() });

    expect(result.stagesExecuted).toEqual(['sync', 'silence']);
    expect(result.regulationState).toBeUndefined();
    expect('stabilizer' in result).toBe(false);
    expect('compassion' in result).toBe(false);
    expect(result.sync).toBeDefined();
    expect(result.silence).toBeDefined();
    expect(pipeline.getStages().stabilizer).toBeUndefined();
  });

  it('passes the signal through untouched when every stage is disabled', () => {
    const pipeline = createRegulationPipeline(createMockLogger(), {
      enabled: onlyStages(),
    });

    const result = pipeline.process({ signal: createSignal({ drift: 0.4, resonance: 0.6 }) });

    expect(result.stagesExecuted).toEqual([]);
    expect(result.adjustment).toEqual(createEmptyAdjustment());
    expect(result.output).toEqual({
      pace: 1,
      pauseMs: 40,
      resonance: 0.6,
      drift: 0.4,
      articulation: 0.5,
    });
  });

  it('applies the stabilizer advice to the delivery base', () => {
    const pipeline = createRegulationPipeline(createMockLogger(), {
      enabled: onlyStages('stabilizer'),
    });

    const result = pipeline.process({ signal: createSignal({ drift: 0.5, resonance: 0.5 }) });

    expect(result.regulationState).toBe(RegulationState.Warming);
    expect(result.output.pace).toBeCloseTo(0.97, 10);
    expect(result.output.pauseMs).toBe(50);
    expect(result.output.articulation).toBeCloseTo(0.52, 10);
    expect(result.output.drift).toBe(0.5);
    expect(result.output.resonance).toBe(0.5);
  });

  it('merges deltas from several stages and lets later stages read earlier ones', () => {
    const pipeline = createRegulationPipeline(createMockLogger(), {
      enabled: onlyStages('stabilizer', 'compassion'),
    });

    const result = pipeline.process({ signal: createSignal({ drift: 0.9, resonance: 0.1 }) });

    // compassion saw the Warming state, scored severe suffering and activated
    expect(result.regulationState).toBe(RegulationState.Warming);
    expect(result.compassion?.sufferingType).toBe('Severe');
    expect(result.compassion?.activated).toBe(true);

    const level = result.compassion?.compassionLevel ?? 0;
    expect(level).toBeCloseTo(0.9, 10);
    expect(result.adjustment.paceDelta).toBeCloseTo(-0.03 - level * 0.05, 10);
    expect(result.adjustment.pauseDeltaMs).toBe(10 + Math.trunc(level * 30));
    expect(result.adjustment.articulationDelta).toBeCloseTo(0.02, 10);
    expect(result.adjustment.resonanceDelta).toBeCloseTo(0.09, 10);
    expect(result.adjustment.driftDelta).toBeCloseTo(-0.072, 10);

    expect(result.output.resonance).toBeCloseTo(0.19, 10);
    expect(result.output.drift).toBeCloseTo(0.828, 10);
    expect(result.output.pauseMs).toBe(50 + Math.trunc(level * 30));
  });

  it('numbers turns and restarts every stage', () => {
    const pipeline = createRegulationPipeline(createMockLogger(), { enabled: ALL_STAGES_ENABLED });

    pipeline.process({ signal: createSignal({ drift: 0.5, resonance: 0.5 }) });
    const second = pipeline.process({ signal: createSignal({ drift: 0.5, resonance: 0.5 }) });
    expect(second.turn).toBe(1);
    expect(second.regulationState).toBe(RegulationState.Overheat);

    pipeline.restart();
    expect(pipeline.getTurnCount()).toBe(0);

    const fresh = pipeline.process({ signal: createSignal() });
    expect(fresh.turn).toBe(0);
    expect(fresh.regulationState).toBe(RegulationState.Normal);
    expect(fresh.stabilizer?.emaDrift).toBe(0.3);
  });

  it('keeps every output inside its range under adversarial input', () => {
    const pipeline = createRegulationPipeline(createMockLogger(), { enabled: ALL_STAGES_ENABLED });
    const samples: [number, number][] = [
      [Number.NaN, Number.NaN],
      [5, -5],
      [1, 0],
      [0, 1],
      [1, 0],
      [Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY],
    ];

    for (let i = 0; i < 30; i++) {
      const [drift, resonance] = samples[i % samples.length] ?? [0, 0];
      const result = pipeline.process({
        signal: createSignal({ drift, resonance, tone: 'Energetic', tempo: 220, pauseMs: 9000 }),
        repeatedTheme: i % 2 === 0,
      });
      const { output, awareness, compassion, silence, stabilizer } = result;

      expect(output.pace).toBeGreaterThanOrEqual(PACE_RANGE.min);
      expect(output.pace).toBeLessThanOrEqual(PACE_RANGE.max);
      expect(output.pauseMs).toBeGreaterThanOrEqual(PAUSE_RANGE_MS.min);
      expect(output.pauseMs).toBeLessThanOrEqual(PAUSE_RANGE_MS.max);
      expect(Number.isInteger(output.pauseMs)).toBe(true);

      // a missing snapshot reads as NaN and fails the range checks
      const unitValues = [
        output.drift,
        output.resonance,
        output.articulation,
        awareness?.selfDrift,
        awareness?.selfResonance,
        awareness?.confidence,
        awareness?.clarity,
        awareness?.doubt,
        compassion?.userSuffering,
        compassion?.responseKindness,
        compassion?.healingIntent,
        compassion?.compassionLevel,
        silence?.silenceQuality,
        silence?.avgSilenceQuality,
        stabilizer?.emaDrift,
        stabilizer?.emaResonance,
      ].map((value) => value ?? Number.NaN);

      for (const value of unitValues) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
      }
      expect(awareness?.doubt).toBeGreaterThanOrEqual(0.1);
      expect(silence?.silenceCount).toBe(i + 1);
    }
  });
});

describe('applyAdjustment', () => {
  it('clamps every field at the upper bounds', () => {
    const output = applyAdjustment(
      createSignal({ drift: 0.9, resonance: 0.1 }),
      { pace: 1.25, pauseMs: 245, articulation: 0.95 },
      { paceDelta: 0.2, pauseDeltaMs: 20, resonanceDelta: -0.5, driftDelta: 0.5, articulationDelta: 0.1 }
    );

    expect(output).toEqual({ pace: 1.3, pauseMs: 250, resonance: 0, drift: 1, articulation: 1 });
  });

  it('clamps at the lower bounds and rounds the pause', () => {
    const low = applyAdjustment(
      createSignal(),
      { pace: 0.7, pauseMs: 20.4, articulation: 0.5 },
      { ...createEmptyAdjustment(), paceDelta: -0.5, pauseDeltaMs: -10 }
    );
    expect(low.pace).toBe(0.7);
    expect(low.pauseMs).toBe(20);

    const rounded = applyAdjustment(createSignal(), DEFAULT_DELIVERY_BASE, {
      ...createEmptyAdjustment(),
      pauseDeltaMs: 10.6,
    });
    expect(rounded.pauseMs).toBe(51);
  });
});
