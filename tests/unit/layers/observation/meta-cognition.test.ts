/**
 * Tests for MetaCognition self-observation.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  MetaCognition,
  createInitialMetaCognitionState,
} from '../../../../src/layers/observation/meta-cognition.js';
import { RegulationState } from '../../../../src/types/index.js';
import { createContext, createMockLogger, createSignal } from '../../../helpers/factories.js';

describe('MetaCognition', () => {
  let meta: MetaCognition;

  beforeEach(() => {
    meta = new MetaCognition(createMockLogger());
  });

  it('starts from a neutral self-model', () => {
    expect(meta.getState()).toEqual(createInitialMetaCognitionState());
    expect(meta.getState()).toEqual({
      selfDrift: 0,
      selfResonance: 1,
      confidence: 0.5,
      clarity: 0.5,
      doubt: 0.5,
      observationCount: 0,
    });
  });

  it('expresses doubt about a chaotic measurement', () => {
    const state = meta.observe(0.9, 0.2, RegulationState.Normal, 0);

    expect(state.confidence).toBeCloseTo(0.02, 10);
    expect(state.doubt).toBeCloseTo(0.98, 10);
    expect(meta.shouldExpressDoubt()).toBe(true);
    expect(meta.selfAssess()).toBe('Uncertain');
  });

  it('becomes clear and stable after steady calm observations', () => {
    for (let i = 0; i < 5; i++) {
      meta.observe(0.15, 0.85, RegulationState.Normal, 0);
    }

    const state = meta.getState();
    expect(state.observationCount).toBe(5);
    expect(state.confidence).toBeCloseTo(0.7225, 10);
    expect(state.clarity).toBeCloseTo(0.9725, 10);
    expect(state.doubt).toBeCloseTo(0.2775, 10);
    expect(meta.isClearAndStable()).toBe(true);
    expect(meta.shouldExpressDoubt()).toBe(false);
    expect(meta.selfAssess()).toBe('Clear & Stable');
  });

  it('caps the familiarity bonus', () => {
    for (let i = 0; i < 10; i++) {
      meta.observe(0.5, 1, undefined, 0);
    }
    expect(meta.getState().clarity).toBeCloseTo(0.8, 10);
  });

  it('keeps a doubt floor even at full confidence', () => {
    const state = meta.observe(0, 1, undefined, 0);
    expect(state.confidence).toBe(1);
    expect(state.doubt).toBe(0.1);
  });

  it('reads self-drift from the size of the sync correction', () => {
    const state = meta.observe(0.3, 0.6, undefined, 0.12);

    expect(state.selfDrift).toBeCloseTo(0.6, 10);
    expect(meta.selfAssess()).toBe('Self-Adjusting');
  });

  it('is merely observing otherwise', () => {
    meta.observe(0.3, 0.6, undefined, 0);
    expect(meta.selfAssess()).toBe('Observing');
  });

  it('offsets self-resonance by the regulation state', () => {
    const offsets: [RegulationState | undefined, number][] = [
      [RegulationState.Normal, 0.6],
      [RegulationState.Warming, 0.5],
      [RegulationState.Overheat, 0.3],
      [RegulationState.Cooldown, 0.4],
      [undefined, 0.5],
    ];

    for (const [state, expected] of offsets) {
      expect(meta.observe(0.2, 0.5, state, 0).selfResonance).toBeCloseTo(expected, 10);
    }
  });

  it('clamps adversarial measurements', () => {
    const state = meta.observe(2.0, -1.0, RegulationState.Overheat, 10);

    expect(state.confidence).toBe(0);
    expect(state.doubt).toBe(1);
    expect(state.selfDrift).toBe(1);
    expect(state.selfResonance).toBe(0);
  });

  describe('as a pipeline stage', () => {
    it('observes the turn with the sync correction and publishes a snapshot', () => {
      const context = createContext(createSignal({ drift: 0.3, resonance: 0.6 }));
      context.sync = { paceDelta: -0.02, pauseDeltaMs: 10, resonanceBoost: 0, driftReduction: 0 };

      const result = meta.process(context);

      expect(context.awareness?.assessment).toBe('Self-Adjusting');
      expect(context.awareness?.selfDrift).toBeCloseTo(0.6, 10);
      expect(result.status).toBe(
        '[meta] self_state=Self-Adjusting conf=0.42 clarity=0.47 doubt=0.58'
      );
      expect(result.adjustment).toBeUndefined();
    });

    it('treats a missing sync stage as no correction', () => {
      const context = createContext(createSignal({ drift: 0.3, resonance: 0.6 }));
      meta.process(context);
      expect(context.awareness?.selfDrift).toBe(0);
    });

    it('logs when the system doubts its measurements', () => {
      const logger = createMockLogger();
      const doubtful = new MetaCognition(logger);

      doubtful.process(createContext(createSignal({ drift: 0.9, resonance: 0.2 })));

      expect(logger.messages('info')).toContain('System is uncertain about measurements');
    });

    it('restart() clears observations and the smoothed metrics', () => {
      meta.observe(0.9, 0.2, undefined, 1);
      meta.restart();

      expect(meta.getState()).toEqual(createInitialMetaCognitionState());
      expect(meta.snapshot().emaSelfDrift).toBe(0);
      expect(meta.snapshot().emaConfidence).toBe(0.5);
    });
  });
});
