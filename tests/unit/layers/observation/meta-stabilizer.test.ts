/**
 * Tests for the MetaStabilizer EMAs.
 */

import { describe, it, expect } from 'vitest';
import { MetaStabilizer } from '../../../../src/layers/observation/meta-stabilizer.js';

describe('MetaStabilizer', () => {
  it('starts with no self-drift and middling confidence', () => {
    const stabilizer = new MetaStabilizer();

    expect(stabilizer.getStableMetrics()).toEqual({ emaSelfDrift: 0, emaConfidence: 0.5 });
    expect(stabilizer.needsMoreAwareness()).toBe(false);
  });

  it('smooths self-drift and confidence with alpha', () => {
    const stabilizer = new MetaStabilizer(0.3);
    stabilizer.update({ selfDrift: 1, confidence: 0 });

    const metrics = stabilizer.getStableMetrics();
    expect(metrics.emaSelfDrift).toBeCloseTo(0.3, 10);
    expect(metrics.emaConfidence).toBeCloseTo(0.35, 10);
    expect(stabilizer.needsMoreAwareness()).toBe(true);
  });

  it('needs more awareness when self-drift trends high', () => {
    const stabilizer = new MetaStabilizer(0.5);
    stabilizer.update({ selfDrift: 1, confidence: 1 });

    expect(stabilizer.getStableMetrics().emaSelfDrift).toBe(0.5);
    expect(stabilizer.needsMoreAwareness()).toBe(true);
  });

  it('reset() restores the starting values', () => {
    const stabilizer = new MetaStabilizer();
    stabilizer.update({ selfDrift: 1, confidence: 0 });
    stabilizer.reset();

    expect(stabilizer.getStableMetrics()).toEqual({ emaSelfDrift: 0, emaConfidence: 0.5 });
  });
});
