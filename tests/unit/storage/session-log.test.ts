/**
 * Tests for the JSONL session log.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SessionLog, buildSessionLogEntry } from '../../../src/storage/session-log.js';
import type { SessionLogEntry } from '../../../src/storage/session-log.js';
import { ALL_STAGES_ENABLED, createRegulationPipeline } from '../../../src/layers/pipeline.js';
import type { StageName } from '../../../src/types/index.js';
import { createMockLogger, createSignal } from '../../helpers/factories.js';

const timestamp = new Date('2024-03-05T10:20:30.000Z');

function stabilizerOnly(): Record<StageName, boolean> {
  return { ...ALL_STAGES_ENABLED, sync: false, guard: false, awareness: false, compassion: false, silence: false };
}

describe('buildSessionLogEntry', () => {
  it('omits the fields of disabled stages', () => {
    const pipeline = createRegulationPipeline(createMockLogger(), { enabled: stabilizerOnly() });
    const result = pipeline.process({ signal: createSignal({ drift: 0.5, resonance: 0.5 }) });

    const entry = buildSessionLogEntry(result, {
      sessionId: 'test0001',
      device: 'headset',
      utterance: 'hi',
      timestamp,
    });

    expect(entry).toEqual({
      ts: '2024-03-05T10:20:30.000Z',
      sessionId: 'test0001',
      idx: 0,
      device: 'headset',
      utterance: 'hi',
      tone: 'Neutral',
      wpm: 150,
      drift: 0.5,
      resonance: 0.5,
      pace: 0.97,
      pauseMs: 50,
      articulation: 0.52,
      state: 'Warming',
      stabilizer: { emaDrift: 0.5, emaResonance: 0.5, stepsInState: 0 },
    });
  });

  it('adds the simulated latency when the runner provides it', () => {
    const pipeline = createRegulationPipeline(createMockLogger(), { enabled: stabilizerOnly() });
    const result = pipeline.process({ signal: createSignal() });

    const entry = buildSessionLogEntry(result, {
      sessionId: 'test0001',
      device: 'headset',
      utterance: 'hi',
      timestamp,
      latency: { asrMs: 60, ttsMs: 40, totalMs: 100 },
    });

    expect(entry.asrMs).toBe(60);
    expect(entry.ttsMs).toBe(40);
    expect(entry.totalMs).toBe(100);
  });

  it('carries every stage snapshot when all stages run', () => {
    const pipeline = createRegulationPipeline(createMockLogger(), { enabled: ALL_STAGES_ENABLED });
    const result = pipeline.process({ signal: createSignal({ pauseMs: 4000 }) });

    const entry = buildSessionLogEntry(result, {
      sessionId: 'test0001',
      device: 'phone',
      utterance: 'hi',
      timestamp,
    });

    expect(Object.keys(entry)).toEqual(
      expect.arrayContaining(['state', 'stabilizer', 'guard', 'sync', 'meta', 'compassion', 'silence'])
    );
    expect(entry.state).toBe('Normal');
    expect(entry.guard).toBe('none');
    expect(entry.stabilizer).toEqual({ emaDrift: 0.3, emaResonance: 0.7, stepsInState: 1 });
    expect(entry.sync).toEqual({
      paceDelta: expect.any(Number),
      pauseDeltaMs: expect.any(Number),
      resonanceBoost: expect.any(Number),
      driftReduction: expect.any(Number),
    });
    // confidence (1 - 0.3) * 0.7, clarity + one observation, self resonance + Normal offset
    expect(entry.meta).toEqual({
      selfDrift: expect.any(Number),
      selfResonance: 0.8,
      confidence: 0.49,
      clarity: 0.54,
      doubt: 0.51,
      observationCount: 1,
    });
    expect(entry.compassion).toEqual({
      suffering: 0,
      type: 'None',
      kindness: expect.any(Number),
      healing: 0.3,
      level: expect.any(Number),
      sufferingCount: 0,
      sufferingStreak: 0,
    });
    // fallback Contemplation: 0.5 + 0.4 * 0.2 + 0.3 * 0.2 + 0.3
    expect(entry.silence).toEqual({
      type: 'Contemplation',
      durationMs: 4000,
      quality: 0.94,
      generative: true,
      shouldInterrupt: false,
      silenceCount: 1,
      totalSilenceMs: 4000,
      maxSilenceMs: 4000,
      avgSilenceQuality: 0,
    });
  });

  it('carries the session counters of later turns', () => {
    const pipeline = createRegulationPipeline(createMockLogger(), { enabled: ALL_STAGES_ENABLED });
    pipeline.process({ signal: createSignal({ pauseMs: 2000 }) });
    const result = pipeline.process({ signal: createSignal({ pauseMs: 3000 }) });

    const entry = buildSessionLogEntry(result, {
      sessionId: 'test0001',
      device: 'phone',
      utterance: 'hi',
      timestamp,
    });

    expect(entry.meta?.observationCount).toBe(2);
    expect(entry.stabilizer?.stepsInState).toBe(2);
    expect(entry.silence?.silenceCount).toBe(2);
    expect(entry.silence?.totalSilenceMs).toBe(5000);
    expect(entry.silence?.maxSilenceMs).toBe(3000);
    expect(entry.silence?.avgSilenceQuality).toBe(0.94);
  });
});

describe('SessionLog', () => {
  const testDir = join(tmpdir(), `session-log-test-${String(Date.now())}`);

  const entry = (idx: number): SessionLogEntry => ({
    ts: timestamp.toISOString(),
    sessionId: 'test0001',
    idx,
    device: 'phone',
    utterance: `turn ${String(idx)}`,
    tone: 'Calm',
    wpm: 110,
    drift: 0.2,
    resonance: 0.8,
    pace: 1.05,
    pauseMs: 60,
    articulation: 0.6,
  });

  beforeEach(async () => {
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('writes one JSON line per turn', async () => {
    const log = new SessionLog({ dir: join(testDir, 'sessions'), sessionId: 'test0001', logger: createMockLogger() });

    await log.write(entry(0));
    await log.write(entry(1));
    await log.close();

    expect(log.getPath()).toBe(join(testDir, 'sessions', 'session-test0001.jsonl'));
    expect(log.getLinesWritten()).toBe(2);

    const lines = (await readFile(log.getPath(), 'utf-8')).trim().split('\n');
    expect(lines.map((line): unknown => JSON.parse(line))).toEqual([entry(0), entry(1)]);
  });

  it('disables itself when the directory cannot be created', async () => {
    const blocker = join(testDir, 'blocker');
    await writeFile(blocker, 'not a directory');
    const logger = createMockLogger();
    const log = new SessionLog({ dir: join(blocker, 'sessions'), sessionId: 'test0001', logger });

    expect(await log.open()).toBe(false);
    await log.write(entry(0));
    await log.close();

    expect(log.isEnabled()).toBe(false);
    expect(log.getLinesWritten()).toBe(0);
    expect(logger.messages('error')).toEqual(['Failed to open session log']);
  });
});
