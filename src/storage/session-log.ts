import { mkdir, open, type FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger, ToneTag } from '../types/index.js';
import { round3 } from '../types/index.js';
import type { TurnResult } from '../layers/pipeline.js';
import type { VoiceLatency } from '../simulation/voice-io.js';

/**
 * One JSONL line of the session log.
 * Fields of a disabled stage are absent, never null.
 */
export interface SessionLogEntry {
  ts: string;
  sessionId: string;
  idx: number;
  device: string;
  utterance: string;
  tone: ToneTag;
  wpm: number;
  drift: number;
  resonance: number;
  pace: number;
  pauseMs: number;
  articulation: number;
  /** Simulated voice latency, when the runner measured it */
  asrMs?: number;
  ttsMs?: number;
  totalMs?: number;
  state?: string;
  stabilizer?: {
    emaDrift: number;
    emaResonance: number;
    stepsInState: number;
  };
  guard?: 'none' | 'warn' | 'rephrased';
  sync?: {
    paceDelta: number;
    pauseDeltaMs: number;
    resonanceBoost: number;
    driftReduction: number;
  };
  meta?: {
    selfDrift: number;
    selfResonance: number;
    confidence: number;
    clarity: number;
    doubt: number;
    observationCount: number;
  };
  compassion?: {
    suffering: number;
    type: string;
    kindness: number;
    healing: number;
    level: number;
    sufferingCount: number;
    sufferingStreak: number;
  };
  silence?: {
    type: string;
    durationMs: number;
    quality: number;
    generative: boolean;
    shouldInterrupt: boolean;
    silenceCount: number;
    totalSilenceMs: number;
    maxSilenceMs: number;
    avgSilenceQuality: number;
  };
}

export interface SessionTurnInfo {
  sessionId: string;
  device: string;
  utterance: string;
  timestamp?: Date;
  latency?: VoiceLatency;
}

/**
 * Build the log line for one processed turn.
 */
export function buildSessionLogEntry(result: TurnResult, info: SessionTurnInfo): SessionLogEntry {
  const { output, signal } = result;
  const entry: SessionLogEntry = {
    ts: (info.timestamp ?? new Date()).toISOString(),
    sessionId: info.sessionId,
    idx: result.turn,
    device: info.device,
    utterance: info.utterance,
    tone: signal.tone,
    wpm: round3(signal.tempo),
    drift: round3(output.drift),
    resonance: round3(output.resonance),
    pace: round3(output.pace),
    pauseMs: output.pauseMs,
    articulation: round3(output.articulation),
  };

  if (info.latency) {
    entry.asrMs = info.latency.asrMs;
    entry.ttsMs = info.latency.ttsMs;
    entry.totalMs = info.latency.totalMs;
  }
  if (result.regulationState !== undefined) {
    entry.state = result.regulationState;
  }
  if (result.stabilizer) {
    entry.stabilizer = {
      emaDrift: round3(result.stabilizer.emaDrift),
      emaResonance: round3(result.stabilizer.emaResonance),
      stepsInState: result.stabilizer.stepsInState,
    };
  }
  if (result.guard) {
    entry.guard = result.guard.kind;
  }
  if (result.sync) {
    entry.sync = {
      paceDelta: round3(result.sync.paceDelta),
      pauseDeltaMs: result.sync.pauseDeltaMs,
      resonanceBoost: round3(result.sync.resonanceBoost),
      driftReduction: round3(result.sync.driftReduction),
    };
  }
  if (result.awareness) {
    const a = result.awareness;
    entry.meta = {
      selfDrift: round3(a.selfDrift),
      selfResonance: round3(a.selfResonance),
      confidence: round3(a.confidence),
      clarity: round3(a.clarity),
      doubt: round3(a.doubt),
      observationCount: a.observationCount,
    };
  }
  if (result.compassion) {
    const c = result.compassion;
    entry.compassion = {
      suffering: round3(c.userSuffering),
      type: c.sufferingType,
      kindness: round3(c.responseKindness),
      healing: round3(c.healingIntent),
      level: round3(c.compassionLevel),
      sufferingCount: c.sufferingCount,
      sufferingStreak: c.sufferingStreak,
    };
  }
  if (result.silence) {
    const s = result.silence;
    entry.silence = {
      type: s.silenceType,
      durationMs: s.currentSilenceMs,
      quality: round3(s.silenceQuality),
      generative: s.isGenerative,
      shouldInterrupt: s.shouldInterrupt,
      silenceCount: s.silenceCount,
      totalSilenceMs: s.totalSilenceMs,
      maxSilenceMs: s.maxSilenceMs,
      avgSilenceQuality: round3(s.avgSilenceQuality),
    };
  }

  return entry;
}

export interface SessionLogConfig {
  /** Directory for session files */
  dir: string;
  sessionId: string;
  logger: Logger;
}

/**
 * Append-only JSONL session log: `session-<id>.jsonl`, one line per turn.
 *
 * A failed open or write is logged once and disables the log for the rest
 * of the run; the session itself keeps going.
 */
export class SessionLog {
  private readonly path: string;
  private readonly dir: string;
  private readonly logger: Logger;
  private handle: FileHandle | null = null;
  private disabled = false;
  private linesWritten = 0;

  constructor(config: SessionLogConfig) {
    this.dir = config.dir;
    this.path = join(config.dir, `session-${config.sessionId}.jsonl`);
    this.logger = config.logger.child({ component: 'session-log' });
  }

  getPath(): string {
    return this.path;
  }

  isEnabled(): boolean {
    return !this.disabled;
  }

  getLinesWritten(): number {
    return this.linesWritten;
  }

  /**
   * Create the directory and the file. Returns false if the log is disabled.
   */
  async open(): Promise<boolean> {
    if (this.disabled) return false;
    try {
      await mkdir(this.dir, { recursive: true });
      this.handle = await open(this.path, 'w');
      this.logger.debug({ path: this.path }, 'Session log opened');
      return true;
    } catch (error) {
      this.disable(error, 'Failed to open session log');
      return false;
    }
  }

  async write(entry: SessionLogEntry): Promise<void> {
    if (this.disabled) return;
    if (!this.handle) {
      const opened = await this.open();
      if (!opened) return;
    }

    const handle = this.handle;
    if (!handle) return;

    try {
      await handle.write(`${JSON.stringify(entry)}\n`);
      this.linesWritten++;
    } catch (error) {
      this.disable(error, 'Failed to write session log, disabling it');
    }
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (!handle) return;

    try {
      await handle.close();
      this.logger.debug({ path: this.path, lines: this.linesWritten }, 'Session log closed');
    } catch (error) {
      this.disable(error, 'Failed to close session log');
    }
  }

  private disable(error: unknown, message: string): void {
    this.disabled = true;
    this.logger.error(
      { path: this.path, error: error instanceof Error ? error.message : String(error) },
      message
    );
  }
}
