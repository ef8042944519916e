/**
 * Session Runner
 *
 * Drives one session: each scripted turn is measured by the signal
 * simulation, run through the regulation pipeline, written to the session
 * log and checked against the health baselines. The report goes to the
 * output sink line by line; diagnostics go to the logger.
 */

import type { Logger } from '../types/index.js';
import { createTurnSignal } from '../types/index.js';
import type { MergedConfig } from '../config/config-schema.js';
import type { RegulationPipeline, TurnResult } from '../layers/pipeline.js';
import { createRegulationPipeline } from '../layers/pipeline.js';
import type { SyncSeeds } from '../layers/regulation/neural-sync.js';
import { EMPTY_SEEDS } from '../layers/regulation/neural-sync.js';
import type { DeviceProfile } from '../simulation/device.js';
import { getDeviceProfile } from '../simulation/device.js';
import { analyzeProsody } from '../simulation/prosody.js';
import type { VoiceLatency } from '../simulation/voice-io.js';
import { formatAudioLine, formatLatency, simulateLatency } from '../simulation/voice-io.js';
import { analyzePrompt, applyToneBias } from '../simulation/prompt-analyzer.js';
import { ThemeTracker } from '../simulation/theme-tracker.js';
import type { DialogTurn } from '../simulation/dialog.js';
import { SILENT_MARKER } from '../simulation/dialog.js';
import { SessionLog, buildSessionLogEntry } from '../storage/session-log.js';
import { renderMetricTable } from '../utils/metric-table.js';
import { sparkline } from '../utils/sparkline.js';
import { HealthMonitor, type HealthStats } from './health-monitor.js';
import { generateSessionId, withTraceContext, withTurnContext } from './trace-context.js';

export type OutputSink = (line: string) => void;

export interface SessionRunnerOptions {
  logger: Logger;
  config: MergedConfig;
  /** Report sink (default: stdout) */
  output?: OutputSink;
  /** Biases carried over from earlier sessions */
  seeds?: SyncSeeds;
  sessionId?: string;
  /** Clock for log timestamps */
  now?: () => Date;
}

export interface SessionSummary {
  sessionId: string;
  turns: number;
  results: TurnResult[];
  driftHistory: number[];
  resonanceHistory: number[];
  /** Simulated per-turn voice latency for the device */
  latency: VoiceLatency;
  /** Turn-averaged residuals for the next session's baselines (sync enabled only) */
  slowIncrements?: { driftBias: number; resonanceBias: number };
  health: HealthStats;
  healthy: boolean;
  exitCode: number;
  /** Session log file, when logging was enabled and stayed healthy */
  sessionLogPath?: string;
}

const stdoutSink: OutputSink = (line) => {
  process.stdout.write(`${line}\n`);
};

export class SessionRunner {
  private readonly logger: Logger;
  private readonly config: MergedConfig;
  private readonly output: OutputSink;
  private readonly seeds: SyncSeeds;
  private readonly sessionId: string;
  private readonly now: () => Date;
  private readonly device: DeviceProfile;
  private readonly latency: VoiceLatency;
  private readonly pipeline: RegulationPipeline;
  private readonly themes = new ThemeTracker();
  private readonly health: HealthMonitor;
  private lastUtterance = '';

  constructor(options: SessionRunnerOptions) {
    this.config = options.config;
    this.sessionId = options.sessionId ?? generateSessionId();
    this.logger = options.logger.child({ component: 'session-runner' });
    this.output = options.output ?? stdoutSink;
    this.seeds = options.seeds ?? EMPTY_SEEDS;
    this.now = options.now ?? (() => new Date());
    this.device = getDeviceProfile(this.config.session.mode);
    this.latency = simulateLatency(this.device, this.config.voice.frameMs);

    this.pipeline = createRegulationPipeline(options.logger, {
      enabled: this.config.layers,
      stabilizer: this.config.stabilizer,
      sync: this.config.sync,
      guard: this.config.guard,
      awareness: this.config.awareness,
      silence: this.config.silence,
    });

    this.health = new HealthMonitor(options.logger, this.config.sync.baselines);
  }

  getPipeline(): RegulationPipeline {
    return this.pipeline;
  }

  getSessionId(): string {
    return this.sessionId;
  }

  /**
   * Run every turn of the dialog and print the closing report.
   */
  async run(turns: readonly DialogTurn[]): Promise<SessionSummary> {
    return withTraceContext({ sessionId: this.sessionId }, () => this.runSession(turns));
  }

  private async runSession(turns: readonly DialogTurn[]): Promise<SessionSummary> {
    const { config } = this;
    const results: TurnResult[] = [];
    const driftHistory: number[] = [];
    const resonanceHistory: number[] = [];

    this.pipeline.getStages().sync?.warmStart(this.seeds, config.sync.baselines);

    const sessionLog = config.sessionLog.enabled
      ? new SessionLog({ dir: config.sessionLog.dir, sessionId: this.sessionId, logger: this.logger })
      : null;
    if (sessionLog) {
      await sessionLog.open();
    }

    this.logger.info(
      {
        device: this.device.mode,
        turns: turns.length,
        stages: this.pipeline.getStageNames(),
      },
      'Session started'
    );
    this.output(
      `[cfg] session=${this.sessionId} mode=${this.device.mode} turns=${String(turns.length)} stages=${this.pipeline.getStageNames().join(',') || 'none'}`
    );

    for (const [index, turn] of turns.entries()) {
      const result = withTurnContext(index, () => this.processTurn(turn));
      results.push(result);
      driftHistory.push(result.output.drift);
      resonanceHistory.push(result.output.resonance);

      if (sessionLog) {
        await sessionLog.write(
          buildSessionLogEntry(result, {
            sessionId: this.sessionId,
            device: this.device.mode,
            utterance: turn.text,
            timestamp: this.now(),
            latency: this.latency,
          })
        );
      }

      this.health.update(result.output.drift, result.output.resonance);
    }

    if (sessionLog) {
      await sessionLog.close();
    }

    const summary: SessionSummary = {
      sessionId: this.sessionId,
      turns: results.length,
      results,
      driftHistory,
      resonanceHistory,
      latency: this.latency,
      health: this.health.getStats(),
      healthy: this.health.isHealthy(),
      exitCode: this.health.exitCode(config.session.strict),
    };

    const sync = this.pipeline.getStages().sync;
    if (sync) {
      summary.slowIncrements = sync.toSlowIncrements();
    }
    if (sessionLog?.isEnabled()) {
      summary.sessionLogPath = sessionLog.getPath();
    }

    this.printReport(summary);

    this.logger.info(
      { turns: summary.turns, healthy: summary.healthy, exitCode: summary.exitCode },
      'Session finished'
    );

    return summary;
  }

  /**
   * Measure one turn and run it through the pipeline.
   */
  private processTurn(turn: DialogTurn): TurnResult {
    // A silent turn is measured on the reply to the last thing the user said
    const text = turn.newUserInput ? turn.text : this.lastUtterance || SILENT_MARKER;
    if (turn.newUserInput) {
      this.lastUtterance = turn.text;
    }

    const prosody = analyzeProsody(text, this.device.paceFactor, this.device.pauseMs);
    const measured = analyzePrompt(text);
    const biased = applyToneBias(measured.drift, measured.resonance, prosody.tone);
    const repeatedTheme = turn.newUserInput ? this.themes.observe(turn.text) : false;

    const signal = createTurnSignal({
      drift: biased.drift,
      resonance: biased.resonance,
      tone: prosody.tone,
      tempo: prosody.wpm,
      pauseMs: turn.pauseMs ?? this.device.pauseMs,
    });

    const result = this.pipeline.process(
      { signal, utterance: text, repeatedTheme, newUserInput: turn.newUserInput },
      {
        pace: this.device.paceFactor,
        pauseMs: this.device.pauseMs,
        articulation: prosody.articulation,
      }
    );

    this.output(
      `[turn ${String(result.turn + 1)}] ${turn.newUserInput ? turn.text : '(silence)'} tone=${signal.tone} wpm=${signal.tempo.toFixed(0)}${repeatedTheme ? ' repeated' : ''}`
    );
    for (const status of result.statuses) {
      this.output(status.text);
    }
    this.output(
      `→ [voice]: Semantic Drift: ${result.output.drift.toFixed(2)}, Resonance: ${result.output.resonance.toFixed(2)} (pace=${result.output.pace.toFixed(2)} pause=${String(result.output.pauseMs)}ms art=${result.output.articulation.toFixed(2)})`
    );
    this.output(formatAudioLine(this.config.voice, this.device));
    if (this.config.report.metrics) {
      this.output(formatLatency(this.latency));
    }

    return result;
  }

  private printReport(summary: SessionSummary): void {
    this.output('');
    this.output(`[viz] resonance  ${sparkline(summary.resonanceHistory)}`);
    this.output(`[viz] drift      ${sparkline(summary.driftHistory)}`);

    const last = summary.results[summary.results.length - 1];
    if (this.config.report.viz === 'full' && last) {
      const table = renderMetricTable({
        drift: last.output.drift,
        resonance: last.output.resonance,
        wpm: last.signal.tempo,
        articulation: last.output.articulation,
        tone: last.signal.tone,
        latency: summary.latency,
        stabilizer: last.stabilizer,
        awareness: last.awareness,
      });
      for (const line of table) {
        this.output(line);
      }
    }

    if (summary.slowIncrements) {
      this.output(
        `[sync] slow increments drift_bias=${summary.slowIncrements.driftBias.toFixed(3)} res_bias=${summary.slowIncrements.resonanceBias.toFixed(3)}`
      );
    }

    const guard = this.pipeline.getStages().guard;
    if (guard) {
      const counts = guard.getCounts();
      this.output(
        `[soft-guard] warnings=${String(counts.warnings)} rephrased=${String(counts.rephrases)}`
      );
    }

    if (summary.sessionLogPath) {
      this.output(`[log] ${summary.sessionLogPath}`);
    }

    this.output('');
    for (const line of this.health.summaryLines()) {
      this.output(line);
    }
  }
}

export function createSessionRunner(options: SessionRunnerOptions): SessionRunner {
  return new SessionRunner(options);
}
