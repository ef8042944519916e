/**
 * Fixed-width metric table for the last turn of a session.
 */

import type { AwarenessSnapshot, ToneTag } from '../types/index.js';
import { clamp01 } from '../types/index.js';
import type { VoiceLatency } from '../simulation/voice-io.js';

const LABEL_WIDTH = 22;
const VALUE_WIDTH = 25;
const BAR_WIDTH = 19;

export interface MetricTableInput {
  drift: number;
  resonance: number;
  wpm: number;
  articulation: number;
  tone: ToneTag;
  latency: VoiceLatency;
  stabilizer?: { state: string; emaDrift: number; emaResonance: number };
  awareness?: Pick<
    AwarenessSnapshot,
    'selfDrift' | 'selfResonance' | 'confidence' | 'clarity' | 'doubt' | 'shouldExpressDoubt'
  >;
}

/**
 * `#` bar proportional to a [0,1] value; empty at or below 0.
 */
export function bar(value: number, width: number): string {
  const clamped = clamp01(value);
  if (width <= 0 || clamped <= 0) {
    return '';
  }
  const filled = Math.min(width, Math.round(clamped * width));
  return '#'.repeat(filled);
}

function row(label: string, value: string): string {
  return `| ${label.padEnd(LABEL_WIDTH)} | ${value.padEnd(VALUE_WIDTH)} |`;
}

function barEntry(value: number): string {
  const filled = bar(value, BAR_WIDTH);
  return filled ? `${value.toFixed(2)}  ${filled.padEnd(BAR_WIDTH)}` : value.toFixed(2);
}

export function renderMetricTable(input: MetricTableInput): string[] {
  const border = `+${'-'.repeat(LABEL_WIDTH + 2)}+${'-'.repeat(VALUE_WIDTH + 2)}+`;
  const { latency, stabilizer, awareness } = input;

  const lines = [
    border,
    row('Metric', 'Value'),
    border,
    row('Semantic Drift', barEntry(input.drift)),
    row('Resonance', barEntry(input.resonance)),
    row('WPM', input.wpm.toFixed(1)),
    row('Articulation', barEntry(input.articulation)),
    row('Tone', input.tone),
    row(
      'Latency (ASR/TTS/T)',
      `${String(latency.asrMs)}ms / ${String(latency.ttsMs)}ms / ${String(latency.totalMs)}ms`
    ),
  ];

  if (stabilizer) {
    lines.push(
      row(
        'Stabilizer State',
        `${stabilizer.state} (EMA d=${stabilizer.emaDrift.toFixed(2)} r=${stabilizer.emaResonance.toFixed(2)})`
      )
    );
  }

  if (awareness) {
    lines.push(
      row(
        'Meta-Cognition',
        `self_d=${awareness.selfDrift.toFixed(2)} self_r=${awareness.selfResonance.toFixed(2)}`
      ),
      row(
        '  Confidence/Clarity',
        `conf=${awareness.confidence.toFixed(2)} clarity=${awareness.clarity.toFixed(2)} doubt=${awareness.doubt.toFixed(2)}`
      )
    );
    if (awareness.shouldExpressDoubt) {
      lines.push(row('  Status', '⚠️  UNCERTAIN STATE'));
    }
  }

  lines.push(border);
  return lines;
}
