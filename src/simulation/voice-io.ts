/**
 * Simulated voice I/O.
 *
 * Nothing is recorded or played: recognition is charged one device pause
 * plus a frame, synthesis half a pause plus a frame. The figures are
 * deterministic so reports and logs stay reproducible.
 */

import type { DeviceProfile } from './device.js';

export interface VoiceConfig {
  sampleRate: number;
  channels: number;
  /** Audio frame length in ms */
  frameMs: number;
}

export const DEFAULT_VOICE_CONFIG: VoiceConfig = {
  sampleRate: 16_000,
  channels: 1,
  frameMs: 20,
};

export interface VoiceLatency {
  asrMs: number;
  ttsMs: number;
  totalMs: number;
}

export function simulateLatency(
  device: Pick<DeviceProfile, 'pauseMs'>,
  frameMs: number = DEFAULT_VOICE_CONFIG.frameMs
): VoiceLatency {
  const frame = Number.isFinite(frameMs) ? Math.max(0, Math.round(frameMs)) : 0;
  const asrMs = device.pauseMs + frame;
  const ttsMs = Math.floor(device.pauseMs / 2) + frame;
  return { asrMs, ttsMs, totalMs: asrMs + ttsMs };
}

export function formatLatency(latency: VoiceLatency): string {
  return `[metrics] asr=${String(latency.asrMs)}ms tts=${String(latency.ttsMs)}ms total=${String(latency.totalMs)}ms`;
}

export function formatAudioLine(voice: VoiceConfig, device: Pick<DeviceProfile, 'gainDb'>): string {
  return `[voice] audio sr=${String(voice.sampleRate)} ch=${String(voice.channels)} gain=${device.gainDb.toFixed(1)}dB`;
}
