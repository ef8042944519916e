/**
 * Signal simulation exports.
 */

export {
  DEVICE_MODES,
  DEVICE_PROFILES,
  getDeviceProfile,
  type DeviceMode,
  type DeviceProfile,
} from './device.js';
export {
  DEFAULT_VOICE_CONFIG,
  formatAudioLine,
  formatLatency,
  simulateLatency,
  type VoiceConfig,
  type VoiceLatency,
} from './voice-io.js';
export { analyzeProsody, toneForTempo, type Prosody } from './prosody.js';
export { analyzePrompt, applyToneBias, hash01 } from './prompt-analyzer.js';
export {
  ThemeTracker,
  tokenize,
  jaccardSimilarity,
  THEME_SIMILARITY_THRESHOLD,
  THEME_WINDOW,
} from './theme-tracker.js';
export {
  loadDialog,
  parseDialogLine,
  parseInputs,
  parseScript,
  DEFAULT_UTTERANCE,
  SILENT_MARKER,
  type DialogSource,
  type DialogTurn,
} from './dialog.js';
