export {
  MetaCognition,
  createMetaCognition,
  createInitialMetaCognitionState,
  formatSelfAssessment,
  DEFAULT_META_COGNITION_CONFIG,
  type MetaCognitionConfig,
} from './meta-cognition.js';
export { MetaStabilizer, DEFAULT_META_ALPHA } from './meta-stabilizer.js';
export {
  CompassionDetector,
  createCompassionDetector,
  createInitialCompassionState,
  classifySuffering,
  compassionAdjustments,
  formatCompassionStatus,
  SUFFERING_EPISODE_THRESHOLD,
} from './compassion-detector.js';
export {
  SilenceClassifier,
  createSilenceClassifier,
  createInitialSilenceState,
  classifySilence,
  silenceQuality,
  shouldInterruptSilence,
  formatSilenceStatus,
  DEFAULT_SILENCE_CONFIG,
  type SilenceClassifierConfig,
  type SilenceContext,
} from './silence-classifier.js';
