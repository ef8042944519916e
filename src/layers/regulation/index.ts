export {
  Stabilizer,
  createStabilizer,
  formatStabilizerStatus,
  DEFAULT_STABILIZER_CONFIG,
  type StabilizerConfig,
} from './stabilizer.js';
export {
  NeuralSync,
  createNeuralSync,
  correctionMagnitude,
  formatSyncStatus,
  DEFAULT_NEURAL_SYNC_CONFIG,
  EMPTY_SEEDS,
  SLOW_INCREMENT_LIMIT,
  type NeuralSyncConfig,
  type SyncBaselines,
  type SyncSeeds,
} from './neural-sync.js';
export {
  SoftGuard,
  createSoftGuard,
  checkAndRephrase,
  DEFAULT_SOFT_GUARD_CONFIG,
  type SoftGuardConfig,
} from './soft-guard.js';
