/**
 * Regulation pipeline exports.
 */

export { BaseStage } from './base-stage.js';
export { createTurnContext } from './turn-context.js';
export {
  RegulationPipeline,
  createRegulationPipeline,
  applyAdjustment,
  ALL_STAGES_ENABLED,
  DEFAULT_DELIVERY_BASE,
  PACE_RANGE,
  PAUSE_RANGE_MS,
  type DeliveryBase,
  type PipelineConfig,
  type StageSet,
  type TurnResult,
} from './pipeline.js';
export * from './regulation/index.js';
export * from './observation/index.js';
