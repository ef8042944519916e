import type {
  AdjustmentDelta,
  Logger,
  RegulationStage,
  StageName,
  StageResult,
  TurnContext,
} from '../types/index.js';

/**
 * Base class for pipeline stages.
 *
 * Owns the stage logger and the bookkeeping every stage shares: marking the
 * context as processed and recording the status line. Subclasses implement
 * processImpl and own their state.
 */
export abstract class BaseStage implements RegulationStage {
  abstract readonly name: StageName;

  protected readonly logger: Logger;

  constructor(logger: Logger, stageName: StageName) {
    this.logger = logger.child({ stage: stageName });
  }

  process(context: TurnContext): StageResult {
    const result = this.processImpl(context);

    context.processedStages.push(this.name);
    context.statuses.push({ stage: this.name, text: result.status });

    this.logger.debug({ turn: context.turn, status: result.status }, 'Stage processed');

    return result;
  }

  abstract restart(): void;

  protected abstract processImpl(context: TurnContext): StageResult;

  /**
   * Helper to build a result with optional deltas.
   */
  protected result(status: string, adjustment?: Partial<AdjustmentDelta>): StageResult {
    return adjustment ? { status, adjustment } : { status };
  }
}
