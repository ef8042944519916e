import type { TurnContext, TurnInput } from '../types/index.js';
import { createEmptyAdjustment } from '../types/index.js';

/**
 * Create the context a turn travels through.
 *
 * Each stage enriches it with its own snapshot; the pipeline reads the
 * merged adjustment and the statuses once every stage has run.
 */
export function createTurnContext(turn: number, input: TurnInput): TurnContext {
  return {
    turn,
    signal: input.signal,
    utterance: input.utterance ?? '',
    repeatedTheme: input.repeatedTheme ?? false,
    newUserInput: input.newUserInput ?? true,
    adjustment: createEmptyAdjustment(),
    statuses: [],
    processedStages: [],
  };
}
