/**
 * Outcome of the soft guard check on a turn.
 */
export type GuardAction =
  | { kind: 'none' }
  | { kind: 'warn'; message: string }
  | { kind: 'rephrased'; text: string };
