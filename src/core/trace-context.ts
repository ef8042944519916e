/**
 * Trace Context Module
 *
 * AsyncLocalStorage-based turn context. Everything logged while a turn runs
 * carries the session ID and turn number without passing them around.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Trace context for one turn of a session.
 */
export interface TraceContext {
  /** Session ID, shared by every turn of a run */
  sessionId: string;
  /** Zero-based turn number */
  turn?: number;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Run a function with trace context.
 * All descendant async operations inherit this context automatically.
 *
 * @example
 * ```ts
 * await withTraceContext({ sessionId: 'a1b2c3d4', turn: 3 }, async () => {
 *   logger.info('Processing turn'); // gets sessionId and turn
 * });
 * ```
 */
export function withTraceContext<T>(context: TraceContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run a function inside a turn of the current session.
 * Outside any session context, only the turn is set.
 */
export function withTurnContext<T>(turn: number, fn: () => T): T {
  const parent = getTraceContext();
  return asyncLocalStorage.run({ sessionId: parent?.sessionId ?? 'none', turn }, fn);
}

/**
 * Get the current trace context (if any).
 * Returns undefined if called outside of any withTraceContext.
 */
export function getTraceContext(): TraceContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Generate a short session ID.
 */
export function generateSessionId(): string {
  return randomUUID().slice(0, 8);
}
