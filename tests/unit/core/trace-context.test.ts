/**
 * Tests for the AsyncLocalStorage turn context.
 */

import { describe, it, expect } from 'vitest';
import {
  generateSessionId,
  getTraceContext,
  withTraceContext,
  withTurnContext,
} from '../../../src/core/trace-context.js';
import { createTraceMixin } from '../../../src/core/logger.js';

describe('TraceContext', () => {
  it('propagates context through async boundaries', async () => {
    const seen: (string | undefined)[] = [];

    await withTraceContext({ sessionId: 'abc12345' }, async () => {
      await Promise.all([
        Promise.resolve().then(() => {
          seen.push(getTraceContext()?.sessionId);
        }),
        new Promise((resolve) => setTimeout(resolve, 5)).then(() => {
          seen.push(getTraceContext()?.sessionId);
        }),
      ]);
    });

    expect(seen).toEqual(['abc12345', 'abc12345']);
  });

  it('is undefined outside any context', () => {
    expect(getTraceContext()).toBeUndefined();
  });

  it('adds the turn while keeping the session', () => {
    const ctx = withTraceContext({ sessionId: 'abc12345' }, () =>
      withTurnContext(3, () => getTraceContext())
    );

    expect(ctx).toEqual({ sessionId: 'abc12345', turn: 3 });
  });

  it('uses a placeholder session outside a session', () => {
    expect(withTurnContext(0, () => getTraceContext())).toEqual({ sessionId: 'none', turn: 0 });
  });

  it('restores the session context after a turn', () => {
    const after = withTraceContext({ sessionId: 'abc12345' }, () => {
      withTurnContext(1, () => undefined);
      return getTraceContext();
    });

    expect(after).toEqual({ sessionId: 'abc12345' });
  });

  it('generates short session IDs', () => {
    const id = generateSessionId();

    expect(id).toMatch(/^[0-9a-f]{8}$/);
    expect(generateSessionId()).not.toBe(id);
  });
});

describe('createTraceMixin', () => {
  const mixin = createTraceMixin();

  it('returns nothing outside a context', () => {
    expect(mixin()).toEqual({});
  });

  it('injects session and turn', () => {
    const fields = withTraceContext({ sessionId: 'abc12345' }, () => withTurnContext(2, () => mixin()));

    expect(fields).toEqual({ sessionId: 'abc12345', turn: 2 });
  });

  it('omits the turn between turns', () => {
    expect(withTraceContext({ sessionId: 'abc12345' }, () => mixin())).toEqual({
      sessionId: 'abc12345',
    });
  });
});
