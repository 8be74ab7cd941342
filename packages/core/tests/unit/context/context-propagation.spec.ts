/**
 * @fileoverview Context Propagation Tests
 *
 * Validates that the current execution context follows work across
 * async boundaries and stays apart between concurrent sessions.
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import { withContext } from '../../../src/application/session/index.js';
import { ContextKey } from '../../../src/domain/context/index.js';
import { currentContext, getItem, setItem } from '../../../src/infrastructure/context/index.js';

// Test utilities
const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const OPERATION_KEY = new ContextKey<string>('operation');
const DEPTH_KEY = new ContextKey<number>('depth', { defaultValue: 0 });

describe('Context Propagation - AsyncLocalStorage', () => {
  // ============================================================================
  // Promise Chain Propagation
  // ============================================================================

  describe('Promise Chain Propagation', () => {
    it('should propagate through Promise.then() chain', async () => {
      let captured: unknown;

      await withContext('web.request', { data: { traceId: 'trace-abc-123' } }, async () => {
        await Promise.resolve()
          .then(() => {
            captured = getItem('traceId');
          })
          .then(() => {
            expect(getItem('traceId')).toBe('trace-abc-123');
          });
      });

      expect(captured).toBe('trace-abc-123');
    });

    it('should propagate through Promise.all()', async () => {
      const seen = await withContext('web.request', { data: { traceId: 'all' } }, () =>
        Promise.all([
          delay(5).then(() => getItem('traceId')),
          delay(1).then(() => getItem('traceId')),
        ]),
      );

      expect(seen).toEqual(['all', 'all']);
    });
  });

  // ============================================================================
  // Timer/Callback Propagation
  // ============================================================================

  describe('Timer/Callback Propagation', () => {
    it('should propagate through setTimeout', async () => {
      const seen = await withContext('job', { data: { traceId: 'timer' } }, () => {
        return new Promise<unknown>((resolve) => {
          setTimeout(() => resolve(getItem('traceId')), 5);
        });
      });

      expect(seen).toBe('timer');
    });

    it('should propagate through setImmediate', async () => {
      const seen = await withContext('job', { data: { traceId: 'immediate' } }, () => {
        return new Promise<unknown>((resolve) => {
          setImmediate(() => resolve(getItem('traceId')));
        });
      });

      expect(seen).toBe('immediate');
    });

    it('should propagate through process.nextTick', async () => {
      const seen = await withContext('job', { data: { traceId: 'tick' } }, () => {
        return new Promise<unknown>((resolve) => {
          process.nextTick(() => resolve(getItem('traceId')));
        });
      });

      expect(seen).toBe('tick');
    });
  });

  // ============================================================================
  // Nested Sessions
  // ============================================================================

  describe('Nested Sessions', () => {
    it('should inherit values from the enclosing session', async () => {
      await withContext('web.request', { data: { [OPERATION_KEY.id]: 'checkout' } }, async () => {
        await withContext('db.query', async () => {
          await delay(1);
          expect(getItem(OPERATION_KEY)).toBe('checkout');
          expect(currentContext().identifier).toBe('db.query');
        });

        expect(currentContext().identifier).toBe('web.request');
      });
    });

    it('should track depth through deeply nested sessions', async () => {
      const descend = async (remaining: number): Promise<number> => {
        if (remaining === 0) {
          return getItem(DEPTH_KEY) ?? 0;
        }
        return withContext('level', async () => {
          setItem(DEPTH_KEY, (getItem(DEPTH_KEY) ?? 0) + 1);
          await delay(1);
          return descend(remaining - 1);
        });
      };

      expect(await descend(4)).toBe(4);
    });
  });

  // ============================================================================
  // Concurrent Session Isolation
  // ============================================================================

  describe('Concurrent Session Isolation', () => {
    it('should isolate context between concurrent sessions', async () => {
      const handle = (traceId: string, wait: number) =>
        withContext('web.request', { data: { traceId } }, async () => {
          await delay(wait);
          setItem('handled_by', traceId);
          await delay(wait);
          return [getItem('traceId'), getItem('handled_by')];
        });

      const results = await Promise.all([handle('a', 10), handle('b', 2), handle('c', 5)]);

      expect(results).toEqual([
        ['a', 'a'],
        ['b', 'b'],
        ['c', 'c'],
      ]);
    });

    it('should share modifications across async boundaries of one session', async () => {
      await withContext('web.request', async () => {
        setItem('step', 1);
        await delay(1);
        setItem('step', Number(getItem('step')) + 1);
        await Promise.resolve();
        expect(getItem('step')).toBe(2);
      });
    });
  });
});
