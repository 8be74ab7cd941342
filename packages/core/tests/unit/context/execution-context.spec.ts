/**
 * @fileoverview ExecutionContext Unit Tests
 *
 * Tests for the context tree: data inheritance, parent links, lifecycle
 * events and restoration of the current context.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';

import {
  ContextKey,
  DuplicateKeyError,
  KeyNotFoundError,
  RootParentError,
} from '../../../src/domain/context/index.js';
import { contextEndedEvent, contextStartedEvent } from '../../../src/domain/events/index.js';
import { configure } from '../../../src/infrastructure/config/index.js';
import {
  CURRENT_CONTEXT,
  ExecutionContext,
  ROOT_CONTEXT_ID,
} from '../../../src/infrastructure/context/index.js';
import { EventBus, on } from '../../../src/infrastructure/events/index.js';

/** Keep `set()` calls made by a test out of the runner's scope. */
const isolated = <R>(callback: () => R): R => CURRENT_CONTEXT.fork(callback);

const USER_KEY = new ContextKey<string>('user');
const RETRIES_KEY = new ContextKey<number>('retries', { defaultValue: 3 });

describe('ExecutionContext', () => {
  // ============================================================================
  // Root Context Tests
  // ============================================================================

  describe('root context', () => {
    it('should be current when no context was created', () => {
      const root = ExecutionContext.root();

      expect(ExecutionContext.current()).toBe(root);
      expect(root.identifier).toBe(ROOT_CONTEXT_ID);
      expect(root.isRoot).toBe(true);
      expect(root.parent).toBeUndefined();
    });

    it('should refuse parents', () => {
      const root = ExecutionContext.root();
      const other = new ExecutionContext('other', { parent: null, activate: false });

      expect(() => root.addParent(other)).toThrow(RootParentError);
      expect(() => root.addParent(other)).toThrow(
        "Cannot add a parent to the root execution context '__root__'",
      );
      expect(root.parents).toEqual([]);
    });

    it('should not treat other contexts sharing its identifier as root', () => {
      isolated(() => {
        const impostor = new ExecutionContext(ROOT_CONTEXT_ID);
        const child = new ExecutionContext('child');

        expect(impostor.isRoot).toBe(false);
        expect(impostor.parent).toBe(ExecutionContext.root());
        expect(child.root()).toBe(ExecutionContext.root());

        child.end();
        impostor.end();
      });
    });

    it('should resolve as root() of itself', () => {
      const root = ExecutionContext.root();

      expect(root.root()).toBe(root);
    });
  });

  // ============================================================================
  // Construction Tests
  // ============================================================================

  describe('constructor', () => {
    it('should link the current context as parent and become current', () => {
      isolated(() => {
        const ctx = new ExecutionContext('web.request');

        expect(ctx.parent).toBe(ExecutionContext.root());
        expect(ExecutionContext.current()).toBe(ctx);
        expect(ctx.isActive).toBe(true);

        ctx.end();
        expect(ExecutionContext.current()).toBe(ExecutionContext.root());
        expect(ctx.isActive).toBe(false);
      });
    });

    it('should copy initial data into own data', () => {
      const ctx = new ExecutionContext('job', { parent: null, activate: false, data: { id: 7 } });

      expect(ctx.ownItems()).toEqual({ id: 7 });
    });

    it('should create a context without parents when parent is null', () => {
      const ctx = new ExecutionContext('detached', { parent: null, activate: false });

      expect(ctx.parent).toBeUndefined();
      expect(ctx.parents).toEqual([]);
      expect(ctx.root()).toBe(ctx);
    });

    it('should link several parents in order', () => {
      const first = new ExecutionContext('first', { parent: null, activate: false });
      const second = new ExecutionContext('second', { parent: null, activate: false });

      const ctx = new ExecutionContext('joined', { parent: [first, second], activate: false });

      expect(ctx.parent).toBe(first);
      expect(ctx.parents).toEqual([first, second]);
    });

    it('should not activate a span-bound context', () => {
      isolated(() => {
        const span = { getCtxItem: vi.fn(), setCtxItem: vi.fn(), setCtxItems: vi.fn() };

        const ctx = new ExecutionContext('span.ctx', { parent: null, span });

        expect(ctx.span).toBe(span);
        expect(ExecutionContext.current()).toBe(ExecutionContext.root());
      });
    });
  });

  // ============================================================================
  // Lifecycle Event Tests
  // ============================================================================

  describe('lifecycle events', () => {
    it('should dispatch the started event with the new context already current', () => {
      isolated(() => {
        const seen: ExecutionContext[] = [];
        on(contextStartedEvent('web.request'), (ctx: ExecutionContext) => {
          seen.push(ctx, ExecutionContext.current());
        });

        const ctx = new ExecutionContext('web.request');
        ctx.end();

        expect(seen).toEqual([ctx, ctx]);
      });
    });

    it('should dispatch the ended event before restoring the previous context', () => {
      isolated(() => {
        const seen: ExecutionContext[] = [];
        on(contextEndedEvent('web.request'), () => {
          seen.push(ExecutionContext.current());
        });

        const ctx = new ExecutionContext('web.request');
        ctx.end();

        expect(seen).toEqual([ctx]);
      });
    });

    it('should return the ended listeners outcomes from end()', () => {
      isolated(() => {
        on(contextEndedEvent('job'), () => 'flushed');

        const result = new ExecutionContext('job').end();

        expect(result.results).toEqual(['flushed']);
      });
    });

    it('should let started listeners write into the context', () => {
      isolated(() => {
        on(contextStartedEvent('web.request'), (ctx: ExecutionContext) => {
          ctx.setItem('span.name', `GET ${String(ctx.getItem('route'))}`);
        });

        const ctx = new ExecutionContext('web.request', { data: { route: '/users' } });

        expect(ctx.getItem('span.name')).toBe('GET /users');
        ctx.end();
      });
    });

    it('should use an injected bus instead of the process-wide one', () => {
      isolated(() => {
        const bus = new EventBus();
        const injected = vi.fn();
        const processWide = vi.fn();
        bus.subscribe(contextStartedEvent('job'), injected);
        on(contextStartedEvent('job'), processWide);

        new ExecutionContext('job', { bus }).end();

        expect(injected).toHaveBeenCalledTimes(1);
        expect(processWide).not.toHaveBeenCalled();
      });
    });

    it('should restore the previous context when an ended listener raises', () => {
      isolated(() => {
        configure({ raiseListenerErrors: true });
        on(contextEndedEvent('job'), () => {
          throw new Error('flush failed');
        });

        const ctx = new ExecutionContext('job');

        expect(() => ctx.end()).toThrow('flush failed');
        expect(ExecutionContext.current()).toBe(ExecutionContext.root());
      });
    });

    it('should restore the caller context after an awaited function ends its own context', async () => {
      await isolated(async () => {
        const before = ExecutionContext.current();
        const work = async (): Promise<ExecutionContext> => {
          const ctx = new ExecutionContext('job');
          await Promise.resolve();
          ctx.end();
          return ctx;
        };

        const ended = await work();

        expect(ended.identifier).toBe('job');
        expect(ExecutionContext.current()).toBe(before);
        expect(ended.isActive).toBe(false);
      });
    });

    it('should restore nested contexts in reverse order', () => {
      isolated(() => {
        const outer = new ExecutionContext('outer');
        const inner = new ExecutionContext('inner');

        expect(inner.parent).toBe(outer);

        inner.end();
        expect(ExecutionContext.current()).toBe(outer);
        outer.end();
        expect(ExecutionContext.current()).toBe(ExecutionContext.root());
      });
    });

    it('should dispatch the ended event again on a second end()', () => {
      isolated(() => {
        const ended = vi.fn();
        on(contextEndedEvent('job'), ended);

        const ctx = new ExecutionContext('job');
        ctx.end();
        ctx.end();

        expect(ended).toHaveBeenCalledTimes(2);
        expect(ExecutionContext.current()).toBe(ExecutionContext.root());
      });
    });
  });

  // ============================================================================
  // Read Tests
  // ============================================================================

  describe('getItem', () => {
    const tree = () => {
      const parent = new ExecutionContext('parent', {
        parent: null,
        activate: false,
        data: { user: 'u-1', tier: 'gold' },
      });
      const child = new ExecutionContext('child', { parent, activate: false });
      return { parent, child };
    };

    it('should inherit values from ancestors', () => {
      const { child } = tree();

      expect(child.getItem('user')).toBe('u-1');
      expect(child.getItem(USER_KEY)).toBe('u-1');
    });

    it('should let own values shadow ancestors without touching them', () => {
      const { parent, child } = tree();

      child.setItem('user', 'u-2');

      expect(child.getItem('user')).toBe('u-2');
      expect(parent.getItem('user')).toBe('u-1');
    });

    it('should read own data only when traverse is false', () => {
      const { child } = tree();

      expect(child.getItem('user', { traverse: false })).toBeUndefined();
    });

    it('should fall back to the explicit default, then to the key default', () => {
      const { child } = tree();

      expect(child.getItem('missing')).toBeUndefined();
      expect(child.getItem('missing', { defaultValue: 'fallback' })).toBe('fallback');
      expect(child.getItem(RETRIES_KEY)).toBe(3);
      expect(child.getItem(RETRIES_KEY, { defaultValue: 5 })).toBe(5);
    });

    it('should follow the primary parent only', () => {
      const first = new ExecutionContext('first', { parent: null, activate: false });
      const second = new ExecutionContext('second', {
        parent: null,
        activate: false,
        data: { only: 'second' },
      });
      const ctx = new ExecutionContext('joined', { parent: [first, second], activate: false });

      expect(ctx.getItem('only')).toBeUndefined();
    });

    it('should read several keys in order', () => {
      const { child } = tree();

      expect(child.getItems(['tier', 'missing', USER_KEY, RETRIES_KEY])).toEqual([
        'gold',
        undefined,
        'u-1',
        3,
      ]);
    });

    it('should report key presence', () => {
      const { child } = tree();

      expect(child.hasItem('user')).toBe(true);
      expect(child.hasItem('user', false)).toBe(false);
      expect(child.hasItem('missing')).toBe(false);
    });
  });

  describe('require', () => {
    it('should return inherited values', () => {
      const parent = new ExecutionContext('parent', {
        parent: null,
        activate: false,
        data: { user: 'u-1' },
      });
      const child = new ExecutionContext('child', { parent, activate: false });

      expect(child.require(USER_KEY)).toBe('u-1');
    });

    it('should throw KeyNotFoundError for missing keys', () => {
      const ctx = new ExecutionContext('job', { parent: null, activate: false });

      expect(() => ctx.require('user')).toThrow(KeyNotFoundError);
      expect(() => ctx.require('user')).toThrow(
        "Key 'user' not found in execution context 'job' or its ancestors",
      );
    });

    it('should accept keys explicitly set to undefined', () => {
      const ctx = new ExecutionContext('job', {
        parent: null,
        activate: false,
        data: { user: undefined },
      });

      expect(ctx.require('user')).toBeUndefined();
    });
  });

  // ============================================================================
  // Write Tests
  // ============================================================================

  describe('setSafe', () => {
    it('should write a new key', () => {
      const ctx = new ExecutionContext('job', { parent: null, activate: false });

      ctx.setSafe(USER_KEY, 'u-1');

      expect(ctx.getItem(USER_KEY)).toBe('u-1');
    });

    it('should refuse to overwrite an own key', () => {
      const ctx = new ExecutionContext('job', { parent: null, activate: false, data: { user: 'u-1' } });

      expect(() => ctx.setSafe('user', 'u-2')).toThrow(DuplicateKeyError);
      expect(() => ctx.setSafe('user', 'u-2')).toThrow(
        "Cannot overwrite key 'user' of execution context 'job'",
      );
      expect(ctx.getItem('user')).toBe('u-1');
    });

    it('should allow shadowing an inherited key', () => {
      const parent = new ExecutionContext('parent', {
        parent: null,
        activate: false,
        data: { user: 'u-1' },
      });
      const child = new ExecutionContext('child', { parent, activate: false });

      child.setSafe('user', 'u-2');

      expect(child.getItem('user')).toBe('u-2');
    });
  });

  describe('bulk writes and removal', () => {
    it('should set several keys', () => {
      const ctx = new ExecutionContext('job', { parent: null, activate: false });

      ctx.setItems({ a: 1, b: 2 });

      expect(ctx.ownItems()).toEqual({ a: 1, b: 2 });
    });

    it('should discard own keys only', () => {
      const parent = new ExecutionContext('parent', {
        parent: null,
        activate: false,
        data: { user: 'u-1' },
      });
      const child = new ExecutionContext('child', { parent, activate: false, data: { user: 'u-2' } });

      expect(child.discardItem('user')).toBe(true);
      expect(child.getItem('user')).toBe('u-1');
      expect(child.discardItem('user')).toBe(false);
      expect(parent.getItem('user')).toBe('u-1');
    });

    it('should return a frozen copy of own data', () => {
      const ctx = new ExecutionContext('job', { parent: null, activate: false, data: { a: 1 } });

      const items = ctx.ownItems();
      ctx.setItem('b', 2);

      expect(Object.isFrozen(items)).toBe(true);
      expect(items).toEqual({ a: 1 });
    });
  });

  // ============================================================================
  // Tree Tests
  // ============================================================================

  describe('root()', () => {
    it('should walk the primary-parent chain to its top', () => {
      isolated(() => {
        const request = new ExecutionContext('web.request');
        const query = new ExecutionContext('db.query');

        expect(query.root()).toBe(ExecutionContext.root());

        query.end();
        request.end();
      });
    });

    it('should stop at a context without parents', () => {
      const top = new ExecutionContext('top', { parent: null, activate: false });
      const leaf = new ExecutionContext('leaf', { parent: top, activate: false });

      expect(leaf.root()).toBe(top);
    });
  });

  describe('toString', () => {
    it('should describe identifier, key count and parent count', () => {
      const ctx = new ExecutionContext('job', { parent: null, activate: false, data: { a: 1 } });

      expect(ctx.toString()).toBe('ExecutionContext(job, keys=1, parents=0)');
    });
  });
});
