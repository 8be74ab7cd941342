/**
 * @fileoverview ScopedContextVariable - AsyncLocalStorage-backed Single Slot
 *
 * @packageDocumentation
 * @module @ctxhub/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A variable whose value is local to the current async execution scope,
 * with token-based set/reset:
 *
 * ```typescript
 * const token = variable.set(child);   // child is current from here on
 * try {
 *   work();
 * } finally {
 *   variable.reset(token);             // previous value is current again
 * }
 * ```
 *
 * ## Propagation
 *
 * Each async scope holds a mutable slot in an `AsyncLocalStorage`. `set()`
 * and `reset()` change the slot in place, so an awaited async function
 * that sets and later resets the variable leaves its caller with the value
 * it had before the call.
 *
 * `run()` and `fork()` start a new slot seeded with the current value.
 * Work spawned inside them keeps that slot; later `set()` calls outside do
 * not reach it. Concurrent request handlers should each start inside
 * `run()` or `fork()`, otherwise they share the slot of the scope that
 * spawned them.
 *
 * @version 1.0.0
 */

import { AsyncLocalStorage } from 'async_hooks';

import { ContextRestoreWarning, NoActiveContextError } from '../../domain/context';
import { type Logger, getModuleLogger } from '../logging/logger';

/**
 * One value of the variable.
 * @internal
 */
type VariableFrame<T> = { readonly isSet: true; readonly value: T } | { readonly isSet: false };

const UNSET: VariableFrame<never> = Object.freeze({ isSet: false });

/**
 * Mutable slot of one async scope.
 * @internal
 */
interface IVariableSlot<T> {
  frame: VariableFrame<T>;
}

/**
 * Opaque handle returned by `set()`, consumed by `reset()`.
 */
export interface IContextToken<T> {
  /** Value that was current before the `set()` call, if any. */
  readonly previousValue: T | undefined;
}

/**
 * Internal token shape.
 * @internal
 */
interface IFrameToken<T> extends IContextToken<T> {
  readonly owner: ScopedContextVariable<T>;
  readonly slot: IVariableSlot<T>;
  readonly previous: VariableFrame<T>;
  readonly frame: VariableFrame<T>;
}

/**
 * Construction options for ScopedContextVariable.
 */
export interface IScopedContextVariableOptions<T> {
  /**
   * Value seen by scopes that never called `set()`.
   */
  defaultValue?: T;

  logger?: Logger;
}

/**
 * ScopedContextVariable - Async-scope-local variable with restore tokens.
 *
 * @template T - Value type
 *
 * @example
 * ```typescript
 * const CURRENT_TENANT = new ScopedContextVariable<string>('tenant', { defaultValue: 'public' });
 *
 * CURRENT_TENANT.run('acme', async () => {
 *   await handle();             // CURRENT_TENANT.get() === 'acme' throughout
 * });
 * CURRENT_TENANT.get();         // 'public'
 * ```
 */
export class ScopedContextVariable<T> {
  readonly name: string;

  private readonly storage = new AsyncLocalStorage<IVariableSlot<T>>();
  private readonly baseFrame: VariableFrame<T>;
  private readonly usedTokens = new WeakSet<IContextToken<T>>();
  private logger: Logger | undefined;

  constructor(name: string, options: IScopedContextVariableOptions<T> = {}) {
    this.name = name;
    this.baseFrame =
      options.defaultValue !== undefined ? { isSet: true, value: options.defaultValue } : UNSET;
    this.logger = options.logger;
  }

  /**
   * Current value.
   *
   * @throws NoActiveContextError if the variable has neither a value nor a default
   */
  get(): T {
    const frame = this.currentFrame();
    if (!frame.isSet) {
      throw new NoActiveContextError(this.name);
    }
    return frame.value;
  }

  /**
   * Whether `get()` would return a value.
   */
  isSet(): boolean {
    return this.currentFrame().isSet;
  }

  /**
   * Make `value` current in this async scope until the token is reset.
   *
   * @returns Token restoring the previous value
   */
  set(value: T): IContextToken<T> {
    const slot = this.currentSlot();
    const previous = slot.frame;
    const frame: VariableFrame<T> = { isSet: true, value };
    slot.frame = frame;

    const token: IFrameToken<T> = {
      owner: this,
      slot,
      previous,
      frame,
      previousValue: previous.isSet ? previous.value : undefined,
    };
    return token;
  }

  /**
   * Restore the value that was current before `token` was issued.
   *
   * @returns False, after logging a ContextRestoreWarning, when the token
   * was already used, belongs to another variable, or no longer matches the
   * current value; nothing is changed in that case.
   */
  reset(token: IContextToken<T>): boolean {
    if (!this.isOwnToken(token)) {
      this.warn('token was issued by a different variable');
      return false;
    }
    if (this.usedTokens.has(token)) {
      this.warn('token has already been used');
      return false;
    }
    if (this.storage.getStore() !== token.slot || token.slot.frame !== token.frame) {
      this.warn('token does not match the current value of this execution scope');
      return false;
    }

    this.usedTokens.add(token);
    token.slot.frame = token.previous;
    return true;
  }

  /**
   * Run a callback with `value` current, isolated from the caller's scope.
   */
  run<R>(value: T, callback: () => R): R {
    return this.storage.run({ frame: { isSet: true, value } }, callback);
  }

  /**
   * Run a callback in a new scope that starts with the current value.
   *
   * @remarks
   * `set()` calls made inside the callback never reach the caller, while
   * async work started inside keeps them.
   */
  fork<R>(callback: () => R): R {
    return this.storage.run({ frame: this.currentFrame() }, callback);
  }

  private currentFrame(): VariableFrame<T> {
    return this.storage.getStore()?.frame ?? this.baseFrame;
  }

  /**
   * Slot of the calling scope. Outside any `run()`/`fork()` a slot is
   * entered once and shared by everything the scope spawns afterwards.
   */
  private currentSlot(): IVariableSlot<T> {
    const existing = this.storage.getStore();
    if (existing !== undefined) {
      return existing;
    }
    const slot: IVariableSlot<T> = { frame: this.baseFrame };
    this.storage.enterWith(slot);
    return slot;
  }

  private isOwnToken(token: IContextToken<T>): token is IFrameToken<T> {
    return 'owner' in token && token.owner === this;
  }

  private warn(reason: string): void {
    if (this.logger === undefined) {
      this.logger = getModuleLogger('context-variable');
    }
    const warning = new ContextRestoreWarning(this.name, reason);
    this.logger.debug({ err: warning }, warning.message);
  }
}
