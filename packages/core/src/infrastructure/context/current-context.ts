/**
 * @fileoverview Current Context Accessors - Module-level Data Access
 *
 * @packageDocumentation
 * @module @ctxhub/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Shortcuts that read and write the current context of the calling async
 * scope. When a span is supplied, the span's store is used instead and the
 * current context is not consulted at all.
 *
 * ```typescript
 * import { getItem, setItem } from '@ctxhub/core';
 *
 * setItem('http.request_blocked', true);             // current context
 * getItem('iast.enabled', { span: requestSpan });    // span's local-root store
 * ```
 *
 * @version 1.0.0
 */

import {
  type ContextData,
  type ContextKey,
  type ContextKeyLike,
  type ISpan,
  resolveKeyId,
} from '../../domain/context';

import { CURRENT_CONTEXT, ExecutionContext } from './execution-context';

/**
 * Options accepted by module-level accessors.
 */
export interface ISpanAccessOptions {
  /**
   * Redirect the access to this span's store.
   */
  span?: ISpan;
}

export interface IModuleGetItemOptions<T = unknown> extends ISpanAccessOptions {
  /**
   * Value returned when the key is found nowhere. Ignored when a span is supplied.
   */
  defaultValue?: T;

  /**
   * Whether to walk the current context's primary-parent chain. Default: true.
   * Ignored when a span is supplied.
   */
  traverse?: boolean;
}

/**
 * The context current in the calling async scope (the root context if none was created).
 */
export function currentContext(): ExecutionContext {
  return CURRENT_CONTEXT.get();
}

/**
 * Root of the current context's primary-parent chain.
 */
export function rootContext(): ExecutionContext {
  return CURRENT_CONTEXT.get().root();
}

/**
 * Run a callback with `context` as the current context, isolated from the caller.
 *
 * @remarks
 * For restoring a context in places automatic propagation does not reach,
 * such as callbacks registered with native add-ons or worker messages.
 */
export function runWithContext<R>(context: ExecutionContext, callback: () => R): R {
  return CURRENT_CONTEXT.run(context, callback);
}

// ============================================================================
// Reads
// ============================================================================

export function getItem<T>(key: ContextKey<T>, options?: IModuleGetItemOptions<T>): T | undefined;
export function getItem(key: string, options?: IModuleGetItemOptions): unknown;
export function getItem(key: ContextKeyLike, options: IModuleGetItemOptions = {}): unknown {
  if (options.span) {
    return options.span.getCtxItem(resolveKeyId(key));
  }
  return CURRENT_CONTEXT.get().getItem(key, {
    defaultValue: options.defaultValue,
    traverse: options.traverse,
  });
}

export function getItems(keys: readonly ContextKeyLike[], options: ISpanAccessOptions = {}): unknown[] {
  const { span } = options;
  if (span) {
    return keys.map((key) => span.getCtxItem(resolveKeyId(key)));
  }
  return CURRENT_CONTEXT.get().getItems(keys);
}

// ============================================================================
// Writes
// ============================================================================

export function setItem<T>(key: ContextKey<T>, value: T, options?: ISpanAccessOptions): void;
export function setItem(key: string, value: unknown, options?: ISpanAccessOptions): void;
export function setItem(key: ContextKeyLike, value: unknown, options: ISpanAccessOptions = {}): void {
  if (options.span) {
    options.span.setCtxItem(resolveKeyId(key), value);
    return;
  }
  CURRENT_CONTEXT.get().setItem(resolveKeyId(key), value);
}

export function setItems(items: ContextData, options: ISpanAccessOptions = {}): void {
  if (options.span) {
    options.span.setCtxItems(items);
    return;
  }
  CURRENT_CONTEXT.get().setItems(items);
}

/**
 * Write to the current context, failing if the key is already set on it.
 *
 * @throws DuplicateKeyError
 */
export function setSafe<T>(key: ContextKey<T>, value: T): void;
export function setSafe(key: string, value: unknown): void;
export function setSafe(key: ContextKeyLike, value: unknown): void {
  CURRENT_CONTEXT.get().setSafe(resolveKeyId(key), value);
}
