/**
 * @fileoverview IExecutionContext - Execution Context Tree Abstraction
 *
 * @packageDocumentation
 * @module @ctxhub/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * This module defines the contract of a node in the execution-context tree
 * without specifying how the "current" context is tracked. The
 * AsyncLocalStorage-backed implementation lives in the Infrastructure layer.
 *
 * ## The Context Tree
 *
 * ```
 *            root
 *           /    \
 *   web.request   worker.job
 *       |
 *   db.query          (db.query.getItem('user') walks up to web.request)
 * ```
 *
 * Each node holds its own key/value data. Reads fall back through the
 * primary-parent chain, writes always land on the node itself.
 *
 * @version 1.0.0
 */

import { type ContextKey, type ContextKeyLike } from './context-key';

/**
 * Plain record of context data, as accepted by bulk setters.
 */
export type ContextData = Readonly<Record<string, unknown>>;

/**
 * Options for a single-key read.
 *
 * @template T - Type of the fallback value
 */
export interface IGetItemOptions<T = unknown> {
  /**
   * Value returned when the key is found nowhere along the searched chain.
   */
  defaultValue?: T;

  /**
   * Whether to walk the primary-parent chain. Default: true.
   */
  traverse?: boolean;
}

/**
 * ISpan - External tracing collaborator that anchors its own data store.
 *
 * @remarks
 * When a span is passed to the module-level accessors, reads and writes
 * are redirected to the span's local-root data store and the current
 * context is never consulted.
 */
export interface ISpan {
  getCtxItem(key: string): unknown;
  setCtxItem(key: string, value: unknown): void;
  setCtxItems(items: ContextData): void;
}

/**
 * IExecutionContext - One unit of work in the context tree.
 *
 * @example
 * ```typescript
 * function onRequestStarted(ctx: IExecutionContext) {
 *   const route = ctx.getItem('http.route');
 *   ctx.setItem('span.name', `GET ${String(route)}`);
 * }
 * ```
 */
export interface IExecutionContext {
  /**
   * Category name of this context. Not unique.
   */
  readonly identifier: string;

  /**
   * Primary parent, if any.
   */
  readonly parent: IExecutionContext | undefined;

  /**
   * All parents in link order. The first entry is the primary parent.
   */
  readonly parents: readonly IExecutionContext[];

  /**
   * The span this context is bound to, if it is span-bound and the span is still alive.
   */
  readonly span: ISpan | undefined;

  /**
   * Whether this is the process root context.
   */
  readonly isRoot: boolean;

  // ============================================================================
  // Reads
  // ============================================================================

  /**
   * Read a value, falling back through the primary-parent chain.
   *
   * @returns The first value found, or the default
   */
  getItem<T>(key: ContextKey<T>, options?: IGetItemOptions<T>): T | undefined;
  getItem(key: ContextKeyLike, options?: IGetItemOptions): unknown;

  /**
   * Read several keys. The result is aligned with `keys`.
   */
  getItems(keys: readonly ContextKeyLike[]): unknown[];

  /**
   * Read a value that must exist.
   *
   * @throws KeyNotFoundError if the key resolves to nothing and is not set on this context
   */
  require<T>(key: ContextKey<T>): T;
  require(key: string): unknown;

  /**
   * Check whether a key is set on this context (or an ancestor when traversing).
   */
  hasItem(key: ContextKeyLike, traverse?: boolean): boolean;

  /**
   * Shallow frozen copy of this context's own data.
   */
  ownItems(): ContextData;

  // ============================================================================
  // Writes
  // ============================================================================

  setItem<T>(key: ContextKey<T>, value: T): void;
  setItem(key: string, value: unknown): void;

  /**
   * Write a value that must not already be set on this context.
   *
   * @throws DuplicateKeyError if the key is present in own data
   */
  setSafe<T>(key: ContextKey<T>, value: T): void;
  setSafe(key: string, value: unknown): void;

  setItems(items: ContextData): void;

  /**
   * Remove a key from own data. Ancestors are untouched.
   *
   * @returns True if the key was present
   */
  discardItem(key: ContextKeyLike): boolean;

  // ============================================================================
  // Tree
  // ============================================================================

  /**
   * Append a parent.
   *
   * @throws RootParentError when called on the root context
   */
  addParent(context: IExecutionContext): void;

  /**
   * Walk the primary-parent chain to its top.
   */
  root(): IExecutionContext;
}
