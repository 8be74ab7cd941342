/**
 * @fileoverview ExecutionContext - Context Tree Node with Lifecycle Events
 *
 * @packageDocumentation
 * @module @ctxhub/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Concrete IExecutionContext. Creating a context makes it the current
 * context of the calling async scope and dispatches
 * `context.started.<identifier>`; ending it dispatches
 * `context.ended.<identifier>` and restores the previous current context.
 *
 * ```
 * new ExecutionContext('web.request')      end()
 *   ├─ link parent (current context)         ├─ dispatchWithResults('context.ended.web.request', [ctx])
 *   ├─ merge initial data                    └─ CURRENT_CONTEXT.reset(token)
 *   ├─ CURRENT_CONTEXT.set(ctx) → token
 *   └─ dispatch('context.started.web.request', [ctx])
 * ```
 *
 * Prefer `withContext()`, which guarantees the `end()` call.
 *
 * ## Span-bound Contexts
 *
 * A context created with a `span` is never made current. It is reachable
 * only through the span, which holds the context's data store for
 * collaborators that work from a span reference rather than the current
 * async scope.
 *
 * @version 1.0.0
 */

import {
  type ContextData,
  type ContextKey,
  type ContextKeyLike,
  type IExecutionContext,
  type IGetItemOptions,
  type ISpan,
  DuplicateKeyError,
  KeyNotFoundError,
  RootParentError,
  resolveKeyId,
} from '../../domain/context';
import {
  type IDispatchResult,
  type IEventBus,
  contextEndedEvent,
  contextStartedEvent,
} from '../../domain/events';
import { getEventBus } from '../events/hub';

import { type IContextToken, ScopedContextVariable } from './context-variable';
import { type IContextStore, createContextStore, storeToObject } from './context-store';

/**
 * Reserved identifier of the process root context. Only the process root
 * is root; a context created under this identifier is an ordinary node.
 */
export const ROOT_CONTEXT_ID = '__root__';

/**
 * Construction options for ExecutionContext.
 */
export interface IExecutionContextOptions {
  /**
   * Parent(s) to link, in order. `null` creates a context without parents.
   * Default: the current context.
   */
  parent?: ExecutionContext | readonly ExecutionContext[] | null;

  /**
   * Span to bind the context to. A span-bound context is never made current.
   */
  span?: ISpan;

  /**
   * Initial own data.
   */
  data?: ContextData;

  /**
   * Bus for lifecycle events. Default: the process-wide bus at the time of each event.
   */
  bus?: IEventBus;

  /**
   * Whether to make the context current. Default: true unless span-bound.
   */
  activate?: boolean;
}

/**
 * ExecutionContext - One node of the context tree.
 *
 * @remarks
 * **Ownership:** a context references its parents, never its children.
 * Parents must exist before a child can name them, so the graph is acyclic
 * by construction. Nothing is destroyed by the tree; an ended context is
 * reclaimed by the garbage collector once unreferenced.
 *
 * **Not idempotent:** calling `end()` twice dispatches the ended event twice.
 * The second restore attempt is logged and ignored.
 *
 * @example Lifecycle listener
 * ```typescript
 * on(contextStartedEvent('web.request'), (ctx: ExecutionContext) => {
 *   ctx.setItem('span', tracer.startSpan(String(ctx.getItem('route'))));
 * });
 *
 * on(contextEndedEvent('web.request'), (ctx: ExecutionContext) => {
 *   ctx.getItem(SPAN_KEY)?.finish();
 * });
 * ```
 *
 * @example Manual lifetime
 * ```typescript
 * const ctx = new ExecutionContext('worker.job', { data: { jobId } });
 * try {
 *   runJob();
 * } finally {
 *   ctx.end();
 * }
 * ```
 */
export class ExecutionContext implements IExecutionContext {
  readonly identifier: string;

  private readonly parentLinks: ExecutionContext[] = [];
  private readonly store: IContextStore;
  private readonly spanRef: WeakRef<ISpan> | undefined;
  private readonly bus: IEventBus | undefined;
  private readonly token: IContextToken<ExecutionContext> | undefined;

  constructor(identifier: string, options: IExecutionContextOptions = {}) {
    this.identifier = identifier;
    this.bus = options.bus;
    this.spanRef = options.span ? new WeakRef(options.span) : undefined;

    for (const parent of resolveParents(options.parent)) {
      this.addParent(parent);
    }

    this.store = createContextStore(options.data);

    const activate = options.activate ?? options.span === undefined;
    if (activate) {
      this.token = CURRENT_CONTEXT.set(this);
    }

    this.eventBus().dispatch(contextStartedEvent(this.identifier), [this]);
  }

  // ============================================================================
  // Static Accessors
  // ============================================================================

  /**
   * The context current in the calling async scope.
   */
  static current(): ExecutionContext {
    return CURRENT_CONTEXT.get();
  }

  /**
   * The process root context.
   */
  static root(): ExecutionContext {
    return ROOT_CONTEXT;
  }

  // ============================================================================
  // Tree
  // ============================================================================

  get parent(): ExecutionContext | undefined {
    return this.parentLinks[0];
  }

  get parents(): readonly ExecutionContext[] {
    return [...this.parentLinks];
  }

  get span(): ISpan | undefined {
    return this.spanRef?.deref();
  }

  get isRoot(): boolean {
    return this === ROOT_CONTEXT;
  }

  /**
   * Whether this context is the current one in the calling async scope.
   */
  get isActive(): boolean {
    return CURRENT_CONTEXT.isSet() && CURRENT_CONTEXT.get() === this;
  }

  addParent(context: ExecutionContext): void {
    if (this.isRoot) {
      throw new RootParentError(this.identifier);
    }
    this.parentLinks.push(context);
  }

  root(): ExecutionContext {
    let current: ExecutionContext = this;
    while (!current.isRoot && current.parent !== undefined) {
      current = current.parent;
    }
    return current;
  }

  // ============================================================================
  // Reads
  // ============================================================================

  getItem<T>(key: ContextKey<T>, options?: IGetItemOptions<T>): T | undefined;
  getItem(key: ContextKeyLike, options?: IGetItemOptions): unknown;
  getItem(key: ContextKeyLike, options: IGetItemOptions = {}): unknown {
    return this.lookup(key, options);
  }

  getItems(keys: readonly ContextKeyLike[]): unknown[] {
    return keys.map((key) => this.lookup(key, {}));
  }

  require<T>(key: ContextKey<T>): T;
  require(key: string): unknown;
  require(key: ContextKeyLike): unknown {
    const value = this.lookup(key, {});
    if (value === undefined && !this.store.data.has(resolveKeyId(key))) {
      throw new KeyNotFoundError(resolveKeyId(key), this.identifier);
    }
    return value;
  }

  private lookup(key: ContextKeyLike, options: IGetItemOptions): unknown {
    const keyId = resolveKeyId(key);
    const traverse = options.traverse ?? true;

    let current: ExecutionContext | undefined = this;
    while (current !== undefined) {
      if (current.store.data.has(keyId)) {
        return current.store.data.get(keyId);
      }
      if (!traverse) {
        break;
      }
      current = current.parent;
    }

    if (options.defaultValue !== undefined) {
      return options.defaultValue;
    }
    return typeof key === 'string' ? undefined : key.defaultValue;
  }

  hasItem(key: ContextKeyLike, traverse = true): boolean {
    const keyId = resolveKeyId(key);
    let current: ExecutionContext | undefined = this;
    while (current !== undefined) {
      if (current.store.data.has(keyId)) {
        return true;
      }
      current = traverse ? current.parent : undefined;
    }
    return false;
  }

  ownItems(): ContextData {
    return Object.freeze(storeToObject(this.store));
  }

  // ============================================================================
  // Writes
  // ============================================================================

  setItem<T>(key: ContextKey<T>, value: T): void;
  setItem(key: string, value: unknown): void;
  setItem(key: ContextKeyLike, value: unknown): void {
    this.store.data.set(resolveKeyId(key), value);
  }

  setSafe<T>(key: ContextKey<T>, value: T): void;
  setSafe(key: string, value: unknown): void;
  setSafe(key: ContextKeyLike, value: unknown): void {
    const keyId = resolveKeyId(key);
    if (this.store.data.has(keyId)) {
      throw new DuplicateKeyError(keyId, this.identifier);
    }
    this.store.data.set(keyId, value);
  }

  setItems(items: ContextData): void {
    for (const [key, value] of Object.entries(items)) {
      this.setItem(key, value);
    }
  }

  discardItem(key: ContextKeyLike): boolean {
    return this.store.data.delete(resolveKeyId(key));
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Dispatch `context.ended.<identifier>` and restore the previous current context.
   *
   * @returns Outcomes of the ended-event listeners
   *
   * @remarks
   * The previous context is restored even when a listener error propagates
   * under the raise policy.
   */
  end(): IDispatchResult {
    try {
      return this.eventBus().dispatchWithResults(contextEndedEvent(this.identifier), [this]);
    } finally {
      if (this.token !== undefined) {
        CURRENT_CONTEXT.reset(this.token);
      }
    }
  }

  // ============================================================================
  // Utility Methods
  // ============================================================================

  /**
   * Age of this context in milliseconds.
   */
  getAge(): number {
    return Date.now() - this.store.createdAt;
  }

  toString(): string {
    return `ExecutionContext(${this.identifier}, keys=${this.store.data.size}, parents=${this.parentLinks.length})`;
  }

  private eventBus(): IEventBus {
    return this.bus ?? getEventBus();
  }
}

function resolveParents(
  parent: ExecutionContext | readonly ExecutionContext[] | null | undefined,
): readonly ExecutionContext[] {
  if (parent === null) {
    return [];
  }
  if (parent === undefined) {
    return [CURRENT_CONTEXT.get()];
  }
  return parent instanceof ExecutionContext ? [parent] : parent;
}

// ============================================================================
// Process Root and Current Context
// ============================================================================

/**
 * The process root context. Detached: it is the default value of
 * CURRENT_CONTEXT rather than a value pushed onto it.
 */
const ROOT_CONTEXT = new ExecutionContext(ROOT_CONTEXT_ID, { parent: null, activate: false });

/**
 * The current execution context of each async scope.
 */
export const CURRENT_CONTEXT = new ScopedContextVariable<ExecutionContext>('ExecutionContext', {
  defaultValue: ROOT_CONTEXT,
});
