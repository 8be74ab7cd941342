/**
 * @fileoverview ContextSpan - Span Anchoring a Detached Context Store
 *
 * @packageDocumentation
 * @module @ctxhub/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Reference ISpan implementation. A local-root span owns a span-bound
 * ExecutionContext with no parents; child spans share their local root's
 * context, so every span of one local trace reads and writes one store.
 *
 * ```
 * ContextSpan('web.request')  ──owns──► ExecutionContext('span.web.request', span-bound)
 *   └─ ContextSpan('db.query') ──delegates to local root──┘
 * ```
 *
 * @version 1.0.0
 */

import { type ContextData, type ISpan } from '../../domain/context';
import { type IEventBus } from '../../domain/events';

import { ExecutionContext } from './execution-context';

export interface IContextSpanOptions {
  /**
   * Parent span. Children delegate their store to the parent's local root.
   */
  parent?: ContextSpan;

  /**
   * Bus for the store context's lifecycle events.
   */
  bus?: IEventBus;
}

export class ContextSpan implements ISpan {
  readonly name: string;
  readonly localRoot: ContextSpan;

  /**
   * The span-bound context holding the local trace's data.
   */
  readonly context: ExecutionContext;

  constructor(name: string, options: IContextSpanOptions = {}) {
    this.name = name;

    if (options.parent) {
      this.localRoot = options.parent.localRoot;
      this.context = options.parent.context;
    } else {
      this.localRoot = this;
      this.context = new ExecutionContext(`span.${name}`, {
        parent: null,
        span: this,
        bus: options.bus,
      });
    }
  }

  get isLocalRoot(): boolean {
    return this.localRoot === this;
  }

  getCtxItem(key: string): unknown {
    return this.context.getItem(key);
  }

  setCtxItem(key: string, value: unknown): void {
    this.context.setItem(key, value);
  }

  setCtxItems(items: ContextData): void {
    this.context.setItems(items);
  }

  /**
   * End the store context. No-op on child spans.
   */
  finish(): void {
    if (this.isLocalRoot) {
      this.context.end();
    }
  }
}
