/**
 * @fileoverview Context Store - Internal Storage Structure
 *
 * @packageDocumentation
 * @module @ctxhub/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Private storage of one ExecutionContext. Not exported from the package.
 *
 * @internal
 */

import { type ContextData } from '../../domain/context';

/**
 * Internal store structure for context data.
 *
 * @remarks
 * A Map rather than a plain object: `has()` tells "set to undefined" apart
 * from "never set", which `require()` depends on, and string keys such as
 * `__proto__` are stored like any other.
 *
 * @internal
 */
export interface IContextStore {
  /**
   * Own key/value data. Owned exclusively by one context.
   */
  readonly data: Map<string, unknown>;

  /**
   * Creation time (epoch ms).
   */
  readonly createdAt: number;
}

/**
 * Create a store, copying every entry of `initialData` (undefined values included).
 *
 * @internal
 */
export function createContextStore(initialData?: ContextData): IContextStore {
  const data = new Map<string, unknown>(initialData ? Object.entries(initialData) : []);

  return {
    data,
    createdAt: Date.now(),
  };
}

/**
 * Shallow copy of store data as a plain object.
 *
 * @internal
 */
export function storeToObject(store: IContextStore): Record<string, unknown> {
  return Object.fromEntries(store.data);
}
