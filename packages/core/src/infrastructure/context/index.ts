/**
 * @fileoverview Infrastructure Context Module Exports
 *
 * @packageDocumentation
 * @module @ctxhub/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module exports the concrete AsyncLocalStorage-based implementation
 * of the context tree. It provides:
 *
 * - **ScopedContextVariable**: async-scope-local slot with restore tokens
 * - **ExecutionContext**: the context tree node
 * - **ContextSpan**: span anchoring a detached context store
 * - **Accessors**: module-level reads and writes on the current context
 *
 * ## Usage
 *
 * ```typescript
 * import { ExecutionContext, getItem, setItem } from '@ctxhub/core/infrastructure/context';
 *
 * const ctx = new ExecutionContext('web.request', { data: { route: '/users' } });
 * try {
 *   setItem('user', 'u-1');
 *   getItem('route'); // '/users'
 * } finally {
 *   ctx.end();
 * }
 * ```
 */

// ============================================================================
// ScopedContextVariable - AsyncLocalStorage Slot
// ============================================================================

export {
  ScopedContextVariable,
  type IContextToken,
  type IScopedContextVariableOptions,
} from './context-variable';

// ============================================================================
// ExecutionContext - Context Tree
// ============================================================================

export {
  ExecutionContext,
  CURRENT_CONTEXT,
  ROOT_CONTEXT_ID,
  type IExecutionContextOptions,
} from './execution-context';

export { ContextSpan, type IContextSpanOptions } from './context-span';

// ============================================================================
// Module-level Accessors
// ============================================================================

export {
  currentContext,
  rootContext,
  runWithContext,
  getItem,
  getItems,
  setItem,
  setItems,
  setSafe,
  type ISpanAccessOptions,
  type IModuleGetItemOptions,
} from './current-context';

