/**
 * @fileoverview Domain Context Module Exports
 *
 * @packageDocumentation
 * @module @ctxhub/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Technology-agnostic contracts of the execution-context tree. The
 * AsyncLocalStorage implementation lives in the Infrastructure layer.
 *
 * - **ContextKey<T>**: typed key for context data
 * - **IExecutionContext**: one node of the tree
 * - **ISpan**: external span collaborator
 * - **Errors**: DuplicateKeyError, RootParentError, KeyNotFoundError, ...
 */

// ============================================================================
// ContextKey - Typed Context Keys
// ============================================================================

export {
  ContextKey,
  type ContextKeyValue,
  type ContextKeyLike,
  resolveKeyId,
} from './context-key';

// ============================================================================
// IExecutionContext - Context Interface
// ============================================================================

export {
  type IExecutionContext,
  type IGetItemOptions,
  type ISpan,
  type ContextData,
} from './context.interface';

// ============================================================================
// Errors
// ============================================================================

export {
  ContextError,
  DuplicateKeyError,
  RootParentError,
  KeyNotFoundError,
  NoActiveContextError,
  ContextRestoreWarning,
} from './context.errors';
