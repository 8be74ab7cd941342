/**
 * @fileoverview @ctxhub/core - Main Entry Point
 *
 * Context-scoped event dispatch for Node.js: an in-process event bus,
 * a tree of execution contexts tracked per async scope, and sessions that
 * tie a context's lifetime to a callback.
 *
 * @packageDocumentation
 * @module @ctxhub/core
 * @version 1.0.0-alpha.1
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import { on, withContext, getItem, contextStartedEvent, type ExecutionContext } from '@ctxhub/core';
 *
 * on(contextStartedEvent('web.request'), (ctx: ExecutionContext) => {
 *   ctx.setItem('started_at', Date.now());
 * });
 *
 * await withContext('web.request', { data: { route: '/users' } }, async () => {
 *   getItem('started_at'); // set by the listener
 * });
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Pure contracts - NO external dependencies
// ============================================================================
export * from './domain';

// ============================================================================
// Application Layer Exports
// Sessions and pipeline behaviors
// ============================================================================
export * from './application';

// ============================================================================
// Infrastructure Layer Exports
// AsyncLocalStorage context tree, event bus, config, logging
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0-alpha.1';
