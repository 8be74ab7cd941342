/**
 * @fileoverview Infrastructure Layer Exports
 *
 * The Infrastructure layer contains the AsyncLocalStorage context tree,
 * the event bus, runtime configuration and logging.
 *
 * @module @ctxhub/core/infrastructure
 * @license Apache-2.0
 */

// ============================================================================
// Context - AsyncLocalStorage implementation
// ============================================================================
export * from './context';

// ============================================================================
// Events - Listener registry and process-wide hub
// ============================================================================
export * from './events';

// ============================================================================
// Config - zod-validated runtime settings
// ============================================================================
export * from './config';

// ============================================================================
// Logging - pino
// ============================================================================
export * from './logging';
