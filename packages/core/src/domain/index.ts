/**
 * @fileoverview Domain Layer Exports
 *
 * The Domain layer holds the technology-agnostic contracts: event bus,
 * execution context, span collaborator and their errors.
 * NO infrastructure dependencies are allowed here (Hexagonal Architecture).
 *
 * @module @ctxhub/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// Context - Execution context tree contracts
// ============================================================================
export * from './context';

// ============================================================================
// Events - Publish/subscribe contracts
// ============================================================================
export * from './events';
