/**
 * @fileoverview Application Layer Exports
 *
 * The Application layer orchestrates execution-context sessions and the
 * pipeline behavior built on them.
 *
 * @module @ctxhub/core/application
 * @license Apache-2.0
 */

export * from './session';
