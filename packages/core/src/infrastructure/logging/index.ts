/**
 * @fileoverview Infrastructure Logging Module Exports
 *
 * @packageDocumentation
 * @module @ctxhub/core/infrastructure/logging
 * @license Apache-2.0
 */

export { type Logger, makeLogger, makeNoopLogger, getModuleLogger } from './logger';
