/**
 * @fileoverview Infrastructure Config Module Exports
 *
 * @packageDocumentation
 * @module @ctxhub/core/infrastructure/config
 * @license Apache-2.0
 */

export {
  type IRuntimeConfig,
  type IRuntimeConfigResult,
  type LogLevel,
  parseRuntimeConfig,
  loadRuntimeConfig,
  getRuntimeConfig,
  configure,
  resetRuntimeConfig,
} from './runtime-config';
