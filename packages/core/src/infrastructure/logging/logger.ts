/**
 * @fileoverview Logger Factory - pino JSON Logging
 *
 * @packageDocumentation
 * @module @ctxhub/core/infrastructure/logging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * JSON-only logging to stdout. Output is silenced under Vitest or
 * `NODE_ENV=test`; pipe through pino-pretty for human-readable output.
 *
 * @version 1.0.0
 */

import pino, { type DestinationStream, type Logger } from 'pino';

import { getRuntimeConfig } from '../config/runtime-config';

export type { Logger } from 'pino';

/**
 * Create a configured logger.
 *
 * @param bindings - Fields added to every line
 * @param destination - Alternate sink (tests pass an in-memory stream)
 */
export function makeLogger(bindings?: Record<string, unknown>, destination?: DestinationStream): Logger {
  const { logLevel, serviceName } = getRuntimeConfig();
  const isTestTooling = process.env['VITEST'] === 'true' || process.env['NODE_ENV'] === 'test';

  const options = {
    level: logLevel,
    // An explicit destination is always honoured, even under test tooling
    enabled: destination !== undefined || !isTestTooling,
    base: { ...bindings, service: serviceName },
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}

/**
 * Logger that discards everything but keeps the pino type.
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

let rootLogger: Logger | undefined;

/**
 * Child of the shared library logger, tagged with a module name.
 */
export function getModuleLogger(module: string): Logger {
  if (rootLogger === undefined) {
    rootLogger = makeLogger({ lib: 'ctxhub' });
  }
  return rootLogger.child({ module });
}
