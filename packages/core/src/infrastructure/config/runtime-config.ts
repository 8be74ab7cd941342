/**
 * @fileoverview Runtime Configuration - Process-wide Settings
 *
 * @packageDocumentation
 * @module @ctxhub/core/infrastructure/config
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Process-wide switches read by the event bus and the logger. Values come
 * from environment variables validated with zod, and may be overridden at
 * runtime (tests flip `raiseListenerErrors` to surface listener failures).
 * Values are matched case-insensitively; an invalid value falls back to its
 * default and is reported as a warning, never thrown.
 *
 * | Variable                 | Setting               | Default  |
 * |--------------------------|-----------------------|----------|
 * | `EVENT_BUS_RAISE_ERRORS` | `raiseListenerErrors` | `false`  |
 * | `LOG_LEVEL`              | `logLevel`            | `info`   |
 * | `SERVICE_NAME`           | `serviceName`         | `ctxhub` |
 *
 * @version 1.0.0
 */

import { z } from 'zod';

import { getModuleLogger } from '../logging/logger';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

/** Case-insensitive, surrounding whitespace ignored */
const normalized = z.string().trim().toLowerCase();

const booleanFlag = normalized
  .default('false')
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((value) => value === 'true' || value === '1');

const logLevel = normalized.default('info').pipe(z.enum(LOG_LEVELS));

const serviceName = z.string().trim().min(1).default('ctxhub');

/**
 * Strict view of the environment, used only to report invalid values.
 */
const EnvSchema = z.object({
  /** Propagate the first listener error out of dispatch instead of logging it */
  EVENT_BUS_RAISE_ERRORS: booleanFlag,

  /** pino log level */
  LOG_LEVEL: logLevel,

  /** Service name bound to every log line */
  SERVICE_NAME: serviceName,
});

/**
 * Lenient view: an invalid value falls back to its default.
 */
const LenientEnvSchema = z.object({
  EVENT_BUS_RAISE_ERRORS: booleanFlag.catch(false),
  LOG_LEVEL: logLevel.catch('info'),
  SERVICE_NAME: serviceName.catch('ctxhub'),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Validated runtime configuration.
 */
export interface IRuntimeConfig {
  /**
   * Listener failure policy. `false` (swallow): log each failure and keep
   * dispatching. `true` (raise): the first failure aborts the dispatch and
   * propagates to its caller.
   */
  readonly raiseListenerErrors: boolean;

  readonly logLevel: LogLevel;

  readonly serviceName: string;
}

/**
 * Outcome of reading the environment.
 */
export interface IRuntimeConfigResult {
  readonly config: IRuntimeConfig;

  /**
   * One `VARIABLE: message` entry per value that was replaced by its default.
   */
  readonly issues: readonly string[];
}

/**
 * Parse runtime configuration from an environment record. Never throws:
 * invalid values fall back to their defaults and are listed in `issues`.
 */
export function parseRuntimeConfig(env: Readonly<Record<string, string | undefined>>): IRuntimeConfigResult {
  const strict = EnvSchema.safeParse(env);
  const issues = strict.success
    ? []
    : strict.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);

  const data = strict.success ? strict.data : LenientEnvSchema.parse(env);
  return {
    config: {
      raiseListenerErrors: data.EVENT_BUS_RAISE_ERRORS,
      logLevel: data.LOG_LEVEL,
      serviceName: data.SERVICE_NAME,
    },
    issues,
  };
}

/**
 * Runtime configuration of an environment record, invalid values replaced by defaults.
 */
export function loadRuntimeConfig(env: Readonly<Record<string, string | undefined>>): IRuntimeConfig {
  return parseRuntimeConfig(env).config;
}

let activeConfig: IRuntimeConfig | undefined;

/**
 * Current runtime configuration, loaded from `process.env` on first access.
 * Invalid variables are logged once as a warning.
 */
export function getRuntimeConfig(): IRuntimeConfig {
  if (activeConfig === undefined) {
    const { config, issues } = parseRuntimeConfig(process.env);
    activeConfig = config;
    if (issues.length > 0) {
      getModuleLogger('config').warn({ issues }, 'Ignoring invalid runtime configuration values');
    }
  }
  return activeConfig;
}

/**
 * Override part of the runtime configuration.
 *
 * @returns The configuration now in effect
 *
 * @example
 * ```typescript
 * configure({ raiseListenerErrors: true });
 * ```
 */
export function configure(overrides: Partial<IRuntimeConfig>): IRuntimeConfig {
  activeConfig = { ...getRuntimeConfig(), ...overrides };
  return activeConfig;
}

/**
 * Drop overrides; the next read reloads from `process.env`.
 */
export function resetRuntimeConfig(): void {
  activeConfig = undefined;
}
