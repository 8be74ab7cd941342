/**
 * @fileoverview withContext - Scoped Execution Context Sessions
 *
 * @packageDocumentation
 * @module @ctxhub/core/application/session
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Runs a callback inside a fresh ExecutionContext and guarantees the
 * context is ended exactly once, however the callback exits:
 *
 * ```
 * withContext('web.request', { data }, (ctx) => handle(ctx))
 *   CURRENT_CONTEXT.fork ─┐
 *                         ├─ new ExecutionContext  → context.started.web.request
 *                         ├─ callback(ctx)         (returns, throws, or returns a promise)
 *                         └─ ctx.end()             → context.ended.web.request
 * ```
 *
 * The fork keeps the new context from leaking into the caller's
 * synchronous continuation; once `withContext` returns, the caller sees the
 * context it had before.
 *
 * @version 1.0.0
 */

import { CURRENT_CONTEXT, ExecutionContext, type IExecutionContextOptions } from '../../infrastructure/context';
import { getModuleLogger } from '../../infrastructure/logging';

/**
 * Body of a session.
 */
export type SessionCallback<R> = (context: ExecutionContext) => R;

/**
 * Run `callback` inside a new context named `identifier`.
 *
 * @returns Whatever the callback returns. A promise result is replaced by
 * one that settles the same way after the context has ended.
 *
 * @remarks
 * When the callback fails and ending the context fails too, the callback's
 * error is the one thrown.
 *
 * @example
 * ```typescript
 * const user = await withContext('web.request', { data: { route: '/users' } }, async (ctx) => {
 *   ctx.setItem('user', await authenticate());
 *   return loadUser();
 * });
 * ```
 */
export function withContext<R>(identifier: string, callback: SessionCallback<R>): R;
export function withContext<R>(
  identifier: string,
  options: IExecutionContextOptions,
  callback: SessionCallback<R>,
): R;
export function withContext(
  identifier: string,
  optionsOrCallback: IExecutionContextOptions | SessionCallback<unknown>,
  maybeCallback?: SessionCallback<unknown>,
): unknown {
  const options = typeof optionsOrCallback === 'function' ? {} : optionsOrCallback;
  const callback = typeof optionsOrCallback === 'function' ? optionsOrCallback : maybeCallback;
  if (callback === undefined) {
    throw new TypeError(`withContext('${identifier}') requires a callback`);
  }

  return CURRENT_CONTEXT.fork(() => {
    const context = new ExecutionContext(identifier, options);

    let result: unknown;
    try {
      result = callback(context);
    } catch (error) {
      endAfterFailure(context);
      throw error;
    }

    if (result instanceof Promise) {
      return result.then(
        (value: unknown) => {
          context.end();
          return value;
        },
        (error: unknown) => {
          endAfterFailure(context);
          throw error;
        },
      );
    }

    context.end();
    return result;
  });
}

/**
 * End a context whose callback failed. The callback's error stays the one
 * the caller sees; a failure of `end()` itself is logged.
 */
function endAfterFailure(context: ExecutionContext): void {
  try {
    context.end();
  } catch (endError) {
    getModuleLogger('session').error(
      { err: endError, context: context.identifier },
      `Ending context '${context.identifier}' failed after its callback failed`,
    );
  }
}
