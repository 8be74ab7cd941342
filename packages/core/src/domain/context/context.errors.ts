/**
 * @fileoverview Context Errors - Execution Context Error Classes
 *
 * @packageDocumentation
 * @module @ctxhub/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Error classes raised by the execution-context tree and its scoped
 * "current context" variable.
 *
 * @version 1.0.0
 */

/**
 * Base error class for all context-related errors.
 *
 * @remarks
 * ```typescript
 * try {
 *   ctx.setSafe('user', user);
 * } catch (error) {
 *   if (error instanceof ContextError) {
 *     logger.warn({ err: error, context: error.contextIdentifier }, error.message);
 *   }
 * }
 * ```
 */
export abstract class ContextError extends Error {
  /**
   * Identifier of the context involved, when there is one.
   */
  public readonly contextIdentifier: string | undefined;

  constructor(message: string, contextIdentifier?: string) {
    super(message);
    this.name = this.constructor.name;
    this.contextIdentifier = contextIdentifier;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown by `setSafe` when the key is already present in the context's own data.
 *
 * @remarks
 * Only the context's own data is checked. A value inherited from an
 * ancestor may be shadowed with `setSafe`.
 */
export class DuplicateKeyError extends ContextError {
  public readonly key: string;

  constructor(key: string, contextIdentifier: string) {
    super(`Cannot overwrite key '${key}' of execution context '${contextIdentifier}'`, contextIdentifier);
    this.key = key;
  }
}

/**
 * Thrown when a parent is added to the root context.
 *
 * @remarks
 * The root context is the top of every tree. Giving it a parent is a
 * programming error and the parent list is left unchanged.
 */
export class RootParentError extends ContextError {
  constructor(contextIdentifier: string) {
    super(`Cannot add a parent to the root execution context '${contextIdentifier}'`, contextIdentifier);
  }
}

/**
 * Thrown by `require` when a key is absent from the whole primary-parent chain.
 */
export class KeyNotFoundError extends ContextError {
  public readonly key: string;

  constructor(key: string, contextIdentifier: string) {
    super(
      `Key '${key}' not found in execution context '${contextIdentifier}' or its ancestors`,
      contextIdentifier,
    );
    this.key = key;
  }
}

/**
 * Thrown when a scoped variable is read before it ever received a value.
 *
 * @remarks
 * The process-wide current-context variable defaults to the root context,
 * so seeing this error from it means that invariant was broken.
 */
export class NoActiveContextError extends ContextError {
  public readonly variableName: string;

  constructor(variableName: string) {
    super(`Scoped variable '${variableName}' has no value in the current execution scope`);
    this.variableName = variableName;
  }
}

/**
 * Reported (never thrown) when a restore token no longer matches the
 * variable's state, usually because a context was ended from a different
 * async scope than the one that created it.
 */
export class ContextRestoreWarning extends ContextError {
  public readonly variableName: string;

  constructor(variableName: string, reason: string) {
    super(`Could not restore scoped variable '${variableName}': ${reason}`);
    this.variableName = variableName;
  }
}
