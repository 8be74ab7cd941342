/**
 * @fileoverview ContextKey<T> - Typed Execution Context Key
 *
 * @packageDocumentation
 * @module @ctxhub/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * Execution contexts store their data under plain string keys so that
 * independently written collaborators can share values by convention.
 * A ContextKey<T> wraps such a string and carries the value type, so
 * collaborators that own a key get compile-time checking on both sides.
 *
 * ```typescript
 * // Untyped: any collaborator can read or write 'flask.request'
 * ctx.setItem('blocked', true);
 * const blocked = ctx.getItem('blocked'); // unknown
 *
 * // Typed: same storage slot, checked value type
 * const BLOCKED = new ContextKey<boolean>('blocked', { defaultValue: false });
 * ctx.setItem(BLOCKED, true);
 * const isBlocked = ctx.getItem(BLOCKED); // boolean | undefined
 * ```
 *
 * @version 1.0.0
 */

/**
 * Symbol used as internal brand for type discrimination.
 * @internal
 */
const CONTEXT_KEY_BRAND = Symbol('ContextKey');

/**
 * ContextKey<T> - A typed name for a slot in an execution context.
 *
 * @template T - The type of value this key stores
 *
 * @remarks
 * The key's `id` is the string actually stored in the context, so a typed
 * key and the equivalent string key address the same slot. Lookups through
 * a key with a `defaultValue` return that default when the slot is absent
 * from the whole parent chain and no explicit default was passed.
 *
 * Instances are frozen and may be shared freely.
 *
 * @example
 * ```typescript
 * export const REQUEST_BLOCKED = new ContextKey<boolean>('http.request_blocked', {
 *   description: 'Set by security monitoring when the request must be refused',
 *   defaultValue: false,
 * });
 *
 * withContext('web.request', {}, (ctx) => {
 *   if (ctx.getItem(REQUEST_BLOCKED)) {
 *     return respond(403);
 *   }
 * });
 * ```
 */
export class ContextKey<T> {
  /** @internal */
  readonly [CONTEXT_KEY_BRAND]: true = true;

  /**
   * String under which the value is stored.
   */
  readonly id: string;

  /**
   * Human-readable description, used in error messages.
   */
  readonly description?: string;

  /**
   * Value returned by lookups that find nothing.
   */
  readonly defaultValue?: T;

  /**
   * Phantom field carrying the value type. Never set at runtime.
   * @internal
   */
  declare readonly _type: T;

  constructor(
    id: string,
    options?: {
      description?: string;
      defaultValue?: T;
    },
  ) {
    this.id = id;
    if (options?.description !== undefined) this.description = options.description;
    if (options?.defaultValue !== undefined) this.defaultValue = options.defaultValue;
    Object.freeze(this);
  }

  toString(): string {
    return `ContextKey(${this.id})`;
  }

  /**
   * Check if a value is a ContextKey instance.
   *
   * @example
   * ```typescript
   * ContextKey.isContextKey(new ContextKey<string>('a')); // true
   * ContextKey.isContextKey('a'); // false
   * ```
   */
  static isContextKey(value: unknown): value is ContextKey<unknown> {
    return (
      typeof value === 'object' &&
      value !== null &&
      CONTEXT_KEY_BRAND in value &&
      value[CONTEXT_KEY_BRAND] === true
    );
  }
}

/**
 * Extract the value type of a ContextKey.
 *
 * @example
 * ```typescript
 * const ATTEMPT = new ContextKey<number>('retry.attempt');
 * type Attempt = ContextKeyValue<typeof ATTEMPT>; // number
 * ```
 */
export type ContextKeyValue<K> = K extends ContextKey<infer V> ? V : never;

/**
 * Any key accepted by context accessors.
 */
export type ContextKeyLike = ContextKey<unknown> | string;

/**
 * Resolve the storage id of a key.
 */
export function resolveKeyId(key: ContextKeyLike): string {
  return typeof key === 'string' ? key : key.id;
}
