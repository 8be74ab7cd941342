/**
 * @fileoverview IEventBus - Publish/Subscribe Contract
 *
 * @packageDocumentation
 * @module @ctxhub/core/domain/events
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * The event bus decouples code that performs work from code that observes
 * it. Producers dispatch string event ids with positional arguments,
 * observers subscribe listeners to those ids. Neither side knows the other.
 *
 * ```
 *  integration code                       product code
 *  ────────────────                       ────────────
 *  dispatch('http.blocked', [call]) ──┐
 *                                     ├──► on('http.blocked', block)
 *                                     └──► onAll(auditEveryEvent)
 * ```
 *
 * @version 1.0.0
 */

/**
 * A subscribed callable, invoked with the dispatch arguments spread positionally.
 *
 * @template TArgs - Positional argument types
 *
 * @remarks
 * Declared through a method signature so that listeners taking narrower
 * argument types (for example `(ctx: ExecutionContext) => void`) can be
 * subscribed to an untyped bus.
 */
export type Listener<TArgs extends readonly unknown[] = unknown[]> = {
  bivarianceHack(...args: TArgs): unknown;
}['bivarianceHack'];

/**
 * A listener receiving every event, with the event id and the raw argument list.
 */
export type WildcardListener = (eventId: string, args: readonly unknown[]) => unknown;

/**
 * Outcome of one listener call in a result-collecting dispatch.
 *
 * @remarks
 * Tagged so that a listener that succeeded and returned nothing is
 * distinguishable from one that failed.
 */
export type ListenerOutcome =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly error: unknown };

/**
 * Result of `dispatchWithResults`.
 *
 * @remarks
 * All three arrays have one entry per per-event listener, in invocation
 * order. `results[i]` is undefined when listener i failed and
 * `exceptions[i]` is undefined when it succeeded.
 */
export interface IDispatchResult {
  readonly outcomes: readonly ListenerOutcome[];
  readonly results: readonly unknown[];
  readonly exceptions: readonly unknown[];
}

/**
 * IEventBus - Listener registry and synchronous dispatch engine.
 */
export interface IEventBus {
  /**
   * Add a listener for an event id. No-op if it is already subscribed to that id.
   */
  subscribe(eventId: string, listener: Listener): void;

  /**
   * Add a listener that receives every event before any per-event listener.
   */
  subscribeAll(listener: WildcardListener): void;

  /**
   * Remove a listener. Never throws.
   */
  unsubscribe(eventId: string, listener: Listener): void;

  /**
   * Remove a wildcard listener. Never throws.
   */
  unsubscribeAll(listener: WildcardListener): void;

  hasListeners(eventId: string): boolean;

  /**
   * Invoke every listener of `eventId`, discarding return values.
   */
  dispatch(eventId: string, args?: readonly unknown[]): void;

  /**
   * Invoke every listener of `eventId`, collecting per-listener outcomes.
   */
  dispatchWithResults(eventId: string, args?: readonly unknown[]): IDispatchResult;

  /**
   * Drop every registered listener, wildcard ones included.
   */
  reset(): void;
}
