/**
 * @fileoverview EventBus - In-Process Listener Registry and Dispatch
 *
 * @packageDocumentation
 * @module @ctxhub/core/infrastructure/events
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Synchronous fan-out of string event ids to subscribed listeners. A slow
 * listener delays whoever dispatched the event; there is no deferred path.
 *
 * ## Dispatch Order
 *
 * ```
 * dispatch('e', [a, b])
 *   1. wildcard listeners, in subscription order:  w('e', [a, b])
 *   2. listeners of 'e', in subscription order:    l(a, b)
 * ```
 *
 * Both lists are copied when the dispatch starts. A listener that
 * subscribes or unsubscribes during a dispatch changes the next dispatch,
 * never the one in flight.
 *
 * ## Failure Policy
 *
 * Read from `getRuntimeConfig().raiseListenerErrors` at every dispatch:
 *
 * - **swallow** (default): each failure is logged and the remaining
 *   listeners still run.
 * - **raise**: the first failure propagates to the dispatch caller and the
 *   remaining listeners are skipped.
 *
 * @version 1.0.0
 */

import {
  type IDispatchResult,
  type IEventBus,
  type Listener,
  type ListenerOutcome,
  type WildcardListener,
} from '../../domain/events';
import { getRuntimeConfig } from '../config/runtime-config';
import { type Logger, getModuleLogger } from '../logging/logger';

/**
 * Construction options for EventBus.
 */
export interface IEventBusOptions {
  /**
   * Logger for listener failures. Default: the library's `event-bus` module logger.
   */
  logger?: Logger;

  /**
   * Failure policy source. Default: the process-wide runtime configuration.
   */
  raiseErrors?: () => boolean;
}

/**
 * EventBus - IEventBus implementation over insertion-ordered Sets.
 *
 * @remarks
 * A Set per event id gives both the ordering and the "one entry per
 * listener" rule: re-subscribing an existing listener keeps its original
 * position.
 *
 * @example
 * ```typescript
 * const bus = new EventBus();
 *
 * bus.subscribe('context.started.web.request', (ctx: ExecutionContext) => {
 *   ctx.setItem('started_at', Date.now());
 * });
 *
 * const { results, exceptions } = bus.dispatchWithResults('waf.check', [request]);
 * ```
 */
export class EventBus implements IEventBus {
  private readonly listeners = new Map<string, Set<Listener>>();
  private readonly wildcardListeners = new Set<WildcardListener>();
  private readonly options: IEventBusOptions;
  private logger: Logger | undefined;

  constructor(options: IEventBusOptions = {}) {
    this.options = options;
    this.logger = options.logger;
  }

  // ============================================================================
  // Registration
  // ============================================================================

  subscribe(eventId: string, listener: Listener): void {
    const registered = this.listeners.get(eventId);
    if (registered) {
      registered.add(listener);
    } else {
      this.listeners.set(eventId, new Set([listener]));
    }
  }

  subscribeAll(listener: WildcardListener): void {
    this.wildcardListeners.add(listener);
  }

  unsubscribe(eventId: string, listener: Listener): void {
    const registered = this.listeners.get(eventId);
    if (!registered) {
      return;
    }
    registered.delete(listener);
    if (registered.size === 0) {
      this.listeners.delete(eventId);
    }
  }

  unsubscribeAll(listener: WildcardListener): void {
    this.wildcardListeners.delete(listener);
  }

  hasListeners(eventId: string): boolean {
    return (this.listeners.get(eventId)?.size ?? 0) > 0;
  }

  /**
   * Event ids that currently have at least one listener.
   */
  eventIds(): string[] {
    return Array.from(this.listeners.keys());
  }

  reset(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
  }

  // ============================================================================
  // Dispatch
  // ============================================================================

  dispatch(eventId: string, args: readonly unknown[] = []): void {
    const [wildcards, listeners] = this.snapshot(eventId);
    if (wildcards.length === 0 && listeners.length === 0) {
      return;
    }
    const raise = this.shouldRaise();

    this.notifyWildcards(wildcards, eventId, args, raise);

    for (const listener of listeners) {
      try {
        this.observe(listener(...args), eventId);
      } catch (error) {
        if (raise) {
          throw error;
        }
        this.reportFailure(error, eventId);
      }
    }
  }

  dispatchWithResults(eventId: string, args: readonly unknown[] = []): IDispatchResult {
    const [wildcards, listeners] = this.snapshot(eventId);
    if (wildcards.length === 0 && listeners.length === 0) {
      return { outcomes: [], results: [], exceptions: [] };
    }
    const raise = this.shouldRaise();

    this.notifyWildcards(wildcards, eventId, args, raise);

    const outcomes: ListenerOutcome[] = [];
    const results: unknown[] = [];
    const exceptions: unknown[] = [];

    for (const listener of listeners) {
      try {
        const value = this.observe(listener(...args), eventId);
        outcomes.push({ ok: true, value });
        results.push(value);
        exceptions.push(undefined);
      } catch (error) {
        if (raise) {
          throw error;
        }
        this.reportFailure(error, eventId);
        outcomes.push({ ok: false, error });
        results.push(undefined);
        exceptions.push(error);
      }
    }

    return { outcomes, results, exceptions };
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private snapshot(eventId: string): [WildcardListener[], Listener[]] {
    return [
      Array.from(this.wildcardListeners),
      Array.from(this.listeners.get(eventId) ?? []),
    ];
  }

  private notifyWildcards(
    wildcards: readonly WildcardListener[],
    eventId: string,
    args: readonly unknown[],
    raise: boolean,
  ): void {
    for (const listener of wildcards) {
      try {
        this.observe(listener(eventId, args), eventId);
      } catch (error) {
        if (raise) {
          throw error;
        }
        this.reportFailure(error, eventId);
      }
    }
  }

  /**
   * Attach a rejection handler to promise results so async listeners never
   * produce unhandled rejections. The original value is returned untouched.
   */
  private observe(value: unknown, eventId: string): unknown {
    if (value instanceof Promise) {
      value.catch((error: unknown) => {
        this.reportFailure(error, eventId);
      });
    }
    return value;
  }

  private shouldRaise(): boolean {
    return this.options.raiseErrors ? this.options.raiseErrors() : getRuntimeConfig().raiseListenerErrors;
  }

  private reportFailure(error: unknown, eventId: string): void {
    if (this.logger === undefined) {
      this.logger = getModuleLogger('event-bus');
    }
    this.logger.error({ err: error, eventId }, `Listener failed while handling '${eventId}'`);
  }
}
