/**
 * @fileoverview Event Hub - Process-wide Bus and Module-level Shortcuts
 *
 * @packageDocumentation
 * @module @ctxhub/core/infrastructure/events
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * One EventBus is created at module load and used by every call site that
 * does not name a bus. `setEventBus()` swaps it for another instance, so
 * tests can isolate listeners without touching the code under test.
 *
 * ```typescript
 * import { on, dispatch } from '@ctxhub/core';
 *
 * on('http.blocked', () => setItem(REQUEST_BLOCKED, true));
 * dispatch('http.blocked', [call]);
 * ```
 *
 * @version 1.0.0
 */

import {
  type IDispatchResult,
  type IEventBus,
  type Listener,
  type WildcardListener,
} from '../../domain/events';

import { EventBus } from './event-bus';

const defaultBus: IEventBus = new EventBus();
let activeBus: IEventBus = defaultBus;

/**
 * The bus used by module-level shortcuts and by contexts created without an explicit bus.
 */
export function getEventBus(): IEventBus {
  return activeBus;
}

/**
 * Replace the process-wide bus.
 *
 * @returns The bus that was active before
 */
export function setEventBus(bus: IEventBus): IEventBus {
  const previous = activeBus;
  activeBus = bus;
  return previous;
}

/**
 * Reinstate the bus created at module load.
 */
export function resetEventBus(): void {
  activeBus = defaultBus;
}

// ============================================================================
// Shortcuts
// ============================================================================

export function on(eventId: string, listener: Listener): void {
  activeBus.subscribe(eventId, listener);
}

export function onAll(listener: WildcardListener): void {
  activeBus.subscribeAll(listener);
}

export function off(eventId: string, listener: Listener): void {
  activeBus.unsubscribe(eventId, listener);
}

export function offAll(listener: WildcardListener): void {
  activeBus.unsubscribeAll(listener);
}

export function hasListeners(eventId: string): boolean {
  return activeBus.hasListeners(eventId);
}

export function dispatch(eventId: string, args: readonly unknown[] = []): void {
  activeBus.dispatch(eventId, args);
}

export function dispatchWithResults(eventId: string, args: readonly unknown[] = []): IDispatchResult {
  return activeBus.dispatchWithResults(eventId, args);
}

/**
 * Remove every listener from the active bus.
 */
export function resetListeners(): void {
  activeBus.reset();
}
