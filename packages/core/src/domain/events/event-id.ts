/**
 * @fileoverview Event Id Naming
 *
 * @packageDocumentation
 * @module @ctxhub/core/domain/events
 * @license Apache-2.0
 *
 * Event ids follow `<category>.<phase>.<identifier>`. The bus itself only
 * compares ids as strings; these helpers keep the lifecycle names in one place.
 */

export const CONTEXT_EVENT_CATEGORY = 'context';

export type ContextPhase = 'started' | 'ended';

export function eventId(category: string, phase: string, identifier: string): string {
  return `${category}.${phase}.${identifier}`;
}

/**
 * Lifecycle event id of a context for the given phase.
 */
export function contextEvent(phase: ContextPhase, identifier: string): string {
  return eventId(CONTEXT_EVENT_CATEGORY, phase, identifier);
}

/**
 * `context.started.<identifier>`, dispatched when a context is created.
 */
export function contextStartedEvent(identifier: string): string {
  return contextEvent('started', identifier);
}

/**
 * `context.ended.<identifier>`, dispatched when a context ends.
 */
export function contextEndedEvent(identifier: string): string {
  return contextEvent('ended', identifier);
}
