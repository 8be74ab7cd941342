/**
 * @fileoverview Domain Events Module Exports
 *
 * @packageDocumentation
 * @module @ctxhub/core/domain/events
 * @license Apache-2.0
 */

export {
  type IEventBus,
  type IDispatchResult,
  type Listener,
  type ListenerOutcome,
  type WildcardListener,
} from './event-bus.interface';

export {
  CONTEXT_EVENT_CATEGORY,
  type ContextPhase,
  eventId,
  contextEvent,
  contextStartedEvent,
  contextEndedEvent,
} from './event-id';
