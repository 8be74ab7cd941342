/**
 * @fileoverview Infrastructure Events Module Exports
 *
 * @packageDocumentation
 * @module @ctxhub/core/infrastructure/events
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * - **EventBus**: the IEventBus implementation
 * - **Hub**: the process-wide bus and its module-level shortcuts
 */

export { EventBus, type IEventBusOptions } from './event-bus';

export {
  getEventBus,
  setEventBus,
  resetEventBus,
  on,
  onAll,
  off,
  offAll,
  hasListeners,
  dispatch,
  dispatchWithResults,
  resetListeners,
} from './hub';
