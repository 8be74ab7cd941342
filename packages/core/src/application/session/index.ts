/**
 * @fileoverview Application Session Module Exports
 *
 * @packageDocumentation
 * @module @ctxhub/core/application/session
 * @license Apache-2.0
 */

export { withContext, type SessionCallback } from './scoped-session';

export {
  ContextSessionBehavior,
  TRACE_ID_KEY,
  ABORT_SIGNAL_KEY,
  type IContextSessionBehaviorOptions,
  type IPipelineBehavior,
  type IHandlerContext,
} from './context-session.behavior';
