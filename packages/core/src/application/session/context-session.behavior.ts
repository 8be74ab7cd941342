/**
 * @fileoverview ContextSessionBehavior - Pipeline Context Integration
 *
 * @packageDocumentation
 * @module @ctxhub/core/application/session
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Wraps each command/query handler call in `withContext()`, so every
 * handler runs in its own ExecutionContext and the lifecycle events fire
 * around it.
 *
 * ```
 * ┌─────────────┐
 * │   Command   │  (or Query)
 * └──────┬──────┘
 *        ▼
 * ┌─────────────────────────────────────────────┐
 * │ ContextSessionBehavior                      │
 * │   withContext('pipeline.CreateUser', ...)   │
 * │     ├─ context.started.pipeline.CreateUser  │
 * │     ├─ next()  ──► other behaviors/handler  │
 * │     └─ context.ended.pipeline.CreateUser    │
 * └─────────────────────────────────────────────┘
 * ```
 *
 * Should be the FIRST behavior in the pipeline so that every other
 * behavior sees the context.
 *
 * @version 1.0.0
 */

import { randomUUID } from 'crypto';

import { type ContextData, ContextKey } from '../../domain/context';

import { withContext } from './scoped-session';

// ============================================================================
// Pipeline Types
// ============================================================================

/**
 * Per-call information handed to pipeline behaviors.
 */
export interface IHandlerContext {
  /** Cancellation signal of the caller */
  readonly signal?: AbortSignal;
}

/**
 * Pipeline behavior interface - wraps handler execution.
 *
 * @template TRequest - Command or Query type
 * @template TResponse - Handler response type
 */
export interface IPipelineBehavior<TRequest = unknown, TResponse = unknown> {
  /**
   * Handle the request with access to the next delegate.
   *
   * @param request - The command or query
   * @param next - Function to call the next behavior/handler
   * @param ctx - Handler context
   * @returns Response from the handler
   */
  handle(request: TRequest, next: () => Promise<TResponse>, ctx?: IHandlerContext): Promise<TResponse>;
}

// ============================================================================
// Context Keys
// ============================================================================

export const TRACE_ID_KEY = new ContextKey<string>('trace.id', {
  description: 'Trace id of the pipeline request',
});

export const ABORT_SIGNAL_KEY = new ContextKey<AbortSignal>('abort.signal', {
  description: 'Cancellation signal of the caller',
});

// ============================================================================
// ContextSessionBehavior
// ============================================================================

/**
 * Configuration for ContextSessionBehavior.
 */
export interface IContextSessionBehaviorOptions {
  /**
   * Prefix of the context identifier. The request's constructor name is
   * appended when it has one. Default: 'pipeline'
   */
  identifierPrefix?: string;

  /**
   * Extract initial context data from a request.
   * Default: copies string `traceId`, `userId`, `commandId` and `queryId` fields.
   */
  extractContextData?: (request: unknown) => ContextData;

  /**
   * Generate a trace id when the extracted data has none.
   * Default: crypto.randomUUID
   */
  generateTraceId?: () => string;
}

const FORWARDED_FIELDS = ['traceId', 'userId', 'commandId', 'queryId'] as const;

function defaultExtractContextData(request: unknown): ContextData {
  if (typeof request !== 'object' || request === null) {
    return {};
  }

  const data: Record<string, unknown> = {};
  for (const field of FORWARDED_FIELDS) {
    const value: unknown = Reflect.get(request, field);
    if (typeof value === 'string') {
      data[field] = value;
    }
  }
  return data;
}

function requestName(request: unknown): string | undefined {
  if (typeof request !== 'object' || request === null) {
    return undefined;
  }
  const constructor: unknown = Reflect.get(request, 'constructor');
  if (typeof constructor !== 'function' || constructor === Object || constructor.name === '') {
    return undefined;
  }
  return constructor.name;
}

/**
 * ContextSessionBehavior - Runs each pipeline request in its own ExecutionContext.
 *
 * @example
 * ```typescript
 * class CreateUserCommand {
 *   constructor(readonly name: string, readonly traceId?: string) {}
 * }
 *
 * on('context.started.pipeline.CreateUserCommand', (ctx: ExecutionContext) => {
 *   logger.info({ traceId: ctx.getItem(TRACE_ID_KEY) }, 'command started');
 * });
 *
 * const behavior = new ContextSessionBehavior();
 * await behavior.handle(new CreateUserCommand('Ada'), () => handler.execute(command));
 * ```
 */
export class ContextSessionBehavior<TRequest = unknown, TResponse = unknown>
  implements IPipelineBehavior<TRequest, TResponse>
{
  private readonly identifierPrefix: string;
  private readonly extractContextData: (request: unknown) => ContextData;
  private readonly generateTraceId: () => string;

  constructor(options: IContextSessionBehaviorOptions = {}) {
    this.identifierPrefix = options.identifierPrefix ?? 'pipeline';
    this.extractContextData = options.extractContextData ?? defaultExtractContextData;
    this.generateTraceId = options.generateTraceId ?? randomUUID;
  }

  /**
   * Identifier of the context created for `request`.
   */
  identifierFor(request: TRequest): string {
    const name = requestName(request);
    return name === undefined ? this.identifierPrefix : `${this.identifierPrefix}.${name}`;
  }

  handle(request: TRequest, next: () => Promise<TResponse>, ctx: IHandlerContext = {}): Promise<TResponse> {
    const extracted = this.extractContextData(request);
    const traceId = extracted['traceId'];

    const data: Record<string, unknown> = {
      ...extracted,
      [TRACE_ID_KEY.id]: typeof traceId === 'string' ? traceId : this.generateTraceId(),
    };
    if (ctx.signal) {
      data[ABORT_SIGNAL_KEY.id] = ctx.signal;
    }

    return withContext(this.identifierFor(request), { data }, () => next());
  }
}
