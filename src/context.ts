/**
 * Request-scoped context.
 * A typed bag of correlation fields travelling with an AbortSignal. Child
 * contexts are derived, never mutated, so cancellation and metadata only
 * flow downward.
 */

import { CancelledError, DeadlineExceededError } from './errors.js';

export interface RequestContext {
  readonly signal: AbortSignal;
  readonly requestId?: string;
  readonly workerName?: string;
  readonly platform?: string;
  readonly traceId?: string;
  readonly spanId?: string;
  readonly parentSpanId?: string;
  /** 0 on the first try, set by the Retry middleware. */
  readonly retryAttempt?: number;
}

export type ContextFields = Omit<RequestContext, 'signal'>;

export type ContextError = CancelledError | DeadlineExceededError;

/** A context that is never cancelled. */
export function backgroundContext(fields: ContextFields = {}): RequestContext {
  return { ...fields, signal: new AbortController().signal };
}

export function withFields(parent: RequestContext, fields: ContextFields): RequestContext {
  return { ...parent, ...fields };
}

export interface CancellableContext {
  ctx: RequestContext;
  /** Release timers and listeners; aborts the child with CancelledError if still live. */
  cancel: () => void;
}

/**
 * Derive a child whose signal aborts when the parent does or when `cancel`
 * is called. The abort reason is always a CancelledError or
 * DeadlineExceededError.
 */
export function withCancel(parent: RequestContext): CancellableContext {
  const { ctx, controller, detach } = derive(parent);
  return {
    ctx,
    cancel: () => {
      detach();
      if (!controller.signal.aborted) controller.abort(new CancelledError());
    },
  };
}

/** Like withCancel, and also aborts with DeadlineExceededError after `timeoutMs`. */
export function withTimeout(parent: RequestContext, timeoutMs: number): CancellableContext {
  const { ctx, controller, detach } = derive(parent);
  const timer = setTimeout(() => {
    if (!controller.signal.aborted) controller.abort(new DeadlineExceededError());
  }, timeoutMs);

  return {
    ctx,
    cancel: () => {
      clearTimeout(timer);
      detach();
      if (!controller.signal.aborted) controller.abort(new CancelledError());
    },
  };
}

/** The error an aborted context reports; null while it is live. */
export function contextError(ctx: RequestContext): ContextError | null {
  if (!ctx.signal.aborted) return null;
  return toContextError(ctx.signal.reason);
}

/**
 * Resolve when the signal aborts. The promise never rejects; `dispose`
 * detaches the listener once the race is decided elsewhere.
 */
export function onAbort(signal: AbortSignal): { promise: Promise<void>; dispose: () => void } {
  let listener: (() => void) | null = null;
  const promise = new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    listener = () => resolve();
    signal.addEventListener('abort', listener, { once: true });
  });

  return {
    promise,
    dispose: () => {
      if (listener) signal.removeEventListener('abort', listener);
    },
  };
}

export function toContextError(reason: unknown): ContextError {
  if (reason instanceof CancelledError || reason instanceof DeadlineExceededError) {
    return reason;
  }
  if (reason instanceof Error && reason.name === 'TimeoutError') {
    return new DeadlineExceededError();
  }
  return new CancelledError();
}

function derive(parent: RequestContext) {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(toContextError(parent.signal.reason));

  if (parent.signal.aborted) {
    onParentAbort();
  } else {
    parent.signal.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    ctx: { ...parent, signal: controller.signal } satisfies RequestContext,
    controller,
    detach: () => parent.signal.removeEventListener('abort', onParentAbort),
  };
}
