/**
 * Use case interface.
 * The business logic at the innermost position of the chain. It sees only
 * the normalized request and never knows which transport delivered it.
 */

import type { RequestContext } from '../context.js';
import type { DispatchRequest, HandlerResult } from '../types/models.js';

export interface IUseCase {
  /** Identifies the worker in logs, metrics and health output. */
  readonly name: string;

  /**
   * Handle one request. Return an unsuccessful response (with an explicit
   * `retryable`) for expected failures; set `error` only for hard failures.
   */
  process(ctx: RequestContext, req: DispatchRequest): Promise<HandlerResult>;

  /** Reject when a dependency the use case needs is unreachable. */
  health(ctx: RequestContext): Promise<void>;
}
