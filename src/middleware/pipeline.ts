/**
 * Composable middleware pipeline for the dispatch handler.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

import type { RequestContext } from '../context.js';
import type { DispatchRequest, HandlerResult } from '../types/models.js';

export type HandlerFunc = (ctx: RequestContext, req: DispatchRequest) => Promise<HandlerResult>;
export type Middleware = (next: HandlerFunc) => HandlerFunc;

/**
 * Compose middleware into a function that wraps a handler.
 * Middleware is applied left-to-right:
 *   pipeline(recovery, timeout)(useCase)
 *   → recovery wraps (timeout wraps useCase)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: HandlerFunc): HandlerFunc => {
    return middlewares.reduceRight<HandlerFunc>((next, mw) => mw(next), handler);
  };
}
