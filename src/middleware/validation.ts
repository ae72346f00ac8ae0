/**
 * Request validation middleware.
 * Normalizes the request (id, timestamp, metadata) and rejects it with a
 * VALIDATION_ERROR response when type or payload are unusable. Rejections
 * return no error and never reach `next`.
 */

import { randomUUID } from 'node:crypto';
import { ERROR_CODES } from '../errors.js';
import { errorResponse, type DispatchRequest } from '../types/models.js';
import type { HandlerFunc, Middleware } from './pipeline.js';

/** Fill in id, timestamp and metadata. Returns a copy; already-normalized input comes back equal. */
export function normalizeRequest(req: DispatchRequest): DispatchRequest {
  const metadata = { ...(req.metadata ?? {}) };
  if (!metadata.validated_at) {
    metadata.validated_at = new Date().toISOString();
  }

  return {
    ...req,
    id: req.id || randomUUID(),
    timestamp: req.timestamp ?? new Date(),
    metadata,
  };
}

export function isValidJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

export function createValidationMiddleware(): Middleware {
  return (next: HandlerFunc): HandlerFunc => {
    return async (ctx, raw) => {
      const req = normalizeRequest(raw);

      if (!req.type) {
        return {
          response: errorResponse(
            req.id,
            ERROR_CODES.VALIDATION_ERROR,
            'Request type is required',
            "Missing 'type' field in request"
          ),
        };
      }

      if (req.payload.length === 0) {
        return {
          response: errorResponse(
            req.id,
            ERROR_CODES.VALIDATION_ERROR,
            'Request payload is required',
            'Empty payload'
          ),
        };
      }

      if (!isValidJson(req.payload)) {
        return {
          response: errorResponse(
            req.id,
            ERROR_CODES.VALIDATION_ERROR,
            'Invalid JSON payload',
            'Payload must be valid JSON'
          ),
        };
      }

      return next(ctx, req);
    };
  };
}
