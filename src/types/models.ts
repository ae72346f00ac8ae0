/**
 * Normalized request/response shapes spoken by every layer.
 * Payloads and data stay as raw JSON text so adapters never re-encode
 * what a transport already delivered.
 */

import { randomUUID } from 'node:crypto';
import { isRetryableCode, type ErrorCode } from '../errors.js';

/** Transport tags set by the adapters. */
export type RequestSource = 'http' | 'sqs' | 'rabbitmq' | 'openfaas' | (string & {});

export interface DispatchRequest {
  /** Correlation id. Validation fills it when empty. */
  id: string;
  source: RequestSource;
  /** Logical operation name. */
  type: string;
  /** Raw JSON document. */
  payload: string;
  /** Transport context (headers, queue attributes). */
  metadata?: Record<string, string>;
  timestamp?: Date;
}

export interface ErrorInfo {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export interface DispatchResponse {
  /** Echoes the request id. */
  id: string;
  success: boolean;
  /** Raw JSON document, only when `success`. */
  data?: string;
  /** Only when not `success`. */
  error?: ErrorInfo;
  metadata: Record<string, string>;
  processedAt: Date;
  durationMs?: number;
}

/**
 * Outcome of one pass through a handler function.
 * `error` marks a hard failure beside the response; a use case
 * that merely failed returns an unsuccessful response without one.
 */
export interface HandlerResult {
  response: DispatchResponse;
  error?: Error;
}

export function createRequest(type: string, payload: unknown, source: RequestSource = ''): DispatchRequest {
  return {
    id: randomUUID(),
    source,
    type,
    payload: JSON.stringify(payload),
    metadata: {},
    timestamp: new Date(),
  };
}

/** Parse the request payload. Throws SyntaxError on malformed JSON. */
export function parsePayload<T = unknown>(req: Pick<DispatchRequest, 'payload'>): T {
  return JSON.parse(req.payload) as T;
}

export function successResponse(id: string, data?: unknown): DispatchResponse {
  return {
    id,
    success: true,
    ...(data !== undefined && { data: JSON.stringify(data) }),
    metadata: {},
    processedAt: new Date(),
  };
}

/** `retryable` defaults to whether `code` is one of the transient codes. */
export function errorResponse(
  id: string,
  code: ErrorCode,
  message: string,
  details?: string,
  retryable: boolean = isRetryableCode(code)
): DispatchResponse {
  return {
    id,
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
      retryable,
    },
    metadata: {},
    processedAt: new Date(),
  };
}

export function ok(response: DispatchResponse): HandlerResult {
  return { response };
}

export function fail(response: DispatchResponse, error: Error): HandlerResult {
  return { response, error };
}
