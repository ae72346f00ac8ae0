/**
 * JSON wire shape for requests and responses.
 * Used by the function adapter's direct-object mode, the queue trigger's
 * direct invocations, and anything that logs a whole document.
 */

import { z } from 'zod';
import type { DispatchRequest, DispatchResponse } from './models.js';

const wireRequestSchema = z.object({
  id: z.string().optional(),
  source: z.string().optional(),
  type: z.string(),
  payload: z.unknown(),
  metadata: z.record(z.string()).optional(),
  timestamp: z.string().datetime({ offset: true }).optional(),
});

export type WireRequest = z.infer<typeof wireRequestSchema>;

export interface WireResponse {
  id: string;
  success: boolean;
  data?: unknown;
  error?: {
    code: string;
    message: string;
    details?: string;
    retryable: boolean;
  };
  metadata: Record<string, string>;
  processed_at: string;
  duration?: number;
}

/**
 * Decode a request document.
 * Returns null when the text is not JSON or not shaped like a request, so
 * callers can fall back to treating it as a bare payload.
 */
export function decodeRequest(text: string): DispatchRequest | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }

  const parsed = wireRequestSchema.safeParse(raw);
  if (!parsed.success || !('payload' in parsed.data)) {
    return null;
  }

  const wire = parsed.data;
  return {
    id: wire.id ?? '',
    source: wire.source ?? '',
    type: wire.type,
    payload: wire.payload === undefined ? '' : JSON.stringify(wire.payload),
    metadata: wire.metadata ?? {},
    ...(wire.timestamp && { timestamp: new Date(wire.timestamp) }),
  };
}

export function encodeRequest(req: DispatchRequest): string {
  return JSON.stringify({
    id: req.id,
    source: req.source,
    type: req.type,
    payload: parseOrNull(req.payload),
    metadata: req.metadata ?? {},
    timestamp: (req.timestamp ?? new Date(0)).toISOString(),
  });
}

export function toWireResponse(resp: DispatchResponse): WireResponse {
  return {
    id: resp.id,
    success: resp.success,
    ...(resp.data !== undefined && { data: parseOrNull(resp.data) }),
    ...(resp.error && { error: { ...resp.error } }),
    metadata: resp.metadata,
    processed_at: resp.processedAt.toISOString(),
    ...(resp.durationMs !== undefined && { duration: resp.durationMs }),
  };
}

export function encodeResponse(resp: DispatchResponse): string {
  return JSON.stringify(toWireResponse(resp));
}

function parseOrNull(text: string): unknown {
  if (text === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
