/**
 * HTTP adapter.
 * Translates a fetch-style Request into a DispatchRequest, runs it through
 * the handler, and maps the result back to a JSON Response. Framework-
 * agnostic; `createHttpServer` mounts it on express.
 */

import { randomUUID } from 'node:crypto';
import { backgroundContext } from '../context.js';
import { ERROR_CODES, statusForCode } from '../errors.js';
import { requestSizeLimit, type Handler } from '../handler/Handler.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IMetricsExposition } from '../providers/IMetricsProvider.js';
import { encodeResponse } from '../types/codec.js';
import { errorResponse, type DispatchRequest, type DispatchResponse, type HandlerResult } from '../types/models.js';

export const HEALTH_PATHS: ReadonlySet<string> = new Set([
  '/health',
  '/healthz',
  '/ready',
  '/readyz',
  '/live',
  '/livez',
]);

const REQUEST_ID_HEADERS = ['X-Request-ID', 'X-Correlation-ID', 'Request-ID'];

const FORWARDED_HEADERS = ['Content-Type', 'Accept', 'User-Agent', 'X-Forwarded-For', 'X-Real-IP', 'Authorization'];

const JSON_HEADERS = { 'Content-Type': 'application/json' };

// Metadata that cannot be a header (spaces in keys, line breaks, non-latin1) stays in the body only.
const HEADER_NAME = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const HEADER_VALUE = /^[\t\x20-\x7e\x80-\xff]*$/;

export interface HttpAdapterOptions {
  /** Serves GET /metrics when set. */
  exposition?: IMetricsExposition;
  logProvider?: ILogProvider;
}

export class HttpAdapter {
  private readonly maxRequestSize: number;

  constructor(
    private readonly handler: Handler,
    private readonly options: HttpAdapterOptions = {}
  ) {
    this.maxRequestSize = requestSizeLimit(handler.config);
  }

  /** Fetch-style entry point. Arrow property so it can be passed around unbound. */
  readonly handle = async (req: Request): Promise<Response> => {
    const url = new URL(req.url);

    if (HEALTH_PATHS.has(url.pathname)) {
      return this.handleHealth();
    }

    if (url.pathname === '/metrics') {
      return this.handleMetrics();
    }

    if (req.method !== 'POST') {
      return new Response(
        JSON.stringify({
          error: {
            code: ERROR_CODES.INVALID_REQUEST,
            message: `Method ${req.method} not allowed`,
          },
        }),
        { status: 405, headers: { ...JSON_HEADERS, Allow: 'POST' } }
      );
    }

    const body = await readBounded(req, this.maxRequestSize);
    if (!body.ok) {
      return writeResult({
        response: errorResponse(
          randomUUID(),
          ERROR_CODES.INVALID_REQUEST,
          'Failed to read request body',
          body.reason,
          false
        ),
      });
    }

    const request = buildRequest(req, url, body.text);

    // Client disconnects abort req.signal, which cancels the chain.
    const result = await this.handler.handle(request, { signal: req.signal });
    return writeResult(result);
  };

  private async handleHealth(): Promise<Response> {
    try {
      await this.handler.health(backgroundContext());
      return new Response(
        JSON.stringify({
          status: 'healthy',
          worker: this.handler.name,
          time: new Date().toISOString(),
        }),
        { status: 200, headers: JSON_HEADERS }
      );
    } catch (err) {
      this.options.logProvider?.warn('Health check failed', {
        error: err instanceof Error ? err.message : String(err),
      });
      return new Response(
        JSON.stringify({
          status: 'unhealthy',
          error: err instanceof Error ? err.message : String(err),
        }),
        { status: 503, headers: JSON_HEADERS }
      );
    }
  }

  private async handleMetrics(): Promise<Response> {
    const exposition = this.options.exposition;
    if (!exposition) {
      return new Response(
        JSON.stringify({
          error: { code: ERROR_CODES.NOT_FOUND, message: 'Metrics are not exposed by this runtime' },
        }),
        { status: 404, headers: JSON_HEADERS }
      );
    }

    return new Response(await exposition.metrics(), {
      status: 200,
      headers: { 'Content-Type': exposition.contentType },
    });
  }
}

/** Map a handler result to an HTTP status. A returned error is always 500. */
export function statusFor(result: HandlerResult): number {
  if (result.error) return 500;
  if (result.response.success) return 200;
  if (!result.response.error) return 500;
  return statusForCode(result.response.error.code);
}

export function writeResult(result: HandlerResult): Response {
  const { response, error } = result;
  const headers = new Headers(JSON_HEADERS);
  headers.set('X-Request-ID', response.id);

  for (const [key, value] of Object.entries(response.metadata)) {
    if (HEADER_NAME.test(key) && HEADER_VALUE.test(value)) {
      headers.set(`X-${key}`, value);
    }
  }

  const body: DispatchResponse = error
    ? {
        ...errorResponse(response.id, ERROR_CODES.INTERNAL_ERROR, 'Request processing failed', error.message, false),
        metadata: response.metadata,
      }
    : response;

  return new Response(encodeResponse(body), { status: statusFor(result), headers });
}

export function buildRequest(req: Request, url: URL, body: string): DispatchRequest {
  return {
    id: extractRequestId(req.headers) || randomUUID(),
    source: 'http',
    type: extractRequestType(req, url),
    payload: body,
    metadata: extractMetadata(req, url),
    timestamp: new Date(),
  };
}

function extractRequestId(headers: Headers): string {
  for (const name of REQUEST_ID_HEADERS) {
    const value = headers.get(name);
    if (value) return value;
  }
  return '';
}

/** X-Request-Type header, else the first path segment, else the lower-cased method. */
export function extractRequestType(req: Request, url: URL): string {
  const explicit = req.headers.get('X-Request-Type');
  if (explicit) return explicit;

  const path = url.pathname.replace(/^\/+/, '');
  if (path) {
    const slash = path.indexOf('/');
    return slash > 0 ? path.slice(0, slash) : path;
  }

  return req.method.toLowerCase();
}

function extractMetadata(req: Request, url: URL): Record<string, string> {
  const metadata: Record<string, string> = {
    http_method: req.method,
    http_path: url.pathname,
    http_host: url.host,
  };

  for (const [key, value] of url.searchParams) {
    // First value wins for repeated keys
    if (!(`query_${key}` in metadata)) {
      metadata[`query_${key}`] = value;
    }
  }

  for (const name of FORWARDED_HEADERS) {
    let value = req.headers.get(name);
    if (!value) continue;

    if (name === 'Authorization') {
      value = value.startsWith('Bearer ') ? 'Bearer [REDACTED]' : '[REDACTED]';
    }
    metadata[`header_${name.toLowerCase().replaceAll('-', '_')}`] = value;
  }

  const traceId = req.headers.get('X-Trace-ID');
  if (traceId) {
    metadata.trace_id = traceId;
  }

  return metadata;
}

type BoundedBody = { ok: true; text: string } | { ok: false; reason: string };

/** Read the body, giving up as soon as it exceeds `limit` bytes. */
export async function readBounded(req: Request, limit: number): Promise<BoundedBody> {
  const declared = Number(req.headers.get('Content-Length') ?? NaN);
  if (Number.isFinite(declared) && declared > limit) {
    return { ok: false, reason: `request body too large (limit ${limit} bytes)` };
  }

  if (!req.body) {
    return { ok: true, text: '' };
  }

  const reader = req.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      total += value.byteLength;
      if (total > limit) {
        await reader.cancel();
        return { ok: false, reason: `request body too large (limit ${limit} bytes)` };
      }
      chunks.push(value);
    }
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }

  return { ok: true, text: Buffer.concat(chunks).toString('utf8') };
}
