/**
 * Express bridge for fetch-style handlers.
 * Buffers the body with express.raw (bounded by maxRequestSize), rebuilds a
 * web Request, and streams the web Response back. A client disconnect
 * aborts the Request's signal.
 */

import type { Server } from 'node:http';
import express, { type Express, type NextFunction, type Request as ExpressRequest, type Response as ExpressResponse } from 'express';
import { ERROR_CODES } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { encodeResponse } from '../types/codec.js';
import { errorResponse } from '../types/models.js';
import type { IRuntime } from './IRuntime.js';

export type FetchHandler = (req: Request) => Promise<Response>;

export interface HttpServerOptions {
  maxRequestSize: number;
  logProvider?: ILogProvider;
}

const HOP_BY_HOP = new Set(['connection', 'keep-alive', 'transfer-encoding', 'upgrade', 'proxy-connection']);

export function createHttpServer(handle: FetchHandler, options: HttpServerOptions): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(express.raw({ type: () => true, limit: options.maxRequestSize }));

  app.use((req: ExpressRequest, res: ExpressResponse, next: NextFunction) => {
    bridge(handle, req, res).catch(next);
  });

  // Body-parser failures (oversized or aborted bodies) and bridge errors land here.
  app.use((err: unknown, req: ExpressRequest, res: ExpressResponse, _next: NextFunction) => {
    const message = err instanceof Error ? err.message : String(err);
    const tooLarge = isBodyParserError(err);

    options.logProvider?.error('HTTP request failed before reaching the handler', {
      method: req.method,
      path: req.path,
      error: message,
    });

    const response = tooLarge
      ? errorResponse('', ERROR_CODES.INVALID_REQUEST, 'Failed to read request body', message, false)
      : errorResponse('', ERROR_CODES.INTERNAL_ERROR, 'Request processing failed', message, false);

    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(tooLarge ? 400 : 500).type('application/json').send(encodeResponse(response));
  });

  return app;
}

function isBodyParserError(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'type' in err &&
    typeof err.type === 'string' &&
    (err.type === 'entity.too.large' || err.type === 'request.aborted' || err.type === 'request.size.invalid')
  );
}

async function bridge(handle: FetchHandler, req: ExpressRequest, res: ExpressResponse): Promise<void> {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });

  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined || HOP_BY_HOP.has(name)) continue;
    if (Array.isArray(value)) {
      for (const v of value) headers.append(name, v);
    } else {
      headers.set(name, value);
    }
  }

  const body = Buffer.isBuffer(req.body) && req.body.length > 0 ? req.body : undefined;
  const canHaveBody = req.method !== 'GET' && req.method !== 'HEAD';

  const webReq = new Request(`${req.protocol}://${req.get('host') ?? 'localhost'}${req.originalUrl}`, {
    method: req.method,
    headers,
    ...(canHaveBody && body && { body }),
    signal: controller.signal,
  });

  const webRes = await handle(webReq);

  res.status(webRes.status);
  webRes.headers.forEach((value, name) => {
    res.setHeader(name, value);
  });
  res.end(Buffer.from(await webRes.arrayBuffer()));
}

/** Listens on a port with a fetch-style handler mounted at the root. */
export class HttpServerRuntime implements IRuntime {
  readonly name = 'http';
  private server: Server | null = null;

  constructor(
    private readonly app: Express,
    private readonly port: number,
    private readonly logProvider?: ILogProvider
  ) {}

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port);
      server.once('listening', () => {
        this.logProvider?.info('HTTP server listening', { port: this.port });
        resolve();
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        this.logProvider?.info('HTTP server stopped');
        resolve();
      });
      server.closeIdleConnections();
    });
  }
}
