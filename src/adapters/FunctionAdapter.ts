/**
 * Function adapter (OpenFaaS classic watchdog).
 * One invocation per process: read the whole input stream, run the
 * handler once, write exactly one JSON line. The output stream belongs to
 * the response, so diagnostics go to the error stream.
 *
 * `handleHttp` serves the same handler behind the of-watchdog's HTTP mode.
 */

import { randomUUID } from 'node:crypto';
import type { Readable, Writable } from 'node:stream';
import type { Env } from '../config.js';
import { backgroundContext, withCancel, withTimeout, type CancellableContext } from '../context.js';
import { ERROR_CODES } from '../errors.js';
import { requestSizeLimit, type Handler } from '../handler/Handler.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { decodeRequest, encodeResponse } from '../types/codec.js';
import { errorResponse, type DispatchRequest, type DispatchResponse } from '../types/models.js';
import { parseDuration } from '../utils/time.js';
import { readBounded } from './HttpAdapter.js';

export interface FunctionAdapterOptions {
  input?: Readable;
  output?: Writable;
  errorOutput?: Writable;
  env?: Env;
  logProvider?: ILogProvider;
}

const ENV_METADATA: ReadonlyArray<readonly [string, string]> = [
  ['OPENFAAS_FUNCTION_NAME', 'function_name'],
  ['OPENFAAS_NAMESPACE', 'namespace'],
  ['HOSTNAME', 'hostname'],
  ['Http_Path', 'http_path'],
  ['Http_Method', 'http_method'],
  ['Http_Query', 'http_query'],
  ['Http_ContentType', 'content_type'],
];

const HEADER_ENV_PREFIX = 'Http_';
const DEFAULT_FUNCTION_TYPE = 'function';

export class FunctionAdapter {
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly errorOutput: Writable;
  private readonly env: Env;

  constructor(
    private readonly handler: Handler,
    private readonly options: FunctionAdapterOptions = {}
  ) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.errorOutput = options.errorOutput ?? process.stderr;
    this.env = options.env ?? process.env;
  }

  /** Handle one invocation. Resolves to the process exit code. */
  async run(): Promise<number> {
    let input: string;
    try {
      input = await readAll(this.input);
    } catch (err) {
      const message = `failed to read stdin: ${err instanceof Error ? err.message : String(err)}`;
      await this.writeLine(this.errorOutput, `Error: ${message}`);
      await this.writeLine(
        this.output,
        encodeResponse(errorResponse(randomUUID(), ERROR_CODES.ADAPTER_ERROR, 'Failed to process request', message, false))
      );
      return 1;
    }

    const request = this.buildRequest(input);
    const { ctx, cancel } = this.createContext();

    let response: DispatchResponse;
    try {
      const result = await this.handler.handle(request, ctx);
      response = result.response;

      if (result.error) {
        await this.writeLine(this.errorOutput, `Handler error: ${result.error.message}`);
        this.options.logProvider?.error('Handler returned an error', {
          requestId: request.id,
          error: result.error.message,
        });
        response = errorResponse(
          request.id,
          ERROR_CODES.PROCESSING_ERROR,
          'Failed to process request',
          result.error.message,
          false
        );
      }
    } finally {
      cancel();
    }

    await this.writeLine(this.output, encodeResponse(response));
    return 0;
  }

  /** A full request document is taken as-is; anything else is the payload. */
  buildRequest(input: string): DispatchRequest {
    const decoded = decodeRequest(input);
    if (decoded) {
      return {
        ...decoded,
        id: decoded.id || randomUUID(),
        timestamp: decoded.timestamp ?? new Date(),
      };
    }

    const metadata = this.metadataFromEnv();
    return {
      id: metadata.request_id,
      source: 'openfaas',
      type: this.requestTypeFromEnv(),
      payload: input,
      metadata,
      timestamp: new Date(),
    };
  }

  /** HTTP-compatibility mode. Arrow property so it can be mounted unbound. */
  readonly handleHttp = async (req: Request): Promise<Response> => {
    const body = await readBounded(req, requestSizeLimit(this.handler.config));
    if (!body.ok) {
      return new Response('Failed to read request', { status: 400, headers: { 'Content-Type': 'text/plain' } });
    }

    const metadata: Record<string, string> = {};
    const functionName = req.headers.get('X-Function-Name');
    if (functionName) metadata.function_name = functionName;

    req.headers.forEach((value, name) => {
      // Header names arrive lower-cased
      if (name.startsWith('x-')) {
        metadata[name.replaceAll('-', '_')] = value;
      }
    });

    const request: DispatchRequest = {
      id: req.headers.get('X-Request-ID') || req.headers.get('X-Call-Id') || randomUUID(),
      source: 'openfaas',
      type: req.headers.get('X-Request-Type') || this.env.OPENFAAS_FUNCTION_NAME || DEFAULT_FUNCTION_TYPE,
      payload: body.text,
      metadata,
      timestamp: new Date(),
    };

    const { response, error } = await this.handler.handle(request, { signal: req.signal });
    const headers = { 'Content-Type': 'application/json', 'X-Request-ID': response.id };

    if (error) {
      return new Response(
        encodeResponse(
          errorResponse(request.id, ERROR_CODES.PROCESSING_ERROR, 'Failed to process request', error.message, false)
        ),
        { status: 500, headers }
      );
    }

    return new Response(encodeResponse(response), { status: response.success ? 200 : 500, headers });
  };

  private metadataFromEnv(): Record<string, string> {
    const metadata: Record<string, string> = {};

    for (const [envKey, metaKey] of ENV_METADATA) {
      const value = this.env[envKey];
      if (value) metadata[metaKey] = value;
    }

    // The watchdog exposes each request header as Http_<Name>
    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(HEADER_ENV_PREFIX) && value !== undefined) {
        metadata[`header_${key.slice(HEADER_ENV_PREFIX.length).toLowerCase()}`] = value;
      }
    }

    metadata.request_id = this.env.Http_X_Request_Id || randomUUID();
    return metadata;
  }

  private requestTypeFromEnv(): string {
    const explicit = this.env.Http_X_Request_Type;
    if (explicit) return explicit;

    const functionName = this.env.OPENFAAS_FUNCTION_NAME;
    if (functionName) return functionName;

    const path = (this.env.Http_Path ?? '').replace(/^\/+/, '');
    if (path) return path;

    return DEFAULT_FUNCTION_TYPE;
  }

  private createContext(): CancellableContext {
    const base = backgroundContext();
    const timeoutMs = parseDuration(this.env.OPENFAAS_TIMEOUT ?? '');
    return timeoutMs !== null && timeoutMs > 0 ? withTimeout(base, timeoutMs) : withCancel(base);
  }

  private writeLine(stream: Writable, text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      stream.write(`${text}\n`, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}
