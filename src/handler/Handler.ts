/**
 * Dispatch handler.
 * Owns the ordered middleware chain that ends in the use case. The first
 * middleware registered with `use` is the outermost layer.
 */

import { backgroundContext, withCancel, withFields, withTimeout, type RequestContext } from '../context.js';
import { pipeline, type HandlerFunc, type Middleware } from '../middleware/pipeline.js';
import type { DispatchRequest, HandlerResult } from '../types/models.js';
import type { IUseCase } from './IUseCase.js';

export type Platform = 'http' | 'lambda' | 'rabbitmq' | 'openfaas';

export interface HandlerConfig {
  /** Overall deadline for one `handle` call; 0 disables it. */
  timeoutMs: number;
  /** Upper bound on inbound bodies, enforced by the HTTP adapters. 0 means the default. */
  maxRequestSize: number;
  enableMetrics: boolean;
  enableTracing: boolean;
  platform: Platform;
}

export const DEFAULT_MAX_REQUEST_SIZE = 10 * 1024 * 1024;

export const DEFAULT_HANDLER_CONFIG: HandlerConfig = {
  timeoutMs: 30_000,
  maxRequestSize: DEFAULT_MAX_REQUEST_SIZE,
  enableMetrics: true,
  enableTracing: true,
  platform: 'http',
};

/** The body limit every HTTP surface enforces. */
export function requestSizeLimit(config: Pick<HandlerConfig, 'maxRequestSize'>): number {
  return config.maxRequestSize > 0 ? config.maxRequestSize : DEFAULT_MAX_REQUEST_SIZE;
}

export class Handler {
  private readonly middlewares: Middleware[] = [];

  constructor(
    private readonly useCase: IUseCase,
    readonly config: HandlerConfig = DEFAULT_HANDLER_CONFIG
  ) {}

  get name(): string {
    return this.useCase.name;
  }

  /** Append a middleware; earlier registrations wrap later ones. */
  use(middleware: Middleware): this {
    this.middlewares.push(middleware);
    return this;
  }

  /**
   * Run a request through the chain.
   * Does not catch exceptions; that is the Recovery middleware's job.
   */
  async handle(req: DispatchRequest, parent: RequestContext = backgroundContext()): Promise<HandlerResult> {
    const chain = this.buildChain();

    const scoped = withFields(parent, {
      requestId: req.id,
      workerName: this.useCase.name,
      platform: this.config.platform,
    });

    const { ctx, cancel } =
      this.config.timeoutMs > 0 ? withTimeout(scoped, this.config.timeoutMs) : withCancel(scoped);

    try {
      return await chain(ctx, req);
    } finally {
      cancel();
    }
  }

  health(ctx: RequestContext = backgroundContext()): Promise<void> {
    return this.useCase.health(ctx);
  }

  private buildChain(): HandlerFunc {
    const terminal: HandlerFunc = (ctx, req) => this.useCase.process(ctx, req);
    return pipeline(...this.middlewares)(terminal);
  }
}
