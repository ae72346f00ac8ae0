/**
 * Handler factory.
 * Assembles a Handler with the default middleware stack, outermost first:
 * Recovery, Timeout, Tracing, Metrics, Logging, Validation, Retry.
 * Recovery sees everything; Timeout bounds everything below it; Validation
 * rejects malformed requests once, before Retry; Retry repeats only the
 * use case.
 */

import {
  createLoggingMiddleware,
  createMetricsMiddleware,
  createRecoveryMiddleware,
  createRetryMiddleware,
  createTimeoutMiddleware,
  createTracingMiddleware,
  createValidationMiddleware,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
} from '../middleware/index.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IMetricsProvider } from '../providers/IMetricsProvider.js';
import { DEFAULT_HANDLER_CONFIG, Handler, type HandlerConfig } from './Handler.js';
import type { IUseCase } from './IUseCase.js';

export interface HandlerDeps {
  logProvider: ILogProvider;
  metricsProvider: IMetricsProvider;
  config?: HandlerConfig;
  retry?: RetryConfig;
}

export function createHandler(useCase: IUseCase, deps: HandlerDeps): Handler {
  const config = deps.config ?? DEFAULT_HANDLER_CONFIG;
  const retry = deps.retry ?? DEFAULT_RETRY_CONFIG;
  const handler = new Handler(useCase, config);

  handler.use(createRecoveryMiddleware(deps.logProvider, deps.metricsProvider));

  if (config.timeoutMs > 0) {
    handler.use(createTimeoutMiddleware(config.timeoutMs, deps.logProvider));
  }

  if (config.enableTracing) {
    handler.use(createTracingMiddleware());
  }

  if (config.enableMetrics) {
    handler.use(createMetricsMiddleware(deps.metricsProvider));
  }

  handler.use(createLoggingMiddleware(deps.logProvider));
  handler.use(createValidationMiddleware());

  if (retry.maxAttempts > 0) {
    handler.use(createRetryMiddleware(retry));
  }

  return handler;
}
