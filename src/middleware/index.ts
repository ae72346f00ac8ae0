export { pipeline } from './pipeline.js';
export type { HandlerFunc, Middleware } from './pipeline.js';
export { createValidationMiddleware, normalizeRequest, isValidJson } from './validation.js';
export { createTimeoutMiddleware } from './timeout.js';
export { createRecoveryMiddleware } from './recovery.js';
export {
  createRetryMiddleware,
  calculateBackoff,
  isRetryable,
  DEFAULT_RETRY_CONFIG,
} from './retry.js';
export type { RetryConfig } from './retry.js';
export { createTracingMiddleware, extractTraceId, TRACE_ID_KEYS } from './tracing.js';
export { createLoggingMiddleware } from './logging.js';
export { createMetricsMiddleware, METRIC_NAMES } from './metrics.js';
