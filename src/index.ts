export * from './types/models.js';
export { decodeRequest, encodeRequest, encodeResponse, toWireResponse } from './types/codec.js';
export type { WireRequest, WireResponse } from './types/codec.js';
export * from './errors.js';
export * from './context.js';
export * from './middleware/index.js';
export * from './providers/index.js';
export { Handler, DEFAULT_HANDLER_CONFIG } from './handler/Handler.js';
export type { HandlerConfig, Platform } from './handler/Handler.js';
export type { IUseCase } from './handler/IUseCase.js';
export { createHandler, type HandlerDeps } from './handler/factory.js';
export type { IRuntime } from './adapters/IRuntime.js';
export { HttpAdapter, HEALTH_PATHS, type HttpAdapterOptions } from './adapters/HttpAdapter.js';
export { createHttpServer, HttpServerRuntime, type HttpServerOptions } from './adapters/httpServer.js';
export { QueueTriggerAdapter, type QueueTriggerOptions } from './adapters/QueueTriggerAdapter.js';
export {
  BrokerConsumerAdapter,
  type BrokerChannel,
  type BrokerConnection,
  type BrokerConnect,
  type BrokerConsumerOptions,
} from './adapters/BrokerConsumerAdapter.js';
export { FunctionAdapter, type FunctionAdapterOptions } from './adapters/FunctionAdapter.js';
export { loadConfig, detectPlatform, type AppConfig, type Env, type MetricsBackend } from './config.js';
export { createContainer, type Container } from './container.js';
export { getProductionContainer } from './container.production.js';
export { startRuntime } from './runtime.js';
export { parseDuration, sleep } from './utils/time.js';
export { EchoUseCase } from './usecases/EchoUseCase.js';
