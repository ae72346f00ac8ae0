/**
 * Dependency wiring.
 * Builds the handler with the default middleware stack and hands out one
 * adapter per platform. Tests pass in-memory sinks; production wiring lives
 * in container.production.ts.
 */

import { BrokerConsumerAdapter, type BrokerConnect } from './adapters/BrokerConsumerAdapter.js';
import { FunctionAdapter, type FunctionAdapterOptions } from './adapters/FunctionAdapter.js';
import { HttpAdapter } from './adapters/HttpAdapter.js';
import { createHttpServer, HttpServerRuntime } from './adapters/httpServer.js';
import { QueueTriggerAdapter } from './adapters/QueueTriggerAdapter.js';
import type { AppConfig } from './config.js';
import { createHandler } from './handler/factory.js';
import { requestSizeLimit, type Handler } from './handler/Handler.js';
import type { IUseCase } from './handler/IUseCase.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import { isMetricsExposition, type IMetricsProvider } from './providers/IMetricsProvider.js';

export interface Container {
  config: AppConfig;
  handler: Handler;
  logProvider: ILogProvider;
  metricsProvider: IMetricsProvider;
  httpAdapter(): HttpAdapter;
  /** Express server on `port` (defaults to HTTP_PORT) serving `handle`. */
  httpServer(handle?: (req: Request) => Promise<Response>, port?: number): HttpServerRuntime;
  queueTrigger(): QueueTriggerAdapter;
  brokerConsumer(connect?: BrokerConnect): BrokerConsumerAdapter;
  functionAdapter(options?: FunctionAdapterOptions): FunctionAdapter;
}

export function createContainer(deps: {
  useCase: IUseCase;
  logProvider: ILogProvider;
  metricsProvider: IMetricsProvider;
  config: AppConfig;
}): Container {
  const { config, logProvider, metricsProvider } = deps;

  const handler = createHandler(deps.useCase, {
    logProvider,
    metricsProvider,
    config: config.handler,
    retry: config.retry,
  });

  const httpAdapter = () =>
    new HttpAdapter(handler, {
      logProvider,
      ...(isMetricsExposition(metricsProvider) && { exposition: metricsProvider }),
    });

  return {
    config,
    handler,
    logProvider,
    metricsProvider,
    httpAdapter,
    httpServer: (handle = httpAdapter().handle, port = config.http.port) =>
      new HttpServerRuntime(
        createHttpServer(handle, { maxRequestSize: requestSizeLimit(config.handler), logProvider }),
        port,
        logProvider
      ),
    queueTrigger: () =>
      new QueueTriggerAdapter(handler, {
        timeoutMs: config.lambda.timeoutMs,
        partialBatchFailure: config.lambda.partialBatchFailure,
        maxConcurrency: config.lambda.maxConcurrency,
        logProvider,
        metricsProvider,
      }),
    brokerConsumer: (connect) =>
      new BrokerConsumerAdapter(handler, {
        url: config.rabbitmq.url,
        queue: config.rabbitmq.queue,
        prefetch: config.rabbitmq.prefetch,
        timeoutMs: config.rabbitmq.timeoutMs,
        logProvider,
        metricsProvider,
        ...(connect && { connect }),
      }),
    functionAdapter: (options) => new FunctionAdapter(handler, { logProvider, ...options }),
  };
}
