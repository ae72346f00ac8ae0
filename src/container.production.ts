/**
 * Production container: sinks chosen from the environment.
 * Axiom when AXIOM_API_KEY and AXIOM_DATASET are set, JSON lines on the
 * console otherwise (stderr under OpenFaaS, where stdout is the response).
 */

import { loadConfig, type AppConfig, type Env } from './config.js';
import { createContainer, type Container } from './container.js';
import type { IUseCase } from './handler/IUseCase.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IMetricsProvider } from './providers/IMetricsProvider.js';
import { InMemoryMetricsProvider } from './providers/InMemoryMetricsProvider.js';
import { PrometheusMetricsProvider } from './providers/PrometheusMetricsProvider.js';

let cached: Container | null = null;

export function getProductionContainer(useCase: IUseCase, env: Env = process.env): Container {
  if (cached) return cached;

  const config = loadConfig(env);

  cached = createContainer({
    useCase,
    logProvider: createLogProvider(config),
    metricsProvider: createMetricsProvider(config),
    config,
  });

  return cached;
}

export function createLogProvider(config: AppConfig): ILogProvider {
  const baseFields = { service: config.serviceName, environment: config.environment };

  if (config.axiom) {
    return new AxiomLogProvider({
      apiToken: config.axiom.apiKey,
      dataset: config.axiom.dataset,
      baseFields,
    });
  }

  return new ConsoleLogProvider({
    outputToConsole: true,
    stream: config.platform === 'openfaas' ? 'stderr' : 'stdout',
    minLevel: config.logLevel,
    baseFields,
    retain: false,
  });
}

export function createMetricsProvider(config: AppConfig): IMetricsProvider {
  if (config.metrics.backend === 'prometheus') {
    return new PrometheusMetricsProvider({ collectDefaults: true });
  }
  return new InMemoryMetricsProvider();
}
