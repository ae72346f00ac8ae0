export type { ILogProvider, LogEvent, LogLevel, DispatchLogEvent } from './ILogProvider.js';
export { LOG_LEVEL_RANK } from './ILogProvider.js';
export { ConsoleLogProvider, type ConsoleLogProviderOptions } from './ConsoleLogProvider.js';
export { AxiomLogProvider, type AxiomLogProviderOptions } from './AxiomLogProvider.js';
export type { IMetricsProvider, IMetricsExposition, MetricTags } from './IMetricsProvider.js';
export { isMetricsExposition } from './IMetricsProvider.js';
export { InMemoryMetricsProvider } from './InMemoryMetricsProvider.js';
export type { HistogramSummary, InMemoryMetricsOptions } from './InMemoryMetricsProvider.js';
export { PrometheusMetricsProvider, type PrometheusMetricsProviderOptions } from './PrometheusMetricsProvider.js';
