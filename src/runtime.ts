/**
 * Process runtime.
 * Starts the adapter that matches the platform and wires SIGINT/SIGTERM to
 * a graceful stop followed by a log flush.
 */

import type { IRuntime } from './adapters/IRuntime.js';
import type { Container } from './container.js';
import type { Platform } from './handler/Handler.js';

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Start serving. Resolves with the running runtime, or null when the
 * platform drives invocations itself (Lambda) or the work is already done
 * (a one-shot function run, whose exit code is left on process.exitCode).
 */
export async function startRuntime(
  container: Container,
  platform: Platform = container.config.platform
): Promise<IRuntime | null> {
  const { config, logProvider } = container;

  switch (platform) {
    case 'http': {
      const runtime = container.httpServer();
      await runtime.start();
      installShutdown(container, runtime);
      return runtime;
    }

    case 'rabbitmq': {
      const runtime = container.brokerConsumer();
      await runtime.start();
      installShutdown(container, runtime);
      return runtime;
    }

    case 'openfaas': {
      const adapter = container.functionAdapter();
      if (config.openfaas.httpMode) {
        const runtime = container.httpServer(adapter.handleHttp, config.openfaas.port);
        await runtime.start();
        installShutdown(container, runtime);
        return runtime;
      }

      process.exitCode = await adapter.run();
      await logProvider.flush();
      return null;
    }

    case 'lambda':
      logProvider.info('Lambda invocations are served by the exported handler', { module: 'lambda.js' });
      return null;
  }
}

function installShutdown(container: Container, runtime: IRuntime): void {
  const { logProvider } = container;
  let stopping = false;

  const onSignal = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logProvider.info('Shutting down', { signal, runtime: runtime.name });

    runtime
      .stop()
      .catch((err: unknown) => {
        logProvider.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
        process.exitCode = 1;
      })
      .finally(() => logProvider.flush())
      .catch((err: unknown) => {
        console.error(`[shutdown] log flush failed: ${err instanceof Error ? err.message : String(err)}`);
      });
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, onSignal);
  }
}
