/**
 * Process entry point. Serves the echo use case on whichever platform the
 * environment selects.
 */

import { getProductionContainer } from './container.production.js';
import type { Container } from './container.js';
import { startRuntime } from './runtime.js';
import { EchoUseCase } from './usecases/EchoUseCase.js';

let container: Container;
try {
  container = getProductionContainer(new EchoUseCase());
} catch (err) {
  // No logger yet: configuration is what selects it.
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}

try {
  await startRuntime(container);
} catch (err) {
  container.logProvider.error('Runtime failed', {
    error: err instanceof Error ? err.message : String(err),
  });
  await container.logProvider.flush();
  process.exitCode = 1;
}
