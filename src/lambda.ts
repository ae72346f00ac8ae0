/**
 * AWS Lambda entry point (`lambda.handler`).
 * Serves SQS batches and direct request documents; logs are flushed before
 * each invocation returns, since the sandbox may freeze afterwards.
 */

import type { Context } from 'aws-lambda';
import { getProductionContainer } from './container.production.js';
import { EchoUseCase } from './usecases/EchoUseCase.js';

const container = getProductionContainer(new EchoUseCase());
const adapter = container.queueTrigger();

export const handler = async (event: unknown, context: Context) => {
  try {
    return await adapter.handleEvent(event, context);
  } finally {
    await container.logProvider.flush();
  }
};
