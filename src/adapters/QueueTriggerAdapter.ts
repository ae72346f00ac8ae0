/**
 * Queue-trigger adapter (AWS Lambda with an SQS event source).
 *
 * Each record becomes one DispatchRequest. With partial batch failure on,
 * records that should be redelivered are reported back in
 * `batchItemFailures` (batch order); with it off, the first such record
 * fails the whole invocation so the entire batch is redelivered. A message
 * never runs past the time the invocation has left.
 */

import type { Context as LambdaContext, SQSBatchItemFailure, SQSBatchResponse, SQSEvent, SQSRecord } from 'aws-lambda';
import { backgroundContext, withCancel, withTimeout, type RequestContext } from '../context.js';
import { BatchProcessingError, describeThrown, UnsupportedEventError } from '../errors.js';
import type { Handler } from '../handler/Handler.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IMetricsProvider } from '../providers/IMetricsProvider.js';
import { decodeRequest, toWireResponse, type WireResponse } from '../types/codec.js';
import type { DispatchRequest, HandlerResult } from '../types/models.js';

export interface QueueTriggerOptions {
  /** Per-message deadline; 0 leaves only the handler's own timeout. */
  timeoutMs: number;
  partialBatchFailure: boolean;
  /** Records processed at once. 1 keeps batches strictly sequential. */
  maxConcurrency: number;
  logProvider: ILogProvider;
  metricsProvider: IMetricsProvider;
}

export const DEFAULT_SQS_MESSAGE_TYPE = 'sqs_message';

type RecordOutcome = { redeliver: false } | { redeliver: true; reason: string; error?: Error };

export class QueueTriggerAdapter {
  constructor(
    private readonly handler: Handler,
    private readonly options: QueueTriggerOptions
  ) {}

  /** Lambda entry point. Arrow property so it can be exported unbound. */
  readonly handleEvent = async (event: unknown, lambdaContext?: LambdaContext): Promise<SQSBatchResponse | WireResponse> => {
    const { logProvider, metricsProvider } = this.options;
    metricsProvider.incrementCounter('lambda.invocations');

    if (isSqsEvent(event)) {
      return this.handleSqsEvent(event, lambdaContext);
    }

    const direct = typeof event === 'object' && event !== null ? decodeRequest(JSON.stringify(event)) : null;
    if (direct && direct.id !== '') {
      metricsProvider.incrementCounter('lambda.invocations.direct');
      logProvider.info('Processing direct request', { requestId: direct.id });

      const { response, error } = await this.handler.handle({
        ...direct,
        timestamp: direct.timestamp ?? new Date(),
      });
      if (error) throw error;
      return toWireResponse(response);
    }

    logProvider.error('Unsupported event type', { awsRequestId: lambdaContext?.awsRequestId });
    metricsProvider.incrementCounter('lambda.invocations.unsupported');
    throw new UnsupportedEventError();
  };

  async handleSqsEvent(event: SQSEvent, lambdaContext?: LambdaContext): Promise<SQSBatchResponse> {
    const { logProvider, metricsProvider, partialBatchFailure } = this.options;
    const records = event.Records;

    metricsProvider.incrementCounter('lambda.invocations.sqs');
    metricsProvider.recordHistogram('lambda.batch_size', records.length);
    logProvider.info('Processing SQS batch', {
      batchSize: records.length,
      source: records[0]?.eventSource,
      awsRequestId: lambdaContext?.awsRequestId,
    });

    const outcomes = partialBatchFailure
      ? await this.processAll(records, lambdaContext)
      : await this.processUntilFailure(records, lambdaContext);

    const batchItemFailures: SQSBatchItemFailure[] = [];
    records.forEach((record, i) => {
      if (outcomes[i]?.redeliver) {
        batchItemFailures.push({ itemIdentifier: record.messageId });
      }
    });

    const failureCount = batchItemFailures.length;
    const successCount = outcomes.filter((o) => !o.redeliver).length;
    this.recordBatchResults(successCount, failureCount);

    logProvider.info('SQS batch processing complete', {
      totalMessages: records.length,
      successCount,
      failureCount,
      partialBatchEnabled: partialBatchFailure,
    });

    if (!partialBatchFailure) {
      const index = outcomes.findIndex((o) => o.redeliver);
      const failed = outcomes[index];
      const record = records[index];
      if (failed?.redeliver && record) {
        throw new BatchProcessingError(record.messageId, failed.reason, { cause: failed.error });
      }
    }

    return { batchItemFailures };
  }

  /** Runs every record with at most `maxConcurrency` in flight. */
  private async processAll(records: SQSRecord[], lambdaContext?: LambdaContext): Promise<RecordOutcome[]> {
    const outcomes: RecordOutcome[] = new Array<RecordOutcome>(records.length);
    const limit = Math.max(1, Math.min(this.options.maxConcurrency, records.length));
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < records.length) {
        const index = next++;
        const record = records[index];
        if (record) {
          outcomes[index] = await this.processRecord(record, index, records.length, lambdaContext);
        }
      }
    };

    await Promise.all(Array.from({ length: limit }, () => worker()));
    return outcomes;
  }

  /** Sequential; stops at the first record that needs redelivery. */
  private async processUntilFailure(records: SQSRecord[], lambdaContext?: LambdaContext): Promise<RecordOutcome[]> {
    const outcomes: RecordOutcome[] = [];
    for (const [index, record] of records.entries()) {
      const outcome = await this.processRecord(record, index, records.length, lambdaContext);
      outcomes.push(outcome);
      if (outcome.redeliver) break;
    }
    return outcomes;
  }

  /** Never rejects; a throw from the handler marks only this record for redelivery. */
  private async processRecord(
    record: SQSRecord,
    index: number,
    total: number,
    lambdaContext?: LambdaContext
  ): Promise<RecordOutcome> {
    const { logProvider, timeoutMs } = this.options;
    logProvider.debug('Processing SQS message', {
      messageId: record.messageId,
      position: index + 1,
      total,
    });

    const { ctx, cancel } = messageContext(timeoutMs, lambdaContext);
    let result: HandlerResult;
    try {
      result = await this.handler.handle(buildSqsRequest(record), ctx);
    } catch (err) {
      const reason = `handler threw: ${describeThrown(err)}`;
      logProvider.error('Message processing failed', { messageId: record.messageId, error: reason });
      return { redeliver: true, reason, error: err instanceof Error ? err : undefined };
    } finally {
      cancel();
    }

    const outcome = classify(result);
    if (outcome.redeliver) {
      logProvider.error('Message processing failed', {
        messageId: record.messageId,
        error: outcome.reason,
        responseSuccess: result.response.success,
      });
    }
    return outcome;
  }

  private recordBatchResults(successCount: number, failureCount: number): void {
    const { metricsProvider } = this.options;
    metricsProvider.recordHistogram('lambda.batch.success_count', successCount);
    metricsProvider.recordHistogram('lambda.batch.failure_count', failureCount);

    if (failureCount === 0) {
      metricsProvider.incrementCounter('lambda.batch.complete_success');
    } else if (successCount === 0) {
      metricsProvider.incrementCounter('lambda.batch.complete_failure');
    } else {
      metricsProvider.incrementCounter('lambda.batch.partial_failure');
    }
  }
}

/** A returned error, or a failed response marked retryable, asks for redelivery. */
function classify({ response, error }: HandlerResult): RecordOutcome {
  if (error) {
    return { redeliver: true, reason: `handler error: ${error.message}`, error };
  }
  if (!response.success && response.error?.retryable) {
    return { redeliver: true, reason: `retryable error: ${response.error.message}` };
  }
  return { redeliver: false };
}

/** The per-message deadline, capped by what is left of the invocation. */
function messageContext(timeoutMs: number, lambdaContext?: LambdaContext): { ctx: RequestContext; cancel: () => void } {
  const limits: number[] = [];
  if (timeoutMs > 0) limits.push(timeoutMs);
  if (lambdaContext) limits.push(Math.max(0, lambdaContext.getRemainingTimeInMillis()));

  return limits.length > 0
    ? withTimeout(backgroundContext(), Math.min(...limits))
    : withCancel(backgroundContext());
}

export function buildSqsRequest(record: SQSRecord): DispatchRequest {
  const metadata: Record<string, string> = {};
  for (const [key, attr] of Object.entries(record.messageAttributes ?? {})) {
    if (attr.stringValue !== undefined) {
      metadata[key] = attr.stringValue;
    }
  }

  metadata.sqs_message_id = record.messageId;
  metadata.sqs_receipt_handle = record.receiptHandle;
  metadata.sqs_event_source = record.eventSource;

  return {
    id: metadata.request_id || record.messageId,
    source: 'sqs',
    type: metadata.type || DEFAULT_SQS_MESSAGE_TYPE,
    payload: toJsonPayload(record.body),
    metadata,
    timestamp: new Date(),
  };
}

/** Bodies that are not JSON travel as a JSON string. */
function toJsonPayload(body: string): string {
  try {
    JSON.parse(body);
    return body;
  } catch {
    return JSON.stringify(body);
  }
}

function isSqsEvent(event: unknown): event is SQSEvent {
  return (
    typeof event === 'object' &&
    event !== null &&
    'Records' in event &&
    Array.isArray(event.Records) &&
    event.Records.length > 0
  );
}
