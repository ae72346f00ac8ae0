/**
 * Broker-consumer adapter (RabbitMQ via amqplib).
 *
 * Consumes one durable queue with manual acknowledgement. Deliveries are
 * queued onto a serial promise chain, so at most one message is inside the
 * handler at a time regardless of prefetch. Success acks; failure nacks,
 * requeueing only on the first delivery so a poison message is dropped (or
 * dead-lettered) on its second failure. A connection or channel that closes
 * underneath the consumer stops it.
 */

import amqp, { type ConsumeMessage, type Message, type Options } from 'amqplib';
import { backgroundContext, withCancel, withTimeout } from '../context.js';
import type { Handler } from '../handler/Handler.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IMetricsProvider } from '../providers/IMetricsProvider.js';
import type { DispatchRequest, HandlerResult } from '../types/models.js';
import type { IRuntime } from './IRuntime.js';

/** The slice of an amqplib Channel the consumer uses. */
export interface BrokerChannel {
  prefetch(count: number): Promise<unknown>;
  assertQueue(queue: string, options?: Options.AssertQueue): Promise<unknown>;
  consume(
    queue: string,
    onMessage: (msg: ConsumeMessage | null) => void,
    options?: Options.Consume
  ): Promise<{ consumerTag: string }>;
  cancel(consumerTag: string): Promise<unknown>;
  ack(message: Message, allUpTo?: boolean): void;
  nack(message: Message, allUpTo?: boolean, requeue?: boolean): void;
  close(): Promise<void>;
  on(event: BrokerEvent, listener: (...args: unknown[]) => void): unknown;
}

export interface BrokerConnection {
  createChannel(): Promise<BrokerChannel>;
  close(): Promise<void>;
  on(event: BrokerEvent, listener: (...args: unknown[]) => void): unknown;
}

export type BrokerEvent = 'error' | 'close';

export type BrokerConnect = (url: string) => Promise<BrokerConnection>;

export interface BrokerConsumerOptions {
  url: string;
  queue: string;
  /** Unacked deliveries the broker may push ahead; 0 leaves it unlimited. */
  prefetch: number;
  /** Per-message deadline; 0 leaves only the handler's own timeout. */
  timeoutMs: number;
  logProvider: ILogProvider;
  metricsProvider: IMetricsProvider;
  /** Swapped out in tests. Defaults to amqplib's connect. */
  connect?: BrokerConnect;
}

const DEFAULT_MESSAGE_TYPE = 'message';

const defaultConnect: BrokerConnect = (url) => amqp.connect(url);

export class BrokerConsumerAdapter implements IRuntime {
  readonly name = 'rabbitmq';

  private connection: BrokerConnection | null = null;
  private channel: BrokerChannel | null = null;
  private consumerTag: string | null = null;
  /** Delivered but not yet picked up by the chain. */
  private readonly pending = new Set<ConsumeMessage>();
  private chain: Promise<void> = Promise.resolve();
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly handler: Handler,
    private readonly options: BrokerConsumerOptions
  ) {}

  /** Connect and begin consuming. Aborting `signal` stops the consumer. */
  async start(signal?: AbortSignal): Promise<void> {
    const { url, queue, prefetch, logProvider } = this.options;
    const connect = this.options.connect ?? defaultConnect;

    const connection = await connect(url);
    this.connection = connection;
    this.watch('connection', connection, () => this.connection === connection);

    try {
      const channel = await connection.createChannel();
      this.channel = channel;
      this.watch('channel', channel, () => this.channel === channel);

      if (prefetch > 0) {
        await channel.prefetch(prefetch);
      }
      await channel.assertQueue(queue, { durable: true, exclusive: false, autoDelete: false });

      const { consumerTag } = await channel.consume(queue, (msg) => this.onDelivery(msg), { noAck: false });
      this.consumerTag = consumerTag;
    } catch (err) {
      await this.closeTransport();
      throw err;
    }

    logProvider.info('RabbitMQ consumer started', { queue, prefetch });
    this.options.metricsProvider.incrementCounter('rabbitmq.starts');

    signal?.addEventListener('abort', () => this.stopInBackground('start signal aborted'), { once: true });
  }

  /**
   * Stop consuming: cancel the consumer, requeue deliveries that have not
   * started, wait for the one in flight, then close channel and connection.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private onDelivery(msg: ConsumeMessage | null): void {
    if (msg === null) {
      this.stopInBackground('consumer cancelled by broker');
      return;
    }

    if (this.stopping) {
      this.settle(msg, 'nack', true);
      return;
    }

    this.pending.add(msg);
    this.chain = this.chain.then(() => this.dispatch(msg));
  }

  private async dispatch(msg: ConsumeMessage): Promise<void> {
    // Already requeued by stop()
    if (!this.pending.delete(msg)) return;
    await this.processMessage(msg);
  }

  /** Never rejects; the chain must survive a bad message. */
  private async processMessage(msg: ConsumeMessage): Promise<void> {
    const { logProvider, metricsProvider, timeoutMs } = this.options;
    const started = Date.now();
    const request = buildBrokerRequest(msg);

    logProvider.info('Processing RabbitMQ message', { requestId: request.id, type: request.type });
    metricsProvider.incrementCounter('rabbitmq.messages');

    const { ctx, cancel } =
      timeoutMs > 0 ? withTimeout(backgroundContext(), timeoutMs) : withCancel(backgroundContext());

    let result: HandlerResult | null = null;
    let thrown: unknown = null;
    try {
      result = await this.handler.handle(request, ctx);
    } catch (err) {
      thrown = err;
    } finally {
      cancel();
    }

    if (result && !result.error && result.response.success) {
      this.settle(msg, 'ack');
      logProvider.info('Message processed successfully', {
        requestId: request.id,
        durationMs: Date.now() - started,
      });
      metricsProvider.incrementCounter('rabbitmq.success');
    } else {
      const requeue = !msg.fields.redelivered;
      this.settle(msg, 'nack', requeue);
      logProvider.error('Message processing failed', {
        requestId: request.id,
        error: describeFailure(result, thrown),
        requeued: requeue,
      });
      metricsProvider.incrementCounter('rabbitmq.failure');
    }

    metricsProvider.recordHistogram('rabbitmq.duration_ms', Date.now() - started);
  }

  /** Ack or nack, logging instead of throwing when the channel is gone. */
  private settle(msg: ConsumeMessage, action: 'ack' | 'nack', requeue = false): void {
    const channel = this.channel;
    if (!channel) return;

    try {
      if (action === 'ack') {
        channel.ack(msg);
      } else {
        channel.nack(msg, false, requeue);
      }
    } catch (err) {
      this.options.logProvider.error(`Failed to ${action} message`, {
        deliveryTag: msg.fields.deliveryTag,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  /**
   * amqplib emits 'error' on a dropped transport and throws if nothing
   * listens. A close we did not ask for stops the consumer.
   */
  private watch(what: 'connection' | 'channel', emitter: BrokerChannel | BrokerConnection, isCurrent: () => boolean): void {
    const { logProvider } = this.options;

    emitter.on('error', (err: unknown) => {
      logProvider.error(`RabbitMQ ${what} error`, {
        error: err instanceof Error ? err.message : String(err),
      });
      this.options.metricsProvider.incrementCounter('rabbitmq.transport_errors', { source: what });
    });

    emitter.on('close', () => {
      if (isCurrent() && !this.stopping) {
        this.stopInBackground(`${what} closed`);
      }
    });
  }

  private stopInBackground(reason: string): void {
    this.options.logProvider.info('Stopping RabbitMQ consumer', { reason });
    this.stop().catch((err: unknown) => {
      this.options.logProvider.error('RabbitMQ consumer failed to stop', {
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }

  private async shutdown(): Promise<void> {
    const { logProvider } = this.options;
    const channel = this.channel;

    if (channel && this.consumerTag) {
      try {
        await channel.cancel(this.consumerTag);
      } catch (err) {
        logProvider.warn('Failed to cancel consumer', {
          error: err instanceof Error ? err.message : String(err),
        });
      }
      this.consumerTag = null;
    }

    for (const msg of this.pending) {
      this.settle(msg, 'nack', true);
    }
    this.pending.clear();

    await this.chain;
    await this.closeTransport();

    logProvider.info('RabbitMQ consumer stopped');
  }

  private async closeTransport(): Promise<void> {
    const channel = this.channel;
    const connection = this.connection;
    this.channel = null;
    this.connection = null;

    for (const [what, closable] of [
      ['channel', channel],
      ['connection', connection],
    ] as const) {
      if (!closable) continue;
      try {
        await closable.close();
      } catch (err) {
        this.options.logProvider.warn(`Failed to close ${what}`, {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}

export function buildBrokerRequest(msg: ConsumeMessage): DispatchRequest {
  const { fields, properties } = msg;
  const headers: Record<string, unknown> = properties.headers ?? {};

  const metadata: Record<string, string> = {};
  if (fields.routingKey) metadata.routing_key = fields.routingKey;
  if (fields.exchange) metadata.exchange = fields.exchange;

  const correlationId = asString(properties.correlationId);
  if (correlationId) metadata.correlation_id = correlationId;

  const replyTo = asString(properties.replyTo);
  if (replyTo) metadata.reply_to = replyTo;

  metadata.redelivered = String(fields.redelivered);

  for (const [key, value] of Object.entries(headers)) {
    metadata[`header_${key}`] = formatHeader(value);
  }

  const explicitType = headers.type;
  const timestamp = asNumber(properties.timestamp);

  return {
    id: asString(properties.messageId) || `rmq-${fields.deliveryTag}`,
    source: 'rabbitmq',
    type: explicitType !== undefined && explicitType !== null ? formatHeader(explicitType) : fields.routingKey || DEFAULT_MESSAGE_TYPE,
    payload: msg.content.toString('utf8'),
    metadata,
    // AMQP timestamps are whole seconds
    timestamp: timestamp > 0 ? new Date(timestamp * 1000) : new Date(),
  };
}

function describeFailure(result: HandlerResult | null, thrown: unknown): string {
  if (thrown !== null) return thrown instanceof Error ? thrown.message : String(thrown);
  if (result?.error) return result.error.message;
  return result?.response.error?.message ?? 'unsuccessful response';
}

function asString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

function asNumber(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function formatHeader(value: unknown): string {
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}
