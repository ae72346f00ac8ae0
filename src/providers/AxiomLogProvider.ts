/**
 * Axiom log provider.
 * Buffers events and ships them in batches to Axiom's ingest API.
 * A failed flush keeps the batch for the next attempt and reports the
 * failure through `onFlushError` (stderr by default, never stdout).
 * No-op when apiToken is empty.
 */

import type { ILogProvider, LogEvent } from './ILogProvider.js';

export interface AxiomLogProviderOptions {
  /** Axiom API token (Bearer). Empty string disables sending. */
  apiToken: string;
  /** Axiom dataset name. */
  dataset: string;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000 (10s). 0 disables. */
  flushIntervalMs?: number;
  /** Drop the oldest events beyond this many. Default: 5_000. */
  maxBufferSize?: number;
  /** Fields merged into every event (service name, environment). */
  baseFields?: Record<string, unknown>;
  /** Called when a flush attempt fails. */
  onFlushError?: (err: Error) => void;
}

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

export class AxiomLogProvider implements ILogProvider {
  private buffer: LogEvent[] = [];
  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly flushThreshold: number;
  private readonly maxBufferSize: number;
  private readonly baseFields: Record<string, unknown>;
  private readonly onFlushError: (err: Error) => void;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private inflight: Promise<void> | null = null;
  private readonly enabled: boolean;

  constructor(options: AxiomLogProviderOptions) {
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.flushThreshold = options.flushThreshold ?? 50;
    this.maxBufferSize = options.maxBufferSize ?? 5_000;
    this.baseFields = options.baseFields ?? {};
    this.onFlushError =
      options.onFlushError ?? ((err) => console.error(`[axiom] flush failed: ${err.message}`));
    this.enabled = Boolean(this.apiToken);

    const flushIntervalMs = options.flushIntervalMs ?? 10_000;
    if (this.enabled && flushIntervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, flushIntervalMs);
      // Don't hold the process open for the timer
      this.flushTimer.unref();
    }
  }

  log(event: LogEvent): void {
    if (!this.enabled) return;

    this.buffer.push({
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
      fields: { ...this.baseFields, ...event.fields },
    });

    if (this.buffer.length > this.maxBufferSize) {
      this.buffer.splice(0, this.buffer.length - this.maxBufferSize);
    }

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  /** Concurrent calls share one in-flight request. */
  flush(): Promise<void> {
    if (!this.enabled || this.buffer.length === 0) return Promise.resolve();
    if (!this.inflight) {
      this.inflight = this.send().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async send(): Promise<void> {
    const batch = [...this.buffer];

    try {
      const response = await fetch(`${AXIOM_INGEST_URL}/${this.dataset}/ingest`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiToken}`,
        },
        body: JSON.stringify(batch.map(flatten)),
      });

      if (!response.ok) {
        throw new Error(`Axiom ingest returned ${response.status}`);
      }

      // Only clear the events that were in this batch
      this.buffer.splice(0, batch.length);
    } catch (err) {
      this.onFlushError(err instanceof Error ? err : new Error(String(err)));
    }
  }

  /** Stop the auto-flush timer and flush remaining events. */
  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }
}

/** Axiom indexes top-level keys; lift structured fields beside level/message. */
function flatten(event: LogEvent): Record<string, unknown> {
  const { fields, timestamp, ...rest } = event;
  return { _time: timestamp, ...fields, ...rest };
}
