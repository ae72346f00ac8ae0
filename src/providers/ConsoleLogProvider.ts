/**
 * Console-based log provider.
 * Buffers events in memory for inspection (useful in tests).
 * Optionally echoes them as JSON lines to stdout or stderr; the function
 * adapter owns stdout, so it must be given `stream: 'stderr'`.
 */

import { LOG_LEVEL_RANK, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to the console as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Which stream echoed events go to. Default: stdout. */
  stream?: 'stdout' | 'stderr';
  /** Drop events below this level. Default: debug (keep all). */
  minLevel?: LogLevel;
  /** Fields merged into every event (service name, environment). */
  baseFields?: Record<string, unknown>;
  /** Keep events in `events`. Default: true; turn off for long-running processes. */
  retain?: boolean;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Inspectable buffer of all logged events (most recent last). */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly stream: 'stdout' | 'stderr';
  private readonly minRank: number;
  private readonly baseFields: Record<string, unknown> | undefined;
  private readonly retain: boolean;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.stream = options?.stream ?? 'stdout';
    this.minRank = LOG_LEVEL_RANK[options?.minLevel ?? 'debug'];
    this.baseFields = options?.baseFields;
    this.retain = options?.retain ?? true;
  }

  log(event: LogEvent): void {
    if (LOG_LEVEL_RANK[event.level] < this.minRank) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
      ...(this.baseFields && { fields: { ...this.baseFields, ...event.fields } }),
    };
    if (this.retain) this.events.push(stamped);

    if (this.outputToConsole) {
      const line = JSON.stringify(stamped);
      if (this.stream === 'stderr') {
        console.error(line);
      } else {
        console.log(line);
      }
    }
  }

  async flush(): Promise<void> {
    // Nothing to flush: events are synchronous.
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

  /** Events whose message matches exactly. */
  find(message: string): LogEvent[] {
    return this.events.filter((e) => e.message === message);
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}
