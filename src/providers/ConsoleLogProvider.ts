/**
 * In-memory log provider.
 * Keeps every event for inspection (tests, local debugging) and can
 * echo the formatted line to stdout.
 */

import type { ILogProvider, LogEvent } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to console.log as they arrive. Default: false. */
  outputToConsole?: boolean;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Inspectable buffer of all logged events (most recent last). */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
  }

  log(event: LogEvent): void {
    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    this.events.push(stamped);

    if (this.outputToConsole) {
      const prefix = `[${stamped.level.toUpperCase()}]`;
      const fieldsStr = stamped.fields ? ` ${JSON.stringify(stamped.fields)}` : '';
      console.log(`${prefix} ${stamped.message}${fieldsStr}`);
    }
  }

  async flush(): Promise<void> {
    // Events are kept in memory; nothing to deliver.
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

  /** Events whose message contains `text`. */
  find(text: string): LogEvent[] {
    return this.events.filter((e) => e.message.includes(text));
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}
