/**
 * pino-backed log provider.
 * Writes one JSON line per event (or pretty output in development).
 * Named channels are pino child loggers bound with `logger: <name>`.
 */

import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';
import type { ILogProvider, LogEvent } from './ILogProvider.js';

export interface PinoLogProviderOptions {
  serviceName: string;
  env?: string;
  /** Minimum level. Default: info. */
  level?: string;
  /** Pretty-print through pino-pretty. Ignored when `destination` is set. */
  pretty?: boolean;
  /** Explicit destination (tests, files). Default: stdout. */
  destination?: DestinationStream;
}

export function createPinoLogger(options: PinoLogProviderOptions): Logger {
  const base: LoggerOptions = {
    level: options.level ?? 'info',
    base: { service: options.serviceName, env: options.env ?? 'development' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  if (options.destination) {
    return pino(base, options.destination);
  }

  return pino({
    ...base,
    transport: options.pretty
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  });
}

export class PinoLogProvider implements ILogProvider {
  constructor(private readonly logger: Logger) {}

  static create(options: PinoLogProviderOptions): PinoLogProvider {
    return new PinoLogProvider(createPinoLogger(options));
  }

  /** A provider for a named channel sharing this provider's destination. */
  channel(name: string): PinoLogProvider {
    return new PinoLogProvider(this.logger.child({ logger: name }));
  }

  log(event: LogEvent): void {
    const { level, message, fields, timestamp, ...extra } = event;
    this.logger[level](
      {
        ...extra,
        ...fields,
        ...(timestamp ? { eventTime: timestamp } : {}),
      },
      message
    );
  }

  async flush(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.logger.flush((err) => (err ? reject(err) : resolve()));
    });
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
