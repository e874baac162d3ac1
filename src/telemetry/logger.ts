/**
 * Structured logger with trace correlation.
 *
 * PinoLogger writes through pino; `withContext` derives a child logger that
 * stamps `trace_id` and `span_id` from the active span onto every line.
 * NoopLogger discards everything.
 */

import type { Context } from '@opentelemetry/api';
import pino from 'pino';
import type { DestinationStream, Logger as PinoInstance, LoggerOptions } from 'pino';
import pretty from 'pino-pretty';

import type { LoggingConfig } from '../config/schema.js';
import { spanContextFromContext } from './tracer.js';

// -----------------------------------------------------------------------------
// Interfaces
// -----------------------------------------------------------------------------

/**
 * Extra structured fields for one log line.
 * An `err` field holding an Error is serialized with its stack.
 */
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;

  /**
   * Logger correlated with the span in `ctx`.
   * Returns the receiver itself when `ctx` carries no span.
   */
  withContext(ctx: Context): Logger;

  /**
   * Logger that adds `fields` to every line. The receiver is unchanged.
   */
  withFields(fields: LogFields): Logger;
}

/**
 * Static fields bound to every line of a service's logger.
 */
export interface ServiceIdentity {
  service: string;
  version: string;
  environment: string;
}

// -----------------------------------------------------------------------------
// Pino Variant
// -----------------------------------------------------------------------------

export class PinoLogger implements Logger {
  constructor(
    private readonly base: PinoInstance,
    private readonly includeTraceId: boolean = true
  ) {}

  debug(message: string, fields?: LogFields): void {
    if (fields === undefined) this.base.debug(message);
    else this.base.debug(fields, message);
  }

  info(message: string, fields?: LogFields): void {
    if (fields === undefined) this.base.info(message);
    else this.base.info(fields, message);
  }

  warn(message: string, fields?: LogFields): void {
    if (fields === undefined) this.base.warn(message);
    else this.base.warn(fields, message);
  }

  error(message: string, fields?: LogFields): void {
    if (fields === undefined) this.base.error(message);
    else this.base.error(fields, message);
  }

  withContext(ctx: Context): Logger {
    if (!this.includeTraceId) return this;

    const { traceId, spanId } = spanContextFromContext(ctx);
    if (traceId === '') return this;

    return new PinoLogger(
      this.base.child({ trace_id: traceId, span_id: spanId }),
      this.includeTraceId
    );
  }

  withFields(fields: LogFields): Logger {
    return new PinoLogger(this.base.child(fields), this.includeTraceId);
  }

  /** The underlying pino instance */
  pino(): PinoInstance {
    return this.base;
  }
}

// -----------------------------------------------------------------------------
// No-op Variant
// -----------------------------------------------------------------------------

export class NoopLogger implements Logger {
  debug(_message: string, _fields?: LogFields): void {}
  info(_message: string, _fields?: LogFields): void {}
  warn(_message: string, _fields?: LogFields): void {}
  error(_message: string, _fields?: LogFields): void {}

  withContext(_ctx: Context): Logger {
    return this;
  }

  withFields(_fields: LogFields): Logger {
    return this;
  }
}

/** Shared no-op logger instance */
export const NOOP_LOGGER: Logger = new NoopLogger();

// -----------------------------------------------------------------------------
// Factory
// -----------------------------------------------------------------------------

/**
 * Build the pino instance for a logging configuration.
 *
 * `json` writes one JSON object per line; `text` renders through pino-pretty
 * in-process (no worker thread).
 *
 * @param destination - Where lines go (stdout if omitted)
 */
export function createPinoInstance(
  config: LoggingConfig,
  identity: ServiceIdentity,
  destination?: DestinationStream
): PinoInstance {
  const options: LoggerOptions = {
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: identity.service,
      version: identity.version,
      environment: identity.environment,
    },
  };

  if (config.format === 'text') {
    const stream = pretty({
      colorize: false,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname,service,version,environment',
      messageFormat: '[{service}] {msg}',
      ...(destination === undefined ? {} : { destination }),
    });
    return pino(options, stream);
  }

  return destination === undefined ? pino(options) : pino(options, destination);
}

/**
 * Create a correlated logger for a logging configuration.
 */
export function createLogger(
  config: LoggingConfig,
  identity: ServiceIdentity,
  destination?: DestinationStream
): PinoLogger {
  return new PinoLogger(createPinoInstance(config, identity, destination), config.includeTraceId);
}
