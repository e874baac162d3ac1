/**
 * Telemetry provider type definitions.
 */

import type { DestinationStream, Logger as PinoInstance } from 'pino';
import type { MetricReader } from '@opentelemetry/sdk-metrics';
import type { SpanExporter } from '@opentelemetry/sdk-trace-base';

import type { Logger } from './logger.js';
import type { Metrics } from './metrics.js';
import type { Tracer } from './tracer.js';

// -----------------------------------------------------------------------------
// Lifecycle
// -----------------------------------------------------------------------------

/**
 * Provider lifecycle state.
 * - disabled: built with `enabled: false`, every component is a no-op
 * - running: at least the logger is live; tracing/metrics per config
 * - shutdown: terminal, shutdown callbacks have run
 */
export type ProviderState = 'disabled' | 'running' | 'shutdown';

/**
 * Releases one backend's resources (flushes buffered data first).
 */
export type ShutdownCallback = () => Promise<void>;

// -----------------------------------------------------------------------------
// Options
// -----------------------------------------------------------------------------

/**
 * Options for building a telemetry provider.
 */
export interface TelemetryProviderOptions {
  /** Span exporter replacing the configured one (exported synchronously, for tests) */
  spanExporter?: SpanExporter;
  /** Metric reader replacing the configured periodic reader */
  metricReader?: MetricReader;
  /** Existing pino instance to log through (logging config level/format then unused) */
  logger?: PinoInstance;
  /** Destination for the pino instance built from the logging config */
  logDestination?: DestinationStream;
  /** Callback for debug messages */
  onDebug?: (message: string) => void;
}

/**
 * String carrier for trace-context propagation (e.g. HTTP headers).
 */
export type PropagationCarrier = Record<string, string>;

/**
 * Collaborators of the traced wrappers. Each one left out resolves to the
 * process-wide provider's at call time (a no-op while none is installed).
 */
export interface InstrumentationOptions {
  tracer?: Tracer;
  metrics?: Metrics;
  logger?: Logger;
}
