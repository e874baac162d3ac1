/**
 * Exporter construction for the tracing and metrics pipelines.
 * Wire protocols come from the OpenTelemetry exporter packages.
 */

import { OTLPMetricExporter as OTLPGrpcMetricExporter } from '@opentelemetry/exporter-metrics-otlp-grpc';
import { OTLPMetricExporter as OTLPHttpMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { OTLPTraceExporter as OTLPGrpcTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import { OTLPTraceExporter as OTLPHttpTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { ConsoleMetricExporter, PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import type { MetricReader, PushMetricExporter } from '@opentelemetry/sdk-metrics';
import { ConsoleSpanExporter } from '@opentelemetry/sdk-trace-base';
import type { SpanExporter } from '@opentelemetry/sdk-trace-base';

import { DEFAULT_EXPORT_TIMEOUT_MS } from '../config/constants.js';
import type { MetricsConfig, TracingConfig } from '../config/schema.js';
import { TelemetryError } from '../errors/index.js';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

/** OTLP/HTTP signal paths */
export const OTLP_TRACES_PATH = '/v1/traces';
export const OTLP_METRICS_PATH = '/v1/metrics';

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

// -----------------------------------------------------------------------------
// Endpoint Resolution
// -----------------------------------------------------------------------------

/**
 * Turn a collector endpoint into an exporter URL.
 *
 * Accepts `host:port` or a full URL. A bare host gets `http://` when
 * insecure and `https://` otherwise; the gRPC exporters derive transport
 * security from that scheme. `path` is appended only when the endpoint has
 * no path of its own.
 *
 * @throws TelemetryError (INVALID_CONFIG) when the endpoint does not parse
 */
export function resolveOtlpUrl(endpoint: string, insecure: boolean, path?: string): string {
  const raw = SCHEME_PATTERN.test(endpoint) ? endpoint : `${insecure ? 'http' : 'https'}://${endpoint}`;

  let url: URL;
  try {
    url = new URL(raw);
  } catch (err) {
    throw new TelemetryError('INVALID_CONFIG', `Invalid collector endpoint: "${endpoint}"`, {
      cause: err,
    });
  }

  if (path !== undefined && (url.pathname === '' || url.pathname === '/')) {
    url.pathname = path;
  }
  return url.toString();
}

// -----------------------------------------------------------------------------
// Exporter Factories
// -----------------------------------------------------------------------------

/**
 * Create the span exporter for a tracing configuration.
 * Returns undefined for the 'none' exporter.
 */
export function createSpanExporter(config: TracingConfig): SpanExporter | undefined {
  switch (config.exporter) {
    case 'otlp-grpc':
      return new OTLPGrpcTraceExporter({
        url: resolveOtlpUrl(config.endpoint, config.insecure),
        timeoutMillis: config.timeoutMs,
      });
    case 'otlp-http':
      return new OTLPHttpTraceExporter({
        url: resolveOtlpUrl(config.endpoint, config.insecure, OTLP_TRACES_PATH),
        timeoutMillis: config.timeoutMs,
      });
    case 'console':
      return new ConsoleSpanExporter();
    case 'none':
      return undefined;
  }
}

/**
 * Create the push exporter for a metrics configuration.
 * Returns undefined for the 'none' exporter.
 */
export function createMetricExporter(config: MetricsConfig): PushMetricExporter | undefined {
  switch (config.exporter) {
    case 'otlp-grpc':
      return new OTLPGrpcMetricExporter({
        url: resolveOtlpUrl(config.endpoint, config.insecure),
      });
    case 'otlp-http':
      return new OTLPHttpMetricExporter({
        url: resolveOtlpUrl(config.endpoint, config.insecure, OTLP_METRICS_PATH),
      });
    case 'console':
      return new ConsoleMetricExporter();
    case 'none':
      return undefined;
  }
}

/**
 * Create a periodic reader around the configured metric exporter.
 * The export timeout never exceeds the interval.
 */
export function createMetricReader(config: MetricsConfig): MetricReader | undefined {
  const exporter = createMetricExporter(config);
  if (exporter === undefined) return undefined;

  return new PeriodicExportingMetricReader({
    exporter,
    exportIntervalMillis: config.intervalMs,
    exportTimeoutMillis: Math.min(DEFAULT_EXPORT_TIMEOUT_MS, config.intervalMs),
  });
}
