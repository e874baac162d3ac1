/**
 * Default configuration values for telemetry.
 * These constants provide the documented defaults for every configuration section.
 */

// Service identity
export const DEFAULT_TELEMETRY_ENABLED = false;
export const DEFAULT_SERVICE_NAME = 'agent-runtime';
export const DEFAULT_SERVICE_VERSION = '0.1.0';
export const DEFAULT_ENVIRONMENT = 'development';

// Exporter kinds
export const EXPORTER_TYPES = ['otlp-grpc', 'otlp-http', 'console', 'none'] as const;
export type ExporterType = (typeof EXPORTER_TYPES)[number];

// Tracing defaults
export const DEFAULT_TRACING_ENABLED = false;
export const DEFAULT_TRACING_EXPORTER: ExporterType = 'otlp-grpc';
export const DEFAULT_TRACING_ENDPOINT = 'localhost:4317';
export const DEFAULT_TRACING_INSECURE = true;
export const DEFAULT_SAMPLE_RATE = 1.0;
export const DEFAULT_EXPORT_TIMEOUT_MS = 30_000;

// Metrics defaults
export const DEFAULT_METRICS_ENABLED = false;
export const DEFAULT_METRICS_EXPORTER: ExporterType = 'otlp-grpc';
export const DEFAULT_METRICS_ENDPOINT = 'localhost:4317';
export const DEFAULT_METRICS_INSECURE = true;
export const DEFAULT_METRICS_INTERVAL_MS = 60_000;

// Logging defaults
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ['text', 'json'] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';
export const DEFAULT_LOG_FORMAT: LogFormat = 'text';
export const DEFAULT_INCLUDE_TRACE_ID = true;

// Instrumentation scope used for tracers and meters
export const INSTRUMENTATION_SCOPE = 'agent-telemetry';
