/**
 * Zod schemas for telemetry configuration.
 * Types are inferred from schemas using z.infer<> - no manual type definitions.
 */

import { z } from 'zod';
import {
  DEFAULT_TELEMETRY_ENABLED,
  DEFAULT_SERVICE_NAME,
  DEFAULT_SERVICE_VERSION,
  DEFAULT_ENVIRONMENT,
  DEFAULT_TRACING_ENABLED,
  DEFAULT_TRACING_EXPORTER,
  DEFAULT_TRACING_ENDPOINT,
  DEFAULT_TRACING_INSECURE,
  DEFAULT_SAMPLE_RATE,
  DEFAULT_EXPORT_TIMEOUT_MS,
  DEFAULT_METRICS_ENABLED,
  DEFAULT_METRICS_EXPORTER,
  DEFAULT_METRICS_ENDPOINT,
  DEFAULT_METRICS_INSECURE,
  DEFAULT_METRICS_INTERVAL_MS,
  DEFAULT_LOG_LEVEL,
  DEFAULT_LOG_FORMAT,
  DEFAULT_INCLUDE_TRACE_ID,
  EXPORTER_TYPES,
  LOG_LEVELS,
  LOG_FORMATS,
} from './constants.js';

// -----------------------------------------------------------------------------
// Section Schemas
// -----------------------------------------------------------------------------

/**
 * Tracing pipeline configuration.
 */
export const TracingConfigSchema = z.object({
  enabled: z.boolean().default(DEFAULT_TRACING_ENABLED).describe('Enable span export'),
  exporter: z.enum(EXPORTER_TYPES).default(DEFAULT_TRACING_EXPORTER).describe('Span exporter'),
  endpoint: z
    .string()
    .default(DEFAULT_TRACING_ENDPOINT)
    .describe('Collector endpoint (host:port or URL)'),
  insecure: z.boolean().default(DEFAULT_TRACING_INSECURE).describe('Use plaintext transport'),
  sampleRate: z
    .number()
    .min(0, 'sampleRate must be between 0 and 1')
    .max(1, 'sampleRate must be between 0 and 1')
    .default(DEFAULT_SAMPLE_RATE)
    .describe('Fraction of traces to sample'),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_EXPORT_TIMEOUT_MS)
    .describe('Export timeout in milliseconds'),
});

export type TracingConfig = z.infer<typeof TracingConfigSchema>;

/**
 * Metrics pipeline configuration.
 */
export const MetricsConfigSchema = z.object({
  enabled: z.boolean().default(DEFAULT_METRICS_ENABLED).describe('Enable metric export'),
  exporter: z.enum(EXPORTER_TYPES).default(DEFAULT_METRICS_EXPORTER).describe('Metric exporter'),
  endpoint: z
    .string()
    .default(DEFAULT_METRICS_ENDPOINT)
    .describe('Collector endpoint (host:port or URL)'),
  insecure: z.boolean().default(DEFAULT_METRICS_INSECURE).describe('Use plaintext transport'),
  intervalMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_METRICS_INTERVAL_MS)
    .describe('Export interval in milliseconds'),
});

export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;

/**
 * Logger configuration.
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL).describe('Minimum log level'),
  format: z.enum(LOG_FORMATS).default(DEFAULT_LOG_FORMAT).describe('Output format'),
  includeTraceId: z
    .boolean()
    .default(DEFAULT_INCLUDE_TRACE_ID)
    .describe('Add trace_id/span_id to correlated log lines'),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// -----------------------------------------------------------------------------
// Root Schema
// -----------------------------------------------------------------------------

/**
 * Complete telemetry configuration.
 */
export const TelemetryConfigSchema = z.object({
  enabled: z.boolean().default(DEFAULT_TELEMETRY_ENABLED).describe('Master switch'),
  serviceName: z.string().min(1).default(DEFAULT_SERVICE_NAME).describe('service.name resource'),
  serviceVersion: z.string().default(DEFAULT_SERVICE_VERSION).describe('service.version resource'),
  environment: z.string().default(DEFAULT_ENVIRONMENT).describe('Deployment environment'),
  tracing: TracingConfigSchema.default(() => TracingConfigSchema.parse({})),
  metrics: MetricsConfigSchema.default(() => MetricsConfigSchema.parse({})),
  logging: LoggingConfigSchema.default(() => LoggingConfigSchema.parse({})),
});

export type TelemetryConfig = z.infer<typeof TelemetryConfigSchema>;

/**
 * Caller-supplied configuration: every field optional, at every level.
 */
export interface TelemetryConfigInput {
  enabled?: boolean;
  serviceName?: string;
  serviceVersion?: string;
  environment?: string;
  tracing?: Partial<TracingConfig>;
  metrics?: Partial<MetricsConfig>;
  logging?: Partial<LoggingConfig>;
}

/**
 * Get the default configuration.
 */
export function getDefaultConfig(): TelemetryConfig {
  return TelemetryConfigSchema.parse({});
}
