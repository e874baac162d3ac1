/**
 * Configuration module public API.
 *
 * @module config
 *
 * @example
 * import { resolveConfig, validateConfig } from './config';
 *
 * const config = resolveConfig({ enabled: true, tracing: { enabled: true } });
 * const result = validateConfig(config);
 * if (!result.success) {
 *   console.error(result.message);
 * }
 */

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------
export {
  DEFAULT_TELEMETRY_ENABLED,
  DEFAULT_SERVICE_NAME,
  DEFAULT_SERVICE_VERSION,
  DEFAULT_ENVIRONMENT,
  EXPORTER_TYPES,
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
  LOG_LEVELS,
  LOG_FORMATS,
  DEFAULT_LOG_LEVEL,
  DEFAULT_LOG_FORMAT,
  DEFAULT_INCLUDE_TRACE_ID,
  INSTRUMENTATION_SCOPE,
} from './constants.js';

export type { ExporterType, LogLevel, LogFormat } from './constants.js';

// -----------------------------------------------------------------------------
// Schemas
// -----------------------------------------------------------------------------
export {
  TracingConfigSchema,
  MetricsConfigSchema,
  LoggingConfigSchema,
  TelemetryConfigSchema,
  getDefaultConfig,
} from './schema.js';

export type {
  TracingConfig,
  MetricsConfig,
  LoggingConfig,
  TelemetryConfig,
  TelemetryConfigInput,
} from './schema.js';

// -----------------------------------------------------------------------------
// Defaults and Validation
// -----------------------------------------------------------------------------
export { withDefaults, validateConfig, resolveConfig } from './defaults.js';

// -----------------------------------------------------------------------------
// Environment Variable Utilities
// -----------------------------------------------------------------------------
export { ProcessEnvReader, readEnvConfig } from './env.js';

export type { IEnvReader } from './env.js';
