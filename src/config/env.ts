/**
 * Environment variable parsing utilities for configuration.
 * Maps environment variables to config fields with type coercion.
 */

import { LOG_FORMATS, LOG_LEVELS } from './constants.js';
import type { LogFormat, LogLevel } from './constants.js';
import type {
  LoggingConfig,
  MetricsConfig,
  TelemetryConfigInput,
  TracingConfig,
} from './schema.js';

/**
 * Interface for reading environment variables.
 * Enables dependency injection for testing.
 */
export interface IEnvReader {
  /**
   * Get a string environment variable.
   */
  get(name: string): string | undefined;

  /**
   * Get a boolean environment variable with coercion.
   * Recognizes 'true', '1', 'yes' as true; 'false', '0', 'no' as false.
   */
  getBoolean(name: string): boolean | undefined;

  /**
   * Get a number environment variable with coercion.
   */
  getNumber(name: string): number | undefined;
}

/**
 * Default implementation using process.env.
 */
export class ProcessEnvReader implements IEnvReader {
  get(name: string): string | undefined {
    return process.env[name];
  }

  getBoolean(name: string): boolean | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;

    const lower = value.toLowerCase();
    if (lower === 'true' || lower === '1' || lower === 'yes') return true;
    if (lower === 'false' || lower === '0' || lower === 'no') return false;

    return undefined;
  }

  getNumber(name: string): number | undefined {
    const value = this.get(name);
    if (value === undefined || value.trim() === '') return undefined;

    const num = Number(value);
    return Number.isNaN(num) ? undefined : num;
  }
}

// -----------------------------------------------------------------------------
// Validators
// -----------------------------------------------------------------------------

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

// -----------------------------------------------------------------------------
// Mappings
// -----------------------------------------------------------------------------

function tracingSection(config: TelemetryConfigInput): Partial<TracingConfig> {
  config.tracing ??= {};
  return config.tracing;
}

function metricsSection(config: TelemetryConfigInput): Partial<MetricsConfig> {
  config.metrics ??= {};
  return config.metrics;
}

function loggingSection(config: TelemetryConfigInput): Partial<LoggingConfig> {
  config.logging ??= {};
  return config.logging;
}

/**
 * Environment variable to config field mappings.
 * Invalid values for validated fields are dropped (fall back to defaults).
 * OTEL_TRACES_SAMPLER_ARG is passed through unchecked so that validation
 * reports an out-of-range rate instead of silently ignoring it.
 */
type EnvMapping =
  | { envVar: string; type: 'string'; assign: (config: TelemetryConfigInput, value: string) => void }
  | {
      envVar: string;
      type: 'boolean';
      assign: (config: TelemetryConfigInput, value: boolean) => void;
    }
  | { envVar: string; type: 'number'; assign: (config: TelemetryConfigInput, value: number) => void };

const ENV_MAPPINGS: EnvMapping[] = [
  // Service
  {
    envVar: 'AGENT_TELEMETRY_ENABLED',
    type: 'boolean',
    assign: (c, v) => {
      c.enabled = v;
    },
  },
  {
    envVar: 'OTEL_SERVICE_NAME',
    type: 'string',
    assign: (c, v) => {
      if (v !== '') c.serviceName = v;
    },
  },
  {
    envVar: 'AGENT_SERVICE_VERSION',
    type: 'string',
    assign: (c, v) => {
      c.serviceVersion = v;
    },
  },
  {
    envVar: 'AGENT_ENVIRONMENT',
    type: 'string',
    assign: (c, v) => {
      c.environment = v;
    },
  },

  // Tracing
  {
    envVar: 'AGENT_TRACING_ENABLED',
    type: 'boolean',
    assign: (c, v) => {
      tracingSection(c).enabled = v;
    },
  },
  {
    envVar: 'OTEL_EXPORTER_OTLP_TRACES_ENDPOINT',
    type: 'string',
    assign: (c, v) => {
      if (v !== '') tracingSection(c).endpoint = v;
    },
  },
  {
    envVar: 'OTEL_TRACES_SAMPLER_ARG',
    type: 'number',
    assign: (c, v) => {
      tracingSection(c).sampleRate = v;
    },
  },

  // Metrics
  {
    envVar: 'AGENT_METRICS_ENABLED',
    type: 'boolean',
    assign: (c, v) => {
      metricsSection(c).enabled = v;
    },
  },
  {
    envVar: 'OTEL_EXPORTER_OTLP_METRICS_ENDPOINT',
    type: 'string',
    assign: (c, v) => {
      if (v !== '') metricsSection(c).endpoint = v;
    },
  },
  {
    envVar: 'OTEL_METRIC_EXPORT_INTERVAL',
    type: 'number',
    assign: (c, v) => {
      if (isPositiveInteger(v)) metricsSection(c).intervalMs = v;
    },
  },

  // Logging
  {
    envVar: 'AGENT_LOG_LEVEL',
    type: 'string',
    assign: (c, v) => {
      const level = v.toLowerCase();
      if (isLogLevel(level)) loggingSection(c).level = level;
    },
  },
  {
    envVar: 'AGENT_LOG_FORMAT',
    type: 'string',
    assign: (c, v) => {
      const format = v.toLowerCase();
      if (isLogFormat(format)) loggingSection(c).format = format;
    },
  },
];

/**
 * Read environment variables and return a partial config object.
 * Only includes values that are present and parse.
 */
export function readEnvConfig(
  envReader: IEnvReader = new ProcessEnvReader()
): TelemetryConfigInput {
  const config: TelemetryConfigInput = {};

  for (const mapping of ENV_MAPPINGS) {
    switch (mapping.type) {
      case 'boolean': {
        const value = envReader.getBoolean(mapping.envVar);
        if (value !== undefined) mapping.assign(config, value);
        break;
      }
      case 'number': {
        const value = envReader.getNumber(mapping.envVar);
        if (value !== undefined) mapping.assign(config, value);
        break;
      }
      case 'string': {
        const value = envReader.get(mapping.envVar);
        if (value !== undefined) mapping.assign(config, value);
        break;
      }
    }
  }

  return config;
}
