/**
 * Default application and validation for telemetry configuration.
 */

import { errorResponse, successResponse } from '../errors/index.js';
import type { TelemetryResponse } from '../errors/index.js';
import { ProcessEnvReader, readEnvConfig } from './env.js';
import type { IEnvReader } from './env.js';
import { TelemetryConfigSchema, getDefaultConfig } from './schema.js';
import type { TelemetryConfig, TelemetryConfigInput } from './schema.js';

/**
 * Fill every absent field of `input` from `base`.
 * Only `undefined` counts as absent: `0`, `false` and `''` are kept, so a
 * sample rate of 0 stays 0.
 *
 * @param input - Caller-supplied partial configuration
 * @param base - Values used for absent fields (documented defaults if omitted)
 */
export function withDefaults(
  input: TelemetryConfigInput = {},
  base: TelemetryConfig = getDefaultConfig()
): TelemetryConfig {
  const tracing = input.tracing ?? {};
  const metrics = input.metrics ?? {};
  const logging = input.logging ?? {};

  return {
    enabled: input.enabled ?? base.enabled,
    serviceName: input.serviceName ?? base.serviceName,
    serviceVersion: input.serviceVersion ?? base.serviceVersion,
    environment: input.environment ?? base.environment,
    tracing: {
      enabled: tracing.enabled ?? base.tracing.enabled,
      exporter: tracing.exporter ?? base.tracing.exporter,
      endpoint: tracing.endpoint ?? base.tracing.endpoint,
      insecure: tracing.insecure ?? base.tracing.insecure,
      sampleRate: tracing.sampleRate ?? base.tracing.sampleRate,
      timeoutMs: tracing.timeoutMs ?? base.tracing.timeoutMs,
    },
    metrics: {
      enabled: metrics.enabled ?? base.metrics.enabled,
      exporter: metrics.exporter ?? base.metrics.exporter,
      endpoint: metrics.endpoint ?? base.metrics.endpoint,
      insecure: metrics.insecure ?? base.metrics.insecure,
      intervalMs: metrics.intervalMs ?? base.metrics.intervalMs,
    },
    logging: {
      level: logging.level ?? base.logging.level,
      format: logging.format ?? base.logging.format,
      includeTraceId: logging.includeTraceId ?? base.logging.includeTraceId,
    },
  };
}

/**
 * Validate a complete configuration against the schema.
 * Returns INVALID_CONFIG naming the first offending field.
 */
export function validateConfig(config: TelemetryConfig): TelemetryResponse<TelemetryConfig> {
  const parsed = TelemetryConfigSchema.safeParse(config);
  if (parsed.success) {
    return successResponse(parsed.data, 'Configuration valid');
  }

  const issue = parsed.error.issues[0];
  const detail =
    issue === undefined ? 'unknown issue' : `${issue.path.map(String).join('.')}: ${issue.message}`;
  return errorResponse('INVALID_CONFIG', `Invalid telemetry configuration: ${detail}`, parsed.error);
}

/**
 * Resolve configuration with precedence: explicit input, then environment,
 * then documented defaults.
 */
export function resolveConfig(
  input: TelemetryConfigInput = {},
  envReader: IEnvReader = new ProcessEnvReader()
): TelemetryConfig {
  return withDefaults(input, withDefaults(readEnvConfig(envReader)));
}
