/**
 * Process-wide telemetry provider.
 *
 * Nothing is installed implicitly: building a provider does not make it
 * global. Accessors fall back to no-op implementations while no provider is
 * installed, so instrumented code never needs a null check.
 */

import { metrics, trace } from '@opentelemetry/api';

import type { TelemetryConfigInput } from '../config/schema.js';
import { TelemetryError } from '../errors/index.js';
import { NOOP_LOGGER } from './logger.js';
import type { Logger } from './logger.js';
import { NOOP_METRICS } from './metrics.js';
import type { Metrics } from './metrics.js';
import { createTelemetryProvider } from './provider.js';
import type { TelemetryProvider } from './provider.js';
import { NOOP_TRACER } from './tracer.js';
import type { Tracer } from './tracer.js';
import type { TelemetryProviderOptions } from './types.js';

// -----------------------------------------------------------------------------
// Module State
// -----------------------------------------------------------------------------

let globalProvider: TelemetryProvider | undefined;

// -----------------------------------------------------------------------------
// Installation
// -----------------------------------------------------------------------------

/**
 * Install `provider` as the process-wide provider, replacing any previous one.
 * Its SDK tracer and meter providers also become the OpenTelemetry globals,
 * so third-party instrumentation reports into the same pipelines.
 */
export function setGlobalProvider(provider: TelemetryProvider): void {
  globalProvider = provider;

  trace.disable();
  const tracerProvider = provider.otelTracerProvider();
  if (tracerProvider !== undefined) {
    trace.setGlobalTracerProvider(tracerProvider);
  }

  metrics.disable();
  const meterProvider = provider.otelMeterProvider();
  if (meterProvider !== undefined) {
    metrics.setGlobalMeterProvider(meterProvider);
  }
}

/**
 * The installed provider, if any.
 */
export function getGlobalProvider(): TelemetryProvider | undefined {
  return globalProvider;
}

/**
 * Remove the installed provider and the OpenTelemetry globals.
 * Does not shut the provider down.
 */
export function resetGlobalProvider(): void {
  globalProvider = undefined;
  trace.disable();
  metrics.disable();
}

/**
 * Build a provider and install it.
 * Nothing is installed when the build fails.
 *
 * @throws TelemetryError carrying INVALID_CONFIG or INITIALIZATION_FAILED
 */
export function initGlobalProvider(
  input: TelemetryConfigInput = {},
  options: TelemetryProviderOptions = {}
): TelemetryProvider {
  const result = createTelemetryProvider(input, options);
  if (!result.success) {
    throw TelemetryError.fromResponse(result);
  }
  setGlobalProvider(result.result);
  return result.result;
}

// -----------------------------------------------------------------------------
// Accessors
// -----------------------------------------------------------------------------

/**
 * Tracer of the installed provider, or the no-op tracer.
 */
export function getTracer(): Tracer {
  return globalProvider?.tracer() ?? NOOP_TRACER;
}

/**
 * Metrics of the installed provider, or the no-op metrics.
 */
export function getMetrics(): Metrics {
  return globalProvider?.metrics() ?? NOOP_METRICS;
}

/**
 * Logger of the installed provider, or the no-op logger.
 */
export function getLogger(): Logger {
  return globalProvider?.logger() ?? NOOP_LOGGER;
}
