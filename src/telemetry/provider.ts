/**
 * Telemetry provider: one tracer, one metrics backend and one logger built
 * from a single configuration, with one shutdown for all of them.
 *
 * Construction is all-or-nothing. Every backend is built before any
 * process-wide state (the W3C propagator) is touched, so a failed build
 * leaves nothing behind.
 */

import { propagation } from '@opentelemetry/api';
import type {
  MeterProvider as OTelMeterProvider,
  TracerProvider as OTelTracerProvider,
} from '@opentelemetry/api';
import {
  CompositePropagator,
  W3CBaggagePropagator,
  W3CTraceContextPropagator,
} from '@opentelemetry/core';
import { resourceFromAttributes } from '@opentelemetry/resources';
import type { Resource } from '@opentelemetry/resources';
import { MeterProvider } from '@opentelemetry/sdk-metrics';
import {
  BasicTracerProvider,
  BatchSpanProcessor,
  SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import type { SpanProcessor } from '@opentelemetry/sdk-trace-base';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';

import { INSTRUMENTATION_SCOPE } from '../config/constants.js';
import { validateConfig, withDefaults } from '../config/defaults.js';
import type { TelemetryConfig, TelemetryConfigInput } from '../config/schema.js';
import { errorResponse, getErrorMessage, successResponse } from '../errors/index.js';
import type { TelemetryResponse } from '../errors/index.js';
import { ATTR_DEPLOYMENT_ENVIRONMENT_NAME } from './conventions.js';
import { createMetricReader, createSpanExporter } from './exporters.js';
import { NOOP_LOGGER, PinoLogger, createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { NOOP_METRICS, OTelMetrics } from './metrics.js';
import type { Metrics } from './metrics.js';
import { NOOP_TRACER, OTelTracer, createSampler } from './tracer.js';
import type { Tracer } from './tracer.js';
import type { ProviderState, ShutdownCallback, TelemetryProviderOptions } from './types.js';

// -----------------------------------------------------------------------------
// Provider
// -----------------------------------------------------------------------------

/**
 * Components a running provider owns.
 */
export interface ProviderParts {
  tracer: Tracer;
  metrics: Metrics;
  logger: Logger;
  tracerProvider?: OTelTracerProvider;
  meterProvider?: OTelMeterProvider;
  shutdownCallbacks: ShutdownCallback[];
}

export class TelemetryProvider {
  private currentState: ProviderState;

  private constructor(
    readonly config: TelemetryConfig,
    private readonly parts: ProviderParts,
    initialState: ProviderState
  ) {
    this.currentState = initialState;
  }

  /**
   * A provider whose tracer, metrics and logger are all no-ops.
   */
  static disabled(config: TelemetryConfig): TelemetryProvider {
    return new TelemetryProvider(
      config,
      { tracer: NOOP_TRACER, metrics: NOOP_METRICS, logger: NOOP_LOGGER, shutdownCallbacks: [] },
      'disabled'
    );
  }

  /** @internal */
  static running(config: TelemetryConfig, parts: ProviderParts): TelemetryProvider {
    return new TelemetryProvider(config, parts, 'running');
  }

  tracer(): Tracer {
    return this.parts.tracer;
  }

  metrics(): Metrics {
    return this.parts.metrics;
  }

  logger(): Logger {
    return this.parts.logger;
  }

  get state(): ProviderState {
    return this.currentState;
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  /** SDK tracer provider, when tracing is enabled */
  otelTracerProvider(): OTelTracerProvider | undefined {
    return this.parts.tracerProvider;
  }

  /** SDK meter provider, when metrics are enabled */
  otelMeterProvider(): OTelMeterProvider | undefined {
    return this.parts.meterProvider;
  }

  /**
   * Flush and release every backend.
   *
   * Callbacks run in registration order and a failing one does not stop the
   * rest; the last failure is reported as SHUTDOWN_FAILED. Shutdown is
   * terminal: a second call returns NOT_INITIALIZED and runs nothing.
   * A disabled provider holds nothing, so its shutdown always succeeds.
   */
  async shutdown(): Promise<TelemetryResponse> {
    if (this.currentState === 'disabled') {
      return successResponse(undefined, 'Telemetry shutdown complete');
    }
    if (this.currentState === 'shutdown') {
      return errorResponse('NOT_INITIALIZED', 'Telemetry provider is already shut down');
    }
    this.currentState = 'shutdown';

    let failures = 0;
    let lastError: unknown;
    for (const callback of this.parts.shutdownCallbacks) {
      try {
        await callback();
      } catch (err) {
        failures++;
        lastError = err;
      }
    }

    if (failures > 0) {
      return errorResponse(
        'SHUTDOWN_FAILED',
        `Telemetry shutdown failed (${String(failures)} of ${String(this.parts.shutdownCallbacks.length)} callbacks): ${getErrorMessage(lastError)}`,
        lastError
      );
    }
    return successResponse(undefined, 'Telemetry shutdown complete');
  }
}

// -----------------------------------------------------------------------------
// Construction
// -----------------------------------------------------------------------------

function buildResource(config: TelemetryConfig): Resource {
  return resourceFromAttributes({
    [ATTR_SERVICE_NAME]: config.serviceName,
    [ATTR_SERVICE_VERSION]: config.serviceVersion,
    [ATTR_DEPLOYMENT_ENVIRONMENT_NAME]: config.environment,
  });
}

function buildSpanProcessors(
  config: TelemetryConfig,
  options: TelemetryProviderOptions,
  debug: (message: string) => void
): SpanProcessor[] {
  if (options.spanExporter !== undefined) {
    debug('Using custom span exporter');
    return [new SimpleSpanProcessor(options.spanExporter)];
  }

  const exporter = createSpanExporter(config.tracing);
  if (exporter === undefined) {
    debug('Span exporter disabled; spans are created but not exported');
    return [];
  }

  debug(`Creating ${config.tracing.exporter} span exporter for ${config.tracing.endpoint}`);
  return [new BatchSpanProcessor(exporter, { exportTimeoutMillis: config.tracing.timeoutMs })];
}

/**
 * Register the W3C trace-context and baggage propagators process-wide.
 */
function registerPropagator(): void {
  // The API refuses to replace a registered propagator, so clear it first
  propagation.disable();
  propagation.setGlobalPropagator(
    new CompositePropagator({
      propagators: [new W3CTraceContextPropagator(), new W3CBaggagePropagator()],
    })
  );
}

/**
 * Build a telemetry provider from (partial) configuration.
 *
 * Absent fields take their documented defaults. Fails with INVALID_CONFIG
 * when validation rejects the configuration and INITIALIZATION_FAILED when
 * a backend cannot be constructed.
 *
 * @example
 * const result = createTelemetryProvider({ enabled: true, tracing: { enabled: true } });
 * if (result.success) {
 *   setGlobalProvider(result.result);
 * }
 */
export function createTelemetryProvider(
  input: TelemetryConfigInput = {},
  options: TelemetryProviderOptions = {}
): TelemetryResponse<TelemetryProvider> {
  const debug = options.onDebug ?? ((_msg: string): void => {});

  const validated = validateConfig(withDefaults(input));
  if (!validated.success) {
    debug(validated.message);
    return validated;
  }
  const config = validated.result;

  if (!config.enabled) {
    debug('Telemetry disabled via configuration');
    return successResponse(TelemetryProvider.disabled(config), 'Telemetry disabled');
  }

  const parts: ProviderParts = {
    tracer: NOOP_TRACER,
    metrics: NOOP_METRICS,
    logger: NOOP_LOGGER,
    shutdownCallbacks: [],
  };

  try {
    // Exporters parse endpoints and may throw; build them before any provider
    const spanProcessors = config.tracing.enabled
      ? buildSpanProcessors(config, options, debug)
      : [];
    const reader = config.metrics.enabled
      ? (options.metricReader ?? createMetricReader(config.metrics))
      : undefined;
    const resource = buildResource(config);

    if (config.tracing.enabled) {
      const tracerProvider = new BasicTracerProvider({
        resource,
        sampler: createSampler(config.tracing.sampleRate),
        spanProcessors,
      });
      parts.tracerProvider = tracerProvider;
      parts.tracer = new OTelTracer(
        tracerProvider.getTracer(INSTRUMENTATION_SCOPE, config.serviceVersion)
      );
      parts.shutdownCallbacks.push(() => tracerProvider.shutdown());
    }

    if (config.metrics.enabled) {
      if (options.metricReader === undefined) {
        debug(`Creating ${config.metrics.exporter} metric exporter for ${config.metrics.endpoint}`);
      }
      const meterProvider = new MeterProvider({
        resource,
        readers: reader === undefined ? [] : [reader],
      });
      parts.meterProvider = meterProvider;
      parts.metrics = new OTelMetrics(
        meterProvider.getMeter(INSTRUMENTATION_SCOPE, config.serviceVersion)
      );
      parts.shutdownCallbacks.push(() => meterProvider.shutdown());
    }

    parts.logger =
      options.logger === undefined
        ? createLogger(
            config.logging,
            {
              service: config.serviceName,
              version: config.serviceVersion,
              environment: config.environment,
            },
            options.logDestination
          )
        : new PinoLogger(options.logger, config.logging.includeTraceId);
  } catch (err) {
    debug(`Telemetry initialization failed: ${getErrorMessage(err)}`);
    return errorResponse(
      'INITIALIZATION_FAILED',
      `Failed to initialize telemetry: ${getErrorMessage(err)}`,
      err
    );
  }

  if (config.tracing.enabled) {
    registerPropagator();
  }

  const enabled = [
    config.tracing.enabled ? 'tracing' : undefined,
    config.metrics.enabled ? 'metrics' : undefined,
    'logging',
  ].filter((part): part is string => part !== undefined);
  debug(`Telemetry initialized: ${enabled.join(', ')}`);

  return successResponse(
    TelemetryProvider.running(config, parts),
    `Telemetry initialized (${enabled.join(', ')})`
  );
}
