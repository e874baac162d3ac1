/**
 * Telemetry module - tracing, metrics and correlated logging.
 *
 * This module provides:
 * - createTelemetryProvider() to build all three from one configuration
 * - setGlobalProvider()/getTracer()/getMetrics()/getLogger() for process-wide access
 * - TracedProvider, TracedExecutor and AgentTracer to instrument agent work
 * - No-op implementations used whenever telemetry is disabled
 */

// ─── Types ───────────────────────────────────────────────────────────────────
export type {
  ProviderState,
  ShutdownCallback,
  TelemetryProviderOptions,
  PropagationCarrier,
  InstrumentationOptions,
} from './types.js';

// ─── Conventions ─────────────────────────────────────────────────────────────
export * from './conventions.js';
export * from './metric-names.js';

// ─── Tracing ─────────────────────────────────────────────────────────────────
export {
  NoopSpan,
  NoopTracer,
  NOOP_SPAN,
  NOOP_TRACER,
  OTelSpan,
  OTelTracer,
  spanContextFromContext,
  createSampler,
} from './tracer.js';
export type { Span, SpanIds, SpanOptions, Tracer } from './tracer.js';

// ─── Metrics ─────────────────────────────────────────────────────────────────
export {
  newAttr,
  toAttributes,
  InMemoryMetrics,
  InMemoryCounter,
  InMemoryHistogram,
  InMemoryGauge,
  NoopMetrics,
  NOOP_METRICS,
  OTelMetrics,
} from './metrics.js';
export type { Attr, Counter, Histogram, Gauge, Metrics, MetricRecording } from './metrics.js';

// ─── Logging ─────────────────────────────────────────────────────────────────
export {
  PinoLogger,
  NoopLogger,
  NOOP_LOGGER,
  createLogger,
  createPinoInstance,
} from './logger.js';
export type { Logger, LogFields, ServiceIdentity } from './logger.js';

// ─── Exporters ───────────────────────────────────────────────────────────────
export {
  resolveOtlpUrl,
  createSpanExporter,
  createMetricExporter,
  createMetricReader,
  OTLP_TRACES_PATH,
  OTLP_METRICS_PATH,
} from './exporters.js';

// ─── Provider ────────────────────────────────────────────────────────────────
export { TelemetryProvider, createTelemetryProvider } from './provider.js';
export type { ProviderParts } from './provider.js';

export {
  setGlobalProvider,
  getGlobalProvider,
  resetGlobalProvider,
  initGlobalProvider,
  getTracer,
  getMetrics,
  getLogger,
} from './global.js';

export { injectTraceContext, extractTraceContext } from './propagation.js';

// ─── Traced Wrappers ─────────────────────────────────────────────────────────
export { TracedProvider, STREAM_ABANDONED_MESSAGE } from './traced-provider.js';
export type { StreamState, StreamSummary } from './traced-provider.js';
export { TracedExecutor } from './traced-executor.js';
export { Instrumented } from './instrumented.js';
export { AgentTracer } from './agent-tracer.js';
export type { AgentRun, RunOutcome } from './agent-tracer.js';
