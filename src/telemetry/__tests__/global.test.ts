/**
 * Tests for process-wide provider installation.
 */

import { metrics, trace } from '@opentelemetry/api';
import { describe, it, expect, afterEach } from '@jest/globals';

import { TelemetryError } from '../../errors/index.js';
import {
  getGlobalProvider,
  getLogger,
  getMetrics,
  getTracer,
  initGlobalProvider,
  resetGlobalProvider,
  setGlobalProvider,
} from '../global.js';
import { NOOP_LOGGER } from '../logger.js';
import { NOOP_METRICS } from '../metrics.js';
import { createTelemetryProvider } from '../provider.js';
import { NOOP_TRACER } from '../tracer.js';
import { LogSink, TestMetricReader, createSpanCapture } from './test-helpers.js';
import type { SpanCapture } from './test-helpers.js';

describe('global provider', () => {
  const captures: SpanCapture[] = [];

  function capture(): SpanCapture {
    const created = createSpanCapture();
    captures.push(created);
    return created;
  }

  afterEach(async () => {
    resetGlobalProvider();
    for (const created of captures.splice(0)) {
      await created.shutdown();
    }
  });

  it('falls back to no-ops while nothing is installed', () => {
    expect(getGlobalProvider()).toBeUndefined();
    expect(getTracer()).toBe(NOOP_TRACER);
    expect(getMetrics()).toBe(NOOP_METRICS);
    expect(getLogger()).toBe(NOOP_LOGGER);
  });

  it('does not install a provider on construction', () => {
    capture();

    expect(getGlobalProvider()).toBeUndefined();
    expect(getTracer()).toBe(NOOP_TRACER);
  });

  it('serves the installed provider', () => {
    const { provider } = capture();
    setGlobalProvider(provider);

    expect(getGlobalProvider()).toBe(provider);
    expect(getTracer()).toBe(provider.tracer());
    expect(getMetrics()).toBe(provider.metrics());
    expect(getLogger()).toBe(provider.logger());
  });

  it('replaces a previously installed provider', () => {
    const first = capture();
    const second = capture();
    setGlobalProvider(first.provider);
    setGlobalProvider(second.provider);

    expect(getTracer()).toBe(second.provider.tracer());
  });

  it('routes third-party OpenTelemetry spans into the installed pipeline', () => {
    const { provider, getSpansByName } = capture();
    setGlobalProvider(provider);

    trace.getTracer('third-party').startSpan('library.call').end();

    expect(getSpansByName('library.call')).toHaveLength(1);
  });

  it('routes third-party OpenTelemetry metrics into the installed pipeline', async () => {
    const reader = new TestMetricReader();
    const result = createTelemetryProvider(
      { enabled: true, metrics: { enabled: true }, logging: { format: 'json' } },
      { metricReader: reader, logDestination: new LogSink() }
    );
    if (!result.success) throw new Error(result.message);
    setGlobalProvider(result.result);

    metrics.getMeter('third-party').createCounter('library.calls').add(3);

    const [point] = await reader.dataPoints('library.calls');
    expect(point?.value).toBe(3);
    await result.result.shutdown();
  });

  it('clears the provider and the OpenTelemetry globals on reset', () => {
    const { provider } = capture();
    setGlobalProvider(provider);
    resetGlobalProvider();

    expect(getGlobalProvider()).toBeUndefined();
    expect(getTracer()).toBe(NOOP_TRACER);
    const span = trace.getTracer('third-party').startSpan('after.reset');
    expect(span.isRecording()).toBe(false);
    span.end();
  });

  describe('initGlobalProvider', () => {
    it('builds and installs a provider', () => {
      const provider = initGlobalProvider();

      expect(getGlobalProvider()).toBe(provider);
      expect(provider.state).toBe('disabled');
    });

    it('throws and installs nothing on invalid configuration', () => {
      let thrown: unknown;
      try {
        initGlobalProvider({ enabled: true, tracing: { sampleRate: 2 } });
      } catch (err) {
        thrown = err;
      }

      expect(thrown).toBeInstanceOf(TelemetryError);
      expect(thrown instanceof TelemetryError && thrown.code).toBe('INVALID_CONFIG');
      expect(getGlobalProvider()).toBeUndefined();
    });
  });
});
