/**
 * Tests for the metrics abstractions.
 */

import { ROOT_CONTEXT } from '@opentelemetry/api';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { MeterProvider } from '@opentelemetry/sdk-metrics';

import {
  InMemoryMetrics,
  NOOP_METRICS,
  NoopMetrics,
  OTelMetrics,
  newAttr,
  toAttributes,
} from '../metrics.js';
import { METRIC_AGENT_ACTIVE, METRIC_LLM_REQUESTS, METRIC_LLM_REQUEST_DURATION } from '../metric-names.js';
import { TestMetricReader } from './test-helpers.js';

describe('toAttributes', () => {
  it('folds attrs into a map with later keys winning', () => {
    expect(
      toAttributes([newAttr('provider', 'openai'), newAttr('status', 'success'), newAttr('provider', 'ollama')])
    ).toEqual({ provider: 'ollama', status: 'success' });
  });

  it('returns an empty map for no attrs', () => {
    expect(toAttributes([])).toEqual({});
  });
});

describe('InMemoryMetrics', () => {
  let metrics: InMemoryMetrics;

  beforeEach(() => {
    metrics = new InMemoryMetrics();
  });

  describe('counter', () => {
    it('sums every delta', () => {
      const counter = metrics.counter('requests');
      counter.add(ROOT_CONTEXT, 1);
      counter.add(ROOT_CONTEXT, 4);

      expect(counter.value()).toBe(5);
      expect(metrics.getCounterValue('requests')).toBe(5);
    });

    it('sums only recordings matching a filter', () => {
      const counter = metrics.counter('requests');
      counter.add(ROOT_CONTEXT, 1, newAttr('status', 'success'), newAttr('provider', 'openai'));
      counter.add(ROOT_CONTEXT, 2, newAttr('status', 'error'), newAttr('provider', 'openai'));
      counter.add(ROOT_CONTEXT, 3, newAttr('status', 'success'), newAttr('provider', 'ollama'));

      expect(counter.value({ status: 'success' })).toBe(4);
      expect(counter.value({ status: 'success', provider: 'openai' })).toBe(1);
      expect(metrics.getCounterValue('requests', { provider: 'openai' })).toBe(3);
      expect(counter.value({ status: 'cancelled' })).toBe(0);
    });

    it('keeps negative deltas', () => {
      const counter = metrics.counter('requests');
      counter.add(ROOT_CONTEXT, 5);
      counter.add(ROOT_CONTEXT, -2);

      expect(counter.value()).toBe(3);
    });

    it('keeps each recording with its attributes', () => {
      metrics.counter('requests').add(ROOT_CONTEXT, 2, newAttr('tool', 'read_file'));

      expect(metrics.counter('requests').getRecordings()).toEqual([
        { value: 2, attributes: { tool: 'read_file' } },
      ]);
    });
  });

  describe('histogram', () => {
    it('keeps observations in order', () => {
      const histogram = metrics.histogram('duration');
      histogram.record(ROOT_CONTEXT, 12.5);
      histogram.record(ROOT_CONTEXT, 3);

      expect(histogram.values()).toEqual([12.5, 3]);
      expect(metrics.getHistogramValues('duration')).toEqual([12.5, 3]);
    });

    it('filters observations by attributes', () => {
      const histogram = metrics.histogram('duration');
      histogram.record(ROOT_CONTEXT, 10, newAttr('operation', 'generate'));
      histogram.record(ROOT_CONTEXT, 20, newAttr('operation', 'embed'));

      expect(histogram.values({ operation: 'embed' })).toEqual([20]);
    });
  });

  describe('gauge', () => {
    it('holds the last value set', () => {
      const gauge = metrics.gauge('active');
      gauge.set(ROOT_CONTEXT, 3, newAttr('agent', 'planner'));
      gauge.set(ROOT_CONTEXT, 1);

      expect(gauge.value()).toBe(1);
      expect(gauge.lastAttributes()).toEqual({});
      expect(gauge.lastUpdated()).toBeInstanceOf(Date);
      expect(metrics.getGaugeValue('active')).toBe(1);
    });

    it('starts at zero with no update time', () => {
      const gauge = metrics.gauge('active');

      expect(gauge.value()).toBe(0);
      expect(gauge.lastUpdated()).toBeUndefined();
    });
  });

  it('returns the same instrument for repeated lookups', () => {
    expect(metrics.counter('a')).toBe(metrics.counter('a'));
    expect(metrics.histogram('a')).toBe(metrics.histogram('a'));
    expect(metrics.gauge('a')).toBe(metrics.gauge('a'));
  });

  it('keeps instruments of different kinds apart under one name', () => {
    metrics.counter('shared').add(ROOT_CONTEXT, 2);
    metrics.gauge('shared').set(ROOT_CONTEXT, 7);

    expect(metrics.getCounterValue('shared')).toBe(2);
    expect(metrics.getGaugeValue('shared')).toBe(7);
    expect(metrics.getHistogramValues('shared')).toEqual([]);
  });

  it('reports zero values for unknown instruments', () => {
    expect(metrics.getCounterValue('missing')).toBe(0);
    expect(metrics.getHistogramValues('missing')).toEqual([]);
    expect(metrics.getGaugeValue('missing')).toBe(0);
  });

  it('drops everything on reset', () => {
    const before = metrics.counter('requests');
    before.add(ROOT_CONTEXT, 1);
    metrics.reset();

    expect(metrics.getCounterValue('requests')).toBe(0);
    expect(metrics.counter('requests')).not.toBe(before);
  });
});

describe('NoopMetrics', () => {
  it('shares one instrument per kind across names and instances', () => {
    const other = new NoopMetrics();

    expect(NOOP_METRICS.counter('a')).toBe(NOOP_METRICS.counter('b'));
    expect(other.counter('a')).toBe(NOOP_METRICS.counter('z'));
    expect(other.histogram('a')).toBe(NOOP_METRICS.histogram('b'));
    expect(other.gauge('a')).toBe(NOOP_METRICS.gauge('b'));
  });

  it('accepts recordings without effect', () => {
    expect(() => {
      NOOP_METRICS.counter('a').add(ROOT_CONTEXT, 1, newAttr('k', 'v'));
      NOOP_METRICS.histogram('a').record(ROOT_CONTEXT, 1);
      NOOP_METRICS.gauge('a').set(ROOT_CONTEXT, 1);
    }).not.toThrow();
  });
});

describe('OTelMetrics', () => {
  let reader: TestMetricReader;
  let meterProvider: MeterProvider;
  let metrics: OTelMetrics;

  beforeEach(() => {
    reader = new TestMetricReader();
    meterProvider = new MeterProvider({ readers: [reader] });
    metrics = new OTelMetrics(meterProvider.getMeter('test'));
  });

  afterEach(async () => {
    await meterProvider.shutdown();
  });

  it('sums counter deltas per attribute set', async () => {
    const counter = metrics.counter(METRIC_LLM_REQUESTS);
    counter.add(ROOT_CONTEXT, 2, newAttr('provider', 'openai'));
    counter.add(ROOT_CONTEXT, 3, newAttr('provider', 'openai'));
    counter.add(ROOT_CONTEXT, 1, newAttr('provider', 'ollama'));

    const points = await reader.dataPoints(METRIC_LLM_REQUESTS);
    expect(points).toHaveLength(2);
    expect(points.find((p) => p.attributes['provider'] === 'openai')?.value).toBe(5);
    expect(points.find((p) => p.attributes['provider'] === 'ollama')?.value).toBe(1);
  });

  it('nets negative counter deltas into the sum', async () => {
    const counter = metrics.counter('custom.count');
    counter.add(ROOT_CONTEXT, 5);
    counter.add(ROOT_CONTEXT, -2);

    const [point] = await reader.dataPoints('custom.count');
    expect(point?.value).toBe(3);
  });

  it('aggregates histogram observations', async () => {
    const histogram = metrics.histogram(METRIC_LLM_REQUEST_DURATION);
    histogram.record(ROOT_CONTEXT, 10);
    histogram.record(ROOT_CONTEXT, 20);

    const [point] = await reader.dataPoints(METRIC_LLM_REQUEST_DURATION);
    expect(point?.value).toMatchObject({ count: 2, sum: 30, min: 10, max: 20 });
  });

  it('reports the last gauge value', async () => {
    const gauge = metrics.gauge(METRIC_AGENT_ACTIVE);
    gauge.set(ROOT_CONTEXT, 3);
    gauge.set(ROOT_CONTEXT, 1);

    const [point] = await reader.dataPoints(METRIC_AGENT_ACTIVE);
    expect(point?.value).toBe(1);
  });

  it('describes predefined metrics from the catalog', async () => {
    metrics.histogram(METRIC_LLM_REQUEST_DURATION).record(ROOT_CONTEXT, 1);
    metrics.counter('custom.count').add(ROOT_CONTEXT, 1);

    const collected = await reader.collectMetrics();
    const duration = collected.find((m) => m.descriptor.name === METRIC_LLM_REQUEST_DURATION);
    const custom = collected.find((m) => m.descriptor.name === 'custom.count');
    expect(duration?.descriptor.description).toBe('Duration of LLM requests');
    expect(duration?.descriptor.unit).toBe('ms');
    expect(custom?.descriptor.description).toBe('');
    expect(custom?.descriptor.unit).toBe('');
  });

  it('returns the same instrument for repeated lookups', () => {
    expect(metrics.counter('a')).toBe(metrics.counter('a'));
    expect(metrics.histogram('a')).toBe(metrics.histogram('a'));
    expect(metrics.gauge('a')).toBe(metrics.gauge('a'));
  });
});
