/**
 * Metrics abstractions: counters, histograms and gauges looked up by name.
 *
 * Variants:
 * - InMemoryMetrics keeps every recording for inspection (tests, debugging)
 * - NoopMetrics discards everything through shared instrument singletons
 * - OTelMetrics records into an OpenTelemetry Meter
 *
 * Instruments are created lazily and cached per kind, so repeated lookups of
 * one name return the same object. Lookups run synchronously on the event
 * loop, which makes first-time creation atomic without locking.
 */

import type {
  AttributeValue,
  Attributes,
  Context,
  Gauge as OTelGauge,
  Histogram as OTelHistogram,
  Meter,
  MetricOptions,
  UpDownCounter,
} from '@opentelemetry/api';
import { findMetricDescription } from './metric-names.js';

// -----------------------------------------------------------------------------
// Interfaces
// -----------------------------------------------------------------------------

/**
 * A descriptive key/value recorded alongside a measurement.
 * Attributes never take part in instrument identity.
 */
export interface Attr {
  key: string;
  value: AttributeValue;
}

export function newAttr(key: string, value: AttributeValue): Attr {
  return { key, value };
}

/**
 * Fold attrs into an Attributes map. Later keys win.
 */
export function toAttributes(attrs: readonly Attr[]): Attributes {
  const attributes: Attributes = {};
  for (const attr of attrs) {
    attributes[attr.key] = attr.value;
  }
  return attributes;
}

export interface Counter {
  /** Add `delta` to the running sum. */
  add(ctx: Context, delta: number, ...attrs: Attr[]): void;
}

export interface Histogram {
  /** Record one observation. */
  record(ctx: Context, value: number, ...attrs: Attr[]): void;
}

export interface Gauge {
  /** Replace the current value. */
  set(ctx: Context, value: number, ...attrs: Attr[]): void;
}

export interface Metrics {
  counter(name: string): Counter;
  histogram(name: string): Histogram;
  gauge(name: string): Gauge;
}

// -----------------------------------------------------------------------------
// In-memory Variant
// -----------------------------------------------------------------------------

/**
 * One measurement with the attributes it was recorded with.
 */
export interface MetricRecording {
  value: number;
  attributes: Attributes;
}

function matches(attributes: Attributes, filter: Attributes | undefined): boolean {
  if (filter === undefined) return true;
  return Object.entries(filter).every(([key, value]) => attributes[key] === value);
}

export class InMemoryCounter implements Counter {
  private sum = 0;
  private readonly recordings: MetricRecording[] = [];

  constructor(readonly name: string) {}

  add(_ctx: Context, delta: number, ...attrs: Attr[]): void {
    this.sum += delta;
    this.recordings.push({ value: delta, attributes: toAttributes(attrs) });
  }

  /**
   * Running sum, or the sum of recordings whose attributes include `filter`.
   */
  value(filter?: Attributes): number {
    if (filter === undefined) return this.sum;
    return this.recordings
      .filter((recording) => matches(recording.attributes, filter))
      .reduce((total, recording) => total + recording.value, 0);
  }

  getRecordings(): readonly MetricRecording[] {
    return this.recordings;
  }
}

export class InMemoryHistogram implements Histogram {
  private readonly recordings: MetricRecording[] = [];

  constructor(readonly name: string) {}

  record(_ctx: Context, value: number, ...attrs: Attr[]): void {
    this.recordings.push({ value, attributes: toAttributes(attrs) });
  }

  /**
   * Observations in recording order, optionally restricted by attributes.
   */
  values(filter?: Attributes): number[] {
    return this.recordings
      .filter((recording) => matches(recording.attributes, filter))
      .map((recording) => recording.value);
  }

  getRecordings(): readonly MetricRecording[] {
    return this.recordings;
  }
}

export class InMemoryGauge implements Gauge {
  private current = 0;
  private updatedAt: Date | undefined;
  private attributes: Attributes = {};

  constructor(readonly name: string) {}

  set(_ctx: Context, value: number, ...attrs: Attr[]): void {
    this.current = value;
    this.updatedAt = new Date();
    this.attributes = toAttributes(attrs);
  }

  value(): number {
    return this.current;
  }

  /** When the value was last set; undefined if never set */
  lastUpdated(): Date | undefined {
    return this.updatedAt;
  }

  lastAttributes(): Attributes {
    return this.attributes;
  }
}

export class InMemoryMetrics implements Metrics {
  private readonly counters = new Map<string, InMemoryCounter>();
  private readonly histograms = new Map<string, InMemoryHistogram>();
  private readonly gauges = new Map<string, InMemoryGauge>();

  counter(name: string): InMemoryCounter {
    let counter = this.counters.get(name);
    if (counter === undefined) {
      counter = new InMemoryCounter(name);
      this.counters.set(name, counter);
    }
    return counter;
  }

  histogram(name: string): InMemoryHistogram {
    let histogram = this.histograms.get(name);
    if (histogram === undefined) {
      histogram = new InMemoryHistogram(name);
      this.histograms.set(name, histogram);
    }
    return histogram;
  }

  gauge(name: string): InMemoryGauge {
    let gauge = this.gauges.get(name);
    if (gauge === undefined) {
      gauge = new InMemoryGauge(name);
      this.gauges.set(name, gauge);
    }
    return gauge;
  }

  /**
   * Counter sum; 0 for a counter never created.
   */
  getCounterValue(name: string, filter?: Attributes): number {
    return this.counters.get(name)?.value(filter) ?? 0;
  }

  /**
   * Histogram observations; empty for a histogram never created.
   */
  getHistogramValues(name: string, filter?: Attributes): number[] {
    return this.histograms.get(name)?.values(filter) ?? [];
  }

  /**
   * Gauge value; 0 for a gauge never created.
   */
  getGaugeValue(name: string): number {
    return this.gauges.get(name)?.value() ?? 0;
  }

  /** Drop every instrument and recording. */
  reset(): void {
    this.counters.clear();
    this.histograms.clear();
    this.gauges.clear();
  }
}

// -----------------------------------------------------------------------------
// No-op Variant
// -----------------------------------------------------------------------------

class NoopCounter implements Counter {
  add(_ctx: Context, _delta: number, ..._attrs: Attr[]): void {}
}

class NoopHistogram implements Histogram {
  record(_ctx: Context, _value: number, ..._attrs: Attr[]): void {}
}

class NoopGauge implements Gauge {
  set(_ctx: Context, _value: number, ..._attrs: Attr[]): void {}
}

const NOOP_COUNTER: Counter = new NoopCounter();
const NOOP_HISTOGRAM: Histogram = new NoopHistogram();
const NOOP_GAUGE: Gauge = new NoopGauge();

export class NoopMetrics implements Metrics {
  counter(_name: string): Counter {
    return NOOP_COUNTER;
  }

  histogram(_name: string): Histogram {
    return NOOP_HISTOGRAM;
  }

  gauge(_name: string): Gauge {
    return NOOP_GAUGE;
  }
}

/** Shared no-op metrics instance */
export const NOOP_METRICS: Metrics = new NoopMetrics();

// -----------------------------------------------------------------------------
// OpenTelemetry Variant
// -----------------------------------------------------------------------------

function instrumentOptions(name: string): MetricOptions | undefined {
  const description = findMetricDescription(name);
  if (description === undefined) return undefined;
  return { description: description.description, unit: description.unit };
}

class OTelCounterAdapter implements Counter {
  constructor(private readonly counter: UpDownCounter) {}

  add(ctx: Context, delta: number, ...attrs: Attr[]): void {
    this.counter.add(delta, toAttributes(attrs), ctx);
  }
}

class OTelHistogramAdapter implements Histogram {
  constructor(private readonly histogram: OTelHistogram) {}

  record(ctx: Context, value: number, ...attrs: Attr[]): void {
    this.histogram.record(value, toAttributes(attrs), ctx);
  }
}

class OTelGaugeAdapter implements Gauge {
  constructor(private readonly gauge: OTelGauge) {}

  set(ctx: Context, value: number, ...attrs: Attr[]): void {
    this.gauge.record(value, toAttributes(attrs), ctx);
  }
}

/**
 * Metrics backed by an OpenTelemetry Meter.
 * Predefined metric names get their catalog description and unit. Counters
 * are up-down counters so negative deltas reach the exported sum.
 */
export class OTelMetrics implements Metrics {
  private readonly counters = new Map<string, Counter>();
  private readonly histograms = new Map<string, Histogram>();
  private readonly gauges = new Map<string, Gauge>();

  constructor(private readonly meter: Meter) {}

  counter(name: string): Counter {
    let counter = this.counters.get(name);
    if (counter === undefined) {
      counter = new OTelCounterAdapter(
        this.meter.createUpDownCounter(name, instrumentOptions(name))
      );
      this.counters.set(name, counter);
    }
    return counter;
  }

  histogram(name: string): Histogram {
    let histogram = this.histograms.get(name);
    if (histogram === undefined) {
      histogram = new OTelHistogramAdapter(
        this.meter.createHistogram(name, instrumentOptions(name))
      );
      this.histograms.set(name, histogram);
    }
    return histogram;
  }

  gauge(name: string): Gauge {
    let gauge = this.gauges.get(name);
    if (gauge === undefined) {
      gauge = new OTelGaugeAdapter(this.meter.createGauge(name, instrumentOptions(name)));
      this.gauges.set(name, gauge);
    }
    return gauge;
  }
}
