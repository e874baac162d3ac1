/**
 * Tracer and span abstractions.
 *
 * Two variants share one interface:
 * - OTelTracer/OTelSpan forward to an OpenTelemetry tracer
 * - NoopTracer/NoopSpan record nothing; one shared instance of each
 *
 * Context is always passed explicitly: `start` returns the derived context
 * carrying the new span, and callers hand that context to nested work.
 */

import { SpanStatusCode, isSpanContextValid, trace } from '@opentelemetry/api';
import type {
  Attributes,
  Context,
  Span as OTelApiSpan,
  SpanKind,
  Tracer as OTelApiTracer,
} from '@opentelemetry/api';
import {
  AlwaysOffSampler,
  AlwaysOnSampler,
  TraceIdRatioBasedSampler,
} from '@opentelemetry/sdk-trace-base';
import type { Sampler } from '@opentelemetry/sdk-trace-base';

// -----------------------------------------------------------------------------
// Interfaces
// -----------------------------------------------------------------------------

/**
 * Hex identifiers of a span. Both are empty strings when there is no span.
 */
export interface SpanIds {
  traceId: string;
  spanId: string;
}

/**
 * Options applied when a span is created. Not retained afterwards.
 */
export interface SpanOptions {
  kind?: SpanKind;
  attributes?: Attributes;
}

/**
 * A unit of traced work. Methods never throw.
 *
 * The code path that started a span owns it and must end it exactly once.
 */
export interface Span {
  end(): void;
  setAttributes(attributes: Attributes): void;
  addEvent(name: string, attributes?: Attributes): void;
  /** Attach a failure to the span. Does not change the status. */
  recordError(error: unknown): void;
  setStatus(code: SpanStatusCode, description?: string): void;
  spanContext(): SpanIds;
  isRecording(): boolean;
}

export interface Tracer {
  /**
   * Start a span as a child of the span carried by `ctx`, if any.
   *
   * @returns The context carrying the new span, and the span itself
   */
  start(ctx: Context, name: string, options?: SpanOptions): [Context, Span];

  /**
   * The span carried by `ctx`, or the no-op span when there is none.
   */
  spanFromContext(ctx: Context): Span;
}

// -----------------------------------------------------------------------------
// No-op Variant
// -----------------------------------------------------------------------------

const EMPTY_SPAN_IDS: Readonly<SpanIds> = Object.freeze({ traceId: '', spanId: '' });

export class NoopSpan implements Span {
  end(): void {}

  setAttributes(_attributes: Attributes): void {}

  addEvent(_name: string, _attributes?: Attributes): void {}

  recordError(_error: unknown): void {}

  setStatus(_code: SpanStatusCode, _description?: string): void {}

  spanContext(): SpanIds {
    return { ...EMPTY_SPAN_IDS };
  }

  isRecording(): boolean {
    return false;
  }
}

/** Shared no-op span instance */
export const NOOP_SPAN: Span = new NoopSpan();

export class NoopTracer implements Tracer {
  start(ctx: Context, _name: string, _options?: SpanOptions): [Context, Span] {
    return [ctx, NOOP_SPAN];
  }

  spanFromContext(_ctx: Context): Span {
    return NOOP_SPAN;
  }
}

/** Shared no-op tracer instance */
export const NOOP_TRACER: Tracer = new NoopTracer();

// -----------------------------------------------------------------------------
// OpenTelemetry Variant
// -----------------------------------------------------------------------------

export class OTelSpan implements Span {
  constructor(private readonly span: OTelApiSpan) {}

  end(): void {
    this.span.end();
  }

  setAttributes(attributes: Attributes): void {
    this.span.setAttributes(attributes);
  }

  addEvent(name: string, attributes?: Attributes): void {
    this.span.addEvent(name, attributes);
  }

  recordError(error: unknown): void {
    if (error === undefined || error === null) return;
    if (error instanceof Error) {
      this.span.recordException(error);
    } else {
      this.span.recordException(String(error));
    }
  }

  setStatus(code: SpanStatusCode, description?: string): void {
    // OpenTelemetry ignores the description unless the status is ERROR
    if (description === undefined || code !== SpanStatusCode.ERROR) {
      this.span.setStatus({ code });
    } else {
      this.span.setStatus({ code, message: description });
    }
  }

  spanContext(): SpanIds {
    const { traceId, spanId } = this.span.spanContext();
    return { traceId, spanId };
  }

  isRecording(): boolean {
    return this.span.isRecording();
  }
}

export class OTelTracer implements Tracer {
  constructor(private readonly tracer: OTelApiTracer) {}

  start(ctx: Context, name: string, options: SpanOptions = {}): [Context, Span] {
    const span = this.tracer.startSpan(
      name,
      { kind: options.kind, attributes: options.attributes },
      ctx
    );
    return [trace.setSpan(ctx, span), new OTelSpan(span)];
  }

  spanFromContext(ctx: Context): Span {
    const span = trace.getSpan(ctx);
    return span === undefined ? NOOP_SPAN : new OTelSpan(span);
  }
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

/**
 * Read the active span's ids from any context.
 * Returns empty strings when no valid span is present.
 */
export function spanContextFromContext(ctx: Context): SpanIds {
  const spanContext = trace.getSpanContext(ctx);
  if (spanContext === undefined || !isSpanContextValid(spanContext)) {
    return { ...EMPTY_SPAN_IDS };
  }
  return { traceId: spanContext.traceId, spanId: spanContext.spanId };
}

/**
 * Build the sampler for a sample rate.
 * Rates at or above 1 sample everything, at or below 0 nothing; anything
 * in between samples by trace id so every span of a trace shares the decision.
 */
export function createSampler(sampleRate: number): Sampler {
  if (sampleRate >= 1) return new AlwaysOnSampler();
  if (sampleRate <= 0) return new AlwaysOffSampler();
  return new TraceIdRatioBasedSampler(sampleRate);
}
