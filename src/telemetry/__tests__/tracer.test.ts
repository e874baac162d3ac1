/**
 * Tests for the tracer and span abstractions.
 */

import { ROOT_CONTEXT, SpanKind, SpanStatusCode } from '@opentelemetry/api';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  AlwaysOffSampler,
  AlwaysOnSampler,
  TraceIdRatioBasedSampler,
} from '@opentelemetry/sdk-trace-base';

import {
  NOOP_SPAN,
  NOOP_TRACER,
  NoopTracer,
  createSampler,
  spanContextFromContext,
} from '../tracer.js';
import { createSpanCapture } from './test-helpers.js';
import type { SpanCapture } from './test-helpers.js';

describe('NoopTracer', () => {
  it('returns the input context and the shared no-op span', () => {
    const [ctx, span] = new NoopTracer().start(ROOT_CONTEXT, 'work', {
      attributes: { key: 'value' },
    });

    expect(ctx).toBe(ROOT_CONTEXT);
    expect(span).toBe(NOOP_SPAN);
  });

  it('resolves every context to the no-op span', () => {
    expect(NOOP_TRACER.spanFromContext(ROOT_CONTEXT)).toBe(NOOP_SPAN);
  });

  it('reports empty ids and never records', () => {
    expect(NOOP_SPAN.spanContext()).toEqual({ traceId: '', spanId: '' });
    expect(NOOP_SPAN.isRecording()).toBe(false);
  });

  it('accepts every span operation without throwing', () => {
    expect(() => {
      NOOP_SPAN.setAttributes({ a: 1 });
      NOOP_SPAN.addEvent('event', { b: true });
      NOOP_SPAN.recordError(new Error('ignored'));
      NOOP_SPAN.setStatus(SpanStatusCode.ERROR, 'ignored');
      NOOP_SPAN.end();
      NOOP_SPAN.end();
    }).not.toThrow();
  });

  it('hands out copies of the empty ids', () => {
    const ids = NOOP_SPAN.spanContext();
    ids.traceId = 'changed';
    expect(NOOP_SPAN.spanContext().traceId).toBe('');
  });
});

describe('OTelTracer', () => {
  let capture: SpanCapture;

  beforeEach(() => {
    capture = createSpanCapture();
  });

  afterEach(async () => {
    await capture.shutdown();
  });

  it('exports a span with its kind and start attributes', () => {
    const [, span] = capture.provider.tracer().start(ROOT_CONTEXT, 'llm.generate', {
      kind: SpanKind.CLIENT,
      attributes: { 'llm.provider': 'openai' },
    });
    span.setAttributes({ 'llm.total_tokens': 18 });
    span.end();

    const exported = capture.getFirstSpan();
    expect(exported.name).toBe('llm.generate');
    expect(exported.kind).toBe(SpanKind.CLIENT);
    expect(exported.attributes).toEqual({ 'llm.provider': 'openai', 'llm.total_tokens': 18 });
  });

  it('defaults to an INTERNAL span', () => {
    const [, span] = capture.provider.tracer().start(ROOT_CONTEXT, 'work');
    span.end();

    expect(capture.getFirstSpan().kind).toBe(SpanKind.INTERNAL);
  });

  it('nests a span started from a derived context under its parent', () => {
    const tracer = capture.provider.tracer();
    const [parentCtx, parent] = tracer.start(ROOT_CONTEXT, 'parent');
    const [, child] = tracer.start(parentCtx, 'child');
    child.end();
    parent.end();

    const [exportedChild, exportedParent] = capture.getSpans();
    expect(exportedChild?.name).toBe('child');
    expect(exportedParent?.name).toBe('parent');
    expect(exportedChild?.parentSpanContext?.spanId).toBe(parent.spanContext().spanId);
    expect(exportedChild?.spanContext().traceId).toBe(parent.spanContext().traceId);
    expect(exportedParent?.parentSpanContext).toBeUndefined();
  });

  it('starts unrelated root spans in different traces', () => {
    const tracer = capture.provider.tracer();
    const [, first] = tracer.start(ROOT_CONTEXT, 'first');
    const [, second] = tracer.start(ROOT_CONTEXT, 'second');

    expect(first.spanContext().traceId).not.toBe(second.spanContext().traceId);
    first.end();
    second.end();
  });

  it('exposes hex ids matching the derived context', () => {
    const [ctx, span] = capture.provider.tracer().start(ROOT_CONTEXT, 'work');

    const ids = span.spanContext();
    expect(ids.traceId).toMatch(/^[0-9a-f]{32}$/);
    expect(ids.spanId).toMatch(/^[0-9a-f]{16}$/);
    expect(spanContextFromContext(ctx)).toEqual(ids);
    expect(span.isRecording()).toBe(true);
    span.end();
  });

  it('recovers the active span from a context', () => {
    const tracer = capture.provider.tracer();
    const [ctx, span] = tracer.start(ROOT_CONTEXT, 'work');

    const recovered = tracer.spanFromContext(ctx);
    recovered.addEvent('checkpoint');
    span.end();

    expect(recovered.spanContext()).toEqual(span.spanContext());
    expect(capture.getFirstSpan().events.map((e) => e.name)).toEqual(['checkpoint']);
  });

  it('returns the no-op span for a context without a span', () => {
    expect(capture.provider.tracer().spanFromContext(ROOT_CONTEXT)).toBe(NOOP_SPAN);
  });

  describe('recordError', () => {
    it('records an Error as an exception event', () => {
      const [, span] = capture.provider.tracer().start(ROOT_CONTEXT, 'work');
      span.recordError(new Error('boom'));
      span.end();

      const [event] = capture.getFirstSpan().events;
      expect(event?.name).toBe('exception');
      expect(event?.attributes?.['exception.message']).toBe('boom');
    });

    it('records a non-Error value by its string form', () => {
      const [, span] = capture.provider.tracer().start(ROOT_CONTEXT, 'work');
      span.recordError('plain failure');
      span.end();

      const [event] = capture.getFirstSpan().events;
      expect(event?.attributes?.['exception.message']).toBe('plain failure');
    });

    it('ignores an absent error', () => {
      const [, span] = capture.provider.tracer().start(ROOT_CONTEXT, 'work');
      span.recordError(undefined);
      span.recordError(null);
      span.end();

      expect(capture.getFirstSpan().events).toHaveLength(0);
    });

    it('leaves the status unset', () => {
      const [, span] = capture.provider.tracer().start(ROOT_CONTEXT, 'work');
      span.recordError(new Error('boom'));
      span.end();

      expect(capture.getFirstSpan().status.code).toBe(SpanStatusCode.UNSET);
    });
  });

  describe('setStatus', () => {
    it('keeps the description of an error status', () => {
      const [, span] = capture.provider.tracer().start(ROOT_CONTEXT, 'work');
      span.setStatus(SpanStatusCode.ERROR, 'rate limited');
      span.end();

      expect(capture.getFirstSpan().status).toEqual({
        code: SpanStatusCode.ERROR,
        message: 'rate limited',
      });
    });

    it('drops the description of an OK status', () => {
      const [, span] = capture.provider.tracer().start(ROOT_CONTEXT, 'work');
      span.setStatus(SpanStatusCode.OK, 'fine');
      span.end();

      const { status } = capture.getFirstSpan();
      expect(status.code).toBe(SpanStatusCode.OK);
      expect(status.message).toBeUndefined();
    });
  });
});

describe('sampling', () => {
  it('records nothing at sample rate 0', async () => {
    const capture = createSpanCapture({ tracing: { sampleRate: 0 } });
    const [, span] = capture.provider.tracer().start(ROOT_CONTEXT, 'work');
    span.end();

    expect(span.isRecording()).toBe(false);
    expect(capture.getSpans()).toHaveLength(0);
    await capture.shutdown();
  });

  it('selects the sampler from the rate', () => {
    expect(createSampler(1)).toBeInstanceOf(AlwaysOnSampler);
    expect(createSampler(1.5)).toBeInstanceOf(AlwaysOnSampler);
    expect(createSampler(0)).toBeInstanceOf(AlwaysOffSampler);
    expect(createSampler(-0.5)).toBeInstanceOf(AlwaysOffSampler);
    expect(createSampler(0.25)).toBeInstanceOf(TraceIdRatioBasedSampler);
  });
});

describe('spanContextFromContext', () => {
  it('returns empty ids for a context without a span', () => {
    expect(spanContextFromContext(ROOT_CONTEXT)).toEqual({ traceId: '', spanId: '' });
  });
});
