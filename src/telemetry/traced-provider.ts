/**
 * LLM provider wrapper that traces and measures every call.
 *
 * - generate: one CLIENT span, request/token/duration metrics
 * - generateStream: one span for the life of the stream, terminal
 *   bookkeeping once, after the last chunk or the first error
 * - embed: one CLIENT span, error and duration metrics
 *
 * Errors from the wrapped provider are recorded and rethrown unchanged.
 */

import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import type { Attributes, Context } from '@opentelemetry/api';

import { TelemetryError, getErrorMessage } from '../errors/index.js';
import type {
  LLMProvider,
  LLMRequest,
  LLMResponse,
  StreamChunk,
  TokenUsage,
} from '../model/types.js';
import {
  ATTR_FINISH_REASON,
  ATTR_LLM_CHUNK_COUNT,
  ATTR_LLM_INPUT_COUNT,
  ATTR_LLM_MAX_TOKENS,
  ATTR_LLM_OUTPUT_COUNT,
  ATTR_LLM_TEMPERATURE,
  EVENT_LLM_RESPONSE,
  METRIC_ATTR_MODEL,
  METRIC_ATTR_OPERATION,
  METRIC_ATTR_PROVIDER,
  METRIC_ATTR_STATUS,
  OPERATION_EMBED,
  OPERATION_GENERATE,
  OPERATION_GENERATE_STREAM,
  SPAN_LLM_EMBED,
  SPAN_LLM_GENERATE,
  SPAN_LLM_GENERATE_STREAM,
  STATUS_CANCELLED,
  STATUS_ERROR,
  STATUS_SUCCESS,
  llmModel,
  llmProvider,
  llmTokens,
} from './conventions.js';
import type { OperationStatus } from './conventions.js';
import { Instrumented } from './instrumented.js';
import type { Instruments } from './instrumented.js';
import {
  METRIC_LLM_ERRORS,
  METRIC_LLM_REQUESTS,
  METRIC_LLM_REQUEST_DURATION,
  METRIC_LLM_TOKENS_COMPLETION,
  METRIC_LLM_TOKENS_PROMPT,
  METRIC_LLM_TOKENS_TOTAL,
} from './metric-names.js';
import { newAttr } from './metrics.js';
import type { Attr } from './metrics.js';
import type { Span } from './tracer.js';
import type { InstrumentationOptions } from './types.js';

/** Error recorded on the span of a stream the consumer stopped reading */
export const STREAM_ABANDONED_MESSAGE = 'stream abandoned by consumer';

// -----------------------------------------------------------------------------
// Stream State Machine
// -----------------------------------------------------------------------------

/**
 * Lifecycle of a traced stream. `draining` is the only non-terminal state.
 */
export type StreamState = 'draining' | 'succeeded' | 'failed' | 'abandoned';

/**
 * What a stream delivered by the time it settled.
 */
export interface StreamSummary {
  state: Exclude<StreamState, 'draining'>;
  chunkCount: number;
  /** Usage from the last chunk that carried any */
  tokenUsage?: TokenUsage;
  /** Finish reason from the last chunk that carried one */
  finishReason?: string;
  error?: unknown;
}

/**
 * Async iterator that re-yields a source stream in order and reports one
 * summary when the stream settles: exhausted, failed, or stopped early via
 * `return()` (which `break` inside `for await` calls).
 */
class TracedStream implements AsyncIterableIterator<StreamChunk> {
  private state: StreamState = 'draining';
  private iterator: AsyncIterator<StreamChunk> | undefined;
  private chunkCount = 0;
  private tokenUsage: TokenUsage | undefined;
  private finishReason: string | undefined;

  constructor(
    private readonly source: AsyncIterable<StreamChunk>,
    private readonly onSettled: (summary: StreamSummary) => void
  ) {}

  [Symbol.asyncIterator](): AsyncIterableIterator<StreamChunk> {
    return this;
  }

  async next(): Promise<IteratorResult<StreamChunk>> {
    if (this.state !== 'draining') {
      return { done: true, value: undefined };
    }

    let result: IteratorResult<StreamChunk>;
    try {
      this.iterator ??= this.source[Symbol.asyncIterator]();
      result = await this.iterator.next();
    } catch (err) {
      this.settle('failed', err);
      throw err;
    }

    if (result.done === true) {
      this.settle('succeeded');
      return { done: true, value: undefined };
    }

    const chunk = result.value;
    this.chunkCount++;
    if (chunk.tokenUsage !== undefined) this.tokenUsage = chunk.tokenUsage;
    if (chunk.finishReason !== undefined) this.finishReason = chunk.finishReason;
    return { done: false, value: chunk };
  }

  async return(): Promise<IteratorResult<StreamChunk>> {
    if (this.state === 'draining') {
      this.settle('abandoned');
      await this.iterator?.return?.();
    }
    return { done: true, value: undefined };
  }

  private settle(state: StreamSummary['state'], error?: unknown): void {
    if (this.state !== 'draining') return;
    this.state = state;

    const summary: StreamSummary = { state, chunkCount: this.chunkCount };
    if (this.tokenUsage !== undefined) summary.tokenUsage = this.tokenUsage;
    if (this.finishReason !== undefined) summary.finishReason = this.finishReason;
    if (state === 'failed') summary.error = error;
    this.onSettled(summary);
  }
}

// -----------------------------------------------------------------------------
// Traced Provider
// -----------------------------------------------------------------------------

export class TracedProvider extends Instrumented implements LLMProvider {
  constructor(
    private readonly delegate: LLMProvider,
    options: InstrumentationOptions = {}
  ) {
    super(options);
  }

  name(): string {
    return this.delegate.name();
  }

  model(): string {
    return this.delegate.model();
  }

  close(): Promise<void> {
    return this.delegate.close();
  }

  async generate(ctx: Context, request: LLMRequest): Promise<LLMResponse> {
    const inst = this.resolve();
    const [spanCtx, span] = inst.tracer.start(ctx, SPAN_LLM_GENERATE, {
      kind: SpanKind.CLIENT,
      attributes: this.requestAttributes(request),
    });
    const startedAt = performance.now();

    try {
      const response = await this.delegate.generate(spanCtx, request);

      span.setAttributes(llmTokens(response.tokenUsage));
      span.addEvent(EVENT_LLM_RESPONSE, { [ATTR_FINISH_REASON]: response.finishReason });
      span.setStatus(SpanStatusCode.OK);
      this.countRequest(inst, spanCtx, OPERATION_GENERATE, STATUS_SUCCESS);
      this.countTokens(inst, spanCtx, response.tokenUsage);
      return response;
    } catch (err) {
      this.recordFailure(inst, spanCtx, span, OPERATION_GENERATE, err);
      this.countRequest(inst, spanCtx, OPERATION_GENERATE, STATUS_ERROR);
      throw err;
    } finally {
      this.recordDuration(inst, spanCtx, OPERATION_GENERATE, startedAt);
      span.end();
    }
  }

  /**
   * Stream a generation. The span opens before the wrapped provider is
   * called and stays open until the stream settles, so the consumer must
   * either drain the stream or stop it (`break`, or `return()`).
   */
  generateStream(ctx: Context, request: LLMRequest): AsyncIterable<StreamChunk> {
    const inst = this.resolve();
    const [spanCtx, span] = inst.tracer.start(ctx, SPAN_LLM_GENERATE_STREAM, {
      kind: SpanKind.CLIENT,
      attributes: this.requestAttributes(request),
    });
    const startedAt = performance.now();
    const finish = (summary: StreamSummary): void => {
      this.finishStream(inst, spanCtx, span, startedAt, summary);
    };

    let source: AsyncIterable<StreamChunk>;
    try {
      source = this.delegate.generateStream(spanCtx, request);
    } catch (err) {
      finish({ state: 'failed', chunkCount: 0, error: err });
      throw err;
    }
    return new TracedStream(source, finish);
  }

  async embed(ctx: Context, texts: string[]): Promise<number[][]> {
    const inst = this.resolve();
    const [spanCtx, span] = inst.tracer.start(ctx, SPAN_LLM_EMBED, {
      kind: SpanKind.CLIENT,
      attributes: {
        ...llmProvider(this.delegate.name()),
        ...llmModel(this.delegate.model()),
        [ATTR_LLM_INPUT_COUNT]: texts.length,
      },
    });
    const startedAt = performance.now();

    try {
      const vectors = await this.delegate.embed(spanCtx, texts);
      span.setAttributes({ [ATTR_LLM_OUTPUT_COUNT]: vectors.length });
      span.setStatus(SpanStatusCode.OK);
      return vectors;
    } catch (err) {
      this.recordFailure(inst, spanCtx, span, OPERATION_EMBED, err);
      throw err;
    } finally {
      this.recordDuration(inst, spanCtx, OPERATION_EMBED, startedAt);
      span.end();
    }
  }

  // ---------------------------------------------------------------------------
  // Bookkeeping
  // ---------------------------------------------------------------------------

  private finishStream(
    inst: Instruments,
    ctx: Context,
    span: Span,
    startedAt: number,
    summary: StreamSummary
  ): void {
    span.setAttributes({ [ATTR_LLM_CHUNK_COUNT]: summary.chunkCount });

    switch (summary.state) {
      case 'succeeded':
        if (summary.tokenUsage !== undefined) {
          span.setAttributes(llmTokens(summary.tokenUsage));
          this.countTokens(inst, ctx, summary.tokenUsage);
        }
        if (summary.finishReason !== undefined) {
          span.addEvent(EVENT_LLM_RESPONSE, { [ATTR_FINISH_REASON]: summary.finishReason });
        }
        span.setStatus(SpanStatusCode.OK);
        this.countRequest(inst, ctx, OPERATION_GENERATE_STREAM, STATUS_SUCCESS);
        break;
      case 'failed':
        this.recordFailure(inst, ctx, span, OPERATION_GENERATE_STREAM, summary.error);
        this.countRequest(inst, ctx, OPERATION_GENERATE_STREAM, STATUS_ERROR);
        break;
      case 'abandoned': {
        const error = new TelemetryError('STREAM_ABANDONED', STREAM_ABANDONED_MESSAGE);
        span.recordError(error);
        span.setStatus(SpanStatusCode.ERROR, error.message);
        this.countRequest(inst, ctx, OPERATION_GENERATE_STREAM, STATUS_CANCELLED);
        inst.logger.withContext(ctx).debug('LLM stream abandoned', {
          provider: this.delegate.name(),
          chunks: summary.chunkCount,
        });
        break;
      }
    }

    this.recordDuration(inst, ctx, OPERATION_GENERATE_STREAM, startedAt);
    span.end();
  }

  private requestAttributes(request: LLMRequest): Attributes {
    const attributes: Attributes = {
      ...llmProvider(this.delegate.name()),
      ...llmModel(this.delegate.model()),
    };
    if (request.temperature !== undefined) attributes[ATTR_LLM_TEMPERATURE] = request.temperature;
    if (request.maxTokens !== undefined) attributes[ATTR_LLM_MAX_TOKENS] = request.maxTokens;
    return attributes;
  }

  private metricAttrs(operation: string): Attr[] {
    return [
      newAttr(METRIC_ATTR_PROVIDER, this.delegate.name()),
      newAttr(METRIC_ATTR_MODEL, this.delegate.model()),
      newAttr(METRIC_ATTR_OPERATION, operation),
    ];
  }

  private recordFailure(
    inst: Instruments,
    ctx: Context,
    span: Span,
    operation: string,
    err: unknown
  ): void {
    const message = getErrorMessage(err);
    span.recordError(err);
    span.setStatus(SpanStatusCode.ERROR, message);
    inst.metrics.counter(METRIC_LLM_ERRORS).add(ctx, 1, ...this.metricAttrs(operation));
    inst.logger.withContext(ctx).warn('LLM request failed', {
      provider: this.delegate.name(),
      model: this.delegate.model(),
      operation,
      error: message,
    });
  }

  private countRequest(
    inst: Instruments,
    ctx: Context,
    operation: string,
    status: OperationStatus
  ): void {
    inst.metrics
      .counter(METRIC_LLM_REQUESTS)
      .add(ctx, 1, ...this.metricAttrs(operation), newAttr(METRIC_ATTR_STATUS, status));
  }

  private countTokens(inst: Instruments, ctx: Context, usage: TokenUsage): void {
    const attrs = [
      newAttr(METRIC_ATTR_PROVIDER, this.delegate.name()),
      newAttr(METRIC_ATTR_MODEL, this.delegate.model()),
    ];
    inst.metrics.counter(METRIC_LLM_TOKENS_PROMPT).add(ctx, usage.promptTokens, ...attrs);
    inst.metrics.counter(METRIC_LLM_TOKENS_COMPLETION).add(ctx, usage.completionTokens, ...attrs);
    inst.metrics.counter(METRIC_LLM_TOKENS_TOTAL).add(ctx, usage.totalTokens, ...attrs);
  }

  private recordDuration(
    inst: Instruments,
    ctx: Context,
    operation: string,
    startedAt: number
  ): void {
    inst.metrics
      .histogram(METRIC_LLM_REQUEST_DURATION)
      .record(ctx, performance.now() - startedAt, ...this.metricAttrs(operation));
  }
}
