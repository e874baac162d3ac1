/**
 * Tool executor wrapper that traces and measures every tool call.
 */

import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import type { Context } from '@opentelemetry/api';

import { getErrorMessage } from '../errors/index.js';
import type { ToolExecutor, ToolResult } from '../tools/types.js';
import {
  ATTR_TOOL_ERROR,
  METRIC_ATTR_STATUS,
  METRIC_ATTR_TOOL,
  SPAN_TOOL_EXECUTE,
  STATUS_ERROR,
  STATUS_SUCCESS,
  toolDuration,
  toolName,
} from './conventions.js';
import type { OperationStatus } from './conventions.js';
import { Instrumented } from './instrumented.js';
import type { Instruments } from './instrumented.js';
import { METRIC_TOOL_CALLS, METRIC_TOOL_CALL_DURATION, METRIC_TOOL_ERRORS } from './metric-names.js';
import { newAttr } from './metrics.js';
import type { Span } from './tracer.js';
import type { InstrumentationOptions } from './types.js';

export class TracedExecutor extends Instrumented implements ToolExecutor {
  constructor(
    private readonly delegate: ToolExecutor,
    options: InstrumentationOptions = {}
  ) {
    super(options);
  }

  /**
   * Run a tool inside an INTERNAL `tool.execute` span.
   *
   * A result with `isSuccess() === false` marks the span as failed and counts
   * a tool error; the result itself is returned untouched. A thrown error is
   * bookkept the same way and rethrown.
   */
  async execute(ctx: Context, name: string, args: Record<string, unknown>): Promise<ToolResult> {
    const inst = this.resolve();
    const [spanCtx, span] = inst.tracer.start(ctx, SPAN_TOOL_EXECUTE, {
      kind: SpanKind.INTERNAL,
      attributes: toolName(name),
    });
    const startedAt = performance.now();
    let status: OperationStatus = STATUS_SUCCESS;

    try {
      const result = await this.delegate.execute(spanCtx, name, args);
      if (result.isSuccess()) {
        span.setStatus(SpanStatusCode.OK);
      } else {
        status = STATUS_ERROR;
        this.recordFailure(
          inst,
          spanCtx,
          span,
          name,
          result.error() ?? new Error(`tool "${name}" failed`)
        );
      }
      return result;
    } catch (err) {
      status = STATUS_ERROR;
      this.recordFailure(inst, spanCtx, span, name, err);
      throw err;
    } finally {
      const durationMs = performance.now() - startedAt;
      span.setAttributes(toolDuration(durationMs));
      inst.metrics
        .counter(METRIC_TOOL_CALLS)
        .add(spanCtx, 1, newAttr(METRIC_ATTR_TOOL, name), newAttr(METRIC_ATTR_STATUS, status));
      inst.metrics
        .histogram(METRIC_TOOL_CALL_DURATION)
        .record(spanCtx, durationMs, newAttr(METRIC_ATTR_TOOL, name));
      span.end();
    }
  }

  private recordFailure(
    inst: Instruments,
    ctx: Context,
    span: Span,
    name: string,
    err: unknown
  ): void {
    const message = getErrorMessage(err);
    span.recordError(err);
    span.setAttributes({ [ATTR_TOOL_ERROR]: message });
    span.setStatus(SpanStatusCode.ERROR, message);
    inst.metrics.counter(METRIC_TOOL_ERRORS).add(ctx, 1, newAttr(METRIC_ATTR_TOOL, name));
    inst.logger.withContext(ctx).warn('Tool call failed', { tool: name, error: message });
  }
}
