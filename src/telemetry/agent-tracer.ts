/**
 * Coarse-grained tracing of agent runs.
 *
 * A run is one INTERNAL `agent.run` span. Iterations and tool calls inside
 * it are span events, not child spans; token usage goes to the counters.
 */

import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import type { Attributes, Context } from '@opentelemetry/api';

import { getErrorMessage } from '../errors/index.js';
import type { TokenUsage } from '../model/types.js';
import {
  ATTR_AGENT_MAX_ITERATIONS,
  ATTR_DURATION_MS,
  ATTR_SUCCESS,
  EVENT_AGENT_ITERATION,
  EVENT_AGENT_TOOL_CALL,
  METRIC_ATTR_AGENT,
  METRIC_ATTR_MODEL,
  METRIC_ATTR_PROVIDER,
  METRIC_ATTR_STATUS,
  SPAN_AGENT_RUN,
  STATUS_ERROR,
  STATUS_SUCCESS,
  agentIteration,
  agentName,
  agentType,
  toolDuration,
  toolName,
} from './conventions.js';
import { Instrumented } from './instrumented.js';
import type { Instruments } from './instrumented.js';
import {
  METRIC_AGENT_ACTIVE,
  METRIC_AGENT_ERRORS,
  METRIC_AGENT_ITERATIONS,
  METRIC_AGENT_RUNS,
  METRIC_AGENT_RUN_DURATION,
  METRIC_LLM_TOKENS_COMPLETION,
  METRIC_LLM_TOKENS_PROMPT,
  METRIC_LLM_TOKENS_TOTAL,
} from './metric-names.js';
import { newAttr } from './metrics.js';
import type { Metrics } from './metrics.js';
import type { Span } from './tracer.js';
import type { InstrumentationOptions } from './types.js';

/**
 * Handle for a run in progress. Pass `ctx` to work done inside the run.
 */
export interface AgentRun {
  /** Context carrying the run span */
  readonly ctx: Context;
  readonly span: Span;
  readonly agentName: string;
  readonly agentType: string;
  /** `performance.now()` at start */
  readonly startedAt: number;
}

/**
 * How a run ended.
 */
export interface RunOutcome {
  /** Failure that ended the run; absent on success */
  error?: unknown;
  /** Iterations the run took */
  iterations?: number;
  /** Overrides the measured duration */
  durationMs?: number;
}

/** Open runs per metrics backend; `agent.active` is one gauge however many tracers feed it */
const openRunsByMetrics = new WeakMap<Metrics, number>();

function adjustOpenRuns(metrics: Metrics, ctx: Context, delta: number): void {
  const open = Math.max(0, (openRunsByMetrics.get(metrics) ?? 0) + delta);
  openRunsByMetrics.set(metrics, open);
  metrics.gauge(METRIC_AGENT_ACTIVE).set(ctx, open);
}

export class AgentTracer extends Instrumented {
  private activeRuns = 0;
  /** Backends each open run started with; removed when the run finishes */
  private readonly openRuns = new WeakMap<AgentRun, Instruments>();

  constructor(options: InstrumentationOptions = {}) {
    super(options);
  }

  startRun(ctx: Context, name: string, type: string): AgentRun {
    const inst = this.resolve();
    const [runCtx, span] = inst.tracer.start(ctx, SPAN_AGENT_RUN, {
      kind: SpanKind.INTERNAL,
      attributes: { ...agentName(name), ...agentType(type) },
    });

    const run: AgentRun = {
      ctx: runCtx,
      span,
      agentName: name,
      agentType: type,
      startedAt: performance.now(),
    };
    this.openRuns.set(run, inst);
    this.activeRuns++;
    adjustOpenRuns(inst.metrics, runCtx, 1);

    return run;
  }

  /**
   * Mark the start of a loop iteration on the span in `ctx`.
   */
  recordIteration(ctx: Context, iteration: number, maxIterations?: number): void {
    const attributes: Attributes = agentIteration(iteration);
    if (maxIterations !== undefined) attributes[ATTR_AGENT_MAX_ITERATIONS] = maxIterations;
    this.resolve().tracer.spanFromContext(ctx).addEvent(EVENT_AGENT_ITERATION, attributes);
  }

  /**
   * Note a tool call on the span in `ctx`. Metrics for tool calls come from
   * TracedExecutor.
   */
  recordToolCall(ctx: Context, tool: string, success: boolean, durationMs: number): void {
    this.resolve().tracer.spanFromContext(ctx).addEvent(EVENT_AGENT_TOOL_CALL, {
      ...toolName(tool),
      [ATTR_SUCCESS]: success,
      ...toolDuration(durationMs),
    });
  }

  recordTokenUsage(ctx: Context, usage: TokenUsage, provider: string, model: string): void {
    const { metrics } = this.resolve();
    const attrs = [newAttr(METRIC_ATTR_PROVIDER, provider), newAttr(METRIC_ATTR_MODEL, model)];
    metrics.counter(METRIC_LLM_TOKENS_PROMPT).add(ctx, usage.promptTokens, ...attrs);
    metrics.counter(METRIC_LLM_TOKENS_COMPLETION).add(ctx, usage.completionTokens, ...attrs);
    metrics.counter(METRIC_LLM_TOKENS_TOTAL).add(ctx, usage.totalTokens, ...attrs);
  }

  /**
   * End a run. Finishing the same run twice, or a run this tracer did not
   * start, does nothing.
   */
  finishRun(run: AgentRun, outcome: RunOutcome = {}): void {
    const inst = this.openRuns.get(run);
    if (inst === undefined) return;
    this.openRuns.delete(run);
    const { metrics } = inst;

    const { ctx, span } = run;
    const durationMs = outcome.durationMs ?? performance.now() - run.startedAt;
    const agent = newAttr(METRIC_ATTR_AGENT, run.agentName);
    const failed = outcome.error !== undefined;

    if (failed) {
      const message = getErrorMessage(outcome.error);
      span.recordError(outcome.error);
      span.setStatus(SpanStatusCode.ERROR, message);
      metrics.counter(METRIC_AGENT_ERRORS).add(ctx, 1, agent);
      inst.logger.withContext(ctx).error('Agent run failed', {
        agent: run.agentName,
        error: message,
      });
    } else {
      span.setStatus(SpanStatusCode.OK);
    }

    metrics
      .counter(METRIC_AGENT_RUNS)
      .add(ctx, 1, agent, newAttr(METRIC_ATTR_STATUS, failed ? STATUS_ERROR : STATUS_SUCCESS));
    metrics.histogram(METRIC_AGENT_RUN_DURATION).record(ctx, durationMs, agent);
    if (outcome.iterations !== undefined) {
      metrics.histogram(METRIC_AGENT_ITERATIONS).record(ctx, outcome.iterations, agent);
      span.setAttributes(agentIteration(outcome.iterations));
    }
    span.setAttributes({ [ATTR_DURATION_MS]: durationMs });

    this.activeRuns--;
    adjustOpenRuns(metrics, ctx, -1);

    span.end();
  }

  /** Runs this tracer started and has not finished */
  activeRunCount(): number {
    return this.activeRuns;
  }
}
