/**
 * Trace-context propagation across process boundaries.
 * Uses the process-wide propagator a tracing-enabled provider registers
 * (W3C `traceparent`/`tracestate` plus `baggage`).
 */

import { ROOT_CONTEXT, propagation } from '@opentelemetry/api';
import type { Context } from '@opentelemetry/api';

import type { PropagationCarrier } from './types.js';

/**
 * Write the trace context of `ctx` into `carrier` (e.g. outgoing headers).
 * Writes nothing when no propagator is registered or `ctx` has no span.
 */
export function injectTraceContext(
  ctx: Context,
  carrier: PropagationCarrier = {}
): PropagationCarrier {
  propagation.inject(ctx, carrier);
  return carrier;
}

/**
 * Derive a context carrying the remote span found in `carrier`.
 * Returns `ctx` unchanged when the carrier holds no trace context.
 */
export function extractTraceContext(
  carrier: PropagationCarrier,
  ctx: Context = ROOT_CONTEXT
): Context {
  return propagation.extract(ctx, carrier);
}
