/**
 * Shared base for the traced wrappers: resolves tracer, metrics and logger.
 */

import { getLogger, getMetrics, getTracer } from './global.js';
import type { Logger } from './logger.js';
import type { Metrics } from './metrics.js';
import type { Tracer } from './tracer.js';
import type { InstrumentationOptions } from './types.js';

/**
 * Backends for one instrumented call. Resolved when the call starts and used
 * until it ends, so a span and its metrics land in the same provider even if
 * the global provider is replaced mid-call.
 */
export interface Instruments {
  readonly tracer: Tracer;
  readonly metrics: Metrics;
  readonly logger: Logger;
}

export abstract class Instrumented {
  protected constructor(private readonly instrumentation: InstrumentationOptions = {}) {}

  /** Explicit options first, then the current global provider */
  protected resolve(): Instruments {
    return {
      tracer: this.instrumentation.tracer ?? getTracer(),
      metrics: this.instrumentation.metrics ?? getMetrics(),
      logger: this.instrumentation.logger ?? getLogger(),
    };
  }
}
