/**
 * Factory functions for test objects.
 * Creates fakes with sensible defaults that can be overridden.
 */

import type { Context } from '@opentelemetry/api';

import { InMemoryMetrics } from '../../src/telemetry/metrics.js';
import { NOOP_LOGGER } from '../../src/telemetry/logger.js';
import type { Logger } from '../../src/telemetry/logger.js';
import { NOOP_TRACER } from '../../src/telemetry/tracer.js';
import type { Tracer } from '../../src/telemetry/tracer.js';
import type {
  LLMProvider,
  LLMRequest,
  LLMResponse,
  Message,
  StreamChunk,
} from '../../src/model/types.js';
import { BasicToolResult } from '../../src/tools/types.js';
import type { ToolExecutor, ToolResult } from '../../src/tools/types.js';
import { GREETING_STREAM_CHUNKS, SIMPLE_GREETING_RESPONSE } from './llm-responses.js';

// -----------------------------------------------------------------------------
// Request Factories
// -----------------------------------------------------------------------------

/**
 * Create a single message.
 */
export function createMessage(content: string, role: Message['role'] = 'user'): Message {
  return { role, content };
}

/**
 * Create a generation request with one user message.
 */
export function createRequest(overrides: Partial<LLMRequest> = {}): LLMRequest {
  return { messages: [createMessage('Hello')], ...overrides };
}

// -----------------------------------------------------------------------------
// Fake LLM Provider
// -----------------------------------------------------------------------------

export interface FakeProviderOptions {
  name?: string;
  model?: string;
  /** Response from generate */
  response?: LLMResponse;
  /** Makes generate reject */
  generateError?: Error;
  /** Chunks yielded by generateStream */
  chunks?: readonly StreamChunk[];
  /** Thrown by the stream after its chunks */
  streamError?: Error;
  /** Thrown synchronously by generateStream before any stream exists */
  streamStartError?: Error;
  /** Makes embed reject */
  embedError?: Error;
}

/**
 * Provider fake that records the context of every call.
 */
export class FakeLLMProvider implements LLMProvider {
  readonly contexts: Context[] = [];
  /** Set once the stream generator has run its cleanup */
  streamFinalized = false;
  closed = false;

  constructor(private readonly options: FakeProviderOptions = {}) {}

  name(): string {
    return this.options.name ?? 'openai';
  }

  model(): string {
    return this.options.model ?? 'gpt-4o';
  }

  async generate(ctx: Context, _request: LLMRequest): Promise<LLMResponse> {
    this.contexts.push(ctx);
    await Promise.resolve();
    if (this.options.generateError !== undefined) {
      throw this.options.generateError;
    }
    return this.options.response ?? SIMPLE_GREETING_RESPONSE;
  }

  generateStream(ctx: Context, _request: LLMRequest): AsyncIterable<StreamChunk> {
    this.contexts.push(ctx);
    if (this.options.streamStartError !== undefined) {
      throw this.options.streamStartError;
    }
    return this.stream(this.options.chunks ?? GREETING_STREAM_CHUNKS, this.options.streamError);
  }

  async embed(ctx: Context, texts: string[]): Promise<number[][]> {
    this.contexts.push(ctx);
    await Promise.resolve();
    if (this.options.embedError !== undefined) {
      throw this.options.embedError;
    }
    return texts.map((text) => [text.length, 0.5]);
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }

  private async *stream(
    chunks: readonly StreamChunk[],
    error: Error | undefined
  ): AsyncGenerator<StreamChunk> {
    try {
      for (const chunk of chunks) {
        yield chunk;
      }
      if (error !== undefined) {
        throw error;
      }
    } finally {
      this.streamFinalized = true;
    }
  }
}

// -----------------------------------------------------------------------------
// Fake Tool Executor
// -----------------------------------------------------------------------------

export type ToolHandler = (args: Record<string, unknown>) => ToolResult | Promise<ToolResult>;

/**
 * Executor fake dispatching to per-tool handlers.
 * Unknown tools return a failed result.
 */
export class FakeToolExecutor implements ToolExecutor {
  readonly calls: Array<{ ctx: Context; name: string; args: Record<string, unknown> }> = [];

  constructor(private readonly handlers: Record<string, ToolHandler> = {}) {}

  async execute(ctx: Context, name: string, args: Record<string, unknown>): Promise<ToolResult> {
    this.calls.push({ ctx, name, args });
    const handler = this.handlers[name];
    if (handler === undefined) {
      return BasicToolResult.failure(name, new Error(`unknown tool: ${name}`));
    }
    return handler(args);
  }
}

/**
 * Handler returning its arguments as a successful output.
 */
export function echoTool(name: string): ToolHandler {
  return (args) => BasicToolResult.success(name, args);
}

// -----------------------------------------------------------------------------
// Instrumentation Factories
// -----------------------------------------------------------------------------

/**
 * Instrumentation recording metrics in memory, with tracer and logger
 * defaulting to no-ops.
 */
export function createInstrumentation(
  overrides: { tracer?: Tracer; logger?: Logger } = {}
): { tracer: Tracer; metrics: InMemoryMetrics; logger: Logger } {
  return {
    tracer: overrides.tracer ?? NOOP_TRACER,
    metrics: new InMemoryMetrics(),
    logger: overrides.logger ?? NOOP_LOGGER,
  };
}
