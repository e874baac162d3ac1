/**
 * Public API: telemetry for agent runtimes.
 *
 * @example
 * import { ROOT_CONTEXT } from '@opentelemetry/api';
 * import { initGlobalProvider, TracedProvider } from 'agent-telemetry';
 *
 * const telemetry = initGlobalProvider({ enabled: true, tracing: { enabled: true } });
 * const llm = new TracedProvider(openaiProvider);
 * const response = await llm.generate(ROOT_CONTEXT, { messages });
 * await telemetry.shutdown();
 */

export * from './telemetry/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export type {
  Message,
  MessageRole,
  TokenUsage,
  LLMRequest,
  LLMResponse,
  StreamChunk,
  LLMProvider,
} from './model/types.js';
export { BasicToolResult } from './tools/types.js';
export type { ToolResult, ToolExecutor } from './tools/types.js';
