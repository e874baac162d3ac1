/**
 * Attribute, span and event names for agent runtime telemetry.
 *
 * Keys use dotted namespaces per subsystem (`agent.*`, `llm.*`, `tool.*`,
 * `message.*`, `memory.*`, `rag.*`, `error.*`). Factory functions return
 * ready-made `Attributes` so call sites never spell keys by hand.
 */

import type { Attributes } from '@opentelemetry/api';
import type { TokenUsage } from '../model/types.js';

// -----------------------------------------------------------------------------
// Resource Attributes
// -----------------------------------------------------------------------------

/**
 * Deployment environment of the service. Still incubating in the semantic
 * conventions package, so it is defined here rather than imported from the
 * unstable entry point.
 */
export const ATTR_DEPLOYMENT_ENVIRONMENT_NAME = 'deployment.environment.name';

// -----------------------------------------------------------------------------
// Agent Attributes
// -----------------------------------------------------------------------------

/** Name of the agent executing the run */
export const ATTR_AGENT_NAME = 'agent.name';

/** Kind of agent (e.g. 'react', 'planner') */
export const ATTR_AGENT_TYPE = 'agent.type';

/** Current loop iteration, 1-based */
export const ATTR_AGENT_ITERATION = 'agent.iteration';

/** Iteration limit configured for the run */
export const ATTR_AGENT_MAX_ITERATIONS = 'agent.max_iterations';

// -----------------------------------------------------------------------------
// LLM Attributes
// -----------------------------------------------------------------------------

/** Model provider (e.g. 'openai', 'ollama') */
export const ATTR_LLM_PROVIDER = 'llm.provider';

/** Model identifier */
export const ATTR_LLM_MODEL = 'llm.model';

/** Sampling temperature of the request */
export const ATTR_LLM_TEMPERATURE = 'llm.temperature';

/** Maximum tokens requested */
export const ATTR_LLM_MAX_TOKENS = 'llm.max_tokens';

/** Tokens consumed by the prompt */
export const ATTR_LLM_PROMPT_TOKENS = 'llm.prompt_tokens';

/** Tokens produced by the completion */
export const ATTR_LLM_COMPLETION_TOKENS = 'llm.completion_tokens';

/** Prompt plus completion tokens */
export const ATTR_LLM_TOTAL_TOKENS = 'llm.total_tokens';

/** Number of texts sent to an embedding call */
export const ATTR_LLM_INPUT_COUNT = 'llm.input_count';

/** Number of vectors returned by an embedding call */
export const ATTR_LLM_OUTPUT_COUNT = 'llm.output_count';

/** Number of chunks a stream delivered */
export const ATTR_LLM_CHUNK_COUNT = 'llm.chunk_count';

// -----------------------------------------------------------------------------
// Tool Attributes
// -----------------------------------------------------------------------------

/** Name of the invoked tool */
export const ATTR_TOOL_NAME = 'tool.name';

/** Serialized tool arguments (sensitive) */
export const ATTR_TOOL_ARGUMENTS = 'tool.arguments';

/** Serialized tool result (sensitive) */
export const ATTR_TOOL_RESULT = 'tool.result';

/** Error message reported by the tool */
export const ATTR_TOOL_ERROR = 'tool.error';

/** Wall-clock duration of the tool call in milliseconds */
export const ATTR_TOOL_DURATION_MS = 'tool.duration_ms';

// -----------------------------------------------------------------------------
// Message Attributes
// -----------------------------------------------------------------------------

/** Role of a conversation message */
export const ATTR_MESSAGE_ROLE = 'message.role';

/** Message text (sensitive) */
export const ATTR_MESSAGE_CONTENT = 'message.content';

/** Token count of a message */
export const ATTR_MESSAGE_TOKENS = 'message.tokens';

// -----------------------------------------------------------------------------
// Memory / RAG Attributes
// -----------------------------------------------------------------------------

export const ATTR_MEMORY_TYPE = 'memory.type';
export const ATTR_MEMORY_CAPACITY = 'memory.capacity';
export const ATTR_MEMORY_USAGE = 'memory.usage';

export const ATTR_RAG_DOCUMENT_COUNT = 'rag.document_count';
export const ATTR_RAG_CHUNK_COUNT = 'rag.chunk_count';
export const ATTR_RAG_TOP_K = 'rag.top_k';
export const ATTR_RAG_SCORE = 'rag.score';

// -----------------------------------------------------------------------------
// Error Attributes
// -----------------------------------------------------------------------------

/** Error class or category */
export const ATTR_ERROR_TYPE = 'error.type';

/** Error message */
export const ATTR_ERROR_MESSAGE = 'error.message';

/** Whether the failed operation may be retried */
export const ATTR_ERROR_RETRYABLE = 'error.retryable';

// -----------------------------------------------------------------------------
// Generic Attributes
// -----------------------------------------------------------------------------

/** Duration of a finished unit of work in milliseconds */
export const ATTR_DURATION_MS = 'duration_ms';

/** Finish reason reported with a model response */
export const ATTR_FINISH_REASON = 'finish_reason';

/** Whether a recorded tool call succeeded */
export const ATTR_SUCCESS = 'success';

// -----------------------------------------------------------------------------
// Metric Recording Attributes
// -----------------------------------------------------------------------------

export const METRIC_ATTR_PROVIDER = 'provider';
export const METRIC_ATTR_MODEL = 'model';
export const METRIC_ATTR_STATUS = 'status';
export const METRIC_ATTR_OPERATION = 'operation';
export const METRIC_ATTR_TOOL = 'tool';
export const METRIC_ATTR_AGENT = 'agent';

/** Values of the `status` metric attribute */
export const STATUS_SUCCESS = 'success';
export const STATUS_ERROR = 'error';
export const STATUS_CANCELLED = 'cancelled';

export type OperationStatus = typeof STATUS_SUCCESS | typeof STATUS_ERROR | typeof STATUS_CANCELLED;

/** Values of the `operation` metric attribute */
export const OPERATION_GENERATE = 'generate';
export const OPERATION_GENERATE_STREAM = 'generate_stream';
export const OPERATION_EMBED = 'embed';

// -----------------------------------------------------------------------------
// Span and Event Names
// -----------------------------------------------------------------------------

export const SPAN_LLM_GENERATE = 'llm.generate';
export const SPAN_LLM_GENERATE_STREAM = 'llm.generate_stream';
export const SPAN_LLM_EMBED = 'llm.embed';
export const SPAN_TOOL_EXECUTE = 'tool.execute';
export const SPAN_AGENT_RUN = 'agent.run';

export const EVENT_LLM_RESPONSE = 'llm.response';
export const EVENT_AGENT_ITERATION = 'agent.iteration';
export const EVENT_AGENT_TOOL_CALL = 'agent.tool_call';

// -----------------------------------------------------------------------------
// Attribute Factories
// -----------------------------------------------------------------------------

export function agentName(name: string): Attributes {
  return { [ATTR_AGENT_NAME]: name };
}

export function agentType(type: string): Attributes {
  return { [ATTR_AGENT_TYPE]: type };
}

export function agentIteration(iteration: number): Attributes {
  return { [ATTR_AGENT_ITERATION]: iteration };
}

export function llmProvider(provider: string): Attributes {
  return { [ATTR_LLM_PROVIDER]: provider };
}

export function llmModel(model: string): Attributes {
  return { [ATTR_LLM_MODEL]: model };
}

/**
 * Token usage as span attributes.
 */
export function llmTokens(usage: TokenUsage): Attributes {
  return {
    [ATTR_LLM_PROMPT_TOKENS]: usage.promptTokens,
    [ATTR_LLM_COMPLETION_TOKENS]: usage.completionTokens,
    [ATTR_LLM_TOTAL_TOKENS]: usage.totalTokens,
  };
}

export function toolName(name: string): Attributes {
  return { [ATTR_TOOL_NAME]: name };
}

export function toolDuration(durationMs: number): Attributes {
  return { [ATTR_TOOL_DURATION_MS]: durationMs };
}

/**
 * Error description attributes.
 */
export function errorAttrs(type: string, message: string, retryable: boolean): Attributes {
  return {
    [ATTR_ERROR_TYPE]: type,
    [ATTR_ERROR_MESSAGE]: message,
    [ATTR_ERROR_RETRYABLE]: retryable,
  };
}
