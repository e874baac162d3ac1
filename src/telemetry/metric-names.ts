/**
 * Metric catalog: every metric name the runtime records, with its unit,
 * instrument kind and description.
 */

// -----------------------------------------------------------------------------
// Units and Kinds
// -----------------------------------------------------------------------------

export const UNIT_NONE = '';
export const UNIT_MILLISECONDS = 'ms';
export const UNIT_SECONDS = 's';
export const UNIT_BYTES = 'By';
export const UNIT_COUNT = '1';

export type MetricUnit =
  | typeof UNIT_NONE
  | typeof UNIT_MILLISECONDS
  | typeof UNIT_SECONDS
  | typeof UNIT_BYTES
  | typeof UNIT_COUNT;

export const METRIC_KINDS = ['counter', 'histogram', 'gauge'] as const;
export type MetricKind = (typeof METRIC_KINDS)[number];

// -----------------------------------------------------------------------------
// Agent Metrics
// -----------------------------------------------------------------------------

export const METRIC_AGENT_RUNS = 'agent.runs';
export const METRIC_AGENT_RUN_DURATION = 'agent.run.duration';
export const METRIC_AGENT_ITERATIONS = 'agent.iterations';
export const METRIC_AGENT_ERRORS = 'agent.errors';
export const METRIC_AGENT_ACTIVE = 'agent.active';

// -----------------------------------------------------------------------------
// LLM Metrics
// -----------------------------------------------------------------------------

export const METRIC_LLM_REQUESTS = 'llm.requests';
export const METRIC_LLM_REQUEST_DURATION = 'llm.request.duration';
export const METRIC_LLM_TOKENS_PROMPT = 'llm.tokens.prompt';
export const METRIC_LLM_TOKENS_COMPLETION = 'llm.tokens.completion';
export const METRIC_LLM_TOKENS_TOTAL = 'llm.tokens.total';
export const METRIC_LLM_ERRORS = 'llm.errors';
export const METRIC_LLM_RETRIES = 'llm.retries';

// -----------------------------------------------------------------------------
// Tool Metrics
// -----------------------------------------------------------------------------

export const METRIC_TOOL_CALLS = 'tool.calls';
export const METRIC_TOOL_CALL_DURATION = 'tool.call.duration';
export const METRIC_TOOL_ERRORS = 'tool.errors';

// -----------------------------------------------------------------------------
// Memory / RAG Metrics
// -----------------------------------------------------------------------------

export const METRIC_MEMORY_OPERATIONS = 'memory.operations';
export const METRIC_MEMORY_SIZE = 'memory.size';
export const METRIC_MEMORY_HITS = 'memory.hits';
export const METRIC_MEMORY_MISSES = 'memory.misses';

export const METRIC_RAG_QUERIES = 'rag.queries';
export const METRIC_RAG_QUERY_DURATION = 'rag.query.duration';
export const METRIC_RAG_DOCUMENTS_LOADED = 'rag.documents.loaded';
export const METRIC_RAG_CHUNKS_INDEXED = 'rag.chunks.indexed';

// -----------------------------------------------------------------------------
// Descriptions
// -----------------------------------------------------------------------------

export interface MetricDescription {
  name: string;
  description: string;
  unit: MetricUnit;
  kind: MetricKind;
}

/**
 * Every predefined metric, in catalog order.
 */
export const PREDEFINED_METRICS: readonly MetricDescription[] = [
  { name: METRIC_AGENT_RUNS, description: 'Total number of agent runs', unit: UNIT_COUNT, kind: 'counter' },
  { name: METRIC_AGENT_RUN_DURATION, description: 'Duration of agent runs', unit: UNIT_MILLISECONDS, kind: 'histogram' },
  { name: METRIC_AGENT_ITERATIONS, description: 'Iterations per agent run', unit: UNIT_COUNT, kind: 'histogram' },
  { name: METRIC_AGENT_ERRORS, description: 'Total number of failed agent runs', unit: UNIT_COUNT, kind: 'counter' },
  { name: METRIC_AGENT_ACTIVE, description: 'Agent runs currently in progress', unit: UNIT_COUNT, kind: 'gauge' },

  { name: METRIC_LLM_REQUESTS, description: 'Total number of LLM requests', unit: UNIT_COUNT, kind: 'counter' },
  { name: METRIC_LLM_REQUEST_DURATION, description: 'Duration of LLM requests', unit: UNIT_MILLISECONDS, kind: 'histogram' },
  { name: METRIC_LLM_TOKENS_PROMPT, description: 'Prompt tokens consumed', unit: UNIT_COUNT, kind: 'counter' },
  { name: METRIC_LLM_TOKENS_COMPLETION, description: 'Completion tokens produced', unit: UNIT_COUNT, kind: 'counter' },
  { name: METRIC_LLM_TOKENS_TOTAL, description: 'Total tokens used', unit: UNIT_COUNT, kind: 'counter' },
  { name: METRIC_LLM_ERRORS, description: 'Total number of failed LLM requests', unit: UNIT_COUNT, kind: 'counter' },
  { name: METRIC_LLM_RETRIES, description: 'Total number of LLM request retries', unit: UNIT_COUNT, kind: 'counter' },

  { name: METRIC_TOOL_CALLS, description: 'Total number of tool calls', unit: UNIT_COUNT, kind: 'counter' },
  { name: METRIC_TOOL_CALL_DURATION, description: 'Duration of tool calls', unit: UNIT_MILLISECONDS, kind: 'histogram' },
  { name: METRIC_TOOL_ERRORS, description: 'Total number of failed tool calls', unit: UNIT_COUNT, kind: 'counter' },

  { name: METRIC_MEMORY_OPERATIONS, description: 'Total number of memory operations', unit: UNIT_COUNT, kind: 'counter' },
  { name: METRIC_MEMORY_SIZE, description: 'Current memory size', unit: UNIT_BYTES, kind: 'gauge' },
  { name: METRIC_MEMORY_HITS, description: 'Memory cache hits', unit: UNIT_COUNT, kind: 'counter' },
  { name: METRIC_MEMORY_MISSES, description: 'Memory cache misses', unit: UNIT_COUNT, kind: 'counter' },

  { name: METRIC_RAG_QUERIES, description: 'Total number of retrieval queries', unit: UNIT_COUNT, kind: 'counter' },
  { name: METRIC_RAG_QUERY_DURATION, description: 'Duration of retrieval queries', unit: UNIT_MILLISECONDS, kind: 'histogram' },
  { name: METRIC_RAG_DOCUMENTS_LOADED, description: 'Documents loaded for retrieval', unit: UNIT_COUNT, kind: 'counter' },
  { name: METRIC_RAG_CHUNKS_INDEXED, description: 'Chunks indexed for retrieval', unit: UNIT_COUNT, kind: 'counter' },
];

const METRICS_BY_NAME: ReadonlyMap<string, MetricDescription> = new Map(
  PREDEFINED_METRICS.map((metric) => [metric.name, metric])
);

/**
 * Look up a predefined metric by name.
 */
export function findMetricDescription(name: string): MetricDescription | undefined {
  return METRICS_BY_NAME.get(name);
}
