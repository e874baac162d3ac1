/**
 * Type definitions for the language-model provider contract.
 * Providers are implemented elsewhere; the telemetry layer only wraps them.
 */

import type { Context } from '@opentelemetry/api';

/**
 * Role of a conversation message.
 */
export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * A single conversation message.
 */
export interface Message {
  role: MessageRole;
  content: string;
}

/**
 * Token usage information from a model response.
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Generation request sent to a provider.
 */
export interface LLMRequest {
  messages: Message[];
  /** Sampling temperature, when the caller overrides the provider default */
  temperature?: number;
  /** Maximum tokens to generate */
  maxTokens?: number;
}

/**
 * Completed (non-streaming) generation result.
 */
export interface LLMResponse {
  id: string;
  content: string;
  tokenUsage: TokenUsage;
  /** Why generation stopped (e.g. 'stop', 'length') */
  finishReason: string;
}

/**
 * One element of a streamed generation.
 * The terminal chunk sets `done` and usually carries token usage.
 */
export interface StreamChunk {
  content: string;
  done: boolean;
  finishReason?: string;
  tokenUsage?: TokenUsage;
}

/**
 * A language-model provider.
 * Every call receives the caller's context so spans nest under it.
 */
export interface LLMProvider {
  /** Provider identifier (e.g. 'openai') */
  name(): string;
  /** Model identifier */
  model(): string;
  generate(ctx: Context, request: LLMRequest): Promise<LLMResponse>;
  generateStream(ctx: Context, request: LLMRequest): AsyncIterable<StreamChunk>;
  embed(ctx: Context, texts: string[]): Promise<number[][]>;
  close(): Promise<void>;
}
