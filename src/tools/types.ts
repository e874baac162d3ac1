/**
 * Type definitions for the tool executor contract.
 * Executors report failure through the result; a thrown error means the
 * executor itself broke.
 */

import type { Context } from '@opentelemetry/api';

/**
 * Outcome of one tool invocation.
 */
export interface ToolResult {
  name(): string;
  isSuccess(): boolean;
  output(): unknown;
  /** The failure, when `isSuccess()` is false (may still be undefined) */
  error(): Error | undefined;
}

/**
 * Runs tools by name.
 */
export interface ToolExecutor {
  execute(ctx: Context, name: string, args: Record<string, unknown>): Promise<ToolResult>;
}

/**
 * Plain ToolResult implementation.
 */
export class BasicToolResult implements ToolResult {
  private constructor(
    private readonly toolName: string,
    private readonly succeeded: boolean,
    private readonly value: unknown,
    private readonly failure: Error | undefined
  ) {}

  static success(name: string, output: unknown): BasicToolResult {
    return new BasicToolResult(name, true, output, undefined);
  }

  static failure(name: string, error?: Error): BasicToolResult {
    return new BasicToolResult(name, false, undefined, error);
  }

  name(): string {
    return this.toolName;
  }

  isSuccess(): boolean {
    return this.succeeded;
  }

  output(): unknown {
    return this.value;
  }

  error(): Error | undefined {
    return this.failure;
  }
}
