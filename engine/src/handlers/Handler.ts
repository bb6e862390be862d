/**
 * Handler Interface
 *
 * A handler is the processing unit bound to a step's declared type
 * (prospect search, enrichment, scoring, ...). The engine creates one
 * instance per step per run through the HandlerRegistry and discards it
 * after the step finishes.
 *
 * @module handlers
 */

import type { StepOutput, ToolSpec, WorkflowConfig } from '../types/core-types.js';
import type { EngineLogger } from '../logging/EngineLogger.js';

/**
 * Inputs after binding resolution
 */
export interface ResolvedInput {
  /** Every declared input key; absent ones carry `null` */
  readonly values: Readonly<Record<string, unknown>>;

  /** Keys whose binding degraded to the absent marker */
  readonly absent: readonly string[];
}

export interface HandlerContext {
  readonly runId: string;
  readonly workflowName: string;
  readonly stepId: string;

  /** Aborted on step timeout */
  readonly signal: AbortSignal;

  /** Scoped to this step */
  readonly logger: EngineLogger;
}

export interface Handler {
  execute(
    input: ResolvedInput,
    config: WorkflowConfig,
    context: HandlerContext,
  ): StepOutput | Promise<StepOutput>;
}

/**
 * Everything a factory receives from the step declaration
 */
export interface HandlerOptions {
  readonly stepId: string;
  readonly handlerType: string;
  readonly instructions: string;
  readonly tools: readonly ToolSpec[];
  readonly outputSchema: Readonly<Record<string, string>>;
  readonly logger: EngineLogger;
}

/**
 * Pure function from step declaration to a fresh handler
 */
export type HandlerFactory = (options: HandlerOptions) => Handler;
