/**
 * Execution Graph
 *
 * Read-only view over a WorkflowSpec, computed once by GraphBuilder.
 * Successor and predecessor lists keep declaration order; nothing here
 * is mutated after build.
 */

import type { StepSpec, WorkflowSpec } from '../types/core-types.js';
import { StateError } from '../errors/StateError.js';

export interface ExecutionGraph {
  readonly workflow: WorkflowSpec;

  /** The unique step with no predecessors */
  readonly entry: string;

  /** Step ids in declaration order */
  readonly order: readonly string[];

  readonly steps: ReadonlyMap<string, StepSpec>;

  /** stepId → successor ids (deduplicated) */
  readonly successors: ReadonlyMap<string, readonly string[]>;

  /** stepId → predecessor ids */
  readonly predecessors: ReadonlyMap<string, readonly string[]>;

  /** stepId → every step with a path to it */
  readonly ancestors: ReadonlyMap<string, ReadonlySet<string>>;

  /** stepId → position in the workflow's step list */
  readonly declarationIndex: ReadonlyMap<string, number>;
}

/**
 * Look up a step that the graph is known to contain
 */
export function requireStep(graph: ExecutionGraph, stepId: string): StepSpec {
  const step = graph.steps.get(stepId);
  if (!step) {
    throw StateError.unknownStep(stepId, graph.workflow.name);
  }
  return step;
}
