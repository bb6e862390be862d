/**
 * GraphBuilder
 *
 * Validates a WorkflowSpec and derives its ExecutionGraph.
 *
 * Flow:
 * 1. DependencyResolver: index steps, check references, build adjacency
 * 2. CycleDetector: reject cyclic successor relations
 * 3. Entry detection: exactly one step without predecessors
 * 4. Reachability from the entry (warning only)
 * 5. Bindings to non-ancestor steps (warning only)
 *
 * `analyze()` collects every diagnostic; `build()` throws the first one
 * with error severity. Both are pure.
 */

import type { WorkflowSpec } from '../types/core-types.js';
import { GraphError } from '../errors/GraphError.js';
import { DependencyResolver } from './DependencyResolver.js';
import { CycleDetector } from './CycleDetector.js';
import type { ExecutionGraph } from './ExecutionGraph.js';

export interface GraphAnalysis {
  /** Present only when no error-severity issue was found */
  readonly graph?: ExecutionGraph;
  readonly issues: readonly GraphError[];
  readonly errors: readonly GraphError[];
  readonly warnings: readonly GraphError[];
}

export class GraphBuilder {
  static analyze(spec: WorkflowSpec): GraphAnalysis {
    const resolved = DependencyResolver.resolve(spec);
    const issues: GraphError[] = [...resolved.issues];

    if (resolved.order.length === 0) {
      return summarize(issues);
    }

    const cycle = CycleDetector.detect(resolved.order, resolved.successors);
    if (cycle.hasCycle && cycle.cyclePath) {
      issues.push(GraphError.cycleDetected(cycle.cyclePath));
    }

    const candidates = DependencyResolver.findEntryCandidates(resolved.order, resolved.predecessors);
    const entry = candidates.length === 1 ? candidates[0] : undefined;

    if (candidates.length === 0) {
      issues.push(GraphError.noEntry(spec.name));
    } else if (candidates.length > 1) {
      issues.push(GraphError.ambiguousEntry(candidates));
    }

    if (entry !== undefined) {
      const reachable = DependencyResolver.reachableFrom(entry, resolved.successors);
      for (const id of resolved.order) {
        if (!reachable.has(id)) {
          issues.push(GraphError.unreachableStep(id, entry));
        }
      }
    }

    const ancestors = DependencyResolver.computeAncestors(resolved.order, resolved.predecessors);

    for (const id of resolved.order) {
      const step = resolved.steps.get(id);
      const upstream = ancestors.get(id);
      if (!step || !upstream) continue;

      for (const binding of step.inputs) {
        const source = binding.source;
        if (source.kind !== 'step' || !resolved.steps.has(source.stepId)) continue;
        if (!upstream.has(source.stepId) || source.stepId === id) {
          issues.push(GraphError.bindingNotUpstream(id, binding.key, source.stepId));
        }
      }
    }

    const analysis = summarize(issues);
    if (analysis.errors.length > 0 || entry === undefined) {
      return analysis;
    }

    const graph: ExecutionGraph = Object.freeze({
      workflow: spec,
      entry,
      order: resolved.order,
      steps: resolved.steps,
      successors: resolved.successors,
      predecessors: resolved.predecessors,
      ancestors,
      declarationIndex: resolved.declarationIndex,
    });

    return { ...analysis, graph };
  }

  /**
   * @throws GraphError - the first error-severity issue
   */
  static build(spec: WorkflowSpec): ExecutionGraph {
    const analysis = this.analyze(spec);
    const [firstError] = analysis.errors;
    if (firstError) {
      throw firstError;
    }
    if (!analysis.graph) {
      throw GraphError.noEntry(spec.name);
    }
    return analysis.graph;
  }
}

function summarize(issues: GraphError[]): GraphAnalysis {
  return {
    issues,
    errors: issues.filter((issue) => issue.isFatal),
    warnings: issues.filter((issue) => !issue.isFatal),
  };
}
