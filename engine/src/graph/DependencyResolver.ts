/**
 * DependencyResolver
 *
 * Builds successor and predecessor adjacency from the `next` lists of a
 * workflow's steps. This is pure analysis: no ordering, no execution.
 *
 * Responsibilities:
 * 1. Index steps by id (duplicate ids are reported, the first one wins)
 * 2. Validate every successor and binding reference
 * 3. Build both adjacency directions in declaration order
 *
 * Unknown references are reported and their edges dropped, so the
 * remaining analysis can still run and report everything at once.
 */

import type { StepSpec, WorkflowSpec } from '../types/core-types.js';
import { GraphError } from '../errors/GraphError.js';
import { suggestClosest } from '../errors/Suggestions.js';

export interface ResolvedDependencies {
  readonly order: readonly string[];
  readonly steps: ReadonlyMap<string, StepSpec>;
  readonly declarationIndex: ReadonlyMap<string, number>;
  readonly successors: ReadonlyMap<string, readonly string[]>;
  readonly predecessors: ReadonlyMap<string, readonly string[]>;
  readonly issues: readonly GraphError[];
}

export class DependencyResolver {
  static resolve(spec: WorkflowSpec): ResolvedDependencies {
    const issues: GraphError[] = [];
    const steps = new Map<string, StepSpec>();
    const declarationIndex = new Map<string, number>();
    const order: string[] = [];

    if (spec.steps.length === 0) {
      issues.push(GraphError.emptyWorkflow(spec.name));
    }

    spec.steps.forEach((step, index) => {
      if (steps.has(step.id)) {
        issues.push(GraphError.duplicateStep(step.id, index));
        return;
      }
      steps.set(step.id, step);
      declarationIndex.set(step.id, index);
      order.push(step.id);
    });

    const successors = new Map<string, string[]>();
    const predecessors = new Map<string, string[]>();
    for (const id of order) {
      successors.set(id, []);
      predecessors.set(id, []);
    }

    for (const id of order) {
      const step = steps.get(id);
      const outgoing = successors.get(id);
      if (!step || !outgoing) continue;

      for (const target of step.next) {
        if (!steps.has(target)) {
          issues.push(GraphError.unknownStep(target, id, 'next', suggestClosest(target, order)));
          continue;
        }
        if (outgoing.includes(target)) continue;

        outgoing.push(target);
        predecessors.get(target)?.push(id);
      }

      for (const binding of step.inputs) {
        if (binding.source.kind !== 'step') continue;
        const reference = binding.source.stepId;
        if (!steps.has(reference)) {
          issues.push(GraphError.unknownStep(reference, id, 'inputs', suggestClosest(reference, order)));
        }
      }
    }

    // Predecessor lists follow declaration order of the predecessor,
    // which is the order the loop above visits them in.
    return {
      order: Object.freeze(order),
      steps,
      declarationIndex,
      successors: freezeLists(successors),
      predecessors: freezeLists(predecessors),
      issues,
    };
  }

  /**
   * Steps with no predecessors, in declaration order
   */
  static findEntryCandidates(
    order: readonly string[],
    predecessors: ReadonlyMap<string, readonly string[]>,
  ): string[] {
    return order.filter((id) => (predecessors.get(id)?.length ?? 0) === 0);
  }

  /**
   * Every step reachable from `start` by following successors
   */
  static reachableFrom(
    start: string,
    successors: ReadonlyMap<string, readonly string[]>,
  ): Set<string> {
    const seen = new Set<string>([start]);
    const queue = [start];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const next of successors.get(current) ?? []) {
        if (!seen.has(next)) {
          seen.add(next);
          queue.push(next);
        }
      }
    }

    return seen;
  }

  /**
   * Transitive predecessors of every step. Terminates on cyclic input.
   */
  static computeAncestors(
    order: readonly string[],
    predecessors: ReadonlyMap<string, readonly string[]>,
  ): Map<string, ReadonlySet<string>> {
    const ancestors = new Map<string, ReadonlySet<string>>();

    for (const id of order) {
      const found = new Set<string>();
      const stack = [...(predecessors.get(id) ?? [])];
      while (stack.length > 0) {
        const current = stack.pop();
        if (current === undefined || found.has(current)) continue;
        found.add(current);
        stack.push(...(predecessors.get(current) ?? []));
      }
      ancestors.set(id, found);
    }

    return ancestors;
  }
}

function freezeLists(lists: Map<string, string[]>): Map<string, readonly string[]> {
  const frozen = new Map<string, readonly string[]>();
  for (const [id, list] of lists) {
    frozen.set(id, Object.freeze([...list]));
  }
  return frozen;
}
