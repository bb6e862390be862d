/**
 * TopologicalSorter
 *
 * Kahn's algorithm over a built ExecutionGraph. Groups steps into phases:
 * every step in a phase depends only on steps of earlier phases, so the
 * steps of one phase could run side by side.
 *
 * Result for a fan-out/fan-in graph:
 *   [['search'], ['enrich', 'score'], ['compose']]
 *
 * Within a phase, steps keep declaration order.
 */

import type { ExecutionGraph } from './ExecutionGraph.js';

export interface TopologicalSortResult {
  readonly phases: readonly (readonly string[])[];

  /** Phases flattened */
  readonly order: readonly string[];

  /** stepId → phase number (0-indexed) */
  readonly stepPhases: ReadonlyMap<string, number>;
}

export class TopologicalSorter {
  static sort(graph: ExecutionGraph): TopologicalSortResult {
    const inDegrees = new Map<string, number>();
    for (const id of graph.order) {
      inDegrees.set(id, graph.predecessors.get(id)?.length ?? 0);
    }

    const phases: (readonly string[])[] = [];
    const stepPhases = new Map<string, number>();
    let current = graph.order.filter((id) => inDegrees.get(id) === 0);

    while (current.length > 0) {
      const phaseIndex = phases.length;
      phases.push(Object.freeze([...current]));

      const next = new Set<string>();
      for (const stepId of current) {
        stepPhases.set(stepId, phaseIndex);
        for (const successor of graph.successors.get(stepId) ?? []) {
          const remaining = (inDegrees.get(successor) ?? 0) - 1;
          inDegrees.set(successor, remaining);
          if (remaining === 0) next.add(successor);
        }
      }

      current = graph.order.filter((id) => next.has(id));
    }

    return {
      phases: Object.freeze(phases),
      order: Object.freeze(phases.flat()),
      stepPhases,
    };
  }
}
