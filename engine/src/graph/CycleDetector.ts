/**
 * CycleDetector
 *
 * Detects cycles in the successor relation using depth-first search.
 * This is about VALIDATION: fail fast with the offending path.
 *
 * Algorithm: DFS with three-colour marking
 * - WHITE: not yet explored
 * - GRAY: on the current DFS path
 * - BLACK: fully explored
 *
 * Reaching a GRAY node closes a cycle. A step listing itself in `next`
 * is a cycle of length one.
 */

export enum VisitState {
  WHITE = 'white',
  GRAY = 'gray',
  BLACK = 'black',
}

export interface CycleDetectionResult {
  readonly hasCycle: boolean;
  /** Step ids along the cycle, first id repeated at the end */
  readonly cyclePath?: readonly string[];
}

export class CycleDetector {
  /**
   * Start nodes are tried in the order given, so results are stable
   * for a given declaration order.
   */
  static detect(
    order: readonly string[],
    successors: ReadonlyMap<string, readonly string[]>,
  ): CycleDetectionResult {
    const visitState = new Map<string, VisitState>();
    const parent = new Map<string, string>();

    for (const stepId of order) {
      visitState.set(stepId, VisitState.WHITE);
    }

    for (const stepId of order) {
      if (visitState.get(stepId) === VisitState.WHITE) {
        const result = this.dfs(stepId, successors, visitState, parent);
        if (result.hasCycle) {
          return result;
        }
      }
    }

    return { hasCycle: false };
  }

  private static dfs(
    nodeId: string,
    successors: ReadonlyMap<string, readonly string[]>,
    visitState: Map<string, VisitState>,
    parent: Map<string, string>,
  ): CycleDetectionResult {
    visitState.set(nodeId, VisitState.GRAY);

    for (const next of successors.get(nodeId) ?? []) {
      const state = visitState.get(next);

      if (state === VisitState.GRAY) {
        const cyclePath = this.reconstructCycle(nodeId, next, parent);
        return { hasCycle: true, cyclePath: Object.freeze([...cyclePath, next]) };
      }

      if (state === VisitState.WHITE) {
        parent.set(next, nodeId);
        const result = this.dfs(next, successors, visitState, parent);
        if (result.hasCycle) {
          return result;
        }
      }
    }

    visitState.set(nodeId, VisitState.BLACK);
    return { hasCycle: false };
  }

  /**
   * Walk parent pointers back from `start` to the GRAY node that closed
   * the cycle.
   */
  private static reconstructCycle(
    start: string,
    cycleNode: string,
    parent: ReadonlyMap<string, string>,
  ): string[] {
    const cycle: string[] = [start];
    let current = start;

    while (current !== cycleNode) {
      const parentNode = parent.get(current);
      if (parentNode === undefined) break;
      cycle.unshift(parentNode);
      current = parentNode;
    }

    return cycle;
  }
}
