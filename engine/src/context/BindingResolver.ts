/**
 * Binding Resolution
 *
 * Turns a step's declared input bindings into concrete values, reading
 * upstream outputs from the execution state and paths from the workflow
 * config. Resolution never throws: anything that cannot be resolved
 * degrades to the absent marker (`null`, key listed in `absent`).
 *
 * A step reference resolves only when the referenced step
 * - is an ancestor of the reading step in the graph,
 * - has a recorded `succeeded` result,
 * - and (for keyed references) has the key in its output.
 *
 * @module context
 */

import type { BindingSource, StepSpec, WorkflowConfig } from '../types/core-types.js';
import type { ExecutionGraph } from '../graph/ExecutionGraph.js';
import type { ExecutionState } from '../state/ExecutionState.js';
import type { ResolvedInput } from '../handlers/Handler.js';

type Lookup = { found: true; value: unknown } | { found: false };

const ABSENT: Lookup = { found: false };

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class BindingResolver {
  static resolve(step: StepSpec, graph: ExecutionGraph, state: ExecutionState): ResolvedInput {
    const values: Record<string, unknown> = {};
    const absent = new Set<string>();

    for (const binding of step.inputs) {
      const lookup = this.lookup(binding.source, step.id, graph, state);
      if (lookup.found) {
        values[binding.key] = lookup.value;
        absent.delete(binding.key);
      } else {
        values[binding.key] = null;
        absent.add(binding.key);
      }
    }

    return Object.freeze({ values: Object.freeze(values), absent: Object.freeze([...absent]) });
  }

  private static lookup(
    source: BindingSource,
    readerId: string,
    graph: ExecutionGraph,
    state: ExecutionState,
  ): Lookup {
    switch (source.kind) {
      case 'literal':
        return { found: true, value: source.value };

      case 'step': {
        if (!graph.ancestors.get(readerId)?.has(source.stepId)) {
          return ABSENT;
        }
        const result = state.get(source.stepId);
        if (!result || result.status !== 'succeeded') {
          return ABSENT;
        }
        if (source.outputKey === undefined) {
          return { found: true, value: result.output };
        }
        const value = Object.hasOwn(result.output, source.outputKey)
          ? result.output[source.outputKey]
          : undefined;
        return value === undefined ? ABSENT : { found: true, value };
      }

      case 'config': {
        const lookup = readPath(graph.workflow.config, source.path);
        if (lookup.found || source.fallback === undefined) {
          return lookup;
        }
        return { found: true, value: source.fallback };
      }
    }
  }
}

/**
 * Follow `path` through nested objects of the workflow config
 */
export function readPath(config: WorkflowConfig, path: readonly string[]): Lookup {
  let current: unknown = config;

  for (const segment of path) {
    if (!isPlainObject(current) || !Object.hasOwn(current, segment)) {
      return ABSENT;
    }
    current = current[segment];
  }

  return current === undefined ? ABSENT : { found: true, value: current };
}
