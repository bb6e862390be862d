/**
 * Graph Errors
 *
 * Structural problems found while building the execution graph. Error
 * severity blocks the run; warning severity is reported by `analyze()`
 * and the `validate` command but never prevents execution.
 *
 * @module errors
 */

import { EngineError, type EngineErrorDiagnostic } from './EngineError.js';
import { ErrorCode, ErrorSeverity } from './ErrorCodes.js';

export type GraphErrorKind =
  | 'EmptyWorkflow'
  | 'DuplicateStep'
  | 'UnknownStep'
  | 'CycleDetected'
  | 'NoEntry'
  | 'AmbiguousEntry'
  | 'UnreachableStep'
  | 'BindingNotUpstream';

export class GraphError extends EngineError {
  constructor(
    public readonly kind: GraphErrorKind,
    diagnostic: EngineErrorDiagnostic,
  ) {
    super(diagnostic);
  }

  static emptyWorkflow(workflowName: string): GraphError {
    return new GraphError('EmptyWorkflow', {
      code: ErrorCode.GRAPH_EMPTY_WORKFLOW,
      message: `Workflow "${workflowName}" declares no steps`,
      path: 'steps',
      hint: 'Add at least one step to the workflow.',
      severity: ErrorSeverity.ERROR,
      context: { workflowName },
    });
  }

  static duplicateStep(stepId: string, index: number): GraphError {
    return new GraphError('DuplicateStep', {
      code: ErrorCode.GRAPH_DUPLICATE_STEP,
      message: `Step id "${stepId}" is declared more than once`,
      path: `steps[${index}].id`,
      hint: 'Give every step a unique id.',
      severity: ErrorSeverity.ERROR,
      context: { stepId, index },
    });
  }

  /**
   * @param via - where the reference was found
   */
  static unknownStep(
    reference: string,
    fromStep: string,
    via: 'next' | 'inputs',
    suggestion?: string,
  ): GraphError {
    return new GraphError('UnknownStep', {
      code: ErrorCode.GRAPH_UNKNOWN_STEP,
      message: `Step "${fromStep}" references unknown step "${reference}" in ${via}`,
      path: `steps.${fromStep}.${via}`,
      hint: suggestion
        ? `Did you mean "${suggestion}"?`
        : 'Check the step id for typos or declare the missing step.',
      severity: ErrorSeverity.ERROR,
      context: { reference, fromStep, via, suggestion },
    });
  }

  /**
   * @param cycle - step ids along the cycle, first id repeated at the end
   */
  static cycleDetected(cycle: readonly string[]): GraphError {
    return new GraphError('CycleDetected', {
      code: ErrorCode.GRAPH_CYCLE_DETECTED,
      message: `Cycle detected: ${cycle.join(' -> ')}`,
      path: 'steps',
      hint: 'Remove one of the "next" edges along the cycle.',
      severity: ErrorSeverity.ERROR,
      context: { cycle: [...cycle] },
    });
  }

  static noEntry(workflowName: string): GraphError {
    return new GraphError('NoEntry', {
      code: ErrorCode.GRAPH_NO_ENTRY,
      message: `Workflow "${workflowName}" has no entry step: every step has a predecessor`,
      path: 'steps',
      hint: 'Exactly one step must not appear in any other step\'s "next" list.',
      severity: ErrorSeverity.ERROR,
      context: { workflowName },
    });
  }

  static ambiguousEntry(candidates: readonly string[]): GraphError {
    return new GraphError('AmbiguousEntry', {
      code: ErrorCode.GRAPH_AMBIGUOUS_ENTRY,
      message: `Workflow has ${candidates.length} entry candidates: ${candidates.join(', ')}`,
      path: 'steps',
      hint: 'Link the extra candidates from another step, or remove them.',
      severity: ErrorSeverity.ERROR,
      context: { candidates: [...candidates] },
    });
  }

  static unreachableStep(stepId: string, entry: string): GraphError {
    return new GraphError('UnreachableStep', {
      code: ErrorCode.GRAPH_UNREACHABLE_STEP,
      message: `Step "${stepId}" is not reachable from entry step "${entry}"`,
      path: `steps.${stepId}`,
      severity: ErrorSeverity.WARNING,
      context: { stepId, entry },
    });
  }

  static bindingNotUpstream(stepId: string, inputKey: string, reference: string): GraphError {
    return new GraphError('BindingNotUpstream', {
      code: ErrorCode.GRAPH_BINDING_NOT_UPSTREAM,
      message: `Input "${inputKey}" of step "${stepId}" binds to "${reference}", which does not precede it`,
      path: `steps.${stepId}.inputs.${inputKey}`,
      hint: `The value will always be absent. Add a path from "${reference}" to "${stepId}" through "next".`,
      severity: ErrorSeverity.WARNING,
      context: { stepId, inputKey, reference },
    });
  }
}
