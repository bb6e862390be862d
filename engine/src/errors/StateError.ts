import { EngineError } from './EngineError.js';
import { ErrorCode, ErrorSeverity } from './ErrorCodes.js';

/**
 * Raised when the append-only execution state is written incorrectly.
 * Always indicates an engine bug or a misused pre-populated state.
 */
export class StateError extends EngineError {
  static duplicateResult(stepId: string, runId: string): StateError {
    return new StateError({
      code: ErrorCode.STATE_DUPLICATE_RESULT,
      message: `A result for step "${stepId}" is already recorded in run ${runId}`,
      severity: ErrorSeverity.ERROR,
      context: { stepId, runId },
    });
  }

  static unknownStep(stepId: string, workflowName: string): StateError {
    return new StateError({
      code: ErrorCode.STATE_UNKNOWN_STEP,
      message: `Step "${stepId}" is not part of workflow "${workflowName}"`,
      severity: ErrorSeverity.ERROR,
      context: { stepId, workflowName },
    });
  }

  static alreadyCompleted(runId: string): StateError {
    return new StateError({
      code: ErrorCode.STATE_ALREADY_COMPLETED,
      message: `Run ${runId} has already completed; create a new state to run again`,
      severity: ErrorSeverity.ERROR,
      context: { runId },
    });
  }

  static workflowMismatch(runId: string, stateWorkflow: string, workflowName: string): StateError {
    return new StateError({
      code: ErrorCode.STATE_WORKFLOW_MISMATCH,
      message: `Run ${runId} was recorded for workflow "${stateWorkflow}" and cannot resume "${workflowName}"`,
      hint: 'Resume with a state created from the same workflow definition.',
      severity: ErrorSeverity.ERROR,
      context: { runId, stateWorkflow, workflowName },
    });
  }
}
