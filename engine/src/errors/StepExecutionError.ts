/**
 * Step Execution Error
 *
 * Describes why a single step failed. These errors are never thrown out
 * of the executor: they are converted into a `failed` StepResult so the
 * rest of the graph keeps running.
 *
 * @module errors
 */

import { EngineError, describeThrown, type EngineErrorDiagnostic } from './EngineError.js';
import { ErrorCode, ErrorSeverity } from './ErrorCodes.js';
import type { StepFailure } from '../types/core-types.js';

export type StepExecutionErrorKind =
  | 'HandlerFailed'
  | 'InvalidOutput'
  | 'MissingOutputKeys'
  | 'Timeout'
  | 'HandlerInitFailed';

export class StepExecutionError extends EngineError {
  constructor(
    public readonly kind: StepExecutionErrorKind,
    public readonly stepId: string,
    diagnostic: EngineErrorDiagnostic,
  ) {
    super(diagnostic);
  }

  static handlerFailed(stepId: string, cause: unknown): StepExecutionError {
    const thrown = describeThrown(cause);
    return new StepExecutionError('HandlerFailed', stepId, {
      code: ErrorCode.EXECUTION_HANDLER_FAILED,
      message: thrown.message,
      path: `steps.${stepId}`,
      severity: ErrorSeverity.ERROR,
      context: { stepId, causeName: thrown.name },
    });
  }

  static invalidOutput(stepId: string, received: string): StepExecutionError {
    return new StepExecutionError('InvalidOutput', stepId, {
      code: ErrorCode.EXECUTION_INVALID_OUTPUT,
      message: `Handler returned ${received} instead of an output mapping`,
      path: `steps.${stepId}`,
      hint: 'Handlers must return a plain object of output keys.',
      severity: ErrorSeverity.ERROR,
      context: { stepId, received },
    });
  }

  static missingOutputKeys(stepId: string, missing: readonly string[]): StepExecutionError {
    return new StepExecutionError('MissingOutputKeys', stepId, {
      code: ErrorCode.EXECUTION_MISSING_OUTPUT_KEYS,
      message: `Output is missing required keys: ${missing.join(', ')}`,
      path: `steps.${stepId}.output_schema`,
      severity: ErrorSeverity.ERROR,
      context: { stepId, missing: [...missing] },
    });
  }

  static timeout(stepId: string, timeoutMs: number): StepExecutionError {
    return new StepExecutionError('Timeout', stepId, {
      code: ErrorCode.EXECUTION_TIMEOUT,
      message: `Step timed out after ${timeoutMs}ms`,
      path: `steps.${stepId}`,
      hint: 'Raise stepTimeoutMs or make the handler honour its abort signal.',
      severity: ErrorSeverity.ERROR,
      context: { stepId, timeoutMs },
    });
  }

  static handlerInitFailed(stepId: string, typeName: string, cause: unknown): StepExecutionError {
    const thrown = describeThrown(cause);
    return new StepExecutionError('HandlerInitFailed', stepId, {
      code: ErrorCode.EXECUTION_HANDLER_INIT_FAILED,
      message: `Could not create handler "${typeName}": ${thrown.message}`,
      path: `steps.${stepId}.handler`,
      severity: ErrorSeverity.ERROR,
      context: { stepId, typeName, causeName: thrown.name },
    });
  }

  /**
   * Serializable description stored on the StepResult
   */
  toFailure(): StepFailure {
    return { name: this.kind, code: this.code, message: this.message };
  }
}
