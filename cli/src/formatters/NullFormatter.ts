/**
 * Null Formatter
 *
 * Produces no output. Useful for:
 * - Scripting (only the exit code matters)
 * - Background jobs
 * - CI pipelines where engine logs are captured elsewhere
 */

import type {
  AnyEngineEvent,
  ExecutionPlan,
  ValidationReport,
  WorkflowResult,
  WorkflowSummary,
} from '@leadflow/engine';
import type { Formatter } from './Formatter.js';

export class NullFormatter implements Formatter {
  onEvent(_event: AnyEngineEvent): void {}

  showResult(_result: WorkflowResult): void {}

  showValidation(_summary: WorkflowSummary, _report: ValidationReport): void {}

  showPlan(_summary: WorkflowSummary, _plan: ExecutionPlan): void {}

  showError(_error: unknown): void {}

  showWarning(_message: string): void {}

  showInfo(_message: string): void {}
}
