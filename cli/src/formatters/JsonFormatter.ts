/**
 * JSON Formatter
 *
 * Outputs structured JSON for:
 * - Machine parsing
 * - Log aggregation
 * - CI/CD integration
 *
 * Each event is a separate JSON line (NDJSON). The final result, the
 * validation report and the plan are single JSON documents.
 */

import {
  EngineEventType,
  describeThrown,
  isEngineError,
  type AnyEngineEvent,
  type ExecutionPlan,
  type ValidationReport,
  type WorkflowResult,
  type WorkflowSummary,
} from '@leadflow/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';

export class JsonFormatter implements Formatter {
  private readonly options: FormatterOptions;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
  }

  onEvent(event: AnyEngineEvent): void {
    if (this.options.silent) {
      return;
    }

    console.log(
      JSON.stringify({
        type: event.type,
        timestamp: new Date(event.timestamp).toISOString(),
        runId: event.runId,
        workflowName: event.workflowName,
        stepId: event.stepId,
        ...this.extractEventData(event),
      }),
    );
  }

  showResult(result: WorkflowResult): void {
    this.emit({ type: 'workflow.result', ...result });
  }

  showValidation(summary: WorkflowSummary, report: ValidationReport): void {
    this.emit({
      type: 'workflow.validation',
      workflowName: summary.name,
      version: summary.version,
      totalSteps: summary.totalSteps,
      valid: report.valid,
      errors: report.errors.map((error) => error.toJSON()),
      warnings: report.warnings.map((warning) => warning.toJSON()),
    });
  }

  showPlan(summary: WorkflowSummary, plan: ExecutionPlan): void {
    this.emit({
      type: 'workflow.plan',
      workflowName: summary.name,
      version: summary.version,
      entry: plan.entry,
      phases: plan.phases,
      order: plan.order,
      steps: summary.steps,
    });
  }

  showError(error: unknown): void {
    console.error(
      JSON.stringify({
        type: 'error',
        timestamp: new Date().toISOString(),
        error: isEngineError(error) ? error.toJSON() : describeThrown(error),
      }),
    );
  }

  showWarning(message: string): void {
    console.log(JSON.stringify({ type: 'warning', timestamp: new Date().toISOString(), message }));
  }

  showInfo(message: string): void {
    if (!this.options.silent) {
      console.log(JSON.stringify({ type: 'info', timestamp: new Date().toISOString(), message }));
    }
  }

  private emit(document: Record<string, unknown>): void {
    console.log(JSON.stringify(document, null, this.options.verbose ? 2 : undefined));
  }

  /**
   * Flatten the payload; step results lose their duplicated stepId
   */
  private extractEventData(event: AnyEngineEvent): Record<string, unknown> {
    switch (event.type) {
      case EngineEventType.WORKFLOW_STARTED:
      case EngineEventType.STEP_STARTED:
      case EngineEventType.WORKFLOW_CANCELLED:
        return { ...event.payload };

      case EngineEventType.STEP_COMPLETED: {
        const { status, handler, duration, output, absentInputs } = event.payload.result;
        return { status, handler, duration, absentInputs, output };
      }

      case EngineEventType.STEP_FAILED: {
        const { status, handler, duration, error, absentInputs } = event.payload.result;
        return { status, handler, duration, absentInputs, error };
      }

      case EngineEventType.STEP_SKIPPED: {
        const { status, handler, reason } = event.payload.result;
        return { status, handler, reason };
      }

      case EngineEventType.WORKFLOW_COMPLETED: {
        const { status, duration, cancelled, metadata } = event.payload.result;
        return { status, duration, cancelled, metadata };
      }
    }
  }
}
