/**
 * Base Formatter Interface
 *
 * All formatters must implement this interface.
 * Formatters are the ONLY place where console output is allowed in the CLI.
 *
 * Flow:
 * 1. Engine emits events during workflow execution
 * 2. The run command subscribes `formatter.onEvent()` to every event
 * 3. The formatter decides what to print and how
 *
 * Engine logs go to stderr through the engine's own logger and never
 * pass through a formatter.
 */

import type {
  AnyEngineEvent,
  ExecutionPlan,
  ValidationReport,
  WorkflowResult,
  WorkflowSummary,
} from '@leadflow/engine';

/**
 * Formatter options
 */
export interface FormatterOptions {
  /** Enable verbose output (step outputs, hints, stack traces) */
  verbose?: boolean;

  /** Colour output; off for CI or when piping */
  color?: boolean;

  /** Minimal output: only errors and the final result */
  silent?: boolean;
}

export interface Formatter {
  /**
   * Handle one engine event (workflow and step lifecycle)
   */
  onEvent(event: AnyEngineEvent): void;

  /**
   * Display the final workflow result, once per run
   */
  showResult(result: WorkflowResult): void;

  /**
   * Display the outcome of `validate`
   */
  showValidation(summary: WorkflowSummary, report: ValidationReport): void;

  /**
   * Display the outcome of `explain`
   */
  showPlan(summary: WorkflowSummary, plan: ExecutionPlan): void;

  /**
   * Display a CLI-level error: file not found, invalid document,
   * rejected graph, handler module that failed to load
   */
  showError(error: unknown): void;

  showWarning(message: string): void;

  showInfo(message: string): void;
}
