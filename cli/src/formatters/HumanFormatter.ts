/**
 * Human-Readable Formatter
 *
 * Formats workflow execution for human consumption.
 * Uses symbols and colors for clear, scannable output.
 *
 * Symbols:
 * - ▶ Workflow started
 * - ● Step running
 * - ✔ Success
 * - ✖ Failure
 * - ⊘ Skipped
 * - ⚠ Partial or cancelled
 */

import { Chalk, type ChalkInstance } from 'chalk';
import {
  EngineEventType,
  describeThrown,
  formatError,
  formatErrors,
  isEngineError,
  type AnyEngineEvent,
  type ExecutionPlan,
  type ValidationReport,
  type WorkflowResult,
  type WorkflowSummary,
} from '@leadflow/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';
import { StatusSymbols, divider, formatDuration, plural } from '../utils/format.js';

export class HumanFormatter implements Formatter {
  private readonly options: FormatterOptions;
  private readonly c: ChalkInstance;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
    this.c = options.color === false ? new Chalk({ level: 0 }) : new Chalk();
  }

  onEvent(event: AnyEngineEvent): void {
    if (this.options.silent) {
      return;
    }

    const c = this.c;
    switch (event.type) {
      case EngineEventType.WORKFLOW_STARTED: {
        const { totalSteps, concurrency, resumedSteps } = event.payload;
        const details = [plural(totalSteps, 'step'), `concurrency ${concurrency}`];
        if (resumedSteps.length > 0) {
          details.push(`${resumedSteps.length} already recorded`);
        }
        this.print();
        this.print(c.cyan(divider(60, '━')));
        this.print(c.bold(`${StatusSymbols.started} ${event.workflowName}`));
        this.print(c.dim(`   ${details.join(', ')}`));
        this.print(c.cyan(divider(60, '━')));
        this.print();
        break;
      }

      case EngineEventType.STEP_STARTED:
        this.print(`${c.blue(StatusSymbols.running)} ${event.stepId ?? ''} ${c.dim(`(${event.payload.handler})`)}`);
        if (this.options.verbose && event.payload.absentInputs.length > 0) {
          this.print(c.yellow(`    absent inputs: ${event.payload.absentInputs.join(', ')}`));
        }
        break;

      case EngineEventType.STEP_COMPLETED: {
        const { result } = event.payload;
        this.print(`  ${c.green(StatusSymbols.success)} ${c.dim(`${result.stepId} completed in ${formatDuration(result.duration)}`)}`);
        if (this.options.verbose) {
          this.printBlock('Output:', JSON.stringify(result.output, null, 2));
        }
        break;
      }

      case EngineEventType.STEP_FAILED: {
        const { result } = event.payload;
        this.print(`  ${c.red(StatusSymbols.failure)} ${c.red(`${result.stepId} failed in ${formatDuration(result.duration)}`)}`);
        this.print(`    ${c.red('Error:')} ${result.error.message} ${c.gray(`[${result.error.code}]`)}`);
        break;
      }

      case EngineEventType.STEP_SKIPPED:
        this.print(`  ${c.gray(`${StatusSymbols.skipped} ${event.payload.result.stepId} skipped: ${event.payload.result.reason}`)}`);
        break;

      case EngineEventType.WORKFLOW_CANCELLED: {
        const running = event.payload.inFlight;
        const waiting = running.length > 0 ? `; waiting for ${running.join(', ')}` : '';
        this.print(c.yellow(`${StatusSymbols.warning} Cancellation requested${waiting}`));
        break;
      }

      case EngineEventType.WORKFLOW_COMPLETED:
        // The full result is shown by showResult()
        break;
    }
  }

  showResult(result: WorkflowResult): void {
    const c = this.c;

    this.print();
    this.print(c.cyan(divider(60, '═')));
    switch (result.status) {
      case 'succeeded':
        this.print(c.green.bold(`${StatusSymbols.success} Workflow completed successfully`));
        break;
      case 'partial':
        this.print(c.yellow.bold(`${StatusSymbols.warning} Workflow completed with failures`));
        break;
      case 'cancelled':
        this.print(c.yellow.bold(`${StatusSymbols.warning} Workflow cancelled`));
        break;
      case 'failed':
        this.print(c.red.bold(`${StatusSymbols.failure} Workflow failed`));
        break;
    }
    this.print(c.cyan(divider(60, '═')));
    this.print();

    const { metadata } = result;
    this.print(c.bold('Summary:'));
    this.print(`  Total steps: ${metadata.totalSteps}`);
    this.print(`  Succeeded:   ${c.green(String(metadata.succeededSteps))}`);
    if (metadata.failedSteps > 0) {
      this.print(`  Failed:      ${c.red(String(metadata.failedSteps))}`);
    }
    if (metadata.skippedSteps > 0) {
      this.print(`  Skipped:     ${c.dim(String(metadata.skippedSteps))}`);
    }
    this.print(`  Duration:    ${formatDuration(result.duration)}`);
    this.print(`  Run id:      ${c.dim(result.runId)}`);

    if (this.options.verbose) {
      this.print();
      this.print(c.bold('Step Details:'));
      for (const step of result.steps) {
        switch (step.status) {
          case 'succeeded':
            this.print(`  ${c.green(StatusSymbols.success)} ${step.stepId} ${c.dim(formatDuration(step.duration))}`);
            break;
          case 'failed':
            this.print(`  ${c.red(StatusSymbols.failure)} ${step.stepId} ${c.dim(formatDuration(step.duration))}`);
            this.print(c.red(`      ${step.error.name}: ${step.error.message}`));
            break;
          case 'skipped':
            this.print(`  ${c.gray(StatusSymbols.skipped)} ${step.stepId} ${c.dim(step.reason)}`);
            break;
        }
      }
    }

    this.print();
  }

  showValidation(summary: WorkflowSummary, report: ValidationReport): void {
    const c = this.c;
    const options = { colors: this.options.color !== false, verbose: this.options.verbose };

    if (report.valid) {
      this.print(c.green(`${StatusSymbols.success} Workflow "${summary.name}" is valid (${plural(summary.totalSteps, 'step')})`));
    } else {
      this.print(c.red(`${StatusSymbols.failure} Workflow "${summary.name}" is invalid`));
    }

    const diagnostics = [...report.errors, ...report.warnings];
    if (diagnostics.length > 0) {
      this.print();
      this.print(formatErrors(diagnostics, options));
    }

    if (this.options.verbose && !this.options.silent) {
      this.print();
      this.printSteps(summary);
    }
  }

  showPlan(summary: WorkflowSummary, plan: ExecutionPlan): void {
    const c = this.c;

    this.print(c.cyan(divider(60, '━')));
    this.print(c.bold(`${StatusSymbols.started} Workflow: ${summary.name} ${c.gray(`v${summary.version}`)}`));
    if (summary.description) {
      this.print(c.italic(`  ${summary.description}`));
    }
    this.print(`${StatusSymbols.started} Entry: ${c.yellow(plan.entry)}`);
    this.print(`${StatusSymbols.started} Steps: ${summary.totalSteps}`);
    this.print(c.cyan(divider(60, '━')));
    this.print();

    this.print(c.bold('Execution phases:'));
    plan.phases.forEach((phase, index) => {
      this.print(`  Phase ${index + 1}: ${phase.join(', ')}`);
    });
    this.print();
    this.print(`${c.bold('Order:')} ${plan.order.join(` ${StatusSymbols.arrow} `)}`);

    if (this.options.verbose) {
      this.print();
      this.printSteps(summary);
    }
  }

  showError(error: unknown): void {
    const c = this.c;

    if (isEngineError(error)) {
      console.error(formatError(error, { colors: this.options.color !== false, verbose: this.options.verbose }));
      return;
    }

    console.error(`${c.red.bold(`${StatusSymbols.failure} Error:`)} ${describeThrown(error).message}`);
    if (this.options.verbose && error instanceof Error && error.stack) {
      console.error(c.gray(error.stack));
    }
  }

  showWarning(message: string): void {
    if (!this.options.silent) {
      console.warn(`${this.c.yellow(StatusSymbols.warning)} ${message}`);
    }
  }

  showInfo(message: string): void {
    if (!this.options.silent) {
      this.print(`${this.c.blue(StatusSymbols.info)} ${message}`);
    }
  }

  private printSteps(summary: WorkflowSummary): void {
    const c = this.c;
    this.print(c.bold('Steps:'));
    summary.steps.forEach((step, index) => {
      const next = step.next.length > 0 ? ` ${StatusSymbols.arrow} ${step.next.join(', ')}` : '';
      this.print(`  ${index + 1}. ${step.id} ${c.dim(`(${step.handler})`)}${next}`);
    });
  }

  private printBlock(title: string, text: string): void {
    this.print(this.c.dim(`    ${title}`));
    for (const line of text.split('\n')) {
      this.print(this.c.dim(`      ${line}`));
    }
  }

  private print(line = ''): void {
    console.log(line);
  }
}
