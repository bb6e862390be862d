/**
 * Execution State
 *
 * Append-only store of step results for one run. The executor is its
 * only writer; every result is frozen when recorded and can never be
 * replaced. Outputs are frozen in depth (nested arrays and plain
 * objects), so a downstream handler cannot rewrite what it was given.
 *
 * A state that already holds results can be handed to a new execution:
 * the recorded steps count as terminal and are not run again.
 *
 * @module state
 */

import type { StepResult, WorkflowSpec, WorkflowStatus } from '../types/core-types.js';
import { StateError } from '../errors/StateError.js';

export type RunStatus = 'running' | WorkflowStatus;

export class ExecutionState {
  public readonly startedAt: Date;
  private finished: Date | undefined;
  private currentStatus: RunStatus = 'running';

  private readonly stepIds: readonly string[];
  private readonly entries = new Map<string, StepResult>();

  constructor(
    public readonly runId: string,
    private readonly workflow: WorkflowSpec,
  ) {
    this.startedAt = new Date();
    this.stepIds = workflow.steps.map((step) => step.id);
  }

  get workflowName(): string {
    return this.workflow.name;
  }

  get status(): RunStatus {
    return this.currentStatus;
  }

  get finishedAt(): Date | undefined {
    return this.finished;
  }

  get isComplete(): boolean {
    return this.currentStatus !== 'running';
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * True when this state was created for a workflow with the same name
   * and the same step ids
   */
  belongsTo(workflow: WorkflowSpec): boolean {
    const ids = new Set(workflow.steps.map((step) => step.id));
    return (
      workflow.name === this.workflow.name &&
      ids.size === this.stepIds.length &&
      this.stepIds.every((id) => ids.has(id))
    );
  }

  /**
   * Write the single result of a step
   *
   * @throws {StateError} duplicate result, unknown step, or completed run
   */
  record(result: StepResult): StepResult {
    if (this.isComplete) {
      throw StateError.alreadyCompleted(this.runId);
    }
    if (!this.stepIds.includes(result.stepId)) {
      throw StateError.unknownStep(result.stepId, this.workflow.name);
    }
    if (this.entries.has(result.stepId)) {
      throw StateError.duplicateResult(result.stepId, this.runId);
    }

    if (result.status === 'succeeded') {
      freezeDeep(result.output);
    }
    Object.freeze(result.absentInputs);
    const frozen = Object.freeze(result);
    this.entries.set(result.stepId, frozen);
    return frozen;
  }

  get(stepId: string): StepResult | undefined {
    return this.entries.get(stepId);
  }

  has(stepId: string): boolean {
    return this.entries.has(stepId);
  }

  /**
   * Results in the order they were recorded
   */
  results(): StepResult[] {
    return Array.from(this.entries.values());
  }

  /**
   * Recorded results in declaration order
   */
  snapshot(): StepResult[] {
    return this.stepIds
      .map((id) => this.entries.get(id))
      .filter((result): result is StepResult => result !== undefined);
  }

  /**
   * Close the run. No result can be recorded afterwards.
   */
  complete(status: WorkflowStatus): void {
    if (this.isComplete) {
      throw StateError.alreadyCompleted(this.runId);
    }
    this.currentStatus = status;
    this.finished = new Date();
  }
}

function freezeDeep(value: unknown, seen = new WeakSet<object>()): void {
  if (typeof value !== 'object' || value === null || seen.has(value)) {
    return;
  }
  seen.add(value);

  if (Array.isArray(value)) {
    Object.freeze(value);
    value.forEach((item) => freezeDeep(item, seen));
    return;
  }

  // Class instances (Date, Map, buffers) keep their own semantics
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) {
    return;
  }

  Object.freeze(value);
  Object.values(value).forEach((item) => freezeDeep(item, seen));
}
