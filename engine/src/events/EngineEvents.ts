/**
 * Engine Events
 *
 * Emitted by the executor at each lifecycle moment of a run. Consumed by
 * the CLI formatters, the test harness and any caller-supplied sink
 * (reporting, persistence).
 */

import type {
  FailedStepResult,
  SkippedStepResult,
  SucceededStepResult,
  WorkflowResult,
} from '../types/core-types.js';

export enum EngineEventType {
  WORKFLOW_STARTED = 'workflow.started',
  WORKFLOW_COMPLETED = 'workflow.completed',
  WORKFLOW_CANCELLED = 'workflow.cancelled',

  STEP_STARTED = 'step.started',
  STEP_COMPLETED = 'step.completed',
  STEP_FAILED = 'step.failed',
  STEP_SKIPPED = 'step.skipped',
}

export interface WorkflowStartedPayload {
  workflowVersion: string;
  entry: string;
  totalSteps: number;
  concurrency: number;
  /** Steps already recorded in a resumed state */
  resumedSteps: readonly string[];
}

export interface WorkflowCompletedPayload {
  result: WorkflowResult;
}

export interface WorkflowCancelledPayload {
  /** Steps still running when cancellation was observed */
  inFlight: readonly string[];
}

export interface StepStartedPayload {
  handler: string;
  absentInputs: readonly string[];
}

export interface StepCompletedPayload {
  result: SucceededStepResult;
}

export interface StepFailedPayload {
  result: FailedStepResult;
}

export interface StepSkippedPayload {
  result: SkippedStepResult;
}

export interface EngineEventPayloads {
  [EngineEventType.WORKFLOW_STARTED]: WorkflowStartedPayload;
  [EngineEventType.WORKFLOW_COMPLETED]: WorkflowCompletedPayload;
  [EngineEventType.WORKFLOW_CANCELLED]: WorkflowCancelledPayload;
  [EngineEventType.STEP_STARTED]: StepStartedPayload;
  [EngineEventType.STEP_COMPLETED]: StepCompletedPayload;
  [EngineEventType.STEP_FAILED]: StepFailedPayload;
  [EngineEventType.STEP_SKIPPED]: StepSkippedPayload;
}

export interface EngineEvent<T extends EngineEventType = EngineEventType> {
  type: T;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  runId: string;
  workflowName: string;
  stepId?: string;
  payload: EngineEventPayloads[T];
}

/**
 * Union of every concrete event, narrowable on `type`
 */
export type AnyEngineEvent = { [K in EngineEventType]: EngineEvent<K> }[EngineEventType];

export interface EventMeta {
  runId: string;
  workflowName: string;
  stepId?: string;
}

export function createEvent<T extends EngineEventType>(
  type: T,
  meta: EventMeta,
  payload: EngineEventPayloads[T],
): EngineEvent<T> {
  return {
    type,
    timestamp: Date.now(),
    runId: meta.runId,
    workflowName: meta.workflowName,
    stepId: meta.stepId,
    payload,
  };
}

export function isEventOfType<T extends EngineEventType>(
  event: AnyEngineEvent,
  type: T,
): event is Extract<AnyEngineEvent, { type: T }> {
  return event.type === type;
}
