/**
 * Workflow Executor
 *
 * Walks an ExecutionGraph in dependency order:
 * - a step becomes eligible once every predecessor has a recorded result
 * - newly eligible steps queue in the order their last predecessor
 *   finished, ties broken by declaration order
 * - up to `concurrency` eligible steps run at once
 * - a failed step never stops the walk; its dependents still run, with
 *   the bindings it would have supplied resolved as absent
 *
 * Cancellation stops dispatching. Steps already running finish and are
 * recorded; every step never dispatched is recorded as skipped.
 *
 * @module execution
 */

import { randomUUID } from 'node:crypto';
import type { StepResult, WorkflowResult, WorkflowStatus } from '../types/core-types.js';
import { requireStep, type ExecutionGraph } from '../graph/ExecutionGraph.js';
import type { HandlerRegistry } from '../handlers/HandlerRegistry.js';
import { ExecutionState } from '../state/ExecutionState.js';
import { StateError } from '../errors/StateError.js';
import { BindingResolver } from '../context/BindingResolver.js';
import { EventBus } from '../events/EventBus.js';
import { EngineEventType, createEvent, type EventMeta } from '../events/EngineEvents.js';
import { createSilentLogger, type EngineLogger } from '../logging/EngineLogger.js';
import { StepExecutor } from './StepExecutor.js';

export interface ExecuteOptions {
  /** Pre-populated state to resume; recorded steps are not run again */
  state?: ExecutionState;

  /** Ignored when `state` is given */
  runId?: string;

  signal?: AbortSignal;

  /** Maximum steps running at once (default: 1) */
  concurrency?: number;

  stepTimeoutMs?: number;
}

export interface WorkflowExecutorOptions {
  eventBus?: EventBus;
  logger?: EngineLogger;
}

export const CANCELLED_REASON = 'cancelled';
export const UNREACHED_REASON = 'not reached';

export class WorkflowExecutor {
  private readonly eventBus: EventBus;
  private readonly logger: EngineLogger;

  constructor(options: WorkflowExecutorOptions = {}) {
    this.logger = (options.logger ?? createSilentLogger()).child({
      source: 'WorkflowExecutor',
      category: 'runtime',
    });
    this.eventBus = options.eventBus ?? new EventBus(this.logger);
  }

  /**
   * Run every step of the graph once.
   *
   * @throws {RegistryError} before any step runs, when a handler type is unknown
   * @throws {StateError} when the given state belongs to a completed run
   *   or to another workflow
   */
  async execute(
    graph: ExecutionGraph,
    registry: HandlerRegistry,
    options: ExecuteOptions = {},
  ): Promise<WorkflowResult> {
    registry.assertKnownTypes(graph.workflow);

    const state = options.state ?? new ExecutionState(options.runId ?? randomUUID(), graph.workflow);
    if (state.isComplete) {
      throw StateError.alreadyCompleted(state.runId);
    }
    if (!state.belongsTo(graph.workflow)) {
      throw StateError.workflowMismatch(state.runId, state.workflowName, graph.workflow.name);
    }

    const runId = state.runId;
    const workflow = graph.workflow;
    const concurrency = normalizeConcurrency(options.concurrency);
    const meta: EventMeta = { runId, workflowName: workflow.name };
    const stepExecutor = new StepExecutor(registry, this.logger);
    const startedAt = new Date();

    const pendingPredecessors = new Map<string, number>();
    for (const id of graph.order) {
      const open = (graph.predecessors.get(id) ?? []).filter((pred) => !state.has(pred));
      pendingPredecessors.set(id, open.length);
    }

    const ready: string[] = graph.order.filter(
      (id) => !state.has(id) && pendingPredecessors.get(id) === 0,
    );
    const inFlight = new Map<string, Promise<void>>();
    let cancelled = false;
    // Results the state rejected; running steps drain, then the first is rethrown
    const faults: unknown[] = [];

    const resumedSteps = graph.order.filter((id) => state.has(id));
    this.logger.info('Workflow started', {
      runId,
      workflow: workflow.name,
      steps: graph.order.length,
      concurrency,
      resumed: resumedSteps.length > 0 ? resumedSteps.length : undefined,
    });
    this.eventBus.emit(
      createEvent(EngineEventType.WORKFLOW_STARTED, meta, {
        workflowVersion: workflow.version,
        entry: graph.entry,
        totalSteps: graph.order.length,
        concurrency,
        resumedSteps,
      }),
    );

    const release = (stepId: string): void => {
      const newlyEligible: string[] = [];
      for (const successor of graph.successors.get(stepId) ?? []) {
        if (state.has(successor)) continue;
        const remaining = (pendingPredecessors.get(successor) ?? 0) - 1;
        pendingPredecessors.set(successor, remaining);
        if (remaining === 0) newlyEligible.push(successor);
      }
      newlyEligible.sort((a, b) => (graph.declarationIndex.get(a) ?? 0) - (graph.declarationIndex.get(b) ?? 0));
      ready.push(...newlyEligible);
    };

    const dispatch = (stepId: string): void => {
      const step = requireStep(graph, stepId);
      const input = BindingResolver.resolve(step, graph, state);

      this.logger.debug('Step started', { stepId, handler: step.handler, absent: input.absent });
      this.eventBus.emit(
        createEvent(EngineEventType.STEP_STARTED, { ...meta, stepId }, {
          handler: step.handler,
          absentInputs: input.absent,
        }),
      );

      const task = stepExecutor
        .execute(step, input, {
          runId,
          workflowName: workflow.name,
          config: workflow.config,
          timeoutMs: options.stepTimeoutMs,
        })
        .then((result) => {
          inFlight.delete(stepId);
          try {
            this.recordResult(state, result, meta);
            release(stepId);
          } catch (error) {
            faults.push(error);
          }
        });

      inFlight.set(stepId, task);
    };

    while (ready.length > 0 || inFlight.size > 0) {
      if (!cancelled && options.signal?.aborted) {
        cancelled = true;
        const running = Array.from(inFlight.keys());
        this.logger.warn('Cancellation requested; waiting for running steps', { runId, running });
        this.eventBus.emit(createEvent(EngineEventType.WORKFLOW_CANCELLED, meta, { inFlight: running }));
      }

      while (!cancelled && faults.length === 0 && ready.length > 0 && inFlight.size < concurrency) {
        const next = ready.shift();
        if (next !== undefined) dispatch(next);
      }

      if (inFlight.size === 0) break;
      await Promise.race(inFlight.values());
    }

    if (faults.length > 0) {
      const [fault] = faults;
      this.logger.error('Run aborted: execution state rejected a result', fault, { runId });
      throw fault;
    }

    const neverDispatched = graph.order.filter((id) => !state.has(id));
    for (const stepId of neverDispatched) {
      const step = requireStep(graph, stepId);
      const now = new Date();
      this.recordResult(
        state,
        {
          status: 'skipped',
          stepId,
          handler: step.handler,
          reason: cancelled ? CANCELLED_REASON : UNREACHED_REASON,
          absentInputs: [],
          startedAt: now,
          completedAt: now,
          duration: 0,
        },
        meta,
      );
    }

    const status = this.decideStatus(graph, state, cancelled && neverDispatched.length > 0);
    state.complete(status);

    const steps = state.snapshot();
    const completedAt = new Date();
    const result: WorkflowResult = Object.freeze({
      runId,
      workflowName: workflow.name,
      workflowVersion: workflow.version,
      status,
      steps: Object.freeze(steps),
      startedAt,
      completedAt,
      duration: completedAt.getTime() - startedAt.getTime(),
      cancelled,
      metadata: Object.freeze({
        totalSteps: steps.length,
        succeededSteps: steps.filter((step) => step.status === 'succeeded').length,
        failedSteps: steps.filter((step) => step.status === 'failed').length,
        skippedSteps: steps.filter((step) => step.status === 'skipped').length,
      }),
    });

    this.logger.info('Workflow completed', {
      runId,
      status,
      duration: result.duration,
      succeeded: result.metadata.succeededSteps,
      failed: result.metadata.failedSteps,
      skipped: result.metadata.skippedSteps,
    });
    this.eventBus.emit(createEvent(EngineEventType.WORKFLOW_COMPLETED, meta, { result }));

    return result;
  }

  getEventBus(): EventBus {
    return this.eventBus;
  }

  private recordResult(state: ExecutionState, result: StepResult, meta: EventMeta): void {
    const recorded = state.record(result);
    const stepMeta = { ...meta, stepId: recorded.stepId };

    switch (recorded.status) {
      case 'succeeded':
        this.logger.info('Step succeeded', { stepId: recorded.stepId, duration: recorded.duration });
        this.eventBus.emit(createEvent(EngineEventType.STEP_COMPLETED, stepMeta, { result: recorded }));
        break;
      case 'failed':
        this.logger.warn('Step failed', {
          stepId: recorded.stepId,
          code: recorded.error.code,
          reason: recorded.error.message,
        });
        this.eventBus.emit(createEvent(EngineEventType.STEP_FAILED, stepMeta, { result: recorded }));
        break;
      case 'skipped':
        this.logger.info('Step skipped', { stepId: recorded.stepId, reason: recorded.reason });
        this.eventBus.emit(createEvent(EngineEventType.STEP_SKIPPED, stepMeta, { result: recorded }));
        break;
    }
  }

  /**
   * cancelled > failed entry > all succeeded > partial
   */
  private decideStatus(graph: ExecutionGraph, state: ExecutionState, cancelled: boolean): WorkflowStatus {
    if (cancelled) {
      return 'cancelled';
    }
    if (state.get(graph.entry)?.status === 'failed') {
      return 'failed';
    }
    const allSucceeded = graph.order.every((id) => state.get(id)?.status === 'succeeded');
    return allSucceeded ? 'succeeded' : 'partial';
  }
}

/**
 * At least one step at a time; NaN and infinities fall back to sequential
 */
export function normalizeConcurrency(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return 1;
  }
  return Math.max(1, Math.floor(value));
}
