/**
 * Step Executor
 *
 * Runs one step: creates its handler through the registry, invokes it
 * with the resolved input, applies the optional timeout and validates
 * the output. Every outcome becomes a StepResult; nothing thrown by a
 * handler or its factory escapes.
 *
 * Recording the result is left to the WorkflowExecutor, the single
 * writer of the execution state.
 *
 * @module execution
 */

import type { StepResult, StepSpec, WorkflowConfig } from '../types/core-types.js';
import type { Handler, HandlerContext, ResolvedInput } from '../handlers/Handler.js';
import type { HandlerRegistry } from '../handlers/HandlerRegistry.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import { StepExecutionError } from '../errors/StepExecutionError.js';
import { describeThrown } from '../errors/EngineError.js';
import { isPlainObject } from '../context/BindingResolver.js';

export interface StepInvocation {
  runId: string;
  workflowName: string;
  config: WorkflowConfig;
  /** Abort the handler and fail the step after this many ms */
  timeoutMs?: number;
}

export class StepExecutor {
  private readonly logger: EngineLogger;

  constructor(
    private readonly registry: HandlerRegistry,
    logger: EngineLogger,
  ) {
    this.logger = logger.child({ source: 'StepExecutor', category: 'runtime' });
  }

  async execute(step: StepSpec, input: ResolvedInput, invocation: StepInvocation): Promise<StepResult> {
    const startedAt = new Date();
    const stepLogger = this.logger.child({ source: step.handler, context: { stepId: step.id } });

    let handler: Handler;
    try {
      handler = this.registry.create(step.handler, {
        stepId: step.id,
        handlerType: step.handler,
        instructions: step.instructions,
        tools: step.tools,
        outputSchema: step.outputSchema,
        logger: stepLogger,
      });
    } catch (error) {
      return this.failure(step, input, startedAt, StepExecutionError.handlerInitFailed(step.id, step.handler, error));
    }

    const controller = new AbortController();
    const context: HandlerContext = {
      runId: invocation.runId,
      workflowName: invocation.workflowName,
      stepId: step.id,
      signal: controller.signal,
      logger: stepLogger,
    };

    let raw: unknown;
    try {
      const pending = Promise.resolve().then(() => handler.execute(input, invocation.config, context));
      raw = await this.withTimeout(pending, step.id, controller, invocation.timeoutMs, stepLogger);
    } catch (error) {
      const failure = error instanceof StepExecutionError ? error : StepExecutionError.handlerFailed(step.id, error);
      return this.failure(step, input, startedAt, failure);
    }

    if (!isPlainObject(raw)) {
      return this.failure(step, input, startedAt, StepExecutionError.invalidOutput(step.id, describeType(raw)));
    }

    const output = raw;
    const missing = Object.keys(step.outputSchema).filter((key) => !Object.hasOwn(output, key));
    if (missing.length > 0) {
      return this.failure(step, input, startedAt, StepExecutionError.missingOutputKeys(step.id, missing));
    }

    const completedAt = new Date();
    return {
      status: 'succeeded',
      stepId: step.id,
      handler: step.handler,
      output: { ...output },
      absentInputs: input.absent,
      startedAt,
      completedAt,
      duration: completedAt.getTime() - startedAt.getTime(),
    };
  }

  /**
   * Race the handler against the step timeout. On timeout the handler's
   * signal is aborted; whatever it settles with later is only logged.
   */
  private async withTimeout<T>(
    pending: Promise<T>,
    stepId: string,
    controller: AbortController,
    timeoutMs: number | undefined,
    logger: EngineLogger,
  ): Promise<T> {
    if (timeoutMs === undefined) {
      return pending;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        pending.catch((error: unknown) => {
          logger.debug('Handler rejected after timeout', { error: describeThrown(error).message });
        });
        reject(StepExecutionError.timeout(stepId, timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([pending, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private failure(
    step: StepSpec,
    input: ResolvedInput,
    startedAt: Date,
    error: StepExecutionError,
  ): StepResult {
    const completedAt = new Date();
    return {
      status: 'failed',
      stepId: step.id,
      handler: step.handler,
      error: error.toFailure(),
      absentInputs: input.absent,
      startedAt,
      completedAt,
      duration: completedAt.getTime() - startedAt.getTime(),
    };
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value;
}
