import type { StepOutput, ToolSpec, WorkflowConfig } from '../types/core-types.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import type {
  Handler,
  HandlerContext,
  HandlerFactory,
  HandlerOptions,
  ResolvedInput,
} from './Handler.js';

/**
 * Base class for handlers
 *
 * Keeps the step declaration at hand, gives tool lookup by name and logs
 * start and finish at debug level. Subclasses implement `run()` and can
 * trace their decisions with `logReasoning()`.
 *
 * @example
 * ```ts
 * class ScoringHandler extends BaseHandler {
 *   protected run(input: ResolvedInput, config: WorkflowConfig) {
 *     const weights = config.weights;
 *     return { scored: score(input.values.leads, weights) };
 *   }
 * }
 *
 * registry.register('scoring', BaseHandler.factoryFor(ScoringHandler));
 * ```
 */
export abstract class BaseHandler implements Handler {
  protected readonly stepId: string;
  protected readonly handlerType: string;
  protected readonly instructions: string;
  protected readonly tools: readonly ToolSpec[];
  protected readonly outputSchema: Readonly<Record<string, string>>;
  protected readonly logger: EngineLogger;

  constructor(options: HandlerOptions) {
    this.stepId = options.stepId;
    this.handlerType = options.handlerType;
    this.instructions = options.instructions;
    this.tools = options.tools;
    this.outputSchema = options.outputSchema;
    this.logger = options.logger;
  }

  /**
   * First tool declared under `name`
   */
  getTool(name: string): ToolSpec | undefined {
    return this.tools.find((tool) => tool.name === name);
  }

  /**
   * @throws Error when the step declares no such tool
   */
  requireTool(name: string): ToolSpec {
    const tool = this.getTool(name);
    if (!tool) {
      const declared = this.tools.map((t) => t.name).join(', ') || 'none';
      throw new Error(`Step "${this.stepId}" declares no tool "${name}" (declared: ${declared})`);
    }
    return tool;
  }

  /**
   * Record one decision of the handler at info level
   *
   * @example
   * ```ts
   * this.logReasoning('prioritize', 'Ranking by fit score', { candidates: leads.length });
   * ```
   */
  protected logReasoning(step: string, reasoning: string, data?: unknown): void {
    this.logger.info('Handler reasoning', { handler: this.handlerType, step, reasoning, data });
  }

  async execute(
    input: ResolvedInput,
    config: WorkflowConfig,
    context: HandlerContext,
  ): Promise<StepOutput> {
    this.logger.debug('Handler started', {
      handler: this.handlerType,
      inputs: Object.keys(input.values),
      absent: input.absent,
    });

    const output = await this.run(input, config, context);

    this.logger.debug('Handler finished', { handler: this.handlerType });
    return output;
  }

  protected abstract run(
    input: ResolvedInput,
    config: WorkflowConfig,
    context: HandlerContext,
  ): StepOutput | Promise<StepOutput>;

  /**
   * Factory creating a fresh instance of a BaseHandler subclass
   */
  static factoryFor(HandlerClass: new (options: HandlerOptions) => Handler): HandlerFactory {
    return (options) => new HandlerClass(options);
  }
}
