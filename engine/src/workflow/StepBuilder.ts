/**
 * Step and workflow builders
 *
 * Fluent construction of StepSpec and WorkflowSpec values in code, as an
 * alternative to loading a workflow document.
 *
 * @example
 * ```ts
 * const workflow = defineWorkflow('outreach')
 *   .version('1.2.0')
 *   .config({ weights: { industry: 0.4, size: 0.6 } })
 *   .step(defineStep('search').handler('prospect_search').next('enrich'))
 *   .step(
 *     defineStep('enrich')
 *       .handler('enrichment')
 *       .input('leads', fromStep('search', 'leads'))
 *       .output('enriched_leads', 'list'),
 *   )
 *   .build();
 * ```
 */

import type {
  BindingSource,
  InputBinding,
  StepSpec,
  ToolSpec,
  WorkflowConfig,
  WorkflowSpec,
} from '../types/core-types.js';
import { SchemaError } from '../errors/SchemaError.js';

export function literal(value: unknown): BindingSource {
  return { kind: 'literal', value };
}

/**
 * Reference to an upstream output key, or the whole output when `outputKey`
 * is omitted
 */
export function fromStep(stepId: string, outputKey?: string): BindingSource {
  return outputKey === undefined ? { kind: 'step', stepId } : { kind: 'step', stepId, outputKey };
}

/**
 * @param path - dotted string (`weights.industry`) or segments
 */
export function fromConfig(path: string | readonly string[], fallback?: unknown): BindingSource {
  const segments = typeof path === 'string' ? path.split('.').filter(Boolean) : [...path];
  return fallback === undefined
    ? { kind: 'config', path: segments }
    : { kind: 'config', path: segments, fallback };
}

export class StepBuilder {
  private handlerType?: string;
  private instructionText = '';
  private readonly bindings: InputBinding[] = [];
  private readonly successors: string[] = [];
  private readonly toolSpecs: ToolSpec[] = [];
  private readonly schema: Record<string, string> = {};
  private descriptionText?: string;

  constructor(private readonly stepId: string) {}

  handler(type: string): this {
    this.handlerType = type;
    return this;
  }

  instructions(text: string): this {
    this.instructionText = text;
    return this;
  }

  input(key: string, source: BindingSource): this {
    this.bindings.push({ key, source });
    return this;
  }

  next(...stepIds: string[]): this {
    this.successors.push(...stepIds);
    return this;
  }

  tool(name: string, config: Record<string, unknown> = {}): this {
    this.toolSpecs.push({ name, config: { ...config } });
    return this;
  }

  /**
   * Require `key` in the handler's output
   */
  output(key: string, type = 'any'): this {
    this.schema[key] = type;
    return this;
  }

  describe(text: string): this {
    this.descriptionText = text;
    return this;
  }

  /**
   * @throws {SchemaError} when the id or handler type is missing
   */
  build(): StepSpec {
    if (!this.stepId) {
      throw SchemaError.invalidStepDefinition('Step requires an id');
    }
    if (!this.handlerType) {
      throw SchemaError.invalidStepDefinition(`Step "${this.stepId}" requires a handler type`, this.stepId);
    }

    return Object.freeze({
      id: this.stepId,
      handler: this.handlerType,
      instructions: this.instructionText,
      inputs: Object.freeze(this.bindings.map((binding) => Object.freeze({ ...binding }))),
      next: Object.freeze([...this.successors]),
      tools: Object.freeze(this.toolSpecs.map((tool) => Object.freeze({ ...tool }))),
      outputSchema: Object.freeze({ ...this.schema }),
      description: this.descriptionText,
    });
  }
}

export class WorkflowBuilder {
  private versionLabel = '1.0.0';
  private descriptionText?: string;
  private configValues: WorkflowConfig = {};
  private readonly stepSpecs: StepSpec[] = [];

  constructor(private readonly workflowName: string) {}

  version(version: string): this {
    this.versionLabel = version;
    return this;
  }

  describe(text: string): this {
    this.descriptionText = text;
    return this;
  }

  config(config: WorkflowConfig): this {
    this.configValues = { ...config };
    return this;
  }

  step(step: StepSpec | StepBuilder): this {
    this.stepSpecs.push(step instanceof StepBuilder ? step.build() : step);
    return this;
  }

  build(): WorkflowSpec {
    if (!this.workflowName) {
      throw SchemaError.invalidStepDefinition('Workflow requires a name');
    }

    return Object.freeze({
      name: this.workflowName,
      version: this.versionLabel,
      description: this.descriptionText,
      steps: Object.freeze([...this.stepSpecs]),
      config: Object.freeze({ ...this.configValues }),
    });
  }
}

export function defineStep(id: string): StepBuilder {
  return new StepBuilder(id);
}

export function defineWorkflow(name: string): WorkflowBuilder {
  return new WorkflowBuilder(name);
}
