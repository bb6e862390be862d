/**
 * Workflow Engine - Main Public API
 *
 * User-facing engine class. Wraps graph building, the handler registry,
 * the executor and the event bus behind one object.
 *
 * @module core
 */

import type {
  ExecutionPlan,
  WorkflowResult,
  WorkflowSpec,
  WorkflowSummary,
} from '../types/core-types.js';
import type { EngineError } from '../errors/EngineError.js';
import { GraphBuilder } from '../graph/GraphBuilder.js';
import { TopologicalSorter } from '../graph/TopologicalSorter.js';
import type { ExecutionGraph } from '../graph/ExecutionGraph.js';
import { HandlerRegistry } from '../handlers/HandlerRegistry.js';
import type { HandlerFactory } from '../handlers/Handler.js';
import { WorkflowExecutor, type ExecuteOptions } from '../execution/WorkflowExecutor.js';
import { EventBus, type EventListener, type WildcardListener } from '../events/EventBus.js';
import type { EngineEventType } from '../events/EngineEvents.js';
import { createEngineLogger, type EngineLogger } from '../logging/EngineLogger.js';
import { WorkflowLoader, type LoadOptions } from '../loader/WorkflowLoader.js';
import {
  applyConfigDefaults,
  validateConfig,
  type ResolvedEngineConfig,
  type WorkflowEngineConfig,
} from './EngineConfig.js';

/**
 * Per-run options. Concurrency and timeout default to the engine config.
 */
export type WorkflowRunOptions = ExecuteOptions;

export interface ValidateOptions {
  /** Report handler types missing from the registry (default: true) */
  checkHandlers?: boolean;
}

export interface ValidationReport {
  valid: boolean;
  errors: EngineError[];
  warnings: EngineError[];
}

/**
 * @example
 * ```ts
 * const engine = new WorkflowEngine({ logLevel: 'warn' });
 * engine.registerHandler('lead_scoring', (options) => new LeadScoring(options));
 *
 * const spec = await engine.loadWorkflow('./workflows/outreach.yaml');
 * const result = await engine.run(spec, { signal: controller.signal });
 * ```
 */
export class WorkflowEngine {
  private readonly config: ResolvedEngineConfig;
  private readonly registry: HandlerRegistry;
  private readonly eventBus: EventBus;
  private readonly executor: WorkflowExecutor;
  private readonly logger: EngineLogger;

  /**
   * @throws {SchemaError} when the configuration is invalid
   */
  constructor(config: WorkflowEngineConfig = {}) {
    this.config = applyConfigDefaults(validateConfig(config));

    this.logger = createEngineLogger({
      level: this.config.logLevel,
      format: this.config.logFormat,
      colors: this.config.colors,
      sink: this.config.logSink,
    });

    this.registry = this.config.registry ?? new HandlerRegistry();
    if (this.config.handlers) {
      this.registry.registerAll(this.config.handlers);
    }

    this.eventBus = new EventBus(this.logger.child({ source: 'EventBus', category: 'runtime' }));
    this.executor = new WorkflowExecutor({ eventBus: this.eventBus, logger: this.logger });

    this.logger.debug('Engine created', {
      maxConcurrentSteps: this.config.maxConcurrentSteps,
      stepTimeoutMs: this.config.stepTimeoutMs,
      handlers: this.registry.getNames(),
    });
  }

  registerHandler(typeName: string, factory: HandlerFactory): this {
    this.registry.register(typeName, factory);
    this.logger.debug('Handler registered', { type: typeName });
    return this;
  }

  getRegistry(): HandlerRegistry {
    return this.registry;
  }

  /**
   * Read and parse a workflow file, logging through this engine
   */
  async loadWorkflow(filePath: string, options: Omit<LoadOptions, 'logger'> = {}): Promise<WorkflowSpec> {
    return WorkflowLoader.fromFile(filePath, { ...options, logger: this.logger });
  }

  /**
   * Every graph and registry diagnostic, without running anything
   */
  validate(spec: WorkflowSpec, options: ValidateOptions = {}): ValidationReport {
    const analysis = GraphBuilder.analyze(spec);
    const registryErrors = options.checkHandlers === false ? [] : this.registry.findUnknownTypes(spec);
    const errors: EngineError[] = [...analysis.errors, ...registryErrors];
    const warnings: EngineError[] = [...analysis.warnings];

    const analysisLogger = this.logger.child({ source: 'GraphBuilder', category: 'analysis' });
    analysisLogger.info('Workflow validated', {
      workflow: spec.name,
      errors: errors.length,
      warnings: warnings.length,
    });

    return { valid: errors.length === 0, errors, warnings };
  }

  /**
   * @throws {GraphError} the first structural error
   */
  build(spec: WorkflowSpec): ExecutionGraph {
    const analysis = GraphBuilder.analyze(spec);
    const analysisLogger = this.logger.child({ source: 'GraphBuilder', category: 'analysis' });

    for (const warning of analysis.warnings) {
      analysisLogger.warn(warning.message, { code: warning.code });
    }

    const [first] = analysis.errors;
    if (first) {
      analysisLogger.error('Workflow rejected', first, { workflow: spec.name });
      throw first;
    }

    const graph = analysis.graph ?? GraphBuilder.build(spec);
    analysisLogger.debug('Graph built', { workflow: spec.name, entry: graph.entry });
    return graph;
  }

  /**
   * Entry step, parallel phases and flat order, without running anything
   */
  explain(spec: WorkflowSpec): ExecutionPlan {
    const graph = this.build(spec);
    const sorted = TopologicalSorter.sort(graph);
    return {
      workflowName: spec.name,
      entry: graph.entry,
      phases: sorted.phases,
      order: sorted.order,
    };
  }

  summarize(spec: WorkflowSpec): WorkflowSummary {
    return {
      name: spec.name,
      version: spec.version,
      description: spec.description,
      totalSteps: spec.steps.length,
      steps: spec.steps.map((step) => ({ id: step.id, handler: step.handler, next: step.next })),
      config: spec.config,
    };
  }

  /**
   * Run a workflow once. Structural and registry problems reject before
   * any step runs; step failures never reject.
   *
   * @throws {GraphError} the graph is invalid
   * @throws {RegistryError} a handler type is not registered
   * @throws {StateError} `options.state` belongs to a completed run
   */
  async run(spec: WorkflowSpec, options: WorkflowRunOptions = {}): Promise<WorkflowResult> {
    const graph = this.build(spec);
    return this.executor.execute(graph, this.registry, {
      ...options,
      concurrency: options.concurrency ?? this.config.maxConcurrentSteps,
      stepTimeoutMs: options.stepTimeoutMs ?? this.config.stepTimeoutMs,
    });
  }

  on<T extends EngineEventType>(eventType: T, listener: EventListener<T>): () => void {
    return this.eventBus.on(eventType, listener);
  }

  onAny(listener: WildcardListener): () => void {
    return this.eventBus.onAny(listener);
  }

  getEventBus(): EventBus {
    return this.eventBus;
  }

  getLogger(): EngineLogger {
    return this.logger;
  }

  getConfig(): Readonly<ResolvedEngineConfig> {
    return this.config;
  }
}
