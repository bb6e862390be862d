/**
 * Core Types
 *
 * Data model shared by every engine component: step and workflow
 * specifications, step results and the terminal workflow result.
 *
 * @module types
 */

/**
 * Output mapping produced by a handler
 */
export type StepOutput = Readonly<Record<string, unknown>>;

/**
 * Workflow-level configuration passed through to every handler
 * (scoring weights, outreach persona, ...)
 */
export type WorkflowConfig = Readonly<Record<string, unknown>>;

/**
 * Where an input binding takes its value from
 */
export type BindingSource =
  | { readonly kind: 'literal'; readonly value: unknown }
  | {
      readonly kind: 'step';
      readonly stepId: string;
      /** Omitted: bind the whole output mapping of the step */
      readonly outputKey?: string;
    }
  | {
      readonly kind: 'config';
      readonly path: readonly string[];
      readonly fallback?: unknown;
    };

/**
 * A single declared input of a step
 */
export interface InputBinding {
  /** Key under which the value is handed to the handler */
  readonly key: string;
  readonly source: BindingSource;
}

/**
 * Tool descriptor handed to a handler factory (API client settings etc.)
 */
export interface ToolSpec {
  readonly name: string;
  readonly config: Readonly<Record<string, unknown>>;
}

/**
 * Declarative description of one node of the workflow graph
 */
export interface StepSpec {
  /** Unique identifier within the workflow */
  readonly id: string;

  /** Handler-type name resolved through the HandlerRegistry */
  readonly handler: string;

  /** Free-form instructions, opaque to the engine */
  readonly instructions: string;

  /** Ordered input bindings */
  readonly inputs: readonly InputBinding[];

  /** Ordered successor step ids */
  readonly next: readonly string[];

  readonly tools: readonly ToolSpec[];

  /** Required output key -> type label */
  readonly outputSchema: Readonly<Record<string, string>>;

  readonly description?: string;
}

/**
 * A complete workflow definition, already resolved by the loader
 */
export interface WorkflowSpec {
  readonly name: string;
  readonly version: string;
  readonly description?: string;
  readonly steps: readonly StepSpec[];
  readonly config: WorkflowConfig;
}

/**
 * Terminal status of a single step
 */
export type StepStatus = 'succeeded' | 'failed' | 'skipped';

/**
 * Overall status of a workflow run
 */
export type WorkflowStatus = 'succeeded' | 'partial' | 'failed' | 'cancelled';

/**
 * Serializable description of a step failure
 */
export interface StepFailure {
  readonly name: string;
  readonly code: string;
  readonly message: string;
}

interface StepResultBase {
  readonly stepId: string;
  readonly handler: string;
  /** Input keys that resolved to the absent marker */
  readonly absentInputs: readonly string[];
  readonly startedAt: Date;
  readonly completedAt: Date;
  /** Wall-clock duration (ms) */
  readonly duration: number;
}

export interface SucceededStepResult extends StepResultBase {
  readonly status: 'succeeded';
  readonly output: StepOutput;
}

export interface FailedStepResult extends StepResultBase {
  readonly status: 'failed';
  readonly error: StepFailure;
}

export interface SkippedStepResult extends StepResultBase {
  readonly status: 'skipped';
  readonly reason: string;
}

/**
 * Result of one step in one run. Created exactly once per step.
 */
export type StepResult = SucceededStepResult | FailedStepResult | SkippedStepResult;

/**
 * Terminal snapshot of a run
 */
export interface WorkflowResult {
  readonly runId: string;
  readonly workflowName: string;
  readonly workflowVersion: string;
  readonly status: WorkflowStatus;

  /** Step results in declaration order */
  readonly steps: readonly StepResult[];

  readonly startedAt: Date;
  readonly completedAt: Date;

  /** Total duration (ms) */
  readonly duration: number;

  /** True when cancellation was observed during the run */
  readonly cancelled: boolean;

  readonly metadata: {
    readonly totalSteps: number;
    readonly succeededSteps: number;
    readonly failedSteps: number;
    readonly skippedSteps: number;
  };
}

/**
 * Ordered execution plan derived from a graph, used by `explain`
 */
export interface ExecutionPlan {
  readonly workflowName: string;
  readonly entry: string;
  /** Kahn phases; steps in the same phase share no dependency */
  readonly phases: readonly (readonly string[])[];
  /** Flat topological order */
  readonly order: readonly string[];
}

/**
 * Condensed view of a workflow for display
 */
export interface WorkflowSummary {
  readonly name: string;
  readonly version: string;
  readonly description?: string;
  readonly totalSteps: number;
  readonly steps: ReadonlyArray<{
    readonly id: string;
    readonly handler: string;
    readonly next: readonly string[];
  }>;
  readonly config: WorkflowConfig;
}
