/**
 * Leadflow Engine - dynamic workflow graphs for outreach pipelines
 *
 * @example
 * ```ts
 * import { WorkflowEngine } from '@leadflow/engine';
 *
 * const engine = new WorkflowEngine({ handlers: { scoring: createScoringHandler } });
 * const spec = await engine.loadWorkflow('./workflows/outreach.yaml');
 * const result = await engine.run(spec);
 * ```
 */

// ============================================================================
// PRIMARY EXPORT - Start here!
// ============================================================================

export { WorkflowEngine } from './core/WorkflowEngine.js';
export type { WorkflowRunOptions, ValidateOptions, ValidationReport } from './core/WorkflowEngine.js';
export { applyConfigDefaults, validateConfig } from './core/EngineConfig.js';
export type { WorkflowEngineConfig, ResolvedEngineConfig, LogLevelName } from './core/EngineConfig.js';

// ============================================================================
// TYPES - Essential types for working with the engine
// ============================================================================

export * from './types/core-types.js';
export * from './types/log-types.js';

// ============================================================================
// DEFINING WORKFLOWS
// ============================================================================

export * from './workflow/StepBuilder.js';
export * from './loader/index.js';
export * from './parser/index.js';

// ============================================================================
// HANDLERS
// ============================================================================

export * from './handlers/index.js';

// ============================================================================
// ADVANCED - Engine internals for custom tooling
// ============================================================================

export * from './graph/index.js';
export * from './execution/index.js';
export * from './state/index.js';
export * from './context/index.js';
export * from './events/index.js';
export * from './logging/EngineLogger.js';
export * from './errors/index.js';

// Testing utilities
export * from './testing/index.js';
