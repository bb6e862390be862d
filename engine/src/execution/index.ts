/**
 * Execution Layer
 *
 * - StepExecutor: runs one step with timeout and output validation
 * - WorkflowExecutor: walks the graph in dependency order with bounded concurrency
 */

export * from './StepExecutor.js';
export * from './WorkflowExecutor.js';
